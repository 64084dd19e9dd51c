import loggerModule, { type Logger } from '../logger.js';
import type { ConnectionManager } from './connectionManager.js';

export const DEFAULT_RECONNECT_INTERVAL_MS = 10_000;

type ConnectionDriver = Pick<ConnectionManager, 'state' | 'connect' | 'onStateChange'>;

export type ReconnectLoopOptions = {
  intervalMs?: number;
  logger?: Logger;
  now?: () => number;
};

/**
 * Keeps the bridge connected. Wakes when the connection drops rather than polling,
 * and never starts two attempts within one interval.
 */
export class ReconnectLoop {
  private timer: NodeJS.Timeout | null = null;
  private lastAttemptAt: number | null = null;
  private stopped = true;
  private detach: (() => void) | null = null;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly connection: ConnectionDriver, options: ReconnectLoopOptions = {}) {
    this.intervalMs = Math.max(1, Math.floor(options.intervalMs ?? DEFAULT_RECONNECT_INTERVAL_MS));
    this.logger = options.logger ?? loggerModule;
    this.now = options.now ?? Date.now;
  }

  start() {
    if (!this.stopped) {
      return;
    }
    this.stopped = false;
    this.detach = this.connection.onStateChange(next => {
      if (next === 'disconnected') {
        this.schedule();
      }
    });
    this.schedule();
  }

  stop() {
    this.stopped = true;
    this.detach?.();
    this.detach = null;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule() {
    if (this.stopped || this.timer) {
      return;
    }

    const delayMs =
      this.lastAttemptAt === null ? 0 : Math.max(0, this.lastAttemptAt + this.intervalMs - this.now());
    if (delayMs > 0) {
      this.logger.info({ delayMs }, 'Reconnect scheduled');
    }

    this.timer = setTimeout(() => {
      this.timer = null;
      this.attempt();
    }, delayMs);
  }

  private attempt() {
    if (this.stopped || this.connection.state !== 'disconnected') {
      return;
    }
    this.lastAttemptAt = this.now();
    this.connection.connect();
  }
}
