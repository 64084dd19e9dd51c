import loggerModule, { type Logger } from '../logger.js';

export type WorkQueueOptions = {
  concurrency: number;
  maxPending: number;
  logger?: Logger;
};

export type PushResult = 'accepted' | 'full' | 'closed';

/**
 * Bounded worker pool. At most `concurrency` jobs run at once and at most
 * `maxPending` wait behind them; anything beyond is refused, never buffered.
 */
export class WorkQueue<T> {
  private readonly pending: T[] = [];
  private active = 0;
  private closed = false;
  private idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private readonly maxPending: number;
  private readonly logger: Logger;

  constructor(private readonly worker: (job: T) => Promise<void>, options: WorkQueueOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.maxPending = Math.max(0, Math.floor(options.maxPending));
    this.logger = options.logger ?? loggerModule;
  }

  get size() {
    return this.pending.length;
  }

  get running() {
    return this.active;
  }

  push(job: T): PushResult {
    if (this.closed) {
      return 'closed';
    }
    if (this.active < this.concurrency) {
      this.start(job);
      return 'accepted';
    }
    if (this.pending.length >= this.maxPending) {
      return 'full';
    }
    this.pending.push(job);
    return 'accepted';
  }

  /** Stops accepting jobs; queued and running jobs still complete. */
  close() {
    this.closed = true;
  }

  onIdle(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  private start(job: T) {
    this.active += 1;
    void this.execute(job);
  }

  private async execute(job: T) {
    try {
      await this.worker(job);
    } catch (error) {
      this.logger.error({ err: error }, 'Work queue job failed');
    } finally {
      this.active -= 1;
      const next = this.pending.shift();
      if (typeof next !== 'undefined') {
        this.start(next);
      } else if (this.active === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
          resolve();
        }
      }
    }
  }
}
