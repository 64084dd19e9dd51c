import pino from 'pino';
import type { BridgeEventType, ConnectionState } from '../types.js';

type CounterMap = Record<string, number>;

type LatencyStats = {
  count: number;
  totalMs: number;
  minMs: number;
  maxMs: number;
  averageMs: number;
};

type LogLevelState = {
  counters: Map<string, number>;
  lastErrorAt: number | null;
  lastErrorMessage: string | null;
};

type JobOutcome = 'published' | 'transcode-failed' | 'failed' | 'rejected' | 'duplicate';

export type MetricsSnapshot = {
  createdAt: string;
  logs: {
    byLevel: CounterMap;
    lastErrorAt: string | null;
    lastErrorMessage: string | null;
  };
  events: CounterMap;
  connection: {
    state: ConnectionState;
    attempts: number;
    transitions: CounterMap;
    lastConnectedAt: string | null;
    lastDisconnectedAt: string | null;
  };
  subscriptions: {
    issued: number;
    failed: number;
  };
  jobs: {
    byOutcome: CounterMap;
    failuresByStage: CounterMap;
    published: number;
  };
  latencies: Record<string, LatencyStats>;
};

const PINO_LEVEL_ORDER = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;

class MetricsRegistry {
  private logLevels: LogLevelState = createLogLevelState();
  private events = new Map<string, number>();
  private connectionState: ConnectionState = 'disconnected';
  private connectAttempts = 0;
  private transitions = new Map<string, number>();
  private lastConnectedAt: number | null = null;
  private lastDisconnectedAt: number | null = null;
  private subscriptionsIssued = 0;
  private subscriptionsFailed = 0;
  private jobOutcomes = new Map<string, number>();
  private stageFailures = new Map<string, number>();
  private publishes = 0;
  private latencies = new Map<string, LatencyStats>();

  reset() {
    this.logLevels = createLogLevelState();
    this.events.clear();
    this.connectionState = 'disconnected';
    this.connectAttempts = 0;
    this.transitions.clear();
    this.lastConnectedAt = null;
    this.lastDisconnectedAt = null;
    this.subscriptionsIssued = 0;
    this.subscriptionsFailed = 0;
    this.jobOutcomes.clear();
    this.stageFailures.clear();
    this.publishes = 0;
    this.latencies.clear();
  }

  incrementLogLevel(level: string, context?: { message?: string }) {
    const normalized = level.toLowerCase();
    increment(this.logLevels.counters, normalized);
    if (normalized === 'error' || normalized === 'fatal') {
      this.logLevels.lastErrorAt = Date.now();
      this.logLevels.lastErrorMessage = context?.message ?? null;
    }
  }

  recordBridgeEvent(type: BridgeEventType) {
    increment(this.events, type);
  }

  recordConnectAttempt() {
    this.connectAttempts += 1;
  }

  recordConnectionTransition(next: ConnectionState, previous: ConnectionState) {
    increment(this.transitions, `${previous}->${next}`);
    this.connectionState = next;
    if (next === 'connected') {
      this.lastConnectedAt = Date.now();
    } else if (next === 'disconnected') {
      this.lastDisconnectedAt = Date.now();
    }
  }

  recordSubscription(outcome: 'issued' | 'failed') {
    if (outcome === 'issued') {
      this.subscriptionsIssued += 1;
    } else {
      this.subscriptionsFailed += 1;
    }
  }

  recordJobOutcome(outcome: JobOutcome, stage?: string | null) {
    increment(this.jobOutcomes, outcome);
    if (outcome === 'failed' && stage) {
      increment(this.stageFailures, stage);
    }
  }

  recordPublish() {
    this.publishes += 1;
  }

  observeLatency(metric: string, durationMs: number) {
    if (!Number.isFinite(durationMs) || durationMs < 0) {
      return;
    }
    const existing = this.latencies.get(metric);
    if (!existing) {
      this.latencies.set(metric, {
        count: 1,
        totalMs: durationMs,
        minMs: durationMs,
        maxMs: durationMs,
        averageMs: durationMs
      });
      return;
    }
    existing.count += 1;
    existing.totalMs += durationMs;
    existing.minMs = Math.min(existing.minMs, durationMs);
    existing.maxMs = Math.max(existing.maxMs, durationMs);
    existing.averageMs = existing.totalMs / existing.count;
  }

  snapshot(): MetricsSnapshot {
    const byLevel: CounterMap = {};
    for (const level of PINO_LEVEL_ORDER) {
      byLevel[level] = this.logLevels.counters.get(level) ?? 0;
    }
    for (const [level, count] of this.logLevels.counters) {
      if (!(level in byLevel)) {
        byLevel[level] = count;
      }
    }

    return {
      createdAt: new Date().toISOString(),
      logs: {
        byLevel,
        lastErrorAt: toIso(this.logLevels.lastErrorAt),
        lastErrorMessage: this.logLevels.lastErrorMessage
      },
      events: Object.fromEntries(this.events),
      connection: {
        state: this.connectionState,
        attempts: this.connectAttempts,
        transitions: Object.fromEntries(this.transitions),
        lastConnectedAt: toIso(this.lastConnectedAt),
        lastDisconnectedAt: toIso(this.lastDisconnectedAt)
      },
      subscriptions: {
        issued: this.subscriptionsIssued,
        failed: this.subscriptionsFailed
      },
      jobs: {
        byOutcome: Object.fromEntries(this.jobOutcomes),
        failuresByStage: Object.fromEntries(this.stageFailures),
        published: this.publishes
      },
      latencies: Object.fromEntries(
        Array.from(this.latencies.entries()).map(([metric, stats]) => [metric, { ...stats }])
      )
    };
  }

  /** Pino level label for a numeric level, falling back to the number itself. */
  static levelLabel(level: number | string): string {
    if (typeof level === 'number') {
      return pino.levels.labels[level] ?? String(level);
    }
    return level;
  }
}

function createLogLevelState(): LogLevelState {
  return {
    counters: new Map<string, number>(),
    lastErrorAt: null,
    lastErrorMessage: null
  };
}

function increment(map: Map<string, number>, key: string, amount = 1) {
  map.set(key, (map.get(key) ?? 0) + amount);
}

function toIso(value: number | null): string | null {
  return value === null ? null : new Date(value).toISOString();
}

const defaultRegistry = new MetricsRegistry();

export type { JobOutcome, LatencyStats };
export { MetricsRegistry };
export default defaultRegistry;
