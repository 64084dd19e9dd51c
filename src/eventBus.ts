import { EventEmitter } from 'node:events';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import type { BridgeEvent } from './types.js';

const EVENT_CHANNEL = 'event';

interface EventBusDependencies {
  log: Logger;
  metrics?: MetricsRegistry;
}

type BridgeEventListener = (event: BridgeEvent) => void;

/**
 * Single inbound channel between the broker adaptor and the connection manager.
 * Broker callbacks are translated into {@link BridgeEvent}s and pushed here.
 */
class EventBus extends EventEmitter {
  private readonly log: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(dependencies: EventBusDependencies = { log: logger }) {
    super();
    this.log = dependencies.log;
    this.metrics = dependencies.metrics ?? metrics;
  }

  emitEvent(event: BridgeEvent): boolean {
    this.metrics.recordBridgeEvent(event.type);
    this.log.debug(describe(event), 'Bridge event');
    return this.emit(EVENT_CHANNEL, event);
  }

  subscribe(listener: BridgeEventListener): () => void {
    this.on(EVENT_CHANNEL, listener);
    return () => {
      this.off(EVENT_CHANNEL, listener);
    };
  }
}

function describe(event: BridgeEvent): Record<string, unknown> {
  switch (event.type) {
    case 'notification':
      return { type: event.type, topic: event.message.topic, bytes: event.message.payload.length };
    case 'disconnected':
      return { type: event.type, requested: event.info.requested, reason: event.info.reason };
    case 'subscribe-ack':
    case 'publish-ack':
      return { type: event.type, topic: event.topic };
    case 'broker-error':
      return { type: event.type, err: event.error };
    default:
      return { type: event.type };
  }
}

export { EventBus };
export type { BridgeEventListener };
