import { EventEmitter } from 'node:events';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import type { BrokerClient } from '../broker/mqttClient.js';
import type { EventBus } from '../eventBus.js';
import type { BridgeEvent, CameraProfile, ConnectionState, InboundMessage } from '../types.js';

export interface CameraSubscriber {
  subscribeAll(cameras: readonly CameraProfile[]): Promise<void>;
}

export type ConnectionManagerOptions = {
  broker: BrokerClient;
  bus: EventBus;
  subscriber: CameraSubscriber;
  cameras: readonly CameraProfile[];
  onNotification: (message: InboundMessage) => void;
  /** Broker address for log context only. */
  endpoint?: string;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

const STATE_RANK: Record<ConnectionState, number> = {
  disconnected: 0,
  connecting: 1,
  connected: 2,
  subscribed: 3
};

export type StateChangeListener = (next: ConnectionState, previous: ConnectionState) => void;

/**
 * Owns the broker connection state machine:
 * disconnected -> connecting -> connected -> subscribed, and back to
 * disconnected on any failure.
 */
export class ConnectionManager extends EventEmitter {
  private current: ConnectionState = 'disconnected';
  private detach: (() => void) | null = null;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: ConnectionManagerOptions) {
    super();
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  get state(): ConnectionState {
    return this.current;
  }

  isAtLeast(state: ConnectionState): boolean {
    return STATE_RANK[this.current] >= STATE_RANK[state];
  }

  onStateChange(listener: StateChangeListener): () => void {
    this.on('state', listener);
    return () => {
      this.off('state', listener);
    };
  }

  /** Starts listening to broker events. */
  start() {
    if (!this.detach) {
      this.detach = this.options.bus.subscribe(event => this.handleEvent(event));
    }
  }

  stop() {
    this.detach?.();
    this.detach = null;
  }

  /** Starts a connection attempt. Returns false when one is already underway or established. */
  connect(): boolean {
    if (this.current !== 'disconnected') {
      this.logger.debug({ state: this.current }, 'Connect skipped, connection already active');
      return false;
    }

    this.transition('connecting');
    this.metrics.recordConnectAttempt();
    this.logger.info({ endpoint: this.options.endpoint }, 'Connecting to broker');
    try {
      this.options.broker.connect();
    } catch (error) {
      this.logger.error({ err: error, endpoint: this.options.endpoint }, 'Broker connect failed');
      this.transition('disconnected');
    }
    return true;
  }

  /** Tears the connection down. Never rejects; the state ends up disconnected. */
  async disconnect(): Promise<void> {
    this.logger.info({ endpoint: this.options.endpoint, state: this.current }, 'Disconnecting from broker');
    try {
      await this.options.broker.disconnect();
    } catch (error) {
      this.logger.error({ err: error }, 'Broker disconnect failed');
      this.transition('disconnected');
    }
  }

  forceDisconnect(reason: string) {
    this.logger.warn({ reason, state: this.current }, 'Forcing broker disconnect');
    void this.disconnect();
  }

  private handleEvent(event: BridgeEvent) {
    switch (event.type) {
      case 'connected':
        void this.onConnected();
        return;
      case 'disconnected':
        if (this.current === 'disconnected') {
          return;
        }
        if (event.info.requested) {
          this.logger.info({ endpoint: this.options.endpoint }, 'Disconnected from broker');
        } else {
          this.logger.warn(
            { endpoint: this.options.endpoint, reason: event.info.reason },
            'Unexpected disconnection from broker'
          );
        }
        this.transition('disconnected');
        return;
      case 'subscribe-ack':
        this.logger.info({ topic: event.topic }, 'Subscribed topic');
        if (this.current === 'connected') {
          this.transition('subscribed');
        }
        return;
      case 'publish-ack':
        this.logger.debug({ topic: event.topic }, 'Published message');
        return;
      case 'notification':
        this.options.onNotification(event.message);
        return;
      case 'broker-error':
        this.logger.error({ err: event.error }, 'Broker client error');
        return;
    }
  }

  private async onConnected() {
    this.transition('connected');
    this.logger.info({ endpoint: this.options.endpoint }, 'Connected to broker');
    try {
      await this.options.subscriber.subscribeAll(this.options.cameras);
    } catch (error) {
      this.logger.error({ err: error }, 'Subscribing camera topics failed');
      if (this.current !== 'disconnected') {
        await this.disconnect();
      }
    }
  }

  private transition(next: ConnectionState) {
    const previous = this.current;
    if (previous === next) {
      return;
    }
    this.current = next;
    this.metrics.recordConnectionTransition(next, previous);
    this.emit('state', next, previous);
  }
}
