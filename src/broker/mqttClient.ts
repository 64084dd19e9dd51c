import { connect as mqttConnect, type IClientOptions, type MqttClient } from 'mqtt';
import { BrokerError, toError } from '../errors.js';
import type { EventBus } from '../eventBus.js';
import type { BrokerConfig } from '../config/index.js';

/** Failure code a broker returns in SUBACK for a rejected subscription. */
const SUBACK_FAILURE = 128;

export interface BrokerClient {
  /** Starts an asynchronous connection attempt; the outcome arrives on the event bus. */
  connect(): void;
  disconnect(): Promise<void>;
  subscribe(topic: string): Promise<void>;
  publish(topic: string, payload: string): Promise<void>;
}

export type MqttConnectFactory = (url: string, options: IClientOptions) => MqttClient;

export type MqttBrokerClientOptions = {
  broker: BrokerConfig;
  bus: EventBus;
  connectTimeoutMs: number;
  connectFactory?: MqttConnectFactory;
  now?: () => number;
};

export class MqttBrokerClient implements BrokerClient {
  private client: MqttClient | null = null;
  private closing = false;
  private readonly connectFactory: MqttConnectFactory;
  private readonly now: () => number;

  constructor(private readonly options: MqttBrokerClientOptions) {
    this.connectFactory = options.connectFactory ?? mqttConnect;
    this.now = options.now ?? Date.now;
  }

  get url() {
    return `mqtt://${this.options.broker.host}:${this.options.broker.port}`;
  }

  connect() {
    if (this.client) {
      this.release(this.client);
    }

    const { broker } = this.options;
    const clientOptions: IClientOptions = {
      reconnectPeriod: 0,
      connectTimeout: this.options.connectTimeoutMs,
      queueQoSZero: false,
      clean: true
    };
    if (broker.username) {
      clientOptions.username = broker.username;
      clientOptions.password = broker.password;
    }
    if (broker.clientId) {
      clientOptions.clientId = broker.clientId;
    }

    this.closing = false;
    const client = this.connectFactory(this.url, clientOptions);
    this.client = client;
    this.attach(client);
  }

  disconnect(): Promise<void> {
    const client = this.client;
    if (!client) {
      return Promise.resolve();
    }

    this.closing = true;
    return new Promise((resolve, reject) => {
      client.end(false, {}, error => {
        if (error) {
          reject(new BrokerError(`Failed to close broker connection: ${error.message}`, null, { cause: error }));
          return;
        }
        // end() can complete before 'close' fires; report the disconnect once either way.
        if (client === this.client) {
          this.release(client);
          this.options.bus.emitEvent({ type: 'disconnected', info: { requested: true } });
        }
        resolve();
      });
    });
  }

  async subscribe(topic: string): Promise<void> {
    const client = this.requireConnected(`subscribe to ${topic}`);
    return new Promise((resolve, reject) => {
      client.subscribe(topic, { qos: 0 }, (error, granted) => {
        if (error) {
          reject(new BrokerError(`Subscription to ${topic} failed: ${error.message}`, null, { cause: error }));
          return;
        }
        if (granted?.some(grant => grant.qos === SUBACK_FAILURE)) {
          reject(new BrokerError(`Broker rejected subscription to ${topic}`));
          return;
        }
        this.options.bus.emitEvent({ type: 'subscribe-ack', topic });
        resolve();
      });
    });
  }

  async publish(topic: string, payload: string): Promise<void> {
    const client = this.requireConnected(`publish to ${topic}`);
    return new Promise((resolve, reject) => {
      client.publish(topic, payload, { qos: 0, retain: false }, error => {
        if (error) {
          reject(new BrokerError(`Publish to ${topic} failed: ${error.message}`, 'publish', { cause: error }));
          return;
        }
        this.options.bus.emitEvent({ type: 'publish-ack', topic });
        resolve();
      });
    });
  }

  private requireConnected(action: string): MqttClient {
    const client = this.client;
    if (!client || !client.connected) {
      throw new BrokerError(`Cannot ${action}: broker client is not connected`);
    }
    return client;
  }

  private attach(client: MqttClient) {
    const { bus } = this.options;

    client.on('connect', () => {
      if (client !== this.client) {
        return;
      }
      bus.emitEvent({ type: 'connected' });
    });

    client.on('message', (topic, payload) => {
      if (client !== this.client) {
        return;
      }
      bus.emitEvent({
        type: 'notification',
        message: { topic, payload, receivedAt: this.now() }
      });
    });

    client.on('error', error => {
      bus.emitEvent({ type: 'broker-error', error: toError(error) });
    });

    client.on('close', () => {
      if (client !== this.client) {
        return;
      }
      const requested = this.closing;
      this.release(client);
      bus.emitEvent({
        type: 'disconnected',
        info: requested ? { requested } : { requested, reason: 'connection closed by peer or network' }
      });
    });
  }

  /** Stops the client's background I/O and forgets it. */
  private release(client: MqttClient) {
    if (this.client === client) {
      this.client = null;
    }
    this.closing = false;
    if (!client.disconnecting && !client.disconnected) {
      client.end(true);
    }
  }
}
