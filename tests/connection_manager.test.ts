import { beforeEach, describe, expect, it, vi } from 'vitest';
import { BrokerError } from '../src/errors.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { ConnectionManager } from '../src/pipeline/connectionManager.js';
import { Subscriber } from '../src/pipeline/subscriber.js';
import type { CameraProfile, ConnectionState, InboundMessage } from '../src/types.js';
import { FakeBrokerClient, createTestLogger, flushMicrotasks } from './helpers/fakes.js';

function camera(id: string): CameraProfile {
  return { id, eventVideoPrefix: `${id}-`, scale: 320, skipFirstNSecs: 0, maxLengthSecs: 5 };
}

describe('ConnectionManager', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let metrics: MetricsRegistry;
  let bus: EventBus;
  let broker: FakeBrokerClient;
  let received: InboundMessage[];
  let states: ConnectionState[];

  beforeEach(() => {
    logger = createTestLogger();
    metrics = new MetricsRegistry();
    bus = new EventBus({ log: logger, metrics });
    broker = new FakeBrokerClient(bus);
    received = [];
    states = [];
  });

  function createManager(cameras: CameraProfile[] = [camera('cam1'), camera('cam2')]) {
    const subscriber = new Subscriber({ broker, eventsBaseTopic: 'zm/events', logger, metrics });
    const manager = new ConnectionManager({
      broker,
      bus,
      subscriber,
      cameras,
      endpoint: 'mqtt://broker.local:1883',
      onNotification: message => {
        received.push(message);
      },
      logger,
      metrics
    });
    manager.onStateChange(next => {
      states.push(next);
    });
    manager.start();
    return manager;
  }

  it('ConnectSubscribesEveryCamera after the broker accepts the session', async () => {
    const manager = createManager();

    expect(manager.connect()).toBe(true);
    expect(manager.state).toBe('connecting');
    expect(manager.connect()).toBe(false);
    expect(broker.connectCalls).toBe(1);

    broker.acceptConnection();
    await flushMicrotasks();

    expect(broker.subscriptions).toEqual(['zm/events/cam1', 'zm/events/cam2']);
    expect(manager.state).toBe('subscribed');
    expect(manager.isAtLeast('connected')).toBe(true);
    expect(states).toEqual(['connecting', 'connected', 'subscribed']);
    expect(metrics.snapshot().subscriptions).toEqual({ issued: 2, failed: 0 });
    expect(metrics.snapshot().connection.attempts).toBe(1);
  });

  it('ConnectSubscribeFailure stops at the first failing camera and disconnects', async () => {
    broker.failSubscribeOn = 'zm/events/cam2';
    const manager = createManager([camera('cam1'), camera('cam2'), camera('cam3')]);

    manager.connect();
    broker.acceptConnection();
    await flushMicrotasks();

    expect(broker.subscriptions).toEqual(['zm/events/cam1', 'zm/events/cam2']);
    expect(broker.disconnectCalls).toBe(1);
    expect(manager.state).toBe('disconnected');
    expect(states).toEqual(['connecting', 'connected', 'subscribed', 'disconnected']);
    expect(metrics.snapshot().subscriptions).toEqual({ issued: 1, failed: 1 });
  });

  it('returns to disconnected when the broker drops the session', async () => {
    const manager = createManager();
    manager.connect();
    broker.acceptConnection();
    await flushMicrotasks();

    broker.dropConnection('keepalive timeout');

    expect(manager.state).toBe('disconnected');
    expect(logger.warn).toHaveBeenCalledWith(
      { endpoint: 'mqtt://broker.local:1883', reason: 'keepalive timeout' },
      'Unexpected disconnection from broker'
    );
    expect(metrics.snapshot().connection.transitions['subscribed->disconnected']).toBe(1);
  });

  it('treats a refused connection attempt as a disconnect', () => {
    const manager = createManager();
    manager.connect();

    broker.dropConnection('connection refused');

    expect(manager.state).toBe('disconnected');
    expect(states).toEqual(['connecting', 'disconnected']);
  });

  it('hands notifications to the processor callback', async () => {
    const manager = createManager();
    manager.connect();
    broker.acceptConnection();
    await flushMicrotasks();

    broker.deliver('zm/events/cam1', '123', 1_000);

    expect(received).toEqual([{ topic: 'zm/events/cam1', payload: Buffer.from('123'), receivedAt: 1_000 }]);
  });

  it('forceDisconnect tears the session down', async () => {
    const manager = createManager();
    manager.connect();
    broker.acceptConnection();
    await flushMicrotasks();

    manager.forceDisconnect('processing failure at fetch stage');
    await flushMicrotasks();

    expect(broker.disconnectCalls).toBe(1);
    expect(manager.state).toBe('disconnected');
    expect(logger.warn).toHaveBeenCalledWith(
      { reason: 'processing failure at fetch stage', state: 'subscribed' },
      'Forcing broker disconnect'
    );
  });

  it('falls back to disconnected when the client cannot start', () => {
    vi.spyOn(broker, 'connect').mockImplementation(() => {
      throw new Error('invalid broker url');
    });
    const manager = createManager();

    expect(manager.connect()).toBe(true);
    expect(manager.state).toBe('disconnected');
    expect(states).toEqual(['connecting', 'disconnected']);
  });

  it('settles as disconnected even when closing the client fails', async () => {
    const manager = createManager();
    manager.connect();
    broker.acceptConnection();
    await flushMicrotasks();
    vi.spyOn(broker, 'disconnect').mockRejectedValue(new BrokerError('Failed to close broker connection: socket gone'));

    await expect(manager.disconnect()).resolves.toBeUndefined();
    expect(manager.state).toBe('disconnected');
  });

  it('ignores broker events after stop', () => {
    const manager = createManager();
    manager.connect();
    manager.stop();

    broker.acceptConnection();

    expect(manager.state).toBe('connecting');
  });
});
