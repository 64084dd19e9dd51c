import config from 'config';
import fs from 'node:fs/promises';
import logger, { type Logger } from './logger.js';
import metrics, { type MetricsRegistry } from './metrics/index.js';
import { loadConfigFromFile, type BridgeConfig } from './config/index.js';
import { EventBus } from './eventBus.js';
import { MqttBrokerClient, type MqttConnectFactory } from './broker/mqttClient.js';
import { ConnectionManager } from './pipeline/connectionManager.js';
import { MessageProcessor } from './pipeline/messageProcessor.js';
import { Publisher } from './pipeline/publisher.js';
import { ReconnectLoop } from './pipeline/reconnectLoop.js';
import { Subscriber } from './pipeline/subscriber.js';
import { VideoFetcher } from './video/fetcher.js';
import { Transcoder, type TranscodeCommandFactory } from './video/transcoder.js';

export type ShutdownHookContext = {
  reason: string;
  signal?: NodeJS.Signals;
};

export type ShutdownHook = (context: ShutdownHookContext) => void | Promise<void>;

type RegisteredHook = {
  name: string;
  hook: ShutdownHook;
};

export type BridgeDependencies = {
  connectFactory?: MqttConnectFactory;
  transcodeCommandFactory?: TranscodeCommandFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
  shutdownTimeoutMs?: number;
};

export type BridgeRuntime = {
  config: BridgeConfig;
  bus: EventBus;
  broker: MqttBrokerClient;
  connection: ConnectionManager;
  processor: MessageProcessor;
  loop: ReconnectLoop;
  start: () => void;
  stop: (reason: string) => Promise<void>;
};

const shutdownHooks: RegisteredHook[] = [];

const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;

export function registerShutdownHook(name: string, hook: ShutdownHook) {
  const existingIndex = shutdownHooks.findIndex(entry => entry.name === name);
  const entry: RegisteredHook = { name, hook };
  if (existingIndex >= 0) {
    shutdownHooks[existingIndex] = entry;
  } else {
    shutdownHooks.push(entry);
  }

  return () => {
    const index = shutdownHooks.findIndex(item => item.name === name);
    if (index >= 0) {
      shutdownHooks.splice(index, 1);
    }
  };
}

export async function runShutdownHooks(context: ShutdownHookContext) {
  const results: Array<{ name: string; status: 'ok' | 'error'; error?: Error }> = [];
  const hooks = [...shutdownHooks].reverse();
  for (const entry of hooks) {
    try {
      await entry.hook(context);
      results.push({ name: entry.name, status: 'ok' });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      results.push({ name: entry.name, status: 'error', error: err });
    }
  }
  return results;
}

export function resetAppLifecycle() {
  shutdownHooks.splice(0, shutdownHooks.length);
}

function resolveShutdownTimeoutMs(dependencies: BridgeDependencies): number {
  if (typeof dependencies.shutdownTimeoutMs === 'number') {
    return dependencies.shutdownTimeoutMs;
  }
  return config.has('bridge.shutdownTimeoutMs')
    ? config.get<number>('bridge.shutdownTimeoutMs')
    : DEFAULT_SHUTDOWN_TIMEOUT_MS;
}

/** Wires the bridge components together without starting anything. */
export function createBridge(bridgeConfig: BridgeConfig, dependencies: BridgeDependencies = {}): BridgeRuntime {
  const log = dependencies.logger ?? logger;
  const registry = dependencies.metrics ?? metrics;
  const shutdownTimeoutMs = resolveShutdownTimeoutMs(dependencies);

  const bus = new EventBus({ log, metrics: registry });
  const broker = new MqttBrokerClient({
    broker: bridgeConfig.broker,
    bus,
    connectTimeoutMs: bridgeConfig.reconnectIntervalMs,
    connectFactory: dependencies.connectFactory
  });

  const subscriber = new Subscriber({
    broker,
    eventsBaseTopic: bridgeConfig.topics.eventsBase,
    logger: log,
    metrics: registry
  });
  const publisher = new Publisher({
    broker,
    gifsBaseTopic: bridgeConfig.topics.gifsBase,
    logger: log,
    metrics: registry
  });
  const fetcher = new VideoFetcher({
    sourceFolder: bridgeConfig.sourceVideoFolder,
    workingFolder: bridgeConfig.workingFolder,
    searchPreviousDay: bridgeConfig.searchPreviousDay,
    logger: log
  });
  const transcoder = new Transcoder({
    ffmpegPath: bridgeConfig.ffmpegPath,
    commandFactory: dependencies.transcodeCommandFactory,
    logger: log,
    metrics: registry
  });

  const connection: ConnectionManager = new ConnectionManager({
    broker,
    bus,
    subscriber,
    cameras: bridgeConfig.cameras,
    endpoint: broker.url,
    onNotification: message => {
      processor.submit(message);
    },
    logger: log,
    metrics: registry
  });

  const processor: MessageProcessor = new MessageProcessor({
    cameras: bridgeConfig.cameras,
    eventsBaseTopic: bridgeConfig.topics.eventsBase,
    workingFolder: bridgeConfig.workingFolder,
    fetcher,
    transcoder,
    publisher,
    onProcessingError: bridgeConfig.onProcessingError,
    requestReconnect: reason => connection.forceDisconnect(reason),
    maxConcurrentJobs: bridgeConfig.maxConcurrentJobs,
    maxPendingJobs: bridgeConfig.maxPendingJobs,
    logger: log,
    metrics: registry
  });

  const loop = new ReconnectLoop(connection, {
    intervalMs: bridgeConfig.reconnectIntervalMs,
    logger: log
  });

  let started = false;

  return {
    config: bridgeConfig,
    bus,
    broker,
    connection,
    processor,
    loop,
    start() {
      if (started) {
        return;
      }
      started = true;
      connection.start();
      loop.start();
    },
    async stop(reason: string) {
      log.info({ reason }, 'Bridge stopping');
      loop.stop();
      const drained = await settleWithin(processor.drain(), shutdownTimeoutMs);
      if (!drained) {
        log.warn({ pending: processor.pending, timeoutMs: shutdownTimeoutMs }, 'Shutdown timed out waiting for jobs');
      }
      await connection.disconnect();
      connection.stop();
      started = false;
      log.info({ metrics: registry.snapshot() }, 'Bridge stopped');
    }
  };
}

export async function bootstrap(configPath: string, dependencies: BridgeDependencies = {}) {
  const log = dependencies.logger ?? logger;
  log.info({ configPath }, 'Bridge bootstrap starting');

  const bridgeConfig = loadConfigFromFile(configPath);
  await fs.mkdir(bridgeConfig.workingFolder, { recursive: true });

  const runtime = createBridge(bridgeConfig, dependencies);
  registerShutdownHook('bridge', context => runtime.stop(context.reason));
  runtime.start();

  log.info(
    {
      broker: runtime.broker.url,
      cameras: bridgeConfig.cameras.map(camera => camera.id),
      sourceVideoFolder: bridgeConfig.sourceVideoFolder,
      workingFolder: bridgeConfig.workingFolder
    },
    'Bootstrap completed'
  );
  return runtime;
}

async function settleWithin(task: Promise<void>, timeoutMs: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      task.then(() => true),
      new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(false), timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
  }
}
