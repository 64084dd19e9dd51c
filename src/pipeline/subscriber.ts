import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { joinTopic } from '../utils/topic.js';
import type { BrokerClient } from '../broker/mqttClient.js';
import type { CameraProfile } from '../types.js';

export type SubscriberOptions = {
  broker: BrokerClient;
  eventsBaseTopic: string;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export class Subscriber {
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: SubscriberOptions) {
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  topicFor(cameraId: string): string {
    return joinTopic(this.options.eventsBaseTopic, cameraId);
  }

  /** Subscribes in order and stops at the first failure, which is rethrown. */
  async subscribeAll(cameras: readonly CameraProfile[]): Promise<void> {
    for (const camera of cameras) {
      const topic = this.topicFor(camera.id);
      this.logger.info({ topic, camera: camera.id }, 'Subscribing to camera events');
      try {
        await this.options.broker.subscribe(topic);
      } catch (error) {
        this.metrics.recordSubscription('failed');
        throw error;
      }
      this.metrics.recordSubscription('issued');
    }
  }
}
