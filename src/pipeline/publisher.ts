import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { joinTopic } from '../utils/topic.js';
import type { BrokerClient } from '../broker/mqttClient.js';

export type PublisherOptions = {
  broker: BrokerClient;
  gifsBaseTopic: string;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

/**
 * Sends the artifact filename, not its bytes: consumers read the file from the
 * shared working folder.
 */
export class Publisher {
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: PublisherOptions) {
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  topicFor(cameraId: string): string {
    return joinTopic(this.options.gifsBaseTopic, cameraId);
  }

  async publish(cameraId: string, artifactName: string): Promise<void> {
    const topic = this.topicFor(cameraId);
    await this.options.broker.publish(topic, artifactName);
    this.metrics.recordPublish();
    this.logger.info({ topic, artifact: artifactName, camera: cameraId }, 'Published preview reference');
  }
}
