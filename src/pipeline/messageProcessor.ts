import path from 'node:path';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { BridgeError, BrokerError, NotificationError, UnknownCameraError } from '../errors.js';
import { topicSuffix } from '../utils/topic.js';
import { PREVIEW_EXTENSION, type TranscodeRequest } from '../video/transcoder.js';
import type { FetchRequest } from '../video/fetcher.js';
import { InFlightGuard } from './inFlight.js';
import { WorkQueue } from './workQueue.js';
import type {
  CameraProfile,
  EventNotification,
  InboundMessage,
  ProcessResult,
  ProcessingErrorPolicy,
  ProcessingStage
} from '../types.js';

const EVENT_ID_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;

export interface ClipSource {
  fetch(request: FetchRequest): Promise<string>;
}

export interface PreviewEncoder {
  transcode(request: TranscodeRequest): Promise<number>;
}

export interface PreviewPublisher {
  publish(cameraId: string, artifactName: string): Promise<void>;
}

export type SubmitResult = 'queued' | 'duplicate' | 'rejected' | 'invalid';

export type MessageProcessorOptions = {
  cameras: readonly CameraProfile[];
  eventsBaseTopic: string;
  workingFolder: string;
  fetcher: ClipSource;
  transcoder: PreviewEncoder;
  publisher: PreviewPublisher;
  onProcessingError: ProcessingErrorPolicy;
  /** Asks the connection owner to drop the session; it reconnects on its own schedule. */
  requestReconnect: (reason: string) => void;
  maxConcurrentJobs?: number;
  maxPendingJobs?: number;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export function artifactNameFor(eventId: string): string {
  return `${eventId}${PREVIEW_EXTENSION}`;
}

export class MessageProcessor {
  private readonly cameras: Map<string, CameraProfile>;
  private readonly queue: WorkQueue<EventNotification>;
  private readonly inFlight = new InFlightGuard();
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(private readonly options: MessageProcessorOptions) {
    this.cameras = new Map(options.cameras.map(camera => [camera.id, camera]));
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
    this.queue = new WorkQueue(notification => this.run(notification), {
      concurrency: options.maxConcurrentJobs ?? 1,
      maxPending: options.maxPendingJobs ?? 32,
      logger: this.logger
    });
  }

  /** Decodes an inbound message and queues it for the worker pool. */
  submit(message: InboundMessage): SubmitResult {
    let notification: EventNotification;
    try {
      notification = this.decode(message);
    } catch (error) {
      this.fail(error, { topic: message.topic });
      return 'invalid';
    }

    const key = InFlightGuard.keyFor(notification.cameraId, notification.eventId);
    if (!this.inFlight.acquire(key)) {
      this.metrics.recordJobOutcome('duplicate');
      this.logger.info(
        { camera: notification.cameraId, eventId: notification.eventId },
        'Event already queued, skipping duplicate notification'
      );
      return 'duplicate';
    }

    const pushed = this.queue.push(notification);
    if (pushed !== 'accepted') {
      this.inFlight.release(key);
      this.metrics.recordJobOutcome('rejected');
      this.logger.warn(
        {
          camera: notification.cameraId,
          eventId: notification.eventId,
          reason: pushed,
          pending: this.queue.size
        },
        'Work queue refused event'
      );
      return 'rejected';
    }

    return 'queued';
  }

  /**
   * Event id from the payload, camera id from the topic. The id names files in the working
   * folder, so only filename-safe ids (letters, digits, `_`, `-`, `.`, not leading `.`) are accepted.
   */
  decode(message: InboundMessage): EventNotification {
    const eventId = message.payload.toString('utf-8').trim();
    if (!eventId) {
      throw new NotificationError(`Empty event id on ${message.topic}`, 'decode');
    }
    if (!EVENT_ID_PATTERN.test(eventId)) {
      throw new NotificationError(`Malformed event id "${eventId}" on ${message.topic}`, 'decode');
    }

    const cameraId = topicSuffix(this.options.eventsBaseTopic, message.topic);
    if (cameraId === null) {
      throw new NotificationError(
        `Topic ${message.topic} is not a camera topic under ${this.options.eventsBaseTopic}`,
        'decode'
      );
    }

    return { cameraId, eventId, receivedAt: message.receivedAt };
  }

  resolveCamera(cameraId: string): CameraProfile {
    const camera = this.cameras.get(cameraId);
    if (!camera) {
      throw new UnknownCameraError(cameraId);
    }
    return camera;
  }

  /** Fetch, transcode, publish. Throws on failure; a non-zero ffmpeg exit is a result, not a throw. */
  async process(notification: EventNotification): Promise<ProcessResult> {
    const { cameraId, eventId } = notification;
    const camera = this.resolveCamera(cameraId);

    const clip = await withStage('fetch', () =>
      this.options.fetcher.fetch({
        eventVideoPrefix: camera.eventVideoPrefix,
        eventId,
        receivedAt: notification.receivedAt
      })
    );

    const artifact = artifactNameFor(eventId);
    const exitCode = await withStage('transcode', () =>
      this.options.transcoder.transcode({
        input: clip,
        output: path.join(this.options.workingFolder, artifact),
        scale: camera.scale,
        skipFirstNSecs: camera.skipFirstNSecs,
        maxLengthSecs: camera.maxLengthSecs
      })
    );

    if (exitCode !== 0) {
      return { status: 'transcode-failed', cameraId, eventId, exitCode };
    }

    await withStage('publish', () => this.options.publisher.publish(cameraId, artifact));
    return { status: 'published', cameraId, eventId, artifact };
  }

  /** Stops taking new events and waits for queued and running ones. */
  async drain(): Promise<void> {
    this.queue.close();
    await this.queue.onIdle();
  }

  get pending() {
    return this.queue.size + this.queue.running;
  }

  private async run(notification: EventNotification): Promise<void> {
    const { cameraId, eventId } = notification;
    try {
      const result = await this.process(notification);
      this.metrics.recordJobOutcome(result.status);
      if (result.status === 'published') {
        this.logger.info({ camera: cameraId, eventId, artifact: result.artifact }, 'Done processing event');
      } else {
        this.logger.error(
          { camera: cameraId, eventId, exitCode: result.exitCode },
          'ffmpeg returned a non-zero exit code, preview not published'
        );
      }
    } catch (error) {
      this.fail(error, { camera: cameraId, eventId });
    } finally {
      this.inFlight.release(InFlightGuard.keyFor(cameraId, eventId));
    }
  }

  private fail(error: unknown, context: Record<string, unknown>) {
    const stage = error instanceof BridgeError ? error.stage : null;
    this.metrics.recordJobOutcome('failed', stage ?? 'unknown');
    this.logger.error({ err: error, stage, ...context }, 'Event processing failed');

    if (error instanceof BrokerError) {
      this.options.requestReconnect('broker failure while processing event');
    } else if (this.options.onProcessingError === 'reconnect') {
      this.options.requestReconnect(`processing failure at ${stage ?? 'unknown'} stage`);
    }
  }
}

/** Tags errors thrown by a step with that step unless they already carry one. */
async function withStage<T>(stage: ProcessingStage, step: () => Promise<T>): Promise<T> {
  try {
    return await step();
  } catch (error) {
    if (error instanceof BridgeError && error.stage !== null) {
      throw error;
    }
    if (error instanceof BrokerError) {
      throw new BrokerError(error.message, stage, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new BridgeError(message, stage, { cause: error });
  }
}
