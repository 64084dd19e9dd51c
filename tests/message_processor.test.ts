import path from 'node:path';
import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { BrokerError, ClipNotFoundError } from '../src/errors.js';
import { EventBus } from '../src/eventBus.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { MessageProcessor, artifactNameFor } from '../src/pipeline/messageProcessor.js';
import { Publisher } from '../src/pipeline/publisher.js';
import type { ProcessingErrorPolicy } from '../src/types.js';
import type { FetchRequest } from '../src/video/fetcher.js';
import type { TranscodeRequest } from '../src/video/transcoder.js';
import { FakeBrokerClient, createTestLogger } from './helpers/fakes.js';

const WORKING_FOLDER = path.resolve('/work');
const RECEIVED_AT = new Date(2024, 4, 17, 12, 0, 0).getTime();

const cameras = [
  { id: 'cam1', eventVideoPrefix: 'Event-', scale: 480, skipFirstNSecs: 2, maxLengthSecs: 8 },
  { id: 'cam2', eventVideoPrefix: '', scale: 320, skipFirstNSecs: 0, maxLengthSecs: 5 }
];

function message(topic: string, payload: string) {
  return { topic, payload: Buffer.from(payload, 'utf-8'), receivedAt: RECEIVED_AT };
}

describe('MessageProcessor', () => {
  let logger: ReturnType<typeof createTestLogger>;
  let metrics: MetricsRegistry;
  let broker: FakeBrokerClient;
  let requestReconnect: Mock<(reason: string) => void>;
  let fetchClip: Mock<(request: FetchRequest) => Promise<string>>;
  let transcode: Mock<(request: TranscodeRequest) => Promise<number>>;

  beforeEach(() => {
    logger = createTestLogger();
    metrics = new MetricsRegistry();
    broker = new FakeBrokerClient(new EventBus({ log: logger, metrics }));
    broker.connect();
    broker.acceptConnection();
    requestReconnect = vi.fn<(reason: string) => void>();
    fetchClip = vi.fn(async (request: FetchRequest) => path.join(WORKING_FOLDER, `${request.eventId}.mp4`));
    transcode = vi.fn(async (_request: TranscodeRequest) => 0);
  });

  function createProcessor(policy: ProcessingErrorPolicy = 'drop', limits: { maxPendingJobs?: number } = {}) {
    return new MessageProcessor({
      cameras,
      eventsBaseTopic: 'zm/events',
      workingFolder: WORKING_FOLDER,
      fetcher: { fetch: fetchClip },
      transcoder: { transcode },
      publisher: new Publisher({ broker, gifsBaseTopic: 'zm/gifs', logger, metrics }),
      onProcessingError: policy,
      requestReconnect,
      maxConcurrentJobs: 1,
      maxPendingJobs: limits.maxPendingJobs ?? 8,
      logger,
      metrics
    });
  }

  it('names artifacts after the event id', () => {
    expect(artifactNameFor('123')).toBe('123.gif');
  });

  it('ProcessEventHappyPath publishes the artifact name on the camera gifs topic', async () => {
    const processor = createProcessor();

    expect(processor.submit(message('zm/events/cam1', '123'))).toBe('queued');
    await processor.drain();

    expect(fetchClip).toHaveBeenCalledWith({ eventVideoPrefix: 'Event-', eventId: '123', receivedAt: RECEIVED_AT });
    expect(transcode).toHaveBeenCalledWith({
      input: path.join(WORKING_FOLDER, '123.mp4'),
      output: path.join(WORKING_FOLDER, '123.gif'),
      scale: 480,
      skipFirstNSecs: 2,
      maxLengthSecs: 8
    });
    expect(broker.published).toEqual([{ topic: 'zm/gifs/cam1', payload: '123.gif' }]);
    expect(requestReconnect).not.toHaveBeenCalled();
    expect(metrics.snapshot().jobs).toEqual({
      byOutcome: { published: 1 },
      failuresByStage: {},
      published: 1
    });
  });

  it('decodes the payload as a trimmed utf-8 event id', () => {
    const processor = createProcessor();

    expect(processor.decode(message('zm/events/cam2', ' 42\n'))).toEqual({
      cameraId: 'cam2',
      eventId: '42',
      receivedAt: RECEIVED_AT
    });
    expect(processor.decode(message('zm/events/cam1', 'evt_2024.05-17')).eventId).toBe('evt_2024.05-17');
  });

  it('ProcessEventInvalid rejects empty ids, path-like ids and foreign topics', async () => {
    const processor = createProcessor();

    expect(processor.submit(message('zm/events/cam1', '   '))).toBe('invalid');
    expect(processor.submit(message('zm/events/cam1', '../etc/passwd'))).toBe('invalid');
    expect(processor.submit(message('zm/events/cam1', 'front door 12'))).toBe('invalid');
    expect(processor.submit(message('zm/events/cam1/extra', '123'))).toBe('invalid');
    await processor.drain();

    expect(fetchClip).not.toHaveBeenCalled();
    expect(requestReconnect).not.toHaveBeenCalled();
    expect(metrics.snapshot().jobs.failuresByStage).toEqual({ decode: 4 });
  });

  it('ProcessEventUnknownCamera fails before touching the filesystem', async () => {
    const processor = createProcessor();

    processor.submit(message('zm/events/garage', '7'));
    await processor.drain();

    expect(fetchClip).not.toHaveBeenCalled();
    expect(broker.published).toEqual([]);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ stage: 'resolve', camera: 'garage', eventId: '7' }),
      'Event processing failed'
    );
  });

  it('ProcessEventUnknownCamera escalates like any processing failure under the reconnect policy', async () => {
    const processor = createProcessor('reconnect');

    processor.submit(message('zm/events/garage', '7'));
    await processor.drain();

    expect(fetchClip).not.toHaveBeenCalled();
    expect(requestReconnect).toHaveBeenCalledWith('processing failure at resolve stage');
  });

  it('ProcessEventMissingClip forces a reconnect under the reconnect policy', async () => {
    fetchClip.mockRejectedValue(new ClipNotFoundError(['/events/2024-05-17/Event-5.mp4']));
    const processor = createProcessor('reconnect');

    processor.submit(message('zm/events/cam1', '5'));
    await processor.drain();

    expect(transcode).not.toHaveBeenCalled();
    expect(requestReconnect).toHaveBeenCalledTimes(1);
    expect(requestReconnect).toHaveBeenCalledWith('processing failure at fetch stage');
    expect(metrics.snapshot().jobs.failuresByStage).toEqual({ fetch: 1 });
  });

  it('ProcessEventMissingClip only drops the event under the drop policy', async () => {
    fetchClip.mockRejectedValue(new ClipNotFoundError(['/events/2024-05-17/Event-5.mp4']));
    const processor = createProcessor('drop');

    processor.submit(message('zm/events/cam1', '5'));
    await processor.drain();

    expect(requestReconnect).not.toHaveBeenCalled();
    expect(broker.published).toEqual([]);
  });

  it('tags unexpected step errors with the stage that raised them', async () => {
    fetchClip.mockRejectedValue(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));
    const processor = createProcessor();

    processor.submit(message('zm/events/cam1', '6'));
    await processor.drain();

    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ stage: 'fetch', err: expect.objectContaining({ message: 'EACCES: permission denied' }) }),
      'Event processing failed'
    );
  });

  it('ProcessEventTranscodeExit reports a non-zero exit without publishing or escalating', async () => {
    transcode.mockResolvedValue(1);
    const processor = createProcessor('reconnect');

    processor.submit(message('zm/events/cam1', '9'));
    await processor.drain();

    expect(broker.published).toEqual([]);
    expect(requestReconnect).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledWith(
      { camera: 'cam1', eventId: '9', exitCode: 1 },
      'ffmpeg returned a non-zero exit code, preview not published'
    );
    expect(metrics.snapshot().jobs.byOutcome).toEqual({ 'transcode-failed': 1 });
  });

  it('ProcessEventBrokerFailure always reconnects, whatever the policy', async () => {
    broker.publishError = new BrokerError('Publish to zm/gifs/cam1 failed: client disconnecting', 'publish');
    const processor = createProcessor('drop');

    processor.submit(message('zm/events/cam1', '11'));
    await processor.drain();

    expect(requestReconnect).toHaveBeenCalledWith('broker failure while processing event');
    expect(metrics.snapshot().jobs.failuresByStage).toEqual({ publish: 1 });
  });

  it('skips duplicate notifications while the event is still in flight', async () => {
    let release: () => void = () => {};
    fetchClip.mockImplementationOnce(
      request =>
        new Promise<string>(resolve => {
          release = () => resolve(path.join(WORKING_FOLDER, `${request.eventId}.mp4`));
        })
    );
    const processor = createProcessor();

    expect(processor.submit(message('zm/events/cam1', '123'))).toBe('queued');
    expect(processor.submit(message('zm/events/cam1', '123'))).toBe('duplicate');
    expect(processor.submit(message('zm/events/cam2', '123'))).toBe('queued');

    release();
    await vi.waitFor(() => expect(processor.pending).toBe(0));
    expect(processor.submit(message('zm/events/cam1', '123'))).toBe('queued');
    await processor.drain();

    expect(broker.published).toEqual([
      { topic: 'zm/gifs/cam1', payload: '123.gif' },
      { topic: 'zm/gifs/cam2', payload: '123.gif' },
      { topic: 'zm/gifs/cam1', payload: '123.gif' }
    ]);
    expect(metrics.snapshot().jobs.byOutcome.duplicate).toBe(1);
  });

  it('refuses events beyond the pending limit', async () => {
    let release: () => void = () => {};
    fetchClip.mockImplementationOnce(
      request =>
        new Promise<string>(resolve => {
          release = () => resolve(path.join(WORKING_FOLDER, `${request.eventId}.mp4`));
        })
    );
    const processor = createProcessor('drop', { maxPendingJobs: 1 });

    expect(processor.submit(message('zm/events/cam1', '1'))).toBe('queued');
    expect(processor.submit(message('zm/events/cam1', '2'))).toBe('queued');
    expect(processor.submit(message('zm/events/cam1', '3'))).toBe('rejected');

    release();
    await processor.drain();

    expect(broker.published.map(entry => entry.payload)).toEqual(['1.gif', '2.gif']);
    expect(logger.warn).toHaveBeenCalledWith(
      { camera: 'cam1', eventId: '3', reason: 'full', pending: 1 },
      'Work queue refused event'
    );
  });
});
