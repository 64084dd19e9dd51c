import ffmpeg from 'fluent-ffmpeg';
import fs from 'node:fs/promises';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import loggerModule, { type Logger } from '../logger.js';
import metricsModule, { type MetricsRegistry } from '../metrics/index.js';
import { TranscodeError } from '../errors.js';

export const PREVIEW_FRAME_RATE = 15;
export const PREVIEW_EXTENSION = '.gif';

const EXIT_CODE_PATTERN = /exited with code (\d+)/;

export type PreviewParameters = {
  /** Target width in pixels; height follows the aspect ratio. */
  scale: number;
  skipFirstNSecs: number;
  maxLengthSecs: number;
};

export type TranscodeRequest = PreviewParameters & {
  input: string;
  output: string;
};

export type TranscodeCommandFactory = (input: string) => ffmpeg.FfmpegCommand;

export type TranscoderOptions = {
  ffmpegPath?: string;
  commandFactory?: TranscodeCommandFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
};

export function formatSeekOffset(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(whole / 3600);
  const minutes = Math.floor((whole % 3600) / 60);
  const seconds = whole % 60;
  return [hours, minutes, seconds].map(part => String(part).padStart(2, '0')).join(':');
}

export function buildPreviewOutputOptions(parameters: PreviewParameters): string[] {
  return [
    '-vf',
    `fps=${PREVIEW_FRAME_RATE},scale=${parameters.scale}:-1:flags=lanczos`,
    '-ss',
    formatSeekOffset(parameters.skipFirstNSecs),
    '-t',
    String(parameters.maxLengthSecs),
    '-y'
  ];
}

/** Temporary name next to the artifact; ffmpeg still picks the muxer from the extension. */
export function partialOutputPath(output: string): string {
  const extension = path.extname(output);
  return `${output.slice(0, output.length - extension.length)}.partial${extension}`;
}

export class Transcoder {
  private readonly commandFactory: TranscodeCommandFactory;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;

  constructor(options: TranscoderOptions = {}) {
    const ffmpegPath = options.ffmpegPath;
    this.commandFactory =
      options.commandFactory ??
      (input => {
        const command = ffmpeg(input);
        if (ffmpegPath) {
          command.setFfmpegPath(ffmpegPath);
        }
        return command;
      });
    this.logger = options.logger ?? loggerModule;
    this.metrics = options.metrics ?? metricsModule;
  }

  /**
   * Converts the clip into a looping preview and returns ffmpeg's exit status.
   * The input clip is removed afterwards whatever the outcome.
   */
  async transcode(request: TranscodeRequest): Promise<number> {
    const partial = partialOutputPath(request.output);
    const startedAt = performance.now();
    let exitCode: number;

    try {
      exitCode = await this.run(request, partial);
      if (exitCode === 0) {
        await fs.rename(partial, request.output);
      }
    } finally {
      await removeQuietly(request.input, this.logger);
    }

    if (exitCode !== 0) {
      await removeQuietly(partial, this.logger);
    }

    this.metrics.observeLatency('transcode', performance.now() - startedAt);
    this.logger.info(
      { input: request.input, output: request.output, exitCode },
      exitCode === 0 ? 'Preview generated' : 'ffmpeg reported a failure'
    );
    return exitCode;
  }

  private run(request: TranscodeRequest, partial: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const command = this.commandFactory(request.input)
        .outputOptions(buildPreviewOutputOptions(request))
        .output(partial);

      command.on('start', (commandLine: string) => {
        this.logger.debug({ commandLine }, 'ffmpeg started');
      });

      command.once('end', () => {
        resolve(0);
      });

      command.once('error', (error: Error) => {
        const match = EXIT_CODE_PATTERN.exec(error.message);
        if (match) {
          resolve(Number(match[1]));
          return;
        }
        reject(new TranscodeError(`ffmpeg could not run: ${error.message}`, { cause: error }));
      });

      try {
        command.run();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        reject(new TranscodeError(`ffmpeg could not start: ${message}`, { cause: error }));
      }
    });
  }
}

async function removeQuietly(file: string, logger: Logger) {
  try {
    await fs.rm(file, { force: true });
  } catch (error) {
    logger.warn({ err: error, file }, 'Failed to remove working file');
  }
}
