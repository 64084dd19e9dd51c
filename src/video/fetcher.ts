import fs from 'node:fs/promises';
import path from 'node:path';
import loggerModule, { type Logger } from '../logger.js';
import { ClipNotFoundError } from '../errors.js';

export const SOURCE_VIDEO_EXTENSION = '.mp4';

export type VideoFetcherOptions = {
  sourceFolder: string;
  workingFolder: string;
  /** Date the lookup from receipt time and also try the day before. */
  searchPreviousDay?: boolean;
  now?: () => number;
  logger?: Logger;
};

export type FetchRequest = {
  eventVideoPrefix: string;
  eventId: string;
  /** Timestamp the notification arrived; used only with `searchPreviousDay`. */
  receivedAt: number;
};

/** Local calendar date as YYYY-MM-DD, the platform's per-day directory name. */
export function formatDateDirectory(timestamp: number): string {
  const date = new Date(timestamp);
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function previousCalendarDay(timestamp: number): number {
  const date = new Date(timestamp);
  date.setDate(date.getDate() - 1);
  return date.getTime();
}

export class VideoFetcher {
  private readonly logger: Logger;
  private readonly searchPreviousDay: boolean;
  private readonly now: () => number;

  constructor(private readonly options: VideoFetcherOptions) {
    this.logger = options.logger ?? loggerModule;
    this.searchPreviousDay = options.searchPreviousDay ?? false;
    this.now = options.now ?? Date.now;
  }

  /**
   * By default the directory is today's date at lookup time, so an event processed after
   * midnight is not found. With `searchPreviousDay` the receipt date and the day before it
   * are tried in turn.
   */
  sourceCandidates(request: FetchRequest): string[] {
    const fileName = `${request.eventVideoPrefix}${request.eventId}${SOURCE_VIDEO_EXTENSION}`;
    const days = this.searchPreviousDay
      ? [formatDateDirectory(request.receivedAt), formatDateDirectory(previousCalendarDay(request.receivedAt))]
      : [formatDateDirectory(this.now())];
    return days.map(day => path.join(this.options.sourceFolder, day, fileName));
  }

  workingCopyPath(eventId: string): string {
    return path.join(this.options.workingFolder, `${eventId}${SOURCE_VIDEO_EXTENSION}`);
  }

  /** Copies the event clip into the working folder and returns the copy's path. */
  async fetch(request: FetchRequest): Promise<string> {
    const candidates = this.sourceCandidates(request);
    const destination = this.workingCopyPath(request.eventId);
    await fs.mkdir(this.options.workingFolder, { recursive: true });

    let lastMissing: unknown = null;
    for (const source of candidates) {
      try {
        await fs.copyFile(source, destination);
      } catch (error) {
        if (isMissingFile(error)) {
          lastMissing = error;
          this.logger.debug({ source, eventId: request.eventId }, 'Source clip not present');
          continue;
        }
        throw error;
      }

      this.logger.info({ source, destination, eventId: request.eventId }, 'Copied event clip');
      return destination;
    }

    throw new ClipNotFoundError(candidates, { cause: lastMissing });
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}
