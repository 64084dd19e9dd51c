import type { ProcessingStage } from './types.js';

export class BridgeError extends Error {
  readonly stage: ProcessingStage | null;

  constructor(message: string, stage: ProcessingStage | null = null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.stage = stage;
  }
}

export class ConfigError extends BridgeError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(problems.join('; '));
    this.problems = problems;
  }
}

/** Connection-level failure; always answered with a reconnect. */
export class BrokerError extends BridgeError {}

export class NotificationError extends BridgeError {}

export class UnknownCameraError extends BridgeError {
  readonly cameraId: string;

  constructor(cameraId: string) {
    super(`No camera profile configured for "${cameraId}"`, 'resolve');
    this.cameraId = cameraId;
  }
}

export class ClipNotFoundError extends BridgeError {
  readonly candidates: string[];

  constructor(candidates: string[], options?: { cause?: unknown }) {
    super(`Source clip not found (tried ${candidates.join(', ')})`, 'fetch', options);
    this.candidates = candidates;
  }
}

export class TranscodeError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'transcode', options);
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
