import type { SegmentWindow } from './types';

export class StreamError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/// The capture process could not be launched. Fatal for the session.
export class CaptureStartError extends StreamError {}

export type ExtractionCause =
  | 'capture-lag'
  | 'sink-missing'
  | 'tool-failed'
  | 'empty-output';

export class ExtractionError extends StreamError {
  readonly window: SegmentWindow;
  readonly reason: ExtractionCause;

  constructor(window: SegmentWindow, reason: ExtractionCause, detail: string, options?: { cause?: unknown }) {
    super(`segment #${window.index} [${window.start}s, +${window.duration}s): ${reason}: ${detail}`, options);
    this.window = window;
    this.reason = reason;
  }

  /// Lag and a not-yet-created sink can resolve themselves as capture continues.
  get transient(): boolean {
    return this.reason === 'capture-lag' || this.reason === 'sink-missing';
  }
}

export type InvocationCause = 'unreachable' | 'exit-status' | 'timeout';

export class InvocationError extends StreamError {
  readonly window: SegmentWindow;
  readonly reason: InvocationCause;
  readonly stderr: string;

  constructor(window: SegmentWindow, reason: InvocationCause, detail: string, stderr = '', options?: { cause?: unknown }) {
    super(`segment #${window.index}: ${reason}: ${detail}`, options);
    this.window = window;
    this.reason = reason;
    this.stderr = stderr;
  }
}

export class ParseError extends StreamError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super(message);
    this.raw = raw;
  }
}

export class ConfigError extends StreamError {}
