import fs from 'node:fs/promises';

import {
  BYTES_PER_SAMPLE,
  CHANNELS,
  SAMPLE_RATE,
  WAV_HEADER_BYTES,
  pcmOutputArgs,
} from './capture';
import { ExtractionError } from './errors';
import { runProcess, type ProcessResult, type Spawner } from './process';
import type { SegmentArtifact, SegmentWindow } from './types';

const BYTES_PER_SECOND = SAMPLE_RATE * CHANNELS * BYTES_PER_SAMPLE;

export interface SegmentExtractor {
  /// Rejects with `ExtractionError`; never retries.
  extract(window: SegmentWindow): Promise<SegmentArtifact>;
}

export type FfmpegExtractorOptions = {
  ffmpegPath: string
  sinkPath: string
  segmentPath: string
  /// Audio end the capture tool will stop at; 0 when unbounded.
  captureLimitSeconds: number
  spawner?: Spawner
}

export const extractionArgs = (sinkPath: string, window: SegmentWindow, segmentPath: string): string[] => [
  '-loglevel', 'error',
  '-noaccurate_seek',
  '-i', sinkPath,
  '-y',
  ...pcmOutputArgs(),
  '-ss', String(window.start),
  '-t', String(window.duration),
  segmentPath,
];

/// Seconds of audio in a growing 16kHz mono s16le WAV file of the given size.
export const capturedSeconds = (sizeBytes: number): number =>
  Math.max(0, sizeBytes - WAV_HEADER_BYTES) / BYTES_PER_SECOND;

const isNotFound = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

/**
 * Cuts one window out of the live capture sink with ffmpeg.
 *
 * Only fully elapsed windows are extracted: if the sink does not yet hold
 * audio up to the window's end, the call fails with `capture-lag` instead of
 * producing a short segment. The segment file is written by a process that
 * has exited by the time this resolves.
 */
export class FfmpegSegmentExtractor implements SegmentExtractor {
  constructor(private readonly options: FfmpegExtractorOptions) {}

  private requiredEnd(window: SegmentWindow): number {
    const end = window.start + window.duration;
    const limit = this.options.captureLimitSeconds;
    return limit > 0 ? Math.min(end, limit) : end;
  }

  async extract(window: SegmentWindow): Promise<SegmentArtifact> {
    const { ffmpegPath, sinkPath, segmentPath } = this.options;

    let sinkSize: number;
    try {
      sinkSize = (await fs.stat(sinkPath)).size;
    } catch (err) {
      if (isNotFound(err)) {
        throw new ExtractionError(window, 'sink-missing', `${sinkPath} does not exist`, { cause: err });
      }
      throw new ExtractionError(window, 'tool-failed', `cannot stat ${sinkPath}`, { cause: err });
    }

    const available = capturedSeconds(sinkSize);
    const required = this.requiredEnd(window);
    if (available < required) {
      throw new ExtractionError(
        window,
        'capture-lag',
        `captured ${available.toFixed(2)}s, need ${required}s`,
      );
    }

    let result: ProcessResult;
    try {
      result = await runProcess(ffmpegPath, extractionArgs(sinkPath, window, segmentPath), {
        spawner: this.options.spawner,
      });
    } catch (err) {
      throw new ExtractionError(window, 'tool-failed', `failed to launch ${ffmpegPath}`, { cause: err });
    }
    if (result.exitCode !== 0) {
      const status = result.exitCode ?? result.signal;
      throw new ExtractionError(window, 'tool-failed', `${ffmpegPath} exited with ${status}: ${result.stderr.trim()}`);
    }

    let segmentSize = 0;
    try {
      segmentSize = (await fs.stat(segmentPath)).size;
    } catch (err) {
      if (!isNotFound(err)) { throw err; }
    }
    if (segmentSize <= WAV_HEADER_BYTES) {
      throw new ExtractionError(window, 'empty-output', `${segmentPath} holds no audio`);
    }

    return {
      window,
      path: segmentPath,
      sampleRate: SAMPLE_RATE,
      channels: CHANNELS,
    };
  }
}
