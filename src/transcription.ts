import dayjs from 'dayjs';
import EventEmitter from 'node:events';
import fs from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import { FfmpegCapture, type CaptureHandle, type CaptureLauncher } from './capture';
import { CaptureStartError, ExtractionError, InvocationError } from './errors';
import { FfmpegSegmentExtractor, type SegmentExtractor } from './extractor';
import { silentLogger, type Logger } from './logger';
import { invocationFailure, parseEngineOutput } from './resultParser';
import { SegmentClock } from './segmentClock';
import type { TranscriptionInvoker } from './transcriptionBackends';
import { WhisperCppInvoker } from './transcriptionBackends/whisperCpp';
import type {
  EngineOutput,
  OutputMode,
  SegmentArtifact,
  SegmentWindow,
  SessionState,
  StreamConfig,
  TranscriptionRecord,
} from './types';

export const ABORTED_EXIT_CODE = 2;

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  STARTING: ['BUFFERING', 'ABORTED'],
  BUFFERING: ['RUNNING', 'STOPPING', 'ABORTED'],
  RUNNING: ['STOPPING', 'ABORTED'],
  STOPPING: ['TERMINATED'],
  TERMINATED: [],
  ABORTED: [],
};

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/// Resolves early, without error, when the signal fires.
export const sleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal.aborted) { throw err; }
  }
};

export type TranscriptionDeps = {
  capture: CaptureLauncher
  extractor: SegmentExtractor
  invoker: TranscriptionInvoker
  clock: SegmentClock
  outputMode: OutputMode
  /// Holds the capture sink and the segment file; removed when the session ends.
  scratchDir: string
  extractRetries?: number
  extractBackoffMs?: number
  /// null: wait for the capture to exit after SIGTERM, never force a kill.
  captureGraceMs?: number | null
  sessionId?: string
  logger?: Logger
  sleep?: Sleep
  now?: () => number
}

export type SessionOutcome = {
  sessionId: string
  state: 'TERMINATED' | 'ABORTED'
  exitCode: number
  records: readonly TranscriptionRecord[]
}

export interface TranscriptionEvents {
  sessionStarted: { sessionId: string };
  state: { sessionId: string, from: SessionState, to: SessionState };
  record: { sessionId: string, record: TranscriptionRecord };
  sessionEnded: { sessionId: string, state: SessionState, exitCode: number, recordCount: number };
}

declare interface StreamTranscription {
  on<U extends keyof TranscriptionEvents>(
    event: U, listener: (args: TranscriptionEvents[U]) => void
  ): this;

  emit<U extends keyof TranscriptionEvents>(
    event: U, args: TranscriptionEvents[U]
  ): boolean;
}

/**
 * Drives one live-stream session: start capture, buffer one step, then per
 * tick extract a window, transcribe it, parse and emit the record, and
 * delete the segment before waiting for the next boundary.
 *
 * Exactly one segment is in flight at a time, so records come out in index
 * order. Extraction and engine failures end the session gracefully; a
 * capture that cannot start, or any unexpected error, aborts it. Every path
 * terminates the capture process and removes the scratch directory.
 */
class StreamTranscription extends EventEmitter {
  readonly sessionId: string;
  private _state: SessionState = 'STARTING';
  private readonly records: TranscriptionRecord[] = [];
  private readonly stopController = new AbortController();
  private started = false;
  private readonly logger: Logger;
  private readonly sleepFn: Sleep;
  private readonly now: () => number;

  constructor(private readonly deps: TranscriptionDeps) {
    super();
    this.sessionId = deps.sessionId ?? dayjs().format('YYYYMMDDHHmmss');
    this.logger = deps.logger ?? silentLogger;
    this.sleepFn = deps.sleep ?? sleep;
    this.now = deps.now ?? Date.now;
  }

  static fromConfig(config: StreamConfig, logger: Logger): StreamTranscription {
    const sessionId = dayjs().format('YYYYMMDDHHmmss');
    const scratchDir = path.join(config.scratchRoot, `whisper-stream-${sessionId}`);
    const sinkPath = path.join(scratchDir, 'live.wav');
    const segmentPath = path.join(scratchDir, 'segment.wav');

    return new StreamTranscription({
      sessionId,
      scratchDir,
      logger,
      clock: new SegmentClock(config.stepSeconds, config.maxDurationSeconds),
      outputMode: config.outputMode,
      extractRetries: config.extractRetries,
      extractBackoffMs: config.extractBackoffMs,
      capture: new FfmpegCapture({
        ffmpegPath: config.ffmpegPath,
        streamUrl: config.streamUrl,
        sinkPath,
        maxDurationSeconds: config.maxDurationSeconds,
      }),
      extractor: new FfmpegSegmentExtractor({
        ffmpegPath: config.ffmpegPath,
        sinkPath,
        segmentPath,
        captureLimitSeconds: config.maxDurationSeconds,
      }),
      invoker: new WhisperCppInvoker({
        root: config.whisperRoot,
        model: config.model,
        language: config.language,
        outputMode: config.outputMode,
        threads: config.threads,
        timeoutSeconds: config.transcribeTimeoutSeconds,
      }),
    });
  }

  get state(): SessionState {
    return this._state;
  }

  get transcript(): readonly TranscriptionRecord[] {
    return this.records;
  }

  get stopRequested(): boolean {
    return this.stopController.signal.aborted;
  }

  /// Honoured between ticks; a running engine call is left to finish.
  stop(): void {
    if (this.stopRequested) { return; }
    this.logger.info('Stop requested, finishing the current segment...');
    this.stopController.abort();
  }

  async run(): Promise<SessionOutcome> {
    if (this.started) {
      throw new Error(`session ${this.sessionId} has already been run`);
    }
    this.started = true;
    this.emit('sessionStarted', { sessionId: this.sessionId });

    const { clock } = this.deps;
    this.logger.info(
      `Transcribing session ${this.sessionId}: step ${clock.step}s, ` +
      `max duration ${clock.maxDuration > 0 ? `${clock.maxDuration}s (${clock.windowCount()} segments)` : 'unlimited'}, ` +
      `output ${this.deps.outputMode}`,
    );

    let capture: CaptureHandle;
    try {
      await fs.mkdir(this.deps.scratchDir, { recursive: true });
      capture = await this.deps.capture.start();
    } catch (err) {
      const error = err instanceof CaptureStartError
        ? err
        : new CaptureStartError('failed to prepare capture', { cause: err });
      this.logger.error(`${error.message}${error.cause instanceof Error ? ` (${error.cause.message})` : ''}`);
      return this.abort(null);
    }

    try {
      this.transition('BUFFERING');
      this.logger.info('Buffering audio. Please wait...');
      await this.sleepFn(clock.step * 1000, this.stopController.signal);
      if (!this.stopRequested) {
        this.transition('RUNNING');
        await this.loop();
      }
    } catch (err) {
      this.logger.error('Unexpected error, aborting session:', err);
      return this.abort(capture);
    }

    this.transition('STOPPING');
    const exitCode = await this.cleanup(capture);
    this.transition('TERMINATED');
    return this.finish('TERMINATED', exitCode);
  }

  private async loop(): Promise<void> {
    const { clock } = this.deps;
    const stepMs = clock.step * 1000;
    const runStart = this.now();

    for (const window of clock.windows()) {
      if (this.stopRequested) { return; }
      const { index } = window;
      this.logger.debug(`segment #${index}: [${window.start}s, ${window.start + window.duration}s)`);

      const artifact = await this.extract(window);
      if (!artifact) { return; }

      const transcribed = await this.transcribe(artifact);
      if (!transcribed) { return; }

      if (!clock.isExhausted(index + 1)) {
        const wait = runStart + (index + 1) * stepMs - this.now();
        if (wait > 0) {
          await this.sleepFn(wait, this.stopController.signal);
        }
      }
    }
    this.logger.info('Max duration reached, stopping stream.');
  }

  /// Retries transient failures with doubling backoff; null means the stream is over.
  private async extract(window: SegmentWindow): Promise<SegmentArtifact | null> {
    const retries = this.deps.extractRetries ?? 0;
    const backoffMs = this.deps.extractBackoffMs ?? 1000;

    for (let attempt = 0; ; attempt++) {
      try {
        return await this.deps.extractor.extract(window);
      } catch (err) {
        if (!(err instanceof ExtractionError)) { throw err; }
        if (!err.transient || attempt >= retries || this.stopRequested) {
          this.logger.error(`Error extracting segment: ${err.message}`);
          return null;
        }
        const wait = backoffMs * 2 ** attempt;
        this.logger.warn(`${err.message}; retrying in ${wait}ms (${attempt + 1}/${retries})`);
        await this.sleepFn(wait, this.stopController.signal);
        if (this.stopRequested) { return null; }
      }
    }
  }

  /// False when the engine failed and the session should stop.
  private async transcribe(artifact: SegmentArtifact): Promise<boolean> {
    const { window } = artifact;
    try {
      let output: EngineOutput;
      try {
        output = await this.deps.invoker.invoke(artifact);
      } catch (err) {
        if (!(err instanceof InvocationError)) { throw err; }
        this.logger.error(`Error during transcription: ${err.message}`);
        if (err.stderr.trim() !== '') {
          this.logger.error(err.stderr.trim());
        }
        this.append(invocationFailure(window, err.message, err.stderr));
        return false;
      }

      this.logger.relay('engine', output.stderr);
      const record = parseEngineOutput(window, output, this.deps.outputMode);
      if (record.status === 'parse_error') {
        this.logger.warn(`segment #${window.index}: ${record.error}; raw output: ${record.raw}`);
      }
      this.append(record);
      return true;
    } finally {
      await this.removeFile(artifact.path, true);
      // plain mode: whisper-cli -otxt leaves <segment>.txt beside the audio
      await this.removeFile(`${artifact.path}.txt`);
    }
  }

  private append(record: TranscriptionRecord) {
    this.records.push(record);
    this.emit('record', { sessionId: this.sessionId, record });
  }

  private async removeFile(target: string, recursive = false) {
    try {
      await fs.rm(target, { force: true, recursive });
    } catch (err) {
      this.logger.warn(`could not remove ${target}:`, err);
    }
  }

  /// Terminate capture (once) and drop scratch storage. Returns the session exit code.
  private async cleanup(capture: CaptureHandle | null): Promise<number> {
    let exitCode = 0;
    if (capture) {
      const exitedOnItsOwn = !capture.alive;
      capture.terminate();
      const code = await capture.waitForExit(this.deps.captureGraceMs);
      if (capture.lastError) {
        this.logger.warn('capture process reported an error:', capture.lastError);
      }
      if (exitedOnItsOwn && code !== null) {
        exitCode = code;
      }
    }
    await this.removeFile(this.deps.scratchDir, true);
    return exitCode;
  }

  private async abort(capture: CaptureHandle | null): Promise<SessionOutcome> {
    await this.cleanup(capture);
    this.transition('ABORTED');
    return this.finish('ABORTED', ABORTED_EXIT_CODE);
  }

  private transition(to: SessionState) {
    const from = this._state;
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`invalid session transition ${from} -> ${to}`);
    }
    this._state = to;
    this.logger.debug(`state ${from} -> ${to}`);
    this.emit('state', { sessionId: this.sessionId, from, to });
  }

  private finish(state: 'TERMINATED' | 'ABORTED', exitCode: number): SessionOutcome {
    this.logger.info(`Transcription finished (${state}, ${this.records.length} segments).`);
    this.emit('sessionEnded', {
      sessionId: this.sessionId,
      state,
      exitCode,
      recordCount: this.records.length,
    });
    return {
      sessionId: this.sessionId,
      state,
      exitCode,
      records: [...this.records],
    };
  }
}

export { StreamTranscription };
export default StreamTranscription;
