import { CaptureStartError } from './errors';
import { spawn, type Spawner, type SpawnedProcess } from './process';

export const SAMPLE_RATE = 16000;
export const CHANNELS = 1;
export const BYTES_PER_SAMPLE = 2;
/// Minimal RIFF/WAVE header. ffmpeg may write a few dozen bytes more, about 1ms of audio.
export const WAV_HEADER_BYTES = 44;

export const pcmOutputArgs = (): string[] => [
  '-ar', String(SAMPLE_RATE),
  '-ac', String(CHANNELS),
  '-c:a', 'pcm_s16le',
];

/// Liveness and termination rights over the capture process. The process itself is not owned.
export interface CaptureHandle {
  readonly pid: number | undefined;
  readonly alive: boolean;
  /// Exit code, once the process has exited on its own; null otherwise.
  readonly exitCode: number | null;
  /// True once `terminate` has been called.
  readonly terminated: boolean;
  /// Last error the process reported after it was launched (e.g. a failed signal).
  readonly lastError: Error | null;
  /// Request termination. Only the first call sends a signal.
  terminate(): void;
  /// Resolves with the exit code (null if ended by a signal) once the process is gone.
  /// After `graceMs` a process still running is killed with SIGKILL; null waits indefinitely.
  waitForExit(graceMs?: number | null): Promise<number | null>;
}

export interface CaptureLauncher {
  start(): Promise<CaptureHandle>;
}

export type FfmpegCaptureOptions = {
  ffmpegPath: string
  streamUrl: string
  sinkPath: string
  /// 0: capture until terminated.
  maxDurationSeconds: number
  spawner?: Spawner
}

export const captureArgs = (options: Pick<FfmpegCaptureOptions, 'streamUrl' | 'sinkPath' | 'maxDurationSeconds'>): string[] => [
  '-loglevel', 'quiet',
  '-y',
  '-re',
  '-probesize', '32',
  '-i', options.streamUrl,
  ...pcmOutputArgs(),
  ...(options.maxDurationSeconds > 0 ? ['-t', String(options.maxDurationSeconds)] : []),
  options.sinkPath,
];

class ProcessCaptureHandle implements CaptureHandle {
  private _exitCode: number | null = null;
  private _exited = false;
  private _terminated = false;
  private _lastError: Error | null = null;
  private readonly exitPromise: Promise<number | null>;

  constructor(private readonly child: SpawnedProcess) {
    this.exitPromise = new Promise<number | null>((resolve) => {
      child.once('exit', (code: number | null) => {
        this._exited = true;
        this._exitCode = code;
        resolve(code);
      });
    });
    child.on('error', (err: Error) => { this._lastError = err; });
  }

  get pid() { return this.child.pid; }
  get alive() { return !this._exited; }
  get exitCode() { return this._exitCode; }
  get terminated() { return this._terminated; }
  get lastError() { return this._lastError; }

  terminate(): void {
    if (this._terminated) { return; }
    this._terminated = true;
    if (!this._exited) {
      this.child.kill('SIGTERM');
    }
  }

  async waitForExit(graceMs: number | null = 3000): Promise<number | null> {
    if (this._exited) { return this._exitCode; }
    if (graceMs === null) { return this.exitPromise; }
    // Give it a moment to flush, then force kill
    let timer: NodeJS.Timeout | undefined;
    const forced = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        if (!this._exited) { this.child.kill('SIGKILL'); }
        resolve();
      }, graceMs);
    });
    await Promise.race([this.exitPromise, forced]);
    clearTimeout(timer);
    return this.exitPromise;
  }
}

/**
 * Launches the long-running ffmpeg process that writes the live capture
 * sink. It is never restarted: if it dies, later extractions fail and the
 * session ends.
 */
export class FfmpegCapture implements CaptureLauncher {
  constructor(private readonly options: FfmpegCaptureOptions) {}

  start(): Promise<CaptureHandle> {
    const spawner = this.options.spawner ?? spawn;

    return new Promise<CaptureHandle>((resolve, reject) => {
      let child: SpawnedProcess;
      try {
        child = spawner(this.options.ffmpegPath, captureArgs(this.options), {
          stdio: ['ignore', 'ignore', 'ignore'],
        });
      } catch (err) {
        reject(new CaptureStartError(`failed to launch ${this.options.ffmpegPath}`, { cause: err }));
        return;
      }

      const handle = new ProcessCaptureHandle(child);

      const onSpawn = () => {
        child.off('error', onError);
        resolve(handle);
      };
      const onError = (err: Error) => {
        child.off('spawn', onSpawn);
        reject(new CaptureStartError(`failed to launch ${this.options.ffmpegPath}: ${err.message}`, { cause: err }));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}
