import { spawn as nodeSpawn } from 'node:child_process';
import type { SpawnOptions } from 'node:child_process';
import type EventEmitter from 'node:events';
import type { Readable, Writable } from 'node:stream';

/// The slice of `ChildProcess` the pipeline relies on.
export interface SpawnedProcess extends EventEmitter {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type Spawner = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedProcess;

export const spawn: Spawner = (command, args, options) => nodeSpawn(command, args, options);

export type ProcessResult = {
  stdout: string
  stderr: string
  /// null when the process was ended by a signal.
  exitCode: number | null
  signal: NodeJS.Signals | null
  timedOut: boolean
}

export type RunOptions = {
  spawner?: Spawner
  /// Kill the process with SIGKILL after this many milliseconds. 0 or undefined: no deadline.
  timeoutMs?: number
}

/**
 * Run a command to completion with a typed argument list (no shell), and
 * collect both output channels.
 *
 * Rejects only when the process cannot be started at all (e.g. ENOENT);
 * a non-zero exit or an exceeded deadline resolve normally.
 */
export function runProcess(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessResult> {
  const spawner = options.spawner ?? spawn;

  return new Promise<ProcessResult>((resolve, reject) => {
    const child = spawner(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout?.on('data', (chunk: Buffer) => { stdout.push(chunk); });
    child.stderr?.on('data', (chunk: Buffer) => { stderr.push(chunk); });

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, options.timeoutMs);
    }

    child.on('error', (err: Error) => {
      clearTimeout(timer);
      reject(err);
    });

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      clearTimeout(timer);
      resolve({
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: Buffer.concat(stderr).toString('utf-8'),
        exitCode: code,
        signal,
        timedOut,
      });
    });
  });
}
