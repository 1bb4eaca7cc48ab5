import EventEmitter from 'node:events';
import { PassThrough } from 'node:stream';
import { finished } from 'node:stream/promises';
import type { SpawnOptions } from 'node:child_process';

import type { SpawnedProcess, Spawner } from '../process';

export type SpawnCall = {
  command: string
  args: readonly string[]
  options: SpawnOptions
  child: FakeChild
}

let nextPid = 4000;

/// An in-process stand-in for a child process, driven by the test.
export class FakeChild extends EventEmitter implements SpawnedProcess {
  readonly pid = nextPid++;
  readonly stdin = null;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  exited = false;
  readonly signals: NodeJS.Signals[] = [];
  /// When set, a kill makes the process exit with a null code.
  exitOnKill = true;

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    if (this.exitOnKill && !this.exited) {
      setImmediate(() => this.exit(null, signal));
    }
    return true;
  }

  /// Write both channels, close them, then report the exit.
  async finish(result: { stdout?: string, stderr?: string, code: number | null, signal?: NodeJS.Signals }) {
    if (result.stdout) { this.stdout.write(result.stdout); }
    if (result.stderr) { this.stderr.write(result.stderr); }
    this.stdout.end();
    this.stderr.end();
    this.stdout.resume();
    this.stderr.resume();
    await Promise.all([finished(this.stdout), finished(this.stderr)]);
    this.exit(result.code, result.signal ?? null);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null) {
    if (this.exited) { return; }
    this.exited = true;
    this.exitCode = code;
    this.emit('exit', code, signal);
    this.emit('close', code, signal);
  }
}

export type FakeBehaviour = (child: FakeChild, call: SpawnCall) => void;

/// A spawner whose children run `behaviour` on the next tick.
export function fakeSpawner(behaviour: FakeBehaviour) {
  const calls: SpawnCall[] = [];
  const spawner: Spawner = (command, args, options) => {
    const child = new FakeChild();
    const call = { command, args, options, child };
    calls.push(call);
    process.nextTick(() => behaviour(child, call));
    return child;
  };
  return { spawner, calls };
}
