import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { CaptureStartError, ExtractionError, type ExtractionCause } from './errors';
import { createLogger } from './logger';
import { SegmentClock } from './segmentClock';
import { FakeCapture, FakeExtractor, FakeInvoker } from './testing/fakePipeline';
import StreamTranscription, { ABORTED_EXIT_CODE, type TranscriptionDeps } from './transcription';
import type { TranscriptionInvoker } from './transcriptionBackends';
import type { OutputMode, SegmentWindow, SessionState } from './types';

const extractionFailure = (reason: ExtractionCause) => (window: SegmentWindow) =>
  new ExtractionError(window, reason, 'test');

let root: string;
let scratchDir: string;
let segmentPath: string;

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), 'transcription-spec-'));
  scratchDir = path.join(root, 'whisper-stream-test');
  segmentPath = path.join(scratchDir, 'segment.wav');
});

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

type Setup = {
  step?: number
  max?: number
  mode?: OutputMode
  capture?: FakeCapture
  extractor?: FakeExtractor
  invoker?: FakeInvoker
  extractRetries?: number
  onSleep?: (ms: number) => void
}

function session(setup: Setup = {}) {
  let clock = 0;
  const sleeps: number[] = [];
  const logs: string[] = [];
  const capture = setup.capture ?? new FakeCapture();
  const extractor = setup.extractor ?? new FakeExtractor(segmentPath);
  const invoker = setup.invoker ?? new FakeInvoker((i) => JSON.stringify({ text: `segment ${i}` }));

  const deps: TranscriptionDeps = {
    capture,
    extractor,
    invoker,
    clock: new SegmentClock(setup.step ?? 15, setup.max ?? 60),
    outputMode: setup.mode ?? 'structured',
    scratchDir,
    sessionId: 'test',
    extractRetries: setup.extractRetries ?? 0,
    extractBackoffMs: 1000,
    logger: createLogger(2, (line) => logs.push(line)),
    now: () => clock,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
      setup.onSleep?.(ms);
    },
  };
  const transcription = new StreamTranscription(deps);
  const states: SessionState[] = [];
  transcription.on('state', ({ to }) => states.push(to));
  return { transcription, capture, extractor, invoker, sleeps, logs, states };
}

describe('StreamTranscription', () => {
  it('runs exactly four ticks for step 15 and max duration 60', async () => {
    const { transcription, capture, extractor, sleeps, states } = session();
    const emitted: number[] = [];
    transcription.on('record', ({ record }) => emitted.push(record.index));

    const outcome = await transcription.run();

    expect(outcome.state).toBe('TERMINATED');
    expect(outcome.exitCode).toBe(0);
    expect(extractor.windows.map((w) => w.start)).toEqual([0, 15, 30, 45]);
    expect(emitted).toEqual([0, 1, 2, 3]);
    expect(outcome.records.map((r) => r.text)).toEqual(['segment 0', 'segment 1', 'segment 2', 'segment 3']);
    expect(states).toEqual(['BUFFERING', 'RUNNING', 'STOPPING', 'TERMINATED']);
    expect(sleeps).toEqual([15000, 15000, 15000, 15000]);
    expect(capture.handle.terminateCalls).toBe(1);
    expect(fs.existsSync(scratchDir)).toBe(false);
  });

  it('keeps at most one segment alive and deletes each after parsing', async () => {
    const { transcription, extractor, invoker } = session();
    await transcription.run();
    expect(extractor.maxLive).toBe(1);
    expect(invoker.artifactPresent).toEqual([true, true, true, true]);
  });

  it('only waits for what is left of the step', async () => {
    let t = 0;
    const sleeps: number[] = [];
    const slowInvoker: TranscriptionInvoker = {
      async invoke(artifact) {
        t += 4000;
        return { stdout: `{"text": "#${artifact.window.index}"}`, stderr: '', exitCode: 0 };
      },
    };
    const transcription = new StreamTranscription({
      capture: new FakeCapture(),
      extractor: new FakeExtractor(segmentPath),
      invoker: slowInvoker,
      clock: new SegmentClock(15, 45),
      outputMode: 'structured',
      scratchDir,
      now: () => t,
      sleep: async (ms) => { sleeps.push(ms); t += ms; },
    });

    await transcription.run();
    expect(sleeps).toEqual([15000, 11000, 11000]);
  });

  it('stops without attempting the next segment after an extraction error', async () => {
    const extractor = new FakeExtractor(segmentPath, { index: 2, error: extractionFailure('tool-failed') });
    const { transcription, capture, invoker, logs } = session({ extractor });

    const outcome = await transcription.run();

    expect(outcome.state).toBe('TERMINATED');
    expect(extractor.windows.map((w) => w.index)).toEqual([0, 1, 2]);
    expect(invoker.seen).toEqual([0, 1]);
    expect(outcome.records.map((r) => r.index)).toEqual([0, 1]);
    expect(capture.handle.terminateCalls).toBe(1);
    expect(fs.existsSync(scratchDir)).toBe(false);
    expect(logs).toContain('[error] Error extracting segment: segment #2 [30s, +15s): tool-failed: test');
  });

  it('stops without attempting the next segment after an engine failure', async () => {
    const invoker = new FakeInvoker(() => '{"text": "ok"}', 1);
    const { transcription, capture, extractor, logs } = session({ invoker });

    const outcome = await transcription.run();

    expect(outcome.state).toBe('TERMINATED');
    expect(extractor.windows.map((w) => w.index)).toEqual([0, 1]);
    expect(outcome.records.map((r) => [r.index, r.status])).toEqual([[0, 'ok'], [1, 'invocation_error']]);
    expect(outcome.records[1].raw).toBe('error: model not found');
    expect(capture.handle.terminateCalls).toBe(1);
    expect(fs.existsSync(scratchDir)).toBe(false);
    expect(logs).toContain('[error] Error during transcription: segment #1: exit-status: whisper-cli exited with 1');
    expect(logs).toContain('[error] error: model not found');
  });

  it('records a parse error and carries on', async () => {
    const invoker = new FakeInvoker((i) => (i === 1 ? '{"text": ' : `{"text": "t${i}"}`));
    const { transcription, logs } = session({ invoker });

    const outcome = await transcription.run();

    expect(outcome.records.map((r) => r.status)).toEqual(['ok', 'parse_error', 'ok', 'ok']);
    expect(outcome.records[1].raw).toBe('{"text": ');
    expect(logs.some((line) => line.startsWith('[warn] segment #1: invalid JSON'))).toBe(true);
  });

  it('relays engine stderr as diagnostics only', async () => {
    const { transcription, logs } = session({ max: 15 });
    const outcome = await transcription.run();
    expect(outcome.records[0].text).toBe('segment 0');
    expect(logs).toContain('[engine] whisper_init: loading');
  });

  it('parses plain output by its last line', async () => {
    const invoker = new FakeInvoker((i) => `loading model...\nprocessing...\nline ${i}\n`);
    const { transcription } = session({ invoker, mode: 'plain', max: 30 });
    const outcome = await transcription.run();
    expect(outcome.records.map((r) => r.text)).toEqual(['line 0', 'line 1']);
  });

  it('aborts and cleans up when capture cannot start', async () => {
    const capture = new FakeCapture(new CaptureStartError('failed to launch ffmpeg: spawn ffmpeg ENOENT'));
    const { transcription, extractor, states, logs } = session({ capture });

    const outcome = await transcription.run();

    expect(outcome.state).toBe('ABORTED');
    expect(outcome.exitCode).toBe(ABORTED_EXIT_CODE);
    expect(outcome.records).toEqual([]);
    expect(states).toEqual(['ABORTED']);
    expect(capture.starts).toBe(1);
    expect(extractor.windows).toEqual([]);
    expect(fs.existsSync(scratchDir)).toBe(false);
    expect(logs).toContain('[error] failed to launch ffmpeg: spawn ffmpeg ENOENT');
  });

  it('aborts on an unexpected error and still terminates capture once', async () => {
    const extractor = new FakeExtractor(segmentPath, { index: 1, error: () => new Error('disk on fire') });
    const { transcription, capture, states } = session({ extractor });

    const outcome = await transcription.run();

    expect(outcome.state).toBe('ABORTED');
    expect(outcome.exitCode).toBe(ABORTED_EXIT_CODE);
    expect(states).toEqual(['BUFFERING', 'RUNNING', 'ABORTED']);
    expect(capture.handle.terminateCalls).toBe(1);
    expect(fs.existsSync(scratchDir)).toBe(false);
  });

  it('retries a lagging capture with doubling backoff', async () => {
    const extractor = new FakeExtractor(segmentPath, { index: 0, error: extractionFailure('capture-lag'), times: 2 });
    const { transcription, sleeps } = session({ extractor, extractRetries: 3, max: 15 });

    const outcome = await transcription.run();

    expect(outcome.records.map((r) => r.index)).toEqual([0]);
    expect(extractor.windows.map((w) => w.index)).toEqual([0, 0, 0]);
    expect(sleeps).toEqual([15000, 1000, 2000]);
  });

  it('gives up once the retries are spent', async () => {
    const extractor = new FakeExtractor(segmentPath, { index: 1, error: extractionFailure('sink-missing') });
    const { transcription, capture } = session({ extractor, extractRetries: 2 });

    const outcome = await transcription.run();

    expect(outcome.state).toBe('TERMINATED');
    expect(extractor.windows.map((w) => w.index)).toEqual([0, 1, 1, 1]);
    expect(outcome.records.map((r) => r.index)).toEqual([0]);
    expect(capture.handle.terminateCalls).toBe(1);
  });

  it('does not retry a tool failure', async () => {
    const extractor = new FakeExtractor(segmentPath, { index: 0, error: extractionFailure('empty-output') });
    const { transcription } = session({ extractor, extractRetries: 3 });
    await transcription.run();
    expect(extractor.windows).toHaveLength(1);
  });

  it('honours a stop request between ticks', async () => {
    const { transcription, capture, extractor } = session({ max: 0 });
    transcription.on('record', ({ record }) => {
      if (record.index === 1) { transcription.stop(); }
    });

    const outcome = await transcription.run();

    expect(outcome.state).toBe('TERMINATED');
    expect(extractor.windows.map((w) => w.index)).toEqual([0, 1]);
    expect(capture.handle.terminateCalls).toBe(1);
  });

  it('does not start the engine when stopped during a retry backoff', async () => {
    let stop = () => {};
    const extractor = new FakeExtractor(segmentPath, { index: 0, error: extractionFailure('capture-lag'), times: 1 });
    const { transcription, capture, invoker, sleeps } = session({
      extractor,
      extractRetries: 3,
      onSleep: (ms) => { if (ms === 1000) { stop(); } },
    });
    stop = () => transcription.stop();

    const outcome = await transcription.run();

    expect(outcome.state).toBe('TERMINATED');
    expect(extractor.windows.map((w) => w.index)).toEqual([0]);
    expect(invoker.seen).toEqual([]);
    expect(sleeps).toEqual([15000, 1000]);
    expect(capture.handle.terminateCalls).toBe(1);
  });

  it('removes the engine text output along with each segment', async () => {
    const textPath = `${segmentPath}.txt`;
    const leftover: boolean[] = [];
    const invoker = new FakeInvoker((i) => {
      leftover.push(fs.existsSync(textPath));
      fs.writeFileSync(textPath, `line ${i}\n`);
      return `line ${i}\n`;
    });
    const { transcription } = session({ invoker, mode: 'plain', max: 45 });

    const outcome = await transcription.run();

    expect(outcome.records.map((r) => r.text)).toEqual(['line 0', 'line 1', 'line 2']);
    expect(leftover).toEqual([false, false, false]);
  });

  it('skips the loop when stopped while buffering', async () => {
    const { transcription, extractor, states } = session();
    transcription.on('state', ({ to }) => {
      if (to === 'BUFFERING') { transcription.stop(); }
    });

    await transcription.run();

    expect(extractor.windows).toEqual([]);
    expect(states).toEqual(['BUFFERING', 'STOPPING', 'TERMINATED']);
  });

  it('returns the exit code of a capture process that ended on its own', async () => {
    const capture = new FakeCapture();
    const extractor = new FakeExtractor(segmentPath, { index: 1, error: extractionFailure('tool-failed') });
    const { transcription } = session({ capture, extractor });
    transcription.on('record', () => capture.handle.exitOnItsOwn(1));

    const outcome = await transcription.run();

    expect(outcome.exitCode).toBe(1);
    expect(capture.handle.terminateCalls).toBe(1);
  });

  it('emits session lifecycle events', async () => {
    const { transcription } = session({ max: 30 });
    const events: string[] = [];
    transcription.on('sessionStarted', ({ sessionId }) => events.push(`started ${sessionId}`));
    transcription.on('record', ({ record }) => events.push(`record ${record.index}`));
    transcription.on('sessionEnded', ({ state, exitCode, recordCount }) => events.push(`ended ${state} ${exitCode} ${recordCount}`));

    await transcription.run();

    expect(events).toEqual(['started test', 'record 0', 'record 1', 'ended TERMINATED 0 2']);
    expect(transcription.state).toBe('TERMINATED');
    expect(transcription.transcript).toHaveLength(2);
  });

  it('can only run once', async () => {
    const { transcription } = session({ max: 15 });
    await transcription.run();
    await expect(transcription.run()).rejects.toThrow('session test has already been run');
  });
});
