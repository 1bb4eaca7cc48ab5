import { ParseError } from './errors';
import type {
  EngineOutput,
  JsonObject,
  JsonValue,
  OutputMode,
  SegmentWindow,
  TranscriptionRecord,
} from './types';

const isJsonObject = (value: JsonValue): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function parseStructured(stdout: string): { text: string, structured: JsonObject } {
  const raw = stdout.trim();
  let value: JsonValue;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ParseError(`invalid JSON: ${reason}`, stdout);
  }
  if (!isJsonObject(value)) {
    throw new ParseError('expected a JSON object', stdout);
  }
  const text = typeof value.text === 'string' ? value.text : '';
  return { text, structured: value };
}

/// The engine prints progress before the result, so only the last non-empty line counts.
export function parsePlain(stdout: string): string {
  const lines = stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
  const last = lines[lines.length - 1];
  if (last === undefined) {
    throw new ParseError('empty engine output', stdout);
  }
  return last;
}

/**
 * Turn one engine run into a record. Never throws: unparseable output becomes
 * a `parse_error` record with the raw text attached. stderr is not read here.
 */
export function parseEngineOutput(window: SegmentWindow, output: EngineOutput, mode: OutputMode): TranscriptionRecord {
  const base = {
    index: window.index,
    start: window.start,
    duration: window.duration,
  };

  try {
    if (mode === 'structured') {
      const { text, structured } = parseStructured(output.stdout);
      return { ...base, status: 'ok', text, structured };
    }
    return { ...base, status: 'ok', text: parsePlain(output.stdout) };
  } catch (err) {
    if (!(err instanceof ParseError)) { throw err; }
    return {
      ...base,
      status: 'parse_error',
      text: '',
      raw: err.raw,
      error: err.message,
    };
  }
}

/// Record for a segment whose engine run failed. It is kept in the session so the index is not skipped silently.
export function invocationFailure(window: SegmentWindow, message: string, stderr: string): TranscriptionRecord {
  return {
    index: window.index,
    start: window.start,
    duration: window.duration,
    status: 'invocation_error',
    text: '',
    raw: stderr,
    error: message,
  };
}
