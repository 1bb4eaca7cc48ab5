import type { OutputMode, TranscriptionRecord } from './types';

/**
 * Text written to stdout for a record, or null when the record belongs on
 * the diagnostic channel only (a failed engine run).
 *
 * Structured mode prints the engine's own JSON object as-is; JSON.stringify
 * leaves non-ASCII characters unescaped.
 */
export function formatRecord(record: TranscriptionRecord, mode: OutputMode): string | null {
  switch (record.status) {
    case 'invocation_error':
      return null;
    case 'parse_error':
      if (mode === 'structured') {
        return JSON.stringify({
          index: record.index,
          status: record.status,
          error: record.error ?? '',
          raw: record.raw ?? '',
        }, null, 2);
      }
      return `[parse_error] #${record.index} ${record.error ?? ''}`;
    case 'ok':
      if (mode === 'structured') {
        return JSON.stringify(record.structured ?? { text: record.text }, null, 2);
      }
      return record.text;
  }
}
