/**
 * Session configuration. Environment variables and command-line flags are
 * read here, once, into a `StreamConfig`; nothing downstream looks at
 * `process.env`.
 */
import os from 'node:os';
import path from 'node:path';
import { parseArgs } from 'node:util';

import { ConfigError } from './errors';
import { MODELS, isModelName } from './transcriptionBackends';
import type { StreamConfig } from './types';

export const DEFAULTS = {
  stepSeconds: 15,
  model: 'small',
  language: 'ru',
  maxDurationSeconds: 60,
  verbosity: 0,
  threads: 8,
  transcribeTimeoutSeconds: 120,
  extractRetries: 3,
  extractBackoffMs: 1000,
  ffmpegPath: 'ffmpeg',
} as const;

export const USAGE = `Usage: whisper-stream <stream_url> [options]

Transcribe a live audio stream with whisper.cpp, one fixed-length segment at a time.

Options:
  --step <s>              segment length in seconds (default ${DEFAULTS.stepSeconds})
  --model <name>          whisper.cpp model (default ${DEFAULTS.model})
  --language <code>       spoken language (default ${DEFAULTS.language})
  --max-duration <s>      stop after this many seconds, 0 = never (default ${DEFAULTS.maxDurationSeconds})
  --verbosity <n>         0 errors, 1 progress, 2 engine output (default ${DEFAULTS.verbosity})
  --plain                 print one text line per segment instead of JSON
  --whisper-root <dir>    whisper.cpp checkout (default $WHISPER_CPP_ROOT or ~/whisper.cpp)
  --threads <n>           engine threads (default ${DEFAULTS.threads})
  --timeout <s>           per-segment engine deadline, 0 = none (default ${DEFAULTS.transcribeTimeoutSeconds})
  --extract-retries <n>   retries while capture lags behind (default ${DEFAULTS.extractRetries})
  --port <n>              serve the session at /api/session and /api/ws (default $PORT, off)
  --ffmpeg <path>         ffmpeg binary (default $FFMPEG_PATH or ffmpeg)
  --scratch-dir <dir>     where temporary audio goes (default $SCRATCH_DIR or the OS temp dir)
  -h, --help              show this help

Models: ${MODELS.join(' ')}`;

export type Env = Record<string, string | undefined>;

export type ParsedCommandLine =
  | { help: true }
  | { help: false, config: StreamConfig };

function toNumber(name: string, value: string | undefined, fallback: number, check: (n: number) => boolean, expected: string): number {
  if (value === undefined || value === '') { return fallback; }
  const n = Number(value);
  if (!Number.isFinite(n) || !check(n)) {
    throw new ConfigError(`${name} must be ${expected}, got "${value}"`);
  }
  return n;
}

const positive = (n: number) => n > 0;
const nonNegative = (n: number) => n >= 0;
const nonNegativeInt = (n: number) => Number.isInteger(n) && n >= 0;
const positiveInt = (n: number) => Number.isInteger(n) && n > 0;
const portNumber = (n: number) => Number.isInteger(n) && n >= 0 && n <= 65535;

export function defaultWhisperRoot(env: Env): string {
  return env['WHISPER_CPP_ROOT'] || path.join(os.homedir(), 'whisper.cpp');
}

const OPTIONS = {
  step: { type: 'string' },
  model: { type: 'string' },
  language: { type: 'string' },
  'max-duration': { type: 'string' },
  verbosity: { type: 'string', short: 'v' },
  plain: { type: 'boolean', default: false },
  'whisper-root': { type: 'string' },
  threads: { type: 'string' },
  timeout: { type: 'string' },
  'extract-retries': { type: 'string' },
  port: { type: 'string' },
  ffmpeg: { type: 'string' },
  'scratch-dir': { type: 'string' },
  help: { type: 'boolean', short: 'h', default: false },
} as const;

export function parseCommandLine(argv: readonly string[], env: Env): ParsedCommandLine {
  const parse = () => parseArgs({
    args: [...argv],
    allowPositionals: true,
    strict: true,
    options: OPTIONS,
  });

  let parsed: ReturnType<typeof parse>;
  try {
    parsed = parse();
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), { cause: err });
  }
  const { values, positionals } = parsed;

  if (values.help) {
    return { help: true };
  }

  const streamUrl = positionals[0];
  if (!streamUrl) {
    throw new ConfigError('missing stream URL');
  }
  if (positionals.length > 1) {
    throw new ConfigError(`unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const model = values.model ?? DEFAULTS.model;
  if (!isModelName(model)) {
    throw new ConfigError(`unknown model "${model}"; available: ${MODELS.join(' ')}`);
  }

  const language = values.language ?? DEFAULTS.language;
  if (language.trim() === '') {
    throw new ConfigError('language must not be empty');
  }

  const portValue = values.port ?? env['PORT'];
  const port = portValue === undefined || portValue === ''
    ? null
    : toNumber('port', portValue, 0, portNumber, 'an integer between 0 and 65535');

  const config: StreamConfig = {
    streamUrl,
    stepSeconds: toNumber('step', values.step, DEFAULTS.stepSeconds, positive, 'a positive number'),
    maxDurationSeconds: toNumber('max-duration', values['max-duration'], DEFAULTS.maxDurationSeconds, nonNegative, 'a number >= 0'),
    model,
    language,
    outputMode: values.plain ? 'plain' : 'structured',
    verbosity: toNumber('verbosity', values.verbosity, DEFAULTS.verbosity, nonNegativeInt, 'an integer >= 0'),
    whisperRoot: path.resolve(values['whisper-root'] ?? defaultWhisperRoot(env)),
    threads: toNumber('threads', values.threads, DEFAULTS.threads, positiveInt, 'a positive integer'),
    transcribeTimeoutSeconds: toNumber('timeout', values.timeout, DEFAULTS.transcribeTimeoutSeconds, nonNegative, 'a number >= 0'),
    extractRetries: toNumber('extract-retries', values['extract-retries'], DEFAULTS.extractRetries, nonNegativeInt, 'an integer >= 0'),
    extractBackoffMs: DEFAULTS.extractBackoffMs,
    ffmpegPath: values.ffmpeg ?? (env['FFMPEG_PATH'] || DEFAULTS.ffmpegPath),
    scratchRoot: path.resolve(values['scratch-dir'] ?? (env['SCRATCH_DIR'] || os.tmpdir())),
    port,
  };

  return { help: false, config };
}
