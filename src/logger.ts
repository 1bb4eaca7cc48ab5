import { format } from 'node:util';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LEVEL_VERBOSITY: Record<LogLevel, number> = {
  error: 0,
  warn: 0,
  info: 1,
  debug: 2,
};

export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  /// Relay another process's diagnostic output, one prefixed line each.
  relay(source: string, text: string): void;
}

export type LineWriter = (line: string) => void;

/**
 * Diagnostics logger. Every line goes to stderr (via `console.error`) with a
 * bracketed prefix, so it never mixes with the records on stdout.
 */
export function createLogger(verbosity: number, write: LineWriter = (line) => console.error(line)): Logger {
  const emit = (prefix: string, text: string) => {
    for (const line of text.split(/\r?\n/)) {
      write(`[${prefix}] ${line}`);
    }
  };

  const at = (level: LogLevel) => (...args: unknown[]) => {
    if (verbosity < LEVEL_VERBOSITY[level]) { return; }
    emit(level, format(...args));
  };

  return {
    error: at('error'),
    warn: at('warn'),
    info: at('info'),
    debug: at('debug'),
    relay(source, text) {
      if (verbosity < LEVEL_VERBOSITY.debug) { return; }
      const trimmed = text.trim();
      if (trimmed === '') { return; }
      emit(source, trimmed);
    },
  };
}

export const silentLogger: Logger = createLogger(-1, () => {});
