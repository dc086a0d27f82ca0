/**
 * Tagged logger
 *
 * Lines look like `[Library] Loaded 14 principles`. Output goes to stderr so
 * that structured reports on stdout stay machine-readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogSink = (line: string) => void;

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const state: { level: LogLevel; sink: LogSink } = {
  level: 'warn',
  sink: (line) => process.stderr.write(`${line}\n`),
};

export function setLogLevel(level: LogLevel): void {
  state.level = level;
}

export function getLogLevel(): LogLevel {
  return state.level;
}

/**
 * Redirect log output; returns the previous sink so tests can restore it
 */
export function setLogSink(sink: LogSink): LogSink {
  const previous = state.sink;
  state.sink = sink;
  return previous;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(tag: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(state.level)) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const prefix = level === 'info' ? '' : `${level.toUpperCase()} `;
    state.sink(`${prefix}[${tag}] ${message}${suffix}`);
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  };
}
