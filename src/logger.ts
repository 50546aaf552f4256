/**
 * Console logger with a fixed `[note2gdocs]` prefix and a level threshold.
 *
 * Every level, debug included, writes to stderr so `convert` output on
 * stdout stays machine readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[note2gdocs]';

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Create a logger that drops messages below `level`.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const enabled = (at: LogLevel): boolean => SEVERITY[at] >= SEVERITY[level];

  return {
    level,
    debug(message, ...details) {
      if (enabled('debug')) console.error(PREFIX, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.error(PREFIX, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(PREFIX, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(PREFIX, message, ...details);
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger('silent');
