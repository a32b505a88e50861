import type { Logger, LoggerMeta } from './types';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger that drops messages below `level`.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel) {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) console.debug(message, meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) console.info(message, meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) console.warn(message, meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) console.error(message, meta ?? {});
  }

  private enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }
}

export function createConsoleLogger(options: { level?: LogLevel } = {}): Logger {
  return new ConsoleLogger(options.level ?? 'warn');
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
