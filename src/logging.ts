/**
 * Structured Logging
 *
 * Factory for the pino-based logger. The logger is created with pino's
 * browser settings so the same calls work in the page and under Node.
 */

import pino from 'pino';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/**
 * Create a pino logger instance.
 */
export function createLogger(options?: LoggerOptions): pino.Logger {
  return pino({
    level: options?.level ?? 'info',
    name: options?.name ?? 'asset-handover-form',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    browser: { asObject: true },
  });
}

/** Singleton logger for the form */
let _logger: pino.Logger | undefined;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** Replace the global logger (useful for testing) */
export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

/** Create a child logger with additional bindings */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return getLogger().child(bindings);
}
