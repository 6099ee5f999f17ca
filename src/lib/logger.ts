/**
 * Pino logger factory
 *
 * Logs are written to stderr so command output on stdout (plans, summaries)
 * stays machine-readable.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';

export type { Logger } from 'pino';

const REDACT_PATHS = [
  'token',
  'credential',
  'password',
  '*.token',
  '*.credential',
  '*.password',
  'headers.authorization',
  'headers.Authorization',
  '*.headers.authorization',
];

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

/**
 * Create a Pino logger with redaction of credential fields
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      level: defaultLevel(),
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
      base: { pid: process.pid },
      timestamp: pino.stdTimeFunctions.isoTime,
      ...options,
    },
    pino.destination(2),
  );
}

/**
 * Measure an operation and log its duration on completion
 */
export function createTimer(
  logger: Logger,
  operation: string,
): { end: (fields?: Record<string, unknown>) => number } {
  const startedAt = Date.now();
  return {
    end(fields = {}) {
      const durationMs = Date.now() - startedAt;
      logger.debug({ ...fields, operation, durationMs }, `${operation} completed`);
      return durationMs;
    },
  };
}
