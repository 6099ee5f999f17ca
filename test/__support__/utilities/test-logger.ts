import pino, { type Logger } from 'pino';

/**
 * Silent logger for unit tests
 */
export function createTestLogger(): Logger {
  return pino({ level: 'silent' });
}
