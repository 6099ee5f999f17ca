/**
 * Centralized error formatting for CLI commands
 * Ensures consistent error messages on stderr
 */

import type { FailureResult } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

const ERROR_PREFIX = '❌';

/**
 * `❌ <message>` with the error's text appended when one is given
 */
export function formatError(message: string, error?: unknown): string {
  if (error === undefined || error === null || error === '') {
    return `${ERROR_PREFIX} ${message}`;
  }
  return `${ERROR_PREFIX} ${message}: ${extractErrorMessage(error)}`;
}

/**
 * Format a failed Result with its code and any operator guidance
 */
export function formatFailure(failure: FailureResult): string {
  const lines = [formatError(failure.code ?? 'Error', failure.error)];
  if (failure.guidance?.hint) lines.push(`   Hint: ${failure.guidance.hint}`);
  if (failure.guidance?.resolution) lines.push(`   Resolution: ${failure.guidance.resolution}`);
  return lines.join('\n');
}
