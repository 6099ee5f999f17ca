/**
 * Error handling utilities and message templates
 *
 * Consolidates error utilities, centralized error messages and the mapping
 * from error codes to process exit statuses.
 */

import { ErrorCode } from '@/types';

// ============================================================================
// Error Message Templates
// ============================================================================

export const ERROR_MESSAGES = {
  CONFIG_NOT_FOUND: (repository: string, path: string, ref: string) =>
    `Scan descriptor not found: ${repository}/${path}@${ref}`,
  CONFIG_PARSE_FAILED: (path: string, issues: string) => `Invalid scan descriptor ${path}: ${issues}`,
  ENVIRONMENT_UNDEFINED: (tool: string, environment: string, available: string[]) =>
    `Environment "${environment}" is not defined for ${tool}` +
    (available.length > 0 ? ` (available: ${available.join(', ')})` : ''),
  NO_POLICIES: (repository: string, ref: string) =>
    `No policy files found in ${repository}@${ref}`,
  BASE_THRESHOLD_MISSING: (repository: string, path: string) =>
    `Base threshold document missing: ${repository}/${path}`,
  THRESHOLD_PARSE_FAILED: (path: string, issue: string) =>
    `Invalid threshold document ${path}: ${issue}`,
  NO_TARGETS: (tool: string, environment: string) =>
    `No scan targets resolved for ${tool} in ${environment}`,
  FETCH_FAILED: (what: string, error: string) => `Failed to fetch ${what}: ${error}`,

  // Generic templates
  OPERATION_FAILED: (operation: string, error: string) => `${operation} failed: ${error}`,
} as const;

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

// ============================================================================
// Exit statuses
// ============================================================================

export const EXIT_CODES = {
  PASS: 0,
  SCAN_FAILED: 1,
  CONFIG_ERROR: 2,
  INFRASTRUCTURE_ERROR: 3,
} as const;

/**
 * Exit status for a run that stopped on an error code. Only the
 * infrastructure statuses are retried by the scheduler.
 */
export function exitCodeFor(code: ErrorCode | undefined): number {
  switch (code) {
    case ErrorCode.FetchError:
    case ErrorCode.InfrastructureError:
      return EXIT_CODES.INFRASTRUCTURE_ERROR;
    case ErrorCode.TargetScanFailure:
      return EXIT_CODES.SCAN_FAILED;
    case ErrorCode.ConfigNotFound:
    case ErrorCode.EnvironmentUndefined:
    case ErrorCode.ConfigParseError:
    case ErrorCode.NoPoliciesFound:
    case ErrorCode.ThresholdParseError:
    case ErrorCode.BaseThresholdMissing:
    case ErrorCode.NoTargetsResolved:
    case undefined:
      return EXIT_CODES.CONFIG_ERROR;
  }
}
