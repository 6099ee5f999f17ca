/**
 * Core type definitions for the fleet compliance scanner.
 * Result type and the error taxonomy shared by every component.
 */

// ===== ERROR TAXONOMY =====

/**
 * Error codes surfaced by configuration resolution, dispatch and fleet planning.
 *
 * Resolution codes abort a single tool's run; `TargetScanFailure` is recorded
 * per target; `FetchError` and `InfrastructureError` are retryable by the scheduler.
 */
export const ErrorCode = {
  ConfigNotFound: 'ConfigNotFound',
  EnvironmentUndefined: 'EnvironmentUndefined',
  ConfigParseError: 'ConfigParseError',
  NoPoliciesFound: 'NoPoliciesFound',
  FetchError: 'FetchError',
  ThresholdParseError: 'ThresholdParseError',
  BaseThresholdMissing: 'BaseThresholdMissing',
  NoTargetsResolved: 'NoTargetsResolved',
  TargetScanFailure: 'TargetScanFailure',
  InfrastructureError: 'InfrastructureError',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the operator (what went wrong in user terms) */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Result type for functional error handling
 *
 * @example
 * ```typescript
 * const result = await resolver.resolve(request);
 * if (result.ok) {
 *   console.log(result.value.environment.queue);
 * } else {
 *   console.error(result.code, result.error);
 *   if (result.guidance?.hint) console.error('Hint:', result.guidance.hint);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; code?: ErrorCode; guidance?: ErrorGuidance };

/** Failure half of a Result, independent of the success type */
export type FailureResult = Extract<Result<never>, { ok: false }>;

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance
 * @param error - Error message
 * @param guidance - Optional structured guidance for operators
 */
export const Failure = <T>(error: string, guidance?: ErrorGuidance): Result<T> => {
  // Always create a new guidance object to avoid mutating the input parameter
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  return resultGuidance ? { ok: false, error, guidance: resultGuidance } : { ok: false, error };
};

/**
 * Create a failure result tagged with an error code from the taxonomy
 */
export const CodedFailure = <T>(
  code: ErrorCode,
  error: string,
  guidance?: ErrorGuidance,
): Result<T> => {
  const base = Failure<T>(error, guidance);
  return base.ok ? base : { ...base, code };
};

/**
 * Re-type a failure so it can be returned from a function with a different success type
 */
export const propagate = <T>(failure: FailureResult): Result<T> => failure;
