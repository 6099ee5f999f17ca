/**
 * Execution-plan records consumed by the pipeline scheduler.
 */

import type { ErrorCode } from './core';

/** Bounded automatic retry on one infrastructure exit status */
export interface AutomaticRetryRule {
  readonly exitStatus: number;
  readonly limit: number;
}

export interface RetryPolicy {
  readonly automatic: readonly AutomaticRetryRule[];
}

export interface PlanEntry {
  readonly label: string;
  readonly key: string;
  readonly command: string;
  readonly env: Readonly<{ SCAN_TOOL: string; SCAN_ENVIRONMENT: string }>;
  readonly queue: string;
  readonly timeoutMinutes: number;
  readonly retry: RetryPolicy;
  readonly artifactPaths: string;
}

export interface SummaryEntry {
  readonly label: string;
  readonly key: string;
  readonly command: string;
  readonly dependsOn: readonly string[];
  readonly allowDependencyFailure: true;
}

export type ToolPlanState =
  | { readonly tool: string; readonly state: 'Planned'; readonly entry: PlanEntry }
  | { readonly tool: string; readonly state: 'Skipped'; readonly reason: string; readonly code?: ErrorCode };

export interface FleetPlan {
  readonly environment: string;
  readonly entries: readonly PlanEntry[];
  readonly summary: SummaryEntry;
  readonly states: readonly ToolPlanState[];
}
