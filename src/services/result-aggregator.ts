/**
 * Result Aggregator
 *
 * Folds per-target results into one verdict per tool and environment.
 */

import type { Notification, RunVerdict, ScanResult, ScanStatus } from '@/types';

export interface AggregateInput {
  tool: string;
  environment: string;
  scoreThreshold: number;
  results: readonly ScanResult[];
}

const STATUS_MARKERS: Record<ScanStatus, string> = {
  success: 'PASS',
  failure: 'FAIL',
  error: 'ERROR',
};

/**
 * PASS only when there is at least one result and every result succeeded.
 */
export function aggregateResults(input: AggregateInput): RunVerdict {
  const { results } = input;
  const passed = results.filter((r) => r.status === 'success').length;
  const failed = results.filter((r) => r.status === 'failure').length;
  const errored = results.filter((r) => r.status === 'error').length;

  return {
    tool: input.tool,
    environment: input.environment,
    verdict: results.length > 0 && passed === results.length ? 'PASS' : 'FAIL',
    total: results.length,
    passed,
    failed,
    errored,
    scoreThreshold: input.scoreThreshold,
    results: [...results],
  };
}

export function formatResultLine(result: ScanResult): string {
  const marker = `[${STATUS_MARKERS[result.status]}]`;
  switch (result.status) {
    case 'success':
      return `  ${marker} ${result.target}`;
    case 'failure':
      return `  ${marker} ${result.target} (exit ${String(result.exitCode)})`;
    case 'error':
      return `  ${marker} ${result.target}: ${result.error ?? 'unknown error'}`;
  }
}

/**
 * Human-readable summary enumerating pass/fail counts and every target
 */
export function formatSummary(verdict: RunVerdict): string {
  return [
    `${verdict.tool} (${verdict.environment}): ${verdict.verdict}`,
    `targets: ${verdict.total} total, ${verdict.passed} passed, ${verdict.failed} failed, ${verdict.errored} errored`,
    `score threshold: ${verdict.scoreThreshold}`,
    ...verdict.results.map(formatResultLine),
  ].join('\n');
}

export function notificationContext(tool: string): string {
  return `scan-${tool}`;
}

export function toNotification(verdict: RunVerdict): Notification {
  const heading =
    verdict.verdict === 'PASS'
      ? `:white_check_mark: ${verdict.tool} passed compliance scan in ${verdict.environment}`
      : `:x: ${verdict.tool} failed compliance scan in ${verdict.environment}`;
  return {
    context: notificationContext(verdict.tool),
    style: verdict.verdict === 'PASS' ? 'success' : 'error',
    body: [
      heading,
      '',
      `Score threshold: ${verdict.scoreThreshold}`,
      `Targets: ${verdict.passed}/${verdict.total} passed, ${verdict.failed} failed, ${verdict.errored} errored`,
    ].join('\n'),
  };
}
