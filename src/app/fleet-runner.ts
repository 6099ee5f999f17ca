/**
 * Fleet Runner
 *
 * Runs the per-tool scan pipeline for every roster tool locally, a bounded
 * number at a time. Aborting the signal stops tools that have not started;
 * runs already in flight finish and are reported normally.
 */

import type { Logger } from 'pino';
import { ErrorCode } from '@/types';
import { createLimiter } from '@/lib/concurrency';
import { EXIT_CODES, exitCodeFor } from '@/lib/errors';
import type { ScanRunner } from './scan-run';

export type FleetToolState = 'Passed' | 'Failed' | 'Skipped' | 'Errored' | 'Cancelled';

export interface FleetToolOutcome {
  tool: string;
  state: FleetToolState;
  exitCode: number;
  detail?: string;
  code?: ErrorCode;
}

export interface FleetRunReport {
  environment: string;
  outcomes: FleetToolOutcome[];
  cancelled: boolean;
}

export interface FleetRunner {
  run(
    roster: readonly string[],
    environment: string,
    options?: { signal?: AbortSignal },
  ): Promise<FleetRunReport>;
}

export interface FleetRunnerDeps {
  scanRunner: ScanRunner;
  org: string;
  ref: string;
  concurrency: number;
  logger: Logger;
}

/** Resolution gaps skip a tool; only fetch and infrastructure problems count as errors */
function stateForFailure(code: ErrorCode | undefined): FleetToolState {
  return code === ErrorCode.FetchError || code === ErrorCode.InfrastructureError ? 'Errored' : 'Skipped';
}

export function createFleetRunner(deps: FleetRunnerDeps): FleetRunner {
  const log = deps.logger.child({ module: 'fleet-runner' });

  return {
    async run(roster, environment, options = {}) {
      const { signal } = options;
      const limit = createLimiter(deps.concurrency);

      const runTool = async (tool: string): Promise<FleetToolOutcome> => {
        if (signal?.aborted) {
          return { tool, state: 'Cancelled', exitCode: EXIT_CODES.INFRASTRUCTURE_ERROR };
        }

        const result = await deps.scanRunner.run({
          tool,
          environment,
          org: deps.org,
          ref: deps.ref,
        });

        if (!result.ok) {
          return {
            tool,
            state: stateForFailure(result.code),
            exitCode: exitCodeFor(result.code),
            detail: result.error,
            ...(result.code !== undefined && { code: result.code }),
          };
        }

        const { verdict } = result.value;
        return {
          tool,
          state: verdict.verdict === 'PASS' ? 'Passed' : 'Failed',
          exitCode: result.value.exitCode,
          detail: `${verdict.passed}/${verdict.total} targets passed`,
        };
      };

      const outcomes = await Promise.all(roster.map((tool) => limit(() => runTool(tool))));

      const counts = outcomes.reduce<Record<FleetToolState, number>>(
        (acc, outcome) => ({ ...acc, [outcome.state]: acc[outcome.state] + 1 }),
        { Passed: 0, Failed: 0, Skipped: 0, Errored: 0, Cancelled: 0 },
      );
      log.info({ environment, ...counts }, 'Fleet run finished');

      return { environment, outcomes, cancelled: signal?.aborted ?? false };
    },
  };
}

/**
 * Process exit status for a fleet run. Errors and cancellation outrank scan
 * failures; a fleet where no tool ran at all is a configuration error.
 */
export function fleetExitCode(report: FleetRunReport): number {
  const states = new Set(report.outcomes.map((o) => o.state));
  if (states.has('Errored') || states.has('Cancelled')) return EXIT_CODES.INFRASTRUCTURE_ERROR;
  if (states.has('Failed')) return EXIT_CODES.SCAN_FAILED;
  if (!states.has('Passed')) return EXIT_CODES.CONFIG_ERROR;
  return EXIT_CODES.PASS;
}
