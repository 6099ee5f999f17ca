/**
 * Scan Run
 *
 * Runs the full pipeline for one tool and environment:
 * resolve descriptor -> (policies | thresholds) -> plan targets -> dispatch -> aggregate.
 * Any resolution failure stops the run before a target is scanned.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  type Notification,
  type Result,
  type RunVerdict,
  type ScanResult,
  CodedFailure,
  ErrorCode,
  Success,
  propagate,
} from '@/types';
import type { ScanConfigResolver } from '@/services/scan-config-resolver';
import type { PolicyBundleLoader } from '@/services/policy-bundle-loader';
import type { ThresholdMerger } from '@/services/threshold-merger';
import type { ScanDispatcher } from '@/services/scan-dispatcher';
import type { ReportingSink } from '@/infra/pipeline/reporting-sink';
import { planTargets } from '@/services/target-planner';
import {
  aggregateResults,
  formatSummary,
  notificationContext,
  toNotification,
} from '@/services/result-aggregator';
import { isValidToolName } from '@/services/tool-roster';
import { EXIT_CODES, extractErrorMessage, ERROR_MESSAGES } from '@/lib/errors';
import { createTimer } from '@/lib/logger';
import { type RunPaths, runPathsFor } from '@/lib/run-paths';

export interface ScanRunRequest {
  tool: string;
  environment: string;
  org: string;
  ref: string;
  /** Replaces the declared target list with this single target */
  manualTarget?: string;
}

export interface ScanRunOutcome {
  verdict: RunVerdict;
  summary: string;
  exitCode: number;
  paths: RunPaths;
}

export interface ScanRunner {
  run(request: ScanRunRequest): Promise<Result<ScanRunOutcome>>;
}

export interface ScanRunnerDeps {
  resolver: ScanConfigResolver;
  policyLoader: PolicyBundleLoader;
  thresholdMerger: ThresholdMerger;
  dispatcher: ScanDispatcher;
  sink: ReportingSink;
  workDir: string;
  logger: Logger;
}

/** Verdict persisted next to the results; per-target engine output stays in its own file */
export function toVerdictRecord(verdict: RunVerdict, summary: string): Record<string, unknown> {
  return {
    ...verdict,
    results: verdict.results.map(({ output: _output, ...rest }) => rest),
    summary,
  };
}

function fatalNotification(
  tool: string,
  environment: string,
  error: string,
  code: ErrorCode | undefined,
): Notification {
  return {
    context: notificationContext(tool),
    style: 'error',
    body: [
      `:x: ${tool} scan could not run in ${environment}`,
      '',
      `${code ?? 'Error'}: ${error}`,
    ].join('\n'),
  };
}

export function createScanRunner(deps: ScanRunnerDeps): ScanRunner {
  const { resolver, policyLoader, thresholdMerger, dispatcher, sink } = deps;

  async function report(notification: Notification, log: Logger): Promise<void> {
    const annotated = await sink.annotate(notification);
    if (!annotated.ok) {
      log.warn({ error: annotated.error }, 'Notification not delivered');
    }
  }

  async function execute(request: ScanRunRequest, log: Logger): Promise<Result<ScanRunOutcome>> {
    const { tool, environment, org, ref } = request;

    if (!isValidToolName(tool)) {
      return CodedFailure(ErrorCode.ConfigNotFound, `Invalid tool name: ${tool}`);
    }

    const resolved = await resolver.resolve({ tool, org, ref, environment });
    if (!resolved.ok) return resolved;

    const { config, environment: envConfig } = resolved.value;
    const paths = runPathsFor(deps.workDir, tool);
    const location = { org, repository: resolved.value.tool.repository, ref };

    // Policy and threshold fetches are independent
    const [policies, thresholds] = await Promise.all([
      policyLoader.load({ location, tool, directory: paths.policies }),
      thresholdMerger.merge({ location, environment: envConfig, outputPath: paths.thresholds }),
    ]);
    if (!policies.ok) return propagate(policies);
    if (!thresholds.ok) return propagate(thresholds);

    const targets = planTargets({
      tool,
      modality: config.scanModality,
      environment: envConfig,
      ...(request.manualTarget !== undefined && { manualTarget: request.manualTarget }),
    });
    if (!targets.ok) return propagate(targets);

    log.info(
      {
        modality: config.scanModality,
        targets: targets.value.map((t) => t.address),
        policies: policies.value.files.length,
        scoreThreshold: thresholds.value.scoreThreshold,
      },
      'Dispatching scans',
    );

    let results: ScanResult[];
    try {
      results = await dispatcher.dispatch({
        tool,
        targets: targets.value,
        policies: policies.value,
        thresholds: thresholds.value,
        paths,
      });
    } catch (error) {
      return CodedFailure(
        ErrorCode.InfrastructureError,
        ERROR_MESSAGES.OPERATION_FAILED('Dispatch', extractErrorMessage(error)),
      );
    }

    const verdict = aggregateResults({
      tool,
      environment,
      scoreThreshold: thresholds.value.scoreThreshold,
      results,
    });
    const summary = formatSummary(verdict);

    try {
      await mkdir(paths.root, { recursive: true });
      await writeFile(paths.verdict, JSON.stringify(toVerdictRecord(verdict, summary), null, 2));
    } catch (error) {
      log.warn({ error: extractErrorMessage(error) }, 'Could not persist verdict');
    }

    await report(toNotification(verdict), log);
    const uploaded = await sink.uploadArtifacts(`${paths.results}/*.json`);
    if (!uploaded.ok) {
      log.warn({ error: uploaded.error }, 'Artifact upload failed');
    }

    return Success({
      verdict,
      summary,
      exitCode: verdict.verdict === 'PASS' ? EXIT_CODES.PASS : EXIT_CODES.SCAN_FAILED,
      paths,
    });
  }

  return {
    async run(request) {
      const log = deps.logger.child({ tool: request.tool, environment: request.environment });
      const timer = createTimer(log, 'scan-run');

      const result = await execute(request, log);

      if (result.ok) {
        log.info(
          {
            verdict: result.value.verdict.verdict,
            passed: result.value.verdict.passed,
            total: result.value.verdict.total,
          },
          'Scan run finished',
        );
      } else {
        log.error({ code: result.code, error: result.error }, 'Scan run aborted');
        await report(fatalNotification(request.tool, request.environment, result.error, result.code), log);
      }
      timer.end();
      return result;
    },
  };
}
