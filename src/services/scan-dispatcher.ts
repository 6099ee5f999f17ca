/**
 * Scan Dispatcher
 *
 * Invokes the scan engine once per target and records a ScanResult for each.
 * Targets are independent: a failed or errored target never stops the rest.
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import type { Logger } from 'pino';
import {
  type EffectiveThresholds,
  type PolicyBundle,
  type ScanResult,
  type ScanStatus,
  type ScanTarget,
  ErrorCode,
} from '@/types';
import type { EngineOutcome, ScanEngine } from '@/infra/scanner/scan-engine';
import { TimeoutError, createLimiter, withTimeout } from '@/lib/concurrency';
import { extractErrorMessage } from '@/lib/errors';
import { type RunPaths, resultPathsFor } from '@/lib/run-paths';

/** Exit status the engine uses when the score is below the threshold */
const ENGINE_POLICY_FAILURE_EXIT = 1;

export interface EngineArgsContext {
  policyFiles: readonly string[];
  thresholdsPath: string;
  scoreThreshold: number;
  outputPath: string;
  winrmAdminUser: string;
}

function addressingArgs(target: ScanTarget, winrmAdminUser: string): string[] {
  switch (target.kind) {
    case 'ssh':
      return ['scan', 'ssh', target.host, '--port', String(target.port)];
    case 'winrm':
      return ['scan', 'winrm', `${winrmAdminUser}@${target.host}`];
    case 'docker':
      return ['scan', 'docker', 'container', target.container];
    case 'k8s':
      return [
        'scan',
        'k8s',
        ...(target.context ? ['--context', target.context] : []),
        '--namespace',
        target.namespace,
      ];
    case 'github':
      return ['scan', 'github', 'org', target.org];
    case 'api':
      return ['scan', 'local'];
  }
}

/**
 * Engine arguments for one target: modality addressing first, then the
 * flags every modality receives.
 */
export function buildEngineArgs(target: ScanTarget, context: EngineArgsContext): string[] {
  return [
    ...addressingArgs(target, context.winrmAdminUser),
    ...context.policyFiles.flatMap((file) => ['--policy-bundle', file]),
    '--config',
    context.thresholdsPath,
    '--score-threshold',
    String(context.scoreThreshold),
    '--output',
    'json',
    '--output-target',
    context.outputPath,
  ];
}

export function classifyOutcome(outcome: EngineOutcome): {
  status: ScanStatus;
  code?: ErrorCode;
  error?: string;
} {
  if (outcome.spawnError !== undefined) {
    return { status: 'error', code: ErrorCode.InfrastructureError, error: outcome.spawnError };
  }
  if (outcome.timedOut) {
    return { status: 'error', code: ErrorCode.InfrastructureError, error: 'scan timed out' };
  }
  if (outcome.exitCode === 0) {
    return { status: 'success' };
  }
  if (outcome.exitCode === ENGINE_POLICY_FAILURE_EXIT) {
    return {
      status: 'failure',
      code: ErrorCode.TargetScanFailure,
      error: 'score below threshold or policy failure',
    };
  }
  return {
    status: 'error',
    code: ErrorCode.InfrastructureError,
    error: `engine exited with status ${String(outcome.exitCode)}`,
  };
}

async function readStructuredOutput(path: string): Promise<unknown> {
  try {
    const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
    return parsed;
  } catch {
    // Missing or partial output is recorded as null; the status carries the failure
    return null;
  }
}

export interface DispatchRequest {
  tool: string;
  targets: readonly ScanTarget[];
  policies: PolicyBundle;
  thresholds: EffectiveThresholds;
  paths: RunPaths;
}

export interface ScanDispatcher {
  dispatch(request: DispatchRequest): Promise<ScanResult[]>;
}

export interface ScanDispatcherDeps {
  engine: ScanEngine;
  logger: Logger;
  timeoutMs: number;
  concurrency: number;
  winrmAdminUser: string;
}

export function createScanDispatcher(deps: ScanDispatcherDeps): ScanDispatcher {
  const { engine, timeoutMs, winrmAdminUser } = deps;

  return {
    async dispatch({ tool, targets, policies, thresholds, paths }) {
      const log = deps.logger.child({ module: 'scan-dispatcher', tool });
      // The results directory holds exactly this run's artifacts
      await rm(paths.results, { recursive: true, force: true });
      await mkdir(paths.results, { recursive: true });

      const limit = createLimiter(deps.concurrency);
      const policyFiles = policies.files.map((file) => file.path);
      const outputPaths = resultPathsFor(
        paths,
        targets.map((target) => target.address),
      );

      const scanOne = async (target: ScanTarget, outputPath: string): Promise<ScanResult> => {
        const args = buildEngineArgs(target, {
          policyFiles,
          thresholdsPath: thresholds.path,
          scoreThreshold: thresholds.scoreThreshold,
          outputPath,
          winrmAdminUser,
        });

        const startedAt = Date.now();
        let outcome: EngineOutcome;
        try {
          outcome = await withTimeout(
            engine.run({ args, timeoutMs }),
            timeoutMs,
            `scan ${target.address}`,
          );
        } catch (error) {
          outcome =
            error instanceof TimeoutError
              ? { exitCode: null, stdout: '', stderr: '', timedOut: true }
              : {
                  exitCode: null,
                  stdout: '',
                  stderr: '',
                  timedOut: false,
                  spawnError: extractErrorMessage(error),
                };
        }
        const durationMs = Date.now() - startedAt;
        const classified = classifyOutcome(outcome);

        let output = await readStructuredOutput(outputPath);
        if (output === null) {
          // Every target gets an artifact, even when the engine wrote nothing
          const artifact = {
            target: target.address,
            status: classified.status,
            exitCode: outcome.exitCode,
            error: classified.error ?? null,
          };
          output = artifact;
          try {
            await writeFile(outputPath, JSON.stringify(artifact, null, 2));
          } catch (error) {
            log.warn(
              { target: target.address, error: extractErrorMessage(error) },
              'Could not write result artifact',
            );
          }
        }

        const result: ScanResult = {
          target: target.address,
          status: classified.status,
          exitCode: outcome.exitCode,
          output,
          outputPath,
          timestamp: new Date(startedAt).toISOString(),
          durationMs,
          ...(classified.error !== undefined && { error: classified.error }),
          ...(classified.code !== undefined && { code: classified.code }),
        };

        if (result.status === 'success') {
          log.info({ target: target.address, durationMs }, 'Target passed');
        } else {
          log.warn(
            {
              target: target.address,
              status: result.status,
              exitCode: result.exitCode,
              code: result.code,
              error: result.error,
            },
            'Target did not pass',
          );
        }
        return result;
      };

      return Promise.all(
        targets.map((target, index) => limit(() => scanOne(target, outputPaths[index]))),
      );
    },
  };
}
