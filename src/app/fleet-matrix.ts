/**
 * Fleet Matrix Generator
 *
 * Walks the tool roster, resolves each tool's descriptor for one environment
 * and emits one pipeline step per qualifying tool plus a trailing summary
 * step. Only descriptors are read here; policies, thresholds and targets are
 * resolved by each step when it runs.
 */

import yaml from 'js-yaml';
import type { Logger } from 'pino';
import type {
  FleetPlan,
  PlanEntry,
  RetryPolicy,
  SummaryEntry,
  ToolPlanState,
} from '@/types';
import type { ScanConfigResolver } from '@/services/scan-config-resolver';
import { isValidToolName } from '@/services/tool-roster';
import { MODALITY_LABELS } from '@/config/constants';

export const SUMMARY_STEP_KEY = 'fleet-summary';

export interface FleetMatrixOptions {
  org: string;
  ref: string;
  /** Executable invoked by each step, e.g. `fleet-scan` */
  command: string;
  workDir: string;
  timeoutMinutes: number;
  retryLimit: number;
  /** Exit statuses that count as infrastructure failures and are retried */
  retryExitStatuses: readonly number[];
}

export interface FleetMatrixGenerator {
  generate(roster: readonly string[], environment: string): Promise<FleetPlan>;
}

export function stepKeyForTool(tool: string): string {
  return `scan-${tool}`;
}

export function buildRetryPolicy(exitStatuses: readonly number[], limit: number): RetryPolicy {
  return { automatic: exitStatuses.map((exitStatus) => ({ exitStatus, limit })) };
}

export function buildSummaryEntry(
  command: string,
  environment: string,
  entries: readonly PlanEntry[],
): SummaryEntry {
  return {
    label: ':clipboard: Fleet summary',
    key: SUMMARY_STEP_KEY,
    command: `${command} summarize --env ${environment}`,
    dependsOn: entries.map((entry) => entry.key),
    allowDependencyFailure: true,
  };
}

export function createFleetMatrixGenerator(deps: {
  resolver: ScanConfigResolver;
  options: FleetMatrixOptions;
  logger: Logger;
}): FleetMatrixGenerator {
  const { resolver, options } = deps;
  const log = deps.logger.child({ module: 'fleet-matrix' });
  const retry = buildRetryPolicy(options.retryExitStatuses, options.retryLimit);

  async function planTool(tool: string, environment: string): Promise<ToolPlanState> {
    if (!isValidToolName(tool)) {
      return { tool, state: 'Skipped', reason: `Invalid tool name: ${tool}` };
    }

    const resolved = await resolver.resolve({
      tool,
      org: options.org,
      ref: options.ref,
      environment,
    });
    if (!resolved.ok) {
      return {
        tool,
        state: 'Skipped',
        reason: resolved.error,
        ...(resolved.code !== undefined && { code: resolved.code }),
      };
    }

    const { emoji, label } = MODALITY_LABELS[resolved.value.config.scanModality];
    return {
      tool,
      state: 'Planned',
      entry: {
        label: `${emoji} ${tool} (${label})`,
        key: stepKeyForTool(tool),
        command: `${options.command} scan --tool ${tool} --env ${environment}`,
        env: { SCAN_TOOL: tool, SCAN_ENVIRONMENT: environment },
        queue: resolved.value.environment.queue,
        timeoutMinutes: options.timeoutMinutes,
        retry,
        artifactPaths: `${options.workDir}/${tool}/results/*.json`,
      },
    };
  }

  return {
    async generate(roster, environment) {
      // Descriptor lookups are independent; order of the plan follows the roster
      const states = await Promise.all(roster.map((tool) => planTool(tool, environment)));

      const entries: PlanEntry[] = [];
      for (const state of states) {
        if (state.state === 'Planned') {
          entries.push(state.entry);
        } else {
          log.info({ tool: state.tool, code: state.code, reason: state.reason }, 'Tool skipped');
        }
      }

      log.info(
        { environment, planned: entries.length, skipped: states.length - entries.length },
        'Fleet plan generated',
      );

      return {
        environment,
        entries,
        summary: buildSummaryEntry(options.command, environment, entries),
        states,
      };
    },
  };
}

/**
 * Pipeline document in the scheduler's `steps:` format
 */
export function toPipelineSteps(plan: FleetPlan): Record<string, unknown> {
  const steps: Array<Record<string, unknown>> = plan.entries.map((entry) => ({
    label: entry.label,
    key: entry.key,
    command: entry.command,
    env: { ...entry.env },
    agents: { queue: entry.queue },
    timeout_in_minutes: entry.timeoutMinutes,
    retry: {
      automatic: entry.retry.automatic.map((rule) => ({
        exit_status: rule.exitStatus,
        limit: rule.limit,
      })),
    },
    artifact_paths: entry.artifactPaths,
  }));

  steps.push({
    label: plan.summary.label,
    key: plan.summary.key,
    command: plan.summary.command,
    depends_on: [...plan.summary.dependsOn],
    allow_dependency_failure: plan.summary.allowDependencyFailure,
  });

  return { steps };
}

export function renderPipelineYaml(plan: FleetPlan): string {
  return yaml.dump(toPipelineSteps(plan), { lineWidth: -1, noRefs: true });
}
