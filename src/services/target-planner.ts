/**
 * Target Planner
 *
 * Expands an environment's declared targets into concrete scan targets.
 * A manual override replaces the declared list with a single target whose
 * address is the override string.
 */

import {
  type EnvironmentConfig,
  type Result,
  type ScanModality,
  type ScanTarget,
  CodedFailure,
  ErrorCode,
  Success,
  isHostTargetSpec,
} from '@/types';
import { ENVIRONMENT_DEFAULTS } from '@/config/constants';
import { ERROR_MESSAGES } from '@/lib/errors';

export interface PlanTargetsRequest {
  tool: string;
  modality: ScanModality;
  environment: EnvironmentConfig;
  manualTarget?: string;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled scan modality: ${String(value)}`);
}

/** Split `host[:port]`; the port is only taken when it is numeric */
function splitHostPort(address: string, defaultPort: number): { host: string; port: number } {
  const match = /^(.*):(\d{1,5})$/.exec(address);
  if (match?.[1] && match[2]) {
    const port = Number(match[2]);
    if (port >= 1 && port <= 65535) return { host: match[1], port };
  }
  return { host: address, port: defaultPort };
}

function k8sTarget(namespace: string, context: string | undefined, address?: string): ScanTarget {
  const defaultAddress = context ? `${context}/${namespace}` : namespace;
  return context
    ? { kind: 'k8s', address: address ?? defaultAddress, namespace, context }
    : { kind: 'k8s', address: address ?? defaultAddress, namespace };
}

function manualTargetFor(
  modality: ScanModality,
  environment: EnvironmentConfig,
  address: string,
): ScanTarget {
  switch (modality) {
    case 'ssh':
      return { kind: 'ssh', address, ...splitHostPort(address, ENVIRONMENT_DEFAULTS.sshPort) };
    case 'winrm':
      return { kind: 'winrm', address, ...splitHostPort(address, ENVIRONMENT_DEFAULTS.winrmPort) };
    case 'docker':
      return { kind: 'docker', address, container: address };
    case 'k8s':
      // The override names a namespace; the cluster context still comes from the environment
      return k8sTarget(address, environment.context, address);
    case 'github':
      return { kind: 'github', address, org: address };
    case 'api':
      return { kind: 'api', address };
    default:
      return assertNever(modality);
  }
}

function declaredTargetsFor(modality: ScanModality, environment: EnvironmentConfig): ScanTarget[] {
  switch (modality) {
    case 'ssh':
    case 'winrm': {
      const isSsh = modality === 'ssh';
      const defaultPort = isSsh ? ENVIRONMENT_DEFAULTS.sshPort : ENVIRONMENT_DEFAULTS.winrmPort;
      return environment.targets.filter(isHostTargetSpec).map((spec): ScanTarget => {
        const port = spec.port ?? defaultPort;
        const address = `${spec.host}:${port}`;
        return isSsh
          ? { kind: 'ssh', address, host: spec.host, port }
          : { kind: 'winrm', address, host: spec.host, port };
      });
    }
    case 'docker':
      return environment.targets.flatMap((spec): ScanTarget[] =>
        'container' in spec ? [{ kind: 'docker', address: spec.container, container: spec.container }] : [],
      );
    case 'k8s':
      return [
        k8sTarget(environment.namespace ?? ENVIRONMENT_DEFAULTS.k8sNamespace, environment.context),
      ];
    case 'github':
      return environment.org ? [{ kind: 'github', address: environment.org, org: environment.org }] : [];
    case 'api':
      return [{ kind: 'api', address: ENVIRONMENT_DEFAULTS.apiTarget }];
    default:
      return assertNever(modality);
  }
}

/**
 * Produce the ordered, non-empty list of targets for one run
 */
export function planTargets(request: PlanTargetsRequest): Result<ScanTarget[]> {
  const { tool, modality, environment } = request;
  const manual = request.manualTarget;

  const targets = manual !== undefined && manual.trim() !== ''
    ? [manualTargetFor(modality, environment, manual)]
    : declaredTargetsFor(modality, environment);

  if (targets.length === 0) {
    return CodedFailure(ErrorCode.NoTargetsResolved, ERROR_MESSAGES.NO_TARGETS(tool, environment.name), {
      message: 'No scan targets resolved',
      hint:
        modality === 'github'
          ? 'github scans need an org in the environment block'
          : 'Declare targets for the environment or pass a manual target',
    });
  }
  return Success(targets);
}
