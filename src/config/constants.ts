/**
 * Application Constants and Defaults
 *
 * Repository layout conventions, per-environment defaults, timeouts and
 * cosmetic modality labels used in the fleet plan.
 */

import type { ScanModality } from '@/types';

/**
 * Defaults applied when an environment block omits a field
 */
export const ENVIRONMENT_DEFAULTS = {
  scoreThreshold: 80,
  queue: 'mondoo-scanners',
  sshPort: 22,
  winrmPort: 5985,
  k8sNamespace: 'default',
  apiTarget: 'local',
} as const;

/**
 * Conventional paths inside a tool's configuration repository
 */
export const REPO_LAYOUT = {
  descriptor: 'scan-config.yml',
  policyDirectory: 'policies',
  policyExtensions: ['.yml', '.yaml'],
  rootPolicySuffix: '.mql.yaml',
  baseThresholds: 'thresholds/base.yml',
  overrideThresholds: (environment: string) => `thresholds/${environment}.yml`,
} as const;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  fetch: 30000, // 30 seconds
  scan: 1800000, // 30 minutes
} as const;

/**
 * Route label shown in the pipeline for each modality
 */
export const MODALITY_LABELS: Record<ScanModality, { emoji: string; label: string }> = {
  ssh: { emoji: ':linux:', label: 'SSH' },
  winrm: { emoji: ':windows:', label: 'WinRM' },
  docker: { emoji: ':docker:', label: 'Docker' },
  k8s: { emoji: ':kubernetes:', label: 'Kubernetes' },
  github: { emoji: ':github:', label: 'GitHub' },
  api: { emoji: ':gear:', label: 'API' },
};
