/**
 * Domain types for scan configuration, targets, results and verdicts.
 */

import type { ErrorCode } from './core';

export const SCAN_MODALITIES = ['ssh', 'winrm', 'docker', 'k8s', 'github', 'api'] as const;

/** Scan protocol used against a target */
export type ScanModality = (typeof SCAN_MODALITIES)[number];

/**
 * A scanned product and the repository its configuration lives in
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly repository: string;
}

export interface HostTargetSpec {
  readonly host: string;
  readonly port?: number;
}

export interface ContainerTargetSpec {
  readonly container: string;
}

/** Declared target entry, shape depends on the scan modality */
export type TargetSpec = HostTargetSpec | ContainerTargetSpec;

export function isHostTargetSpec(spec: TargetSpec): spec is HostTargetSpec {
  return 'host' in spec;
}

export interface EnvironmentConfig {
  readonly name: string;
  readonly scoreThreshold: number;
  readonly queue: string;
  readonly targets: readonly TargetSpec[];
  readonly namespace?: string;
  readonly context?: string;
  readonly org?: string;
}

export interface ScanConfig {
  readonly scanModality: ScanModality;
  readonly environments: Readonly<Record<string, EnvironmentConfig>>;
}

/** Descriptor resolved for one tool and environment */
export interface ResolvedScanConfig {
  readonly tool: ToolDescriptor;
  readonly ref: string;
  readonly config: ScanConfig;
  readonly environment: EnvironmentConfig;
}

/**
 * Concrete scan target. `address` is the stable identifier used in results
 * and file names; the remaining fields feed the engine invocation.
 */
export type ScanTarget =
  | { readonly kind: 'ssh'; readonly address: string; readonly host: string; readonly port: number }
  | { readonly kind: 'winrm'; readonly address: string; readonly host: string; readonly port: number }
  | { readonly kind: 'docker'; readonly address: string; readonly container: string }
  | {
      readonly kind: 'k8s';
      readonly address: string;
      readonly namespace: string;
      readonly context?: string;
    }
  | { readonly kind: 'github'; readonly address: string; readonly org: string }
  | { readonly kind: 'api'; readonly address: string };

export interface PolicyFile {
  /** File name, unique within a bundle */
  readonly name: string;
  /** Local path inside the run-scoped working area */
  readonly path: string;
  readonly source: 'subdirectory' | 'root';
}

export interface PolicyBundle {
  readonly tool: string;
  readonly ref: string;
  readonly directory: string;
  readonly files: readonly PolicyFile[];
}

export type ThresholdDocument = Readonly<Record<string, unknown>>;

export interface EffectiveThresholds {
  readonly scoreThreshold: number;
  readonly values: ThresholdDocument;
  /** Persisted YAML artifact handed to the engine */
  readonly path: string;
}

export type ScanStatus = 'success' | 'failure' | 'error';

export interface ScanResult {
  readonly target: string;
  readonly status: ScanStatus;
  readonly exitCode: number | null;
  readonly output: unknown;
  readonly outputPath: string;
  readonly timestamp: string;
  readonly durationMs: number;
  readonly error?: string;
  readonly code?: ErrorCode;
}

export type Verdict = 'PASS' | 'FAIL';

export interface RunVerdict {
  readonly tool: string;
  readonly environment: string;
  readonly verdict: Verdict;
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly errored: number;
  readonly scoreThreshold: number;
  readonly results: readonly ScanResult[];
}

export type NotificationStyle = 'success' | 'error';

/** Pass/fail notification for the reporting sink */
export interface Notification {
  /** Stable context identifier, `scan-<tool>` */
  readonly context: string;
  readonly style: NotificationStyle;
  readonly body: string;
}
