/**
 * Builders for domain values used across unit tests
 */

import type { EnvironmentConfig, ScanResult } from '@/types';

export function environmentConfig(overrides: Partial<EnvironmentConfig> = {}): EnvironmentConfig {
  return {
    name: 'production',
    scoreThreshold: 80,
    queue: 'mondoo-scanners',
    targets: [],
    ...overrides,
  };
}

export function scanResult(overrides: Partial<ScanResult> = {}): ScanResult {
  return {
    target: 'v1:22',
    status: 'success',
    exitCode: 0,
    output: null,
    outputPath: '/work/vault/results/v1_22.json',
    timestamp: '2026-01-15T10:00:00.000Z',
    durationMs: 1200,
    ...overrides,
  };
}

export const VAULT_DESCRIPTOR = `
scan_type: ssh
environments:
  production:
    score_threshold: 90
    queue: secure-scanners
    targets:
      - host: v1
        port: 22
      - host: v2
  staging:
`;
