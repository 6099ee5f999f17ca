/**
 * Scriptable ScanEngine that records every invocation
 */

import { writeFile } from 'node:fs/promises';
import type { EngineInvocation, EngineOutcome, ScanEngine } from '@/infra/scanner/scan-engine';

export type EngineBehaviour = (invocation: EngineInvocation) => EngineOutcome | Promise<EngineOutcome>;

export interface FakeEngine extends ScanEngine {
  invocations: EngineInvocation[];
}

export function createFakeEngine(behaviour: EngineBehaviour): FakeEngine {
  const invocations: EngineInvocation[] = [];
  return {
    invocations,
    async run(invocation) {
      invocations.push(invocation);
      return behaviour(invocation);
    },
  };
}

export function exited(exitCode: number): EngineOutcome {
  return { exitCode, stdout: '', stderr: '', timedOut: false };
}

export function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

/** Address portion of the arguments, e.g. `['ssh', 'h1', '--port', '22']` */
export function scanSubject(args: readonly string[]): string[] {
  const end = args.indexOf('--policy-bundle');
  return args.slice(1, end >= 0 ? end : undefined);
}

/**
 * Engine that writes a JSON report to `--output-target` and exits with the
 * code chosen for the invocation
 */
export function createReportingEngine(exitCodeFor: (args: readonly string[]) => number): FakeEngine {
  return createFakeEngine(async ({ args }) => {
    const exitCode = exitCodeFor(args);
    const outputPath = flagValue(args, '--output-target');
    if (outputPath) {
      await writeFile(outputPath, JSON.stringify({ subject: scanSubject(args), exitCode }));
    }
    return exited(exitCode);
  });
}
