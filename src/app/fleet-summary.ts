/**
 * Fleet summary over the verdict files left in the working area
 */

import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import type { Logger } from 'pino';
import { extractErrorMessage } from '@/lib/errors';

const VerdictFileSchema = z.object({
  tool: z.string(),
  environment: z.string(),
  verdict: z.enum(['PASS', 'FAIL']),
  total: z.number().int().min(0),
  passed: z.number().int().min(0),
  failed: z.number().int().min(0),
  errored: z.number().int().min(0),
  scoreThreshold: z.number(),
});

export type VerdictRecord = z.infer<typeof VerdictFileSchema>;

export interface FleetSummary {
  verdicts: VerdictRecord[];
  /** Tool directories whose verdict file could not be read */
  unreadable: string[];
  overall: 'PASS' | 'FAIL';
}

async function listToolDirectories(workDir: string): Promise<string[]> {
  try {
    const entries = await readdir(workDir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }
}

/**
 * Collect `<workDir>/<tool>/verdict.json`. Tool directories without a verdict
 * (a run that stopped before aggregation) are ignored.
 */
export async function summarizeFleet(
  workDir: string,
  options: { environment?: string; logger?: Logger } = {},
): Promise<FleetSummary> {
  const verdicts: VerdictRecord[] = [];
  const unreadable: string[] = [];

  for (const tool of await listToolDirectories(workDir)) {
    const path = join(workDir, tool, 'verdict.json');
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch {
      continue;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      options.logger?.warn({ path, error: extractErrorMessage(error) }, 'Verdict is not valid JSON');
      unreadable.push(tool);
      continue;
    }
    const parsed = VerdictFileSchema.safeParse(raw);
    if (!parsed.success) {
      options.logger?.warn({ path }, 'Verdict does not match the expected shape');
      unreadable.push(tool);
      continue;
    }
    if (options.environment !== undefined && parsed.data.environment !== options.environment) {
      continue;
    }
    verdicts.push(parsed.data);
  }

  const overall =
    verdicts.length > 0 && unreadable.length === 0 && verdicts.every((v) => v.verdict === 'PASS')
      ? 'PASS'
      : 'FAIL';
  return { verdicts, unreadable, overall };
}

export function formatFleetSummary(summary: FleetSummary): string {
  if (summary.verdicts.length === 0 && summary.unreadable.length === 0) {
    return 'No verdicts found';
  }

  const toolWidth = Math.max(4, ...summary.verdicts.map((v) => v.tool.length));
  const lines = [
    `${'TOOL'.padEnd(toolWidth)}  ENVIRONMENT  VERDICT  PASSED  THRESHOLD`,
    ...summary.verdicts.map(
      (v) =>
        `${v.tool.padEnd(toolWidth)}  ${v.environment.padEnd(11)}  ${v.verdict.padEnd(7)}  ` +
        `${`${v.passed}/${v.total}`.padEnd(6)}  ${v.scoreThreshold}`,
    ),
    ...summary.unreadable.map((tool) => `${tool.padEnd(toolWidth)}  (unreadable verdict)`),
    '',
    `fleet: ${summary.overall}`,
  ];
  return lines.join('\n');
}
