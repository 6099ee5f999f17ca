/**
 * Tool roster and descriptor construction
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { z } from 'zod';
import { type Result, type ToolDescriptor, Success, Failure } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

const TOOL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const RosterSchema = z.object({
  tools: z.array(z.string().regex(TOOL_NAME_PATTERN, 'invalid tool name')).min(1),
});

export function isValidToolName(name: string): boolean {
  return TOOL_NAME_PATTERN.test(name);
}

/**
 * Repository name is the configured prefix followed by the tool name
 */
export function repoNameForTool(tool: string, repoPrefix: string): string {
  return `${repoPrefix}${tool}`;
}

export function createToolDescriptor(name: string, repoPrefix: string): ToolDescriptor {
  return Object.freeze({ name, repository: repoNameForTool(name, repoPrefix) });
}

/**
 * Parse a roster document (`tools:` list). Duplicates keep their first position.
 */
export function parseRoster(content: string, source = 'roster'): Result<string[]> {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    return Failure(`Invalid roster ${source}: ${extractErrorMessage(error)}`);
  }

  const parsed = RosterSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return Failure(`Invalid roster ${source}: ${issues}`, {
      message: 'Roster validation failed',
      hint: 'The roster must contain a non-empty `tools:` list of tool names',
    });
  }

  return Success([...new Set(parsed.data.tools)]);
}

export async function loadRoster(path: string): Promise<Result<string[]>> {
  try {
    const content = await readFile(path, 'utf8');
    return parseRoster(content, path);
  } catch (error) {
    return Failure(`Failed to read roster ${path}: ${extractErrorMessage(error)}`);
  }
}
