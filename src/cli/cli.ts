#!/usr/bin/env node
/**
 * fleet-scan CLI entry point
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv } from 'node:process';
import { createProcessContext } from './context';
import { formatError } from './error-formatting';
import { createProgram } from './program';
import { EXIT_CODES } from '@/lib/errors';

const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../../package.json') // dist/src/cli/ -> root
  : join(__dirname, '../../package.json'); // src/cli/ -> root

function readVersion(): string {
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  const ctx = createProcessContext();
  try {
    await createProgram(ctx, readVersion()).parseAsync(argv);
  } catch (error) {
    ctx.io.err(formatError('fleet-scan failed', error));
    ctx.setExitCode(EXIT_CODES.INFRASTRUCTURE_ERROR);
  }
}

void main();
