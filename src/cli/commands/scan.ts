/**
 * `scan` command: full pipeline for one tool in one environment
 */

import { Command } from 'commander';
import { EXIT_CODES, exitCodeFor } from '@/lib/errors';
import { type CliContext, resolveOrg, runWithApp } from '../context';
import { formatError, formatFailure } from '../error-formatting';

interface ScanCommandOptions {
  tool: string;
  env: string;
  target?: string;
  ref?: string;
  org?: string;
}

export function createScanCommand(ctx: CliContext, globals: () => { logLevel?: string }): Command {
  return new Command('scan')
    .description('Scan every target of one tool in one environment')
    .requiredOption('--tool <name>', 'tool whose configuration repository is used')
    .requiredOption('--env <name>', 'environment declared in the scan descriptor')
    .option('--target <target>', 'scan only this target instead of the declared list')
    .option('--ref <ref>', 'configuration ref (default: SCAN_CONFIG_REF or main)')
    .option('--org <org>', 'organization owning the configuration repositories')
    .action(async (options: ScanCommandOptions) => {
      await runWithApp(ctx, globals(), async (app) => {
        const org = resolveOrg(app, options.org);
        if (!org) {
          ctx.io.err(formatError('No organization', 'pass --org or set SCAN_ORG'));
          return EXIT_CODES.CONFIG_ERROR;
        }

        const result = await app.scanRunner.run({
          tool: options.tool,
          environment: options.env,
          org,
          ref: options.ref ?? app.config.source.ref,
          ...(options.target !== undefined && { manualTarget: options.target }),
        });

        if (!result.ok) {
          ctx.io.err(formatFailure(result));
          return exitCodeFor(result.code);
        }
        ctx.io.out(result.value.summary);
        return result.value.exitCode;
      });
    });
}
