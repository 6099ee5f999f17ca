/**
 * `summarize` command: fleet table over the verdicts in the working area
 */

import { Command } from 'commander';
import { EXIT_CODES } from '@/lib/errors';
import { formatFleetSummary, summarizeFleet } from '@/app/fleet-summary';
import { type CliContext, runWithApp } from '../context';

interface SummarizeCommandOptions {
  workDir?: string;
  env?: string;
}

export function createSummarizeCommand(
  ctx: CliContext,
  globals: () => { logLevel?: string },
): Command {
  return new Command('summarize')
    .description('Summarize the verdicts written by earlier scan runs')
    .option('--work-dir <dir>', 'working area (default: SCAN_WORK_DIR or .fleet-scan)')
    .option('--env <name>', 'only include verdicts for this environment')
    .action(async (options: SummarizeCommandOptions) => {
      await runWithApp(ctx, globals(), async (app) => {
        const summary = await summarizeFleet(options.workDir ?? app.config.scan.workDir, {
          logger: app.logger,
          ...(options.env !== undefined && { environment: options.env }),
        });
        ctx.io.out(formatFleetSummary(summary));
        return summary.overall === 'PASS' ? EXIT_CODES.PASS : EXIT_CODES.SCAN_FAILED;
      });
    });
}
