/**
 * `run` command: scan the whole fleet locally
 */

import { Command } from 'commander';
import { EXIT_CODES } from '@/lib/errors';
import { loadRoster } from '@/services/tool-roster';
import { fleetExitCode } from '@/app/fleet-runner';
import { type CliContext, resolveOrg, runWithApp } from '../context';
import { formatError, formatFailure } from '../error-formatting';
import { renderFleetReport } from '../render';

interface RunCommandOptions {
  env: string;
  roster?: string;
  org?: string;
}

export function createRunCommand(ctx: CliContext, globals: () => { logLevel?: string }): Command {
  return new Command('run')
    .description('Run the scan pipeline for every roster tool (interrupt cancels tools not yet started)')
    .requiredOption('--env <name>', 'environment to scan')
    .option('--roster <file>', 'roster file (default: FLEET_ROSTER or config/tools.yml)')
    .option('--org <org>', 'organization owning the configuration repositories')
    .action(async (options: RunCommandOptions) => {
      await runWithApp(ctx, globals(), async (app) => {
        const org = resolveOrg(app, options.org);
        if (!org) {
          ctx.io.err(formatError('No organization', 'pass --org or set SCAN_ORG'));
          return EXIT_CODES.CONFIG_ERROR;
        }

        const roster = await loadRoster(options.roster ?? app.config.fleet.roster);
        if (!roster.ok) {
          ctx.io.err(formatFailure(roster));
          return EXIT_CODES.CONFIG_ERROR;
        }

        const controller = new AbortController();
        const unsubscribe = ctx.onInterrupt(() => {
          app.logger.warn('Interrupted, cancelling tools not yet started');
          controller.abort();
        });
        try {
          const report = await app
            .createFleetRunner(org)
            .run(roster.value, options.env, { signal: controller.signal });
          ctx.io.out(renderFleetReport(report));
          return fleetExitCode(report);
        } finally {
          unsubscribe();
        }
      });
    });
}
