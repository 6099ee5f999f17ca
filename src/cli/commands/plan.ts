/**
 * `plan` command: emit the fleet pipeline for one environment
 */

import { Command } from 'commander';
import { EXIT_CODES } from '@/lib/errors';
import { loadRoster } from '@/services/tool-roster';
import { type CliContext, resolveOrg, runWithApp } from '../context';
import { formatError, formatFailure } from '../error-formatting';
import { isPlanFormat, renderPlan } from '../render';

interface PlanCommandOptions {
  env: string;
  roster?: string;
  org?: string;
  format: string;
}

export function createPlanCommand(ctx: CliContext, globals: () => { logLevel?: string }): Command {
  return new Command('plan')
    .description('Generate pipeline steps for every roster tool that defines the environment')
    .requiredOption('--env <name>', 'environment to plan')
    .option('--roster <file>', 'roster file (default: FLEET_ROSTER or config/tools.yml)')
    .option('--org <org>', 'organization owning the configuration repositories')
    .option('--format <format>', 'output format: yaml, json', 'yaml')
    .action(async (options: PlanCommandOptions) => {
      await runWithApp(ctx, globals(), async (app) => {
        const { format } = options;
        if (!isPlanFormat(format)) {
          ctx.io.err(formatError('Unsupported format', format));
          return EXIT_CODES.CONFIG_ERROR;
        }
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

        const plan = await app.createFleetMatrix(org).generate(roster.value, options.env);
        ctx.io.out(renderPlan(plan, format));
        return EXIT_CODES.PASS;
      });
    });
}
