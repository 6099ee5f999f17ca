/**
 * Command tree for the fleet-scan CLI
 */

import { Command } from 'commander';
import type { CliContext } from './context';
import { createScanCommand } from './commands/scan';
import { createPlanCommand } from './commands/plan';
import { createRunCommand } from './commands/run';
import { createSummarizeCommand } from './commands/summarize';

export function createProgram(ctx: CliContext, version: string): Command {
  const program = new Command();

  program
    .name('fleet-scan')
    .description('Fleet-wide compliance scanning against per-tool configuration repositories')
    .version(version)
    .option('--log-level <level>', 'logging level: debug, info, warn, error (default: LOG_LEVEL or info)')
    .configureOutput({
      writeOut: (text) => ctx.io.out(text.trimEnd()),
      writeErr: (text) => ctx.io.err(text.trimEnd()),
    })
    .addHelpText(
      'after',
      `

Examples:
  $ fleet-scan scan --tool vault --env production --org acme
  $ fleet-scan scan --tool vault --env production --target 10.0.0.5:22
  $ fleet-scan plan --env staging --format yaml
  $ fleet-scan run --env staging --roster config/tools.yml
  $ fleet-scan summarize --work-dir .fleet-scan

Environment Variables:
  SCAN_ORG                 Organization owning the configuration repositories
  SCAN_CONFIG_REF          Configuration ref (default: main)
  SCAN_REPO_PREFIX         Repository name prefix (default: compliance-)
  GITHUB_TOKEN             Credential for the configuration repositories
  SCAN_ENGINE_BIN          Scan engine executable (default: cnspec)
  SCAN_WORK_DIR            Working area for policies and results (default: .fleet-scan)
  REPORTING_SINK           agent or log (default: log)
  LOG_LEVEL                Logging level
`,
    );

  const globals = (): { logLevel?: string } => {
    const logLevel: unknown = program.opts().logLevel;
    return typeof logLevel === 'string' ? { logLevel } : {};
  };

  program.addCommand(createScanCommand(ctx, globals));
  program.addCommand(createPlanCommand(ctx, globals));
  program.addCommand(createRunCommand(ctx, globals));
  program.addCommand(createSummarizeCommand(ctx, globals));

  return program;
}
