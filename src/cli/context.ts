/**
 * Process boundary for CLI commands: output streams, exit status, signals and
 * application construction. Commands only talk to this interface.
 */

import { type App, createApp } from '@/app';
import { createAppConfig } from '@/config/app-config';
import { EXIT_CODES, extractErrorMessage } from '@/lib/errors';
import { formatError } from './error-formatting';

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

export interface CliContext {
  io: CliIO;
  /** @throws Error when configuration does not validate */
  loadApp(settings: { logLevel?: string }): App;
  setExitCode(code: number): void;
  /** Register an interrupt handler; returns a function that removes it */
  onInterrupt(handler: () => void): () => void;
}

export function createProcessContext(): CliContext {
  return {
    io: {
      out: (text) => process.stdout.write(`${text}\n`),
      err: (text) => process.stderr.write(`${text}\n`),
    },
    loadApp({ logLevel }) {
      const env = logLevel ? { ...process.env, LOG_LEVEL: logLevel } : process.env;
      return createApp(createAppConfig(env));
    },
    setExitCode(code) {
      process.exitCode = code;
    },
    onInterrupt(handler) {
      process.once('SIGINT', handler);
      return () => {
        process.removeListener('SIGINT', handler);
      };
    },
  };
}

/**
 * Build the application and run a command body against it. Configuration
 * problems exit with the configuration status; anything thrown by the body is
 * treated as an infrastructure failure.
 */
export async function runWithApp(
  ctx: CliContext,
  settings: { logLevel?: string },
  body: (app: App) => Promise<number>,
): Promise<void> {
  let app: App;
  try {
    app = ctx.loadApp(settings);
  } catch (error) {
    ctx.io.err(formatError('Invalid configuration', error));
    ctx.setExitCode(EXIT_CODES.CONFIG_ERROR);
    return;
  }

  try {
    ctx.setExitCode(await body(app));
  } catch (error) {
    app.logger.error({ error: extractErrorMessage(error) }, 'Command failed');
    ctx.io.err(formatError('Command failed', error));
    ctx.setExitCode(EXIT_CODES.INFRASTRUCTURE_ERROR);
  }
}

/**
 * `--org` flag, then SCAN_ORG
 */
export function resolveOrg(app: App, flag: string | undefined): string | undefined {
  return flag ?? app.config.source.org;
}
