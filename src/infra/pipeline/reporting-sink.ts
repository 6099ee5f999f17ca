/**
 * Reporting sink and artifact upload
 *
 * Notifications and artifact upload are delegated to the pipeline agent CLI
 * when running inside a pipeline, or written to the log otherwise.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { Logger } from 'pino';
import { type Notification, type Result, Success, Failure } from '@/types';
import { extractErrorMessage } from '@/lib/errors';

const execFileAsync = promisify(execFile);

export interface ReportingSink {
  annotate(notification: Notification): Promise<Result<void>>;
  uploadArtifacts(pattern: string): Promise<Result<void>>;
}

const AGENT_TIMEOUT_MS = 60000;

/**
 * Sink backed by `buildkite-agent annotate` / `buildkite-agent artifact upload`
 */
export function createAgentReportingSink(bin: string, logger: Logger): ReportingSink {
  const log = logger.child({ module: 'reporting-sink', sink: 'agent' });

  async function runAgent(args: string[]): Promise<Result<void>> {
    try {
      await execFileAsync(bin, args, { timeout: AGENT_TIMEOUT_MS });
      return Success(undefined);
    } catch (error) {
      const message = extractErrorMessage(error);
      log.warn({ args: args.slice(0, 2), error: message }, 'Pipeline agent command failed');
      return Failure(`${bin} ${args[0] ?? ''} failed: ${message}`);
    }
  }

  return {
    annotate(notification) {
      return runAgent([
        'annotate',
        notification.body,
        '--style',
        notification.style,
        '--context',
        notification.context,
      ]);
    },
    uploadArtifacts(pattern) {
      return runAgent(['artifact', 'upload', pattern]);
    },
  };
}

/**
 * Sink that only logs; used outside a pipeline
 */
export function createLogReportingSink(logger: Logger): ReportingSink {
  const log = logger.child({ module: 'reporting-sink', sink: 'log' });
  return {
    async annotate(notification) {
      log.info(
        { context: notification.context, style: notification.style, body: notification.body },
        'Scan notification',
      );
      return Success(undefined);
    },
    async uploadArtifacts(pattern) {
      log.info({ pattern }, 'Artifacts left in place (no pipeline agent)');
      return Success(undefined);
    },
  };
}
