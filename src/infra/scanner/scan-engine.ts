/**
 * Scan Engine
 *
 * Runs the external compliance scanner CLI. The engine owns policy
 * evaluation; this adapter only spawns it, bounds it with a timeout and
 * reports how it exited.
 */

import { execFile } from 'node:child_process';
import type { Logger } from 'pino';

export interface EngineInvocation {
  readonly args: readonly string[];
  readonly timeoutMs: number;
}

export interface EngineOutcome {
  /** Process exit code; null when the process never exited normally */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  /** Set when the process could not be started (e.g. binary missing) */
  readonly spawnError?: string;
}

export interface ScanEngine {
  run(invocation: EngineInvocation): Promise<EngineOutcome>;
}

// Large result sets are written to the output file, stdout stays small
const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Create an engine that executes `bin` with execFile (no shell)
 */
export function createCliScanEngine(bin: string, logger: Logger): ScanEngine {
  const log = logger.child({ module: 'scan-engine', bin });

  return {
    run({ args, timeoutMs }) {
      log.debug({ args }, 'Executing scan engine');

      return new Promise<EngineOutcome>((resolve) => {
        execFile(
          bin,
          [...args],
          { timeout: timeoutMs, maxBuffer: MAX_BUFFER, encoding: 'utf8' },
          (error, stdout, stderr) => {
            if (stderr) {
              log.debug({ stderr: stderr.slice(0, 2000) }, 'Scan engine stderr output');
            }

            if (!error) {
              resolve({ exitCode: 0, stdout, stderr, timedOut: false });
              return;
            }

            if (typeof error.code === 'number') {
              resolve({
                exitCode: error.code,
                stdout,
                stderr,
                timedOut: error.killed === true,
              });
              return;
            }

            if (error.killed === true) {
              resolve({ exitCode: null, stdout, stderr, timedOut: true });
              return;
            }

            resolve({
              exitCode: null,
              stdout,
              stderr,
              timedOut: false,
              spawnError: error.message,
            });
          },
        );
      });
    },
  };
}
