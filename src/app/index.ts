/**
 * Application entry point
 *
 * Builds the scan pipeline from validated configuration. Infrastructure
 * adapters (fetcher, engine, reporting sink) can be replaced, which is how
 * tests run the pipeline without network or an engine binary.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '@/config/app-config';
import { createLogger } from '@/lib/logger';
import { type ConfigFetcher, createGitHubConfigFetcher } from '@/infra/github/config-fetcher';
import { type ScanEngine, createCliScanEngine } from '@/infra/scanner/scan-engine';
import {
  type ReportingSink,
  createAgentReportingSink,
  createLogReportingSink,
} from '@/infra/pipeline/reporting-sink';
import { type ScanConfigResolver, createScanConfigResolver } from '@/services/scan-config-resolver';
import { createPolicyBundleLoader } from '@/services/policy-bundle-loader';
import { createThresholdMerger } from '@/services/threshold-merger';
import { createScanDispatcher } from '@/services/scan-dispatcher';
import { type ScanRunner, createScanRunner } from './scan-run';
import { type FleetMatrixGenerator, createFleetMatrixGenerator } from './fleet-matrix';
import { type FleetRunner, createFleetRunner } from './fleet-runner';

export interface AppOverrides {
  logger?: Logger;
  fetcher?: ConfigFetcher;
  engine?: ScanEngine;
  sink?: ReportingSink;
}

export interface App {
  config: AppConfig;
  logger: Logger;
  resolver: ScanConfigResolver;
  scanRunner: ScanRunner;
  /** Org must be known before fleet components exist */
  createFleetMatrix(org: string): FleetMatrixGenerator;
  createFleetRunner(org: string): FleetRunner;
}

export function createApp(config: AppConfig, overrides: AppOverrides = {}): App {
  const logger = overrides.logger ?? createLogger({ name: 'fleet-scan', level: config.logLevel });

  const fetcher =
    overrides.fetcher ??
    createGitHubConfigFetcher({
      apiUrl: config.source.apiUrl,
      timeoutMs: config.scan.fetchTimeoutMs,
      logger,
      ...(config.source.token !== undefined && { token: config.source.token }),
    });
  const engine = overrides.engine ?? createCliScanEngine(config.scan.engineBin, logger);
  const sink =
    overrides.sink ??
    (config.reporting.sink === 'agent'
      ? createAgentReportingSink(config.reporting.agentBin, logger)
      : createLogReportingSink(logger));

  const resolver = createScanConfigResolver({
    fetcher,
    repoPrefix: config.source.repoPrefix,
    logger,
  });

  const scanRunner = createScanRunner({
    resolver,
    policyLoader: createPolicyBundleLoader({ fetcher, logger }),
    thresholdMerger: createThresholdMerger({ fetcher, logger }),
    dispatcher: createScanDispatcher({
      engine,
      logger,
      timeoutMs: config.scan.timeoutMs,
      concurrency: config.scan.targetConcurrency,
      winrmAdminUser: config.scan.winrmAdminUser,
    }),
    sink,
    workDir: config.scan.workDir,
    logger,
  });

  return {
    config,
    logger,
    resolver,
    scanRunner,
    createFleetMatrix(org) {
      return createFleetMatrixGenerator({
        resolver,
        logger,
        options: {
          org,
          ref: config.source.ref,
          command: config.plan.command,
          workDir: config.scan.workDir,
          timeoutMinutes: config.plan.timeoutMinutes,
          retryLimit: config.plan.retryLimit,
          retryExitStatuses: config.plan.retryExitStatuses,
        },
      });
    },
    createFleetRunner(org) {
      return createFleetRunner({
        scanRunner,
        org,
        ref: config.source.ref,
        concurrency: config.fleet.concurrency,
        logger,
      });
    },
  };
}

export type { ScanRunner, ScanRunRequest, ScanRunOutcome } from './scan-run';
export type { FleetMatrixGenerator } from './fleet-matrix';
export type { FleetRunner, FleetRunReport, FleetToolOutcome } from './fleet-runner';
