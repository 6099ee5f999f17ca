/**
 * Public API for the fleet compliance scanner
 */

export { createApp } from './app';
export type {
  App,
  AppOverrides,
  ScanRunner,
  ScanRunRequest,
  ScanRunOutcome,
  FleetMatrixGenerator,
  FleetRunner,
  FleetRunReport,
  FleetToolOutcome,
} from './app';
export { renderPipelineYaml, toPipelineSteps } from './app/fleet-matrix';
export { summarizeFleet, formatFleetSummary } from './app/fleet-summary';

export { createAppConfig, type AppConfig } from './config';
export { createLogger } from './lib/logger';
export { EXIT_CODES, exitCodeFor } from './lib/errors';

export type { ConfigFetcher, FetchOutcome, RepoLocation, DirectoryEntry } from './infra/github/config-fetcher';
export type { ScanEngine, EngineInvocation, EngineOutcome } from './infra/scanner/scan-engine';
export type { ReportingSink } from './infra/pipeline/reporting-sink';

export { parseScanConfig, selectEnvironment } from './services/scan-config-resolver';
export { mergeThresholds, resolveEffectiveThresholds } from './services/threshold-merger';
export { planTargets } from './services/target-planner';
export { buildEngineArgs } from './services/scan-dispatcher';
export { aggregateResults, formatSummary } from './services/result-aggregator';
export { parseRoster, loadRoster } from './services/tool-roster';

export * from './types';
