/**
 * Unified Application Configuration
 *
 * Single source of truth for runtime configuration with Zod validation.
 * Environment variables are read once; CLI flags are applied on top by the caller.
 */

import { z } from 'zod';
import { DEFAULT_TIMEOUTS } from './constants';

const DEFAULT_CONFIG = {
  REF: 'main',
  REPO_PREFIX: 'compliance-',
  GITHUB_API_URL: 'https://api.github.com',
  WORK_DIR: '.fleet-scan',
  ENGINE_BIN: 'cnspec',
  TARGET_CONCURRENCY: 4,
  FLEET_CONCURRENCY: 2,
  WINRM_ADMIN_USER: 'Administrator',
  ROSTER: 'config/tools.yml',
  PLAN_TIMEOUT_MINUTES: 60,
  PLAN_RETRY_LIMIT: 2,
  // -1 agent lost, 255 agent stopped, 3 infrastructure error from `fleet-scan scan`
  PLAN_RETRY_EXIT_STATUSES: [-1, 255, 3],
  PLAN_COMMAND: 'fleet-scan',
  AGENT_BIN: 'buildkite-agent',
} as const;

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const AppConfigSchema = z.object({
  nodeEnv: NodeEnvSchema,
  logLevel: LogLevelSchema,
  source: z.object({
    org: z.string().min(1).optional(),
    ref: z.string().min(1).default(DEFAULT_CONFIG.REF),
    repoPrefix: z.string().default(DEFAULT_CONFIG.REPO_PREFIX),
    apiUrl: z.string().url().default(DEFAULT_CONFIG.GITHUB_API_URL),
    token: z.string().min(1).optional(),
  }),
  scan: z.object({
    engineBin: z.string().min(1).default(DEFAULT_CONFIG.ENGINE_BIN),
    workDir: z.string().min(1).default(DEFAULT_CONFIG.WORK_DIR),
    timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.scan),
    fetchTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.fetch),
    targetConcurrency: z.coerce.number().int().positive().default(DEFAULT_CONFIG.TARGET_CONCURRENCY),
    winrmAdminUser: z.string().min(1).default(DEFAULT_CONFIG.WINRM_ADMIN_USER),
  }),
  fleet: z.object({
    roster: z.string().min(1).default(DEFAULT_CONFIG.ROSTER),
    concurrency: z.coerce.number().int().positive().default(DEFAULT_CONFIG.FLEET_CONCURRENCY),
  }),
  plan: z.object({
    command: z.string().min(1).default(DEFAULT_CONFIG.PLAN_COMMAND),
    timeoutMinutes: z.coerce.number().int().positive().default(DEFAULT_CONFIG.PLAN_TIMEOUT_MINUTES),
    retryLimit: z.coerce.number().int().min(0).default(DEFAULT_CONFIG.PLAN_RETRY_LIMIT),
    retryExitStatuses: z
      .array(z.coerce.number().int())
      .default([...DEFAULT_CONFIG.PLAN_RETRY_EXIT_STATUSES]),
  }),
  reporting: z.object({
    sink: z.enum(['agent', 'log']).default('log'),
    agentBin: z.string().min(1).default(DEFAULT_CONFIG.AGENT_BIN),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

type Env = Record<string, string | undefined>;

/**
 * Empty strings are treated as unset so `FOO=` falls back to the default
 */
function getEnvValue(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value.trim() === '' ? undefined : value;
}

function getEnvList(env: Env, key: string): string[] | undefined {
  return getEnvValue(env, key)
    ?.split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Create configuration from environment variables and validate it
 * @throws Error when a value fails validation
 */
export function createAppConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    nodeEnv: getEnvValue(env, 'NODE_ENV'),
    logLevel: getEnvValue(env, 'LOG_LEVEL'),
    source: {
      org: getEnvValue(env, 'SCAN_ORG'),
      ref: getEnvValue(env, 'SCAN_CONFIG_REF'),
      repoPrefix: env.SCAN_REPO_PREFIX,
      apiUrl: getEnvValue(env, 'GITHUB_API_URL'),
      token: getEnvValue(env, 'GITHUB_TOKEN'),
    },
    scan: {
      engineBin: getEnvValue(env, 'SCAN_ENGINE_BIN'),
      workDir: getEnvValue(env, 'SCAN_WORK_DIR'),
      timeoutMs: getEnvValue(env, 'SCAN_TIMEOUT_MS'),
      fetchTimeoutMs: getEnvValue(env, 'FETCH_TIMEOUT_MS'),
      targetConcurrency: getEnvValue(env, 'SCAN_TARGET_CONCURRENCY'),
      winrmAdminUser: getEnvValue(env, 'WINRM_ADMIN_USER'),
    },
    fleet: {
      roster: getEnvValue(env, 'FLEET_ROSTER'),
      concurrency: getEnvValue(env, 'FLEET_CONCURRENCY'),
    },
    plan: {
      command: getEnvValue(env, 'PLAN_COMMAND'),
      timeoutMinutes: getEnvValue(env, 'PLAN_TIMEOUT_MINUTES'),
      retryLimit: getEnvValue(env, 'PLAN_RETRY_LIMIT'),
      retryExitStatuses: getEnvList(env, 'PLAN_RETRY_EXIT_STATUSES'),
    },
    reporting: {
      sink: getEnvValue(env, 'REPORTING_SINK'),
      agentBin: getEnvValue(env, 'PIPELINE_AGENT_BIN'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration validation failed: ${issues}`);
  }

  return result.data;
}
