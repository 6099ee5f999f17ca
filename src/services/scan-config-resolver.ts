/**
 * Scan Config Resolver
 *
 * Fetches a tool's scan descriptor, validates it and selects the requested
 * environment. Parsing is a pure function over fetched bytes.
 */

import type { Logger } from 'pino';
import yaml from 'js-yaml';
import { z } from 'zod';
import {
  type EnvironmentConfig,
  type ResolvedScanConfig,
  type Result,
  type ScanConfig,
  type ScanModality,
  type TargetSpec,
  CodedFailure,
  ErrorCode,
  SCAN_MODALITIES,
  Success,
} from '@/types';
import type { ConfigFetcher } from '@/infra/github/config-fetcher';
import { ENVIRONMENT_DEFAULTS, REPO_LAYOUT } from '@/config/constants';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';
import { createToolDescriptor } from './tool-roster';

const HostTargetSchema = z
  .object({
    host: z.string().min(1),
    port: z.number().int().min(1).max(65535).optional(),
  })
  .strict();

const ContainerTargetSchema = z.object({ container: z.string().min(1) }).strict();

const EnvironmentSchema = z.object({
  score_threshold: z.number().min(0).max(100).optional(),
  queue: z.string().min(1).optional(),
  targets: z.array(z.union([HostTargetSchema, ContainerTargetSchema])).nullish(),
  namespace: z.string().min(1).optional(),
  context: z.string().min(1).optional(),
  org: z.string().min(1).optional(),
});

type RawEnvironment = z.infer<typeof EnvironmentSchema>;

const DescriptorSchema = z
  .object({
    scan_type: z.enum(SCAN_MODALITIES),
    environments: z.record(z.string(), EnvironmentSchema.nullable()),
  })
  .superRefine((descriptor, ctx) => {
    for (const [name, env] of Object.entries(descriptor.environments)) {
      (env?.targets ?? []).forEach((target, index) => {
        const isHost = 'host' in target;
        const wantsHost = descriptor.scan_type === 'ssh' || descriptor.scan_type === 'winrm';
        const wantsContainer = descriptor.scan_type === 'docker';
        if ((wantsHost && !isHost) || (wantsContainer && isHost)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['environments', name, 'targets', index],
            message: `target does not match scan_type ${descriptor.scan_type}`,
          });
        }
      });
    }
  });

function toEnvironmentConfig(name: string, raw: RawEnvironment | null): EnvironmentConfig {
  const env: RawEnvironment = raw ?? {};
  const targets: TargetSpec[] = (env.targets ?? []).map((target) =>
    'host' in target
      ? target.port === undefined
        ? { host: target.host }
        : { host: target.host, port: target.port }
      : { container: target.container },
  );

  return {
    name,
    scoreThreshold: env.score_threshold ?? ENVIRONMENT_DEFAULTS.scoreThreshold,
    queue: env.queue ?? ENVIRONMENT_DEFAULTS.queue,
    targets,
    ...(env.namespace !== undefined && { namespace: env.namespace }),
    ...(env.context !== undefined && { context: env.context }),
    ...(env.org !== undefined && { org: env.org }),
  };
}

/**
 * Parse scan descriptor content into a ScanConfig
 *
 * @param content - Raw descriptor bytes or text (YAML)
 * @param source - Name used in error messages
 */
export function parseScanConfig(content: Buffer | string, source: string): Result<ScanConfig> {
  let raw: unknown;
  try {
    raw = yaml.load(content.toString());
  } catch (error) {
    return CodedFailure(
      ErrorCode.ConfigParseError,
      ERROR_MESSAGES.CONFIG_PARSE_FAILED(source, extractErrorMessage(error)),
      { message: 'Scan descriptor is not valid YAML', hint: source },
    );
  }

  const parsed = DescriptorSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return CodedFailure(ErrorCode.ConfigParseError, ERROR_MESSAGES.CONFIG_PARSE_FAILED(source, issues), {
      message: 'Scan descriptor failed validation',
      hint: `Expected scan_type (${SCAN_MODALITIES.join('|')}) and an environments mapping`,
      details: { issues: parsed.error.issues.length },
    });
  }

  const environments: Record<string, EnvironmentConfig> = {};
  for (const [name, env] of Object.entries(parsed.data.environments)) {
    environments[name] = toEnvironmentConfig(name, env);
  }

  const scanModality: ScanModality = parsed.data.scan_type;
  return Success(Object.freeze({ scanModality, environments: Object.freeze(environments) }));
}

const ENVIRONMENT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

/**
 * Environment names become part of repository paths (`thresholds/<env>.yml`),
 * so separators and leading dots are rejected.
 */
export function isValidEnvironmentName(name: string): boolean {
  return ENVIRONMENT_NAME_PATTERN.test(name);
}

/**
 * Select one environment from a parsed descriptor
 */
export function selectEnvironment(
  config: ScanConfig,
  tool: string,
  environment: string,
): Result<EnvironmentConfig> {
  const env = Object.prototype.hasOwnProperty.call(config.environments, environment)
    ? config.environments[environment]
    : undefined;
  if (!env) {
    const available = Object.keys(config.environments);
    return CodedFailure(
      ErrorCode.EnvironmentUndefined,
      ERROR_MESSAGES.ENVIRONMENT_UNDEFINED(tool, environment, available),
      {
        message: 'Requested environment is not declared',
        resolution: `Add an "${environment}" block under environments in ${REPO_LAYOUT.descriptor}`,
        details: { available },
      },
    );
  }
  return Success(env);
}

export interface ResolveRequest {
  tool: string;
  org: string;
  ref: string;
  environment: string;
}

export interface ScanConfigResolver {
  resolve(request: ResolveRequest): Promise<Result<ResolvedScanConfig>>;
}

export interface ScanConfigResolverDeps {
  fetcher: ConfigFetcher;
  repoPrefix: string;
  logger: Logger;
}

export function createScanConfigResolver(deps: ScanConfigResolverDeps): ScanConfigResolver {
  const log = deps.logger.child({ module: 'scan-config-resolver' });

  return {
    async resolve({ tool, org, ref, environment }) {
      if (!isValidEnvironmentName(environment)) {
        return CodedFailure(ErrorCode.EnvironmentUndefined, `Invalid environment name: ${environment}`, {
          message: 'Invalid environment name',
          hint: 'Environment names use letters, digits, ".", "_" and "-" and start with a letter or digit',
        });
      }

      const descriptor = createToolDescriptor(tool, deps.repoPrefix);
      const location = { org, repository: descriptor.repository, ref };
      const outcome = await deps.fetcher.fetchFile(location, REPO_LAYOUT.descriptor);

      switch (outcome.kind) {
        case 'not-found':
          return CodedFailure(
            ErrorCode.ConfigNotFound,
            ERROR_MESSAGES.CONFIG_NOT_FOUND(descriptor.repository, REPO_LAYOUT.descriptor, ref),
            {
              message: 'Scan descriptor not found',
              hint: `Is ${org}/${descriptor.repository} the configuration repository for ${tool}?`,
            },
          );
        case 'auth-error':
        case 'error':
          return CodedFailure(
            ErrorCode.FetchError,
            ERROR_MESSAGES.FETCH_FAILED(`${descriptor.repository}/${REPO_LAYOUT.descriptor}`, outcome.message),
            {
              message: outcome.kind === 'auth-error' ? 'Access denied' : 'Fetch failed',
              ...(outcome.kind === 'auth-error' && {
                resolution: 'Check that GITHUB_TOKEN can read the configuration repository',
              }),
            },
          );
        case 'found':
          break;
      }

      const config = parseScanConfig(outcome.value, `${descriptor.repository}/${REPO_LAYOUT.descriptor}`);
      if (!config.ok) return config;

      const env = selectEnvironment(config.value, tool, environment);
      if (!env.ok) return env;

      log.debug(
        { tool, environment, scanModality: config.value.scanModality, targets: env.value.targets.length },
        'Scan descriptor resolved',
      );

      return Success({ tool: descriptor, ref, config: config.value, environment: env.value });
    },
  };
}
