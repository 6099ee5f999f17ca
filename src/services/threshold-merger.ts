/**
 * Threshold Merger
 *
 * Layers an environment override document over a tool's base threshold
 * document, key by key, and persists the result for the engine invocation.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import yaml from 'js-yaml';
import {
  type EffectiveThresholds,
  type EnvironmentConfig,
  type Result,
  type ThresholdDocument,
  CodedFailure,
  ErrorCode,
  Success,
} from '@/types';
import type { ConfigFetcher, RepoLocation } from '@/infra/github/config-fetcher';
import { REPO_LAYOUT } from '@/config/constants';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';

export const SCORE_THRESHOLD_KEY = 'score_threshold';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a threshold document. An empty document is an empty mapping;
 * anything other than a mapping is rejected.
 */
export function parseThresholdDocument(
  content: Buffer | string,
  source: string,
): Result<ThresholdDocument> {
  let raw: unknown;
  try {
    raw = yaml.load(content.toString());
  } catch (error) {
    return CodedFailure(
      ErrorCode.ThresholdParseError,
      ERROR_MESSAGES.THRESHOLD_PARSE_FAILED(source, extractErrorMessage(error)),
    );
  }

  if (raw === undefined || raw === null) return Success({});
  if (!isPlainObject(raw)) {
    return CodedFailure(
      ErrorCode.ThresholdParseError,
      ERROR_MESSAGES.THRESHOLD_PARSE_FAILED(source, 'expected a mapping at the top level'),
    );
  }
  return Success(raw);
}

/**
 * Field-level merge: every key in `override` replaces the base key, base-only
 * keys are kept. Nested values are replaced whole.
 */
export function mergeThresholds(
  base: ThresholdDocument,
  override: ThresholdDocument,
): ThresholdDocument {
  return { ...base, ...override };
}

/**
 * Merge the layers and resolve the score threshold. The descriptor's
 * environment threshold (default 80) seeds `score_threshold` over the base
 * document; an override document value wins over both.
 */
export function resolveEffectiveThresholds(
  base: ThresholdDocument,
  override: ThresholdDocument,
  environment: EnvironmentConfig,
): Result<{ values: ThresholdDocument; scoreThreshold: number }> {
  const seeded = mergeThresholds(base, { [SCORE_THRESHOLD_KEY]: environment.scoreThreshold });
  const values = mergeThresholds(seeded, override);
  const score = values[SCORE_THRESHOLD_KEY];

  if (typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 100) {
    return CodedFailure(
      ErrorCode.ThresholdParseError,
      ERROR_MESSAGES.THRESHOLD_PARSE_FAILED(
        REPO_LAYOUT.overrideThresholds(environment.name),
        `${SCORE_THRESHOLD_KEY} must be a number between 0 and 100`,
      ),
    );
  }
  return Success({ values, scoreThreshold: score });
}

export interface MergeRequest {
  location: RepoLocation;
  environment: EnvironmentConfig;
  /** Where the merged document is written */
  outputPath: string;
}

export interface ThresholdMerger {
  merge(request: MergeRequest): Promise<Result<EffectiveThresholds>>;
}

export function createThresholdMerger(deps: {
  fetcher: ConfigFetcher;
  logger: Logger;
}): ThresholdMerger {
  const { fetcher } = deps;
  const log = deps.logger.child({ module: 'threshold-merger' });

  return {
    async merge({ location, environment, outputPath }) {
      const basePath = REPO_LAYOUT.baseThresholds;
      const overridePath = REPO_LAYOUT.overrideThresholds(environment.name);

      const [baseOutcome, overrideOutcome] = await Promise.all([
        fetcher.fetchFile(location, basePath),
        fetcher.fetchFile(location, overridePath),
      ]);

      if (baseOutcome.kind === 'not-found') {
        return CodedFailure(
          ErrorCode.BaseThresholdMissing,
          ERROR_MESSAGES.BASE_THRESHOLD_MISSING(location.repository, basePath),
          {
            message: 'Base threshold document missing',
            resolution: `Add ${basePath} to ${location.repository}`,
          },
        );
      }
      if (baseOutcome.kind !== 'found') {
        return CodedFailure(
          ErrorCode.FetchError,
          ERROR_MESSAGES.FETCH_FAILED(`${location.repository}/${basePath}`, baseOutcome.message),
        );
      }
      if (overrideOutcome.kind === 'auth-error' || overrideOutcome.kind === 'error') {
        return CodedFailure(
          ErrorCode.FetchError,
          ERROR_MESSAGES.FETCH_FAILED(`${location.repository}/${overridePath}`, overrideOutcome.message),
        );
      }

      const base = parseThresholdDocument(baseOutcome.value, `${location.repository}/${basePath}`);
      if (!base.ok) return base;

      let override: ThresholdDocument = {};
      if (overrideOutcome.kind === 'found') {
        const parsed = parseThresholdDocument(
          overrideOutcome.value,
          `${location.repository}/${overridePath}`,
        );
        if (!parsed.ok) return parsed;
        override = parsed.value;
      } else {
        log.debug({ environment: environment.name }, 'No override document, using base thresholds');
      }

      const effective = resolveEffectiveThresholds(base.value, override, environment);
      if (!effective.ok) return effective;

      try {
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, yaml.dump(effective.value.values, { sortKeys: true }), 'utf8');
      } catch (error) {
        return CodedFailure(
          ErrorCode.InfrastructureError,
          ERROR_MESSAGES.OPERATION_FAILED('Writing merged thresholds', extractErrorMessage(error)),
        );
      }

      log.info(
        {
          environment: environment.name,
          scoreThreshold: effective.value.scoreThreshold,
          overridden: Object.keys(override),
        },
        'Thresholds merged',
      );

      return Success({ ...effective.value, path: outputPath });
    },
  };
}
