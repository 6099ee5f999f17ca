/**
 * Policy Bundle Loader
 *
 * Lists a tool's policy documents (conventional subdirectory first, repository
 * root as fallback) and downloads them into the run-scoped working area.
 */

import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { Logger } from 'pino';
import {
  type PolicyBundle,
  type PolicyFile,
  type Result,
  CodedFailure,
  ErrorCode,
  Success,
} from '@/types';
import type {
  ConfigFetcher,
  DirectoryEntry,
  FetchOutcome,
  RepoLocation,
} from '@/infra/github/config-fetcher';
import { REPO_LAYOUT } from '@/config/constants';
import { ERROR_MESSAGES, extractErrorMessage } from '@/lib/errors';

export interface LoadPoliciesRequest {
  location: RepoLocation;
  tool: string;
  /** Local directory the bundle is written to; emptied first */
  directory: string;
}

export interface PolicyBundleLoader {
  load(request: LoadPoliciesRequest): Promise<Result<PolicyBundle>>;
}

interface Candidate {
  entry: DirectoryEntry;
  source: PolicyFile['source'];
}

export function isSubdirectoryPolicy(entry: DirectoryEntry): boolean {
  return (
    entry.type === 'file' && REPO_LAYOUT.policyExtensions.some((ext) => entry.name.endsWith(ext))
  );
}

export function isRootPolicy(entry: DirectoryEntry): boolean {
  return entry.type === 'file' && entry.name.endsWith(REPO_LAYOUT.rootPolicySuffix);
}

/** Unique by file name, sorted for a stable flag order */
function dedupeByName(candidates: Candidate[]): Candidate[] {
  const byName = new Map<string, Candidate>();
  for (const candidate of candidates) {
    if (!byName.has(candidate.entry.name)) byName.set(candidate.entry.name, candidate);
  }
  return [...byName.values()].sort((a, b) => a.entry.name.localeCompare(b.entry.name));
}

function fetchFailure<T>(what: string, outcome: FetchOutcome<unknown>): Result<T> {
  const message =
    outcome.kind === 'auth-error' || outcome.kind === 'error' ? outcome.message : 'not found';
  return CodedFailure(ErrorCode.FetchError, ERROR_MESSAGES.FETCH_FAILED(what, message));
}

export function createPolicyBundleLoader(deps: {
  fetcher: ConfigFetcher;
  logger: Logger;
}): PolicyBundleLoader {
  const { fetcher } = deps;
  const log = deps.logger.child({ module: 'policy-bundle-loader' });

  async function listCandidates(location: RepoLocation): Promise<Result<Candidate[]>> {
    const subdirectory = await fetcher.listDirectory(location, REPO_LAYOUT.policyDirectory);
    if (subdirectory.kind === 'auth-error' || subdirectory.kind === 'error') {
      return fetchFailure(`${location.repository}/${REPO_LAYOUT.policyDirectory}`, subdirectory);
    }

    if (subdirectory.kind === 'found') {
      const matches = subdirectory.value.filter(isSubdirectoryPolicy);
      if (matches.length > 0) {
        return Success(matches.map((entry) => ({ entry, source: 'subdirectory' as const })));
      }
    }

    log.debug(
      { repository: location.repository, subdirectory: subdirectory.kind },
      'No policies in subdirectory, falling back to repository root',
    );

    const root = await fetcher.listDirectory(location, '');
    if (root.kind === 'auth-error' || root.kind === 'error') {
      return fetchFailure(`${location.repository}/`, root);
    }
    if (root.kind === 'not-found') {
      return Success([]);
    }
    return Success(root.value.filter(isRootPolicy).map((entry) => ({ entry, source: 'root' as const })));
  }

  return {
    async load({ location, tool, directory }) {
      const listed = await listCandidates(location);
      if (!listed.ok) return listed;

      const candidates = dedupeByName(listed.value);
      if (candidates.length === 0) {
        return CodedFailure(
          ErrorCode.NoPoliciesFound,
          ERROR_MESSAGES.NO_POLICIES(location.repository, location.ref),
          {
            message: 'No policy files found',
            hint: `Looked in ${REPO_LAYOUT.policyDirectory}/ (*.yml, *.yaml) and the repository root (*${REPO_LAYOUT.rootPolicySuffix})`,
          },
        );
      }

      try {
        await rm(directory, { recursive: true, force: true });
        await mkdir(directory, { recursive: true });
      } catch (error) {
        return CodedFailure(
          ErrorCode.InfrastructureError,
          ERROR_MESSAGES.OPERATION_FAILED('Preparing policy directory', extractErrorMessage(error)),
        );
      }

      const files: PolicyFile[] = [];
      for (const { entry, source } of candidates) {
        const outcome = await fetcher.fetchFile(location, entry.path);
        if (outcome.kind !== 'found') {
          return fetchFailure(`${location.repository}/${entry.path}`, outcome);
        }

        const path = join(directory, entry.name);
        try {
          await writeFile(path, outcome.value);
        } catch (error) {
          return CodedFailure(
            ErrorCode.InfrastructureError,
            ERROR_MESSAGES.OPERATION_FAILED(`Writing ${entry.name}`, extractErrorMessage(error)),
          );
        }
        files.push({ name: entry.name, path, source });
      }

      log.info(
        { tool, ref: location.ref, policies: files.map((f) => f.name), source: files[0]?.source },
        'Policy bundle loaded',
      );

      return Success({ tool, ref: location.ref, directory, files });
    },
  };
}
