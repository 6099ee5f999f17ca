/**
 * Config Fetcher
 *
 * Retrieves files and directory listings from per-tool configuration
 * repositories. The GitHub implementation uses the contents API; the
 * credential is supplied once at construction.
 *
 * @see https://docs.github.com/en/rest/repos/contents
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { extractErrorMessage } from '@/lib/errors';

/**
 * Repository coordinates for one tool at one ref
 */
export interface RepoLocation {
  readonly org: string;
  readonly repository: string;
  readonly ref: string;
}

export interface DirectoryEntry {
  readonly name: string;
  readonly path: string;
  readonly type: 'file' | 'dir';
}

export type FetchOutcome<T> =
  | { readonly kind: 'found'; readonly value: T }
  | { readonly kind: 'not-found' }
  | { readonly kind: 'auth-error'; readonly message: string }
  | { readonly kind: 'error'; readonly message: string };

export interface ConfigFetcher {
  fetchFile(location: RepoLocation, path: string): Promise<FetchOutcome<Buffer>>;
  listDirectory(location: RepoLocation, path: string): Promise<FetchOutcome<DirectoryEntry[]>>;
}

export interface GitHubFetcherOptions {
  /** API base URL, e.g. https://api.github.com */
  apiUrl: string;
  /** Explicit credential; anonymous access when omitted */
  token?: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

const ContentEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  type: z.string(),
});

function contentsUrl(apiUrl: string, location: RepoLocation, path: string): string {
  const base = apiUrl.replace(/\/+$/, '');
  const encodedPath = path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map(encodeURIComponent)
    .join('/');
  const ref = encodeURIComponent(location.ref);
  return `${base}/repos/${encodeURIComponent(location.org)}/${encodeURIComponent(location.repository)}/contents/${encodedPath}?ref=${ref}`;
}

function toDirectoryEntries(payload: unknown): DirectoryEntry[] | undefined {
  if (!Array.isArray(payload)) return undefined;
  const entries: DirectoryEntry[] = [];
  for (const raw of payload) {
    const parsed = ContentEntrySchema.safeParse(raw);
    if (!parsed.success) continue;
    const { name, path, type } = parsed.data;
    // symlinks and submodules are not policy candidates
    if (type === 'file' || type === 'dir') entries.push({ name, path, type });
  }
  return entries;
}

/**
 * Create a fetcher backed by the GitHub contents API
 */
export function createGitHubConfigFetcher(options: GitHubFetcherOptions): ConfigFetcher {
  const { apiUrl, token, timeoutMs, logger } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const log = logger.child({ module: 'config-fetcher' });

  async function request(
    location: RepoLocation,
    path: string,
    accept: string,
  ): Promise<FetchOutcome<Response>> {
    const url = contentsUrl(apiUrl, location, path);
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': 'fleet-compliance-scan',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    // Create AbortController for timeout
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      log.debug({ repository: location.repository, path, ref: location.ref }, 'Fetching');
      const response = await fetchImpl(url, { headers, signal: controller.signal });

      if (response.status === 404) {
        return { kind: 'not-found' };
      }
      if (response.status === 401 || response.status === 403) {
        return {
          kind: 'auth-error',
          message: `HTTP ${response.status} for ${location.repository}/${path}`,
        };
      }
      if (!response.ok) {
        return {
          kind: 'error',
          message: `HTTP ${response.status} ${response.statusText} for ${location.repository}/${path}`,
        };
      }
      return { kind: 'found', value: response };
    } catch (error) {
      if (controller.signal.aborted) {
        log.warn({ repository: location.repository, path, timeoutMs }, 'Fetch timed out');
        return { kind: 'error', message: `Timed out after ${timeoutMs}ms fetching ${path}` };
      }
      return { kind: 'error', message: extractErrorMessage(error) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return {
    async fetchFile(location, path) {
      const outcome = await request(location, path, 'application/vnd.github.raw');
      if (outcome.kind !== 'found') return outcome;
      try {
        const bytes = Buffer.from(await outcome.value.arrayBuffer());
        return { kind: 'found', value: bytes };
      } catch (error) {
        return { kind: 'error', message: extractErrorMessage(error) };
      }
    },

    async listDirectory(location, path) {
      const outcome = await request(location, path, 'application/vnd.github+json');
      if (outcome.kind !== 'found') return outcome;
      try {
        const entries = toDirectoryEntries(await outcome.value.json());
        // A path that resolves to a file is not a directory
        return entries ? { kind: 'found', value: entries } : { kind: 'not-found' };
      } catch (error) {
        return { kind: 'error', message: extractErrorMessage(error) };
      }
    },
  };
}
