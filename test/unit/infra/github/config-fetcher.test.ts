import { describe, it, expect, jest } from '@jest/globals';
import { createGitHubConfigFetcher } from '@/infra/github/config-fetcher';
import { createTestLogger } from '../../../__support__/utilities/test-logger';

const location = { org: 'acme', repository: 'compliance-vault', ref: 'main' };

function createFetcher(
  respond: (url: string, init: RequestInit | undefined) => Promise<Response>,
  options: { token?: string; timeoutMs?: number } = {},
) {
  const fetchImpl = jest.fn((input: string | URL | Request, init?: RequestInit) =>
    respond(String(input), init),
  );
  const fetcher = createGitHubConfigFetcher({
    apiUrl: 'https://github.example.test/api/v3/',
    timeoutMs: options.timeoutMs ?? 1000,
    logger: createTestLogger(),
    fetchImpl,
    ...(options.token !== undefined && { token: options.token }),
  });
  return { fetcher, fetchImpl };
}

describe('createGitHubConfigFetcher', () => {
  describe('fetchFile', () => {
    it('should request raw content at the ref and return the bytes', async () => {
      const { fetcher, fetchImpl } = createFetcher(async () => new Response('scan_type: ssh\n'), {
        token: 'test-secret',
      });

      const outcome = await fetcher.fetchFile(location, 'thresholds/base.yml');

      expect(outcome.kind).toBe('found');
      if (outcome.kind === 'found') {
        expect(outcome.value.toString()).toBe('scan_type: ssh\n');
      }
      const [url, init] = fetchImpl.mock.calls[0];
      expect(url).toBe(
        'https://github.example.test/api/v3/repos/acme/compliance-vault/contents/thresholds/base.yml?ref=main',
      );
      expect(init?.headers).toMatchObject({
        Accept: 'application/vnd.github.raw',
        Authorization: 'Bearer test-secret',
      });
    });

    it('should not send a credential when none is configured', async () => {
      const { fetcher, fetchImpl } = createFetcher(async () => new Response('x'));

      await fetcher.fetchFile(location, 'scan-config.yml');

      const [, init] = fetchImpl.mock.calls[0];
      expect(init?.headers).not.toHaveProperty('Authorization');
    });

    it('should map 404 to not-found', async () => {
      const { fetcher } = createFetcher(async () => new Response('missing', { status: 404 }));

      expect(await fetcher.fetchFile(location, 'scan-config.yml')).toEqual({ kind: 'not-found' });
    });

    it('should map 403 to auth-error', async () => {
      const { fetcher } = createFetcher(async () => new Response('denied', { status: 403 }));

      expect(await fetcher.fetchFile(location, 'scan-config.yml')).toEqual({
        kind: 'auth-error',
        message: 'HTTP 403 for compliance-vault/scan-config.yml',
      });
    });

    it('should map server errors to error', async () => {
      const { fetcher } = createFetcher(
        async () => new Response('oops', { status: 502, statusText: 'Bad Gateway' }),
      );

      expect(await fetcher.fetchFile(location, 'scan-config.yml')).toEqual({
        kind: 'error',
        message: 'HTTP 502 Bad Gateway for compliance-vault/scan-config.yml',
      });
    });

    it('should report a timeout when the request is aborted', async () => {
      const { fetcher } = createFetcher(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
          }),
        { timeoutMs: 10 },
      );

      expect(await fetcher.fetchFile(location, 'scan-config.yml')).toEqual({
        kind: 'error',
        message: 'Timed out after 10ms fetching scan-config.yml',
      });
    });

    it('should report network failures as errors', async () => {
      const { fetcher } = createFetcher(async () => {
        throw new Error('getaddrinfo ENOTFOUND');
      });

      expect(await fetcher.fetchFile(location, 'scan-config.yml')).toEqual({
        kind: 'error',
        message: 'getaddrinfo ENOTFOUND',
      });
    });
  });

  describe('listDirectory', () => {
    it('should list files and directories', async () => {
      const { fetcher, fetchImpl } = createFetcher(async () =>
        Response.json([
          { name: 'cis.yml', path: 'policies/cis.yml', type: 'file' },
          { name: 'extra', path: 'policies/extra', type: 'dir' },
          { name: 'link.yml', path: 'policies/link.yml', type: 'symlink' },
        ]),
      );

      const outcome = await fetcher.listDirectory(location, 'policies');

      expect(outcome).toEqual({
        kind: 'found',
        value: [
          { name: 'cis.yml', path: 'policies/cis.yml', type: 'file' },
          { name: 'extra', path: 'policies/extra', type: 'dir' },
        ],
      });
      const [, init] = fetchImpl.mock.calls[0];
      expect(init?.headers).toMatchObject({ Accept: 'application/vnd.github+json' });
    });

    it('should address the repository root with an empty path', async () => {
      const { fetcher, fetchImpl } = createFetcher(async () => Response.json([]));

      await fetcher.listDirectory(location, '');

      const [url] = fetchImpl.mock.calls[0];
      expect(url).toBe(
        'https://github.example.test/api/v3/repos/acme/compliance-vault/contents/?ref=main',
      );
    });

    it('should treat a file path as not-found', async () => {
      const { fetcher } = createFetcher(async () =>
        Response.json({ name: 'policies', path: 'policies', type: 'file' }),
      );

      expect(await fetcher.listDirectory(location, 'policies')).toEqual({ kind: 'not-found' });
    });
  });
});
