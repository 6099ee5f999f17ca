import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { createApp, type AppOverrides } from '@/app';
import { createAppConfig } from '@/config/app-config';
import { createProgram } from '@/cli/program';
import type { CliContext } from '@/cli/context';
import { createInMemoryFetcher } from '../../__support__/fakes/in-memory-fetcher';
import { createReportingEngine } from '../../__support__/fakes/fake-engine';
import { createRecordingSink } from '../../__support__/fakes/recording-sink';
import { VAULT_DESCRIPTOR } from '../../__support__/factories/scan-factories';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';
import { createTestLogger } from '../../__support__/utilities/test-logger';

interface TestContext extends CliContext {
  out: string[];
  err: string[];
  exitCode: number | undefined;
}

function createTestContext(env: Record<string, string>, overrides: AppOverrides): TestContext {
  const ctx: TestContext = {
    out: [],
    err: [],
    exitCode: undefined,
    io: {
      out: (text) => ctx.out.push(text),
      err: (text) => ctx.err.push(text),
    },
    loadApp({ logLevel }) {
      return createApp(createAppConfig(logLevel ? { ...env, LOG_LEVEL: logLevel } : env), overrides);
    },
    setExitCode(code) {
      ctx.exitCode = code;
    },
    onInterrupt() {
      return () => undefined;
    },
  };
  return ctx;
}

describe('fleet-scan CLI', () => {
  let workDir: string;
  let cleanup: () => Promise<void>;
  let overrides: AppOverrides;

  beforeEach(() => {
    const temp = createTestTempDir('fleet-cli-');
    workDir = temp.dir.name;
    cleanup = temp.cleanup;
    overrides = {
      logger: createTestLogger(),
      fetcher: createInMemoryFetcher({
        'compliance-vault': {
          'scan-config.yml': VAULT_DESCRIPTOR,
          'policies/cis-linux.yml': 'policies: [cis-linux]',
          'thresholds/base.yml': 'score_threshold: 70\n',
        },
      }),
      engine: createReportingEngine((args) => (args.includes('v2') ? 1 : 0)),
      sink: createRecordingSink(),
    };
  });

  afterEach(async () => {
    await cleanup();
  });

  async function invoke(args: string[], env: Record<string, string> = {}): Promise<TestContext> {
    const ctx = createTestContext(
      { SCAN_ORG: 'acme', SCAN_WORK_DIR: join(workDir, 'work'), ...env },
      overrides,
    );
    await createProgram(ctx, '1.0.0').parseAsync(['node', 'fleet-scan', ...args]);
    return ctx;
  }

  describe('scan', () => {
    it('should print the summary and exit 1 when a target fails', async () => {
      const ctx = await invoke(['scan', '--tool', 'vault', '--env', 'production']);

      expect(ctx.exitCode).toBe(1);
      expect(ctx.out[0]?.split('\n')[0]).toBe('vault (production): FAIL');
    });

    it('should exit 0 when the single manual target passes', async () => {
      const ctx = await invoke(['scan', '--tool', 'vault', '--env', 'production', '--target', 'v1']);

      expect(ctx.exitCode).toBe(0);
      expect(ctx.out[0]?.split('\n')[0]).toBe('vault (production): PASS');
    });

    it('should exit 2 with the failure code for an unknown tool', async () => {
      const ctx = await invoke(['scan', '--tool', 'ghost', '--env', 'production']);

      expect(ctx.exitCode).toBe(2);
      expect(ctx.out).toEqual([]);
      expect(ctx.err[0]?.startsWith('❌ ConfigNotFound: ')).toBe(true);
    });

    it('should require an organization', async () => {
      const ctx = await invoke(['scan', '--tool', 'vault', '--env', 'production'], { SCAN_ORG: '' });

      expect(ctx.exitCode).toBe(2);
      expect(ctx.err).toEqual(['❌ No organization: pass --org or set SCAN_ORG']);
    });

    it('should exit 2 when configuration does not validate', async () => {
      const ctx = await invoke(['--log-level', 'loud', 'scan', '--tool', 'vault', '--env', 'production']);

      expect(ctx.exitCode).toBe(2);
      expect(ctx.err[0]?.startsWith('❌ Invalid configuration: Configuration validation failed')).toBe(
        true,
      );
    });
  });

  describe('plan', () => {
    it('should print pipeline steps as JSON', async () => {
      const roster = join(workDir, 'tools.yml');
      await writeFile(roster, 'tools:\n  - vault\n  - ghost\n');

      const ctx = await invoke(['plan', '--env', 'production', '--roster', roster, '--format', 'json']);

      expect(ctx.exitCode).toBe(0);
      const document: unknown = JSON.parse(ctx.out[0] ?? '');
      expect(document).toMatchObject({
        steps: [
          { key: 'scan-vault', agents: { queue: 'secure-scanners' } },
          { key: 'fleet-summary', depends_on: ['scan-vault'] },
        ],
      });
    });

    it('should reject an unknown format', async () => {
      const ctx = await invoke(['plan', '--env', 'production', '--format', 'xml']);

      expect(ctx.exitCode).toBe(2);
      expect(ctx.err).toEqual(['❌ Unsupported format: xml']);
    });

    it('should exit 2 when the roster cannot be read', async () => {
      const ctx = await invoke(['plan', '--env', 'production', '--roster', join(workDir, 'none.yml')]);

      expect(ctx.exitCode).toBe(2);
      expect(ctx.err[0]?.startsWith('❌ Error: Failed to read roster ')).toBe(true);
    });
  });

  describe('run', () => {
    it('should scan every roster tool and report states', async () => {
      overrides.engine = createReportingEngine(() => 0);
      const roster = join(workDir, 'tools.yml');
      await writeFile(roster, 'tools:\n  - vault\n  - ghost\n');

      const ctx = await invoke(['run', '--env', 'production', '--roster', roster]);

      expect(ctx.exitCode).toBe(0);
      const lines = ctx.out[0]?.split('\n') ?? [];
      expect(lines[0]).toBe('TOOL   STATE    DETAIL');
      expect(lines[1]).toBe('vault  Passed   2/2 targets passed');
      expect(lines[2]?.startsWith('ghost  Skipped  ')).toBe(true);
    });
  });

  describe('summarize', () => {
    it('should summarize verdicts left by scan runs', async () => {
      await invoke(['scan', '--tool', 'vault', '--env', 'production']);

      const ctx = await invoke(['summarize', '--env', 'production']);

      expect(ctx.exitCode).toBe(1);
      expect(ctx.out[0]?.split('\n')).toEqual([
        'TOOL   ENVIRONMENT  VERDICT  PASSED  THRESHOLD',
        'vault  production   FAIL     1/2     90',
        '',
        'fleet: FAIL',
      ]);
    });
  });
});
