import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  buildEngineArgs,
  classifyOutcome,
  createScanDispatcher,
  type DispatchRequest,
} from '@/services/scan-dispatcher';
import type { ScanTarget } from '@/types';
import { ErrorCode } from '@/types';
import type { ScanEngine } from '@/infra/scanner/scan-engine';
import { runPathsFor } from '@/lib/run-paths';
import {
  createFakeEngine,
  createReportingEngine,
  exited,
  scanSubject,
} from '../../__support__/fakes/fake-engine';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';
import { createTestLogger } from '../../__support__/utilities/test-logger';

const context = {
  policyFiles: ['/work/vault/policies/cis.yml', '/work/vault/policies/extra.yml'],
  thresholdsPath: '/work/vault/thresholds.yml',
  scoreThreshold: 90,
  outputPath: '/work/vault/results/v1_22.json',
  winrmAdminUser: 'Administrator',
};

const commonFlags = [
  '--policy-bundle',
  '/work/vault/policies/cis.yml',
  '--policy-bundle',
  '/work/vault/policies/extra.yml',
  '--config',
  '/work/vault/thresholds.yml',
  '--score-threshold',
  '90',
  '--output',
  'json',
  '--output-target',
  '/work/vault/results/v1_22.json',
];

describe('buildEngineArgs', () => {
  it('should address ssh targets by host and port', () => {
    const target: ScanTarget = { kind: 'ssh', address: 'v1:22', host: 'v1', port: 22 };

    expect(buildEngineArgs(target, context)).toEqual([
      'scan',
      'ssh',
      'v1',
      '--port',
      '22',
      ...commonFlags,
    ]);
  });

  it('should address winrm targets with the admin user', () => {
    const target: ScanTarget = { kind: 'winrm', address: 'w1:5985', host: 'w1', port: 5985 };

    expect(buildEngineArgs(target, context).slice(0, 3)).toEqual([
      'scan',
      'winrm',
      'Administrator@w1',
    ]);
  });

  it('should address the other modalities', () => {
    const subject = (target: ScanTarget): string[] => scanSubject(buildEngineArgs(target, context));

    expect(subject({ kind: 'docker', address: 'api', container: 'api' })).toEqual([
      'docker',
      'container',
      'api',
    ]);
    expect(
      subject({ kind: 'k8s', address: 'prod/payments', namespace: 'payments', context: 'prod' }),
    ).toEqual(['k8s', '--context', 'prod', '--namespace', 'payments']);
    expect(subject({ kind: 'k8s', address: 'default', namespace: 'default' })).toEqual([
      'k8s',
      '--namespace',
      'default',
    ]);
    expect(subject({ kind: 'github', address: 'acme', org: 'acme' })).toEqual([
      'github',
      'org',
      'acme',
    ]);
    expect(subject({ kind: 'api', address: 'local' })).toEqual(['local']);
  });
});

describe('classifyOutcome', () => {
  it('should treat exit 0 as success', () => {
    expect(classifyOutcome(exited(0))).toEqual({ status: 'success' });
  });

  it('should treat exit 1 as a policy failure', () => {
    expect(classifyOutcome(exited(1))).toEqual({
      status: 'failure',
      code: ErrorCode.TargetScanFailure,
      error: 'score below threshold or policy failure',
    });
  });

  it('should treat other exits, timeouts and spawn errors as infrastructure errors', () => {
    expect(classifyOutcome(exited(2))).toEqual({
      status: 'error',
      code: ErrorCode.InfrastructureError,
      error: 'engine exited with status 2',
    });
    expect(
      classifyOutcome({ exitCode: null, stdout: '', stderr: '', timedOut: true }),
    ).toMatchObject({ status: 'error', error: 'scan timed out' });
    expect(
      classifyOutcome({
        exitCode: null,
        stdout: '',
        stderr: '',
        timedOut: false,
        spawnError: 'spawn cnspec ENOENT',
      }),
    ).toMatchObject({ status: 'error', error: 'spawn cnspec ENOENT' });
  });
});

describe('createScanDispatcher', () => {
  let workDir: string;
  let cleanup: () => Promise<void>;

  beforeEach(() => {
    const temp = createTestTempDir('dispatch-');
    workDir = temp.dir.name;
    cleanup = temp.cleanup;
  });

  afterEach(async () => {
    await cleanup();
  });

  function request(targets: ScanTarget[]): DispatchRequest {
    const paths = runPathsFor(workDir, 'vault');
    return {
      tool: 'vault',
      targets,
      policies: {
        tool: 'vault',
        ref: 'main',
        directory: paths.policies,
        files: [{ name: 'cis.yml', path: join(paths.policies, 'cis.yml'), source: 'subdirectory' }],
      },
      thresholds: { scoreThreshold: 90, values: { score_threshold: 90 }, path: paths.thresholds },
      paths,
    };
  }

  function dispatcher(engine: ScanEngine, timeoutMs = 5000) {
    return createScanDispatcher({
      engine,
      logger: createTestLogger(),
      timeoutMs,
      concurrency: 2,
      winrmAdminUser: 'Administrator',
    });
  }

  const v1: ScanTarget = { kind: 'ssh', address: 'v1:22', host: 'v1', port: 22 };
  const v2: ScanTarget = { kind: 'ssh', address: 'v2:22', host: 'v2', port: 22 };
  const v3: ScanTarget = { kind: 'ssh', address: 'v3:22', host: 'v3', port: 22 };

  it('should scan every target and keep declaration order', async () => {
    const engine = createReportingEngine((args) => (args.includes('v2') ? 1 : 0));

    const results = await dispatcher(engine).dispatch(request([v1, v2, v3]));

    expect(results.map((r) => [r.target, r.status, r.exitCode])).toEqual([
      ['v1:22', 'success', 0],
      ['v2:22', 'failure', 1],
      ['v3:22', 'success', 0],
    ]);
    expect(results[0]?.output).toEqual({ subject: ['ssh', 'v1', '--port', '22'], exitCode: 0 });
    expect(results[1]?.code).toBe(ErrorCode.TargetScanFailure);
    expect(engine.invocations).toHaveLength(3);
  });

  it('should write an artifact when the engine produced none', async () => {
    const engine = createFakeEngine(() => exited(2));

    const [result] = await dispatcher(engine).dispatch(request([v1]));

    const expected = {
      target: 'v1:22',
      status: 'error',
      exitCode: 2,
      error: 'engine exited with status 2',
    };
    expect(result?.output).toEqual(expected);
    const outputPath = join(runPathsFor(workDir, 'vault').results, 'v1_22.json');
    expect(result?.outputPath).toBe(outputPath);
    expect(JSON.parse(await readFile(outputPath, 'utf8'))).toEqual(expected);
  });

  it('should record a thrown engine error and continue with the next target', async () => {
    const engine = createFakeEngine(({ args }) => {
      if (args.includes('v1')) throw new Error('spawn cnspec EACCES');
      return exited(0);
    });

    const results = await dispatcher(engine).dispatch(request([v1, v2]));

    expect(results[0]).toMatchObject({
      target: 'v1:22',
      status: 'error',
      code: ErrorCode.InfrastructureError,
      error: 'spawn cnspec EACCES',
    });
    expect(results[1]?.status).toBe('success');
  });

  it('should time out a scan that never finishes', async () => {
    const engine = createFakeEngine(() => new Promise(() => undefined));

    const [result] = await dispatcher(engine, 20).dispatch(request([v1]));

    expect(result).toMatchObject({ status: 'error', exitCode: null, error: 'scan timed out' });
  });

  it('should hand the policy files and thresholds to the engine', async () => {
    const engine = createReportingEngine(() => 0);
    const req = request([v1]);

    await dispatcher(engine).dispatch(req);

    const args = engine.invocations[0]?.args ?? [];
    expect(args).toContain(join(req.paths.policies, 'cis.yml'));
    expect(args.slice(args.indexOf('--config'), args.indexOf('--config') + 4)).toEqual([
      '--config',
      req.paths.thresholds,
      '--score-threshold',
      '90',
    ]);
    expect(engine.invocations[0]?.timeoutMs).toBe(5000);
  });

  it('should give targets with colliding file names their own result files', async () => {
    const engine = createReportingEngine(() => 0);
    const colon: ScanTarget = { kind: 'docker', address: 'a:b', container: 'a:b' };
    const underscore: ScanTarget = { kind: 'docker', address: 'a_b', container: 'a_b' };
    const req = request([colon, underscore]);

    const results = await createScanDispatcher({
      engine,
      logger: createTestLogger(),
      timeoutMs: 5000,
      concurrency: 4,
      winrmAdminUser: 'Administrator',
    }).dispatch(req);

    expect(results.map((r) => r.outputPath)).toEqual([
      join(req.paths.results, 'a_b.json'),
      join(req.paths.results, 'a_b-2.json'),
    ]);
    expect(results.map((r) => r.output)).toEqual([
      { subject: ['docker', 'container', 'a:b'], exitCode: 0 },
      { subject: ['docker', 'container', 'a_b'], exitCode: 0 },
    ]);
    expect((await readdir(req.paths.results)).sort()).toEqual(['a_b-2.json', 'a_b.json']);
  });

  it('should keep one artifact per entry when a target is declared twice', async () => {
    const engine = createReportingEngine(() => 0);
    const req = request([v1, v1]);

    const results = await dispatcher(engine).dispatch(req);

    expect(results.map((r) => r.outputPath)).toEqual([
      join(req.paths.results, 'v1_22.json'),
      join(req.paths.results, 'v1_22-2.json'),
    ]);
    expect((await readdir(req.paths.results)).sort()).toEqual(['v1_22-2.json', 'v1_22.json']);
  });

  it('should clear results left by an earlier run', async () => {
    const req = request([v1]);
    await mkdir(req.paths.results, { recursive: true });
    await writeFile(join(req.paths.results, 'old-host_22.json'), '{"stale":true}');

    await dispatcher(createReportingEngine(() => 0)).dispatch(req);

    expect(await readdir(req.paths.results)).toEqual(['v1_22.json']);
  });
});
