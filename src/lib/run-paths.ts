import { join, resolve } from 'node:path';

/**
 * Run-scoped working area for one tool. Paths are namespaced by tool name so
 * concurrent runs for different tools never share a file.
 */
export interface RunPaths {
  readonly root: string;
  readonly policies: string;
  readonly thresholds: string;
  readonly results: string;
  readonly verdict: string;
}

export function runPathsFor(workDir: string, tool: string): RunPaths {
  const root = resolve(workDir, tool);
  return {
    root,
    policies: join(root, 'policies'),
    thresholds: join(root, 'thresholds.yml'),
    results: join(root, 'results'),
    verdict: join(root, 'verdict.json'),
  };
}

/**
 * Replace path-unsafe characters with `_` so a target address can be used as
 * a file name, e.g. `h1:22` -> `h1_22`.
 */
export function sanitizeTargetName(target: string): string {
  const sanitized = target.replace(/[^A-Za-z0-9._-]/g, '_');
  if (sanitized.length === 0) return '_';
  return /^\.+$/.test(sanitized) ? sanitized.replace(/\./g, '_') : sanitized;
}

/**
 * One result file per target, in target order. A sanitized name already
 * taken in this run gets a numeric suffix, so `a:b` and `a_b` map to
 * `a_b.json` and `a_b-2.json`. Names are compared case-insensitively.
 */
export function resultPathsFor(paths: RunPaths, targets: readonly string[]): string[] {
  const taken = new Set<string>();
  return targets.map((target) => {
    const base = sanitizeTargetName(target);
    let name = base;
    for (let n = 2; taken.has(name.toLowerCase()); n++) {
      name = `${base}-${n}`;
    }
    taken.add(name.toLowerCase());
    return join(paths.results, `${name}.json`);
  });
}
