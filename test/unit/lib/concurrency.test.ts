import { describe, it, expect } from '@jest/globals';
import { TimeoutError, createLimiter, withTimeout } from '@/lib/concurrency';

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createLimiter', () => {
  it('should never run more than the configured number of tasks', async () => {
    const limit = createLimiter(2);
    let active = 0;
    let peak = 0;

    const task = async (value: number): Promise<number> => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((r) => setTimeout(r, 5));
      active--;
      return value;
    };

    const results = await Promise.all([1, 2, 3, 4, 5].map((n) => limit(() => task(n))));

    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it('should start queued tasks in submission order', async () => {
    const limit = createLimiter(1);
    const started: string[] = [];
    const first = deferred<void>();

    const a = limit(async () => {
      started.push('a');
      await first.promise;
    });
    const b = limit(async () => {
      started.push('b');
    });
    const c = limit(async () => {
      started.push('c');
    });

    expect(started).toEqual(['a']);
    first.resolve();
    await Promise.all([a, b, c]);
    expect(started).toEqual(['a', 'b', 'c']);
  });

  it('should keep running after a task rejects', async () => {
    const limit = createLimiter(1);

    const failing = limit(async () => {
      throw new Error('boom');
    });
    const next = limit(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });
});

describe('withTimeout', () => {
  it('should resolve with the value when the promise settles in time', async () => {
    await expect(withTimeout(Promise.resolve(42), 100, 'answer')).resolves.toBe(42);
  });

  it('should reject with a TimeoutError when the deadline passes', async () => {
    const never = new Promise<number>(() => undefined);

    const error = await withTimeout(never, 10, 'scan h1:22').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ operation: 'scan h1:22', timeoutMs: 10 });
    expect(String(error)).toBe('TimeoutError: scan h1:22 timed out after 10ms');
  });
});
