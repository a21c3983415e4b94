/**
 * Timer Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { raceDeadline, sleep } from '../../../core/utils/timers.js';

describe('raceDeadline', () => {
  it('should return the value when the promise settles first', async () => {
    await expect(raceDeadline(Promise.resolve(42), 1000)).resolves.toEqual({
      settled: true,
      value: 42,
    });
  });

  it('should report an unsettled promise when the deadline wins', async () => {
    const never = new Promise<number>(() => undefined);
    await expect(raceDeadline(never, 10)).resolves.toEqual({ settled: false });
  });

  it('should propagate rejections', async () => {
    await expect(raceDeadline(Promise.reject(new Error('boom')), 1000)).rejects.toThrow('boom');
  });
});

describe('sleep', () => {
  it('should wake early when the signal aborts', async () => {
    const controller = new AbortController();
    const startedAt = Date.now();
    setTimeout(() => controller.abort(), 10);

    await sleep(10_000, controller.signal);

    expect(Date.now() - startedAt).toBeLessThan(5_000);
  });

  it('should resolve immediately for non-positive durations', async () => {
    await expect(sleep(0)).resolves.toBeUndefined();
  });
});
