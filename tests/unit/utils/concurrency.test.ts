import { describe, it, expect } from 'vitest';
import { mapWithConcurrency, settleWithConcurrency } from '../../../src/utils/concurrency.js';

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 1));
}

describe('mapWithConcurrency', () => {
  it('keeps input order and never exceeds the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([5, 4, 3, 2, 1], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick();
      inFlight--;
      return n * 10;
    });
    expect(results).toEqual([50, 40, 30, 20, 10]);
    expect(peak).toBe(2);
  });

  it('returns an empty array for no items', async () => {
    expect(await mapWithConcurrency([], 3, async (n: number) => n)).toEqual([]);
  });

  it('rejects with the first failure', async () => {
    await expect(
      mapWithConcurrency([1, 2, 3], 1, async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      })
    ).rejects.toThrow('boom');
  });

  it('does not start tasks after the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];
    await mapWithConcurrency(
      [1, 2, 3],
      1,
      async (n) => {
        started.push(n);
        controller.abort();
        return n;
      },
      { signal: controller.signal }
    );
    expect(started).toEqual([1]);
  });
});

describe('settleWithConcurrency', () => {
  it('settles every task independently', async () => {
    const settled = await settleWithConcurrency(['a', 'b'], 2, async (s) => {
      if (s === 'b') throw new Error('bad b');
      return s.toUpperCase();
    });
    expect(settled[0]).toEqual({ status: 'fulfilled', value: 'A' });
    expect(settled[1]?.status).toBe('rejected');
  });

  it('leaves skipped tasks undefined', async () => {
    const controller = new AbortController();
    controller.abort();
    expect(await settleWithConcurrency([1, 2], 1, async (n) => n, { signal: controller.signal })).toEqual([
      undefined,
      undefined,
    ]);
  });
});
