import { describe, it, expect, vi } from 'vitest';
import { RatePacer, forEachBounded } from '../../src/utils/throttle.js';

describe('RatePacer', () => {
  it('spaces out slots reserved at the same instant', async () => {
    const wait = vi.fn(async (_ms: number) => {});
    const pacer = new RatePacer(4, () => 1_000, wait);

    await Promise.all([pacer.acquire(), pacer.acquire(), pacer.acquire()]);

    expect(wait.mock.calls.map(([ms]) => ms)).toEqual([250, 500]);
  });

  it('does not wait once the clock has passed the next slot', async () => {
    let now = 0;
    const wait = vi.fn(async (_ms: number) => {});
    const pacer = new RatePacer(2, () => now, wait);

    await pacer.acquire();
    now = 600;
    await pacer.acquire();

    expect(wait).not.toHaveBeenCalled();
  });

  it('rejects a non-positive rate', () => {
    expect(() => new RatePacer(0)).toThrow(RangeError);
  });
});

describe('forEachBounded', () => {
  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    const seen: number[] = [];

    await forEachBounded([1, 2, 3, 4, 5], 2, async (n) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise(resolve => setTimeout(resolve, 5));
      seen.push(n);
      active--;
    });

    expect(peak).toBe(2);
    expect([...seen].sort()).toEqual([1, 2, 3, 4, 5]);
  });

  it('starts items in order', async () => {
    const started: string[] = [];
    await forEachBounded(['a', 'b', 'c'], 1, async (item) => {
      started.push(item);
    });
    expect(started).toEqual(['a', 'b', 'c']);
  });

  it('resolves immediately for an empty list', async () => {
    const worker = vi.fn(async () => {});
    await forEachBounded([], 3, worker);
    expect(worker).not.toHaveBeenCalled();
  });
});
