export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Hands out start slots at most `ratePerSecond` per second. Slots are
 * reserved synchronously, so concurrent callers queue up in call order.
 */
export class RatePacer {
  private intervalMs: number;
  private nextSlot = 0;
  private now: () => number;
  private wait: Sleep;

  constructor(ratePerSecond: number, now: () => number = Date.now, wait: Sleep = sleep) {
    if (!(ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${ratePerSecond}`);
    }
    this.intervalMs = 1000 / ratePerSecond;
    this.now = now;
    this.wait = wait;
  }

  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    if (slot > now) {
      await this.wait(slot - now);
    }
  }
}

/** Runs `worker` over `items` with at most `limit` calls in flight. */
export async function forEachBounded<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  const queue = [...items];
  const lanes = Math.max(1, Math.min(limit, queue.length));

  const runLane = async (): Promise<void> => {
    for (let next = queue.shift(); next !== undefined; next = queue.shift()) {
      await worker(next);
    }
  };

  await Promise.all(Array.from({ length: lanes }, runLane));
}
