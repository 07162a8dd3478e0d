import type { Baseline, LastKnownState, StockReading, TransitionEvent } from '../types.js';

export interface TransitionResult {
  events: TransitionEvent[];
  /** New baseline rows for every product in the snapshot, changed or not. */
  updates: LastKnownState[];
}

export class AvailabilityMonitor {
  /**
   * Compares one cycle's snapshot with the persisted baseline.
   *
   * Only products present in both produce events, and only when `inStock`
   * flipped. A product with no baseline row is recorded without an event,
   * so the first observation never notifies anyone. A price change alone
   * is recorded but is not a transition. Output is sorted by product id.
   */
  detectTransitions(
    snapshot: ReadonlyMap<string, StockReading>,
    baseline: ReadonlyMap<string, LastKnownState>,
    observedAt: string
  ): TransitionResult {
    const events: TransitionEvent[] = [];
    const updates: LastKnownState[] = [];

    const productIds = [...snapshot.keys()].sort(AvailabilityMonitor.compareIds);

    for (const productId of productIds) {
      const reading = snapshot.get(productId);
      if (reading === undefined) continue;
      const { inStock, price } = reading;

      const previous = baseline.get(productId);
      if (previous && previous.inStock !== inStock) {
        events.push({
          productId,
          previousState: previous.inStock,
          newState: inStock,
          price,
          occurredAt: observedAt,
        });
      }

      updates.push({ productId, inStock, price, updatedAt: observedAt });
    }

    return { events, updates };
  }

  static compareIds(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
  }

  static toBaseline(states: LastKnownState[]): Baseline {
    return new Map(states.map((s): [string, LastKnownState] => [s.productId, s]));
  }
}
