import { errorMessage } from '../errors.js';
import { AvailabilityMonitor } from '../services/availability-monitor.js';
import type { NotificationDispatcher } from '../services/dispatcher.js';
import type { StockApi } from '../services/stock-api.js';
import type { AvailabilitySnapshot, Baseline, CyclePhase, CycleResult, SkipReason, SubscriptionStore } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { SchedulePolicy } from '../utils/schedule.js';

const log = createLogger('Monitor');

export interface StockMonitorDeps {
  api: Pick<StockApi, 'fetchAvailability'>;
  store: SubscriptionStore;
  dispatcher: Pick<NotificationDispatcher, 'dispatch'>;
  productIds: Set<string>;
  schedule: SchedulePolicy;
  now?: () => Date;
}

export interface MonitorStatus {
  phase: CyclePhase;
  running: boolean;
  lastResult: CycleResult | null;
  /** Most recent tick that ran no cycle. */
  lastSkip: { reason: SkipReason; at: string } | null;
  lastCompletedAt: string | null;
  nextCheckAt: string | null;
  schedule: string;
}

/**
 * Drives the fetch → diff → dispatch → persist cycle. At most one cycle
 * runs at a time; a tick that lands on a running cycle is dropped.
 */
export class StockMonitor {
  private deps: StockMonitorDeps;
  private availability = new AvailabilityMonitor();
  private now: () => Date;
  private phase: CyclePhase = 'idle';
  private current: Promise<CycleResult> | null = null;
  private abortController: AbortController | null = null;
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private lastResult: CycleResult | null = null;
  private lastSkip: { reason: SkipReason; at: string } | null = null;
  private lastCompletedAt: string | null = null;
  private nextCheckAt: Date | null = null;

  constructor(deps: StockMonitorDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;

    log.info(`Starting stock monitor for ${this.deps.productIds.size} products (${this.deps.schedule.describe(this.now())})`);

    // The startup check ignores quiet hours so the baseline is fresh.
    this.tick(true);
    this.scheduleNext();
  }

  async stop(timeoutMs: number): Promise<void> {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextCheckAt = null;

    const inFlight = this.current;
    if (!inFlight) {
      log.info('Stopped stock monitor');
      return;
    }

    log.info(`Waiting up to ${timeoutMs}ms for the running cycle to finish...`);
    let drainTimer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      inFlight.then(() => false),
      new Promise<boolean>(resolve => {
        drainTimer = setTimeout(() => resolve(true), timeoutMs);
      }),
    ]);
    clearTimeout(drainTimer);

    if (timedOut) {
      // Aborting cancels the fetch and releases dispatch, so the cycle still persists.
      log.warn('Drain timeout reached, skipping remaining sends');
      this.abortController?.abort();
      await inFlight;
    }
    log.info('Stopped stock monitor');
  }

  getStatus(): MonitorStatus {
    return {
      phase: this.phase,
      running: this.current !== null,
      lastResult: this.lastResult,
      lastSkip: this.lastSkip,
      lastCompletedAt: this.lastCompletedAt,
      nextCheckAt: this.nextCheckAt?.toISOString() ?? null,
      schedule: this.deps.schedule.describe(this.now()),
    };
  }

  private scheduleNext(): void {
    if (this.stopped) return;
    const delay = this.deps.schedule.intervalMs(this.now());
    this.nextCheckAt = new Date(this.now().getTime() + delay);
    this.timer = setTimeout(() => {
      this.scheduleNext();
      this.tick(false);
    }, delay);
  }

  private tick(force: boolean): void {
    if (!force && this.deps.schedule.isQuiet(this.now())) {
      log.info('Skipping stock check during quiet hours');
      this.lastSkip = { reason: 'quiet_hours', at: this.now().toISOString() };
      return;
    }
    this.runCycle().catch((error: unknown) => {
      log.error('Unexpected error during stock check:', error);
    });
  }

  async runCycle(): Promise<CycleResult> {
    if (this.current) {
      log.warn('Previous stock check still running, skipping this tick');
      this.lastSkip = { reason: 'cycle_in_progress', at: this.now().toISOString() };
      return { status: 'skipped', reason: 'cycle_in_progress' };
    }

    const abortController = new AbortController();
    this.abortController = abortController;
    const cycle = this.executeCycle(abortController.signal);
    this.current = cycle;

    try {
      const result = await cycle;
      this.lastResult = result;
      if (result.status === 'completed') {
        this.lastCompletedAt = result.finishedAt;
      }
      return result;
    } finally {
      this.current = null;
      this.abortController = null;
      this.phase = 'idle';
    }
  }

  private async executeCycle(signal: AbortSignal): Promise<CycleResult> {
    const { api, store, dispatcher, productIds } = this.deps;
    const startedAt = this.now().toISOString();
    log.info('Running stock check...');

    this.phase = 'fetching';
    let snapshot: AvailabilitySnapshot;
    try {
      snapshot = await api.fetchAvailability(productIds, { signal });
    } catch (error) {
      log.error(`Stock check aborted, fetch failed: ${errorMessage(error)}`);
      return { status: 'fetch_failed', error: errorMessage(error), startedAt, finishedAt: this.now().toISOString() };
    }
    const observedAt = this.now().toISOString();
    log.info(`Fetched availability for ${snapshot.size}/${productIds.size} products`);

    this.phase = 'diffing';
    let baseline: Baseline;
    try {
      baseline = await store.getBaseline();
    } catch (error) {
      log.error(`Stock check aborted, could not load baseline: ${errorMessage(error)}`);
      return { status: 'store_failed', error: errorMessage(error), startedAt, finishedAt: this.now().toISOString() };
    }
    const { events, updates } = this.availability.detectTransitions(snapshot, baseline, observedAt);
    for (const event of events) {
      log.info(`${event.productId}: ${event.previousState ? 'in stock' : 'out of stock'} -> ${event.newState ? 'in stock' : 'out of stock'}`);
    }

    this.phase = 'dispatching';
    const report = await dispatcher.dispatch(events, productId => store.getSubscribers(productId), { signal });

    // Delivery outcome never blocks the baseline write.
    this.phase = 'persisting';
    let persisted = 0;
    let persistFailures = 0;
    for (const update of updates) {
      try {
        await store.updateBaseline(update.productId, update.inStock, update.updatedAt, update.price);
        persisted++;
      } catch (error) {
        persistFailures++;
        log.error(`Could not persist state for ${update.productId}: ${errorMessage(error)}`);
      }
    }

    log.info(
      `Check complete. ${events.length} transitions, ${report.sendsSucceeded}/${report.sendsAttempted} notifications sent, ` +
      `${report.sendsFailed} failed, ${persisted} states saved` +
      (persistFailures > 0 ? `, ${persistFailures} not saved` : '')
    );

    return {
      status: 'completed',
      startedAt,
      finishedAt: this.now().toISOString(),
      productsObserved: snapshot.size,
      events,
      report,
      persisted,
      persistFailures,
    };
  }
}
