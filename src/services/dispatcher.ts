import { DeliveryError, errorMessage } from '../errors.js';
import type {
  ChatId,
  DeliveryFailure,
  DeliveryRecord,
  DispatchReport,
  MessageSender,
  SubscribersOf,
  TransitionEvent,
} from '../types.js';
import { AvailabilityMonitor } from './availability-monitor.js';
import { createLogger } from '../utils/logger.js';
import { RatePacer, forEachBounded } from '../utils/throttle.js';

const log = createLogger('Dispatcher');

export interface DispatcherOptions {
  send: MessageSender;
  concurrency: number;
  /** Upper bound on send starts per second across all lanes. */
  rateLimitPerSecond: number;
  pacer?: RatePacer;
  onDelivery?: (record: DeliveryRecord) => void;
}

interface SendJob {
  chatId: ChatId;
  event: TransitionEvent;
}

export function emptyReport(): DispatchReport {
  return {
    eventsProcessed: 0,
    sendsAttempted: 0,
    sendsSucceeded: 0,
    sendsFailed: 0,
    skipped: 0,
    failures: [],
  };
}

export class NotificationDispatcher {
  private send: MessageSender;
  private concurrency: number;
  private pacer: RatePacer;
  private onDelivery: ((record: DeliveryRecord) => void) | undefined;

  constructor(options: DispatcherOptions) {
    this.send = options.send;
    this.concurrency = Math.max(1, options.concurrency);
    this.pacer = options.pacer ?? new RatePacer(options.rateLimitPerSecond);
    this.onDelivery = options.onDelivery;
  }

  /**
   * Fans each back-in-stock event out to its subscribers. Out-of-stock
   * events are counted but never sent. One recipient failing does not
   * stop the others. Once `signal` aborts, queued sends are skipped and the
   * report is returned without waiting on sends still in flight; those are
   * counted as skipped even if they land later.
   */
  async dispatch(
    events: readonly TransitionEvent[],
    subscribersOf: SubscribersOf,
    options: { signal?: AbortSignal } = {}
  ): Promise<DispatchReport> {
    const { signal } = options;
    const report = emptyReport();
    const jobs: SendJob[] = [];

    for (const event of events) {
      report.eventsProcessed++;
      if (!event.newState) continue;

      try {
        const subscribers = await subscribersOf(event.productId);
        for (const chatId of [...subscribers].sort()) {
          jobs.push({ chatId, event });
        }
      } catch (error) {
        log.error(`Could not resolve subscribers for ${event.productId}:`, error);
        report.failures.push({
          chatId: null,
          productId: event.productId,
          reason: 'lookup_failed',
          message: errorMessage(error),
        });
      }
    }

    const work = forEachBounded(jobs, this.concurrency, async (job) => {
      if (signal?.aborted) {
        report.skipped++;
        return;
      }
      await this.pacer.acquire();
      if (signal?.aborted) {
        report.skipped++;
        return;
      }
      await this.deliver(job, report);
    });

    let finished = true;
    if (signal) {
      const abort = afterAbort(signal);
      try {
        finished = await Promise.race([work.then(() => true), abort.promise.then(() => false)]);
      } finally {
        abort.dispose();
      }
    } else {
      await work;
    }

    // Abandoned sends keep writing to `report`; the caller gets a copy.
    const result: DispatchReport = finished
      ? report
      : {
          ...report,
          sendsAttempted: report.sendsSucceeded + report.sendsFailed,
          skipped: jobs.length - report.sendsSucceeded - report.sendsFailed,
          failures: [...report.failures],
        };

    result.failures.sort((a, b) =>
      AvailabilityMonitor.compareIds(a.productId, b.productId) ||
      AvailabilityMonitor.compareIds(a.chatId ?? '', b.chatId ?? '')
    );

    if (!finished) {
      const abandoned = report.sendsAttempted - result.sendsAttempted;
      log.warn(`Stopped waiting on ${abandoned} in-flight sends after shutdown was requested`);
    }
    if (result.skipped > 0) {
      log.warn(`Skipped ${result.skipped} sends after shutdown was requested`);
    }

    return result;
  }

  private async deliver({ chatId, event }: SendJob, report: DispatchReport): Promise<void> {
    report.sendsAttempted++;
    try {
      await this.send(chatId, event);
      report.sendsSucceeded++;
      log.debug(`Notified ${chatId} about ${event.productId}`);
      this.record({ chatId, productId: event.productId, delivered: true, reason: null, sentAt: new Date().toISOString() });
    } catch (error) {
      const failure: DeliveryFailure = {
        chatId,
        productId: event.productId,
        reason: error instanceof DeliveryError ? error.reason : 'send_failed',
        message: errorMessage(error),
      };
      report.sendsFailed++;
      report.failures.push(failure);
      log.warn(`Failed to notify ${chatId} about ${event.productId} (${failure.reason}): ${failure.message}`);
      this.record({ chatId, productId: event.productId, delivered: false, reason: failure.reason, sentAt: new Date().toISOString() });
    }
  }

  private record(record: DeliveryRecord): void {
    if (!this.onDelivery) return;
    try {
      this.onDelivery(record);
    } catch (error) {
      log.error(`Could not record delivery to ${record.chatId}:`, error);
    }
  }
}

/**
 * Settles one macrotask after `signal` aborts, so sends that already
 * finished are counted before the dispatcher stops waiting.
 */
function afterAbort(signal: AbortSignal): { promise: Promise<void>; dispose: () => void } {
  let timer: NodeJS.Timeout | undefined;
  let onAbort = (): void => {};
  const promise = new Promise<void>(resolve => {
    onAbort = () => {
      timer = setTimeout(resolve, 0);
    };
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });
  });
  return {
    promise,
    dispose: () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    },
  };
}
