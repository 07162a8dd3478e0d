import { describe, it, expect, vi } from 'vitest';
import { DeliveryError } from '../../src/errors.js';
import { NotificationDispatcher } from '../../src/services/dispatcher.js';
import type { ChatId, DeliveryRecord, TransitionEvent } from '../../src/types.js';
import { RatePacer } from '../../src/utils/throttle.js';

const OCCURRED_AT = '2026-03-01T10:00:00.000Z';

const restock = (productId: string): TransitionEvent => ({
  productId,
  previousState: false,
  newState: true,
  price: null,
  occurredAt: OCCURRED_AT,
});

const soldOut = (productId: string): TransitionEvent => ({
  productId,
  previousState: true,
  newState: false,
  price: null,
  occurredAt: OCCURRED_AT,
});

const instantPacer = () => new RatePacer(1000, () => 0, async () => {});

const subscribersFrom = (table: Record<string, ChatId[]>) =>
  (productId: string) => new Set(table[productId] ?? []);

describe('NotificationDispatcher', () => {
  it('isolates a failing recipient from the rest of the batch', async () => {
    const send = vi.fn(async (chatId: ChatId) => {
      if (chatId === '102') throw new DeliveryError(chatId, 'blocked', 'blocked by user');
    });
    const dispatcher = new NotificationDispatcher({ send, concurrency: 2, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch([restock('X')], subscribersFrom({ X: ['101', '102', '103'] }));

    expect(report.eventsProcessed).toBe(1);
    expect(report.sendsAttempted).toBe(3);
    expect(report.sendsSucceeded).toBe(2);
    expect(report.sendsFailed).toBe(1);
    expect(report.failures).toEqual([
      { chatId: '102', productId: 'X', reason: 'blocked', message: 'blocked by user' },
    ]);
    const recipients = send.mock.calls.map(([chatId]) => chatId);
    expect(recipients).toContain('101');
    expect(recipients).toContain('103');
  });

  it('never sends for out-of-stock transitions', async () => {
    const send = vi.fn(async () => {});
    const subscribersOf = vi.fn(subscribersFrom({ X: ['101'] }));
    const dispatcher = new NotificationDispatcher({ send, concurrency: 1, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch([soldOut('X')], subscribersOf);

    expect(send).not.toHaveBeenCalled();
    expect(subscribersOf).not.toHaveBeenCalled();
    expect(report.eventsProcessed).toBe(1);
    expect(report.sendsAttempted).toBe(0);
  });

  it('sends each event to its own subscribers in product order', async () => {
    const calls: string[] = [];
    const send = vi.fn(async (chatId: ChatId, event: TransitionEvent) => {
      calls.push(`${event.productId}:${chatId}`);
    });
    const dispatcher = new NotificationDispatcher({ send, concurrency: 1, rateLimitPerSecond: 1000, pacer: instantPacer() });

    await dispatcher.dispatch(
      [restock('A'), soldOut('B'), restock('C')],
      subscribersFrom({ A: ['2', '1'], B: ['3'], C: ['1'] })
    );

    expect(calls).toEqual(['A:1', 'A:2', 'C:1']);
  });

  it('treats unexpected errors as send failures', async () => {
    const send = vi.fn(async () => {
      throw new Error('socket hang up');
    });
    const dispatcher = new NotificationDispatcher({ send, concurrency: 1, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch([restock('X')], subscribersFrom({ X: ['7'] }));

    expect(report.failures).toEqual([
      { chatId: '7', productId: 'X', reason: 'send_failed', message: 'socket hang up' },
    ]);
  });

  it('records a failed subscriber lookup and carries on', async () => {
    const send = vi.fn(async () => {});
    const subscribersOf = (productId: string) => {
      if (productId === 'A') throw new Error('database is locked');
      return new Set(['9']);
    };
    const dispatcher = new NotificationDispatcher({ send, concurrency: 1, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch([restock('A'), restock('B')], subscribersOf);

    expect(report.eventsProcessed).toBe(2);
    expect(report.sendsSucceeded).toBe(1);
    expect(report.failures).toEqual([
      { chatId: null, productId: 'A', reason: 'lookup_failed', message: 'database is locked' },
    ]);
  });

  it('keeps no more than the configured number of sends in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const send = vi.fn(async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
    });
    const dispatcher = new NotificationDispatcher({ send, concurrency: 2, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch([restock('X')], subscribersFrom({ X: ['1', '2', '3', '4', '5', '6'] }));

    expect(report.sendsSucceeded).toBe(6);
    expect(peak).toBe(2);
  });

  it('spaces send starts according to the rate limit', async () => {
    const waits: number[] = [];
    const pacer = new RatePacer(4, () => 1000, async (ms) => {
      waits.push(ms);
    });
    const dispatcher = new NotificationDispatcher({ send: async () => {}, concurrency: 1, rateLimitPerSecond: 4, pacer });

    await dispatcher.dispatch([restock('X')], subscribersFrom({ X: ['1', '2', '3'] }));

    expect(waits).toEqual([250, 500]);
  });

  it('skips everything when already aborted', async () => {
    const send = vi.fn(async () => {});
    const controller = new AbortController();
    controller.abort();
    const dispatcher = new NotificationDispatcher({ send, concurrency: 2, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch(
      [restock('X')],
      subscribersFrom({ X: ['1', '2', '3'] }),
      { signal: controller.signal }
    );

    expect(send).not.toHaveBeenCalled();
    expect(report.skipped).toBe(3);
    expect(report.sendsAttempted).toBe(0);
  });

  it('finishes the in-flight send and skips the rest after an abort', async () => {
    const controller = new AbortController();
    const send = vi.fn(async () => {
      controller.abort();
    });
    const dispatcher = new NotificationDispatcher({ send, concurrency: 1, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch(
      [restock('X')],
      subscribersFrom({ X: ['1', '2', '3'] }),
      { signal: controller.signal }
    );

    expect(send).toHaveBeenCalledTimes(1);
    expect(report.sendsSucceeded).toBe(1);
    expect(report.skipped).toBe(2);
  });

  it('stops waiting on a send that never settles once aborted', async () => {
    const controller = new AbortController();
    const send = vi.fn(async (chatId: ChatId) => {
      if (chatId === '2') {
        controller.abort();
        await new Promise<void>(() => {});
      }
    });
    const dispatcher = new NotificationDispatcher({ send, concurrency: 1, rateLimitPerSecond: 1000, pacer: instantPacer() });

    const report = await dispatcher.dispatch(
      [restock('X')],
      subscribersFrom({ X: ['1', '2', '3'] }),
      { signal: controller.signal }
    );

    expect(report).toEqual({
      eventsProcessed: 1,
      sendsAttempted: 1,
      sendsSucceeded: 1,
      sendsFailed: 0,
      skipped: 2,
      failures: [],
    });
  });

  it('reports each delivery outcome', async () => {
    const records: DeliveryRecord[] = [];
    const send = async (chatId: ChatId) => {
      if (chatId === '2') throw new DeliveryError(chatId, 'rate_limited', 'slow down');
    };
    const dispatcher = new NotificationDispatcher({
      send,
      concurrency: 1,
      rateLimitPerSecond: 1000,
      pacer: instantPacer(),
      onDelivery: record => records.push(record),
    });

    await dispatcher.dispatch([restock('X')], subscribersFrom({ X: ['1', '2'] }));

    expect(records.map(r => [r.chatId, r.delivered, r.reason])).toEqual([
      ['1', true, null],
      ['2', false, 'rate_limited'],
    ]);
  });

  it('does not let a failing delivery log break dispatch', async () => {
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const dispatcher = new NotificationDispatcher({
      send: async () => {},
      concurrency: 1,
      rateLimitPerSecond: 1000,
      pacer: instantPacer(),
      onDelivery: () => {
        throw new Error('disk full');
      },
    });

    try {
      const report = await dispatcher.dispatch([restock('X')], subscribersFrom({ X: ['1'] }));

      expect(report.sendsSucceeded).toBe(1);
      expect(consoleErrorSpy).toHaveBeenCalled();
    } finally {
      consoleErrorSpy.mockRestore();
    }
  });
});
