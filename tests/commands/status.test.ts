import { describe, it, expect } from 'vitest';
import { describeLastCycle, describeLastSkip } from '../../src/commands/status.js';
import type { MonitorStatus } from '../../src/monitors/index.js';
import type { CycleResult } from '../../src/types.js';

const status = (lastResult: CycleResult | null): MonitorStatus => ({
  phase: 'idle',
  running: false,
  lastResult,
  lastSkip: null,
  lastCompletedAt: null,
  nextCheckAt: null,
  schedule: 'normal hours, every 2 min',
});

describe('describeLastCycle', () => {
  it('says when nothing has run', () => {
    expect(describeLastCycle(status(null))).toBe('No check has finished yet');
  });

  it('describes skipped and failed checks', () => {
    expect(describeLastCycle(status({ status: 'skipped', reason: 'cycle_in_progress' }))).toBe('Skipped (cycle in progress)');
    expect(
      describeLastCycle(status({
        status: 'fetch_failed',
        error: 'Failed to fetch stock: 503 Service Unavailable',
        startedAt: '2026-03-01T09:00:00.000Z',
        finishedAt: '2026-03-01T09:00:01.000Z',
      }))
    ).toBe('Stock API failed: Failed to fetch stock: 503 Service Unavailable');
  });

  it('summarises a completed check', () => {
    const event = { productId: 'A', previousState: false, newState: true, price: null, occurredAt: '2026-03-01T09:00:00.000Z' };
    const summary = describeLastCycle(status({
      status: 'completed',
      startedAt: '2026-03-01T09:00:00.000Z',
      finishedAt: '2026-03-01T09:00:02.000Z',
      productsObserved: 11,
      events: [event, { ...event, productId: 'B' }],
      report: { eventsProcessed: 2, sendsAttempted: 4, sendsSucceeded: 3, sendsFailed: 1, skipped: 0, failures: [] },
      persisted: 1,
      persistFailures: 1,
    }));

    expect(summary).toBe('2 transitions across 11 products\n3/4 alerts delivered, 1 failed\n1 states not saved');
  });
});

describe('describeLastSkip', () => {
  it('is empty until a tick is skipped', () => {
    expect(describeLastSkip(status(null))).toBeNull();
  });

  it('names the reason and when it happened', () => {
    const quiet: MonitorStatus = {
      ...status(null),
      lastSkip: { reason: 'quiet_hours', at: '2026-03-01T02:00:00.000Z' },
    };

    expect(describeLastSkip(quiet)).toBe('quiet hours <t:1772330400:R>');
  });
});
