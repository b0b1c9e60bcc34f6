import { describe, it, expect, vi, beforeEach } from 'vitest';
import { parseMoney } from '@/core/money.js';
import { createBudgetLimit } from '@/testing/fixtures/budget.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import type { MockLogger } from '@/testing/fixtures/logger.js';
import { USER_SCOPE } from '@/testing/fixtures/scopes.js';
import { createAlertDispatcher, severityFor } from './alert-dispatcher.js';
import { createInMemoryAlertStore } from './memory-stores.js';
import type { InMemoryAlertStore } from './memory-stores.js';
import { periodFor } from './periods.js';
import type { SpendAggregate } from './types.js';

const AT = new Date('2025-06-15T12:00:00.000Z');

function aggregate(amount: string): SpendAggregate {
  const period = periodFor('monthly', AT);
  return {
    scope: USER_SCOPE,
    periodType: 'monthly',
    periodStart: period.start,
    periodEnd: period.end,
    accumulatedAmount: parseMoney(amount),
  };
}

describe('severityFor', () => {
  it('grades thresholds', () => {
    expect(severityFor(50)).toBe('low');
    expect(severityFor(80)).toBe('medium');
    expect(severityFor(95)).toBe('high');
    expect(severityFor(100)).toBe('critical');
    expect(severityFor(150)).toBe('critical');
  });
});

describe('AlertDispatcher', () => {
  let logger: MockLogger;
  let alertStore: InMemoryAlertStore;
  const limit = createBudgetLimit(USER_SCOPE, 'monthly', '100');

  beforeEach(() => {
    logger = createMockLogger();
    alertStore = createInMemoryAlertStore();
  });

  function build(): ReturnType<typeof createAlertDispatcher> {
    return createAlertDispatcher({ alertStore, logger, clock: () => AT });
  }

  it('fires nothing below the lowest threshold', async () => {
    expect(await build().evaluate(aggregate('70'), limit)).toEqual([]);
  });

  it('fires every crossed threshold in ascending order', async () => {
    const dispatcher = build();
    await dispatcher.evaluate(aggregate('70'), limit);

    const fired = await dispatcher.evaluate(aggregate('120'), limit);

    expect(fired.map((e) => e.thresholdPercentage)).toEqual([80, 95, 100]);
    expect(fired.map((e) => e.severity)).toEqual(['medium', 'high', 'critical']);
    expect(fired[0]?.spendAtTrigger).toBe(parseMoney('120'));
    expect(fired[0]?.limitAtTrigger).toBe(parseMoney('100'));
    expect(fired[0]?.timestamp).toBe(AT);
    expect(logger.info).toHaveBeenCalledTimes(3);
  });

  it('treats reaching a threshold exactly as crossing it', async () => {
    const fired = await build().evaluate(aggregate('80'), limit);

    expect(fired.map((e) => e.thresholdPercentage)).toEqual([80]);
  });

  it('fires each threshold once per period', async () => {
    const dispatcher = build();
    await dispatcher.evaluate(aggregate('85'), limit);

    const again = await dispatcher.evaluate(aggregate('90'), limit);
    const next = await dispatcher.evaluate(aggregate('96'), limit);

    expect(again).toEqual([]);
    expect(next.map((e) => e.thresholdPercentage)).toEqual([95]);
    expect(alertStore.events()).toHaveLength(2);
  });

  it('ignores inactive limits and zero spend', async () => {
    const dispatcher = build();

    expect(await dispatcher.evaluate(aggregate('500'), { ...limit, isActive: false })).toEqual([]);
    expect(await dispatcher.evaluate(aggregate('0'), limit)).toEqual([]);
  });

  it('deduplicates and orders configured thresholds', async () => {
    const recordAlert = vi.spyOn(alertStore, 'recordAlert');
    const custom = { ...limit, alertThresholds: [100, 50, 50] };

    const fired = await build().evaluate(aggregate('100'), custom);

    expect(fired.map((e) => e.thresholdPercentage)).toEqual([50, 100]);
    expect(recordAlert).toHaveBeenCalledTimes(2);
  });
});
