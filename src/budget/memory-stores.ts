/**
 * In-memory budget stores for testing and development.
 * Single-threaded, so every increment is atomic.
 */
import { addMoney, ZERO } from '@/core/money.js';
import type { Money } from '@/core/money.js';
import type { AccumulatingPeriod, BudgetScope, PeriodType } from '@/core/types.js';
import { scopeKey } from '@/core/types.js';
import type {
  AlertEvent,
  AlertStore,
  BudgetLimit,
  BudgetLimitStore,
  SpendAggregate,
  SpendIncrement,
  SpendStore,
  SpendUpdate,
} from './types.js';

function aggregateKey(scope: BudgetScope, periodType: PeriodType, periodStart: Date): string {
  return `${scopeKey(scope)}:${periodType}:${periodStart.toISOString()}`;
}

export function createInMemoryBudgetLimitStore(seed: readonly BudgetLimit[] = []): BudgetLimitStore {
  const limits = new Map<string, BudgetLimit>();
  for (const limit of seed) limits.set(`${scopeKey(limit.scope)}:${limit.periodType}`, limit);

  return {
    find(scope: BudgetScope, periodType: PeriodType): Promise<BudgetLimit | null> {
      return Promise.resolve(limits.get(`${scopeKey(scope)}:${periodType}`) ?? null);
    },

    upsert(limit: BudgetLimit): Promise<void> {
      limits.set(`${scopeKey(limit.scope)}:${limit.periodType}`, limit);
      return Promise.resolve();
    },
  };
}

export interface InMemorySpendStore extends SpendStore {
  /** Every aggregate, for assertions. */
  aggregates(): SpendAggregate[];
}

export function createInMemorySpendStore(): InMemorySpendStore {
  const aggregates = new Map<string, SpendAggregate>();
  const recorded = new Set<string>();

  return {
    getSpend(scope: BudgetScope, periodType: AccumulatingPeriod, periodStart: Date): Promise<Money> {
      return Promise.resolve(
        aggregates.get(aggregateKey(scope, periodType, periodStart))?.accumulatedAmount ?? ZERO,
      );
    },

    increment(increment: SpendIncrement): Promise<SpendUpdate> {
      const { requestId, scope, periodType, period, amount } = increment;
      const key = aggregateKey(scope, periodType, period.start);
      const current: SpendAggregate = aggregates.get(key) ?? {
        scope,
        periodType,
        periodStart: period.start,
        periodEnd: period.end,
        accumulatedAmount: ZERO,
      };

      const recordingKey = `${requestId}|${key}`;
      if (recorded.has(recordingKey)) {
        return Promise.resolve({ aggregate: { ...current }, applied: false });
      }

      recorded.add(recordingKey);
      const next = { ...current, accumulatedAmount: addMoney(current.accumulatedAmount, amount) };
      aggregates.set(key, next);
      return Promise.resolve({ aggregate: { ...next }, applied: true });
    },

    aggregates(): SpendAggregate[] {
      return [...aggregates.values()].map((a) => ({ ...a }));
    },
  };
}

export interface InMemoryAlertStore extends AlertStore {
  events(): AlertEvent[];
}

export function createInMemoryAlertStore(): InMemoryAlertStore {
  const events = new Map<string, AlertEvent>();

  return {
    recordAlert(event: AlertEvent): Promise<boolean> {
      const key = `${aggregateKey(event.scope, event.periodType, event.periodStart)}:${event.thresholdPercentage}`;
      if (events.has(key)) return Promise.resolve(false);
      events.set(key, event);
      return Promise.resolve(true);
    },

    list(scope: BudgetScope, periodType?: AccumulatingPeriod): Promise<AlertEvent[]> {
      const key = scopeKey(scope);
      const matching = [...events.values()]
        .filter((e) => scopeKey(e.scope) === key && (!periodType || e.periodType === periodType))
        .sort(
          (a, b) =>
            b.timestamp.getTime() - a.timestamp.getTime() ||
            b.thresholdPercentage - a.thresholdPercentage,
        );
      return Promise.resolve(matching);
    },

    events(): AlertEvent[] {
      return [...events.values()];
    },
  };
}
