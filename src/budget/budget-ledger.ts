/**
 * BudgetLedger: limits and accumulated spend per (scope, period type).
 *
 * Limits and spend are cached independently and invalidated explicitly:
 * recording spend drops exactly the aggregates it touched, and a limit
 * upsert drops exactly that limit. Both are also published on the
 * invalidation bus so ledgers in other processes drop the same keys.
 * Store reads on the check path are bounded by `storeTimeoutMs` and reject
 * with StoreTimeoutError on expiry.
 */
import { withTimeout } from '@/core/async.js';
import { toError, ValidationError } from '@/core/errors.js';
import type { BudgetDenial } from '@/core/errors.js';
import {
  addMoney,
  formatMoney,
  maxMoney,
  percentOf,
  subtractMoney,
  ZERO,
} from '@/core/money.js';
import type { Money } from '@/core/money.js';
import type {
  AccumulatingPeriod,
  BudgetScope,
  Clock,
  PeriodType,
  RequestId,
  ScopeStack,
} from '@/core/types.js';
import { ACCUMULATING_PERIODS, PERIOD_TYPES, scopeKey, systemClock } from '@/core/types.js';
import { createInProcessInvalidationBus } from '@/cache/invalidation-bus.js';
import type { Invalidation, InvalidationBus } from '@/cache/invalidation-bus.js';
import { createMemoryCache } from '@/cache/memory-cache.js';
import type { CacheStats } from '@/cache/memory-cache.js';
import type { Logger } from '@/observability/logger.js';
import { periodFor } from './periods.js';
import type {
  BudgetDecision,
  BudgetLimit,
  BudgetLimitStore,
  BudgetStatus,
  PeriodStatus,
  SpendStore,
  SpendUpdate,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface BudgetLedgerOptions {
  limitStore: BudgetLimitStore;
  spendStore: SpendStore;
  logger: Logger;
  /** Defaults to 5 minutes. */
  limitCacheTtlMs?: number;
  /** Defaults to 1 minute. */
  spendCacheTtlMs?: number;
  /** Upper bound on one store read during a check. Defaults to 50ms. */
  storeTimeoutMs?: number;
  /** Shared with every ledger over the same stores. Defaults to a private in-process bus. */
  bus?: InvalidationBus;
  clock?: Clock;
}

export interface EstimateCheckOptions {
  /** Ad-hoc per-request cap for the first scope in the stack, on top of configured limits. */
  perRequestLimit?: Money;
  at?: Date;
}

/** Counters since the ledger was created. */
export interface BudgetLedgerStats {
  limitCache: CacheStats;
  spendCache: CacheStats;
  limitReads: number;
  spendReads: number;
}

export interface BudgetLedger {
  /**
   * Check an estimate against every scope and period. The first violation in
   * scope-stack order, then per-request, daily, monthly, wins.
   */
  estimateCheck(
    scopes: ScopeStack,
    estimatedCost: Money,
    options?: EstimateCheckOptions,
  ): Promise<BudgetDecision>;
  /** Add the actual cost to the daily and monthly aggregates of every scope. Idempotent per request id. */
  recordSpend(
    requestId: RequestId,
    scopes: ScopeStack,
    actualCost: Money,
    at?: Date,
  ): Promise<SpendUpdate[]>;
  upsertLimit(limit: BudgetLimit): Promise<void>;
  /** Active limit for (scope, periodType), through the cache. */
  getLimit(scope: BudgetScope, periodType: PeriodType): Promise<BudgetLimit | null>;
  getStatus(scope: BudgetScope, at?: Date): Promise<BudgetStatus>;
  stats(): BudgetLedgerStats;
  /** Stop listening to the invalidation bus. */
  close(): void;
}

interface Slot {
  scope: BudgetScope;
  periodType: PeriodType;
  limit: BudgetLimit | null;
  spend: Money;
}

function limitKey(scope: BudgetScope, periodType: PeriodType): string {
  return `${scopeKey(scope)}:${periodType}`;
}

function spendKey(scope: BudgetScope, periodType: AccumulatingPeriod, periodStart: Date): string {
  return `${scopeKey(scope)}:${periodType}:${periodStart.toISOString()}`;
}

function deny(
  scope: BudgetScope,
  periodType: PeriodType,
  currentSpend: Money,
  limit: Money,
  estimatedCost: Money,
): BudgetDecision {
  const denial: BudgetDenial = {
    scope,
    periodType,
    currentSpend: formatMoney(currentSpend),
    limit: formatMoney(limit),
    estimatedCost: formatMoney(estimatedCost),
  };
  return { outcome: 'deny', denial };
}

// ─── Factory ────────────────────────────────────────────────────

export function createBudgetLedger(options: BudgetLedgerOptions): BudgetLedger {
  const {
    limitStore,
    spendStore,
    logger,
    limitCacheTtlMs = 300_000,
    spendCacheTtlMs = 60_000,
    storeTimeoutMs = 50,
    bus = createInProcessInvalidationBus(),
    clock = systemClock,
  } = options;

  // Inactive and missing limits are both cached as null.
  const limitCache = createMemoryCache<BudgetLimit | null>({ ttlMs: limitCacheTtlMs, clock });
  const spendCache = createMemoryCache<Money>({ ttlMs: spendCacheTtlMs, clock });
  let limitReads = 0;
  let spendReads = 0;

  function apply(invalidation: Invalidation): void {
    switch (invalidation.kind) {
      case 'limit':
        limitCache.delete(limitKey(invalidation.scope, invalidation.periodType));
        return;
      case 'spend':
        spendCache.delete(
          spendKey(invalidation.scope, invalidation.periodType, invalidation.periodStart),
        );
        return;
      case 'price':
        return;
    }
  }

  /** Drop the keys here, then tell every other ledger. */
  async function invalidate(invalidations: readonly Invalidation[]): Promise<void> {
    invalidations.forEach(apply);
    await bus.publish(invalidations);
  }

  const unsubscribe = bus.subscribe(apply);

  async function getLimit(scope: BudgetScope, periodType: PeriodType): Promise<BudgetLimit | null> {
    const key = limitKey(scope, periodType);
    const hit = limitCache.lookup(key);
    if (hit.status === 'fresh') return hit.value;

    const stamp = limitCache.stamp();
    limitReads++;
    const limit = await withTimeout(
      limitStore.find(scope, periodType),
      storeTimeoutMs,
      'budget limit lookup',
    );
    const active = limit?.isActive ? limit : null;
    limitCache.set(key, active, stamp);
    return active;
  }

  async function getSpend(
    scope: BudgetScope,
    periodType: AccumulatingPeriod,
    periodStart: Date,
  ): Promise<Money> {
    const key = spendKey(scope, periodType, periodStart);
    const cached = spendCache.get(key);
    if (cached !== undefined) return cached;

    const stamp = spendCache.stamp();
    spendReads++;
    const spend = await withTimeout(
      spendStore.getSpend(scope, periodType, periodStart),
      storeTimeoutMs,
      'spend lookup',
    );
    spendCache.set(key, spend, stamp);
    return spend;
  }

  /** Load every limit, then the spend for limited periods, in parallel. */
  async function loadSlots(scopes: ScopeStack, at: Date): Promise<Slot[]> {
    const pairs = scopes.flatMap((scope) =>
      PERIOD_TYPES.map((periodType) => ({ scope, periodType })),
    );
    const limits = await Promise.all(pairs.map((p) => getLimit(p.scope, p.periodType)));

    return Promise.all(
      pairs.map(async ({ scope, periodType }, i): Promise<Slot> => {
        const limit = limits[i] ?? null;
        if (!limit || periodType === 'per_request') {
          return { scope, periodType, limit, spend: ZERO };
        }
        const period = periodFor(periodType, at);
        return { scope, periodType, limit, spend: await getSpend(scope, periodType, period.start) };
      }),
    );
  }

  return {
    async estimateCheck(
      scopes: ScopeStack,
      estimatedCost: Money,
      checkOptions?: EstimateCheckOptions,
    ): Promise<BudgetDecision> {
      const at = checkOptions?.at ?? clock();
      const adHocLimit = checkOptions?.perRequestLimit;
      const requestScope = scopes[0];

      if (requestScope && adHocLimit !== undefined && estimatedCost > adHocLimit) {
        return deny(requestScope, 'per_request', ZERO, adHocLimit, estimatedCost);
      }

      for (const slot of await loadSlots(scopes, at)) {
        if (!slot.limit) continue;
        if (addMoney(slot.spend, estimatedCost) > slot.limit.limitAmount) {
          return deny(slot.scope, slot.periodType, slot.spend, slot.limit.limitAmount, estimatedCost);
        }
      }

      return { outcome: 'allow' };
    },

    async recordSpend(
      requestId: RequestId,
      scopes: ScopeStack,
      actualCost: Money,
      at?: Date,
    ): Promise<SpendUpdate[]> {
      if (actualCost < 0n) {
        throw new ValidationError('Spend must not be negative', {
          requestId,
          actualCost: formatMoney(actualCost),
        });
      }
      const when = at ?? clock();

      const touched = scopes.flatMap((scope) =>
        ACCUMULATING_PERIODS.map((periodType) => ({
          scope,
          periodType,
          period: periodFor(periodType, when),
        })),
      );
      const settled = await Promise.allSettled(
        touched.map(({ scope, periodType, period }) =>
          spendStore.increment({ requestId, scope, periodType, period, amount: actualCost }),
        ),
      );
      // Invalidate even after a partial failure: some aggregates may have moved.
      await invalidate(
        touched.map(({ scope, periodType, period }): Invalidation => ({
          kind: 'spend',
          scope,
          periodType,
          periodStart: period.start,
        })),
      );

      const updates: SpendUpdate[] = [];
      for (const result of settled) {
        if (result.status === 'rejected') throw toError(result.reason);
        updates.push(result.value);
      }

      const duplicates = updates.filter((u) => !u.applied).length;
      logger.debug('Recorded spend', {
        component: 'budget-ledger',
        requestId,
        amount: formatMoney(actualCost),
        aggregates: updates.length,
        duplicates,
      });

      return updates;
    },

    async upsertLimit(limit: BudgetLimit): Promise<void> {
      if (limit.limitAmount < 0n) {
        throw new ValidationError('Limit amount must not be negative', {
          limitAmount: formatMoney(limit.limitAmount),
        });
      }
      await limitStore.upsert(limit);
      await invalidate([{ kind: 'limit', scope: limit.scope, periodType: limit.periodType }]);
      logger.info('Budget limit updated', {
        component: 'budget-ledger',
        scopeType: limit.scope.scopeType,
        scopeId: limit.scope.scopeId,
        periodType: limit.periodType,
        limitAmount: formatMoney(limit.limitAmount),
        isActive: limit.isActive,
      });
    },

    getLimit,

    async getStatus(scope: BudgetScope, at?: Date): Promise<BudgetStatus> {
      const when = at ?? clock();
      const slots = await loadSlots([scope], when);
      const periods: PeriodStatus[] = [];

      for (const slot of slots) {
        if (!slot.limit) continue;
        const limitAmount = slot.limit.limitAmount;
        periods.push({
          periodType: slot.periodType,
          limit: limitAmount,
          spent: slot.spend,
          remaining: maxMoney(subtractMoney(limitAmount, slot.spend), ZERO),
          percentUsed: percentOf(slot.spend, limitAmount),
          isOver: limitAmount > 0n ? slot.spend >= limitAmount : slot.spend > 0n,
          period: slot.periodType === 'per_request' ? undefined : periodFor(slot.periodType, when),
        });
      }

      return { scope, periods };
    },

    stats(): BudgetLedgerStats {
      return {
        limitCache: limitCache.stats(),
        spendCache: spendCache.stats(),
        limitReads,
        spendReads,
      };
    },

    close(): void {
      unsubscribe();
    },
  };
}
