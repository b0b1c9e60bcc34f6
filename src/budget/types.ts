import type { BudgetDenial } from '@/core/errors.js';
import type { Money } from '@/core/money.js';
import type {
  AccumulatingPeriod,
  BudgetScope,
  PeriodType,
  RequestId,
} from '@/core/types.js';

// ─── Limits ─────────────────────────────────────────────────────

/** At most one limit exists per (scope, periodType). */
export interface BudgetLimit {
  scope: BudgetScope;
  periodType: PeriodType;
  limitAmount: Money;
  currency: string;
  /** Percentages, ascending. */
  alertThresholds: readonly number[];
  isActive: boolean;
}

// ─── Spend ──────────────────────────────────────────────────────

export interface Period {
  start: Date;
  /** Exclusive. */
  end: Date;
}

export interface SpendAggregate {
  scope: BudgetScope;
  periodType: AccumulatingPeriod;
  periodStart: Date;
  periodEnd: Date;
  accumulatedAmount: Money;
}

export interface SpendIncrement {
  requestId: RequestId;
  scope: BudgetScope;
  periodType: AccumulatingPeriod;
  period: Period;
  amount: Money;
}

export interface SpendUpdate {
  aggregate: SpendAggregate;
  /** False when this request had already been recorded for the aggregate. */
  applied: boolean;
}

// ─── Alerts ─────────────────────────────────────────────────────

export type AlertSeverity = 'low' | 'medium' | 'high' | 'critical';

/** Write-once record of a threshold crossing. */
export interface AlertEvent {
  scope: BudgetScope;
  periodType: AccumulatingPeriod;
  periodStart: Date;
  thresholdPercentage: number;
  severity: AlertSeverity;
  spendAtTrigger: Money;
  limitAtTrigger: Money;
  timestamp: Date;
}

// ─── Decisions & Status ─────────────────────────────────────────

export type BudgetDecision =
  | { outcome: 'allow' }
  | { outcome: 'deny'; denial: BudgetDenial };

export interface PeriodStatus {
  periodType: PeriodType;
  limit: Money;
  spent: Money;
  remaining: Money;
  percentUsed: number;
  isOver: boolean;
  period?: Period;
}

export interface BudgetStatus {
  scope: BudgetScope;
  periods: PeriodStatus[];
}

// ─── Stores ─────────────────────────────────────────────────────

export interface BudgetLimitStore {
  find(scope: BudgetScope, periodType: PeriodType): Promise<BudgetLimit | null>;
  /** Insert or replace the limit for (scope, periodType). */
  upsert(limit: BudgetLimit): Promise<void>;
}

export interface SpendStore {
  getSpend(scope: BudgetScope, periodType: AccumulatingPeriod, periodStart: Date): Promise<Money>;
  /**
   * Atomically add `amount` to the aggregate, at most once per request id.
   * Concurrent increments for the same aggregate must commute.
   */
  increment(increment: SpendIncrement): Promise<SpendUpdate>;
}

export interface AlertStore {
  /** Persist the event unless its (scope, period, periodStart, threshold) key exists. Returns whether it was new. */
  recordAlert(event: AlertEvent): Promise<boolean>;
  /** Events for the scope, newest first, optionally for one period type. */
  list(scope: BudgetScope, periodType?: AccumulatingPeriod): Promise<AlertEvent[]>;
}
