/**
 * PostgreSQL-backed budget stores.
 *
 * Spend increments are a single statement: the request's row in
 * `spend_recordings` is inserted first, and the aggregate is only bumped when
 * that insert took effect. Replays hit the recording's primary key and leave
 * the aggregate untouched; concurrent increments serialize on the aggregate row.
 */
import { formatMoney, parseMoney, ZERO } from '@/core/money.js';
import type { Money } from '@/core/money.js';
import type { AccumulatingPeriod, BudgetScope, PeriodType, ScopeId, ScopeType } from '@/core/types.js';
import type { Queryable } from '@/infrastructure/database.js';
import type {
  AlertEvent,
  AlertSeverity,
  AlertStore,
  BudgetLimit,
  BudgetLimitStore,
  SpendIncrement,
  SpendStore,
  SpendUpdate,
} from './types.js';

// ─── Budget Limits ──────────────────────────────────────────────

interface LimitRow {
  scope_type: ScopeType;
  scope_id: string;
  period_type: PeriodType;
  limit_amount: string;
  currency: string;
  alert_thresholds: string[];
  is_active: boolean;
}

function toLimit(row: LimitRow): BudgetLimit {
  return {
    scope: { scopeType: row.scope_type, scopeId: row.scope_id as ScopeId },
    periodType: row.period_type,
    limitAmount: parseMoney(row.limit_amount),
    currency: row.currency,
    alertThresholds: row.alert_thresholds.map(Number).sort((a, b) => a - b),
    isActive: row.is_active,
  };
}

export function createPgBudgetLimitStore(db: Queryable): BudgetLimitStore {
  return {
    async find(scope: BudgetScope, periodType: PeriodType): Promise<BudgetLimit | null> {
      const result = await db.query<LimitRow>(
        `SELECT scope_type, scope_id, period_type, limit_amount::text AS limit_amount, currency,
                alert_thresholds::text[] AS alert_thresholds, is_active
           FROM budget_limits
          WHERE scope_type = $1 AND scope_id = $2 AND period_type = $3`,
        [scope.scopeType, scope.scopeId, periodType],
      );
      const row = result.rows[0];
      return row ? toLimit(row) : null;
    },

    async upsert(limit: BudgetLimit): Promise<void> {
      await db.query(
        `INSERT INTO budget_limits
           (scope_type, scope_id, period_type, limit_amount, currency, alert_thresholds, is_active)
         VALUES ($1, $2, $3, $4, $5, $6::numeric[], $7)
         ON CONFLICT (scope_type, scope_id, period_type) DO UPDATE SET
           limit_amount = EXCLUDED.limit_amount,
           currency = EXCLUDED.currency,
           alert_thresholds = EXCLUDED.alert_thresholds,
           is_active = EXCLUDED.is_active,
           updated_at = now()`,
        [
          limit.scope.scopeType,
          limit.scope.scopeId,
          limit.periodType,
          formatMoney(limit.limitAmount),
          limit.currency,
          [...limit.alertThresholds],
          limit.isActive,
        ],
      );
    },
  };
}

// ─── Spend Aggregates ───────────────────────────────────────────

interface IncrementRow {
  applied_amount: string | null;
  previous_amount: string | null;
}

export function createPgSpendStore(db: Queryable): SpendStore {
  return {
    async getSpend(
      scope: BudgetScope,
      periodType: AccumulatingPeriod,
      periodStart: Date,
    ): Promise<Money> {
      const result = await db.query<{ accumulated_amount: string }>(
        `SELECT accumulated_amount::text AS accumulated_amount
           FROM spend_aggregates
          WHERE scope_type = $1 AND scope_id = $2 AND period_type = $3 AND period_start = $4`,
        [scope.scopeType, scope.scopeId, periodType, periodStart],
      );
      const row = result.rows[0];
      return row ? parseMoney(row.accumulated_amount) : ZERO;
    },

    async increment(increment: SpendIncrement): Promise<SpendUpdate> {
      const { requestId, scope, periodType, period, amount } = increment;
      // The outer SELECT reads the pre-statement snapshot, so previous_amount
      // is the aggregate as it stood when the replay was detected.
      const result = await db.query<IncrementRow>(
        `WITH recorded AS (
           INSERT INTO spend_recordings (request_id, scope_type, scope_id, period_type, period_start, amount)
           VALUES ($1, $2, $3, $4, $5::timestamptz, $7::numeric)
           ON CONFLICT DO NOTHING
           RETURNING amount
         ), bumped AS (
           INSERT INTO spend_aggregates (scope_type, scope_id, period_type, period_start, period_end, accumulated_amount)
           SELECT $2::text, $3::text, $4::text, $5::timestamptz, $6::timestamptz, amount FROM recorded
           ON CONFLICT (scope_type, scope_id, period_type, period_start) DO UPDATE SET
             accumulated_amount = spend_aggregates.accumulated_amount + EXCLUDED.accumulated_amount,
             updated_at = now()
           RETURNING accumulated_amount
         )
         SELECT (SELECT accumulated_amount::text FROM bumped) AS applied_amount,
                (SELECT accumulated_amount::text FROM spend_aggregates
                  WHERE scope_type = $2 AND scope_id = $3 AND period_type = $4 AND period_start = $5
                ) AS previous_amount`,
        [
          requestId,
          scope.scopeType,
          scope.scopeId,
          periodType,
          period.start,
          period.end,
          formatMoney(amount),
        ],
      );

      const row = result.rows[0];
      const applied = typeof row?.applied_amount === 'string';
      const total = row?.applied_amount ?? row?.previous_amount ?? null;
      return {
        applied,
        aggregate: {
          scope,
          periodType,
          periodStart: period.start,
          periodEnd: period.end,
          accumulatedAmount: total === null ? ZERO : parseMoney(total),
        },
      };
    },
  };
}

// ─── Alert Events ───────────────────────────────────────────────

interface AlertRow {
  scope_type: ScopeType;
  scope_id: string;
  period_type: AccumulatingPeriod;
  period_start: Date;
  threshold_percentage: string;
  severity: AlertSeverity;
  spend_at_trigger: string;
  limit_at_trigger: string;
  triggered_at: Date;
}

function toAlert(row: AlertRow): AlertEvent {
  return {
    scope: { scopeType: row.scope_type, scopeId: row.scope_id as ScopeId },
    periodType: row.period_type,
    periodStart: row.period_start,
    thresholdPercentage: Number(row.threshold_percentage),
    severity: row.severity,
    spendAtTrigger: parseMoney(row.spend_at_trigger),
    limitAtTrigger: parseMoney(row.limit_at_trigger),
    timestamp: row.triggered_at,
  };
}

export function createPgAlertStore(db: Queryable): AlertStore {
  return {
    async recordAlert(event: AlertEvent): Promise<boolean> {
      const result = await db.query(
        `INSERT INTO alert_events
           (scope_type, scope_id, period_type, period_start, threshold_percentage, severity,
            spend_at_trigger, limit_at_trigger, triggered_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (scope_type, scope_id, period_type, period_start, threshold_percentage) DO NOTHING
         RETURNING id`,
        [
          event.scope.scopeType,
          event.scope.scopeId,
          event.periodType,
          event.periodStart,
          event.thresholdPercentage,
          event.severity,
          formatMoney(event.spendAtTrigger),
          formatMoney(event.limitAtTrigger),
          event.timestamp,
        ],
      );
      return (result.rowCount ?? 0) > 0;
    },

    async list(scope: BudgetScope, periodType?: AccumulatingPeriod): Promise<AlertEvent[]> {
      const result = await db.query<AlertRow>(
        `SELECT scope_type, scope_id, period_type, period_start,
                threshold_percentage::text AS threshold_percentage, severity,
                spend_at_trigger::text AS spend_at_trigger,
                limit_at_trigger::text AS limit_at_trigger, triggered_at
           FROM alert_events
          WHERE scope_type = $1 AND scope_id = $2
            AND ($3::text IS NULL OR period_type = $3)
          ORDER BY triggered_at DESC, threshold_percentage DESC`,
        [scope.scopeType, scope.scopeId, periodType ?? null],
      );
      return result.rows.map(toAlert);
    },
  };
}
