/**
 * Domain → wire conversion. Money is rendered with formatMoney, dates as ISO strings.
 */
import type { AlertEvent, BudgetLimit, BudgetStatus } from '@/budget/types.js';
import { formatMoney } from '@/core/money.js';
import type { PriceEntry } from '@/pricing/types.js';
import type {
  AlertEventResponse,
  BudgetLimitResponse,
  BudgetStatusResponse,
  PriceEntryResponse,
} from './types.js';

export function serializeBudgetLimit(limit: BudgetLimit): BudgetLimitResponse {
  return {
    scopeType: limit.scope.scopeType,
    scopeId: limit.scope.scopeId,
    periodType: limit.periodType,
    limitAmount: formatMoney(limit.limitAmount),
    currency: limit.currency,
    alertThresholds: limit.alertThresholds,
    isActive: limit.isActive,
  };
}

export function serializeBudgetStatus(status: BudgetStatus): BudgetStatusResponse {
  return {
    scopeType: status.scope.scopeType,
    scopeId: status.scope.scopeId,
    periods: status.periods.map((period) => ({
      periodType: period.periodType,
      limit: formatMoney(period.limit),
      spent: formatMoney(period.spent),
      remaining: formatMoney(period.remaining),
      percentUsed: period.percentUsed,
      isOver: period.isOver,
      ...(period.period && {
        periodStart: period.period.start.toISOString(),
        periodEnd: period.period.end.toISOString(),
      }),
    })),
  };
}

export function serializeAlertEvent(event: AlertEvent): AlertEventResponse {
  return {
    scopeType: event.scope.scopeType,
    scopeId: event.scope.scopeId,
    periodType: event.periodType,
    periodStart: event.periodStart.toISOString(),
    thresholdPercentage: event.thresholdPercentage,
    severity: event.severity,
    spendAtTrigger: formatMoney(event.spendAtTrigger),
    limitAtTrigger: formatMoney(event.limitAtTrigger),
    triggeredAt: event.timestamp.toISOString(),
  };
}

export function serializePriceEntry(entry: PriceEntry): PriceEntryResponse {
  const rates =
    entry.rates.kind === 'split'
      ? { inputRate: formatMoney(entry.rates.inputRate), outputRate: formatMoney(entry.rates.outputRate) }
      : { flatRate: formatMoney(entry.rates.flatRate) };
  return {
    provider: entry.provider,
    model: entry.model,
    unit: entry.unit,
    ...rates,
    currency: entry.currency,
    billingModel: entry.billingModel,
    effectiveDate: entry.effectiveDate,
    source: entry.source,
  };
}
