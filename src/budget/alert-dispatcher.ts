/**
 * AlertDispatcher: turns spend updates into threshold-crossed events.
 * Each threshold fires at most once per (scope, period type, period); the
 * alert store's unique key is what enforces it.
 */
import { reachesPercentage, percentOf, formatMoney } from '@/core/money.js';
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { AlertEvent, AlertSeverity, AlertStore, BudgetLimit, SpendAggregate } from './types.js';

export interface AlertDispatcherOptions {
  alertStore: AlertStore;
  logger: Logger;
  clock?: Clock;
}

export interface AlertDispatcher {
  /**
   * Evaluate one aggregate against its limit. Returns the events that fired
   * for the first time, in ascending threshold order.
   */
  evaluate(aggregate: SpendAggregate, limit: BudgetLimit): Promise<AlertEvent[]>;
}

export function severityFor(thresholdPercentage: number): AlertSeverity {
  if (thresholdPercentage >= 100) return 'critical';
  if (thresholdPercentage >= 90) return 'high';
  if (thresholdPercentage >= 80) return 'medium';
  return 'low';
}

export function createAlertDispatcher(options: AlertDispatcherOptions): AlertDispatcher {
  const { alertStore, logger, clock = systemClock } = options;

  return {
    async evaluate(aggregate: SpendAggregate, limit: BudgetLimit): Promise<AlertEvent[]> {
      if (!limit.isActive || aggregate.accumulatedAmount <= 0n) return [];

      const thresholds = [...new Set(limit.alertThresholds)].sort((a, b) => a - b);
      const fired: AlertEvent[] = [];

      // Sequential so crossings are recorded in ascending order.
      for (const threshold of thresholds) {
        if (!reachesPercentage(aggregate.accumulatedAmount, limit.limitAmount, threshold)) break;

        const event: AlertEvent = {
          scope: aggregate.scope,
          periodType: aggregate.periodType,
          periodStart: aggregate.periodStart,
          thresholdPercentage: threshold,
          severity: severityFor(threshold),
          spendAtTrigger: aggregate.accumulatedAmount,
          limitAtTrigger: limit.limitAmount,
          timestamp: clock(),
        };

        if (await alertStore.recordAlert(event)) {
          fired.push(event);
          logger.info('Budget threshold crossed', {
            component: 'alert-dispatcher',
            scopeType: aggregate.scope.scopeType,
            scopeId: aggregate.scope.scopeId,
            periodType: aggregate.periodType,
            threshold,
            percentUsed: percentOf(aggregate.accumulatedAmount, limit.limitAmount),
            spend: formatMoney(aggregate.accumulatedAmount),
            limit: formatMoney(limit.limitAmount),
          });
        }
      }

      return fired;
    },
  };
}
