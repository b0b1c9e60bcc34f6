/**
 * CostRecorder: turns ResponseReceived events into persisted cost, spend
 * and alerts, off the caller's path.
 *
 * Steps: resolve price → calculate → persist record → record spend →
 * evaluate alerts. Each storage step is retried with backoff; once a step
 * exhausts its attempts the failure goes to the error reporter and is
 * rethrown, so a queue can keep the event. Replaying an event is a no-op.
 */
import { CostwardenError, RecordingFailureError, toError } from '@/core/errors.js';
import { formatMoney } from '@/core/money.js';
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import type { AlertDispatcher } from '@/budget/alert-dispatcher.js';
import type { BudgetLedger } from '@/budget/budget-ledger.js';
import type { AlertEvent } from '@/budget/types.js';
import type { Logger } from '@/observability/logger.js';
import { calculateCost } from '@/pricing/cost-calculator.js';
import type { PricingResolver } from '@/pricing/pricing-resolver.js';
import type { CostBreakdown } from '@/pricing/types.js';
import { reportFailure } from './error-reporter.js';
import type { ErrorReporter } from './error-reporter.js';
import { toRecordingFailure, withRetry } from './retry.js';
import type { RetryPolicy } from './retry.js';
import type {
  CostEventConsumer,
  CostRecord,
  CostRecordedEvent,
  CostRecorderSignals,
  CostRecordStore,
  ResponseReceivedEvent,
  SignalListener,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface CostRecorderOptions {
  resolver: PricingResolver;
  ledger: BudgetLedger;
  alertDispatcher: AlertDispatcher;
  recordStore: CostRecordStore;
  errorReporter: ErrorReporter;
  logger: Logger;
  retry?: Partial<RetryPolicy>;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
}

export interface CostRecorder extends CostEventConsumer {
  /** Register a listener. Returns a function that removes it. */
  on<K extends keyof CostRecorderSignals>(signal: K, listener: SignalListener<K>): () => void;
}

type ListenerSets = { [K in keyof CostRecorderSignals]: Set<SignalListener<K>> };

// ─── Factory ────────────────────────────────────────────────────

export function createCostRecorder(options: CostRecorderOptions): CostRecorder {
  const {
    resolver,
    ledger,
    alertDispatcher,
    recordStore,
    errorReporter,
    logger,
    retry,
    sleep,
    clock = systemClock,
  } = options;

  const listeners: ListenerSets = {
    costRecorded: new Set(),
    alertThresholdCrossed: new Set(),
  };

  async function emit<K extends keyof CostRecorderSignals>(
    signal: K,
    payload: CostRecorderSignals[K],
  ): Promise<void> {
    const set: Set<SignalListener<K>> = listeners[signal];
    for (const listener of set) {
      try {
        await listener(payload);
      } catch (error) {
        logger.warn('Listener failed', {
          component: 'cost-recorder',
          signal,
          error: toError(error).message,
        });
      }
    }
  }

  /** Run one step with retries; on exhaustion report and rethrow. */
  async function step<T>(
    requestId: string,
    name: string,
    operation: () => Promise<T>,
  ): Promise<T> {
    try {
      return await withRetry(() => operation(), {
        ...retry,
        sleep,
        onRetry: (attempt, error, delayMs) => {
          logger.warn('Recording step failed, retrying', {
            component: 'cost-recorder',
            requestId,
            step: name,
            attempt,
            delayMs,
            error: error.message,
          });
        },
      });
    } catch (error) {
      const failure = toRecordingFailure(requestId, name, error);
      await report(failure);
      throw failure;
    }
  }

  function report(failure: CostwardenError): Promise<void> {
    return reportFailure(errorReporter, failure, logger, 'cost-recorder');
  }

  /** Evaluate alerts for every touched aggregate. Safe to repeat. */
  async function onCostRecorded(event: CostRecordedEvent): Promise<void> {
    const { record, spendUpdates } = event;
    const fired: AlertEvent[] = [];
    for (const update of spendUpdates) {
      const events = await step(record.requestId, 'alerts', async () => {
        const limit = await ledger.getLimit(update.aggregate.scope, update.aggregate.periodType);
        return limit ? alertDispatcher.evaluate(update.aggregate, limit) : [];
      });
      fired.push(...events);
    }

    for (const alert of fired) {
      await emit('alertThresholdCrossed', alert);
    }
  }

  return {
    async onResponseReceived(event: ResponseReceivedEvent): Promise<void> {
      const { requestId, usage, scopes } = event;
      const receivedAt = new Date(event.receivedAt);

      const entry = await resolver.resolve(usage.provider, usage.model);
      let breakdown: CostBreakdown;
      try {
        breakdown = calculateCost(entry, usage);
      } catch (error) {
        // Bad usage will not improve on retry.
        const failure = new RecordingFailureError(requestId, 'calculate', 1, toError(error));
        await report(failure);
        throw failure;
      }

      const candidate: CostRecord = {
        requestId,
        provider: usage.provider,
        model: usage.model,
        scopes,
        usage,
        breakdown,
        recordedAt: Number.isNaN(receivedAt.getTime()) ? clock() : receivedAt,
      };

      const saved = await step(requestId, 'persist', () => recordStore.save(candidate));
      // A replay charges what was recorded the first time, even if prices moved since.
      const record = saved
        ? candidate
        : ((await step(requestId, 'persist', () => recordStore.findByRequestId(requestId))) ??
          candidate);

      const spendUpdates = await step(requestId, 'record-spend', () =>
        ledger.recordSpend(requestId, record.scopes, record.breakdown.totalCost, record.recordedAt),
      );

      const recorded: CostRecordedEvent = { record, spendUpdates };
      const duplicate = !saved && spendUpdates.every((u) => !u.applied);
      if (duplicate) {
        logger.debug('Duplicate recording ignored', { component: 'cost-recorder', requestId });
      } else {
        logger.info('Cost recorded', {
          component: 'cost-recorder',
          requestId,
          provider: usage.provider,
          model: usage.model,
          totalCost: formatMoney(record.breakdown.totalCost),
          source: record.breakdown.source,
        });
        await emit('costRecorded', recorded);
      }

      // Alerts run on replays too: an earlier attempt may have stopped before them.
      await onCostRecorded(recorded);
    },

    onCostRecorded,

    on<K extends keyof CostRecorderSignals>(signal: K, listener: SignalListener<K>): () => void {
      const set: Set<SignalListener<K>> = listeners[signal];
      set.add(listener);
      return () => {
        set.delete(listener);
      };
    },
  };
}
