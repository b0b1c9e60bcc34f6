/**
 * In-process CostEventQueue with bounded concurrency.
 *
 * An event whose request id is already queued or running is collapsed into
 * it. Events that fail are logged and the latest `maxFailures` of them kept
 * in `failed()`; the consumer has already retried and reported them. Events enqueued before `start` wait
 * for it; `drain` only waits for work the queue is able to run.
 */
import { toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import type { CostEventConsumer, CostEventQueue, ResponseReceivedEvent } from './types.js';

export interface InProcessCostQueueOptions {
  consumer: CostEventConsumer;
  logger: Logger;
  /** Defaults to 5. */
  concurrency?: number;
  /** Failed events kept for `failed()`; the oldest is dropped past this. Defaults to 100. */
  maxFailures?: number;
}

export interface FailedCostEvent {
  event: ResponseReceivedEvent;
  error: Error;
}

export interface InProcessCostQueue extends CostEventQueue {
  failed(): FailedCostEvent[];
  readonly pending: number;
}

export function createInProcessCostQueue(options: InProcessCostQueueOptions): InProcessCostQueue {
  const { consumer, logger, concurrency = 5, maxFailures = 100 } = options;

  const waiting: ResponseReceivedEvent[] = [];
  const inFlight = new Set<string>();
  const failures: FailedCostEvent[] = [];
  let active = 0;
  let running = false;
  let stopped = false;
  let idleWaiters: (() => void)[] = [];

  function settleIfIdle(): void {
    if (active > 0 || (running && waiting.length > 0)) return;
    const waiters = idleWaiters;
    idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  async function handle(event: ResponseReceivedEvent): Promise<void> {
    try {
      await consumer.onResponseReceived(event);
    } catch (error) {
      failures.push({ event, error: toError(error) });
      if (failures.length > maxFailures) failures.shift();
      logger.error('Cost event processing failed', {
        component: 'cost-queue',
        requestId: event.requestId,
        error: toError(error).message,
      });
    } finally {
      active--;
      inFlight.delete(event.requestId);
      pump();
      settleIfIdle();
    }
  }

  function pump(): void {
    while (running && active < concurrency) {
      const event = waiting.shift();
      if (!event) break;
      active++;
      void handle(event);
    }
  }

  return {
    enqueue(event: ResponseReceivedEvent): Promise<void> {
      if (stopped) {
        return Promise.reject(new Error('Cost event queue is stopped'));
      }
      if (inFlight.has(event.requestId)) {
        logger.debug('Duplicate cost event collapsed', {
          component: 'cost-queue',
          requestId: event.requestId,
        });
        return Promise.resolve();
      }
      inFlight.add(event.requestId);
      waiting.push(event);
      pump();
      return Promise.resolve();
    },

    start(): Promise<void> {
      running = true;
      stopped = false;
      pump();
      logger.info('Cost event queue started', { component: 'cost-queue', concurrency });
      return Promise.resolve();
    },

    async stop(): Promise<void> {
      stopped = true;
      running = false;
      if (active > 0) {
        await new Promise<void>((resolve) => idleWaiters.push(resolve));
      }
      logger.info('Cost event queue stopped', {
        component: 'cost-queue',
        unprocessed: waiting.length,
      });
    },

    drain(): Promise<void> {
      if (active === 0 && (!running || waiting.length === 0)) return Promise.resolve();
      return new Promise<void>((resolve) => idleWaiters.push(resolve));
    },

    failed(): FailedCostEvent[] {
      return [...failures];
    },

    get pending(): number {
      return waiting.length + active;
    },
  };
}
