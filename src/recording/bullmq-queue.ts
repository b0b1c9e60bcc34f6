/**
 * BullMQ-backed CostEventQueue.
 *
 * Jobs are keyed by request id, so enqueuing the same response twice
 * collapses into one job. Failed jobs retry with exponential backoff on top
 * of the recorder's own per-step retries.
 */
import { Queue, Worker } from 'bullmq';
import { sleep } from '@/core/async.js';
import type { Logger } from '@/observability/logger.js';
import { parseResponseReceivedEvent } from './event-schema.js';
import type { CostEventConsumer, CostEventQueue, ResponseReceivedEvent } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface BullMQCostQueueOptions {
  consumer: CostEventConsumer;
  logger: Logger;
  /** Redis connection URL. */
  redisUrl: string;
  /** Defaults to 'cost-events'. */
  queueName?: string;
  /** Defaults to 5. */
  concurrency?: number;
  /** Job attempts. Defaults to 5. */
  attempts?: number;
  /** First backoff delay; doubles per attempt. Defaults to 1000ms. */
  backoffDelayMs?: number;
  /** How often `drain` polls job counts. Defaults to 100ms. */
  drainPollMs?: number;
}

// ─── Helpers ────────────────────────────────────────────────────

/** Parse Redis URL into host/port/password for BullMQ connection. */
export function parseRedisUrl(url: string): { host: string; port: number; password?: string } {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  };
}

const JOB_NAME = 'response-received';

// ─── Factory ────────────────────────────────────────────────────

export function createBullMQCostQueue(options: BullMQCostQueueOptions): CostEventQueue {
  const {
    consumer,
    logger,
    redisUrl,
    queueName = 'cost-events',
    concurrency = 5,
    attempts = 5,
    backoffDelayMs = 1_000,
    drainPollMs = 100,
  } = options;

  const connection = parseRedisUrl(redisUrl);

  let queue: Queue<ResponseReceivedEvent> | null = null;
  let worker: Worker<ResponseReceivedEvent> | null = null;

  return {
    async enqueue(event: ResponseReceivedEvent): Promise<void> {
      if (!queue) {
        throw new Error('Cost event queue not started');
      }

      await queue.add(JOB_NAME, event, {
        jobId: event.requestId,
        attempts,
        backoff: { type: 'exponential', delay: backoffDelayMs },
        removeOnComplete: 1_000,
        removeOnFail: 5_000,
      });

      logger.debug('Cost event enqueued', {
        component: 'cost-queue',
        requestId: event.requestId,
      });
    },

    // eslint-disable-next-line @typescript-eslint/require-await
    async start(): Promise<void> {
      queue = new Queue<ResponseReceivedEvent>(queueName, { connection });

      worker = new Worker<ResponseReceivedEvent>(
        queueName,
        async (job) => {
          const event = parseResponseReceivedEvent(job.data);
          await consumer.onResponseReceived(event);
        },
        { connection, concurrency },
      );

      worker.on('error', (error) => {
        logger.error('BullMQ worker error', {
          component: 'cost-queue',
          error: error.message,
        });
      });

      worker.on('failed', (job, error) => {
        if (job) {
          logger.error('Cost event job failed', {
            component: 'cost-queue',
            requestId: job.id,
            attempt: job.attemptsMade,
            maxAttempts: attempts,
            error: error.message,
          });
        }
      });

      logger.info('Cost event queue started', {
        component: 'cost-queue',
        queueName,
        concurrency,
      });
    },

    async stop(): Promise<void> {
      if (worker) {
        await worker.close();
        worker = null;
      }

      if (queue) {
        await queue.close();
        queue = null;
      }

      logger.info('Cost event queue stopped', { component: 'cost-queue' });
    },

    async drain(): Promise<void> {
      const current = queue;
      if (!current) return;
      for (;;) {
        const counts = await current.getJobCounts('waiting', 'active', 'delayed', 'prioritized');
        const outstanding = Object.values(counts).reduce((sum, n) => sum + n, 0);
        if (outstanding === 0) return;
        await sleep(drainPollMs);
      }
    },
  };
}
