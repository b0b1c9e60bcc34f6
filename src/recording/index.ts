// Recording: post-call cost attribution off the request path
export type {
  CostEventConsumer,
  CostEventQueue,
  CostRecord,
  CostRecordedEvent,
  CostRecorderSignals,
  CostRecordStore,
  ResponseReceivedEvent,
  SignalListener,
} from './types.js';

export type { RetryOptions, RetryPolicy } from './retry.js';
export { DEFAULT_RETRY_POLICY, RetryExhaustedError, backoffDelay, withRetry } from './retry.js';

export type { ErrorReporter } from './error-reporter.js';
export { createLoggingErrorReporter } from './error-reporter.js';

export type { InMemoryCostRecordStore } from './cost-record-store.js';
export { createInMemoryCostRecordStore, createPgCostRecordStore } from './cost-record-store.js';

export type { CostRecorder, CostRecorderOptions } from './cost-recorder.js';
export { createCostRecorder } from './cost-recorder.js';

export { parseResponseReceivedEvent, responseReceivedEventSchema } from './event-schema.js';

export type { FailedCostEvent, InProcessCostQueue, InProcessCostQueueOptions } from './in-process-queue.js';
export { createInProcessCostQueue } from './in-process-queue.js';

export type { BullMQCostQueueOptions } from './bullmq-queue.js';
export { createBullMQCostQueue, parseRedisUrl } from './bullmq-queue.js';
