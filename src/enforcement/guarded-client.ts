/**
 * GuardedClient: a provider call wrapped in the enforcement pipeline.
 *
 *   [...stages] → gate → recording → provider
 *
 * The recording stage sits next to the provider, so it only ever sees calls
 * the gate let through. It hands usage to the cost queue without waiting for
 * it; a rejected enqueue is retried with backoff off the caller's path and,
 * once the attempts run out, reported as a RecordingFailureError. A call
 * that is cancelled or fails produces no usage and records nothing.
 */
import { isOk, ok } from '@/core/result.js';
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import { reportFailure } from '@/recording/error-reporter.js';
import type { ErrorReporter } from '@/recording/error-reporter.js';
import { toRecordingFailure, withRetry } from '@/recording/retry.js';
import type { RetryPolicy } from '@/recording/retry.js';
import type { CostEventQueue, ResponseReceivedEvent } from '@/recording/types.js';
import type { EnforcementGate } from './enforcement-gate.js';
import { composePipeline } from './pipeline.js';
import type { Next, Stage } from './pipeline.js';
import { createRequestContext } from './request-context.js';
import type { RequestContextInput } from './request-context.js';
import type { GateResult, ProviderCall, ProviderResponse, RequestContext } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export type GuardedStage<P, T> = Stage<RequestContext<P>, GateResult<ProviderResponse<T>>>;

export interface GuardedClientOptions<P, T> {
  provider: ProviderCall<P, T>;
  gate: EnforcementGate;
  queue: CostEventQueue;
  /** Receives events the queue would not take after every retry. */
  errorReporter: ErrorReporter;
  logger: Logger;
  /** Run before the gate, outermost first. */
  stages?: readonly GuardedStage<P, T>[];
  /** Backoff for rejected enqueues. */
  retry?: Partial<RetryPolicy>;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
}

export interface GuardedClient<P, T> {
  /** Build the request context from plain input and run it. */
  call(input: RequestContextInput<P>): Promise<GateResult<ProviderResponse<T>>>;
  /** Run an already-built context. */
  execute(context: RequestContext<P>): Promise<GateResult<ProviderResponse<T>>>;
  /** Resolve once every pending enqueue has been accepted or reported. */
  flush(): Promise<void>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createGuardedClient<P, T>(options: GuardedClientOptions<P, T>): GuardedClient<P, T> {
  const {
    provider,
    gate,
    queue,
    errorReporter,
    logger,
    stages = [],
    retry,
    sleep,
    clock = systemClock,
  } = options;

  const pending = new Set<Promise<void>>();

  async function enqueue(event: ResponseReceivedEvent): Promise<void> {
    try {
      await withRetry(() => queue.enqueue(event), {
        ...retry,
        sleep,
        onRetry: (attempt, error, delayMs) => {
          logger.warn('Failed to enqueue cost event, retrying', {
            component: 'guarded-client',
            requestId: event.requestId,
            attempt,
            delayMs,
            error: error.message,
          });
        },
      });
    } catch (error) {
      await reportFailure(
        errorReporter,
        toRecordingFailure(event.requestId, 'enqueue', error),
        logger,
        'guarded-client',
      );
    }
  }

  const recordingStage: GuardedStage<P, T> = async (context, next) => {
    const result = await next(context);
    if (isOk(result)) {
      const event: ResponseReceivedEvent = {
        requestId: context.requestId,
        scopes: [...context.scopes],
        usage: result.value.usage,
        receivedAt: clock().toISOString(),
        tags: [...context.options.tags],
      };
      const handoff = enqueue(event).finally(() => {
        pending.delete(handoff);
      });
      pending.add(handoff);
    }
    return result;
  };

  const callProvider: Next<RequestContext<P>, GateResult<ProviderResponse<T>>> = async (
    context,
  ) => {
    context.signal?.throwIfAborted();
    return ok(await provider(context));
  };

  const gateStage: GuardedStage<P, T> = (context, next) => gate.stage(context, next);

  const run = composePipeline([...stages, gateStage, recordingStage], callProvider);

  return {
    async call(input: RequestContextInput<P>): Promise<GateResult<ProviderResponse<T>>> {
      return run(createRequestContext(input));
    },

    execute: run,

    async flush(): Promise<void> {
      await Promise.all([...pending]);
    },
  };
}
