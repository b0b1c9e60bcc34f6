/**
 * Bounded exponential backoff for recording steps.
 */
import { sleep as defaultSleep } from '@/core/async.js';
import { RecordingFailureError, toError } from '@/core/errors.js';

export interface RetryPolicy {
  /** Total attempts, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 100,
  maxDelayMs: 5_000,
};

export interface RetryOptions extends Partial<RetryPolicy> {
  /** Called before each wait with the failed attempt number (1-based). */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/** Thrown once every attempt has failed. Carries the last error as `cause`. */
export class RetryExhaustedError extends Error {
  public readonly attempts: number;

  constructor(attempts: number, cause: Error) {
    super(`Gave up after ${attempts} attempts: ${cause.message}`, { cause });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

/** Delay before the attempt after `attempt`: base × 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts ?? DEFAULT_RETRY_POLICY.maxAttempts,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
  };
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (caught) {
      const error = toError(caught);
      if (attempt >= policy.maxAttempts) throw new RetryExhaustedError(attempt, error);

      const delayMs = backoffDelay(attempt, policy);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}

/** Wrap whatever `withRetry` threw as the failure of one recording step. */
export function toRecordingFailure(
  requestId: string,
  step: string,
  error: unknown,
): RecordingFailureError {
  if (error instanceof RetryExhaustedError) {
    const cause = error.cause instanceof Error ? error.cause : error;
    return new RecordingFailureError(requestId, step, error.attempts, cause);
  }
  return new RecordingFailureError(requestId, step, 1, toError(error));
}
