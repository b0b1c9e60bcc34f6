import type { BudgetScope, PeriodType } from './types.js';

/**
 * Base error class for all costwarden errors.
 * Extends Error with a machine-readable code, HTTP status, and structured context.
 */
export class CostwardenError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(params: {
    message: string;
    code: string;
    statusCode?: number;
    cause?: Error;
    context?: Record<string, unknown>;
  }) {
    super(params.message, { cause: params.cause });
    this.name = 'CostwardenError';
    this.code = params.code;
    this.statusCode = params.statusCode ?? 500;
    this.context = params.context;
  }
}

/** Structured denial payload carried by a budget rejection. */
export interface BudgetDenial {
  scope: BudgetScope;
  periodType: PeriodType;
  /** Decimal string of the spend accumulated before this request. */
  currentSpend: string;
  /** Decimal string of the configured limit. */
  limit: string;
  /** Decimal string of the estimate that tripped the limit. */
  estimatedCost: string;
}

/**
 * A legitimate budget rejection. Returned (not thrown) by the enforcement gate
 * so callers decide the user-facing behavior; maps to HTTP 429.
 */
export class BudgetExceededError extends CostwardenError {
  public readonly denial: BudgetDenial;

  constructor(denial: BudgetDenial) {
    const { scope, periodType, currentSpend, limit, estimatedCost } = denial;
    super({
      message: `${periodType} budget exceeded for ${scope.scopeType} ${scope.scopeId}: ${currentSpend} + ${estimatedCost} > ${limit}`,
      code: 'BUDGET_EXCEEDED',
      statusCode: 429,
      context: {
        scopeType: scope.scopeType,
        scopeId: scope.scopeId,
        periodType,
        currentSpend,
        limit,
        estimatedCost,
      },
    });
    this.name = 'BudgetExceededError';
    this.denial = denial;
  }
}

/** A price row whose unit, billing model and rates disagree. */
export class InconsistentPriceEntryError extends CostwardenError {
  public readonly issues: readonly string[];

  constructor(provider: string, model: string, issues: readonly string[]) {
    super({
      message: `Inconsistent price entry for ${provider}/${model}: ${issues.join('; ')}`,
      code: 'INCONSISTENT_PRICE_ENTRY',
      statusCode: 422,
      context: { provider, model, issues },
    });
    this.name = 'InconsistentPriceEntryError';
    this.issues = issues;
  }
}

/** A bounded store operation did not complete in time. */
export class StoreTimeoutError extends CostwardenError {
  constructor(operation: string, timeoutMs: number) {
    super({
      message: `${operation} timed out after ${timeoutMs}ms`,
      code: 'STORE_TIMEOUT',
      statusCode: 504,
      context: { operation, timeoutMs },
    });
    this.name = 'StoreTimeoutError';
  }
}

/** Cost recording gave up after exhausting its retry budget. */
export class RecordingFailureError extends CostwardenError {
  constructor(requestId: string, step: string, attempts: number, cause?: Error) {
    super({
      message: `Failed to record cost for request ${requestId} at step "${step}" after ${attempts} attempts`,
      code: 'RECORDING_FAILURE',
      statusCode: 500,
      cause,
      context: { requestId, step, attempts },
    });
    this.name = 'RecordingFailureError';
  }
}

/** Thrown when an input value is malformed. */
export class ValidationError extends CostwardenError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'VALIDATION_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ValidationError';
  }
}

/** Normalize an unknown thrown value into an Error. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
