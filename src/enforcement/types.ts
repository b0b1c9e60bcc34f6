import type { BudgetExceededError } from '@/core/errors.js';
import type { Money } from '@/core/money.js';
import type { RequestId, ScopeStack } from '@/core/types.js';
import type { Result } from '@/core/result.js';
import type { UsageRecord } from '@/pricing/types.js';

// ─── Request Context ────────────────────────────────────────────

/** The only options a request may carry. */
export interface RequestOptions {
  /** Caller-declared output cap, used by the estimate. */
  maxOutputTokens?: number;
  /** Ad-hoc per-request cap on top of configured limits. */
  perRequestLimit?: Money;
  tags: readonly string[];
}

export interface RequestContext<P = unknown> {
  readonly requestId: RequestId;
  readonly provider: string;
  readonly model: string;
  /** Enforcement order: user, project, organization. */
  readonly scopes: ScopeStack;
  readonly estimatedPromptLength: number;
  readonly options: RequestOptions;
  /** Opaque request body handed to the provider call. */
  readonly payload: P;
  readonly signal?: AbortSignal;
}

// ─── Gate ───────────────────────────────────────────────────────

export type GateState = 'received' | 'estimating' | 'checking' | 'allowed' | 'denied';

export interface GateTransition {
  requestId: RequestId;
  state: GateState;
  at: Date;
}

export type GateDecision =
  | {
      allowed: true;
      /** Null when the estimate itself could not be produced. */
      estimatedCost: Money | null;
      /** True when the check failed and the request was let through. */
      failedOpen: boolean;
    }
  | { allowed: false; estimatedCost: Money; error: BudgetExceededError };

/** What a guarded pipeline returns: the stage result, or the denial. */
export type GateResult<T> = Result<T, BudgetExceededError>;

// ─── Provider ───────────────────────────────────────────────────

export interface ProviderResponse<T> {
  response: T;
  usage: UsageRecord;
}

/** The wrapped provider call. Rejects when cancelled or failed. */
export type ProviderCall<P, T> = (context: RequestContext<P>) => Promise<ProviderResponse<T>>;
