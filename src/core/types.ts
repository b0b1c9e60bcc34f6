// ─── Branded ID Types ────────────────────────────────────────────
// Branded types keep a RequestId from being passed where a ScopeId is expected.

declare const __brand: unique symbol;
export type Brand<T, B> = T & { readonly [__brand]: B };

export type RequestId = Brand<string, 'RequestId'>;
export type ScopeId = Brand<string, 'ScopeId'>;

// ─── Budget Scopes ──────────────────────────────────────────────

export type ScopeType = 'user' | 'project' | 'organization';

/** Subject a budget limit applies to. */
export interface BudgetScope {
  scopeType: ScopeType;
  scopeId: ScopeId;
}

/**
 * Ordered scopes a single request is checked against: its user, then its
 * project and organization when present. Each is enforced independently.
 */
export type ScopeStack = readonly BudgetScope[];

export type PeriodType = 'per_request' | 'daily' | 'monthly';

/** Periods that accumulate spend. Per-request limits never accumulate. */
export type AccumulatingPeriod = Exclude<PeriodType, 'per_request'>;

export const PERIOD_TYPES: readonly PeriodType[] = ['per_request', 'daily', 'monthly'];
export const ACCUMULATING_PERIODS: readonly AccumulatingPeriod[] = ['daily', 'monthly'];

/** Build the scope stack for a request in enforcement order. */
export function buildScopeStack(input: {
  userId: string;
  projectId?: string;
  organizationId?: string;
}): ScopeStack {
  const stack: BudgetScope[] = [{ scopeType: 'user', scopeId: input.userId as ScopeId }];
  if (input.projectId) {
    stack.push({ scopeType: 'project', scopeId: input.projectId as ScopeId });
  }
  if (input.organizationId) {
    stack.push({ scopeType: 'organization', scopeId: input.organizationId as ScopeId });
  }
  return stack;
}

/** Stable cache/log key for a scope. */
export function scopeKey(scope: BudgetScope): string {
  return `${scope.scopeType}:${scope.scopeId}`;
}

// ─── Clock ──────────────────────────────────────────────────────

/** Injectable time source. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
