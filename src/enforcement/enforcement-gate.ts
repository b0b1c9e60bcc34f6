/**
 * EnforcementGate: the pre-call budget check.
 *
 * received → estimating → checking → allowed | denied
 *
 * A denial short-circuits the pipeline with a BudgetExceededError value and
 * the provider is never called. Any failure while estimating or checking,
 * including the whole check overrunning `checkTimeoutMs`, lets the request
 * through.
 */
import { withTimeout } from '@/core/async.js';
import { BudgetExceededError, toError } from '@/core/errors.js';
import { err } from '@/core/result.js';
import type { Money } from '@/core/money.js';
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import type { BudgetLedger } from '@/budget/budget-ledger.js';
import type { Logger } from '@/observability/logger.js';
import { DEFAULT_CHARS_PER_TOKEN, estimateCost } from '@/pricing/cost-calculator.js';
import type { PricingResolver } from '@/pricing/pricing-resolver.js';
import type { Next } from './pipeline.js';
import type {
  GateDecision,
  GateResult,
  GateState,
  GateTransition,
  RequestContext,
} from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface EnforcementGateOptions {
  resolver: PricingResolver;
  ledger: BudgetLedger;
  logger: Logger;
  /** Upper bound on the whole pre-check. Defaults to 100ms. */
  checkTimeoutMs?: number;
  /** Defaults to 4. */
  charsPerToken?: number;
  /** Observer for state transitions. Exceptions it throws are logged and ignored. */
  onStateChange?: (transition: GateTransition) => void;
  clock?: Clock;
}

export interface EnforcementGate {
  /** Run the pre-check alone. Never rejects. */
  check(context: RequestContext): Promise<GateDecision>;
  /** The gate as a pipeline stage. */
  stage<P, T>(
    context: RequestContext<P>,
    next: Next<RequestContext<P>, GateResult<T>>,
  ): Promise<GateResult<T>>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createEnforcementGate(options: EnforcementGateOptions): EnforcementGate {
  const {
    resolver,
    ledger,
    logger,
    checkTimeoutMs = 100,
    charsPerToken = DEFAULT_CHARS_PER_TOKEN,
    onStateChange,
    clock = systemClock,
  } = options;

  async function check(context: RequestContext): Promise<GateDecision> {
    // Transitions reported by a check that already timed out are dropped.
    let settled = false;
    const report = (state: GateState): void => {
      if (settled || !onStateChange) return;
      try {
        onStateChange({ requestId: context.requestId, state, at: clock() });
      } catch (error) {
        logger.warn('State observer failed', {
          component: 'enforcement-gate',
          requestId: context.requestId,
          state,
          error: toError(error).message,
        });
      }
    };

    let estimatedCost: Money | null = null;

    async function evaluate(): Promise<GateDecision> {
      report('estimating');
      const entry = await resolver.resolve(context.provider, context.model);
      const estimate = estimateCost(entry, context.estimatedPromptLength, {
        charsPerToken,
        maxOutputTokens: context.options.maxOutputTokens,
      }).totalCost;
      estimatedCost = estimate;

      report('checking');
      const decision = await ledger.estimateCheck(context.scopes, estimate, {
        perRequestLimit: context.options.perRequestLimit,
      });
      if (decision.outcome === 'deny') {
        return {
          allowed: false,
          estimatedCost: estimate,
          error: new BudgetExceededError(decision.denial),
        };
      }
      return { allowed: true, estimatedCost: estimate, failedOpen: false };
    }

    report('received');
    let decision: GateDecision;
    try {
      decision = await withTimeout(evaluate(), checkTimeoutMs, 'enforcement pre-check');
    } catch (error) {
      logger.warn('Budget pre-check failed, allowing request', {
        component: 'enforcement-gate',
        requestId: context.requestId,
        provider: context.provider,
        model: context.model,
        error: toError(error).message,
      });
      decision = { allowed: true, estimatedCost, failedOpen: true };
    }

    report(decision.allowed ? 'allowed' : 'denied');
    settled = true;

    if (!decision.allowed) {
      logger.info('Request denied by budget', {
        component: 'enforcement-gate',
        requestId: context.requestId,
        ...decision.error.context,
      });
    }
    return decision;
  }

  return {
    check,

    async stage<P, T>(
      context: RequestContext<P>,
      next: Next<RequestContext<P>, GateResult<T>>,
    ): Promise<GateResult<T>> {
      const decision = await check(context);
      if (!decision.allowed) return err(decision.error);
      return next(context);
    },
  };
}
