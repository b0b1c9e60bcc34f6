/**
 * Builds the enforcement side of the pipeline from the loaded configuration:
 * one gate shared by every guarded client, with the pre-check bound and the
 * token heuristic from `enforcement`, and the enqueue backoff from `recording`.
 */
import type { BudgetLedger } from '@/budget/budget-ledger.js';
import type { CostwardenConfig } from '@/config/types.js';
import type { Clock } from '@/core/types.js';
import type { Logger } from '@/observability/logger.js';
import type { PricingResolver } from '@/pricing/pricing-resolver.js';
import type { ErrorReporter } from '@/recording/error-reporter.js';
import type { CostEventQueue } from '@/recording/types.js';
import { createEnforcementGate } from './enforcement-gate.js';
import type { EnforcementGate } from './enforcement-gate.js';
import { createGuardedClient } from './guarded-client.js';
import type { GuardedClient, GuardedStage } from './guarded-client.js';
import type { GateTransition, ProviderCall } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export type EnforcementSettings = Pick<CostwardenConfig, 'enforcement' | 'recording'>;

export interface EnforcementDependencies {
  resolver: PricingResolver;
  ledger: BudgetLedger;
  queue: CostEventQueue;
  errorReporter: ErrorReporter;
  logger: Logger;
  onStateChange?: (transition: GateTransition) => void;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  clock?: Clock;
}

export interface EnforcementPipeline {
  readonly gate: EnforcementGate;
  /** Wrap a provider call; `stages` run before the gate, outermost first. */
  guard<P, T>(
    provider: ProviderCall<P, T>,
    stages?: readonly GuardedStage<P, T>[],
  ): GuardedClient<P, T>;
}

// ─── Factory ────────────────────────────────────────────────────

export function createEnforcementPipeline(
  settings: EnforcementSettings,
  deps: EnforcementDependencies,
): EnforcementPipeline {
  const { enforcement, recording } = settings;

  const gate = createEnforcementGate({
    resolver: deps.resolver,
    ledger: deps.ledger,
    logger: deps.logger,
    checkTimeoutMs: enforcement.checkTimeoutMs,
    charsPerToken: enforcement.charsPerToken,
    onStateChange: deps.onStateChange,
    clock: deps.clock,
  });

  return {
    gate,

    guard<P, T>(
      provider: ProviderCall<P, T>,
      stages: readonly GuardedStage<P, T>[] = [],
    ): GuardedClient<P, T> {
      return createGuardedClient({
        provider,
        gate,
        queue: deps.queue,
        errorReporter: deps.errorReporter,
        logger: deps.logger,
        stages,
        retry: {
          maxAttempts: recording.maxAttempts,
          baseDelayMs: recording.baseDelayMs,
          maxDelayMs: recording.maxDelayMs,
        },
        sleep: deps.sleep,
        clock: deps.clock,
      });
    },
  };
}
