import type { BudgetLedger } from '@/budget/budget-ledger.js';
import type { AlertStore } from '@/budget/types.js';
import type { Logger } from '@/observability/logger.js';
import type { PricingResolver } from '@/pricing/pricing-resolver.js';
import type { PriceStore } from '@/pricing/types.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Wire Shapes ────────────────────────────────────────────────
// Money leaves the process as decimal strings.

export interface BudgetLimitResponse {
  scopeType: string;
  scopeId: string;
  periodType: string;
  limitAmount: string;
  currency: string;
  alertThresholds: readonly number[];
  isActive: boolean;
}

export interface PeriodStatusResponse {
  periodType: string;
  limit: string;
  spent: string;
  remaining: string;
  percentUsed: number;
  isOver: boolean;
  periodStart?: string;
  periodEnd?: string;
}

export interface BudgetStatusResponse {
  scopeType: string;
  scopeId: string;
  periods: PeriodStatusResponse[];
}

export interface AlertEventResponse {
  scopeType: string;
  scopeId: string;
  periodType: string;
  periodStart: string;
  thresholdPercentage: number;
  severity: string;
  spendAtTrigger: string;
  limitAtTrigger: string;
  triggeredAt: string;
}

export interface PriceEntryResponse {
  provider: string;
  model: string;
  unit: string;
  inputRate?: string;
  outputRate?: string;
  flatRate?: string;
  currency: string;
  billingModel: string;
  effectiveDate: string;
  source: string;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  ledger: BudgetLedger;
  resolver: PricingResolver;
  /** Read side of the alert events the dispatcher writes. */
  alertStore: AlertStore;
  /** Writable price table behind the resolver's first tier. */
  priceStore: PriceStore;
  /** Applied to limits written without their own thresholds. */
  defaultAlertThresholds: readonly number[];
  /** Rejects when a backing service is unreachable. Omitted when nothing needs checking. */
  healthCheck?: () => Promise<void>;
  logger: Logger;
}
