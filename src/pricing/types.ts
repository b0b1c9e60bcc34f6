import type { Money } from '@/core/money.js';

// ─── Units & Billing Models ─────────────────────────────────────

export const PRICING_UNITS = [
  'per_token',
  '1k_tokens',
  '1m_tokens',
  'per_character',
  '1k_characters',
  'per_second',
  'per_minute',
  'per_hour',
  'per_request',
  'per_image',
  'per_audio_file',
  'per_mb',
  'per_gb',
] as const;

export type PricingUnit = (typeof PRICING_UNITS)[number];

export type UnitCategory = 'token' | 'character' | 'time' | 'request' | 'data';

export const BILLING_MODELS = [
  'pay_per_use',
  'tiered',
  'subscription',
  'credits',
  'free_tier',
  'enterprise',
] as const;

export type BillingModel = (typeof BILLING_MODELS)[number];

/** Which fallback tier answered a pricing lookup. */
export type PriceSource = 'database' | 'driver_default' | 'universal_fallback';

// ─── Price Entry ────────────────────────────────────────────────

/** Token units bill input and output separately; every other unit bills a flat rate. */
export type PriceRates =
  | { kind: 'split'; inputRate: Money; outputRate: Money }
  | { kind: 'flat'; flatRate: Money };

/** Cost per unit of usage for a (provider, model) pair. Immutable once resolved. */
export interface PriceEntry {
  readonly provider: string;
  readonly model: string;
  readonly unit: PricingUnit;
  readonly rates: PriceRates;
  readonly currency: string;
  readonly billingModel: BillingModel;
  /** `YYYY-MM-DD`. */
  readonly effectiveDate: string;
  readonly source: PriceSource;
}

/**
 * Unvalidated price row as it arrives from a store, a catalog file or the API.
 * Rates are decimal strings or numbers.
 */
export interface RawPriceEntry {
  provider: string;
  model: string;
  unit: string;
  inputRate?: string | number;
  outputRate?: string | number;
  flatRate?: string | number;
  currency?: string;
  billingModel?: string;
  effectiveDate: string;
}

// ─── Usage & Cost ───────────────────────────────────────────────

/** Usage reported by the provider call. Consumed once by the calculator. */
export interface UsageRecord {
  readonly provider: string;
  readonly model: string;
  readonly inputUnits: number;
  readonly outputUnits: number;
}

export interface CostBreakdown {
  readonly inputCost: Money;
  readonly outputCost: Money;
  readonly totalCost: Money;
  readonly currency: string;
  readonly unit: PricingUnit;
  readonly source: PriceSource;
}

// ─── Persistent Price Store ─────────────────────────────────────

/** Persistent price-table collaborator, keyed by (provider, model, effectiveDate). */
export interface PriceStore {
  /** Latest row whose effective date is on or before `asOf`. */
  findCurrent(provider: string, model: string, asOf: Date): Promise<RawPriceEntry | null>;
  /** Insert or replace the row for (provider, model, effectiveDate). */
  upsert(entry: RawPriceEntry): Promise<void>;
}
