/**
 * CostCalculator: pure price × usage arithmetic. No I/O.
 *
 * Token units normalize the rate by the unit multiplier (per 1K, per 1M).
 * Flat units charge the flat rate per unit of usage reported in the unit's
 * own measure, except `per_request`, which charges once per usage record,
 * and character units, which divide raw characters by the multiplier.
 */
import { ValidationError } from '@/core/errors.js';
import { addMoney, applyRate, compareMoney, ZERO } from '@/core/money.js';
import type { Money } from '@/core/money.js';
import type { CostBreakdown, PriceEntry, PricingUnit, UsageRecord } from './types.js';
import { isTokenUnit, unitCategory, unitMultiplier } from './units.js';

export const DEFAULT_CHARS_PER_TOKEN = 4;

function assertQuantity(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${name} must be a non-negative finite number, got ${value}`, {
      [name]: value,
    });
  }
}

/** Compute the cost breakdown of one usage record under a price entry. */
export function calculateCost(entry: PriceEntry, usage: UsageRecord): CostBreakdown {
  assertQuantity('inputUnits', usage.inputUnits);
  assertQuantity('outputUnits', usage.outputUnits);

  const base = { currency: entry.currency, unit: entry.unit, source: entry.source };
  const { rates } = entry;

  if (rates.kind === 'split') {
    const multiplier = unitMultiplier(entry.unit);
    const inputCost = applyRate(rates.inputRate, usage.inputUnits, multiplier);
    const outputCost = applyRate(rates.outputRate, usage.outputUnits, multiplier);
    return { ...base, inputCost, outputCost, totalCost: addMoney(inputCost, outputCost) };
  }

  let totalCost: Money;
  if (entry.unit === 'per_request') {
    totalCost = rates.flatRate;
  } else {
    const quantity = usage.inputUnits + usage.outputUnits;
    const divisor = unitCategory(entry.unit) === 'character' ? unitMultiplier(entry.unit) : 1;
    totalCost = applyRate(rates.flatRate, quantity, divisor);
  }
  return { ...base, inputCost: ZERO, outputCost: ZERO, totalCost };
}

// ─── Estimation ─────────────────────────────────────────────────

export interface EstimateOptions {
  /** Characters per token for prompt-length heuristics. Defaults to 4. */
  charsPerToken?: number;
  /** Caller-declared output cap; used as the output estimate when present. */
  maxOutputTokens?: number;
}

/**
 * Approximate usage before the call, from the prompt length alone.
 * Token units: `ceil(length / charsPerToken)` input tokens and either the
 * declared output cap or a third of the input. Character units bill the
 * prompt's characters. Every other unit is estimated as a single unit.
 */
export function estimateUsage(
  target: { provider: string; model: string; unit: PricingUnit },
  promptLength: number,
  options: EstimateOptions = {},
): UsageRecord {
  assertQuantity('promptLength', promptLength);
  const { provider, model, unit } = target;

  if (isTokenUnit(unit)) {
    const charsPerToken = options.charsPerToken ?? DEFAULT_CHARS_PER_TOKEN;
    const inputUnits = Math.ceil(promptLength / charsPerToken);
    const outputUnits = options.maxOutputTokens ?? Math.ceil(inputUnits / 3);
    return { provider, model, inputUnits, outputUnits };
  }

  if (unitCategory(unit) === 'character') {
    return { provider, model, inputUnits: promptLength, outputUnits: 0 };
  }

  return { provider, model, inputUnits: 0, outputUnits: 1 };
}

/** Estimate the cost of a call before it is made. */
export function estimateCost(
  entry: PriceEntry,
  promptLength: number,
  options?: EstimateOptions,
): CostBreakdown {
  return calculateCost(entry, estimateUsage(entry, promptLength, options));
}

// ─── Comparison ─────────────────────────────────────────────────

export interface PricedCandidate {
  entry: PriceEntry;
  breakdown: CostBreakdown;
}

/** Cost the same usage under several price entries, cheapest first. */
export function comparePricing(
  entries: readonly PriceEntry[],
  usage: Pick<UsageRecord, 'inputUnits' | 'outputUnits'>,
): PricedCandidate[] {
  return entries
    .map((entry) => ({
      entry,
      breakdown: calculateCost(entry, {
        provider: entry.provider,
        model: entry.model,
        inputUnits: usage.inputUnits,
        outputUnits: usage.outputUnits,
      }),
    }))
    .sort((a, b) => compareMoney(a.breakdown.totalCost, b.breakdown.totalCost));
}
