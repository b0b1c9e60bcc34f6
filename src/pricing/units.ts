/**
 * Pricing unit metadata: category, base unit and multiplier, plus the
 * billing-model compatibility matrix.
 */
import { scaleMoney } from '@/core/money.js';
import type { Money } from '@/core/money.js';
import type { BillingModel, PricingUnit, UnitCategory } from './types.js';

interface UnitMeta {
  category: UnitCategory;
  baseUnit: PricingUnit;
  /** How many base units one of this unit stands for. */
  multiplier: number;
}

const UNIT_META: Record<PricingUnit, UnitMeta> = {
  per_token: { category: 'token', baseUnit: 'per_token', multiplier: 1 },
  '1k_tokens': { category: 'token', baseUnit: 'per_token', multiplier: 1_000 },
  '1m_tokens': { category: 'token', baseUnit: 'per_token', multiplier: 1_000_000 },
  per_character: { category: 'character', baseUnit: 'per_character', multiplier: 1 },
  '1k_characters': { category: 'character', baseUnit: 'per_character', multiplier: 1_000 },
  per_second: { category: 'time', baseUnit: 'per_second', multiplier: 1 },
  per_minute: { category: 'time', baseUnit: 'per_second', multiplier: 60 },
  per_hour: { category: 'time', baseUnit: 'per_second', multiplier: 3_600 },
  per_request: { category: 'request', baseUnit: 'per_request', multiplier: 1 },
  per_image: { category: 'request', baseUnit: 'per_image', multiplier: 1 },
  per_audio_file: { category: 'request', baseUnit: 'per_audio_file', multiplier: 1 },
  per_mb: { category: 'data', baseUnit: 'per_mb', multiplier: 1 },
  per_gb: { category: 'data', baseUnit: 'per_mb', multiplier: 1_024 },
};

export function unitCategory(unit: PricingUnit): UnitCategory {
  return UNIT_META[unit].category;
}

export function unitMultiplier(unit: PricingUnit): number {
  return UNIT_META[unit].multiplier;
}

export function baseUnitOf(unit: PricingUnit): PricingUnit {
  return UNIT_META[unit].baseUnit;
}

/** Token units carry separate input and output rates. */
export function isTokenUnit(unit: PricingUnit): boolean {
  return UNIT_META[unit].category === 'token';
}

/**
 * Whether a billing model can price usage in the given unit.
 * Pay-per-use, tiered and enterprise accept every unit.
 */
export function isCompatible(billingModel: BillingModel, unit: PricingUnit): boolean {
  const category = unitCategory(unit);
  switch (billingModel) {
    case 'pay_per_use':
    case 'tiered':
    case 'enterprise':
      return true;
    case 'credits':
      return category === 'token' || category === 'request';
    case 'subscription':
      return category === 'time' || category === 'request';
    case 'free_tier':
      return category === 'request' || category === 'token';
  }
}

/**
 * Convert a rate between two units sharing a base unit,
 * e.g. $3 per 1M tokens → $0.003 per 1K tokens.
 * Returns null when the units measure different things.
 */
export function convertRate(rate: Money, from: PricingUnit, to: PricingUnit): Money | null {
  if (from === to) return rate;
  if (baseUnitOf(from) !== baseUnitOf(to)) return null;
  return scaleMoney(rate, unitMultiplier(to), unitMultiplier(from));
}
