/**
 * Fixed-point money arithmetic.
 *
 * Amounts are integer nano-units (9 fractional digits) held in a bigint, so
 * summing many sub-cent costs over a billing period never drifts. Floats only
 * appear at the edges: parsing config values and reporting percentages.
 */
import { ValidationError } from './errors.js';
import type { Brand } from './types.js';

export type Money = Brand<bigint, 'Money'>;

export const MONEY_SCALE = 9;
const FACTOR = 10n ** BigInt(MONEY_SCALE);
const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

export const ZERO = 0n as Money;

function asMoney(units: bigint): Money {
  return units as Money;
}

/** Integer division rounding half away from zero. */
function divideRounded(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n !== denominator < 0n;
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;
  const quotient = (n * 2n + d) / (d * 2n);
  return negative ? -quotient : quotient;
}

function plainDecimal(value: number): string {
  if (!Number.isFinite(value)) {
    throw new ValidationError(`Amount must be a finite number, got ${value}`);
  }
  const text = value.toFixed(MONEY_SCALE + 1);
  if (text.includes('e')) {
    throw new ValidationError(`Amount ${value} is out of range`);
  }
  return text;
}

/**
 * Parse a decimal amount. Digits beyond the ninth fractional place are
 * rounded half-up.
 */
export function parseMoney(input: string | number): Money {
  const text = typeof input === 'number' ? plainDecimal(input) : input.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new ValidationError(`Invalid decimal amount "${text}"`, { input: text });
  }
  const sign = match[1];
  const whole = match[2] ?? '0';
  const fraction = match[3] ?? '';
  const kept = fraction.slice(0, MONEY_SCALE).padEnd(MONEY_SCALE, '0');
  let units = BigInt(whole) * FACTOR + BigInt(kept);
  const firstDropped = fraction.charAt(MONEY_SCALE);
  if (firstDropped !== '' && Number(firstDropped) >= 5) {
    units += 1n;
  }
  return asMoney(sign ? -units : units);
}

/** Whether a string is a decimal amount `parseMoney` accepts. */
export function isDecimalString(value: string): boolean {
  return DECIMAL_PATTERN.test(value.trim());
}

export function addMoney(a: Money, b: Money): Money {
  return asMoney(a + b);
}

export function subtractMoney(a: Money, b: Money): Money {
  return asMoney(a - b);
}

/**
 * `rate × quantity ÷ divisor`, rounded once at the end.
 * The quantity may be fractional (minutes, megabytes); it is parsed
 * at the same scale so the product stays exact.
 */
export function applyRate(rate: Money, quantity: number, divisor = 1): Money {
  if (!Number.isInteger(divisor) || divisor <= 0) {
    throw new ValidationError(`Divisor must be a positive integer, got ${divisor}`);
  }
  const scaledQuantity = Number.isInteger(quantity)
    ? BigInt(quantity) * FACTOR
    : parseMoney(quantity);
  return asMoney(divideRounded(rate * scaledQuantity, FACTOR * BigInt(divisor)));
}

/** Scale an amount by `multiplier / divisor` (both integers). */
export function scaleMoney(value: Money, multiplier: number, divisor: number): Money {
  return asMoney(divideRounded(value * BigInt(multiplier), BigInt(divisor)));
}

export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function maxMoney(a: Money, b: Money): Money {
  return a >= b ? a : b;
}

/**
 * Whether `spend` has reached `percentage`% of `limit`, compared exactly.
 * A zero limit counts as reached.
 */
export function reachesPercentage(spend: Money, limit: Money, percentage: number): boolean {
  const threshold = parseMoney(percentage);
  return spend * 100n * FACTOR >= threshold * limit;
}

/** Percentage of `limit` consumed by `spend`, two decimals. A zero limit reads as 100 once anything is spent. */
export function percentOf(spend: Money, limit: Money): number {
  if (limit === 0n) return spend > 0n ? 100 : 0;
  return Number(divideRounded(spend * 10_000n, limit)) / 100;
}

/**
 * Render as a plain decimal string with trailing zeros trimmed,
 * keeping at least two fractional digits.
 */
export function formatMoney(value: Money): string {
  const negative = value < 0n;
  const magnitude = negative ? -value : value;
  const whole = magnitude / FACTOR;
  const fraction = (magnitude % FACTOR).toString().padStart(MONEY_SCALE, '0');
  const trimmed = fraction.replace(/0+$/, '').padEnd(2, '0');
  return `${negative ? '-' : ''}${whole.toString()}.${trimmed}`;
}
