/**
 * Price-entry validation. Turns an unvalidated row into an immutable
 * PriceEntry, or reports every inconsistency found in it.
 */
import { z } from 'zod';
import { InconsistentPriceEntryError } from '@/core/errors.js';
import { parseMoney } from '@/core/money.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { decimalAmountSchema, formatZodIssue } from '@/core/validation.js';
import { BILLING_MODELS, PRICING_UNITS } from './types.js';
import type { PriceEntry, PriceRates, PriceSource, RawPriceEntry } from './types.js';
import { isCompatible, isTokenUnit } from './units.js';

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

export const rawPriceEntrySchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1),
    unit: z.enum(PRICING_UNITS),
    inputRate: decimalAmountSchema.optional(),
    outputRate: decimalAmountSchema.optional(),
    flatRate: decimalAmountSchema.optional(),
    currency: z
      .string()
      .regex(/^[A-Z]{3}$/, 'must be a three-letter uppercase code')
      .default('USD'),
    billingModel: z.enum(BILLING_MODELS).default('pay_per_use'),
    effectiveDate: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be YYYY-MM-DD')
      .refine(isCalendarDate, { message: 'is not a calendar date' }),
  })
  .superRefine((entry, ctx) => {
    if (isTokenUnit(entry.unit)) {
      if (entry.inputRate === undefined || entry.outputRate === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['inputRate'],
          message: `token unit ${entry.unit} requires both inputRate and outputRate`,
        });
      }
    } else if (entry.flatRate === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['flatRate'],
        message: `unit ${entry.unit} requires flatRate`,
      });
    }
    if (!isCompatible(entry.billingModel, entry.unit)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['billingModel'],
        message: `billing model ${entry.billingModel} is not compatible with unit ${entry.unit}`,
      });
    }
  });

/**
 * Validate a raw row and build a PriceEntry tagged with the tier it came from.
 */
export function validatePriceEntry(
  raw: RawPriceEntry,
  source: PriceSource,
): Result<PriceEntry, InconsistentPriceEntryError> {
  const parsed = rawPriceEntrySchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      new InconsistentPriceEntryError(
        raw.provider,
        raw.model,
        parsed.error.issues.map(formatZodIssue),
      ),
    );
  }

  const entry = parsed.data;
  let rates: PriceRates;
  if (isTokenUnit(entry.unit) && entry.inputRate !== undefined && entry.outputRate !== undefined) {
    rates = {
      kind: 'split',
      inputRate: parseMoney(entry.inputRate),
      outputRate: parseMoney(entry.outputRate),
    };
  } else if (entry.flatRate !== undefined) {
    rates = { kind: 'flat', flatRate: parseMoney(entry.flatRate) };
  } else {
    return err(new InconsistentPriceEntryError(raw.provider, raw.model, ['rates are missing']));
  }

  return ok({
    provider: entry.provider,
    model: entry.model,
    unit: entry.unit,
    rates,
    currency: entry.currency,
    billingModel: entry.billingModel,
    effectiveDate: entry.effectiveDate,
    source,
  });
}
