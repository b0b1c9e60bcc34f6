import { z } from 'zod';
import { isDecimalString } from './money.js';

/** Non-negative decimal amount as a string or number, normalized to a decimal string. */
export const decimalAmountSchema = z
  .union([z.string(), z.number()])
  .transform((value) => (typeof value === 'number' ? value.toFixed(10) : value.trim()))
  .refine((value) => isDecimalString(value), { message: 'must be a decimal amount' })
  .refine((value) => !value.startsWith('-'), { message: 'must not be negative' });

/** Alert threshold percentage. Stored as NUMERIC(6,2), so two decimals at most. */
export const alertThresholdSchema = z
  .number()
  .positive()
  .max(1000, 'Alert thresholds cannot exceed 1000%')
  .refine((value) => Math.abs(value * 100 - Math.round(value * 100)) < 1e-6, {
    message: 'Alert thresholds allow at most two decimal places',
  });

/** `path message`, or just the message for root issues. */
export function formatZodIssue(issue: z.ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path} ${issue.message}` : issue.message;
}
