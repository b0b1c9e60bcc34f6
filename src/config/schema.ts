/**
 * Zod schema for the costwarden configuration file. Every field has a
 * default, so an empty object is a complete configuration.
 */
import { z } from 'zod';
import { alertThresholdSchema, decimalAmountSchema } from '@/core/validation.js';
import { BILLING_MODELS, PRICING_UNITS } from '@/pricing/types.js';

// ─── Pricing ────────────────────────────────────────────────────

/** Rate applied when neither the store nor the catalog knows a model. */
export const universalFallbackSchema = z.object({
  unit: z.enum(PRICING_UNITS),
  inputRate: decimalAmountSchema.optional(),
  outputRate: decimalAmountSchema.optional(),
  flatRate: decimalAmountSchema.optional(),
  currency: z.string().regex(/^[A-Z]{3}$/, 'Currency must be a three-letter uppercase code'),
  billingModel: z.enum(BILLING_MODELS),
  effectiveDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Effective date must be YYYY-MM-DD'),
});

export const pricingConfigSchema = z.object({
  cacheTtlMs: z.number().int().positive().default(3_600_000),
  staleTtlMs: z.number().int().nonnegative().default(86_400_000),
  storeTimeoutMs: z.number().int().positive().default(50),
  /** Driver-default catalog file; the bundled one when omitted. */
  catalogPath: z.string().min(1).optional(),
  universalFallback: universalFallbackSchema.default({
    unit: '1k_tokens',
    inputRate: '0.06',
    outputRate: '0.12',
    currency: 'USD',
    billingModel: 'pay_per_use',
    effectiveDate: '1970-01-01',
  }),
});

// ─── Budget ─────────────────────────────────────────────────────

export const budgetConfigSchema = z.object({
  limitCacheTtlMs: z.number().int().positive().default(300_000),
  spendCacheTtlMs: z.number().int().positive().default(60_000),
  storeTimeoutMs: z.number().int().positive().default(50),
  defaultAlertThresholds: z.array(alertThresholdSchema).default([80, 95, 100]),
});

// ─── Enforcement ────────────────────────────────────────────────

export const enforcementConfigSchema = z.object({
  checkTimeoutMs: z.number().int().positive().default(100),
  charsPerToken: z.number().positive().default(4),
});

// ─── Recording ──────────────────────────────────────────────────

export const recordingConfigSchema = z
  .object({
    maxAttempts: z.number().int().min(1).max(20, 'Max attempts cannot exceed 20').default(5),
    baseDelayMs: z.number().int().nonnegative().default(100),
    maxDelayMs: z.number().int().nonnegative().default(5_000),
    concurrency: z.number().int().positive().default(5),
    queue: z.enum(['in-process', 'bullmq']).default('in-process'),
  })
  .refine((data) => data.maxDelayMs >= data.baseDelayMs, {
    message: 'maxDelayMs must not be below baseDelayMs',
    path: ['maxDelayMs'],
  });

// ─── Invalidation ───────────────────────────────────────────────

/** Redis is used whenever redisUrl is set, unless a transport is named. */
export const invalidationConfigSchema = z.object({
  transport: z.enum(['in-process', 'redis']).optional(),
  channel: z.string().min(1).default('costwarden:invalidations'),
});

// ─── Server ─────────────────────────────────────────────────────

export const serverConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: z.number().int().min(0).max(65_535).default(3000),
});

// ─── Root ───────────────────────────────────────────────────────

export const costwardenConfigSchema = z
  .object({
    pricing: pricingConfigSchema.default({}),
    budget: budgetConfigSchema.default({}),
    enforcement: enforcementConfigSchema.default({}),
    recording: recordingConfigSchema.default({}),
    invalidation: invalidationConfigSchema.default({}),
    server: serverConfigSchema.default({}),
    databaseUrl: z.string().url('Invalid database URL').optional(),
    redisUrl: z.string().url('Invalid Redis URL').optional(),
  })
  .refine((data) => data.recording.queue !== 'bullmq' || data.redisUrl !== undefined, {
    message: 'The bullmq queue requires redisUrl',
    path: ['redisUrl'],
  })
  .refine((data) => data.invalidation.transport !== 'redis' || data.redisUrl !== undefined, {
    message: 'Redis invalidation requires redisUrl',
    path: ['redisUrl'],
  });
