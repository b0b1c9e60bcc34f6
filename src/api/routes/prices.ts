/**
 * Price routes: price table writes and resolved lookups.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { isErr } from '@/core/result.js';
import { validatePriceEntry } from '@/pricing/price-validator.js';
import type { RawPriceEntry } from '@/pricing/types.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess } from '../error-handler.js';
import { serializePriceEntry } from '../serializers.js';

// ─── Zod Schemas ────────────────────────────────────────────────
// Shape only. Unit, billing model and rate consistency is checked by
// validatePriceEntry and reported as 422.

const rateSchema = z.union([z.string(), z.number()]);

const priceBodySchema = z.object({
  provider: z.string().min(1).max(100),
  model: z.string().min(1).max(200),
  unit: z.string().min(1),
  inputRate: rateSchema.optional(),
  outputRate: rateSchema.optional(),
  flatRate: rateSchema.optional(),
  currency: z.string().optional(),
  billingModel: z.string().optional(),
  effectiveDate: z.string().min(1),
});

const priceParamsSchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
});

// ─── Route Plugin ───────────────────────────────────────────────

/** Register price table routes. */
export function priceRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { priceStore, resolver, logger } = deps;

  // PUT /prices: upsert a row keyed by (provider, model, effectiveDate)
  fastify.put('/prices', async (request, reply) => {
    const raw: RawPriceEntry = priceBodySchema.parse(request.body);
    const validated = validatePriceEntry(raw, 'database');
    if (isErr(validated)) {
      throw validated.error;
    }

    await priceStore.upsert(raw);
    await resolver.invalidate(raw.provider, raw.model);
    logger.info('Price entry updated', {
      component: 'price-routes',
      provider: raw.provider,
      model: raw.model,
      effectiveDate: raw.effectiveDate,
    });
    return sendSuccess(reply, serializePriceEntry(validated.value));
  });

  // GET /prices/:provider/:model: the entry the resolver would charge with
  fastify.get('/prices/:provider/:model', async (request, reply) => {
    const { provider, model } = priceParamsSchema.parse(request.params);
    const entry = await resolver.resolve(provider, model);
    return sendSuccess(reply, serializePriceEntry(entry));
  });
}
