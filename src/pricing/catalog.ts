/**
 * PriceCatalog: the static per-driver price tables, as an immutable,
 * versioned value injected into the resolver.
 */
import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from '@/observability/logger.js';
import { isOk } from '@/core/result.js';
import { validatePriceEntry } from './price-validator.js';
import type { PriceEntry } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

const catalogRowSchema = z.object({
  unit: z.string(),
  inputRate: z.union([z.string(), z.number()]).optional(),
  outputRate: z.union([z.string(), z.number()]).optional(),
  flatRate: z.union([z.string(), z.number()]).optional(),
  currency: z.string().optional(),
  billingModel: z.string().optional(),
  effectiveDate: z.string(),
});

export const rawPriceCatalogSchema = z.object({
  version: z.string().min(1),
  providers: z.record(z.string(), z.record(z.string(), catalogRowSchema)),
});

export type RawPriceCatalog = z.infer<typeof rawPriceCatalogSchema>;

export interface PriceCatalog {
  readonly version: string;
  /** Number of valid entries. */
  readonly size: number;
  lookup(provider: string, model: string): PriceEntry | null;
  providers(): string[];
  models(provider: string): string[];
}

// ─── Factory ────────────────────────────────────────────────────

/**
 * Build a catalog from its raw form. Entries that fail validation are
 * dropped and logged; the rest are frozen.
 */
export function createPriceCatalog(raw: RawPriceCatalog, logger?: Logger): PriceCatalog {
  const table = new Map<string, ReadonlyMap<string, PriceEntry>>();
  let size = 0;

  for (const [provider, models] of Object.entries(raw.providers)) {
    const byModel = new Map<string, PriceEntry>();
    for (const [model, row] of Object.entries(models)) {
      const result = validatePriceEntry({ provider, model, ...row }, 'driver_default');
      if (isOk(result)) {
        byModel.set(model, Object.freeze(result.value));
        size++;
      } else {
        logger?.warn('Dropping invalid catalog entry', {
          component: 'price-catalog',
          provider,
          model,
          issues: result.error.issues,
        });
      }
    }
    table.set(provider, byModel);
  }

  return Object.freeze({
    version: raw.version,
    size,
    lookup(provider: string, model: string): PriceEntry | null {
      return table.get(provider)?.get(model) ?? null;
    },
    providers(): string[] {
      return [...table.keys()];
    },
    models(provider: string): string[] {
      return [...(table.get(provider)?.keys() ?? [])];
    },
  });
}

/** Catalog with no entries; every lookup falls through. */
export function emptyPriceCatalog(): PriceCatalog {
  return createPriceCatalog({ version: 'empty', providers: {} });
}

export const DEFAULT_CATALOG_PATH = new URL('../../data/driver-pricing.json', import.meta.url);

/** Read and validate a catalog file (the bundled driver tables by default). */
export async function loadPriceCatalog(
  path: string | URL = DEFAULT_CATALOG_PATH,
  logger?: Logger,
): Promise<PriceCatalog> {
  const content = await readFile(path, 'utf-8');
  const raw = rawPriceCatalogSchema.parse(JSON.parse(content));
  return createPriceCatalog(raw, logger);
}
