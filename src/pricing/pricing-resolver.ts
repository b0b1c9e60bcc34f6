/**
 * PricingResolver: resolves a price entry through an ordered fallback chain.
 *
 * 1. Persistent price store, cached per (provider, model) with a TTL; stale
 *    entries are served while one background refresh per key runs.
 * 2. Driver defaults from the injected PriceCatalog.
 * 3. The universal fallback rate.
 *
 * `resolve` never rejects. Store errors and timeouts count as "absent" and
 * are not cached; rows that fail validation are logged and fall through.
 */
import { withTimeout } from '@/core/async.js';
import { toError } from '@/core/errors.js';
import { isOk } from '@/core/result.js';
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';
import { createInProcessInvalidationBus } from '@/cache/invalidation-bus.js';
import type { Invalidation, InvalidationBus } from '@/cache/invalidation-bus.js';
import { createMemoryCache } from '@/cache/memory-cache.js';
import type { CacheStats } from '@/cache/memory-cache.js';
import type { Logger } from '@/observability/logger.js';
import type { PriceCatalog } from './catalog.js';
import { validatePriceEntry } from './price-validator.js';
import type { PriceEntry, PriceStore, RawPriceEntry } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

/** Fallback rate applied to any (provider, model) no other tier knows. */
export type UniversalFallbackRate = Omit<RawPriceEntry, 'provider' | 'model'>;

export interface PricingResolverOptions {
  catalog: PriceCatalog;
  universalFallback: UniversalFallbackRate;
  logger: Logger;
  /** Tier 1. Without a store, resolution starts at the catalog. */
  store?: PriceStore;
  /** Defaults to 1 hour. */
  cacheTtlMs?: number;
  /** How long past the TTL a cached row may still be served. Defaults to 24 hours. */
  staleTtlMs?: number;
  /** Upper bound on one store read. Defaults to 50ms. */
  storeTimeoutMs?: number;
  /** Carries price invalidations to resolvers in other processes. */
  bus?: InvalidationBus;
  clock?: Clock;
}

export interface ProviderModel {
  provider: string;
  model: string;
}

/** Counters since the resolver was created. */
export interface PricingResolverStats {
  cache: CacheStats;
  storeReads: number;
  /** Reads that errored or timed out. */
  storeFailures: number;
  catalogHits: number;
  universalFallbacks: number;
}

export interface PricingResolver {
  resolve(provider: string, model: string): Promise<PriceEntry>;
  /** Drop the cached store row for one (provider, model), here and on every subscriber. */
  invalidate(provider: string, model: string): Promise<void>;
  /** Pre-load the cache for the given pairs. */
  warm(pairs: readonly ProviderModel[]): Promise<void>;
  /** Swap in a new catalog. In-flight resolutions finish against the old one. */
  reloadCatalog(catalog: PriceCatalog): void;
  stats(): PricingResolverStats;
  /** Stop listening to the invalidation bus. */
  close(): void;
  readonly catalogVersion: string;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create a PricingResolver. Throws if the universal fallback itself is inconsistent. */
export function createPricingResolver(options: PricingResolverOptions): PricingResolver {
  const {
    store,
    logger,
    cacheTtlMs = 3_600_000,
    staleTtlMs = 86_400_000,
    storeTimeoutMs = 50,
    bus = createInProcessInvalidationBus(),
    clock = systemClock,
  } = options;

  let catalog = options.catalog;

  const fallback = validatePriceEntry(
    { provider: '*', model: '*', ...options.universalFallback },
    'universal_fallback',
  );
  if (!isOk(fallback)) throw fallback.error;
  const fallbackEntry = fallback.value;

  // null marks a confirmed absence (or a rejected row) so misses stay cheap too.
  const cache = createMemoryCache<PriceEntry | null>({ ttlMs: cacheTtlMs, staleTtlMs, clock });
  const inflight = new Map<string, Promise<PriceEntry | null>>();
  const counters = { storeReads: 0, storeFailures: 0, catalogHits: 0, universalFallbacks: 0 };

  function drop(key: string): void {
    inflight.delete(key);
    cache.delete(key);
  }

  const unsubscribe = bus.subscribe((invalidation: Invalidation) => {
    if (invalidation.kind === 'price') drop(`${invalidation.provider}:${invalidation.model}`);
  });

  async function readStore(
    priceStore: PriceStore,
    key: string,
    provider: string,
    model: string,
  ): Promise<PriceEntry | null> {
    const stamp = cache.stamp();
    let raw: RawPriceEntry | null;
    counters.storeReads++;
    try {
      raw = await withTimeout(
        priceStore.findCurrent(provider, model, clock()),
        storeTimeoutMs,
        'price store lookup',
      );
    } catch (error) {
      counters.storeFailures++;
      logger.warn('Price store unavailable, treating as absent', {
        component: 'pricing-resolver',
        provider,
        model,
        error: toError(error).message,
      });
      return null;
    }

    if (!raw) {
      cache.set(key, null, stamp);
      return null;
    }

    const validated = validatePriceEntry(raw, 'database');
    if (!isOk(validated)) {
      logger.warn('Rejected inconsistent price entry', {
        component: 'pricing-resolver',
        provider,
        model,
        code: validated.error.code,
        issues: validated.error.issues,
      });
      cache.set(key, null, stamp);
      return null;
    }

    const entry = Object.freeze(validated.value);
    cache.set(key, entry, stamp);
    return entry;
  }

  /** One store read per key at a time; concurrent callers share it. */
  function fetchOnce(
    priceStore: PriceStore,
    key: string,
    provider: string,
    model: string,
  ): Promise<PriceEntry | null> {
    const pending = inflight.get(key);
    if (pending) return pending;

    const request: Promise<PriceEntry | null> = readStore(priceStore, key, provider, model).finally(
      () => {
        if (inflight.get(key) === request) inflight.delete(key);
      },
    );
    inflight.set(key, request);
    return request;
  }

  async function fromStore(provider: string, model: string): Promise<PriceEntry | null> {
    if (!store) return null;

    const key = `${provider}:${model}`;
    const hit = cache.lookup(key);
    switch (hit.status) {
      case 'fresh':
        return hit.value;
      case 'stale':
        // Serve the stale row now; the shared promise is held in `inflight`.
        fetchOnce(store, key, provider, model).catch((error: unknown) => {
          logger.error('Background price refresh failed', {
            component: 'pricing-resolver',
            provider,
            model,
            error: toError(error).message,
          });
        });
        return hit.value;
      case 'miss':
        return fetchOnce(store, key, provider, model);
    }
  }

  async function resolve(provider: string, model: string): Promise<PriceEntry> {
    const stored = await fromStore(provider, model);
    if (stored) return stored;

    const driverDefault = catalog.lookup(provider, model);
    if (driverDefault) {
      counters.catalogHits++;
      return driverDefault;
    }

    counters.universalFallbacks++;
    logger.warn('No pricing found, using universal fallback', {
      component: 'pricing-resolver',
      provider,
      model,
    });
    return Object.freeze({ ...fallbackEntry, provider, model });
  }

  return {
    resolve,

    async invalidate(provider: string, model: string): Promise<void> {
      drop(`${provider}:${model}`);
      await bus.publish([{ kind: 'price', provider, model }]);
    },

    async warm(pairs: readonly ProviderModel[]): Promise<void> {
      await Promise.all(pairs.map(({ provider, model }) => resolve(provider, model)));
      logger.info('Pricing cache warmed', { component: 'pricing-resolver', pairs: pairs.length });
    },

    reloadCatalog(next: PriceCatalog): void {
      const previous = catalog.version;
      catalog = next;
      logger.info('Price catalog reloaded', {
        component: 'pricing-resolver',
        previousVersion: previous,
        version: next.version,
        entries: next.size,
      });
    },

    stats(): PricingResolverStats {
      return { cache: cache.stats(), ...counters };
    },

    close(): void {
      unsubscribe();
    },

    get catalogVersion(): string {
      return catalog.version;
    },
  };
}
