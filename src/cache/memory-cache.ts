/**
 * In-memory TTL cache with a stale window.
 *
 * Entries are fresh until `ttlMs`, then stale until `ttlMs + staleTtlMs`, then
 * gone. Readers decide what to do with a stale hit (serve it and refresh in the
 * background). Keys are independent: invalidating one never touches another.
 *
 * A reader that loads a value from a slower source takes a `stamp()` first and
 * hands it back to `set`; if the key was deleted in between, the write is
 * dropped, so a load that raced an invalidation cannot resurrect old data.
 */
import type { Clock } from '@/core/types.js';
import { systemClock } from '@/core/types.js';

export type CacheLookup<V> =
  | { status: 'fresh'; value: V }
  | { status: 'stale'; value: V }
  | { status: 'miss' };

export interface MemoryCacheOptions {
  ttlMs: number;
  /** How long an expired entry may still be served while it refreshes. Defaults to 0. */
  staleTtlMs?: number;
  /** Oldest entries are evicted past this size. Defaults to 10_000. */
  maxEntries?: number;
  clock?: Clock;
}

/** Lookup counters since the cache was created. */
export interface CacheStats {
  hits: number;
  staleHits: number;
  misses: number;
  size: number;
}

export interface MemoryCache<V> {
  lookup(key: string): CacheLookup<V>;
  /** Fresh value only. */
  get(key: string): V | undefined;
  /** Current write sequence, for a later conditional `set`. */
  stamp(): number;
  /** Store a value; with a stamp, only if the key was not deleted since. Returns whether it was stored. */
  set(key: string, value: V, stamp?: number): boolean;
  delete(key: string): boolean;
  clear(): void;
  stats(): CacheStats;
  readonly size: number;
}

interface Slot<V> {
  value: V;
  storedAt: number;
}

export function createMemoryCache<V>(options: MemoryCacheOptions): MemoryCache<V> {
  const { ttlMs, staleTtlMs = 0, maxEntries = 10_000, clock = systemClock } = options;
  const slots = new Map<string, Slot<V>>();
  const deletedAt = new Map<string, number>();
  let sequence = 0;
  let clearedAt = -1;
  let hits = 0;
  let staleHits = 0;
  let misses = 0;

  function trim<T>(map: Map<string, T>): void {
    while (map.size > maxEntries) {
      const oldest = map.keys().next();
      if (oldest.done) break;
      map.delete(oldest.value);
    }
  }

  function lookup(key: string): CacheLookup<V> {
    const slot = slots.get(key);
    if (slot) {
      const age = clock().getTime() - slot.storedAt;
      if (age < ttlMs) {
        hits++;
        return { status: 'fresh', value: slot.value };
      }
      if (age < ttlMs + staleTtlMs) {
        staleHits++;
        return { status: 'stale', value: slot.value };
      }
      slots.delete(key);
    }
    misses++;
    return { status: 'miss' };
  }

  return {
    lookup,

    get(key: string): V | undefined {
      const hit = lookup(key);
      return hit.status === 'fresh' ? hit.value : undefined;
    },

    stamp(): number {
      return sequence;
    },

    set(key: string, value: V, stamp?: number): boolean {
      if (stamp !== undefined && (stamp < clearedAt || (deletedAt.get(key) ?? -1) > stamp)) {
        return false;
      }

      // Re-insert so iteration order tracks recency of writes.
      slots.delete(key);
      slots.set(key, { value, storedAt: clock().getTime() });
      trim(slots);
      return true;
    },

    delete(key: string): boolean {
      sequence++;
      deletedAt.delete(key);
      deletedAt.set(key, sequence);
      trim(deletedAt);
      return slots.delete(key);
    },

    clear(): void {
      sequence++;
      clearedAt = sequence;
      slots.clear();
      deletedAt.clear();
    },

    stats(): CacheStats {
      return { hits, staleHits, misses, size: slots.size };
    },

    get size(): number {
      return slots.size;
    },
  };
}
