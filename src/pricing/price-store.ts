import type { PriceStore, RawPriceEntry } from './types.js';

/** `YYYY-MM-DD` of a date in UTC. */
export function toDateOnly(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Create an in-memory PriceStore for testing and development.
 */
export function createInMemoryPriceStore(seed: readonly RawPriceEntry[] = []): PriceStore {
  const rows = new Map<string, RawPriceEntry[]>();

  function upsertRow(entry: RawPriceEntry): void {
    const key = `${entry.provider}:${entry.model}`;
    const existing = (rows.get(key) ?? []).filter((r) => r.effectiveDate !== entry.effectiveDate);
    existing.push({ ...entry });
    rows.set(key, existing);
  }

  for (const entry of seed) upsertRow(entry);

  return {
    findCurrent(provider: string, model: string, asOf: Date): Promise<RawPriceEntry | null> {
      const day = toDateOnly(asOf);
      let current: RawPriceEntry | null = null;
      for (const row of rows.get(`${provider}:${model}`) ?? []) {
        if (row.effectiveDate > day) continue;
        if (!current || row.effectiveDate > current.effectiveDate) current = row;
      }
      return Promise.resolve(current ? { ...current } : null);
    },

    upsert(entry: RawPriceEntry): Promise<void> {
      upsertRow(entry);
      return Promise.resolve();
    },
  };
}
