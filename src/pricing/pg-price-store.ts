/**
 * PostgreSQL-backed PriceStore over the `price_entries` table.
 * NUMERIC columns come back from pg as strings and stay strings until validation.
 */
import type { Queryable } from '@/infrastructure/database.js';
import { toDateOnly } from './price-store.js';
import type { PriceStore, RawPriceEntry } from './types.js';

interface PriceRow {
  provider: string;
  model: string;
  unit: string;
  input_rate: string | null;
  output_rate: string | null;
  flat_rate: string | null;
  currency: string;
  billing_model: string;
  effective_date: string;
}

function toRawEntry(row: PriceRow): RawPriceEntry {
  return {
    provider: row.provider,
    model: row.model,
    unit: row.unit,
    inputRate: row.input_rate ?? undefined,
    outputRate: row.output_rate ?? undefined,
    flatRate: row.flat_rate ?? undefined,
    currency: row.currency,
    billingModel: row.billing_model,
    effectiveDate: row.effective_date,
  };
}

/** Create a PriceStore backed by PostgreSQL. */
export function createPgPriceStore(db: Queryable): PriceStore {
  return {
    async findCurrent(provider: string, model: string, asOf: Date): Promise<RawPriceEntry | null> {
      const result = await db.query<PriceRow>(
        `SELECT provider, model, unit, input_rate, output_rate, flat_rate, currency, billing_model,
                to_char(effective_date, 'YYYY-MM-DD') AS effective_date
           FROM price_entries
          WHERE provider = $1 AND model = $2 AND effective_date <= $3::date
          ORDER BY effective_date DESC
          LIMIT 1`,
        [provider, model, toDateOnly(asOf)],
      );
      const row = result.rows[0];
      return row ? toRawEntry(row) : null;
    },

    async upsert(entry: RawPriceEntry): Promise<void> {
      await db.query(
        `INSERT INTO price_entries
           (provider, model, effective_date, unit, input_rate, output_rate, flat_rate, currency, billing_model)
         VALUES ($1, $2, $3::date, $4, $5, $6, $7, $8, $9)
         ON CONFLICT (provider, model, effective_date) DO UPDATE SET
           unit = EXCLUDED.unit,
           input_rate = EXCLUDED.input_rate,
           output_rate = EXCLUDED.output_rate,
           flat_rate = EXCLUDED.flat_rate,
           currency = EXCLUDED.currency,
           billing_model = EXCLUDED.billing_model,
           updated_at = now()`,
        [
          entry.provider,
          entry.model,
          entry.effectiveDate,
          entry.unit,
          entry.inputRate?.toString() ?? null,
          entry.outputRate?.toString() ?? null,
          entry.flatRate?.toString() ?? null,
          entry.currency ?? 'USD',
          entry.billingModel ?? 'pay_per_use',
        ],
      );
    },
  };
}
