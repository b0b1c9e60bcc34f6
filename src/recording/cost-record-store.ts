/**
 * Cost record persistence. One row per request id; a second save for the
 * same id is reported, not applied.
 */
import { formatMoney, parseMoney } from '@/core/money.js';
import type { BudgetScope, RequestId, ScopeId, ScopeType } from '@/core/types.js';
import type { Queryable } from '@/infrastructure/database.js';
import type { PriceSource, PricingUnit } from '@/pricing/types.js';
import type { CostRecord, CostRecordStore } from './types.js';

// ─── In-Memory ──────────────────────────────────────────────────

export interface InMemoryCostRecordStore extends CostRecordStore {
  records(): CostRecord[];
}

export function createInMemoryCostRecordStore(): InMemoryCostRecordStore {
  const records = new Map<string, CostRecord>();

  return {
    save(record: CostRecord): Promise<boolean> {
      if (records.has(record.requestId)) return Promise.resolve(false);
      records.set(record.requestId, record);
      return Promise.resolve(true);
    },

    findByRequestId(requestId: RequestId): Promise<CostRecord | null> {
      return Promise.resolve(records.get(requestId) ?? null);
    },

    records(): CostRecord[] {
      return [...records.values()];
    },
  };
}

// ─── PostgreSQL ─────────────────────────────────────────────────

interface CostRecordRow {
  request_id: string;
  provider: string;
  model: string;
  scopes: { scopeType: ScopeType; scopeId: string }[];
  input_units: number;
  output_units: number;
  unit: PricingUnit;
  input_cost: string;
  output_cost: string;
  total_cost: string;
  currency: string;
  source: PriceSource;
  recorded_at: Date;
}

function toRecord(row: CostRecordRow): CostRecord {
  const scopes: BudgetScope[] = row.scopes.map((s) => ({
    scopeType: s.scopeType,
    scopeId: s.scopeId as ScopeId,
  }));
  return {
    requestId: row.request_id as RequestId,
    provider: row.provider,
    model: row.model,
    scopes,
    usage: {
      provider: row.provider,
      model: row.model,
      inputUnits: row.input_units,
      outputUnits: row.output_units,
    },
    breakdown: {
      inputCost: parseMoney(row.input_cost),
      outputCost: parseMoney(row.output_cost),
      totalCost: parseMoney(row.total_cost),
      currency: row.currency,
      unit: row.unit,
      source: row.source,
    },
    recordedAt: row.recorded_at,
  };
}

export function createPgCostRecordStore(db: Queryable): CostRecordStore {
  return {
    async save(record: CostRecord): Promise<boolean> {
      const { breakdown, usage } = record;
      const result = await db.query(
        `INSERT INTO cost_records
           (request_id, provider, model, scopes, input_units, output_units, unit,
            input_cost, output_cost, total_cost, currency, source, recorded_at)
         VALUES ($1, $2, $3, $4::jsonb, $5, $6, $7, $8, $9, $10, $11, $12, $13)
         ON CONFLICT (request_id) DO NOTHING`,
        [
          record.requestId,
          record.provider,
          record.model,
          JSON.stringify(record.scopes),
          usage.inputUnits,
          usage.outputUnits,
          breakdown.unit,
          formatMoney(breakdown.inputCost),
          formatMoney(breakdown.outputCost),
          formatMoney(breakdown.totalCost),
          breakdown.currency,
          breakdown.source,
          record.recordedAt,
        ],
      );
      return (result.rowCount ?? 0) > 0;
    },

    async findByRequestId(requestId: RequestId): Promise<CostRecord | null> {
      const result = await db.query<CostRecordRow>(
        `SELECT request_id, provider, model, scopes, input_units, output_units, unit,
                input_cost::text AS input_cost, output_cost::text AS output_cost,
                total_cost::text AS total_cost, currency, source, recorded_at
           FROM cost_records
          WHERE request_id = $1`,
        [requestId],
      );
      const row = result.rows[0];
      return row ? toRecord(row) : null;
    },
  };
}
