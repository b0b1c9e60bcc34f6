import { describe, it, expect } from 'vitest';
import { formatMoney, parseMoney } from '@/core/money.js';
import type { RequestId } from '@/core/types.js';
import { createMockDb } from '@/testing/fixtures/database.js';
import { USER_SCOPE } from '@/testing/fixtures/scopes.js';
import { createInMemoryCostRecordStore, createPgCostRecordStore } from './cost-record-store.js';
import type { CostRecord } from './types.js';

function record(requestId: string, total: string, recordedAt: string): CostRecord {
  return {
    requestId: requestId as RequestId,
    provider: 'openai',
    model: 'gpt-4',
    scopes: [USER_SCOPE],
    usage: { provider: 'openai', model: 'gpt-4', inputUnits: 1000, outputUnits: 500 },
    breakdown: {
      inputCost: parseMoney(total),
      outputCost: parseMoney('0'),
      totalCost: parseMoney(total),
      currency: 'USD',
      unit: '1k_tokens',
      source: 'database',
    },
    recordedAt: new Date(recordedAt),
  };
}

describe('InMemoryCostRecordStore', () => {
  it('saves one record per request id', async () => {
    const store = createInMemoryCostRecordStore();

    expect(await store.save(record('r1', '0.10', '2025-06-15T10:00:00Z'))).toBe(true);
    expect(await store.save(record('r1', '0.99', '2025-06-15T10:00:00Z'))).toBe(false);

    const found = await store.findByRequestId('r1' as RequestId);
    expect(found && formatMoney(found.breakdown.totalCost)).toBe('0.10');
  });
});

describe('PgCostRecordStore', () => {
  it('inserts with ON CONFLICT and reports whether a row was written', async () => {
    const db = createMockDb([], 1);
    const store = createPgCostRecordStore(db);
    const saved = record('r1', '0.10', '2025-06-15T10:00:00Z');

    expect(await store.save(saved)).toBe(true);
    expect(db.query).toHaveBeenCalledWith(
      expect.stringContaining('ON CONFLICT (request_id) DO NOTHING'),
      [
        'r1',
        'openai',
        'gpt-4',
        JSON.stringify([USER_SCOPE]),
        1000,
        500,
        '1k_tokens',
        '0.10',
        '0.00',
        '0.10',
        'USD',
        'database',
        saved.recordedAt,
      ],
    );
  });

  it('reports a duplicate insert', async () => {
    const store = createPgCostRecordStore(createMockDb([], 0));

    expect(await store.save(record('r1', '0.10', '2025-06-15T10:00:00Z'))).toBe(false);
  });

  it('maps a stored row back to a record', async () => {
    const recordedAt = new Date('2025-06-15T10:00:00Z');
    const store = createPgCostRecordStore(
      createMockDb([
        {
          request_id: 'r1',
          provider: 'openai',
          model: 'gpt-4',
          scopes: [{ scopeType: 'user', scopeId: 'user-1' }],
          input_units: 1000,
          output_units: 500,
          unit: '1k_tokens',
          input_cost: '0.100000000',
          output_cost: '0.000000000',
          total_cost: '0.100000000',
          currency: 'USD',
          source: 'database',
          recorded_at: recordedAt,
        },
      ]),
    );

    expect(await store.findByRequestId('r1' as RequestId)).toEqual(
      record('r1', '0.10', '2025-06-15T10:00:00Z'),
    );
  });
});
