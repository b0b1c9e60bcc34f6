import { describe, it, expect } from 'vitest';
import { createMockDb } from '@/testing/fixtures/database.js';
import { createRawPriceEntry } from '@/testing/fixtures/pricing.js';
import { createPgPriceStore } from './pg-price-store.js';

describe('PgPriceStore', () => {
  describe('findCurrent', () => {
    it('maps the latest row and converts null rates to undefined', async () => {
      const db = createMockDb([
        {
          provider: 'openai',
          model: 'gpt-4',
          unit: '1k_tokens',
          input_rate: '0.030000000',
          output_rate: '0.060000000',
          flat_rate: null,
          currency: 'USD',
          billing_model: 'pay_per_use',
          effective_date: '2025-01-01',
        },
      ]);
      const store = createPgPriceStore(db);

      const row = await store.findCurrent('openai', 'gpt-4', new Date('2025-06-15T00:00:00.000Z'));

      expect(row).toEqual({
        provider: 'openai',
        model: 'gpt-4',
        unit: '1k_tokens',
        inputRate: '0.030000000',
        outputRate: '0.060000000',
        flatRate: undefined,
        currency: 'USD',
        billingModel: 'pay_per_use',
        effectiveDate: '2025-01-01',
      });
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('effective_date <= $3::date'), [
        'openai',
        'gpt-4',
        '2025-06-15',
      ]);
    });

    it('returns null when no row matches', async () => {
      const store = createPgPriceStore(createMockDb());

      expect(await store.findCurrent('openai', 'gpt-4', new Date())).toBeNull();
    });

    it('propagates query failures', async () => {
      const db = createMockDb();
      db.query.mockRejectedValueOnce(new Error('connection refused'));
      const store = createPgPriceStore(db);

      await expect(store.findCurrent('openai', 'gpt-4', new Date())).rejects.toThrow(
        'connection refused',
      );
    });
  });

  describe('upsert', () => {
    it('writes rates as strings and fills defaults', async () => {
      const db = createMockDb();
      const store = createPgPriceStore(db);

      await store.upsert(
        createRawPriceEntry({ inputRate: 0.03, currency: undefined, billingModel: undefined }),
      );

      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('ON CONFLICT'), [
        'openai',
        'gpt-4',
        '2025-01-01',
        '1k_tokens',
        '0.03',
        '0.06',
        null,
        'USD',
        'pay_per_use',
      ]);
    });
  });
});
