import { describe, it, expect } from 'vitest';
import { createRawPriceEntry } from '@/testing/fixtures/pricing.js';
import { createInMemoryPriceStore, toDateOnly } from './price-store.js';

const AS_OF = new Date('2025-06-15T12:00:00.000Z');

describe('InMemoryPriceStore', () => {
  it('returns the latest row effective on or before the date', async () => {
    const store = createInMemoryPriceStore([
      createRawPriceEntry({ effectiveDate: '2025-01-01', inputRate: '0.03' }),
      createRawPriceEntry({ effectiveDate: '2025-06-01', inputRate: '0.02' }),
      createRawPriceEntry({ effectiveDate: '2025-07-01', inputRate: '0.01' }),
    ]);

    const row = await store.findCurrent('openai', 'gpt-4', AS_OF);

    expect(row?.effectiveDate).toBe('2025-06-01');
    expect(row?.inputRate).toBe('0.02');
  });

  it('returns null when nothing is effective yet', async () => {
    const store = createInMemoryPriceStore([
      createRawPriceEntry({ effectiveDate: '2025-07-01' }),
    ]);

    expect(await store.findCurrent('openai', 'gpt-4', AS_OF)).toBeNull();
    expect(await store.findCurrent('openai', 'gpt-5', AS_OF)).toBeNull();
  });

  it('replaces a row with the same effective date on upsert', async () => {
    const store = createInMemoryPriceStore([createRawPriceEntry({ inputRate: '0.03' })]);

    await store.upsert(createRawPriceEntry({ inputRate: '0.025' }));

    const row = await store.findCurrent('openai', 'gpt-4', AS_OF);
    expect(row?.inputRate).toBe('0.025');
  });
});

describe('toDateOnly', () => {
  it('formats the UTC calendar day', () => {
    expect(toDateOnly(new Date('2025-03-31T23:30:00.000Z'))).toBe('2025-03-31');
  });
});
