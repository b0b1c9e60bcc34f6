import { describe, it, expect } from 'vitest';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { createTestCatalog } from '@/testing/fixtures/pricing.js';
import { createPriceCatalog, emptyPriceCatalog, loadPriceCatalog } from './catalog.js';

describe('PriceCatalog', () => {
  it('looks up validated driver defaults', () => {
    const catalog = createTestCatalog();

    const entry = catalog.lookup('openai', 'gpt-3.5-turbo');
    expect(entry?.source).toBe('driver_default');
    expect(entry?.currency).toBe('USD');
    expect(entry?.rates.kind).toBe('split');
    expect(catalog.size).toBe(2);
    expect(catalog.version).toBe('test-v1');
  });

  it('returns null for unknown providers and models', () => {
    const catalog = createTestCatalog();

    expect(catalog.lookup('openai', 'gpt-9')).toBeNull();
    expect(catalog.lookup('mistral', 'gpt-3.5-turbo')).toBeNull();
  });

  it('lists providers and models', () => {
    const catalog = createTestCatalog();

    expect(catalog.providers()).toEqual(['openai']);
    expect(catalog.models('openai')).toEqual(['gpt-3.5-turbo', 'whisper-1']);
    expect(catalog.models('unknown')).toEqual([]);
  });

  it('drops invalid entries and logs them', () => {
    const logger = createMockLogger();
    const catalog = createPriceCatalog(
      {
        version: 'v2',
        providers: {
          acme: {
            good: { unit: 'per_request', flatRate: '0.01', effectiveDate: '2025-01-01' },
            bad: { unit: 'per_request', effectiveDate: '2025-01-01' },
          },
        },
      },
      logger,
    );

    expect(catalog.size).toBe(1);
    expect(catalog.lookup('acme', 'bad')).toBeNull();
    expect(logger.warn).toHaveBeenCalledWith('Dropping invalid catalog entry', {
      component: 'price-catalog',
      provider: 'acme',
      model: 'bad',
      issues: ['flatRate unit per_request requires flatRate'],
    });
  });

  it('freezes the catalog and its entries', () => {
    const catalog = createTestCatalog();

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.lookup('openai', 'whisper-1'))).toBe(true);
  });

  it('has no entries when empty', () => {
    const catalog = emptyPriceCatalog();

    expect(catalog.size).toBe(0);
    expect(catalog.lookup('openai', 'gpt-4')).toBeNull();
  });

  it('loads the bundled driver tables', async () => {
    const catalog = await loadPriceCatalog();

    expect(catalog.size).toBe(54);
    expect(catalog.providers()).toEqual(['openai', 'gemini', 'xai', 'anthropic']);

    const gpt4 = catalog.lookup('openai', 'gpt-4');
    expect(gpt4?.unit).toBe('1k_tokens');
    expect(gpt4?.rates).toEqual({ kind: 'split', inputRate: 30_000_000n, outputRate: 60_000_000n });

    const whisper = catalog.lookup('openai', 'whisper-1');
    expect(whisper?.unit).toBe('per_minute');
    expect(whisper?.rates).toEqual({ kind: 'flat', flatRate: 6_000_000n });
  });
});
