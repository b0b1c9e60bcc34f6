import { describe, it, expect } from 'vitest';
import { ValidationError } from '@/core/errors.js';
import { formatMoney } from '@/core/money.js';
import { USER_SCOPE } from '@/testing/fixtures/scopes.js';
import { createRequestContext } from './request-context.js';
import type { RequestContextInput } from './request-context.js';

function input(overrides?: Partial<RequestContextInput<string>>): RequestContextInput<string> {
  return {
    provider: 'openai',
    model: 'gpt-4',
    scopes: [{ scopeType: 'user', scopeId: 'user-1' }],
    estimatedPromptLength: 400,
    payload: 'Summarize this.',
    ...overrides,
  };
}

function issuesOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.context?.['issues'];
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('createRequestContext', () => {
  it('builds a context with a generated request id and default options', () => {
    const context = createRequestContext(input());

    expect(context.requestId).toMatch(/^[\w-]{21}$/);
    expect(context.scopes).toEqual([USER_SCOPE]);
    expect(context.options).toEqual({
      maxOutputTokens: undefined,
      perRequestLimit: undefined,
      tags: [],
    });
    expect(context.payload).toBe('Summarize this.');
  });

  it('keeps a caller-supplied request id', () => {
    expect(createRequestContext(input({ requestId: 'req-42' })).requestId).toBe('req-42');
  });

  it('parses the recognized options', () => {
    const context = createRequestContext(
      input({ options: { maxOutputTokens: 256, perRequestLimit: '0.25', tags: ['batch'] } }),
    );

    expect(context.options.maxOutputTokens).toBe(256);
    expect(context.options.perRequestLimit && formatMoney(context.options.perRequestLimit)).toBe(
      '0.25',
    );
    expect(context.options.tags).toEqual(['batch']);
  });

  it('passes the abort signal through', () => {
    const controller = new AbortController();

    expect(createRequestContext(input({ signal: controller.signal })).signal).toBe(
      controller.signal,
    );
  });

  it('rejects options it does not recognize', () => {
    const options = { maxOutputTokens: 10, budgetLimit: 5 };

    expect(issuesOf(() => createRequestContext(input({ options })))).toEqual([
      expect.stringContaining('budgetLimit'),
    ]);
  });

  it('rejects an empty scope stack', () => {
    expect(issuesOf(() => createRequestContext(input({ scopes: [] })))).toEqual([
      expect.stringMatching(/^scopes /),
    ]);
  });

  it('rejects a negative prompt length and a negative cap', () => {
    const issues = issuesOf(() =>
      createRequestContext(
        input({ estimatedPromptLength: -1, options: { perRequestLimit: '-0.5' } }),
      ),
    );

    expect(issues).toEqual([
      expect.stringMatching(/^estimatedPromptLength /),
      'options.perRequestLimit must not be negative',
    ]);
  });
});
