import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { BudgetLedger } from '@/budget/budget-ledger.js';
import { costwardenConfigSchema } from '@/config/schema.js';
import { formatMoney } from '@/core/money.js';
import { isOk } from '@/core/result.js';
import {
  createTestLedger,
  createTestResolver,
  fixedClock,
} from '@/testing/fixtures/enforcement.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import type { MockLogger } from '@/testing/fixtures/logger.js';
import type { CostEventQueue, ResponseReceivedEvent } from '@/recording/types.js';
import { createEnforcementPipeline } from './enforcement-pipeline.js';
import type { EnforcementSettings } from './enforcement-pipeline.js';
import { createRequestContext } from './request-context.js';
import type { RequestContextInput } from './request-context.js';
import type { ProviderResponse, RequestContext } from './types.js';

function input(): RequestContextInput<string> {
  return {
    requestId: 'req-1',
    provider: 'openai',
    model: 'gpt-4',
    scopes: [{ scopeType: 'user', scopeId: 'user-1' }],
    estimatedPromptLength: 400,
    options: {},
    payload: 'hello',
  };
}

function settings(raw: Record<string, unknown>): EnforcementSettings {
  return costwardenConfigSchema.parse(raw);
}

describe('createEnforcementPipeline', () => {
  let logger: MockLogger;
  let queue: CostEventQueue;

  beforeEach(() => {
    logger = createMockLogger();
    queue = {
      enqueue: vi.fn<(event: ResponseReceivedEvent) => Promise<void>>(() => Promise.resolve()),
      start: vi.fn(() => Promise.resolve()),
      stop: vi.fn(() => Promise.resolve()),
      drain: vi.fn(() => Promise.resolve()),
    };
  });

  function build(
    config: EnforcementSettings,
    ledger: BudgetLedger = createTestLedger(logger),
  ): ReturnType<typeof createEnforcementPipeline> {
    return createEnforcementPipeline(config, {
      resolver: createTestResolver(logger),
      ledger,
      queue,
      errorReporter: { report: vi.fn() },
      logger,
      sleep: () => Promise.resolve(),
      clock: fixedClock,
    });
  }

  it('estimates with the configured characters per token', async () => {
    const pipeline = build(settings({ enforcement: { charsPerToken: 2 } }));

    // 200 input tokens and 67 output tokens at 0.05 per 1K
    const decision = await pipeline.gate.check(createRequestContext(input()));

    expect(decision.estimatedCost && formatMoney(decision.estimatedCost)).toBe('0.01335');
  });

  it('uses four characters per token by default', async () => {
    const pipeline = build(settings({}));

    // 100 input tokens and 34 output tokens at 0.05 per 1K
    const decision = await pipeline.gate.check(createRequestContext(input()));

    expect(decision.estimatedCost && formatMoney(decision.estimatedCost)).toBe('0.0067');
  });

  it('bounds the pre-check by the configured timeout', async () => {
    const hanging: BudgetLedger = {
      ...createTestLedger(logger),
      estimateCheck: () => new Promise(() => undefined),
    };
    const pipeline = build(settings({ enforcement: { checkTimeoutMs: 5 } }), hanging);

    const decision = await pipeline.gate.check(createRequestContext(input()));

    expect(decision.allowed && decision.failedOpen).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith('Budget pre-check failed, allowing request', {
      component: 'enforcement-gate',
      requestId: 'req-1',
      provider: 'openai',
      model: 'gpt-4',
      error: 'enforcement pre-check timed out after 5ms',
    });
  });

  it('retries enqueues with the configured attempt budget', async () => {
    const enqueue = vi.fn<(event: ResponseReceivedEvent) => Promise<void>>(() =>
      Promise.reject(new Error('queue closed')),
    );
    queue.enqueue = enqueue;
    const pipeline = build(settings({ recording: { maxAttempts: 2 } }));
    const client = pipeline.guard((context: RequestContext<string>) =>
      Promise.resolve<ProviderResponse<string>>({
        response: context.payload,
        usage: { provider: 'openai', model: 'gpt-4', inputUnits: 10, outputUnits: 5 },
      }),
    );

    const result = await client.call(input());
    await client.flush();

    expect(isOk(result)).toBe(true);
    expect(enqueue).toHaveBeenCalledTimes(2);
  });
});
