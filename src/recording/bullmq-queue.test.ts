import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';
import type { RequestId } from '@/core/types.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import { USER_SCOPE } from '@/testing/fixtures/scopes.js';
import type { ResponseReceivedEvent } from './types.js';

// Mock BullMQ: capture constructor arguments and the worker's processor
type Processor = (job: { data: unknown }) => Promise<void>;

const mockAdd = vi.fn();
const mockGetJobCounts = vi.fn();
const mockQueueClose = vi.fn();
const mockWorkerClose = vi.fn();
const captured: {
  queueArgs: unknown[][];
  workerOptions: unknown[];
  processor?: Processor;
  handlers: Map<string, (...args: unknown[]) => void>;
} = { queueArgs: [], workerOptions: [], handlers: new Map() };

vi.mock('bullmq', () => {
  class MockQueue {
    add = mockAdd;
    getJobCounts = mockGetJobCounts;
    close = mockQueueClose;
    constructor(name: string, options: unknown) {
      captured.queueArgs.push([name, options]);
    }
  }
  class MockWorker {
    close = mockWorkerClose;
    constructor(_name: string, processor: Processor, options: unknown) {
      captured.processor = processor;
      captured.workerOptions.push(options);
    }
    on(event: string, handler: (...args: unknown[]) => void): this {
      captured.handlers.set(event, handler);
      return this;
    }
  }
  return { Queue: MockQueue, Worker: MockWorker };
});

const { createBullMQCostQueue, parseRedisUrl } = await import('./bullmq-queue.js');

const EVENT: ResponseReceivedEvent = {
  requestId: 'req-1' as RequestId,
  scopes: [USER_SCOPE],
  usage: { provider: 'openai', model: 'gpt-4', inputUnits: 100, outputUnits: 20 },
  receivedAt: '2025-06-15T12:00:00.000Z',
  tags: ['chat'],
};

describe('createBullMQCostQueue', () => {
  const onResponseReceived = vi.fn<(event: ResponseReceivedEvent) => Promise<void>>();

  beforeEach(() => {
    vi.clearAllMocks();
    captured.queueArgs = [];
    captured.workerOptions = [];
    captured.processor = undefined;
    captured.handlers.clear();
    onResponseReceived.mockResolvedValue(undefined);
    mockAdd.mockResolvedValue({ id: 'req-1' });
    mockQueueClose.mockResolvedValue(undefined);
    mockWorkerClose.mockResolvedValue(undefined);
  });

  function build(): ReturnType<typeof createBullMQCostQueue> {
    return createBullMQCostQueue({
      consumer: { onResponseReceived, onCostRecorded: () => Promise.resolve() },
      logger: createMockLogger(),
      redisUrl: 'redis://:test-secret@localhost:6380',
      concurrency: 3,
      attempts: 4,
      backoffDelayMs: 500,
      drainPollMs: 1,
    });
  }

  it('refuses to enqueue before start', async () => {
    await expect(build().enqueue(EVENT)).rejects.toThrow('Cost event queue not started');
  });

  it('connects the queue and worker to the configured Redis', async () => {
    await build().start();

    const connection = { host: 'localhost', port: 6380, password: 'test-secret' };
    expect(captured.queueArgs).toEqual([['cost-events', { connection }]]);
    expect(captured.workerOptions).toEqual([{ connection, concurrency: 3 }]);
    expect([...captured.handlers.keys()]).toEqual(['error', 'failed']);
  });

  it('keys jobs by request id with exponential backoff', async () => {
    const queue = build();
    await queue.start();

    await queue.enqueue(EVENT);

    expect(mockAdd).toHaveBeenCalledWith('response-received', EVENT, {
      jobId: 'req-1',
      attempts: 4,
      backoff: { type: 'exponential', delay: 500 },
      removeOnComplete: 1_000,
      removeOnFail: 5_000,
    });
  });

  it('validates job data before handing it to the consumer', async () => {
    await build().start();

    await captured.processor?.({ data: JSON.parse(JSON.stringify(EVENT)) });

    expect(onResponseReceived).toHaveBeenCalledWith(EVENT);
  });

  it('rejects malformed job data', async () => {
    await build().start();

    await expect(
      captured.processor?.({ data: { ...EVENT, receivedAt: 'yesterday' } }),
    ).rejects.toBeInstanceOf(ZodError);
    expect(onResponseReceived).not.toHaveBeenCalled();
  });

  it('drains by polling job counts', async () => {
    mockGetJobCounts
      .mockResolvedValueOnce({ waiting: 1, active: 1, delayed: 0, prioritized: 0 })
      .mockResolvedValueOnce({ waiting: 0, active: 1, delayed: 0, prioritized: 0 })
      .mockResolvedValueOnce({ waiting: 0, active: 0, delayed: 0, prioritized: 0 });
    const queue = build();
    await queue.start();

    await queue.drain();

    expect(mockGetJobCounts).toHaveBeenCalledTimes(3);
  });

  it('closes the worker and the queue on stop', async () => {
    const queue = build();
    await queue.start();

    await queue.stop();

    expect(mockWorkerClose).toHaveBeenCalledTimes(1);
    expect(mockQueueClose).toHaveBeenCalledTimes(1);
    await expect(queue.enqueue(EVENT)).rejects.toThrow('Cost event queue not started');
  });
});

describe('parseRedisUrl', () => {
  it('defaults the port and omits an empty password', () => {
    expect(parseRedisUrl('redis://cache.internal')).toEqual({
      host: 'cache.internal',
      port: 6379,
      password: undefined,
    });
  });
});
