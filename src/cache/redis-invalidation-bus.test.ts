import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { ScopeId } from '@/core/types.js';
import { createMockLogger } from '@/testing/fixtures/logger.js';
import type { MockLogger } from '@/testing/fixtures/logger.js';
import type { Invalidation } from './invalidation-bus.js';

// Mock ioredis: one instance per connection, message handlers captured
type MessageHandler = (channel: string, payload: string) => void;

const mockPublish = vi.fn();
const mockSubscribe = vi.fn();
const mockDisconnect = vi.fn();
const created: { url: string; options: unknown }[] = [];
const messageHandlers = new Set<MessageHandler>();

vi.mock('ioredis', () => {
  class MockRedis {
    publish = mockPublish;
    subscribe = mockSubscribe;
    disconnect = mockDisconnect;
    constructor(url: string, options: unknown) {
      created.push({ url, options });
    }
    on(event: string, handler: MessageHandler): this {
      if (event === 'message') messageHandlers.add(handler);
      return this;
    }
    off(event: string, handler: MessageHandler): this {
      if (event === 'message') messageHandlers.delete(handler);
      return this;
    }
  }
  return { Redis: MockRedis };
});

const { createRedisInvalidationBus } = await import('./redis-invalidation-bus.js');

const REDIS_URL = 'redis://localhost:6379';
const CHANNEL = 'costwarden:invalidations';

function deliver(channel: string, payload: string): void {
  for (const handler of messageHandlers) handler(channel, payload);
}

describe('RedisInvalidationBus', () => {
  let logger: MockLogger;

  beforeEach(() => {
    vi.clearAllMocks();
    created.length = 0;
    messageHandlers.clear();
    logger = createMockLogger();
    mockPublish.mockResolvedValue(1);
    mockSubscribe.mockResolvedValue(1);
  });

  it('opens a publishing and a subscribing connection', () => {
    createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });

    expect(created.map((c) => c.url)).toEqual([REDIS_URL, REDIS_URL]);
  });

  it('publishes a batch as one JSON message', async () => {
    const bus = createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });

    await bus.publish([
      {
        kind: 'spend',
        scope: { scopeType: 'user', scopeId: 'user-1' as ScopeId },
        periodType: 'daily',
        periodStart: new Date('2025-06-15T00:00:00.000Z'),
      },
    ]);

    expect(mockPublish).toHaveBeenCalledWith(
      CHANNEL,
      '[{"kind":"spend","scope":{"scopeType":"user","scopeId":"user-1"},"periodType":"daily","periodStart":"2025-06-15T00:00:00.000Z"}]',
    );
  });

  it('skips publishing an empty batch', async () => {
    const bus = createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });

    await bus.publish([]);

    expect(mockPublish).not.toHaveBeenCalled();
  });

  it('hands received invalidations to every subscriber', async () => {
    const bus = createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });
    const received: Invalidation[] = [];
    bus.subscribe((invalidation) => received.push(invalidation));
    await bus.start();

    deliver(
      CHANNEL,
      '[{"kind":"limit","scope":{"scopeType":"project","scopeId":"proj-1"},"periodType":"monthly"},' +
        '{"kind":"spend","scope":{"scopeType":"user","scopeId":"user-1"},"periodType":"daily","periodStart":"2025-06-15T00:00:00.000Z"}]',
    );

    expect(mockSubscribe).toHaveBeenCalledWith(CHANNEL);
    expect(received).toEqual([
      { kind: 'limit', scope: { scopeType: 'project', scopeId: 'proj-1' }, periodType: 'monthly' },
      {
        kind: 'spend',
        scope: { scopeType: 'user', scopeId: 'user-1' },
        periodType: 'daily',
        periodStart: new Date('2025-06-15T00:00:00.000Z'),
      },
    ]);
  });

  it('ignores messages from other channels', async () => {
    const bus = createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });
    const handler = vi.fn();
    bus.subscribe(handler);
    await bus.start();

    deliver('other', '[{"kind":"price","provider":"openai","model":"gpt-4"}]');

    expect(handler).not.toHaveBeenCalled();
  });

  it('logs and drops a malformed message', async () => {
    const bus = createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });
    const handler = vi.fn();
    bus.subscribe(handler);
    await bus.start();

    deliver(CHANNEL, '[{"kind":"price"}]');

    expect(handler).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      'Ignoring malformed invalidation message',
      expect.objectContaining({ component: 'invalidation-bus', channel: CHANNEL }),
    );
  });

  it('stops delivering and disconnects both connections on close', async () => {
    const bus = createRedisInvalidationBus({ redisUrl: REDIS_URL, logger });
    const handler = vi.fn();
    bus.subscribe(handler);
    await bus.start();

    await bus.close();
    deliver(CHANNEL, '[{"kind":"price","provider":"openai","model":"gpt-4"}]');

    expect(handler).not.toHaveBeenCalled();
    expect(mockDisconnect).toHaveBeenCalledTimes(2);
  });
});
