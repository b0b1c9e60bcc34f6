/**
 * Redis pub/sub InvalidationBus for deployments where the gate, the cost
 * worker and the admin service run in separate processes.
 *
 * A subscribed ioredis connection cannot issue other commands, so publishing
 * goes through a second connection.
 */
import { EventEmitter } from 'node:events';
import { Redis } from 'ioredis';
import { toError } from '@/core/errors.js';
import type { Logger } from '@/observability/logger.js';
import { decodeInvalidations, encodeInvalidations } from './invalidation-bus.js';
import type { Invalidation, InvalidationBus, InvalidationHandler } from './invalidation-bus.js';

export interface RedisInvalidationBusOptions {
  redisUrl: string;
  logger: Logger;
  /** Defaults to 'costwarden:invalidations'. */
  channel?: string;
}

const EVENT = 'invalidation';

export function createRedisInvalidationBus(options: RedisInvalidationBusOptions): InvalidationBus {
  const { redisUrl, logger, channel = 'costwarden:invalidations' } = options;

  const publisher = new Redis(redisUrl, { lazyConnect: true, maxRetriesPerRequest: 3 });
  const subscriber = new Redis(redisUrl, { lazyConnect: true });
  const emitter = new EventEmitter();
  emitter.setMaxListeners(100);

  function onMessage(received: string, payload: string): void {
    if (received !== channel) return;

    let invalidations: Invalidation[];
    try {
      invalidations = decodeInvalidations(payload);
    } catch (error) {
      logger.warn('Ignoring malformed invalidation message', {
        component: 'invalidation-bus',
        channel,
        error: toError(error).message,
      });
      return;
    }
    for (const invalidation of invalidations) {
      emitter.emit(EVENT, invalidation);
    }
  }

  return {
    async publish(invalidations: readonly Invalidation[]): Promise<void> {
      if (invalidations.length === 0) return;
      await publisher.publish(channel, encodeInvalidations(invalidations));
    },

    subscribe(handler: InvalidationHandler): () => void {
      emitter.on(EVENT, handler);
      return () => {
        emitter.off(EVENT, handler);
      };
    },

    async start(): Promise<void> {
      subscriber.on('message', onMessage);
      await subscriber.subscribe(channel);
      logger.info('Invalidation bus subscribed', { component: 'invalidation-bus', channel });
    },

    close(): Promise<void> {
      emitter.removeAllListeners(EVENT);
      subscriber.off('message', onMessage);
      subscriber.disconnect();
      publisher.disconnect();
      logger.info('Invalidation bus closed', { component: 'invalidation-bus', channel });
      return Promise.resolve();
    },
  };
}
