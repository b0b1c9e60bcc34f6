// Caches and cross-process invalidation
export type { CacheLookup, CacheStats, MemoryCache, MemoryCacheOptions } from './memory-cache.js';
export { createMemoryCache } from './memory-cache.js';

export type { Invalidation, InvalidationBus, InvalidationHandler } from './invalidation-bus.js';
export {
  createInProcessInvalidationBus,
  decodeInvalidations,
  encodeInvalidations,
} from './invalidation-bus.js';

export type { RedisInvalidationBusOptions } from './redis-invalidation-bus.js';
export { createRedisInvalidationBus } from './redis-invalidation-bus.js';
