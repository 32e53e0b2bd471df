/**
 * Cache Package Exports
 *
 * Fast store contract and implementations, the URL snapshot cache and the
 * degraded-outcome helpers used on the acceleration path.
 */

export { MalformedCounterError, type FastStore, type FastStoreOperation } from "./types.js";
export { createRedisClient, type RedisClientOptions } from "./client.js";
export {
  RedisFastStore,
  createRedisFastStore,
  type RedisClient,
  type RedisPipeline,
  type RedisFastStoreOptions,
} from "./redis-store.js";
export { MemoryFastStore, type MemoryFastStoreOptions } from "./memory-store.js";
export { attempt, ok, degraded, withTimeout, TimeoutError, type Outcome } from "./outcome.js";
export {
  UrlCache,
  urlKey,
  applyJitter,
  snapshotTtl,
  toSnapshot,
  fromSnapshot,
  parseSnapshot,
  type UrlCacheOptions,
} from "./url-cache.js";
