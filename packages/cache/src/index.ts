/**
 * Cache Package Exports
 *
 * The UrlCache contract with Redis and in-memory implementations.
 */

export { RedisUrlCache, CACHE_KEYS, serializeRecord, parseRecord } from "./cache.js";
export type { RedisUrlCacheOptions } from "./cache.js";
export { InMemoryUrlCache } from "./memory.js";
export { createRedisClient, reconnectDelay } from "./client.js";
export type { RedisClient, RedisConnectionSettings } from "./client.js";
export type { UrlCache, RedisCommands } from "./types.js";
