/**
 * Stack Factory
 *
 * Builds the store, cache, task queue and resolution service from
 * configuration, and tears them down in reverse order.
 */

import { InMemoryUrlStore, PgUrlStore, createPool, poolClient } from "@tinyhop/db";
import type { UrlStore } from "@tinyhop/db";
import { InMemoryUrlCache, RedisUrlCache, createRedisClient } from "@tinyhop/cache";
import type { RedisClient, UrlCache } from "@tinyhop/cache";
import type { Logger } from "@tinyhop/logger";
import { BackgroundTaskQueue } from "./background.js";
import type { StackConfig } from "./config.js";
import { ResolutionService } from "./resolution-service.js";

export interface ResolutionStack {
  service: ResolutionService;
  store: UrlStore;
  cache: UrlCache;
  tasks: BackgroundTaskQueue;
  /** The cache's connection when CACHE_DRIVER=redis, for other Redis users such as rate limiting */
  redis: RedisClient | null;
  /** Drain background tasks, then close the cache and store */
  close(timeoutMs?: number): Promise<void>;
}

export function createStore(config: StackConfig): UrlStore {
  if (config.storeDriver === "memory") {
    return new InMemoryUrlStore();
  }
  return new PgUrlStore(
    poolClient(createPool({ databaseUrl: config.databaseUrl, dbTimeoutMs: config.dbTimeoutMs }))
  );
}

export function createResolutionStack(config: StackConfig, logger: Logger): ResolutionStack {
  const store = createStore(config);
  const redis = config.cacheDriver === "redis" ? createRedisClient(config, logger) : null;
  const cache: UrlCache = redis ? new RedisUrlCache(redis, { logger }) : new InMemoryUrlCache();
  const tasks = new BackgroundTaskQueue({ logger });

  const service = new ResolutionService({
    store,
    cache,
    tasks,
    logger,
    baseUrl: config.baseUrl,
    idLength: config.idLength,
    maxIdAttempts: config.maxIdAttempts,
    cacheTtlSeconds: config.cacheTtlSeconds,
  });

  return {
    service,
    store,
    cache,
    tasks,
    redis,
    async close(timeoutMs = 5000) {
      await tasks.shutdown(timeoutMs);
      await cache.disconnect();
      await store.close();
    },
  };
}

