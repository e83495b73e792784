/**
 * Redis Connection
 *
 * The cache is an accelerator: every command is bounded by the stack's
 * REDIS_TIMEOUT_MS and fails at once while the connection is down, so
 * the resolution service falls back to the store instead of queueing.
 * Reconnection keeps trying for the life of the process.
 */

import Redis from "ioredis";
import type { Logger } from "@tinyhop/logger";

export interface RedisConnectionSettings {
  /** REDIS_URL */
  redisUrl: string;
  /** REDIS_TIMEOUT_MS: per-command budget, also used for connecting */
  redisTimeoutMs: number;
}

export type RedisClient = Redis;

const RECONNECT_BASE_MS = 100;
const RECONNECT_MAX_MS = 5_000;

/**
 * Delay before reconnect attempt `attempt` (1-based): doubling from
 * 100 ms, capped at 5 s.
 */
export function reconnectDelay(attempt: number): number {
  const exponent = Math.min(Math.max(attempt, 1) - 1, 16);
  return Math.min(RECONNECT_BASE_MS * 2 ** exponent, RECONNECT_MAX_MS);
}

export function createRedisClient(settings: RedisConnectionSettings, logger?: Logger): RedisClient {
  const client = new Redis(settings.redisUrl, {
    connectTimeout: Math.max(settings.redisTimeoutMs, 1_000),
    commandTimeout: settings.redisTimeoutMs,
    // Failed commands are not retried
    maxRetriesPerRequest: 0,
    enableOfflineQueue: false,
    retryStrategy: reconnectDelay,
  });

  let warned = false;

  // Without a listener an "error" event would crash the process
  client.on("error", (err: Error) => {
    // One warning per outage
    if (warned) return;
    warned = true;
    logger?.warn({ err: err.message }, "Redis unavailable, serving from the store");
  });

  client.on("ready", () => {
    warned = false;
    logger?.info("Redis ready");
  });

  return client;
}
