/**
 * Configuration Module
 *
 * Loads configuration from environment variables. Store, cache and
 * identifier settings are shared with the API through @tinyhop/core.
 *
 * Fail fast on startup if required vars are missing.
 */

import { loadStackConfig, optional, optionalInt, validateStackConfig } from "@tinyhop/core";
import type { Env, StackConfig } from "@tinyhop/core";
import type { Logger } from "@tinyhop/logger";

export interface RedirectConfig {
  port: number;
  host: string;
  env: string;
  rateLimitPerMinute: number;
  requestTimeoutMs: number;
  stack: StackConfig;
}

/**
 * Load configuration from environment.
 * Call once at startup.
 */
export function loadConfig(env: Env = process.env): RedirectConfig {
  return {
    // Server
    port: optionalInt(env, "PORT", 8081),
    host: optional(env, "HOST", "0.0.0.0"),
    env: optional(env, "NODE_ENV", "development"),

    rateLimitPerMinute: optionalInt(env, "RATE_LIMIT_PER_MINUTE", 100),
    requestTimeoutMs: optionalInt(env, "REQUEST_TIMEOUT_MS", 2000),

    stack: loadStackConfig(env),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: RedirectConfig, logger: Logger): void {
  validateStackConfig(config.stack, logger);

  if (config.rateLimitPerMinute < 1) {
    throw new Error("RATE_LIMIT_PER_MINUTE must be positive");
  }

  // The redirect hot path should give up well before a client does
  if (config.requestTimeoutMs > 5000) {
    logger.warn(
      { requestTimeoutMs: config.requestTimeoutMs },
      "REQUEST_TIMEOUT_MS is high for the redirect path"
    );
  }

  if (config.stack.redisTimeoutMs > 100) {
    logger.warn(
      { redisTimeoutMs: config.stack.redisTimeoutMs },
      "REDIS_TIMEOUT_MS is high. Consider <=100ms for low latency."
    );
  }
}
