/**
 * API Configuration
 *
 * Loads configuration from environment variables. The store, cache and
 * identifier settings come from @tinyhop/core; everything HTTP-facing is
 * parsed here.
 *
 * Fail fast on startup if required vars are missing.
 */

import {
  loadStackConfig,
  optional,
  optionalBool,
  optionalInt,
  validateStackConfig,
} from "@tinyhop/core";
import type { Env, StackConfig } from "@tinyhop/core";
import { QR_CONFIG } from "@tinyhop/shared";
import type { Logger } from "@tinyhop/logger";

export interface ApiConfig {
  // Server
  port: number;
  host: string;
  env: string;

  /** Keys accepted in X-API-Key; each key owns the URLs it creates */
  apiKeys: string[];

  rateLimitPerMinute: number;
  requestTimeoutMs: number;
  /** Expiry sweep period; 0 disables the sweep */
  expirySweepIntervalMs: number;

  /** true reflects the request origin */
  corsOrigin: string | boolean;
  qrGeneratorUrl: string;
  enableDocs: boolean;

  stack: StackConfig;
}

/**
 * Split a comma separated list, dropping blanks.
 */
export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load configuration from environment.
 * Call once at startup.
 */
export function loadApiConfig(env: Env = process.env): ApiConfig {
  const nodeEnv = optional(env, "NODE_ENV", "development");
  const corsOrigin = env.CORS_ORIGIN;

  return {
    port: optionalInt(env, "PORT", 8080),
    host: optional(env, "HOST", "0.0.0.0"),
    env: nodeEnv,

    apiKeys: parseList(env.API_KEYS),

    rateLimitPerMinute: optionalInt(env, "RATE_LIMIT_PER_MINUTE", 100),
    requestTimeoutMs: optionalInt(env, "REQUEST_TIMEOUT_MS", 5000),
    expirySweepIntervalMs: optionalInt(env, "EXPIRY_SWEEP_INTERVAL_MS", 60_000),

    corsOrigin: corsOrigin ? corsOrigin : true,
    qrGeneratorUrl: optional(env, "QR_GENERATOR_URL", QR_CONFIG.GENERATOR_URL),
    enableDocs: optionalBool(env, "ENABLE_DOCS", nodeEnv !== "production"),

    stack: loadStackConfig(env),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings; throws for unusable ones.
 */
export function validateApiConfig(config: ApiConfig, logger: Logger): void {
  validateStackConfig(config.stack, logger);

  if (config.rateLimitPerMinute < 1) {
    throw new Error("RATE_LIMIT_PER_MINUTE must be positive");
  }

  if (config.requestTimeoutMs < 1) {
    throw new Error("REQUEST_TIMEOUT_MS must be positive");
  }

  if (config.apiKeys.length === 0) {
    logger.warn("API_KEYS is empty; every authenticated route will answer 401");
  }

  if (config.env === "production" && config.corsOrigin === true) {
    logger.warn("CORS_ORIGIN is unset; any origin is allowed");
  }
}
