/**
 * Shared Configuration
 *
 * Environment parsing for the settings both apps share: store, cache and
 * identifier allocation. Each app layers its own settings on top.
 *
 * Fail fast on startup if required vars are missing.
 */

import type { Logger } from "@tinyhop/logger";

export type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get required environment variable or throw.
 */
export function required(env: Env, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

/**
 * Get optional environment variable with default.
 */
export function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default.
 */
export function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

export function optionalBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name]?.toLowerCase();
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return defaultValue;
}

/**
 * One of a fixed set of values, or throw.
 */
export function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], defaultValue: T): T {
  const value = env[name];
  if (!value) return defaultValue;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new Error(`${name} must be one of ${allowed.join(", ")}, got '${value}'`);
  }
  return match;
}

// =============================================================================
// Stack Configuration
// =============================================================================

export type StoreDriver = "postgres" | "memory";
export type CacheDriver = "redis" | "memory";

export interface StackConfig {
  baseUrl: string;

  storeDriver: StoreDriver;
  databaseUrl: string;
  dbTimeoutMs: number;

  cacheDriver: CacheDriver;
  redisUrl: string;
  redisTimeoutMs: number;
  cacheTtlSeconds: number;

  idLength: number;
  maxIdAttempts: number;
}

/**
 * Load the shared settings. DATABASE_URL and REDIS_URL are only required
 * by the drivers that use them.
 */
export function loadStackConfig(env: Env = process.env): StackConfig {
  const storeDriver = oneOf<StoreDriver>(env, "STORE_DRIVER", ["postgres", "memory"], "postgres");
  const cacheDriver = oneOf<CacheDriver>(env, "CACHE_DRIVER", ["redis", "memory"], "redis");

  return {
    baseUrl: optional(env, "BASE_URL", "http://localhost:8080"),

    // Database
    storeDriver,
    databaseUrl: storeDriver === "postgres" ? required(env, "DATABASE_URL") : "",
    dbTimeoutMs: optionalInt(env, "DB_TIMEOUT_MS", 2000),

    // Redis
    cacheDriver,
    redisUrl: cacheDriver === "redis" ? required(env, "REDIS_URL") : "",
    redisTimeoutMs: optionalInt(env, "REDIS_TIMEOUT_MS", 500),
    cacheTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", 300),

    // Identifiers
    idLength: optionalInt(env, "ID_LENGTH", 6),
    maxIdAttempts: optionalInt(env, "MAX_ID_ATTEMPTS", 10),
  };
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings; throws for unusable ones.
 */
export function validateStackConfig(config: StackConfig, logger: Logger): void {
  if (config.idLength < 1 || config.maxIdAttempts < 1) {
    throw new Error("ID_LENGTH and MAX_ID_ATTEMPTS must be positive");
  }

  if (config.idLength < 5) {
    logger.warn({ idLength: config.idLength }, "ID_LENGTH is short; the identifier space fills quickly");
  }

  if (config.cacheTtlSeconds < 60) {
    logger.warn(
      { cacheTtlSeconds: config.cacheTtlSeconds },
      "CACHE_TTL_SECONDS is short. This may cause high DB load."
    );
  }

  if (config.storeDriver === "memory") {
    logger.warn("STORE_DRIVER=memory: records are lost on restart");
  }
}
