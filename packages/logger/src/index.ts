/**
 * @tinyhop/logger - Structured Logging Package
 *
 * Consistent structured logging across tinyhop services, built on pino.
 *
 * Usage:
 * ```ts
 * import { createLogger } from "@tinyhop/logger";
 *
 * const log = createLogger("redirect");
 * log.warn({ id, err }, "Cache read failed");
 * ```
 */

import pino from "pino";

// ============================================================================
// Configuration
// ============================================================================

const SERVICE_NAME = process.env.SERVICE_NAME || "tinyhop";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel;
  /** Overrides NODE_ENV */
  env?: string;
}

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

/**
 * Level from LOG_LEVEL; tests are silent unless asked otherwise.
 */
export function resolveLogLevel(
  raw: string | undefined = process.env.LOG_LEVEL,
  env: string = process.env.NODE_ENV || "development"
): LogLevel {
  if (raw && isLogLevel(raw)) return raw;
  return env === "test" ? "silent" : "info";
}

/**
 * Options shared with Fastify's built-in pino instance.
 */
export function pinoOptions(name: string, options: LoggerOptions = {}): pino.LoggerOptions {
  const env = options.env ?? (process.env.NODE_ENV || "development");
  return {
    name: `${SERVICE_NAME}:${name}`,
    level: options.level ?? resolveLogLevel(undefined, env),
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: ['req.headers["x-api-key"]'],
      censor: "[redacted]",
    },
    transport:
      env === "development"
        ? {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          }
        : undefined,
    base: {
      service: name,
      env,
    },
  };
}

// ============================================================================
// Logger Factory
// ============================================================================

/**
 * Create a logger instance for a specific service/component
 */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  return pino(pinoOptions(name, options));
}

// Re-export pino types for consumers
export type { Logger } from "pino";
