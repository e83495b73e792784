/**
 * Redis URL Cache
 *
 * Key Schema:
 *   th:v1:url:{id}   - Cached URL record (JSON, dates as ISO strings)
 *   th:v1:ctr:{key}  - Generic counters
 *
 * Payloads are validated on read. A payload that fails validation (schema
 * change, manual edit) is deleted and reported as a miss.
 */

import { z } from "zod";
import { CACHE_CONFIG, withAbort } from "@tinyhop/shared";
import type { CallOptions, UrlRecord } from "@tinyhop/shared";
import type { Logger } from "@tinyhop/logger";
import type { RedisCommands, UrlCache } from "./types.js";

// =============================================================================
// Keys
// =============================================================================

export const CACHE_KEYS = {
  url: (id: string) => `th:v1:url:${id}`,
  counter: (key: string) => `th:v1:ctr:${key}`,
} as const;

// =============================================================================
// Payload
// =============================================================================

const isoDate = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value));

const cachedRecordSchema = z.object({
  id: z.string(),
  originalUrl: z.string(),
  description: z.string().nullable(),
  expiresAt: isoDate.nullable(),
  createdAt: isoDate,
  updatedAt: isoDate,
  clickCount: z.number().int().nonnegative(),
  isActive: z.boolean(),
  lastAccessedAt: isoDate.nullable(),
  ownerKey: z.string(),
});

export function serializeRecord(record: UrlRecord): string {
  // Date#toJSON yields ISO strings
  return JSON.stringify(record);
}

/**
 * Parse a cached payload; null when it is not a valid record.
 */
export function parseRecord(payload: string): UrlRecord | null {
  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch {
    return null;
  }
  const parsed = cachedRecordSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

// =============================================================================
// Cache
// =============================================================================

export interface RedisUrlCacheOptions {
  /** Fraction of the TTL to randomize by, spreading expirations (default 0.08) */
  ttlJitter?: number;
  logger?: Logger;
}

export class RedisUrlCache implements UrlCache {
  private readonly ttlJitter: number;
  private readonly logger?: Logger;

  constructor(
    private readonly client: RedisCommands,
    options: RedisUrlCacheOptions = {}
  ) {
    this.ttlJitter = options.ttlJitter ?? 0.08;
    this.logger = options.logger;
  }

  private jitteredTtl(ttlSeconds: number): number {
    const base = ttlSeconds > 0 ? ttlSeconds : CACHE_CONFIG.DEFAULT_TTL_SECONDS;
    const jitter = base * this.ttlJitter * (Math.random() * 2 - 1);
    return Math.max(1, Math.floor(base + jitter));
  }

  async set(id: string, record: UrlRecord, ttlSeconds: number, opts: CallOptions = {}): Promise<void> {
    await withAbort(
      this.client.setex(CACHE_KEYS.url(id), this.jitteredTtl(ttlSeconds), serializeRecord(record)),
      opts.signal
    );
  }

  async get(id: string, opts: CallOptions = {}): Promise<UrlRecord | null> {
    const key = CACHE_KEYS.url(id);
    const payload = await withAbort(this.client.get(key), opts.signal);
    if (payload === null) return null;

    const record = parseRecord(payload);
    if (record === null) {
      this.logger?.warn({ key }, "Evicting unreadable cache payload");
      await withAbort(this.client.del(key), opts.signal);
      return null;
    }
    return record;
  }

  async delete(id: string, opts: CallOptions = {}): Promise<void> {
    await withAbort(this.client.del(CACHE_KEYS.url(id)), opts.signal);
  }

  async incrementCounter(key: string, ttlSeconds: number, opts: CallOptions = {}): Promise<number> {
    const counterKey = CACHE_KEYS.counter(key);
    const count = await withAbort(this.client.incr(counterKey), opts.signal);
    if (count === 1) {
      await withAbort(this.client.expire(counterKey, ttlSeconds), opts.signal);
    }
    return count;
  }

  async ping(): Promise<boolean> {
    try {
      return (await this.client.ping()) === "PONG";
    } catch {
      return false;
    }
  }

  async disconnect(): Promise<void> {
    await this.client.quit();
  }
}
