/**
 * Cache Type Definitions
 */

import type { CallOptions, UrlRecord } from "@tinyhop/shared";

/**
 * Key-value accelerator for point lookups. A miss is `null`; backend
 * failures reject and the caller decides whether they matter.
 */
export interface UrlCache {
  set(id: string, record: UrlRecord, ttlSeconds: number, opts?: CallOptions): Promise<void>;
  get(id: string, opts?: CallOptions): Promise<UrlRecord | null>;
  delete(id: string, opts?: CallOptions): Promise<void>;

  /** Increment a counter, starting its expiry on first use */
  incrementCounter(key: string, ttlSeconds: number, opts?: CallOptions): Promise<number>;

  ping(): Promise<boolean>;
  disconnect(): Promise<void>;
}

/**
 * The ioredis commands the cache uses.
 * Allows an in-process fake in tests.
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}
