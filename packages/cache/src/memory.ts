/**
 * In-Memory URL Cache
 *
 * Single-process stand-in for Redis. Entries expire lazily on read
 * against an injectable clock.
 */

import { abortReason } from "@tinyhop/shared";
import type { CallOptions, UrlRecord } from "@tinyhop/shared";
import type { UrlCache } from "./types.js";

interface Entry<T> {
  value: T;
  expiresAtMs: number;
}

export class InMemoryUrlCache implements UrlCache {
  private readonly records = new Map<string, Entry<UrlRecord>>();
  private readonly counters = new Map<string, Entry<number>>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Live record entries */
  get size(): number {
    const now = this.now();
    let live = 0;
    for (const entry of this.records.values()) {
      if (entry.expiresAtMs > now) live++;
    }
    return live;
  }

  private check(opts: CallOptions): void {
    if (opts.signal?.aborted) {
      throw abortReason(opts.signal);
    }
  }

  private live<T>(map: Map<string, Entry<T>>, key: string): Entry<T> | undefined {
    const entry = map.get(key);
    if (entry && entry.expiresAtMs <= this.now()) {
      map.delete(key);
      return undefined;
    }
    return entry;
  }

  async set(id: string, record: UrlRecord, ttlSeconds: number, opts: CallOptions = {}): Promise<void> {
    this.check(opts);
    this.records.set(id, {
      value: structuredClone(record),
      expiresAtMs: this.now() + ttlSeconds * 1000,
    });
  }

  async get(id: string, opts: CallOptions = {}): Promise<UrlRecord | null> {
    this.check(opts);
    const entry = this.live(this.records, id);
    return entry ? structuredClone(entry.value) : null;
  }

  async delete(id: string, opts: CallOptions = {}): Promise<void> {
    this.check(opts);
    this.records.delete(id);
  }

  async incrementCounter(key: string, ttlSeconds: number, opts: CallOptions = {}): Promise<number> {
    this.check(opts);
    const entry = this.live(this.counters, key);
    if (entry) {
      entry.value += 1;
      return entry.value;
    }
    this.counters.set(key, { value: 1, expiresAtMs: this.now() + ttlSeconds * 1000 });
    return 1;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async disconnect(): Promise<void> {
    this.records.clear();
    this.counters.clear();
  }
}
