/**
 * In-Memory URL Store
 *
 * Map-backed store for development and tests. Records are cloned on the
 * way in and out so callers never share state with the store. Every
 * method yields once before touching the map, which lets concurrent
 * calls interleave the way they would against a real database.
 */

import { abortReason } from "@tinyhop/shared";
import type { CallOptions, NormalizedListOptions, SortField, UrlRecord } from "@tinyhop/shared";
import { DuplicateIdError, RecordNotFoundError } from "./types.js";
import type { StoreListResult, UrlStore } from "./types.js";

function sortValue(record: UrlRecord, field: SortField): number | null {
  switch (field) {
    case "click_count":
      return record.clickCount;
    case "last_accessed_at":
      return record.lastAccessedAt ? record.lastAccessedAt.getTime() : null;
    case "created_at":
      return record.createdAt.getTime();
  }
}

export class InMemoryUrlStore implements UrlStore {
  private readonly records = new Map<string, UrlRecord>();

  /** Number of stored records, active or not */
  get size(): number {
    return this.records.size;
  }

  private async tick(opts: CallOptions): Promise<void> {
    await Promise.resolve();
    if (opts.signal?.aborted) {
      throw abortReason(opts.signal);
    }
  }

  async create(record: UrlRecord, opts: CallOptions = {}): Promise<void> {
    await this.tick(opts);
    if (this.records.has(record.id)) {
      throw new DuplicateIdError(record.id);
    }
    this.records.set(record.id, structuredClone(record));
  }

  async getById(id: string, opts: CallOptions = {}): Promise<UrlRecord | null> {
    await this.tick(opts);
    const record = this.records.get(id);
    return record ? structuredClone(record) : null;
  }

  async update(record: UrlRecord, opts: CallOptions = {}): Promise<void> {
    await this.tick(opts);
    const current = this.records.get(record.id);
    if (!current) {
      throw new RecordNotFoundError(record.id);
    }
    // Click accounting columns belong to incrementClick
    this.records.set(record.id, {
      ...structuredClone(record),
      createdAt: current.createdAt,
      ownerKey: current.ownerKey,
      clickCount: current.clickCount,
      lastAccessedAt: current.lastAccessedAt,
    });
  }

  async softDelete(id: string, at: Date, opts: CallOptions = {}): Promise<void> {
    await this.tick(opts);
    const current = this.records.get(id);
    if (!current) {
      throw new RecordNotFoundError(id);
    }
    current.isActive = false;
    current.updatedAt = new Date(at);
  }

  async list(
    ownerKey: string,
    options: NormalizedListOptions,
    opts: CallOptions = {}
  ): Promise<StoreListResult> {
    await this.tick(opts);

    const matching = [...this.records.values()].filter(
      (record) =>
        record.ownerKey === ownerKey &&
        (options.isActive === undefined || record.isActive === options.isActive)
    );

    const direction = options.order === "asc" ? 1 : -1;
    matching.sort((a, b) => {
      const va = sortValue(a, options.sort);
      const vb = sortValue(b, options.sort);
      // NULLS LAST in both directions
      if (va === null && vb !== null) return 1;
      if (vb === null && va !== null) return -1;
      if (va !== null && vb !== null && va !== vb) return (va - vb) * direction;
      return a.id < b.id ? -direction : a.id > b.id ? direction : 0;
    });

    const offset = (options.page - 1) * options.limit;
    return {
      records: matching.slice(offset, offset + options.limit).map((record) => structuredClone(record)),
      totalCount: matching.length,
    };
  }

  async exists(id: string, opts: CallOptions = {}): Promise<boolean> {
    await this.tick(opts);
    return this.records.has(id);
  }

  async incrementClick(id: string, at: Date, opts: CallOptions = {}): Promise<void> {
    await this.tick(opts);
    const current = this.records.get(id);
    if (!current || !current.isActive) {
      throw new RecordNotFoundError(id, "not found or inactive");
    }
    current.clickCount += 1;
    current.lastAccessedAt = new Date(at);
    current.updatedAt = new Date(at);
  }

  async touchLastAccessed(id: string, at: Date, opts: CallOptions = {}): Promise<void> {
    await this.tick(opts);
    const current = this.records.get(id);
    if (!current || !current.isActive) {
      throw new RecordNotFoundError(id, "not found or inactive");
    }
    current.lastAccessedAt = new Date(at);
    current.updatedAt = new Date(at);
  }

  async expireSweep(now: Date, opts: CallOptions = {}): Promise<number> {
    await this.tick(opts);
    let affected = 0;
    for (const record of this.records.values()) {
      if (record.isActive && record.expiresAt !== null && record.expiresAt.getTime() < now.getTime()) {
        record.isActive = false;
        record.updatedAt = new Date(now);
        affected++;
      }
    }
    return affected;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
