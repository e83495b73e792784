/**
 * Resolution Service Tests
 *
 * Runs the service against the in-memory store and cache, with a
 * controllable clock. Fault-injecting subclasses stand in for backend
 * failures.
 */

import { describe, it, expect, beforeEach, jest } from "@jest/globals";
import { InMemoryUrlStore } from "@tinyhop/db";
import { InMemoryUrlCache } from "@tinyhop/cache";
import { RandomSourceError } from "@tinyhop/shared";
import type { CallOptions, UrlRecord } from "@tinyhop/shared";
import { BackgroundTaskQueue, ResolutionService, normalizeListOptions } from "../src/index.js";
import type { ResolutionServiceOptions } from "../src/index.js";

const OWNER = "test-key-1";
const OTHER = "test-key-2";
const BASE_URL = "https://th.example";

class CountingStore extends InMemoryUrlStore {
  reads = 0;

  async getById(id: string, opts?: CallOptions): Promise<UrlRecord | null> {
    this.reads++;
    return super.getById(id, opts);
  }
}

class FailingClickStore extends InMemoryUrlStore {
  async incrementClick(): Promise<void> {
    throw new Error("connection reset");
  }
}

class BrokenStore extends InMemoryUrlStore {
  async exists(): Promise<boolean> {
    throw new Error("connection refused");
  }
}

class BrokenCache extends InMemoryUrlCache {
  async get(): Promise<UrlRecord | null> {
    throw new Error("redis timeout");
  }

  async set(): Promise<void> {
    throw new Error("redis timeout");
  }
}

describe("ResolutionService", () => {
  let nowMs: number;
  let store: CountingStore;
  let cache: InMemoryUrlCache;
  let tasks: BackgroundTaskQueue;
  let service: ResolutionService;

  const clock = (): Date => new Date(nowMs);

  function build(overrides: Partial<ResolutionServiceOptions> = {}): ResolutionService {
    return new ResolutionService({
      store,
      cache,
      tasks,
      baseUrl: BASE_URL,
      now: clock,
      ...overrides,
    });
  }

  beforeEach(() => {
    nowMs = Date.parse("2026-03-01T12:00:00.000Z");
    store = new CountingStore();
    cache = new InMemoryUrlCache(() => nowMs);
    tasks = new BackgroundTaskQueue();
    service = build();
  });

  // ===========================================================================
  // create
  // ===========================================================================

  describe("create", () => {
    it("should allocate a random six-character identifier", async () => {
      const view = await service.create({ originalUrl: "https://example.com/a" }, OWNER);

      expect(view.id).toMatch(/^[0-9a-zA-Z]{6}$/);
      expect(view.shortUrl).toBe(`${BASE_URL}/${view.id}`);
      expect(view.qrCodeUrl).toBe(`${BASE_URL}/urls/${view.id}/qr`);
      expect(view).toMatchObject({
        originalUrl: "https://example.com/a",
        description: null,
        expiresAt: null,
        clickCount: 0,
        isActive: true,
        lastAccessedAt: null,
        ownerKey: OWNER,
        createdAt: new Date(nowMs),
        updatedAt: new Date(nowMs),
      });
    });

    it("should write the new record through to the cache", async () => {
      const view = await service.create({ originalUrl: "https://example.com/a" }, OWNER);
      expect((await cache.get(view.id))?.originalUrl).toBe("https://example.com/a");
    });

    it("should honor a trimmed custom identifier", async () => {
      const view = await service.create(
        { originalUrl: "https://example.com/a", customId: "  spring-sale  ", description: "campaign" },
        OWNER
      );
      expect(view.id).toBe("spring-sale");
      expect(view.description).toBe("campaign");
    });

    it("should enforce custom identifier length bounds", async () => {
      const create = (customId: string) => service.create({ originalUrl: "https://example.com", customId }, OWNER);

      await expect(create("ab")).rejects.toMatchObject({ code: "validation_failed" });
      await expect(create("a".repeat(51))).rejects.toMatchObject({ code: "validation_failed" });
      await expect(create("abc")).resolves.toMatchObject({ id: "abc" });
      await expect(create("b".repeat(50))).resolves.toMatchObject({ id: "b".repeat(50) });
    });

    it("should reject reserved words in any case", async () => {
      for (const customId of ["admin", "API", "Health"]) {
        await expect(
          service.create({ originalUrl: "https://example.com", customId }, OWNER)
        ).rejects.toMatchObject({ code: "validation_failed", details: { field: "custom_id" } });
      }
      expect(store.size).toBe(0);
    });

    it("should reject invalid URLs and descriptions before writing", async () => {
      await expect(service.create({ originalUrl: "ftp://example.com" }, OWNER)).rejects.toMatchObject({
        code: "validation_failed",
        details: { field: "original_url" },
      });
      await expect(
        service.create({ originalUrl: "https://example.com", description: "x".repeat(256) }, OWNER)
      ).rejects.toMatchObject({ code: "validation_failed", details: { field: "description" } });
      expect(store.size).toBe(0);
    });

    it("should report a taken custom identifier as a conflict", async () => {
      await service.create({ originalUrl: "https://example.com", customId: "promo" }, OWNER);
      await expect(
        service.create({ originalUrl: "https://example.org", customId: "promo" }, OTHER)
      ).rejects.toMatchObject({ code: "conflict" });
    });

    it("should let exactly one of two concurrent custom creates win", async () => {
      const results = await Promise.allSettled([
        service.create({ originalUrl: "https://example.com/1", customId: "launch" }, OWNER),
        service.create({ originalUrl: "https://example.com/2", customId: "launch" }, OTHER),
      ]);

      const fulfilled = results.filter((r) => r.status === "fulfilled");
      const rejected = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toMatchObject({ code: "conflict" });
      expect(store.size).toBe(1);
    });

    it("should retry past identifiers already in use", async () => {
      await build({ generateId: () => "taken1" }).create({ originalUrl: "https://example.com" }, OWNER);

      const candidates = ["taken1", "taken1", "fresh1"];
      const generateId = jest.fn((): string => candidates.shift() ?? "unused");
      const view = await build({ generateId }).create({ originalUrl: "https://example.com" }, OWNER);

      expect(view.id).toBe("fresh1");
      expect(generateId).toHaveBeenCalledTimes(3);
    });

    it("should fail with an internal error when every attempt collides", async () => {
      await build({ generateId: () => "taken1" }).create({ originalUrl: "https://example.com" }, OWNER);

      const generateId = jest.fn((): string => "taken1");
      await expect(
        build({ generateId, maxIdAttempts: 4 }).create({ originalUrl: "https://example.com" }, OWNER)
      ).rejects.toMatchObject({ code: "internal_error" });
      expect(generateId).toHaveBeenCalledTimes(4);
    });

    it("should pass the configured length to the generator", async () => {
      const generateId = jest.fn((length: number): string => "x".repeat(length));
      const view = await build({ generateId, idLength: 9 }).create({ originalUrl: "https://example.com" }, OWNER);
      expect(view.id).toBe("xxxxxxxxx");
    });

    it("should surface a failing random source as an internal error", async () => {
      const failing = build({
        generateId: () => {
          throw new RandomSourceError(new Error("no entropy"));
        },
      });
      await expect(failing.create({ originalUrl: "https://example.com" }, OWNER)).rejects.toMatchObject({
        code: "internal_error",
      });
    });

    it("should wrap store failures without leaking them", async () => {
      const broken = build({ store: new BrokenStore() });
      await expect(broken.create({ originalUrl: "https://example.com" }, OWNER)).rejects.toMatchObject({
        code: "internal_error",
        message: "Failed to check identifier",
      });
    });

    it("should succeed when the cache is down", async () => {
      const view = await build({ cache: new BrokenCache() }).create({ originalUrl: "https://example.com" }, OWNER);
      expect(await store.exists(view.id)).toBe(true);
    });
  });

  // ===========================================================================
  // resolve
  // ===========================================================================

  describe("resolve", () => {
    it("should round-trip a created record", async () => {
      const created = await service.create({ originalUrl: "https://example.com/docs" }, OWNER);
      const resolved = await service.resolve(created.id);

      expect(resolved.originalUrl).toBe("https://example.com/docs");
      expect(resolved.shortUrl).toBe(created.shortUrl);
    });

    it("should serve cache hits without touching the store", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.resolve(created.id);
      expect(store.reads).toBe(0);
    });

    it("should read through and backfill on a miss", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await cache.delete(created.id);

      await service.resolve(created.id);
      expect(store.reads).toBe(1);
      expect(await cache.get(created.id)).not.toBeNull();
    });

    it("should report unknown identifiers as not found", async () => {
      await expect(service.resolve("nothere")).rejects.toMatchObject({ code: "not_found" });
      await expect(service.resolve("bad/id")).rejects.toMatchObject({ code: "not_found" });
    });

    it("should report expired active records as expired", async () => {
      const created = await service.create(
        { originalUrl: "https://example.com", expiresAt: new Date(nowMs + 60_000) },
        OWNER
      );
      nowMs += 120_000;

      await expect(service.resolve(created.id)).rejects.toMatchObject({ code: "expired" });
    });

    it("should report expired inactive records as not found", async () => {
      const created = await service.create(
        { originalUrl: "https://example.com", expiresAt: new Date(nowMs + 60_000) },
        OWNER
      );
      await service.delete(created.id, OWNER);
      nowMs += 120_000;

      await expect(service.resolve(created.id)).rejects.toMatchObject({ code: "not_found" });
    });

    it("should not let a cached copy mask expiry", async () => {
      const created = await service.create(
        { originalUrl: "https://example.com", expiresAt: new Date(nowMs + 30_000) },
        OWNER
      );
      // Cache entry lives for 300s, well past the expiry
      nowMs += 60_000;

      await expect(service.resolve(created.id)).rejects.toMatchObject({ code: "expired" });
      expect(await cache.get(created.id)).toBeNull();
    });

    it("should fall back to the store when the cache fails", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      const degraded = build({ cache: new BrokenCache() });

      await expect(degraded.resolve(created.id)).resolves.toMatchObject({ id: created.id });
    });
  });

  // ===========================================================================
  // resolveForRedirect
  // ===========================================================================

  describe("resolveForRedirect", () => {
    it("should count the click in the background", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      const callTime = nowMs;

      const view = await service.resolveForRedirect(created.id);
      expect(view.clickCount).toBe(0);

      await tasks.drain();
      const stats = await service.getStats(created.id, OWNER);
      expect(stats.clickCount).toBe(1);
      expect(stats.lastAccessedAt?.getTime()).toBeGreaterThanOrEqual(callTime);
    });

    it("should invalidate the cached entry after counting", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.resolveForRedirect(created.id);
      await tasks.drain();

      expect(await cache.get(created.id)).toBeNull();
    });

    it("should count every redirect", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      for (let i = 0; i < 5; i++) {
        await service.resolveForRedirect(created.id);
      }
      await tasks.drain();

      expect((await service.getStats(created.id, OWNER)).clickCount).toBe(5);
    });

    it("should keep accounting failures away from the caller", async () => {
      const onError = jest.fn<(name: string, err: unknown) => void>();
      const failingStore = new FailingClickStore();
      const queue = new BackgroundTaskQueue({ onError });
      const failing = build({ store: failingStore, tasks: queue });

      const created = await failing.create({ originalUrl: "https://example.com" }, OWNER);
      await expect(failing.resolveForRedirect(created.id)).resolves.toMatchObject({ id: created.id });
      await queue.drain();

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0]?.[0]).toBe("increment-click");
      // Invalidation still ran
      expect(await cache.get(created.id)).toBeNull();
    });

    it("should not count failed resolutions", async () => {
      await expect(service.resolveForRedirect("missing")).rejects.toMatchObject({ code: "not_found" });
      expect(tasks.size).toBe(0);
    });
  });

  // ===========================================================================
  // Owner operations
  // ===========================================================================

  describe("getStats", () => {
    it("should return counters to the owner", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.resolveForRedirect(created.id);
      await tasks.drain();

      await expect(service.getStats(created.id, OWNER)).resolves.toMatchObject({
        id: created.id,
        clickCount: 1,
        isActive: true,
      });
    });

    it("should treat deleted records as not found", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.delete(created.id, OWNER);

      await expect(service.getStats(created.id, OWNER)).rejects.toMatchObject({ code: "not_found" });
    });

    it("should refuse other keys", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await expect(service.getStats(created.id, OTHER)).rejects.toMatchObject({ code: "unauthorized" });
    });

    it("should report unknown identifiers", async () => {
      await expect(service.getStats("missing", OWNER)).rejects.toMatchObject({ code: "not_found" });
    });
  });

  describe("checkAvailability", () => {
    it("should classify identifiers", async () => {
      await service.create({ originalUrl: "https://example.com", customId: "taken-one" }, OWNER);

      expect(await service.checkAvailability("fresh-one")).toEqual({ available: true });
      expect(await service.checkAvailability("taken-one")).toEqual({ available: false, reason: "taken" });
      expect(await service.checkAvailability("WWW")).toEqual({ available: false, reason: "reserved" });
      expect(await service.checkAvailability("a b")).toEqual({ available: false, reason: "invalid" });
    });
  });

  describe("update", () => {
    it("should apply only supplied fields and invalidate the cache", async () => {
      const created = await service.create(
        { originalUrl: "https://example.com", description: "first" },
        OWNER
      );
      nowMs += 1_000;

      const updated = await service.update(created.id, { originalUrl: "https://example.org" }, OWNER);

      expect(updated.originalUrl).toBe("https://example.org");
      expect(updated.description).toBe("first");
      expect(updated.updatedAt).toEqual(new Date(nowMs));
      expect(updated.createdAt).toEqual(created.createdAt);
      expect(await cache.get(created.id)).toBeNull();
      expect((await service.resolve(created.id)).originalUrl).toBe("https://example.org");
    });

    it("should clear nullable fields with null", async () => {
      const created = await service.create(
        { originalUrl: "https://example.com", description: "first", expiresAt: new Date(nowMs + 60_000) },
        OWNER
      );

      const updated = await service.update(created.id, { description: null, expiresAt: null }, OWNER);
      expect(updated.description).toBeNull();
      expect(updated.expiresAt).toBeNull();
    });

    it("should re-validate the destination", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await expect(
        service.update(created.id, { originalUrl: "javascript:alert(1)" }, OWNER)
      ).rejects.toMatchObject({ code: "validation_failed" });
    });

    it("should check ownership before changing anything", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await expect(
        service.update(created.id, { originalUrl: "https://example.org" }, OTHER)
      ).rejects.toMatchObject({ code: "unauthorized" });
      expect((await service.getStats(created.id, OWNER)).originalUrl).toBe("https://example.com");
    });

    it("should not bring back a deleted record", async () => {
      const created = await service.create({ originalUrl: "https://example.com/x" }, OWNER);
      await service.delete(created.id, OWNER);

      await expect(service.update(created.id, { isActive: true }, OWNER)).rejects.toMatchObject({
        code: "not_found",
      });
      await expect(service.resolve(created.id)).rejects.toMatchObject({ code: "not_found" });
      expect((await store.getById(created.id))?.isActive).toBe(false);
    });

    it("should treat a disabled record as not found afterwards", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.update(created.id, { isActive: false }, OWNER);

      await expect(service.update(created.id, { description: "again" }, OWNER)).rejects.toMatchObject({
        code: "not_found",
      });
    });

    it("should report unknown identifiers", async () => {
      await expect(service.update("missing", {}, OWNER)).rejects.toMatchObject({ code: "not_found" });
    });
  });

  describe("delete", () => {
    it("should soft delete and invalidate", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.delete(created.id, OWNER);

      expect(await cache.get(created.id)).toBeNull();
      expect(await store.exists(created.id)).toBe(true);
      await expect(service.resolve(created.id)).rejects.toMatchObject({ code: "not_found" });
    });

    it("should treat a second delete as not found", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await service.delete(created.id, OWNER);
      await expect(service.delete(created.id, OWNER)).rejects.toMatchObject({ code: "not_found" });
    });

    it("should refuse other keys", async () => {
      const created = await service.create({ originalUrl: "https://example.com" }, OWNER);
      await expect(service.delete(created.id, OTHER)).rejects.toMatchObject({ code: "unauthorized" });
    });

    it("should never reuse a deleted identifier", async () => {
      await service.create({ originalUrl: "https://example.com", customId: "gone" }, OWNER);
      await service.delete("gone", OWNER);
      await expect(
        service.create({ originalUrl: "https://example.com", customId: "gone" }, OWNER)
      ).rejects.toMatchObject({ code: "conflict" });
    });
  });

  // ===========================================================================
  // list
  // ===========================================================================

  describe("list", () => {
    it("should paginate 95 records into 5 pages of 20", async () => {
      for (let i = 0; i < 95; i++) {
        await service.create({ originalUrl: `https://example.com/${i}` }, OWNER);
      }
      await service.create({ originalUrl: "https://example.com/other" }, OTHER);

      const first = await service.list(OWNER, { limit: 20 });
      expect(first.urls).toHaveLength(20);
      expect(first.pagination).toEqual({
        currentPage: 1,
        perPage: 20,
        totalPages: 5,
        totalCount: 95,
        hasNext: true,
        hasPrev: false,
      });

      const last = await service.list(OWNER, { page: 5, limit: 20 });
      expect(last.urls).toHaveLength(15);
      expect(last.pagination.hasNext).toBe(false);
      expect(last.pagination.hasPrev).toBe(true);
    });

    it("should report one page when there are no records", async () => {
      const empty = await service.list(OWNER);
      expect(empty.urls).toEqual([]);
      expect(empty.pagination.totalPages).toBe(1);
      expect(empty.pagination.hasNext).toBe(false);
    });

    it("should filter by active flag", async () => {
      const a = await service.create({ originalUrl: "https://example.com/a" }, OWNER);
      await service.create({ originalUrl: "https://example.com/b" }, OWNER);
      await service.delete(a.id, OWNER);

      const inactive = await service.list(OWNER, { isActive: false });
      expect(inactive.urls.map((u) => u.id)).toEqual([a.id]);
    });
  });

  describe("normalizeListOptions", () => {
    it("should apply defaults and clamp", () => {
      expect(normalizeListOptions()).toEqual({
        page: 1,
        limit: 20,
        sort: "created_at",
        order: "desc",
        isActive: undefined,
      });
      expect(normalizeListOptions({ page: 0, limit: 0 })).toMatchObject({ page: 1, limit: 20 });
      expect(normalizeListOptions({ limit: -5 }).limit).toBe(20);
      expect(normalizeListOptions({ limit: 500 }).limit).toBe(100);
      expect(normalizeListOptions({ sort: "click_count", order: "asc" })).toMatchObject({
        sort: "click_count",
        order: "asc",
      });
    });
  });

  // ===========================================================================
  // sweepExpired
  // ===========================================================================

  describe("sweepExpired", () => {
    it("should deactivate expired records only", async () => {
      const soon = await service.create(
        { originalUrl: "https://example.com/soon", expiresAt: new Date(nowMs + 1_000) },
        OWNER
      );
      const later = await service.create(
        { originalUrl: "https://example.com/later", expiresAt: new Date(nowMs + 3_600_000) },
        OWNER
      );
      nowMs += 5_000;

      expect(await service.sweepExpired()).toBe(1);
      expect((await store.getById(soon.id))?.isActive).toBe(false);
      expect((await service.getStats(later.id, OWNER)).isActive).toBe(true);
      await expect(service.getStats(soon.id, OWNER)).rejects.toMatchObject({ code: "not_found" });
    });
  });

  // ===========================================================================
  // Cancellation
  // ===========================================================================

  describe("cancellation", () => {
    it("should surface an aborted call as cancelled", async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        service.create({ originalUrl: "https://example.com" }, OWNER, { signal: controller.signal })
      ).rejects.toMatchObject({ code: "internal_error", message: "operation cancelled" });
      expect(store.size).toBe(0);
    });

    it("should not write to the cache once the caller is gone", async () => {
      const controller = new AbortController();
      class AbortAfterReadStore extends InMemoryUrlStore {
        async getById(id: string, opts?: CallOptions): Promise<UrlRecord | null> {
          const record = await super.getById(id, opts);
          controller.abort();
          return record;
        }
      }
      const abortingStore = new AbortAfterReadStore();
      const aborting = build({ store: abortingStore });
      const created = await aborting.create({ originalUrl: "https://example.com" }, OWNER);
      await cache.delete(created.id);

      await aborting.resolve(created.id, { signal: controller.signal });
      expect(await cache.get(created.id)).toBeNull();
    });
  });

  // ===========================================================================
  // End to end
  // ===========================================================================

  it("should create, resolve, disable and then refuse a short URL", async () => {
    const created = await service.create({ originalUrl: "https://example.com/e2e" }, OWNER);
    expect(created.id).toMatch(/^[0-9a-zA-Z]{6}$/);

    expect((await service.resolve(created.id)).originalUrl).toBe("https://example.com/e2e");

    await service.update(created.id, { isActive: false }, OWNER);
    await expect(service.resolve(created.id)).rejects.toMatchObject({ code: "not_found" });
  });
});
