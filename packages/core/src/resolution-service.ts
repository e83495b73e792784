/**
 * Resolution Service
 *
 * Identifier allocation and cache-then-store resolution for short URLs.
 *
 * Cache discipline:
 * - create:   write-through after the store accepts the record
 * - resolve:  read-through; a cached record that is no longer accessible
 *             is evicted and the store decides
 * - mutation: invalidate after the store write
 * - redirect: click accounting, then invalidation, in the background
 *
 * Cache failures are logged and absorbed. Store failures become
 * ServiceErrors; nothing backend-specific reaches the caller.
 */

import {
  CACHE_CONFIG,
  ID_CONFIG,
  LIST_CONFIG,
  ServiceError,
  conflictError,
  expiredError,
  generateRandomId,
  internalError,
  isAbortError,
  isAccessible,
  isExpired,
  isLookupCandidate,
  notFoundError,
  toUrlView,
  unauthorizedError,
  validateCustomId,
  validateDescription,
  validateOriginalUrl,
  validationError,
} from "@tinyhop/shared";
import type {
  AvailabilityResult,
  CallOptions,
  CreateUrlInput,
  ListOptions,
  NormalizedListOptions,
  SortField,
  SortOrder,
  UpdateUrlPatch,
  UrlListResult,
  UrlRecord,
  UrlView,
} from "@tinyhop/shared";
import { DuplicateIdError, RecordNotFoundError } from "@tinyhop/db";
import type { UrlStore } from "@tinyhop/db";
import type { UrlCache } from "@tinyhop/cache";
import { createLogger } from "@tinyhop/logger";
import type { Logger } from "@tinyhop/logger";
import { BackgroundTaskQueue } from "./background.js";

// =============================================================================
// Types
// =============================================================================

export interface ResolutionServiceOptions {
  store: UrlStore;
  cache: UrlCache;
  /** Prefix for derived short URLs, e.g. https://th.example */
  baseUrl: string;
  /** Generated identifier length (default 6) */
  idLength?: number;
  /** Random identifier rounds before giving up (default 10) */
  maxIdAttempts?: number;
  cacheTtlSeconds?: number;
  tasks?: BackgroundTaskQueue;
  logger?: Logger;
  now?: () => Date;
  generateId?: (length: number) => string;
}

const RESOURCE = "Short URL";

function isSortField(value: string): value is SortField {
  return LIST_CONFIG.SORT_FIELDS.some((field) => field === value);
}

function isSortOrder(value: string): value is SortOrder {
  return LIST_CONFIG.SORT_ORDERS.some((order) => order === value);
}

/**
 * Apply defaults and clamp list options.
 */
export function normalizeListOptions(options: ListOptions = {}): NormalizedListOptions {
  const page =
    options.page !== undefined && Number.isInteger(options.page) && options.page >= 1
      ? options.page
      : LIST_CONFIG.DEFAULT_PAGE;

  let limit: number = LIST_CONFIG.DEFAULT_LIMIT;
  if (options.limit !== undefined && Number.isInteger(options.limit) && options.limit > 0) {
    limit = Math.min(options.limit, LIST_CONFIG.MAX_LIMIT);
  }

  return {
    page,
    limit,
    sort: options.sort !== undefined && isSortField(options.sort) ? options.sort : LIST_CONFIG.DEFAULT_SORT,
    order: options.order !== undefined && isSortOrder(options.order) ? options.order : LIST_CONFIG.DEFAULT_ORDER,
    isActive: options.isActive,
  };
}

// =============================================================================
// Service
// =============================================================================

export class ResolutionService {
  private readonly store: UrlStore;
  private readonly cache: UrlCache;
  private readonly baseUrl: string;
  private readonly idLength: number;
  private readonly maxIdAttempts: number;
  private readonly cacheTtlSeconds: number;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly generateId: (length: number) => string;
  readonly tasks: BackgroundTaskQueue;

  constructor(options: ResolutionServiceOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.baseUrl = options.baseUrl;
    this.idLength = options.idLength ?? ID_CONFIG.DEFAULT_LENGTH;
    this.maxIdAttempts = options.maxIdAttempts ?? ID_CONFIG.MAX_ATTEMPTS;
    this.cacheTtlSeconds = options.cacheTtlSeconds ?? CACHE_CONFIG.DEFAULT_TTL_SECONDS;
    this.logger = options.logger ?? createLogger("resolution");
    this.tasks = options.tasks ?? new BackgroundTaskQueue({ logger: this.logger });
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? ((length) => generateRandomId(length));
  }

  // ---------------------------------------------------------------------------
  // Create
  // ---------------------------------------------------------------------------

  async create(input: CreateUrlInput, ownerKey: string, opts: CallOptions = {}): Promise<UrlView> {
    const url = validateOriginalUrl(input.originalUrl);
    if (!url.valid) {
      throw validationError("original_url", url.error ?? "original_url is invalid");
    }
    const description = validateDescription(input.description);
    if (!description.valid) {
      throw validationError("description", description.error ?? "description is invalid");
    }

    const customId = input.customId?.trim();
    const id = customId ? await this.claimCustomId(customId, opts) : await this.allocateId(opts);

    const now = this.now();
    const record: UrlRecord = {
      id,
      originalUrl: input.originalUrl,
      description: input.description ?? null,
      expiresAt: input.expiresAt ?? null,
      createdAt: now,
      updatedAt: now,
      clickCount: 0,
      isActive: true,
      lastAccessedAt: null,
      ownerKey,
    };

    await this.required("create short URL", opts, async () => {
      try {
        await this.store.create(record, opts);
      } catch (err) {
        if (err instanceof DuplicateIdError) {
          throw conflictError(RESOURCE, id);
        }
        throw err;
      }
    });

    this.logger.info({ id, custom: Boolean(customId) }, "Short URL created");

    await this.bestEffort("write-through", id, opts, () =>
      this.cache.set(id, record, this.cacheTtlSeconds, opts)
    );

    return toUrlView(record, this.baseUrl);
  }

  private async claimCustomId(id: string, opts: CallOptions): Promise<string> {
    const check = validateCustomId(id);
    if (!check.valid) {
      throw validationError("custom_id", check.error ?? "custom_id is invalid");
    }

    const taken = await this.required("check identifier", opts, () => this.store.exists(id, opts));
    if (taken) {
      throw conflictError(RESOURCE, id);
    }
    return id;
  }

  private async allocateId(opts: CallOptions): Promise<string> {
    for (let attempt = 1; attempt <= this.maxIdAttempts; attempt++) {
      let candidate: string;
      try {
        candidate = this.generateId(this.idLength);
      } catch (err) {
        this.logger.error({ err }, "Identifier generation failed");
        throw internalError("Failed to generate identifier", err);
      }

      const taken = await this.required("check identifier", opts, () => this.store.exists(candidate, opts));
      if (!taken) {
        return candidate;
      }
      this.logger.debug({ attempt }, "Generated identifier already in use");
    }

    // Keyspace is crowded: ID_LENGTH needs raising
    this.logger.error(
      { attempts: this.maxIdAttempts, length: this.idLength },
      "Identifier allocation exhausted"
    );
    throw internalError(`Failed to allocate a unique identifier after ${this.maxIdAttempts} attempts`);
  }

  // ---------------------------------------------------------------------------
  // Resolve
  // ---------------------------------------------------------------------------

  async resolve(id: string, opts: CallOptions = {}): Promise<UrlView> {
    if (!isLookupCandidate(id)) {
      throw notFoundError(RESOURCE);
    }

    const cached = await this.readCache(id, opts);
    if (cached) {
      if (isAccessible(cached, this.now())) {
        return toUrlView(cached, this.baseUrl);
      }
      await this.bestEffort("evict", id, opts, () => this.cache.delete(id, opts));
    }

    const record = await this.required("load short URL", opts, () => this.store.getById(id, opts));
    if (!record || !record.isActive) {
      throw notFoundError(RESOURCE);
    }
    if (isExpired(record, this.now())) {
      throw expiredError(RESOURCE);
    }

    await this.bestEffort("write-through", id, opts, () =>
      this.cache.set(id, record, this.cacheTtlSeconds, opts)
    );

    return toUrlView(record, this.baseUrl);
  }

  /**
   * Resolve, then count the click in the background.
   */
  async resolveForRedirect(id: string, opts: CallOptions = {}): Promise<UrlView> {
    const view = await this.resolve(id, opts);
    const at = this.now();

    // The request signal is not passed on: accounting outlives the response
    const dispatched = this.tasks.dispatch("record-click", async () => {
      await this.tasks.settle("increment-click", () => this.store.incrementClick(id, at));
      await this.tasks.settle("invalidate-cache", () => this.cache.delete(id));
    });
    if (!dispatched) {
      this.logger.warn({ id }, "Click not recorded: task queue is shut down");
    }

    return view;
  }

  private async readCache(id: string, opts: CallOptions): Promise<UrlRecord | null> {
    try {
      return await this.cache.get(id, opts);
    } catch (err) {
      if (opts.signal?.aborted) {
        throw internalError("operation cancelled", err);
      }
      this.logger.warn({ err, id }, "Cache read failed, falling back to store");
      return null;
    }
  }

  // ---------------------------------------------------------------------------
  // Owner Operations
  // ---------------------------------------------------------------------------

  /**
   * Full record, counters included, for its owner.
   */
  async getStats(id: string, ownerKey: string, opts: CallOptions = {}): Promise<UrlView> {
    const record = await this.loadOwned(id, ownerKey, opts);
    return toUrlView(record, this.baseUrl);
  }

  async checkAvailability(customId: string, opts: CallOptions = {}): Promise<AvailabilityResult> {
    const id = customId.trim();
    const check = validateCustomId(id);
    if (!check.valid) {
      return { available: false, reason: check.reserved ? "reserved" : "invalid" };
    }

    const taken = await this.required("check identifier", opts, () => this.store.exists(id, opts));
    return taken ? { available: false, reason: "taken" } : { available: true };
  }

  async update(id: string, patch: UpdateUrlPatch, ownerKey: string, opts: CallOptions = {}): Promise<UrlView> {
    const current = await this.loadOwned(id, ownerKey, opts);

    if (patch.originalUrl !== undefined) {
      const url = validateOriginalUrl(patch.originalUrl);
      if (!url.valid) {
        throw validationError("original_url", url.error ?? "original_url is invalid");
      }
    }
    const description = validateDescription(patch.description);
    if (!description.valid) {
      throw validationError("description", description.error ?? "description is invalid");
    }

    const updated: UrlRecord = {
      ...current,
      originalUrl: patch.originalUrl ?? current.originalUrl,
      description: patch.description !== undefined ? patch.description : current.description,
      expiresAt: patch.expiresAt !== undefined ? patch.expiresAt : current.expiresAt,
      isActive: patch.isActive ?? current.isActive,
      updatedAt: this.now(),
    };

    await this.required("update short URL", opts, async () => {
      try {
        await this.store.update(updated, opts);
      } catch (err) {
        if (err instanceof RecordNotFoundError) {
          throw notFoundError(RESOURCE);
        }
        throw err;
      }
    });

    this.logger.info({ id, fields: Object.keys(patch) }, "Short URL updated");
    await this.invalidate(id);

    return toUrlView(updated, this.baseUrl);
  }

  async delete(id: string, ownerKey: string, opts: CallOptions = {}): Promise<void> {
    await this.loadOwned(id, ownerKey, opts);

    await this.required("delete short URL", opts, async () => {
      try {
        await this.store.softDelete(id, this.now(), opts);
      } catch (err) {
        if (err instanceof RecordNotFoundError) {
          throw notFoundError(RESOURCE);
        }
        throw err;
      }
    });

    this.logger.info({ id }, "Short URL deleted");
    await this.invalidate(id);
  }

  async list(ownerKey: string, options: ListOptions = {}, opts: CallOptions = {}): Promise<UrlListResult> {
    const normalized = normalizeListOptions(options);
    const { records, totalCount } = await this.required("list short URLs", opts, () =>
      this.store.list(ownerKey, normalized, opts)
    );

    const totalPages = Math.max(1, Math.ceil(totalCount / normalized.limit));
    return {
      urls: records.map((record) => toUrlView(record, this.baseUrl)),
      pagination: {
        currentPage: normalized.page,
        perPage: normalized.limit,
        totalPages,
        totalCount,
        hasNext: normalized.page < totalPages,
        hasPrev: normalized.page > 1,
      },
    };
  }

  /**
   * Deactivate every expired record. Cached copies fail the accessibility
   * check on their next read and are evicted then.
   */
  async sweepExpired(opts: CallOptions = {}): Promise<number> {
    const count = await this.required("sweep expired URLs", opts, () =>
      this.store.expireSweep(this.now(), opts)
    );
    if (count > 0) {
      this.logger.info({ count }, "Expired short URLs deactivated");
    }
    return count;
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  /**
   * Soft-deleted records are not found, whoever asks.
   */
  private async loadOwned(id: string, ownerKey: string, opts: CallOptions): Promise<UrlRecord> {
    const record = await this.required("load short URL", opts, () => this.store.getById(id, opts));
    if (!record || !record.isActive) {
      throw notFoundError(RESOURCE);
    }
    if (record.ownerKey !== ownerKey) {
      throw unauthorizedError("You do not have access to this URL");
    }
    return record;
  }

  /**
   * Run a collaborator call whose failure fails the operation.
   */
  private async required<T>(what: string, opts: CallOptions, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof ServiceError) throw err;
      if (opts.signal?.aborted || isAbortError(err)) {
        throw internalError("operation cancelled", err);
      }
      this.logger.error({ err, operation: what }, "Store operation failed");
      throw internalError(`Failed to ${what}`, err);
    }
  }

  /**
   * Run a cache call whose failure is only logged. Skipped once the
   * caller has gone away.
   */
  private async bestEffort(
    what: string,
    id: string,
    opts: CallOptions,
    call: () => Promise<unknown>
  ): Promise<void> {
    if (opts.signal?.aborted) return;
    try {
      await call();
    } catch (err) {
      this.logger.warn({ err, id }, `Cache ${what} failed`);
    }
  }

  private async invalidate(id: string): Promise<void> {
    try {
      await this.cache.delete(id);
    } catch (err) {
      this.logger.warn({ err, id }, "Cache invalidation failed");
    }
  }
}
