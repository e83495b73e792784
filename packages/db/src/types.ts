/**
 * Durable Store Contract
 *
 * Authoritative id -> URL record mapping. Implementations translate their
 * backend's failures into the two typed errors below; everything else is
 * rethrown as-is for the service to wrap.
 */

import type { CallOptions, NormalizedListOptions, UrlRecord } from "@tinyhop/shared";

// =============================================================================
// Errors
// =============================================================================

/**
 * Primary key clash on create.
 */
export class DuplicateIdError extends Error {
  readonly id: string;

  constructor(id: string, options?: { cause?: unknown }) {
    super(`URL with id '${id}' already exists`, options);
    this.name = "DuplicateIdError";
    this.id = id;
  }
}

/**
 * No row matched an update, soft delete or click increment.
 */
export class RecordNotFoundError extends Error {
  readonly id: string;

  constructor(id: string, detail = "not found") {
    super(`URL with id '${id}' ${detail}`);
    this.name = "RecordNotFoundError";
    this.id = id;
  }
}

// =============================================================================
// Store Interface
// =============================================================================

export interface StoreListResult {
  records: UrlRecord[];
  totalCount: number;
}

export interface UrlStore {
  /** @throws DuplicateIdError when the id is taken */
  create(record: UrlRecord, opts?: CallOptions): Promise<void>;

  /** Any state, active or not */
  getById(id: string, opts?: CallOptions): Promise<UrlRecord | null>;

  /**
   * Writes the editable columns (url, description, expiry, active flag,
   * updated_at). Click accounting is left alone.
   * @throws RecordNotFoundError
   */
  update(record: UrlRecord, opts?: CallOptions): Promise<void>;

  /** @throws RecordNotFoundError */
  softDelete(id: string, at: Date, opts?: CallOptions): Promise<void>;

  /** Records created by `ownerKey`, one page */
  list(ownerKey: string, options: NormalizedListOptions, opts?: CallOptions): Promise<StoreListResult>;

  /** True for inactive records too: ids are never reused */
  exists(id: string, opts?: CallOptions): Promise<boolean>;

  /**
   * Bump click_count and set last_accessed_at in one statement.
   * @throws RecordNotFoundError for unknown or inactive ids
   */
  incrementClick(id: string, at: Date, opts?: CallOptions): Promise<void>;

  /** @throws RecordNotFoundError for unknown or inactive ids */
  touchLastAccessed(id: string, at: Date, opts?: CallOptions): Promise<void>;

  /** Deactivate every active record with expires_at < now */
  expireSweep(now: Date, opts?: CallOptions): Promise<number>;

  /** Connectivity check for readiness */
  ping(opts?: CallOptions): Promise<boolean>;

  close(): Promise<void>;
}
