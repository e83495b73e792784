/**
 * PostgreSQL URL Store
 *
 * Parameterized SQL against the `urls` table. Sort columns are never
 * interpolated from input: they come from a fixed whitelist.
 *
 * pg takes no AbortSignal. Reads are raced against the caller's signal.
 * Writes check the signal before they are sent and then run to completion,
 * so a caller told "cancelled" never leaves a committed row behind; the
 * statement itself is bounded by statement_timeout.
 */

import { z } from "zod";
import { LIST_CONFIG, abortReason, withAbort } from "@tinyhop/shared";
import type { CallOptions, NormalizedListOptions, SortField, UrlRecord } from "@tinyhop/shared";
import type { SqlClient } from "./client.js";
import { DuplicateIdError, RecordNotFoundError } from "./types.js";
import type { StoreListResult, UrlStore } from "./types.js";

// =============================================================================
// Row Mapping
// =============================================================================

/**
 * Database row shape for the urls table
 */
const urlRowSchema = z.object({
  id: z.string(),
  original_url: z.string(),
  description: z.string().nullable(),
  expires_at: z.date().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  /** BIGINT arrives as a string */
  click_count: z.coerce.number().int().nonnegative(),
  is_active: z.boolean(),
  last_accessed_at: z.date().nullable(),
  created_by_api_key: z.string(),
});

type UrlRow = z.infer<typeof urlRowSchema>;

const countRowSchema = z.object({ count: z.coerce.number() });
const existsRowSchema = z.object({ exists: z.boolean() });

const COLUMNS = `id, original_url, description, expires_at, created_at, updated_at,
  click_count, is_active, last_accessed_at, created_by_api_key`;

const SORT_COLUMNS: Record<SortField, string> = {
  created_at: "created_at",
  click_count: "click_count",
  last_accessed_at: "last_accessed_at",
};

const UNIQUE_VIOLATION = "23505";

export function rowToRecord(row: unknown): UrlRecord {
  return toRecord(urlRowSchema.parse(row));
}

function toRecord(row: UrlRow): UrlRecord {
  return {
    id: row.id,
    originalUrl: row.original_url,
    description: row.description,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    clickCount: row.click_count,
    isActive: row.is_active,
    lastAccessedAt: row.last_accessed_at,
    ownerKey: row.created_by_api_key,
  };
}

function isUniqueViolation(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === UNIQUE_VIOLATION;
}

// =============================================================================
// SQL
// =============================================================================

const INSERT_SQL = `
  INSERT INTO urls (id, original_url, description, expires_at, created_at, updated_at,
                    click_count, is_active, last_accessed_at, created_by_api_key)
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`;

const SELECT_BY_ID_SQL = `SELECT ${COLUMNS} FROM urls WHERE id = $1`;

const UPDATE_SQL = `
  UPDATE urls
  SET original_url = $2, description = $3, expires_at = $4, updated_at = $5, is_active = $6
  WHERE id = $1`;

const SOFT_DELETE_SQL = `UPDATE urls SET is_active = false, updated_at = $2 WHERE id = $1`;

const EXISTS_SQL = `SELECT EXISTS(SELECT 1 FROM urls WHERE id = $1) AS "exists"`;

const INCREMENT_CLICK_SQL = `
  UPDATE urls
  SET click_count = click_count + 1, last_accessed_at = $2, updated_at = $2
  WHERE id = $1 AND is_active = true`;

const TOUCH_SQL = `
  UPDATE urls
  SET last_accessed_at = $2, updated_at = $2
  WHERE id = $1 AND is_active = true`;

const EXPIRE_SWEEP_SQL = `
  UPDATE urls
  SET is_active = false, updated_at = $1
  WHERE expires_at < $1 AND is_active = true`;

const HEALTH_SQL = "SELECT 1";

// =============================================================================
// Store
// =============================================================================

function checkNotAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortReason(signal);
  }
}

export class PgUrlStore implements UrlStore {
  constructor(private readonly db: SqlClient) {}

  async create(record: UrlRecord, opts: CallOptions = {}): Promise<void> {
    checkNotAborted(opts.signal);
    try {
      await this.db.query(INSERT_SQL, [
        record.id,
        record.originalUrl,
        record.description,
        record.expiresAt,
        record.createdAt,
        record.updatedAt,
        record.clickCount,
        record.isActive,
        record.lastAccessedAt,
        record.ownerKey,
      ]);
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new DuplicateIdError(record.id, { cause: err });
      }
      throw err;
    }
  }

  async getById(id: string, opts: CallOptions = {}): Promise<UrlRecord | null> {
    const result = await withAbort(this.db.query(SELECT_BY_ID_SQL, [id]), opts.signal);
    const row = result.rows[0];
    return row === undefined ? null : rowToRecord(row);
  }

  async update(record: UrlRecord, opts: CallOptions = {}): Promise<void> {
    checkNotAborted(opts.signal);
    const result = await this.db.query(UPDATE_SQL, [
      record.id,
      record.originalUrl,
      record.description,
      record.expiresAt,
      record.updatedAt,
      record.isActive,
    ]);
    if (!result.rowCount) {
      throw new RecordNotFoundError(record.id);
    }
  }

  async softDelete(id: string, at: Date, opts: CallOptions = {}): Promise<void> {
    checkNotAborted(opts.signal);
    const result = await this.db.query(SOFT_DELETE_SQL, [id, at]);
    if (!result.rowCount) {
      throw new RecordNotFoundError(id);
    }
  }

  async list(
    ownerKey: string,
    options: NormalizedListOptions,
    opts: CallOptions = {}
  ): Promise<StoreListResult> {
    let where = "WHERE created_by_api_key = $1";
    const args: unknown[] = [ownerKey];

    if (options.isActive !== undefined) {
      args.push(options.isActive);
      where += ` AND is_active = $${args.length}`;
    }

    const countResult = await withAbort(
      this.db.query(`SELECT COUNT(*) AS count FROM urls ${where}`, args),
      opts.signal
    );
    const totalCount = countRowSchema.parse(countResult.rows[0]).count;

    const column = SORT_COLUMNS[options.sort] ?? SORT_COLUMNS[LIST_CONFIG.DEFAULT_SORT];
    const direction = options.order === "asc" ? "ASC" : "DESC";
    const offset = (options.page - 1) * options.limit;

    // id breaks ties so pages do not overlap
    const listSql = `
      SELECT ${COLUMNS} FROM urls
      ${where}
      ORDER BY ${column} ${direction} NULLS LAST, id ${direction}
      LIMIT $${args.length + 1} OFFSET $${args.length + 2}`;

    const result = await withAbort(
      this.db.query(listSql, [...args, options.limit, offset]),
      opts.signal
    );

    return { records: result.rows.map(rowToRecord), totalCount };
  }

  async exists(id: string, opts: CallOptions = {}): Promise<boolean> {
    const result = await withAbort(this.db.query(EXISTS_SQL, [id]), opts.signal);
    return existsRowSchema.parse(result.rows[0]).exists;
  }

  async incrementClick(id: string, at: Date, opts: CallOptions = {}): Promise<void> {
    checkNotAborted(opts.signal);
    const result = await this.db.query(INCREMENT_CLICK_SQL, [id, at]);
    if (!result.rowCount) {
      throw new RecordNotFoundError(id, "not found or inactive");
    }
  }

  async touchLastAccessed(id: string, at: Date, opts: CallOptions = {}): Promise<void> {
    checkNotAborted(opts.signal);
    const result = await this.db.query(TOUCH_SQL, [id, at]);
    if (!result.rowCount) {
      throw new RecordNotFoundError(id, "not found or inactive");
    }
  }

  async expireSweep(now: Date, opts: CallOptions = {}): Promise<number> {
    checkNotAborted(opts.signal);
    const result = await this.db.query(EXPIRE_SWEEP_SQL, [now]);
    return result.rowCount ?? 0;
  }

  async ping(opts: CallOptions = {}): Promise<boolean> {
    try {
      await withAbort(this.db.query(HEALTH_SQL), opts.signal);
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.db.end();
  }
}
