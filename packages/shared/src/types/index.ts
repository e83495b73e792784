/**
 * Shared Type Definitions
 */

import type { LIST_CONFIG } from "../constants/index.js";

// =============================================================================
// URL Record
// =============================================================================

/**
 * A shortened URL as persisted by the durable store.
 */
export interface UrlRecord {
  /** Short identifier (random Base62 or custom), primary key */
  id: string;

  /** Destination URL */
  originalUrl: string;

  /** Optional free text */
  description: string | null;

  /** Expiration (null = never) */
  expiresAt: Date | null;

  createdAt: Date;
  updatedAt: Date;

  /** Successful redirects so far */
  clickCount: number;

  /** False when soft-deleted or disabled */
  isActive: boolean;

  /** Time of the most recent successful redirect */
  lastAccessedAt: Date | null;

  /** API key of the creator. Never sent to clients. */
  ownerKey: string;
}

/**
 * Record plus presentation-only fields derived from the base URL.
 */
export interface UrlView extends UrlRecord {
  /** Full short URL, e.g. https://th.example/abc123 */
  shortUrl: string;

  /** QR code endpoint for the short URL */
  qrCodeUrl: string;
}

// =============================================================================
// Requests
// =============================================================================

export interface CreateUrlInput {
  originalUrl: string;
  customId?: string | null;
  description?: string | null;
  expiresAt?: Date | null;
}

/**
 * Partial update. Omitted fields are left alone; `null` clears
 * `description` and `expiresAt`.
 */
export interface UpdateUrlPatch {
  originalUrl?: string;
  description?: string | null;
  expiresAt?: Date | null;
  isActive?: boolean;
}

// =============================================================================
// Listing
// =============================================================================

export type SortField = (typeof LIST_CONFIG.SORT_FIELDS)[number];
export type SortOrder = (typeof LIST_CONFIG.SORT_ORDERS)[number];

/**
 * Caller-supplied list options (all optional, normalized by the service).
 */
export interface ListOptions {
  page?: number;
  limit?: number;
  sort?: SortField;
  order?: SortOrder;
  isActive?: boolean;
}

/**
 * List options after defaults and clamping.
 */
export interface NormalizedListOptions {
  page: number;
  limit: number;
  sort: SortField;
  order: SortOrder;
  isActive?: boolean;
}

export interface PaginationMeta {
  currentPage: number;
  perPage: number;
  totalPages: number;
  totalCount: number;
  hasNext: boolean;
  hasPrev: boolean;
}

export interface UrlListResult {
  urls: UrlView[];
  pagination: PaginationMeta;
}

// =============================================================================
// Availability
// =============================================================================

export interface AvailabilityResult {
  available: boolean;
  reason?: "invalid" | "reserved" | "taken";
}

// =============================================================================
// Call Options
// =============================================================================

/**
 * Per-call options accepted by every store, cache and service operation.
 */
export interface CallOptions {
  /** Aborts the in-flight call (request timeout or client disconnect) */
  signal?: AbortSignal;
}
