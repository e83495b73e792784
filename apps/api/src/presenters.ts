/**
 * Wire Presenters
 *
 * Domain objects are camelCase; the HTTP wire is snake_case. The owner key
 * never leaves the service.
 */

import type { AvailabilityResult, PaginationMeta, UrlListResult, UrlView } from "@tinyhop/shared";

export interface UrlResponse {
  id: string;
  original_url: string;
  short_url: string;
  qr_code_url: string;
  description: string | null;
  expires_at: string | null;
  created_at: string;
  updated_at: string;
  click_count: number;
  is_active: boolean;
  last_accessed_at: string | null;
}

export interface PaginationResponse {
  current_page: number;
  per_page: number;
  total_pages: number;
  total_count: number;
  has_next: boolean;
  has_prev: boolean;
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null;
}

export function presentUrl(view: UrlView): UrlResponse {
  return {
    id: view.id,
    original_url: view.originalUrl,
    short_url: view.shortUrl,
    qr_code_url: view.qrCodeUrl,
    description: view.description,
    expires_at: iso(view.expiresAt),
    created_at: view.createdAt.toISOString(),
    updated_at: view.updatedAt.toISOString(),
    click_count: view.clickCount,
    is_active: view.isActive,
    last_accessed_at: iso(view.lastAccessedAt),
  };
}

export function presentPagination(meta: PaginationMeta): PaginationResponse {
  return {
    current_page: meta.currentPage,
    per_page: meta.perPage,
    total_pages: meta.totalPages,
    total_count: meta.totalCount,
    has_next: meta.hasNext,
    has_prev: meta.hasPrev,
  };
}

export function presentList(result: UrlListResult): { urls: UrlResponse[]; pagination: PaginationResponse } {
  return {
    urls: result.urls.map(presentUrl),
    pagination: presentPagination(result.pagination),
  };
}

export function presentAvailability(
  id: string,
  result: AvailabilityResult
): { id: string; available: boolean; reason: string | null } {
  return {
    id,
    available: result.available,
    reason: result.reason ?? null,
  };
}
