/**
 * Shared record builder for store tests.
 */

import type { UrlRecord } from "@tinyhop/shared";

export const OWNER = "test-key-1";

export function makeRecord(overrides: Partial<UrlRecord> = {}): UrlRecord {
  const createdAt = new Date("2026-01-01T00:00:00.000Z");
  return {
    id: "abc123",
    originalUrl: "https://example.com/landing",
    description: null,
    expiresAt: null,
    createdAt,
    updatedAt: createdAt,
    clickCount: 0,
    isActive: true,
    lastAccessedAt: null,
    ownerKey: OWNER,
    ...overrides,
  };
}
