/**
 * Input Validation
 *
 * Pure checks shared by the resolution service and the HTTP layers.
 * None of them throw; callers turn an invalid result into a ServiceError.
 */

import { ID_CONFIG, URL_CONFIG, isReservedWord } from "../constants/index.js";
import type { UrlRecord } from "../types/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
  /** Set when a custom id is well-formed but reserved */
  reserved?: boolean;
}

// =============================================================================
// URL
// =============================================================================

/**
 * Validate a destination URL: absolute, http or https, non-empty host.
 *
 * @example
 * ```ts
 * validateOriginalUrl("https://example.com/a")  // { valid: true }
 * validateOriginalUrl("ftp://example.com")      // { valid: false, error: "..." }
 * ```
 */
export function validateOriginalUrl(url: string): ValidationResult {
  if (url.trim().length === 0) {
    return { valid: false, error: "original_url is required" };
  }

  if (url.length > URL_CONFIG.MAX_LENGTH) {
    return {
      valid: false,
      error: `original_url must be at most ${URL_CONFIG.MAX_LENGTH} characters`,
    };
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return { valid: false, error: "original_url must be a valid absolute URL" };
  }

  const protocols: readonly string[] = URL_CONFIG.ALLOWED_PROTOCOLS;
  if (!protocols.includes(parsed.protocol)) {
    return { valid: false, error: "original_url must use http or https" };
  }

  if (parsed.hostname.length === 0) {
    return { valid: false, error: "original_url must include a host" };
  }

  return { valid: true };
}

export function validateDescription(description: string | null | undefined): ValidationResult {
  if (description != null && description.length > URL_CONFIG.MAX_DESCRIPTION_LENGTH) {
    return {
      valid: false,
      error: `description must be at most ${URL_CONFIG.MAX_DESCRIPTION_LENGTH} characters`,
    };
  }
  return { valid: true };
}

// =============================================================================
// CUSTOM ID
// =============================================================================

/**
 * Validate an already-trimmed custom identifier.
 *
 * - Length: 3-50 characters
 * - Characters: a-zA-Z0-9 and hyphen
 * - Not a reserved word (case-insensitive, exact match)
 */
export function validateCustomId(id: string): ValidationResult {
  const { MIN_LENGTH, MAX_LENGTH, PATTERN } = ID_CONFIG.CUSTOM_ID;

  if (id.length < MIN_LENGTH) {
    return { valid: false, error: `custom_id must be at least ${MIN_LENGTH} characters` };
  }

  if (id.length > MAX_LENGTH) {
    return { valid: false, error: `custom_id must be at most ${MAX_LENGTH} characters` };
  }

  if (!PATTERN.test(id)) {
    return {
      valid: false,
      error: "custom_id may contain only letters, numbers and hyphens",
    };
  }

  if (isReservedWord(id)) {
    return { valid: false, reserved: true, error: `custom_id '${id}' is reserved` };
  }

  return { valid: true };
}

/**
 * Cheap shape check before any lookup on the redirect path.
 */
export function isLookupCandidate(id: string): boolean {
  return ID_CONFIG.LOOKUP_PATTERN.test(id);
}

// =============================================================================
// ACCESSIBILITY
// =============================================================================

type AccessFields = Pick<UrlRecord, "isActive" | "expiresAt">;

export function isExpired(record: AccessFields, now: Date): boolean {
  return record.expiresAt !== null && record.expiresAt.getTime() <= now.getTime();
}

/**
 * Active and not expired.
 */
export function isAccessible(record: AccessFields, now: Date): boolean {
  return record.isActive && !isExpired(record, now);
}
