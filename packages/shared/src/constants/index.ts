// Shared constants
export { RESERVED_WORDS, isReservedWord } from "./reserved.js";

/**
 * Identifier Configuration Constants
 *
 * Single source of truth for identifier generation and validation.
 * The codec, the custom-id validator and the redirect fast path all
 * read the alphabet from here.
 */
export const ID_CONFIG = {
  /**
   * Base62 alphabet: digits, then lowercase, then uppercase.
   * The position of a symbol is its digit value.
   */
  ALPHABET: "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ",

  /**
   * Default length for generated identifiers.
   * 6 chars = 62^6 = ~56.8 billion combinations.
   */
  DEFAULT_LENGTH: 6,

  /**
   * Random identifier rounds before giving up.
   * Exhaustion means the keyspace is crowded: raise ID_LENGTH.
   */
  MAX_ATTEMPTS: 10,

  /** Custom identifier constraints */
  CUSTOM_ID: {
    MIN_LENGTH: 3,
    MAX_LENGTH: 50,
    /** Letters, digits and hyphens */
    PATTERN: /^[A-Za-z0-9-]+$/,
  },

  /** Anything a stored identifier could look like (fast reject on redirect) */
  LOOKUP_PATTERN: /^[A-Za-z0-9-]{1,50}$/,
} as const;

/**
 * URL Validation Constants
 */
export const URL_CONFIG = {
  /** Maximum URL length to store */
  MAX_LENGTH: 2048,

  /** Maximum description length */
  MAX_DESCRIPTION_LENGTH: 255,

  /** Allowed protocols */
  ALLOWED_PROTOCOLS: ["http:", "https:"] as const,
} as const;

/**
 * Cache Constants
 */
export const CACHE_CONFIG = {
  /** Record TTL in seconds (5 minutes) */
  DEFAULT_TTL_SECONDS: 300,
} as const;

/**
 * Listing Constants
 */
export const LIST_CONFIG = {
  DEFAULT_PAGE: 1,
  DEFAULT_LIMIT: 20,
  MAX_LIMIT: 100,
  SORT_FIELDS: ["created_at", "click_count", "last_accessed_at"] as const,
  SORT_ORDERS: ["asc", "desc"] as const,
  DEFAULT_SORT: "created_at",
  DEFAULT_ORDER: "desc",
} as const;

/**
 * QR Code Constants
 *
 * QR images are rendered by an external generator; we only redirect.
 */
export const QR_CONFIG = {
  DEFAULT_SIZE: 200,
  MIN_SIZE: 50,
  MAX_SIZE: 1000,
  GENERATOR_URL: "https://api.qrserver.com/v1/create-qr-code/",
} as const;
