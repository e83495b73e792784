/**
 * Identifier Codec
 *
 * Base62 conversion between non-negative integers and short strings, plus
 * random identifier generation. Every operation uses ID_CONFIG.ALPHABET.
 *
 * Random identifiers come from `crypto.getRandomValues()` with rejection
 * sampling: bytes >= 248 (the largest multiple of 62 below 256) are
 * discarded, so every symbol is equally likely.
 */

import { webcrypto } from "node:crypto";
import { ID_CONFIG } from "../constants/index.js";

const BASE = ID_CONFIG.ALPHABET.length;
const REJECTION_THRESHOLD = 256 - (256 % BASE);

// =============================================================================
// ERRORS
// =============================================================================

/**
 * Thrown when the secure random source fails.
 */
export class RandomSourceError extends Error {
  constructor(cause: unknown) {
    super("Secure random source failed", { cause });
    this.name = "RandomSourceError";
  }
}

/**
 * Thrown by decodeBase62 for a symbol outside the alphabet.
 */
export class InvalidCharacterError extends Error {
  readonly character: string;
  /** Zero-based, counted from the left */
  readonly position: number;

  constructor(character: string, position: number) {
    super(`Invalid Base62 character '${character}' at position ${position}`);
    this.name = "InvalidCharacterError";
    this.character = character;
    this.position = position;
  }
}

// =============================================================================
// GENERATION
// =============================================================================

export type RandomFill = (bytes: Uint8Array) => void;

const secureFill: RandomFill = (bytes) => {
  webcrypto.getRandomValues(bytes);
};

/**
 * Generate a random Base62 identifier.
 *
 * @example
 * ```ts
 * generateRandomId();   // "k3Zp0Q"
 * generateRandomId(8);  // "0aZ9xYb2"
 * ```
 */
export function generateRandomId(
  length: number = ID_CONFIG.DEFAULT_LENGTH,
  fill: RandomFill = secureFill
): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError(`Identifier length must be a positive integer, got ${length}`);
  }

  let id = "";
  // Oversample so a single fill usually suffices
  const buffer = new Uint8Array(length * 2);

  while (id.length < length) {
    try {
      fill(buffer);
    } catch (err) {
      throw new RandomSourceError(err);
    }

    for (const byte of buffer) {
      if (byte >= REJECTION_THRESHOLD) continue;
      id += ID_CONFIG.ALPHABET[byte % BASE];
      if (id.length === length) break;
    }
  }

  return id;
}

// =============================================================================
// CONVERSION
// =============================================================================

/**
 * Encode a non-negative safe integer, most significant digit first.
 *
 * @example
 * ```ts
 * encodeBase62(0)   // "0"
 * encodeBase62(61)  // "Z"
 * encodeBase62(62)  // "10"
 * ```
 */
export function encodeBase62(num: number): string {
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new RangeError(`Cannot encode ${num}: expected a non-negative safe integer`);
  }

  if (num === 0) {
    return ID_CONFIG.ALPHABET[0];
  }

  let result = "";
  let n = num;

  while (n > 0) {
    result = ID_CONFIG.ALPHABET[n % BASE] + result;
    n = Math.floor(n / BASE);
  }

  return result;
}

/**
 * Decode a Base62 string. Inverse of encodeBase62.
 *
 * @throws InvalidCharacterError for a symbol outside the alphabet
 * @throws RangeError for an empty string or a result above MAX_SAFE_INTEGER
 */
export function decodeBase62(str: string): number {
  if (str.length === 0) {
    throw new RangeError("Cannot decode an empty string");
  }

  let result = 0;

  for (let position = 0; position < str.length; position++) {
    const character = str[position];
    const digit = ID_CONFIG.ALPHABET.indexOf(character);
    if (digit === -1) {
      throw new InvalidCharacterError(character, position);
    }

    result = result * BASE + digit;
    if (result > Number.MAX_SAFE_INTEGER) {
      throw new RangeError(`Decoded value of '${str}' exceeds Number.MAX_SAFE_INTEGER`);
    }
  }

  return result;
}

/**
 * True when the string is non-empty and made only of alphabet symbols.
 */
export function isValidAlphabet(str: string): boolean {
  if (str.length === 0) return false;
  for (const character of str) {
    if (!ID_CONFIG.ALPHABET.includes(character)) return false;
  }
  return true;
}
