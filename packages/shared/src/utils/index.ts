/**
 * Shared Utility Functions
 */

// Identifier codec
export {
  generateRandomId,
  encodeBase62,
  decodeBase62,
  isValidAlphabet,
  RandomSourceError,
  InvalidCharacterError,
} from "./codec.js";
export type { RandomFill } from "./codec.js";

// Validation
export {
  validateOriginalUrl,
  validateDescription,
  validateCustomId,
  isLookupCandidate,
  isExpired,
  isAccessible,
} from "./validation.js";
export type { ValidationResult } from "./validation.js";

// Presentation
export {
  buildShortUrl,
  buildQrCodeUrl,
  buildQrImageUrl,
  clampQrSize,
  toUrlView,
} from "./presentation.js";

// Abort handling
export { withAbort, abortReason, isAbortError } from "./abort.js";
