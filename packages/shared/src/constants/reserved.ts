/**
 * Reserved Identifiers
 *
 * Words that collide with our own routes or environments and therefore
 * cannot be claimed as custom identifiers. Matching is case-insensitive
 * and exact (no substring matching).
 */

export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  "api",
  "health",
  "admin",
  "www",
  "app",
  "dev",
  "stage",
  "prod",
]);

/**
 * Check if an identifier is a reserved word.
 */
export function isReservedWord(id: string): boolean {
  return RESERVED_WORDS.has(id.toLowerCase());
}
