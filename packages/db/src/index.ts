/**
 * @tinyhop/db - Durable Store Package
 *
 * The UrlStore contract plus its PostgreSQL and in-memory implementations.
 *
 * Usage:
 * ```ts
 * import { PgUrlStore, createPool, poolClient } from "@tinyhop/db";
 *
 * const store = new PgUrlStore(poolClient(createPool({ databaseUrl, dbTimeoutMs: 2000 })));
 * const record = await store.getById("abc123");
 * ```
 */

// Contract and errors
export * from "./types.js";

// PostgreSQL
export * from "./client.js";
export { PgUrlStore, rowToRecord } from "./pg-store.js";

// In-memory
export { InMemoryUrlStore } from "./memory-store.js";
