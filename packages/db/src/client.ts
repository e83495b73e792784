/**
 * PostgreSQL Connection Pool
 *
 * Raw SQL over `pg` - no ORM, no query builder. The store talks to a
 * minimal SqlClient so tests can substitute an in-process fake.
 */

import { Pool } from "pg";

// =============================================================================
// Types
// =============================================================================

/**
 * Rows are untyped until the store parses them.
 */
export interface SqlResult {
  rows: unknown[];
  rowCount: number | null;
}

/**
 * What the store actually uses from pg.Pool.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  end(): Promise<void>;
}

export interface PoolConfig {
  databaseUrl: string;
  /** Statement and client-side query timeout */
  dbTimeoutMs: number;
  /** Maximum connections in pool */
  maxConnections?: number;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a connection pool. No connection is opened until the first query.
 */
export function createPool(config: PoolConfig): Pool {
  return new Pool({
    connectionString: config.databaseUrl,

    // Pool sizing
    max: config.maxConnections ?? 10,
    idleTimeoutMillis: 30000, // Close idle connections after 30s

    // Timeouts
    connectionTimeoutMillis: 2000, // Connection acquisition timeout
    statement_timeout: config.dbTimeoutMs, // PostgreSQL side
    query_timeout: config.dbTimeoutMs, // Node.js side
  });
}

/**
 * Narrow a pg.Pool to the SqlClient surface.
 */
export function poolClient(pool: Pool): SqlClient {
  return {
    async query(text: string, values?: unknown[]): Promise<SqlResult> {
      const result = await pool.query(text, values);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    end(): Promise<void> {
      return pool.end();
    },
  };
}
