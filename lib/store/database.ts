/**
 * Postgres access for the target store.
 *
 * Wraps a node-postgres (pg) Pool behind the small SqlExecutor /
 * TransactionalExecutor interfaces the store is written against, so the
 * store can be exercised with an in-process executor in tests.
 *
 * The pool is a process-wide singleton. A background pool error or an
 * authentication failure drops it; the next call builds a fresh pool.
 */

import pg from "pg";
import { getConfig } from "@/lib/config";

export interface SqlRows {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
}

export interface SqlExecutor {
  query(text: string, values?: unknown[]): Promise<SqlRows>;
}

export interface TransactionalExecutor extends SqlExecutor {
  /** Run `fn` inside BEGIN … COMMIT; any throw rolls back and rethrows. */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
}

// ---------------------------------------------------------------------------
// Auth-error detection
// ---------------------------------------------------------------------------

export const AUTH_ERROR_PATTERNS = [
  "authentication failed",
  "password authentication failed",
  "no pg_hba.conf entry",
  "FATAL: password",
] as const;

export function isDatabaseAuthError(err: unknown): boolean {
  const msg =
    err instanceof Error ? err.message : typeof err === "string" ? err : "";
  const lower = msg.toLowerCase();
  return AUTH_ERROR_PATTERNS.some((p) => lower.includes(p.toLowerCase()));
}

// ---------------------------------------------------------------------------
// Pool singleton
// ---------------------------------------------------------------------------

let _pool: pg.Pool | null = null;

function getPool(): pg.Pool {
  if (_pool) return _pool;

  const pool = new pg.Pool({
    connectionString: getConfig().databaseUrl,
    idleTimeoutMillis: 30_000,
    max: 5,
  });

  pool.on("error", (err) => {
    console.warn("[database] pg Pool background error; will recreate on next request:",
      err.message);
    if (_pool === pool) _pool = null;
  });

  _pool = pool;
  return pool;
}

/** End the pool on shutdown. */
export async function closePool(): Promise<void> {
  const pool = _pool;
  _pool = null;
  if (pool) await pool.end();
}

async function dropPool(): Promise<void> {
  const pool = _pool;
  _pool = null;
  if (!pool) return;
  try {
    await pool.end();
  } catch (err) {
    console.warn("[database] Failed to end pool during rotation",
      err instanceof Error ? err.message : String(err));
  }
}

/**
 * Run `fn` with the pool. On a database authentication error the pool is
 * recreated and the call retried exactly once.
 */
async function withPool<T>(fn: (pool: pg.Pool) => Promise<T>): Promise<T> {
  try {
    return await fn(getPool());
  } catch (err) {
    if (isDatabaseAuthError(err)) {
      console.warn("[database] Authentication error, recreating pool and retrying",
        err instanceof Error ? err.message : String(err));
      await dropPool();
      return fn(getPool());
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Executor backed by the pool
// ---------------------------------------------------------------------------

export class PgDatabase implements TransactionalExecutor {
  async query(text: string, values?: unknown[]): Promise<SqlRows> {
    return withPool(async (pool) => {
      const res = await pool.query(text, values);
      return { rows: res.rows, rowCount: res.rowCount };
    });
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    return withPool(async (pool) => {
      const client = await pool.connect();
      const tx: SqlExecutor = {
        query: async (text, values) => {
          const res = await client.query(text, values);
          return { rows: res.rows, rowCount: res.rowCount };
        },
      };

      try {
        await client.query("BEGIN");
        const result = await fn(tx);
        await client.query("COMMIT");
        return result;
      } catch (err) {
        await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
          console.warn("[database] ROLLBACK failed:",
            rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr));
        });
        throw err;
      } finally {
        client.release();
      }
    });
  }
}
