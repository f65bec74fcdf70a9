import { DBSQLClient } from "@databricks/sql";
import type IDBSQLSession from "@databricks/sql/dist/contracts/IDBSQLSession";
import type IOperation from "@databricks/sql/dist/contracts/IOperation";
import type { z } from "zod";
import { getConfig } from "@/lib/config";
import { isAuthError } from "@/lib/warehouse/retry";
import { getCurrentSession, withSession } from "@/lib/warehouse/session-context";
import { parseRows } from "@/lib/validation";

/**
 * Warehouse SQL client module.
 *
 * Reads the marketplace source views and runs ai_query() for text
 * generation. Auth is the service principal (OAuth client credentials) or a
 * PAT, both from lib/config.ts.
 *
 * Token refresh strategy:
 *   - Each query opens a NEW session unless it runs inside withSharedSession().
 *   - The cached client is rotated after CLIENT_MAX_AGE_MS.
 *   - If a query fails with a 403/401 (expired token), the cached client is
 *     destroyed and the query retried once with a fresh client.
 */

let _client: DBSQLClient | null = null;
let _clientCreatedAt = 0;

/** Max age for a cached client: 45 minutes (OAuth tokens last ~60 min) */
const CLIENT_MAX_AGE_MS = 45 * 60 * 1000;

const DEFAULT_MAX_ROWS = 100_000;

function closeQuietly(client: DBSQLClient, reason: string): void {
  client.close().catch((err: unknown) => {
    console.warn(
      `[sql-client] close after ${reason} failed:`,
      err instanceof Error ? err.message : String(err)
    );
  });
}

function getClient(forceNew = false): DBSQLClient {
  const now = Date.now();
  const isStale = now - _clientCreatedAt > CLIENT_MAX_AGE_MS;

  if (!_client || forceNew || isStale) {
    if (_client) {
      if (isStale) console.log("[sql-client] Rotating client (OAuth token likely stale)");
      closeQuietly(_client, "rotation");
    }
    _client = new DBSQLClient();
    _clientCreatedAt = now;
  }
  return _client;
}

/** Force-destroy the cached client (called on auth failures) */
function resetClient(): void {
  if (_client) closeQuietly(_client, "auth failure");
  _client = null;
  _clientCreatedAt = 0;
}

/** Close the cached client on shutdown. */
export async function closeSqlClient(): Promise<void> {
  const client = _client;
  _client = null;
  _clientCreatedAt = 0;
  if (client) await client.close();
}

async function openSession(forceNewClient = false): Promise<IDBSQLSession> {
  const { warehouse } = getConfig();
  const client = getClient(forceNewClient);

  const connectOptions =
    warehouse.auth.mode === "oauth"
      ? {
          authType: "databricks-oauth" as const,
          host: warehouse.serverHostname,
          path: warehouse.httpPath,
          oauthClientId: warehouse.auth.clientId,
          oauthClientSecret: warehouse.auth.clientSecret,
        }
      : {
          authType: "access-token" as const,
          host: warehouse.serverHostname,
          path: warehouse.httpPath,
          token: warehouse.auth.token,
        };

  const connection = await client.connect(connectOptions);
  return connection.openSession();
}

export interface QueryResult<T> {
  rows: T[];
  rowCount: number;
  /** Rows dropped because they did not match the row schema */
  skipped: number;
  /** True if the result was truncated at maxRows */
  truncated: boolean;
}

export interface QueryOptions {
  maxRows?: number;
  /** Label for row-validation warnings */
  label?: string;
}

/**
 * Execute a SQL query and return rows validated against `schema`.
 * Rows that fail validation are skipped with a warning.
 *
 * On auth failures, destroys the cached client and retries once.
 */
export async function executeQuery<T>(
  sql: string,
  schema: z.ZodType<T>,
  options: QueryOptions = {}
): Promise<QueryResult<T>> {
  return executeQueryInner(sql, schema, options, false);
}

async function executeQueryInner<T>(
  sql: string,
  schema: z.ZodType<T>,
  options: QueryOptions,
  isRetry: boolean,
): Promise<QueryResult<T>> {
  const maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;

  // Reuse shared session from withSharedSession() if available
  const sharedSession = getCurrentSession();
  const ownsSession = !sharedSession;
  let session: IDBSQLSession | null = sharedSession ?? null;
  let operation: IOperation | null = null;

  try {
    if (!session) {
      session = await openSession(isRetry);
    }

    operation = await session.executeStatement(sql, {
      runAsync: true,
      maxRows,
    });

    const raw = await operation.fetchAll();
    const rows = parseRows(raw, schema, options.label ?? "sql-client");
    const truncated = raw.length >= maxRows;

    if (truncated) {
      console.warn(
        `[sql-client] Result truncated at ${maxRows} rows; query may have more results`
      );
    }

    return { rows, rowCount: rows.length, skipped: raw.length - rows.length, truncated };
  } catch (error: unknown) {
    if (!isRetry && ownsSession && isAuthError(error)) {
      console.warn(
        "[sql-client] Auth error detected, rotating client and retrying:",
        error instanceof Error ? error.message : String(error)
      );
      resetClient();
      return executeQueryInner(sql, schema, options, true);
    }

    const message =
      error instanceof Error ? error.message : "Unknown SQL execution error";
    throw new Error(`Warehouse SQL query failed: ${message}`, { cause: error });
  } finally {
    if (operation) {
      await operation.close().catch((err: unknown) => {
        console.warn("[sql-client] operation close failed:", err instanceof Error ? err.message : String(err));
      });
    }
    // Only close the session if we opened it ourselves
    if (ownsSession && session) {
      await session.close().catch((err: unknown) => {
        console.warn("[sql-client] session close failed:", err instanceof Error ? err.message : String(err));
      });
    }
  }
}

/**
 * Run multiple queries within a single shared session.
 * Opens one session, stores it in AsyncLocalStorage, and all
 * `executeQuery` calls within `fn` reuse that session.
 */
export async function withSharedSession<T>(fn: () => Promise<T>): Promise<T> {
  return withSession(() => openSession(false), fn);
}
