/**
 * Shared-session context using AsyncLocalStorage.
 *
 * When a caller wraps parallel queries inside `withSession()`, a single
 * warehouse session is opened and shared across all `executeQuery` calls
 * within that async context, then closed once when the wrapper completes.
 *
 * Outside a `withSession()` scope, `executeQuery` opens a session per query.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import type IDBSQLSession from "@databricks/sql/dist/contracts/IDBSQLSession";

const sessionStore = new AsyncLocalStorage<IDBSQLSession>();

/**
 * Session bound to the current async context, if any.
 */
export function getCurrentSession(): IDBSQLSession | undefined {
  return sessionStore.getStore();
}

/**
 * Open a session, run `fn` with it bound to the async context, close it.
 */
export async function withSession<T>(
  openSessionFn: () => Promise<IDBSQLSession>,
  fn: () => Promise<T>,
): Promise<T> {
  const session = await openSessionFn();
  try {
    return await sessionStore.run(session, fn);
  } finally {
    await session.close().catch((err: unknown) => {
      console.warn(
        "[sql-client] failed to close shared session:",
        err instanceof Error ? err.message : String(err)
      );
    });
  }
}
