/**
 * Graceful shutdown for the long-running scheduler process.
 *
 * On SIGTERM/SIGINT the cleanup runs once (stop the scheduler, wait for an
 * in-flight run, close connections) and the process exits.
 */

export function registerShutdown(cleanup: () => Promise<void>): void {
  let shuttingDown = false;

  const handler = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`[shutdown] ${signal} received, closing connections...`);

    cleanup()
      .then(() => {
        console.log("[shutdown] Exiting.");
        process.exit(0);
      })
      .catch((err: unknown) => {
        console.error("[shutdown] Error during cleanup:", err);
        process.exit(1);
      });
  };

  process.on("SIGTERM", handler);
  process.on("SIGINT", handler);
  console.log("[shutdown] SIGTERM/SIGINT handlers registered.");
}
