#!/usr/bin/env -S npx tsx
/**
 * vacation-spots CLI
 *
 *   migrate   create the target schema and table
 *   run       one pipeline run now (exit 1 unless it succeeds)
 *   schedule  run now, then every SCHEDULE_INTERVAL_MINUTES until SIGTERM/SIGINT
 */

import "dotenv/config";
import { getConfig } from "@/lib/config";
import { logError } from "@/lib/errors";
import { PipelineScheduler } from "@/lib/jobs/scheduler";
import { createRuntime } from "@/lib/runtime";
import { registerShutdown } from "@/lib/shutdown";

const USAGE = "usage: vacation-spots <migrate|run|schedule>";

/** Resolves to the exit code, or null while the scheduler keeps the process alive. */
async function main(command: string | undefined): Promise<number | null> {
  if (command !== "migrate" && command !== "run" && command !== "schedule") {
    console.error(USAGE);
    return 2;
  }

  const config = getConfig();
  const runtime = createRuntime(config);

  if (command === "migrate") {
    try {
      await runtime.migrate();
      return 0;
    } finally {
      await runtime.close();
    }
  }

  if (command === "run") {
    try {
      const result = await runtime.runOnce();
      return result.status === "success" ? 0 : 1;
    } finally {
      await runtime.close();
    }
  }

  const scheduler = new PipelineScheduler(() => runtime.runOnce(), {
    intervalMinutes: config.scheduleIntervalMinutes,
    onResult: (result) => {
      if (result.status !== "success") {
        console.error(`[scheduler] run ended with ${result.status}: ${result.error}`);
      }
    },
  });

  registerShutdown(async () => {
    await scheduler.stop();
    await runtime.close();
  });

  scheduler.start();
  await scheduler.runNow();
  return null;
}

main(process.argv[2])
  .then((code) => {
    if (code !== null) process.exit(code);
  })
  .catch((err: unknown) => {
    logError("cli", err);
    process.exit(1);
  });
