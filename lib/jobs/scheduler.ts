/**
 * Interval scheduler for the pipeline.
 *
 * Runs never overlap: a tick or runNow() while a run is in flight joins
 * that run instead of starting another.
 */

import { logError } from "@/lib/errors";
import type { PipelineRunResult } from "./pipeline";

export interface SchedulerOptions {
  intervalMinutes: number;
  onResult?: (result: PipelineRunResult) => void;
}

export class PipelineScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private inFlight: Promise<PipelineRunResult> | null = null;

  constructor(
    private readonly run: () => Promise<PipelineRunResult>,
    private readonly options: SchedulerOptions
  ) {
    if (!(options.intervalMinutes > 0)) {
      throw new Error(`intervalMinutes must be positive, got ${options.intervalMinutes}`);
    }
  }

  get running(): boolean {
    return this.inFlight !== null;
  }

  get started(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    const intervalMs = this.options.intervalMinutes * 60_000;
    this.timer = setInterval(() => this.tick(), intervalMs);
    console.log(`[scheduler] started, every ${this.options.intervalMinutes} min`);
  }

  /** Trigger a run now, or join the one in flight. */
  runNow(): Promise<PipelineRunResult> {
    if (this.inFlight) {
      console.log("[scheduler] run already in flight, joining it");
      return this.inFlight;
    }

    const run = this.run()
      .then((result) => {
        this.options.onResult?.(result);
        return result;
      })
      .finally(() => {
        this.inFlight = null;
      });
    this.inFlight = run;
    return run;
  }

  /** Cancel the timer and wait for an in-flight run. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
      console.log("[scheduler] stopped");
    }
    if (this.inFlight) {
      await this.inFlight.catch((err: unknown) => logError("scheduler", err));
    }
  }

  private tick(): void {
    this.runNow().catch((err: unknown) => logError("scheduler", err));
  }
}
