import { afterEach, describe, it, expect, vi } from "vitest";
import { PipelineScheduler } from "../scheduler";
import type { PipelineRunResult } from "../pipeline";
import { deferred } from "./fakes";

const FAILED_RUN: PipelineRunResult = {
  status: "merge_failed",
  error: "warehouse down",
  startedAt: new Date("2026-03-01T06:00:00Z"),
  durationMs: 5,
};

describe("PipelineScheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a non-positive interval", () => {
    expect(() => new PipelineScheduler(async () => FAILED_RUN, { intervalMinutes: 0 })).toThrow(
      "intervalMinutes must be positive"
    );
  });

  it("runs immediately on runNow and reports the result", async () => {
    const run = vi.fn(async () => FAILED_RUN);
    const onResult = vi.fn();
    const scheduler = new PipelineScheduler(run, { intervalMinutes: 1440, onResult });

    await expect(scheduler.runNow()).resolves.toBe(FAILED_RUN);
    expect(run).toHaveBeenCalledTimes(1);
    expect(onResult).toHaveBeenCalledWith(FAILED_RUN);
    expect(scheduler.running).toBe(false);
  });

  it("joins an in-flight run instead of starting another", async () => {
    const pending = deferred<PipelineRunResult>();
    const run = vi.fn(() => pending.promise);
    const scheduler = new PipelineScheduler(run, { intervalMinutes: 1440 });

    const first = scheduler.runNow();
    const second = scheduler.runNow();
    expect(run).toHaveBeenCalledTimes(1);
    expect(scheduler.running).toBe(true);

    pending.resolve(FAILED_RUN);
    await expect(first).resolves.toBe(FAILED_RUN);
    await expect(second).resolves.toBe(FAILED_RUN);

    run.mockImplementation(async () => FAILED_RUN);
    await scheduler.runNow();
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("runs once per interval until stopped", async () => {
    vi.useFakeTimers();
    const run = vi.fn(async () => FAILED_RUN);
    const scheduler = new PipelineScheduler(run, { intervalMinutes: 1440 });

    scheduler.start();
    scheduler.start();
    expect(scheduler.started).toBe(true);
    expect(run).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1440 * 60_000);
    expect(run).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1440 * 60_000);
    expect(run).toHaveBeenCalledTimes(2);

    await scheduler.stop();
    expect(scheduler.started).toBe(false);
    await vi.advanceTimersByTimeAsync(3 * 1440 * 60_000);
    expect(run).toHaveBeenCalledTimes(2);
  });

  it("waits for the in-flight run when stopping", async () => {
    const pending = deferred<PipelineRunResult>();
    const scheduler = new PipelineScheduler(() => pending.promise, { intervalMinutes: 60 });
    const inFlight = scheduler.runNow();

    let stopped = false;
    const stopping = scheduler.stop().then(() => {
      stopped = true;
    });
    await Promise.resolve();
    expect(stopped).toBe(false);

    pending.resolve(FAILED_RUN);
    await inFlight;
    await stopping;
    expect(stopped).toBe(true);
  });

  it("logs a rejected scheduled run and keeps the schedule", async () => {
    vi.useFakeTimers();
    const errors = vi.spyOn(console, "error").mockImplementation(() => {});
    const run = vi.fn(async (): Promise<PipelineRunResult> => {
      throw new Error("unexpected");
    });
    const scheduler = new PipelineScheduler(run, { intervalMinutes: 1 });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    await vi.advanceTimersByTimeAsync(60_000);

    expect(run).toHaveBeenCalledTimes(2);
    expect(errors).toHaveBeenCalledWith("[scheduler]", "unexpected");
    await scheduler.stop();
    errors.mockRestore();
  });
});
