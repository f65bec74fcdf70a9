import { describe, it, expect, vi } from "vitest";
import {
  IllegalTransitionError,
  RecommendationStateMachine,
  runRecommendationJob,
  type RecommendationJobDeps,
} from "../recommendation-job";
import { DEFAULT_POLICY } from "@/lib/domain/policy";
import type { VacationSpot } from "@/lib/domain/types";
import type { Notification } from "@/lib/notify/sink";
import { spot } from "./fakes";

function deps(spots: VacationSpot[], overrides: Partial<RecommendationJobDeps> = {}) {
  const generate = vi.fn(async (_model: string, _prompt: string) => "Day 1: Waikiki beach.");
  const send = vi.fn(async (_notification: Notification) => {});
  const base: RecommendationJobDeps = {
    store: { listAll: async () => spots },
    generator: { generate },
    sink: { send },
    recipient: "traveller@example.com",
    model: "test-model",
    timeoutMs: 50,
    policy: DEFAULT_POLICY,
    limit: 10,
    generation: { initialDelayMs: 0, log: vi.fn() },
    notifyRetry: { initialDelayMs: 0 },
    ...overrides,
  };
  return { deps: base, generate, send };
}

const qualifying = spot();
const tooCold = spot({ city: "Seattle", airport: "SEA", avgTemperatureAirF: 55 });

describe("runRecommendationJob", () => {
  describe("empty selection", () => {
    it("sends exactly one no-results email and never calls the model", async () => {
      const { deps: d, generate, send } = deps([tooCold]);

      const result = await runRecommendationJob(d);

      expect(result.state).toBe("NOTIFIED_EMPTY");
      expect(result.history).toEqual(["PENDING", "FILTERED_EMPTY", "NOTIFIED_EMPTY"]);
      expect(result.payload).toBe("[]");
      expect(generate).not.toHaveBeenCalled();
      expect(send).toHaveBeenCalledTimes(1);
      expect(send.mock.calls[0][0]).toEqual({
        recipient: "traveller@example.com",
        subject: "New data successfully processed: No suitable vacation spots found.",
        body: "The query did not return any results. Consider adjusting your filters.",
      });
    });

    it("treats an empty store the same way", async () => {
      const { deps: d, generate } = deps([]);
      const result = await runRecommendationJob(d);
      expect(result.state).toBe("NOTIFIED_EMPTY");
      expect(result.stored).toBe(0);
      expect(generate).not.toHaveBeenCalled();
    });
  });

  describe("successful generation", () => {
    it("emails the generated plan", async () => {
      const { deps: d, generate, send } = deps([qualifying, tooCold]);

      const result = await runRecommendationJob(d);

      expect(result.state).toBe("NOTIFIED_SUCCESS");
      expect(result.history).toEqual(["PENDING", "FILTERED_NONEMPTY", "GENERATING", "NOTIFIED_SUCCESS"]);
      expect(result).toMatchObject({ stored: 2, matched: 1, selected: 1, promptVersion: "v1" });
      expect(generate).toHaveBeenCalledTimes(1);
      expect(generate.mock.calls[0][0]).toBe("test-model");
      expect(generate.mock.calls[0][1]).toContain('"airport":"HNL"');
      expect(generate.mock.calls[0][1]).not.toContain('"airport":"SEA"');
      expect(send).toHaveBeenCalledTimes(1);
      expect(send.mock.calls[0][0]).toEqual({
        recipient: "traveller@example.com",
        subject: "New data successfully processed: The perfect place for your summer vacation has been found.",
        body: "Day 1: Waikiki beach.",
      });
    });

    it("hands at most `limit` destinations to the model, best first", async () => {
      const spots = Array.from({ length: 12 }, (_, i) =>
        spot({ city: `City ${String(i).padStart(2, "0")}`, airport: "AAA", punctualPct: 60 + i })
      );
      const { deps: d } = deps(spots);

      const result = await runRecommendationJob(d);

      expect(result).toMatchObject({ matched: 12, selected: 10 });
      const payload: Array<{ punctual_pct: number }> = JSON.parse(result.payload);
      expect(payload).toHaveLength(10);
      expect(payload[0].punctual_pct).toBe(71);
      expect(payload[9].punctual_pct).toBe(62);
    });
  });

  describe("failed generation", () => {
    it("sends a degraded email and resolves when the model is unavailable", async () => {
      const generate = vi.fn(async () => {
        throw new Error("Warehouse SQL query failed: ENDPOINT_NOT_FOUND: test-model");
      });
      const { deps: d, send } = deps([qualifying], { generator: { generate } });

      const result = await runRecommendationJob(d);

      expect(result.state).toBe("NOTIFIED_FAILURE");
      expect(result.history).toEqual([
        "PENDING",
        "FILTERED_NONEMPTY",
        "GENERATING",
        "GENERATION_FAILED",
        "NOTIFIED_FAILURE",
      ]);
      expect(result.failureKind).toBe("unavailable");
      expect(generate).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledTimes(1);
      expect(send.mock.calls[0][0].subject).toBe(
        "New data successfully processed: Vacation plan generation unavailable."
      );
      expect(send.mock.calls[0][0].body).toContain(result.payload);
    });

    it("retries a timed-out call once, then degrades", async () => {
      const generate = vi.fn(() => new Promise<string>(() => {}));
      const { deps: d, send } = deps([qualifying], { generator: { generate }, timeoutMs: 20 });

      const result = await runRecommendationJob(d);

      expect(result).toMatchObject({ state: "NOTIFIED_FAILURE", failureKind: "timeout" });
      expect(generate).toHaveBeenCalledTimes(2);
      expect(send).toHaveBeenCalledTimes(1);
      expect(send.mock.calls[0][0].body.startsWith("The text generation model did not answer in time.")).toBe(true);
    });
  });

  describe("notification delivery", () => {
    it("retries a failed send once", async () => {
      const send = vi
        .fn(async (_notification: Notification) => {})
        .mockRejectedValueOnce(new Error("ECONNRESET"));
      const { deps: d } = deps([tooCold], { sink: { send } });

      const result = await runRecommendationJob(d);

      expect(result.state).toBe("NOTIFIED_EMPTY");
      expect(send).toHaveBeenCalledTimes(2);
    });

    it("rejects when the message cannot be delivered", async () => {
      const send = vi.fn(async (_notification: Notification) => {
        throw new Error("ECONNREFUSED");
      });
      const { deps: d } = deps([tooCold], { sink: { send } });

      await expect(runRecommendationJob(d)).rejects.toThrow("ECONNREFUSED");
      expect(send).toHaveBeenCalledTimes(2);
    });
  });
});

describe("RecommendationStateMachine", () => {
  it("starts in PENDING", () => {
    const machine = new RecommendationStateMachine();
    expect(machine.state).toBe("PENDING");
    expect(machine.history).toEqual(["PENDING"]);
  });

  it("rejects skipping the filter step", () => {
    const machine = new RecommendationStateMachine();
    expect(() => machine.transition("GENERATING")).toThrow(IllegalTransitionError);
    expect(machine.state).toBe("PENDING");
  });

  it("rejects leaving a terminal state", () => {
    const machine = new RecommendationStateMachine();
    machine.transition("FILTERED_EMPTY");
    machine.transition("NOTIFIED_EMPTY");
    expect(() => machine.transition("FILTERED_NONEMPTY")).toThrow(
      "Illegal recommendation transition NOTIFIED_EMPTY → FILTERED_NONEMPTY"
    );
  });

  it("rejects generating for an empty selection", () => {
    const machine = new RecommendationStateMachine();
    machine.transition("FILTERED_EMPTY");
    expect(() => machine.transition("GENERATING")).toThrow(IllegalTransitionError);
  });
});
