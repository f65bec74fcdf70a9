import { describe, it, expect, vi } from "vitest";
import { runPipeline } from "../pipeline";
import type { MergeResult } from "../merge-job";
import type { RecommendationResult } from "../recommendation-job";

const MERGE: MergeResult = {
  origin: "LAX",
  sources: { emissions: 2, punctuality: 2, weather: 2, attractions: 2 },
  harmonized: 2,
  duplicates: 0,
  inserted: 2,
  updated: 0,
  unchanged: 0,
  missing: 0,
  purged: 0,
  stats: { routes: 2, unmappedAirports: [], missingWeather: [], missingAttractions: [] },
  durationMs: 12,
};

const RECOMMENDATION: RecommendationResult = {
  state: "NOTIFIED_EMPTY",
  history: ["PENDING", "FILTERED_EMPTY", "NOTIFIED_EMPTY"],
  stored: 2,
  matched: 0,
  selected: 0,
  payload: "[]",
};

describe("runPipeline", () => {
  it("runs recommendation after a successful merge", async () => {
    const order: string[] = [];
    const merge = vi.fn(async () => {
      order.push("merge");
      return MERGE;
    });
    const recommend = vi.fn(async () => {
      order.push("recommend");
      return RECOMMENDATION;
    });

    const result = await runPipeline({ merge, recommend });

    expect(order).toEqual(["merge", "recommend"]);
    expect(result).toMatchObject({ status: "success", merge: MERGE, recommendation: RECOMMENDATION });
  });

  it("skips recommendation when the merge fails", async () => {
    const recommend = vi.fn(async () => RECOMMENDATION);

    const result = await runPipeline({
      merge: async () => {
        throw new Error("warehouse down");
      },
      recommend,
    });

    expect(recommend).not.toHaveBeenCalled();
    expect(result).toMatchObject({ status: "merge_failed", error: "warehouse down" });
  });

  it("reports a failed recommendation without losing the merge result", async () => {
    const result = await runPipeline({
      merge: async () => MERGE,
      recommend: async () => {
        throw new Error("SMTP down");
      },
    });

    expect(result).toMatchObject({ status: "recommendation_failed", merge: MERGE, error: "SMTP down" });
  });
});
