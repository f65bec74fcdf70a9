/**
 * One pipeline run: Merge-and-Store, then Recommendation only if the merge
 * succeeded. Never rejects; the outcome is in the returned status.
 */

import { errorMessage, logError } from "@/lib/errors";
import type { MergeResult } from "./merge-job";
import type { RecommendationResult } from "./recommendation-job";

export interface PipelineDeps {
  merge: () => Promise<MergeResult>;
  recommend: () => Promise<RecommendationResult>;
}

interface RunTiming {
  startedAt: Date;
  durationMs: number;
}

export type PipelineRunResult =
  | ({ status: "success"; merge: MergeResult; recommendation: RecommendationResult } & RunTiming)
  | ({ status: "merge_failed"; error: string } & RunTiming)
  | ({ status: "recommendation_failed"; merge: MergeResult; error: string } & RunTiming);

export async function runPipeline(deps: PipelineDeps): Promise<PipelineRunResult> {
  const startedAt = new Date();
  const elapsed = () => Date.now() - startedAt.getTime();

  let merge: MergeResult;
  try {
    merge = await deps.merge();
  } catch (err: unknown) {
    logError("pipeline", err);
    console.error("[pipeline] merge failed, recommendation skipped");
    return { status: "merge_failed", error: errorMessage(err), startedAt, durationMs: elapsed() };
  }

  try {
    const recommendation = await deps.recommend();
    console.log(`[pipeline] run finished in ${elapsed()}ms → ${recommendation.state}`);
    return { status: "success", merge, recommendation, startedAt, durationMs: elapsed() };
  } catch (err: unknown) {
    logError("pipeline", err);
    return { status: "recommendation_failed", merge, error: errorMessage(err), startedAt, durationMs: elapsed() };
  }
}
