/**
 * Recommendation job: picks qualifying destinations from the store, asks
 * the model for a vacation plan and emails the outcome.
 *
 *   PENDING ─┬─ FILTERED_EMPTY ──────────────────────────── NOTIFIED_EMPTY
 *            └─ FILTERED_NONEMPTY ── GENERATING ─┬────────── NOTIFIED_SUCCESS
 *                                                └ GENERATION_FAILED ── NOTIFIED_FAILURE
 *
 * A generation failure of any kind ends in NOTIFIED_FAILURE and the job
 * still resolves. Only a store read or notification delivery failure
 * rejects.
 */

import { generateVacationPlan, type VacationPlan, type VacationPlanOptions } from "@/lib/ai/vacation-plan";
import type { TextGenerator } from "@/lib/ai/text-generation";
import { serializePayload } from "@/lib/domain/payload";
import { selectDestinations, type RecommendationPolicy } from "@/lib/domain/policy";
import { toGenerationError, type GenerationErrorKind } from "@/lib/errors";
import { degradedMessage, noResultsMessage, successMessage, type MessageContent } from "@/lib/notify/messages";
import type { NotificationSink } from "@/lib/notify/sink";
import type { VacationSpotsStore } from "@/lib/store/vacation-spots-store";
import { withRetry } from "@/lib/warehouse/retry";
import { TIMEOUTS, withTimeout } from "@/lib/warehouse/timeout";

export type RecommendationState =
  | "PENDING"
  | "FILTERED_EMPTY"
  | "FILTERED_NONEMPTY"
  | "GENERATING"
  | "GENERATION_FAILED"
  | "NOTIFIED_EMPTY"
  | "NOTIFIED_SUCCESS"
  | "NOTIFIED_FAILURE";

export type TerminalState = Extract<
  RecommendationState,
  "NOTIFIED_EMPTY" | "NOTIFIED_SUCCESS" | "NOTIFIED_FAILURE"
>;

const TRANSITIONS: Record<RecommendationState, readonly RecommendationState[]> = {
  PENDING: ["FILTERED_EMPTY", "FILTERED_NONEMPTY"],
  FILTERED_EMPTY: ["NOTIFIED_EMPTY"],
  FILTERED_NONEMPTY: ["GENERATING"],
  GENERATING: ["NOTIFIED_SUCCESS", "GENERATION_FAILED"],
  GENERATION_FAILED: ["NOTIFIED_FAILURE"],
  NOTIFIED_EMPTY: [],
  NOTIFIED_SUCCESS: [],
  NOTIFIED_FAILURE: [],
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: RecommendationState,
    readonly to: RecommendationState
  ) {
    super(`Illegal recommendation transition ${from} → ${to}`);
    this.name = "IllegalTransitionError";
  }
}

export class RecommendationStateMachine {
  private current: RecommendationState = "PENDING";
  private readonly trail: RecommendationState[] = ["PENDING"];

  get state(): RecommendationState {
    return this.current;
  }

  get history(): readonly RecommendationState[] {
    return this.trail;
  }

  transition(to: RecommendationState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new IllegalTransitionError(this.current, to);
    }
    this.current = to;
    this.trail.push(to);
  }
}

export interface RecommendationJobDeps {
  store: Pick<VacationSpotsStore, "listAll">;
  generator: TextGenerator;
  sink: NotificationSink;
  recipient: string;
  model: string;
  timeoutMs: number;
  policy: RecommendationPolicy;
  /** Max destinations handed to the model */
  limit: number;
  generation?: Pick<VacationPlanOptions, "maxRetries" | "initialDelayMs" | "log">;
  notifyRetry?: { maxRetries?: number; initialDelayMs?: number };
}

export interface RecommendationResult {
  state: TerminalState;
  history: RecommendationState[];
  /** Rows read from the store */
  stored: number;
  /** Rows passing the policy, before the limit */
  matched: number;
  /** Rows serialized into the payload */
  selected: number;
  payload: string;
  failureKind?: GenerationErrorKind;
  promptVersion?: string;
}

export async function runRecommendationJob(deps: RecommendationJobDeps): Promise<RecommendationResult> {
  const machine = new RecommendationStateMachine();

  const notify = (content: MessageContent): Promise<void> =>
    withRetry(
      () =>
        withTimeout(
          () => deps.sink.send({ recipient: deps.recipient, ...content }),
          { timeoutMs: TIMEOUTS.NOTIFY, label: "notification" }
        ),
      {
        maxRetries: deps.notifyRetry?.maxRetries ?? 1,
        initialDelayMs: deps.notifyRetry?.initialDelayMs ?? 5_000,
        label: "notification",
      }
    );

  const spots = await deps.store.listAll();
  const matched = selectDestinations(spots, deps.policy, Number.MAX_SAFE_INTEGER);
  const selected = matched.slice(0, deps.limit);
  const payload = serializePayload(selected);

  const finish = (state: TerminalState, extra: Partial<RecommendationResult> = {}): RecommendationResult => {
    machine.transition(state);
    console.log(
      `[recommendation-job] ${machine.history.join(" → ")} (${selected.length}/${matched.length} of ${spots.length} spots)`
    );
    return {
      state,
      history: [...machine.history],
      stored: spots.length,
      matched: matched.length,
      selected: selected.length,
      payload,
      ...extra,
    };
  };

  if (selected.length === 0) {
    machine.transition("FILTERED_EMPTY");
    await notify(noResultsMessage());
    return finish("NOTIFIED_EMPTY");
  }

  machine.transition("FILTERED_NONEMPTY");
  machine.transition("GENERATING");

  let plan: VacationPlan;
  try {
    plan = await generateVacationPlan(deps.generator, payload, {
      model: deps.model,
      timeoutMs: deps.timeoutMs,
      ...deps.generation,
    });
  } catch (err: unknown) {
    const failure = toGenerationError(err);
    console.warn(`[recommendation-job] generation failed (${failure.kind}):`, failure.message);
    machine.transition("GENERATION_FAILED");
    await notify(degradedMessage(failure.kind, payload));
    return finish("NOTIFIED_FAILURE", { failureKind: failure.kind });
  }

  await notify(successMessage(plan.text));
  return finish("NOTIFIED_SUCCESS", { promptVersion: plan.promptVersion });
}
