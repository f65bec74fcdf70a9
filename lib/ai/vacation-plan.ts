/**
 * Vacation plan generation: renders the versioned prompt, calls the text
 * generator under a timeout with one bounded retry, and logs the call.
 *
 * Every failure leaves this module as a GenerationError so the
 * recommendation job can choose the matching degraded notification.
 */

import { renderPrompt } from "@/lib/ai/prompts/registry";
import { writePromptLog, type PromptLogWriter } from "@/lib/ai/prompt-logger";
import type { TextGenerator } from "@/lib/ai/text-generation";
import { classifyGenerationError, toGenerationError } from "@/lib/errors";
import { withRetry } from "@/lib/warehouse/retry";
import { withTimeout } from "@/lib/warehouse/timeout";

export interface VacationPlanOptions {
  model: string;
  timeoutMs: number;
  /** Retries after the first attempt (default 1) */
  maxRetries?: number;
  initialDelayMs?: number;
  log?: PromptLogWriter;
}

export interface VacationPlan {
  text: string;
  promptVersion: string;
  durationMs: number;
}

/** Kinds a second attempt cannot fix */
function isRetryableKind(error: unknown): boolean {
  const kind = classifyGenerationError(error);
  return kind !== "unavailable" && kind !== "empty_response";
}

export async function generateVacationPlan(
  generator: TextGenerator,
  destinationsJson: string,
  options: VacationPlanOptions
): Promise<VacationPlan> {
  const { model, timeoutMs, maxRetries = 1, initialDelayMs = 2_000, log = writePromptLog } = options;
  const prompt = renderPrompt("vacation-plan", { destinationsJson });
  const start = Date.now();

  const baseEntry = {
    promptKey: prompt.promptKey,
    promptVersion: prompt.version,
    model,
    estimatedInputTokens: prompt.estimatedTokens,
    renderedPrompt: prompt.text,
  };

  try {
    const text = await withRetry(
      () => withTimeout(() => generator.generate(model, prompt.text), { timeoutMs, label: `ai_query(${model})` }),
      { maxRetries, initialDelayMs, label: "vacation-plan", shouldRetry: isRetryableKind }
    );
    const durationMs = Date.now() - start;

    log({
      ...baseEntry,
      timestamp: new Date().toISOString(),
      outputChars: text.length,
      durationMs,
      success: true,
      rawResponse: text,
    });

    return { text, promptVersion: prompt.version, durationMs };
  } catch (err: unknown) {
    const failure = toGenerationError(err);

    log({
      ...baseEntry,
      timestamp: new Date().toISOString(),
      outputChars: 0,
      durationMs: Date.now() - start,
      success: false,
      errorKind: failure.kind,
      errorMessage: failure.message,
    });

    throw failure;
  }
}
