/**
 * Prompt Registry: central mapping of prompt keys to active versions.
 *
 * To add a new version:
 *   1. Create the template (e.g. vacationPlanV2) beside the current one
 *   2. Point ACTIVE_TEMPLATES at it
 *   3. The old version stays in its file for reference
 */

import type { PromptKey, PromptTemplate, RenderedPrompt, PromptBuildContext } from "./types";
import { vacationPlanV1 } from "./vacation-plan";

const ACTIVE_TEMPLATES: Record<PromptKey, PromptTemplate> = {
  "vacation-plan": vacationPlanV1,
};

export function getTemplate(key: PromptKey): PromptTemplate {
  return ACTIVE_TEMPLATES[key];
}

/**
 * Build a rendered prompt using the currently active template for the given key.
 */
export function renderPrompt(key: PromptKey, ctx: PromptBuildContext): RenderedPrompt {
  return getTemplate(key).build(ctx);
}

export type { PromptKey, PromptTemplate, RenderedPrompt, PromptBuildContext };
