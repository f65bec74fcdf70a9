/**
 * Vacation Plan Prompt Template: v1
 *
 * Asks the model to pick one destination out of the qualifying rows,
 * describe it, give packing tips for the forecast and lay out a one-week
 * itinerary. The destinations are appended verbatim as JSON.
 */

import type { PromptTemplate, RenderedPrompt, PromptBuildContext } from "./types";

const INSTRUCTIONS = `Considering the data provided below in JSON format, pick the best city for a family vacation in summer.
Explain your choice, offer a short description of the location and provide tips on what to pack for the vacation considering the weather conditions.
Finally, provide a detailed plan of daily activities for a one week long vacation covering the highlights of the chosen destination.`;

function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

export const vacationPlanV1: PromptTemplate = {
  key: "vacation-plan",
  version: "v1",
  description: "Pick the best summer family destination and write a one-week plan",
  build(ctx: PromptBuildContext): RenderedPrompt {
    const text = `${INSTRUCTIONS}\n\n${ctx.destinationsJson}`;
    return {
      text,
      promptKey: "vacation-plan",
      version: "v1",
      estimatedTokens: estimateTokens(text),
    };
  },
};
