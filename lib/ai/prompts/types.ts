/**
 * Prompt Management Types
 *
 * Every template produces a RenderedPrompt carrying its version string,
 * which flows into the prompt log so a generated plan can be traced back
 * to the exact wording that produced it.
 */

export type PromptKey = "vacation-plan";

export interface RenderedPrompt {
  /** Full text sent to the model (ai_query takes a single prompt string) */
  text: string;
  promptKey: PromptKey;
  version: string;
  estimatedTokens: number;
}

export interface PromptTemplate {
  key: PromptKey;
  version: string;
  description: string;
  build: (ctx: PromptBuildContext) => RenderedPrompt;
}

export interface PromptBuildContext {
  /** JSON array of qualifying destinations (see serializePayload) */
  destinationsJson: string;
}
