/**
 * Text generation through the warehouse's ai_query() SQL function.
 *
 * Uses the same warehouse connection as the source extractors, so no
 * separate model-serving credentials are needed. Availability of a given
 * model depends on the workspace and region; callers classify failures
 * with classifyGenerationError().
 */

import { z } from "zod";
import { executeQuery } from "@/lib/warehouse/sql-client";
import { GenerationError } from "@/lib/errors";
import { validateModelName } from "@/lib/validation";

export interface TextGenerator {
  generate(model: string, prompt: string): Promise<string>;
}

const ResponseRowSchema = z.object({ response: z.string().nullable() });

export function escapeForSql(text: string): string {
  return text.replace(/'/g, "''").replace(/\\/g, "\\\\");
}

export function buildAiQuerySql(model: string, prompt: string): string {
  return `SELECT ai_query('${validateModelName(model)}', '${escapeForSql(prompt)}') AS response`;
}

export class WarehouseTextGenerator implements TextGenerator {
  async generate(model: string, prompt: string): Promise<string> {
    console.log(`[ai] calling ${model}, prompt ${prompt.length.toLocaleString()} chars`);

    const result = await executeQuery(buildAiQuerySql(model, prompt), ResponseRowSchema, {
      label: "ai_query",
    });

    const text = result.rows[0]?.response?.trim();
    if (!text) {
      throw new GenerationError("empty_response", `${model} returned an empty response`);
    }

    console.log(`[ai] response received: ${text.length.toLocaleString()} chars`);
    return text;
  }
}
