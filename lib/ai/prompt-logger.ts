/**
 * File-Based Prompt Logger
 *
 * Writes one JSONL entry per text-generation call for observability.
 *
 * Default: metadata only (~200 bytes per entry).
 * Debug mode (PROMPT_LOG_VERBOSE=true): includes full prompt and response.
 *
 * Writes are fire-and-forget; a failed write is reported with a warning and
 * never fails the calling job.
 */

import { appendFile, mkdir } from "fs/promises";
import { join } from "path";
import type { PromptKey } from "@/lib/ai/prompts/types";

export interface PromptLogEntry {
  timestamp: string;
  promptKey: PromptKey;
  promptVersion: string;
  model: string;
  estimatedInputTokens: number;
  outputChars: number;
  durationMs: number;
  success: boolean;
  errorKind?: string;
  errorMessage?: string;
  renderedPrompt?: string;
  rawResponse?: string;
}

export type PromptLogWriter = (entry: PromptLogEntry) => void;

/** Compact JSONL record; prompt and response only when verbose. */
export function toLogRecord(entry: PromptLogEntry, verbose: boolean): Record<string, unknown> {
  const record: Record<string, unknown> = {
    ts: entry.timestamp,
    key: entry.promptKey,
    ver: entry.promptVersion,
    model: entry.model,
    inTok: entry.estimatedInputTokens,
    outCh: entry.outputChars,
    ms: entry.durationMs,
    ok: entry.success,
  };

  if (entry.errorKind) record.kind = entry.errorKind;
  if (entry.errorMessage) record.err = entry.errorMessage;

  if (verbose) {
    if (entry.renderedPrompt) record.prompt = entry.renderedPrompt;
    if (entry.rawResponse) record.response = entry.rawResponse;
  }

  return record;
}

export function createFilePromptLogger(options: { dir: string; verbose: boolean }): PromptLogWriter {
  let dirEnsured = false;

  async function append(line: string): Promise<void> {
    if (!dirEnsured) {
      await mkdir(options.dir, { recursive: true });
      dirEnsured = true;
    }
    const date = new Date().toISOString().slice(0, 10);
    await appendFile(join(options.dir, `prompts-${date}.jsonl`), line, "utf-8");
  }

  return (entry) => {
    const line = JSON.stringify(toLogRecord(entry, options.verbose)) + "\n";
    append(line).catch((err: unknown) => {
      console.warn("[prompt-log] write failed:", err instanceof Error ? err.message : String(err));
    });
  };
}

export const writePromptLog: PromptLogWriter = createFilePromptLogger({
  dir: process.env.PROMPT_LOG_DIR || "./logs/prompts",
  verbose: process.env.PROMPT_LOG_VERBOSE === "true",
});
