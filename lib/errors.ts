/**
 * Error Utilities
 *
 * Shared helpers for logging failures and the failure taxonomy of the
 * text-generation call. Every generation failure is mapped to one
 * GenerationErrorKind so the recommendation job can pick the matching
 * degraded notification instead of guessing from raw driver messages.
 *
 * Usage:
 *   try { ... } catch (err) { logError("merge-job", err); throw err; }
 *
 *   const kind = classifyGenerationError(err);   // "unavailable" | "timeout" | ...
 */

import { TimeoutError } from "@/lib/warehouse/timeout";
import { isRateLimitError } from "@/lib/warehouse/retry";

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Log an error under a bracketed component label.
 */
export function logError(label: string, error: unknown): void {
  console.error(`[${label}]`, errorMessage(error));
}

/* ── Text-generation failure taxonomy ── */

export type GenerationErrorKind =
  /** model or ai_query() not offered in this workspace/region, or not permitted */
  | "unavailable"
  /** no answer within the configured timeout */
  | "timeout"
  /** model endpoint throttled the request */
  | "rate_limited"
  /** call succeeded but returned no text */
  | "empty_response"
  /** anything else */
  | "failed";

export class GenerationError extends Error {
  readonly kind: GenerationErrorKind;

  constructor(kind: GenerationErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
    this.kind = kind;
  }
}

const UNAVAILABLE_PATTERNS = [
  "ENDPOINT_NOT_FOUND",
  "RESOURCE_DOES_NOT_EXIST",
  "FEATURE_DISABLED",
  "UNRESOLVED_ROUTINE",
  "not available in",
  "not supported in",
  "PERMISSION_DENIED",
] as const;

export function isUnavailableError(error: unknown): boolean {
  const msg = errorMessage(error).toLowerCase();
  return UNAVAILABLE_PATTERNS.some((p) => msg.includes(p.toLowerCase()));
}

export function classifyGenerationError(error: unknown): GenerationErrorKind {
  if (error instanceof GenerationError) return error.kind;
  if (error instanceof TimeoutError) return "timeout";
  if (isUnavailableError(error)) return "unavailable";
  if (isRateLimitError(error)) return "rate_limited";
  return "failed";
}

/**
 * Wrap any thrown value in a GenerationError carrying its kind.
 */
export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) return error;
  return new GenerationError(classifyGenerationError(error), errorMessage(error), {
    cause: error,
  });
}
