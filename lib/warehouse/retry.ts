/**
 * Retry Utility: exponential backoff with error classification.
 *
 * Classifies errors as retryable vs non-retryable to avoid wasting time
 * retrying permanent failures (bad SQL, missing model endpoints, rejected
 * SMTP credentials). Supports 429 rate-limit detection with Retry-After
 * parsing.
 */

const RATE_LIMIT_PATTERNS = [
  "429",
  "Too Many Requests",
  "RATE_LIMIT_EXCEEDED",
  "REQUEST_LIMIT_EXCEEDED",
  "rate limit",
  "throttled",
] as const;

const NON_RETRYABLE_PATTERNS = [
  "INSUFFICIENT_PERMISSIONS",
  "PERMISSION_DENIED",
  "is not authorized",
  "SQLSTATE: 42",       // syntax/semantic SQL error
  "TABLE_OR_VIEW_NOT_FOUND",
  "UNRESOLVED_COLUMN",
  "UNRESOLVED_ROUTINE",
  "PARSE_SYNTAX_ERROR",
  "SCHEMA_NOT_FOUND",
  "CATALOG_NOT_FOUND",
  "ENDPOINT_NOT_FOUND",
  "RESOURCE_DOES_NOT_EXIST",
  "FEATURE_DISABLED",
  "Invalid login",      // SMTP 535
  "EAUTH",
  "EENVELOPE",
] as const;

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Check if an error is non-retryable (permanent failure).
 * Returns true for permission errors, SQL errors, missing endpoints,
 * SMTP auth/envelope errors and 4xx HTTP errors.
 */
export function isNonRetryableError(error: unknown): boolean {
  const msg = messageOf(error);
  const code =
    error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : "";

  // 4xx HTTP status codes are generally non-retryable (except 429)
  const httpStatusMatch = msg.match(/\((\d{3})\)/);
  if (httpStatusMatch) {
    const status = parseInt(httpStatusMatch[1], 10);
    if (status >= 400 && status < 500 && status !== 429) return true;
  }

  for (const pattern of NON_RETRYABLE_PATTERNS) {
    if (msg.includes(pattern) || code === pattern) return true;
  }

  return false;
}

/**
 * Check if an error is an auth/token expiry failure worth retrying with a fresh client.
 * Avoids matching "token" in SQL error messages.
 */
export function isAuthError(error: unknown): boolean {
  const msg = messageOf(error);
  return (
    msg.includes("403") ||
    msg.includes("401") ||
    msg.includes("Forbidden") ||
    msg.includes("Unauthorized") ||
    msg.includes("TEMPORARILY_UNAVAILABLE") ||
    msg.includes("token expired") ||
    msg.includes("invalid_token") ||
    msg.includes("Token is expired")
  );
}

/**
 * Check if an error is a 429 rate limit response.
 */
export function isRateLimitError(error: unknown): boolean {
  const msg = messageOf(error);
  return RATE_LIMIT_PATTERNS.some((p) => msg.toLowerCase().includes(p.toLowerCase()));
}

/**
 * Extract a Retry-After delay embedded in an error message.
 * Returns the delay in milliseconds, or null if not found.
 */
export function extractRetryAfterMs(error: unknown): number | null {
  const match = messageOf(error).match(/[Rr]etry[- ][Aa]fter:\s*(\d+)/);
  if (match) {
    return parseInt(match[1], 10) * 1000;
  }
  return null;
}

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  label?: string;
  /** Extra veto on top of the built-in non-retryable classification */
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Execute a function with exponential backoff retry.
 * Skips retry for non-retryable errors.
 * Uses Retry-After for 429 responses when available.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 500,
    maxDelayMs = 30_000,
    label = "operation",
    shouldRetry,
  } = options;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (isNonRetryableError(error) || (shouldRetry && !shouldRetry(error))) {
        throw error;
      }

      if (attempt >= maxRetries) {
        break;
      }

      let delay: number;

      if (isRateLimitError(error)) {
        const retryAfter = extractRetryAfterMs(error);
        delay = retryAfter ?? Math.min(initialDelayMs * 2 ** (attempt + 1), maxDelayMs);
        console.warn(
          `[retry] ${label} rate limited (attempt ${attempt + 1}/${maxRetries}), waiting ${Math.round(delay)}ms${retryAfter ? " (from Retry-After)" : ""}`,
        );
      } else {
        delay = Math.min(initialDelayMs * 2 ** attempt, maxDelayMs);
        delay = delay * (0.5 + Math.random() * 0.5);
        console.warn(
          `[retry] ${label} attempt ${attempt + 1}/${maxRetries} failed, retrying in ${Math.round(delay)}ms:`,
          messageOf(error)
        );
      }

      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}
