/**
 * Timeout helper: bounds how long the pipeline waits on an external call.
 */

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Named timeout presets per operation type */
export const TIMEOUTS = {
  SQL_QUERY: 300_000,     // 5 min: source view extraction
  AI_QUERY: 120_000,      // 2 min: ai_query() model calls
  NOTIFY: 60_000,         // 1 min: SMTP delivery, above the transport's own timeouts
} as const;

/**
 * Race `fn` against a timer. The timer is always cleared; the underlying
 * call is not cancelled, only abandoned.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  options: { timeoutMs: number; label: string }
): Promise<T> {
  const { timeoutMs, label } = options;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([fn(), timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}
