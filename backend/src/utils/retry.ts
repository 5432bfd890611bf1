/**
 * Retry policy with exponential backoff for transient upstream failures.
 */

export interface RetryPolicy {
  /** Total attempts including the first call (1 = no retry). */
  maxAttempts: number;
  /** Delay before the first retry, in milliseconds. */
  initialDelayMs: number;
  /** Upper bound for any single delay, in milliseconds. */
  maxDelayMs: number;
  /** Exponential backoff multiplier. */
  multiplier: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 1,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  multiplier: 2,
};

/**
 * Delay before retry number `retry` (0-indexed).
 */
export function calculateBackoffDelay(retry: number, policy: RetryPolicy): number {
  const delay = policy.initialDelayMs * Math.pow(policy.multiplier, retry);
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Retries on rate limits (429), server errors (5xx) and network error codes.
 */
export function isTransientError(error: unknown): boolean {
  if (error && typeof error === "object") {
    if ("status" in error && typeof error.status === "number") {
      const status = error.status;
      if (status === 429 || (status >= 500 && status < 600)) return true;
      if (status >= 400 && status < 500) return false;
    }
    if ("code" in error && typeof error.code === "string") {
      if (["ECONNRESET", "ETIMEDOUT", "ECONNREFUSED", "EAI_AGAIN"].includes(error.code)) {
        return true;
      }
    }
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("fetch failed") ||
      message.includes("network") ||
      message.includes("econnreset") ||
      message.includes("etimedout")
    );
  }

  return false;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));
