// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Retry configuration handed to the HTTP client at construction.
 */
export interface RetryPolicy {
  /** Total attempts per request, including the first one */
  maxAttempts: number;
  /** Seconds; retry n waits backoffFactor * 2^(n-1) */
  backoffFactor: number;
  /** Upper bound for a single backoff wait */
  maxBackoffMs: number;
  /** Response statuses that trigger another attempt */
  retriableStatusCodes: readonly number[];
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 10,
  backoffFactor: 0.3,
  maxBackoffMs: 120_000,
  retriableStatusCodes: [500, 502, 504],
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Wait before the given retry (1-based).
 */
export function backoffDelayMs(policy: RetryPolicy, retryNumber: number): number {
  const seconds = policy.backoffFactor * 2 ** Math.max(0, retryNumber - 1);
  return Math.min(policy.maxBackoffMs, Math.round(seconds * 1000));
}

export function isRetriableStatus(policy: RetryPolicy, status: number): boolean {
  return policy.retriableStatusCodes.includes(status);
}
