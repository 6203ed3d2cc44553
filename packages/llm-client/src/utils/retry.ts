/**
 * Retry utility with exponential backoff and jitter.
 *
 *   - Exponential backoff: `min(baseDelay * multiplier^attempt, maxDelay)`
 *   - Jitter: `delay * random(0.5, 1.5)`
 *   - A `retry_after` hint on the error replaces the computed delay
 *   - Only `rate_limit` and `transport` errors are retried
 */

import { AbortedError, LLMError, RateLimitError } from "../types/errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Configuration for retry behavior. */
export interface RetryPolicy {
  /** Total invocations, including the first. Default: 3. */
  maxAttempts: number;
  /** Initial delay in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Maximum computed delay between attempts in milliseconds. Default: 60000. */
  maxDelay: number;
  /** Exponential backoff factor. Default: 2. */
  backoffMultiplier: number;
  /** Whether to add random jitter (+/- 50%). Default: true. */
  jitter: boolean;
  /** Called before each backoff sleep with the error, retry number, and delay. */
  onRetry?: (error: LLMError, attempt: number, delay: number) => void;
  /** Aborts the pending sleep and any further attempts. */
  signal?: AbortSignal;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelay: 1000,
  maxDelay: 60000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/**
 * Calculate the delay for a given retry.
 *
 * `attempt` is 0-indexed (first retry = attempt 0).
 */
export function calculateDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelay" | "maxDelay" | "backoffMultiplier" | "jitter">,
): number {
  let delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );

  if (policy.jitter) {
    // +/- 50% jitter: multiply by a random value in [0.5, 1.5)
    const jitterFactor = 0.5 + Math.random();
    delay = delay * jitterFactor;
  }

  return delay;
}

/** Sleep that rejects with AbortedError as soon as `signal` fires. */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError("retry aborted", { cause: signal.reason }));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new AbortedError("retry aborted", { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Delay before the next attempt, honoring a vendor retry-after hint. */
function delayFor(error: LLMError, attempt: number, policy: RetryPolicy): number {
  if (error instanceof RateLimitError && error.retry_after != null && error.retry_after >= 0) {
    return error.retry_after * 1000;
  }
  return calculateDelay(attempt, policy);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Execute `fn` with automatic retries according to the given policy.
 *
 * Non-retryable errors, and anything that is not an LLMError, are re-thrown
 * immediately. After `maxAttempts` invocations the last error is thrown.
 */
export async function retry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...policy };
  const attempts = Math.max(1, p.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    if (p.signal?.aborted) {
      throw new AbortedError("retry aborted", { cause: p.signal.reason });
    }

    try {
      return await fn();
    } catch (err: unknown) {
      if (!(err instanceof LLMError) || !err.retryable || attempt >= attempts) {
        throw err;
      }

      const delay = delayFor(err, attempt - 1, p);
      p.onRetry?.(err, attempt - 1, delay);
      await sleep(delay, p.signal);
    }
  }
}
