/**
 * Caller-side retry helper with exponential backoff and jitter.
 *
 * The client itself never retries: the protocol is stateless and retry
 * policy belongs to the integration layer. Callers that want one wrap
 * `responder.respond(...)` in `withRetry`.
 */

import { SDKError, HttpError } from "../types/index.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RetryPolicy {
  /** Retries after the initial attempt. Default: 2. */
  maxRetries: number;
  /** Initial delay in milliseconds. Default: 1000. */
  baseDelay: number;
  /** Ceiling for any single delay in milliseconds. Default: 30000. */
  maxDelay: number;
  /** Default: 2. */
  backoffMultiplier: number;
  /** Multiply each delay by a random factor in [0.5, 1.5). Default: true. */
  jitter: boolean;
  /** Called before each wait with the error, attempt (0-based) and delay. */
  onRetry?: (error: SDKError, attempt: number, delay: number) => void;
  /** Injected for tests. Default: setTimeout-based sleep. */
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_POLICY: RetryPolicy = {
  maxRetries: 2,
  baseDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Backoff for a 0-based retry attempt, before any Retry-After override. */
export function calculateDelay(
  attempt: number,
  policy: Pick<RetryPolicy, "baseDelay" | "maxDelay" | "backoffMultiplier" | "jitter">,
): number {
  const delay = Math.min(
    policy.baseDelay * Math.pow(policy.backoffMultiplier, attempt),
    policy.maxDelay,
  );
  return policy.jitter ? delay * (0.5 + Math.random()) : delay;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Run `fn`, retrying SDK errors flagged `retryable`.
 *
 * A `retry_after` hint from an HttpError replaces the computed backoff; when
 * it exceeds `maxDelay` the error is rethrown instead of waiting. Anything
 * that is not an SDKError is rethrown untouched.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  policy?: Partial<RetryPolicy>,
): Promise<T> {
  const p: RetryPolicy = { ...DEFAULT_POLICY, ...policy };
  const sleep = p.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (!(err instanceof SDKError) || !err.retryable || attempt >= p.maxRetries) {
        throw err;
      }

      let delay = calculateDelay(attempt, p);
      if (err instanceof HttpError && err.retry_after != null && err.retry_after > 0) {
        const retryAfterMs = err.retry_after * 1000;
        if (retryAfterMs > p.maxDelay) {
          throw err;
        }
        delay = retryAfterMs;
      }

      p.onRetry?.(err, attempt, delay);
      await sleep(delay);
    }
  }
}
