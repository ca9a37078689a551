/**
 * Retry with exponential backoff for batch dispatch
 *
 * A batch is sent again only when the failure says the Ollama server is
 * overloaded or unreachable (timeouts, network errors, 429, 5xx). Anything
 * else, a 404 for a model that was never pulled included, fails at once.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

import { BatchDispatchError } from '../services/extraction/errors.js';
import { isServerError } from '../services/llm/circuit-breaker.js';

export interface RetryPolicy {
  /** Total attempts, the first one included */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Share of the delay added or taken away at random */
  jitterFraction: number;
}

export const DISPATCH_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterFraction: 0.25,
};

/**
 * Whether a failed dispatch is worth another attempt
 */
export function isRetryableDispatchError(error: unknown): boolean {
  return error instanceof BatchDispatchError && isServerError(error);
}

/**
 * Delay before retry number `retry` (0 for the first retry):
 * min(base * 2^retry, max) +/- jitter, never negative.
 */
export function retryDelayMs(retry: number, policy: RetryPolicy): number {
  const capped = Math.min(policy.baseDelayMs * 2 ** retry, policy.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * capped * policy.jitterFraction;
  return Math.max(0, Math.round(capped + jitter));
}

export interface RetryOptions {
  policy: RetryPolicy;
  /** What is being retried, e.g. "call-1 batch 3", for the log */
  label: string;
  shouldRetry?: (error: unknown) => boolean;
}

/**
 * Run `fn` until it succeeds, throws a non-retryable error, or the policy's
 * attempts are used up. The last error is rethrown.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const { policy, label } = options;
  const shouldRetry = options.shouldRetry ?? isRetryableDispatchError;
  const attempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= attempts || !shouldRetry(error)) throw error;
      const delay = retryDelayMs(attempt - 1, policy);
      const reason = error instanceof Error ? error.message : String(error);
      console.error(
        `[Backoff] ${label}: attempt ${attempt}/${attempts} failed (${reason}), retrying in ${delay}ms`
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
