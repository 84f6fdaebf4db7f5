import { LLMError } from "./errors";
import { logger } from "./logger";

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable?: (error: unknown) => boolean;
  wait?: (ms: number) => Promise<void>;
}

/** Rate limits and server errors are worth another try; everything else is final. */
export function isRetryableError(error: unknown): boolean {
  return error instanceof LLMError && error.retryable;
}

export function backoffCeiling(attempt: number, policy: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">): number {
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

/**
 * Calls `fn` up to `policy.attempts` times with full-jitter exponential
 * backoff. A non-retryable error is rethrown at once.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  context: string
): Promise<T> {
  const isRetryable = policy.isRetryable ?? isRetryableError;
  const wait = policy.wait ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || !isRetryable(error)) throw error;

      const delay = Math.round(Math.random() * backoffCeiling(attempt, policy));
      logger.warn(
        { context, attempt, delay, error: error instanceof Error ? error.message : String(error) },
        "Retrying after a retryable error"
      );
      await wait(delay);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
