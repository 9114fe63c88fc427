import { setTimeout as sleep } from "node:timers/promises";
import type { RetryPolicy } from "../config/env.js";
import { isRetryableError } from "../domain/errors.js";

export interface RetryOptions {
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  random?: () => number;
}

/**
 * Runs `task` until it succeeds, the error is not retryable, or
 * `policy.maxAttempts` is reached. Delays grow exponentially from
 * `baseDelayMs`, are capped at `maxDelayMs`, and use full jitter.
 */
export async function withRetry<T>(
  task: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions = {},
): Promise<T> {
  const isRetryable = options.isRetryable ?? isRetryableError;
  const random = options.random ?? Math.random;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !isRetryable(error)) {
        throw error;
      }
      const delayMs = computeBackoffDelay(attempt, policy, random);
      options.onRetry?.({ attempt, delayMs, error });
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
}

export function computeBackoffDelay(
  attempt: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.round(ceiling * random());
}
