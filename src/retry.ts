// src/retry.ts
import { GraphApiError, isTransient } from "./errors.js";
import { delay } from "./utils.js";

export type RetryPolicy = {
  maxAttempts: number;
  multiplier: number;
  minWait: number;
  maxWait: number;
  /** Milliseconds per wait unit. */
  unitMs: number;
  isRetryable: (error: unknown) => boolean;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  multiplier: 1,
  minWait: 4,
  maxWait: 10,
  unitMs: 1000,
  isRetryable: isTransient,
};

export type RetryListener = (info: { attempt: number; delayMs: number; error: unknown }) => void;

/** Wait after the given (1-based) failed attempt: multiplier * 2^(attempt-1), clamped to [minWait, maxWait]. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const raw = policy.multiplier * 2 ** (attempt - 1);
  const clamped = Math.min(Math.max(raw, policy.minWait), policy.maxWait);
  return clamped * policy.unitMs;
}

export async function withRetry<T>(
  policy: RetryPolicy,
  operation: (attempt: number) => Promise<T>,
  onRetry?: RetryListener
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (error instanceof GraphApiError) error.attempts = attempt;
      if (attempt >= maxAttempts || !policy.isRetryable(error)) throw error;

      const delayMs = backoffDelay(attempt, policy);
      onRetry?.({ attempt, delayMs, error });
      await delay(delayMs);
    }
  }
}
