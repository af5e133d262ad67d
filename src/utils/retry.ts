import { GameDataError, RetryExhaustedError, describeError } from './errors.js';
import { log } from './log.js';

export interface RetryPolicy {
  attempts: number;
  baseDelayMs: number;
  factor: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 5,
  baseDelayMs: 1000,
  factor: 2
};

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.round(policy.baseDelayMs * Math.pow(policy.factor, attempt - 1));
}

export function isRetryable(error: unknown): boolean {
  if (error instanceof GameDataError) return error.retryable;
  return true;
}

/**
 * Runs `fn` until it resolves or the policy's attempt budget is spent.
 * Errors flagged as permanent stop the loop at once. Either way the caller
 * receives a `RetryExhaustedError` carrying the last cause.
 */
export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  wait: Sleep = sleep
): Promise<T> {
  const attempts = Math.max(1, Math.floor(policy.attempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!isRetryable(error)) {
        throw new RetryExhaustedError(label, attempt, error);
      }
      if (attempt < attempts) {
        const delay = backoffDelay(policy, attempt);
        log.warn('Call failed, retrying', {
          label,
          attempt,
          attempts,
          delayMs: delay,
          error: describeError(error)
        });
        await wait(delay);
      }
    }
  }

  throw new RetryExhaustedError(label, attempts, lastError);
}
