import { setTimeout as delay } from "node:timers/promises";

export interface RetryPolicy {
  attempts: number;
  delayMs: number;
}

export type SleepFn = (ms: number) => Promise<void>;

export interface WithRetryOptions {
  sleep?: SleepFn;
  onRetry?: (error: unknown, attempt: number, nextAttempt: number) => void;
  // Returning false rethrows the error without further attempts.
  shouldRetry?: (error: unknown) => boolean;
}

export const defaultRetryPolicy: RetryPolicy = {
  attempts: 1,
  delayMs: 0
};

export function resolveRetryPolicy(policy: Partial<RetryPolicy> = {}): RetryPolicy {
  const resolved: RetryPolicy = {
    attempts: policy.attempts ?? defaultRetryPolicy.attempts,
    delayMs: policy.delayMs ?? defaultRetryPolicy.delayMs
  };

  if (!Number.isInteger(resolved.attempts) || resolved.attempts < 1) {
    throw new Error("Invalid retry policy: attempts must be an integer of at least 1.");
  }

  if (!Number.isFinite(resolved.delayMs) || resolved.delayMs < 0) {
    throw new Error("Invalid retry policy: delayMs must be a non-negative number.");
  }

  return resolved;
}

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: WithRetryOptions = {}
): Promise<T> {
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt >= policy.attempts || options.shouldRetry?.(error) === false) {
        throw error;
      }

      options.onRetry?.(error, attempt, attempt + 1);
      if (policy.delayMs > 0) {
        await sleep(policy.delayMs);
      }
    }
  }
}

async function defaultSleep(ms: number): Promise<void> {
  await delay(ms);
}
