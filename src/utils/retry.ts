import { sleep } from "./abort.js";

type ErrorClass = abstract new (...args: never[]) => Error;

export interface RetryOptions {
  maxAttempts: number;
  initialDelayMs: number;
  backoffMultiplier: number;
  maxDelayMs: number;
  /** When set, only these error classes are retried. */
  retryOn?: ErrorClass[];
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 2,
  initialDelayMs: 500,
  backoffMultiplier: 2,
  maxDelayMs: 5_000,
};

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const resolved = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let delayMs = resolved.initialDelayMs;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await fn(attempt);
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));

      if (resolved.retryOn && !resolved.retryOn.some((cls) => error instanceof cls)) {
        throw error;
      }
      if (attempt >= resolved.maxAttempts || resolved.signal?.aborted) {
        throw error;
      }

      resolved.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, resolved.signal);
      delayMs = Math.min(delayMs * resolved.backoffMultiplier, resolved.maxDelayMs);
    }
  }
}
