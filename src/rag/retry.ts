import { setTimeout as delay } from "node:timers/promises";
import { isTransient } from "./errors.js";

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  retryable?: (err: unknown) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

/**
 * Runs `fn` until it succeeds, the error is not retryable, or `attempts` runs out.
 * The delay doubles after each failure: base, 2*base, 4*base...
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const retryable = options.retryable ?? isTransient;
  const maxDelay = options.maxDelayMs ?? 30_000;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= options.attempts || !retryable(err) || options.signal?.aborted) {
        throw err;
      }
      const waitMs = Math.min(options.baseDelayMs * 2 ** (attempt - 1), maxDelay);
      options.onRetry?.(err, attempt, waitMs);
      await delay(waitMs, undefined, { signal: options.signal });
    }
  }
}

/** Combines the caller's signal with a per-call timeout. */
export function timeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, timeout]) : timeout;
}
