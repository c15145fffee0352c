// src/retry.ts
// Bounded exponential backoff for transient collaborator failures.

import type { Clock } from './clock';
import { systemClock } from './clock';
import { isRetryableError } from './errors';

export interface RetryOptions {
  attempts?: number;        // Total tries, including the first
  baseDelayMs?: number;     // Delay before the second try; doubles after that
  maxTotalDelayMs?: number; // Cap on cumulative sleep across all retries
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  clock?: Clock;
}

/**
 * Runs `operation`, retrying retryable failures with exponential delay.
 * The last error is re-thrown once attempts or the total delay budget run out.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? 3);
  const baseDelayMs = options.baseDelayMs ?? 1000;
  const maxTotalDelayMs = options.maxTotalDelayMs ?? 30_000;
  const isRetryable = options.isRetryable ?? isRetryableError;
  const clock = options.clock ?? systemClock;

  let slept = 0;
  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation();
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        throw error;
      }
      const delayMs = Math.min(baseDelayMs * 2 ** (attempt - 1), maxTotalDelayMs - slept);
      if (delayMs < 0 || (delayMs === 0 && baseDelayMs > 0)) {
        throw error;
      }
      options.onRetry?.(error, attempt, delayMs);
      await clock.sleep(delayMs);
      slept += delayMs;
    }
  }
}
