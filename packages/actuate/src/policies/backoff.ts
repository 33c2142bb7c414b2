/**
 * Exponential backoff, shared by every retrying policy and action kind.
 */

import type { MaybePromise } from "../types";
import { delay } from "../utils/delay";

export interface BackoffOptions {
  /** Delay before the first retry in ms (default: 350) */
  initialDelay?: number;
  /** Growth factor per retry; values <= 1 become 2 (default: 2) */
  multiplier?: number;
  /** Retries after the first attempt; negative means unlimited (default: 3) */
  maxRetries?: number;
  /** Upper bound for any delay in ms (default: 5000) */
  maxDelay?: number;
}

export interface Backoff {
  /** Failed attempts so far. */
  readonly attempts: number;
  /** Records a failure; false once retries are used up. */
  fail(): boolean;
  /** Delay before the next attempt, never above `cap`. */
  nextDelay(cap?: number): number;
}

export function backoff(options: BackoffOptions = {}): Backoff {
  const initialDelay = options.initialDelay ?? 350;
  const multiplier =
    options.multiplier === undefined || options.multiplier <= 1
      ? 2
      : options.multiplier;
  const maxRetries = options.maxRetries ?? 3;
  const maxDelay = options.maxDelay ?? 5000;

  let attempts = 0;
  let current: number | undefined;

  return {
    get attempts() {
      return attempts;
    },
    fail() {
      attempts++;
      return maxRetries < 0 || attempts <= maxRetries;
    },
    nextDelay(cap = maxDelay) {
      current = current === undefined ? initialDelay : current * multiplier;
      current = Math.min(current, maxDelay, cap);
      return current;
    },
  };
}

export interface RetryLoopOptions extends BackoffOptions {
  /** Called before waiting for each retry. */
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

/**
 * Calls `operation` until it succeeds or the retries run out; the last
 * error is thrown.
 *
 * @example
 * ```ts
 * const user = await retryLoop(() => api.getUser(id), { maxRetries: 5 });
 * ```
 */
export async function retryLoop<T>(
  operation: () => MaybePromise<T>,
  options: RetryLoopOptions = {}
): Promise<T> {
  const state = backoff(options);
  for (;;) {
    try {
      return await operation();
    } catch (error) {
      if (!state.fail()) throw error;
      const wait = state.nextDelay();
      options.onRetry?.(state.attempts, error, wait);
      await delay(wait);
    }
  }
}
