import type { Policy } from "../types";
import { retryLoop, type RetryLoopOptions } from "./backoff";
import { definePolicy } from "./policy";

export type RetryOptions = RetryLoopOptions;

/**
 * Retries a failing reducer with exponential backoff. Only `reduce` is
 * retried; a failing `before` ends the dispatch.
 *
 * @example
 * ```ts
 * // attempts at 0, 350, 1050 and 2450 ms, then gives up
 * const load = action<AppState>({ reduce: async () => ... }).use(retry());
 * ```
 */
export function retry<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: RetryOptions = {}
): Policy<"reduceLoop" | "retry", TArgs> {
  return definePolicy<"reduceLoop" | "retry", TArgs>(
    options.maxRetries !== undefined && options.maxRetries < 0
      ? "unlimitedRetries"
      : "retry",
    ["reduceLoop", "retry"],
    true,
    () => ({
      wrapReduce: (next) => retryLoop(next, options),
    })
  );
}

/**
 * Retries until the reducer succeeds. `dispatchAndWait` may never resolve.
 */
export function unlimitedRetries<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: Omit<RetryOptions, "maxRetries"> = {}
): Policy<"reduceLoop" | "retry", TArgs> {
  return retry<TArgs>({ ...options, maxRetries: -1 });
}
