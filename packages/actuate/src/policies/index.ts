/**
 * Concurrency-control policies, layered onto actions with `.use()`.
 *
 * ```ts
 * import { throttle, retry } from "actuate/policies";
 *
 * const refresh = action<Feed>({ reduce: async () => ... })
 *   .use(throttle({ ms: 5000 }))
 *   .use(retry({ maxRetries: 2 }));
 * ```
 */

export { definePolicy, resolveKey, type KeyOptions } from "./policy";
export { nonReentrant } from "./nonReentrant";
export {
  throttle,
  removeThrottleLock,
  removeAllThrottleLocks,
  type ThrottleOptions,
} from "./throttle";
export { debounce, type DebounceOptions } from "./debounce";
export {
  backoff,
  retryLoop,
  type Backoff,
  type BackoffOptions,
  type RetryLoopOptions,
} from "./backoff";
export { retry, unlimitedRetries, type RetryOptions } from "./retry";
export {
  checkInternet,
  noDialog,
  abortWhenNoInternet,
  unlimitedRetryCheckInternet,
  type CheckInternetOptions,
  type UnlimitedRetryCheckInternetOptions,
} from "./connectivity";
export {
  fresh,
  removeFreshKey,
  removeAllFreshKeys,
  type FreshOptions,
} from "./fresh";
