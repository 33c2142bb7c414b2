import { hasFailed } from "../core/status";
import { pruneExpired } from "../core/tables";
import type { Policy, Store } from "../types";
import { definePolicy, resolveKey, type KeyOptions } from "./policy";

export interface ThrottleOptions<TArgs extends readonly unknown[]>
  extends KeyOptions<TArgs> {
  /** Window length in ms (default: 1000) */
  ms?: number;
  /** Forget the window when the action fails, so it can run again at once */
  removeLockOnError?: boolean;
  /** Run anyway and start a new window */
  ignoreThrottle?: boolean | ((...args: TArgs) => boolean);
}

/**
 * Runs the action at most once per window; dispatches inside the window
 * are aborted.
 *
 * @example
 * ```ts
 * const refresh = action<Feed>({ reduce: async () => ... })
 *   .use(throttle({ ms: 5000, removeLockOnError: true }));
 * ```
 */
export function throttle<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: ThrottleOptions<TArgs> = {}
): Policy<"gate", TArgs> {
  const ms = options.ms ?? 1000;

  return definePolicy<"gate", TArgs>("throttle", ["gate"], false, (action) => {
    const locks = action.store.policyTables.throttle;
    const key = resolveKey(action, options);
    const { ignoreThrottle } = options;

    return {
      abortDispatch() {
        const now = Date.now();
        const expiresAt = locks.get(key);
        const ignore =
          typeof ignoreThrottle === "function"
            ? ignoreThrottle(...action.args)
            : ignoreThrottle === true;

        if (ignore || expiresAt === undefined || expiresAt <= now) {
          locks.set(key, now + ms);
          return false;
        }
        return true;
      },
      after() {
        if (options.removeLockOnError && hasFailed(action.status)) {
          locks.delete(key);
        }
        pruneExpired(locks, Date.now());
      },
    };
  });
}

/** Ends the throttle window of one key. */
export function removeThrottleLock<St>(store: Store<St>, key: unknown): void {
  store.policyTables.throttle.delete(key);
}

export function removeAllThrottleLocks<St>(store: Store<St>): void {
  store.policyTables.throttle.clear();
}
