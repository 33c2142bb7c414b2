import type { Policy } from "../types";
import { delay } from "../utils/delay";
import { definePolicy, resolveKey, type KeyOptions } from "./policy";

export interface DebounceOptions<TArgs extends readonly unknown[]>
  extends KeyOptions<TArgs> {
  /** Quiet period in ms (default: 333) */
  ms?: number;
}

/**
 * Runs the reducer only once no other dispatch with the same key has
 * arrived for `ms`. Superseded dispatches complete without touching state.
 *
 * @example
 * ```ts
 * const search = action<AppState, [query: string]>({ reduce: async ... })
 *   .use(debounce({ ms: 300 }));
 * ```
 */
export function debounce<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: DebounceOptions<TArgs> = {}
): Policy<"reduceLoop", TArgs> {
  const ms = options.ms ?? 333;

  return definePolicy<"reduceLoop", TArgs>("debounce", ["reduceLoop"], true, (action) => {
    const runs = action.store.policyTables.debounce;
    const key = resolveKey(action, options);

    return {
      async wrapReduce(next) {
        const previous = runs.get(key) ?? 0;
        const mine = previous >= Number.MAX_SAFE_INTEGER ? 0 : previous + 1;
        runs.set(key, mine);

        await delay(ms);

        if (runs.get(key) !== mine) return null;
        runs.delete(key);
        return next();
      },
    };
  });
}
