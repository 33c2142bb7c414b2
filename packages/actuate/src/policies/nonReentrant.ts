import type { Policy } from "../types";
import { definePolicy, resolveKey, type KeyOptions } from "./policy";

/**
 * Drops a dispatch while another one with the same key is still running.
 *
 * @example
 * ```ts
 * const save = action<AppState>({ reduce: async () => ... }).use(nonReentrant());
 * store.dispatch(save());
 * store.dispatch(save()); // aborted while the first is in flight
 * ```
 */
export function nonReentrant<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: KeyOptions<TArgs> = {}
): Policy<"gate", TArgs> {
  return definePolicy<"gate", TArgs>("nonReentrant", ["gate"], false, (action) => {
    const running = action.store.policyTables.nonReentrant;
    const key = resolveKey(action, options);
    let holdsKey = false;

    return {
      abortDispatch() {
        if (!running.add(key)) return true;
        holdsKey = true;
        return false;
      },
      after() {
        if (holdsKey) running.delete(key);
      },
    };
  });
}
