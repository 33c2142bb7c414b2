/**
 * Actions the store itself dispatches.
 */

import type { Action, ReduceResult } from "../types";
import { action } from "./action";

/**
 * Replaces the state with whatever `reducer` returns.
 * Returning the same state (or null) changes nothing.
 *
 * @example
 * ```ts
 * store.dispatch(updateState((s) => ({ ...s, draft: "" })));
 * ```
 */
export function updateState<St>(
  reducer: (state: St) => ReduceResult<St>
): Action<St, []> {
  return action<St>({
    name: "updateState",
    reduce: ({ state }) => reducer(state),
  })();
}

const persistNowSpec = action<never>({
  name: "persistNow",
  reduce: () => null,
});

/**
 * Dispatch to make a throttled persistor write the current state right away.
 */
export function persistNow(): Action<never, []> {
  return persistNowSpec();
}

export function isPersistNow(target: Action<unknown>): boolean {
  return target.type === persistNowSpec;
}
