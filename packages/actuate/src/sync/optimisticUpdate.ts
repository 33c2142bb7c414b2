/**
 * Optimistic write, then reconcile with the server.
 */

import { actionKind } from "../core/action";
import { resolveEquality } from "../core/equality";
import { LOG_PREFIX } from "../dev";
import { NotImplementedError } from "../errors";
import { retryLoop, type RetryLoopOptions } from "../policies/backoff";
import type { Action, ActionSpec, Equality } from "../types";

/** What a failed save knows when deciding about the rollback. */
export interface RollbackInfo<V> {
  /** The value in the state when the action was dispatched. */
  readonly initialValue: V;
  readonly optimisticValue: V;
  /** What `saveValue` threw. */
  readonly error: unknown;
}

/** What the action knows when deciding about the reload. */
export interface ReloadInfo<V> {
  /** The value in the state right now. */
  readonly currentValue: V;
  /**
   * The last value this dispatch wrote: the optimistic value, the value
   * of the applied server response, or the rolled back value.
   */
  readonly lastAppliedValue: V;
  readonly optimisticValue: V;
  /** `undefined` when no rollback was applied. */
  readonly rollbackValue: V | undefined;
  /** null when the save succeeded. */
  readonly error: unknown;
}

export interface OptimisticUpdateOptions<St, TArgs extends readonly unknown[], V> {
  name?: string;
  /** The value to show right away and save. */
  newValue(action: Action<St, TArgs>): V;
  getValueFromState(state: St, action: Action<St, TArgs>): V;
  applyValueToState(state: St, value: V, action: Action<St, TArgs>): St;
  saveValue(value: V, action: Action<St, TArgs>): Promise<unknown>;
  /**
   * Applies what the server answered to `saveValue`. Return null to leave
   * the state alone.
   */
  applyServerResponseToState?(
    state: St,
    response: unknown,
    action: Action<St, TArgs>
  ): St | null | undefined;
  /**
   * Reads the value back once the save settles, successful or not.
   * May throw NotImplementedError.
   */
  reloadValue?(action: Action<St, TArgs>): Promise<V>;
  /** Decides whether the state still shows our value (default: "deep") */
  equals?: Equality<V>;
  /**
   * Retries `saveValue` alone. The optimistic value stays in the state
   * between attempts and is rolled back only after the last one fails.
   */
  retry?: RetryLoopOptions;
  /**
   * Whether a failed save rolls back. By default only while the state
   * still shows the optimistic value.
   */
  shouldRollback?(
    info: RollbackInfo<V> & { readonly currentValue: V },
    action: Action<St, TArgs>
  ): boolean;
  /**
   * The state to roll back to. Defaults to writing `initialValue` back
   * through `applyValueToState`; return null to skip the rollback.
   */
  rollbackState?(
    state: St,
    info: RollbackInfo<V>,
    action: Action<St, TArgs>
  ): St | null | undefined;
  /** Whether to call `reloadValue` (default: always). */
  shouldReload?(info: ReloadInfo<V>, action: Action<St, TArgs>): boolean;
  /** Whether to apply what `reloadValue` returned (default: always). */
  shouldApplyReload?(
    info: ReloadInfo<V> & { readonly reloadResult: V },
    action: Action<St, TArgs>
  ): boolean;
  /**
   * Applies the reload result. Defaults to `applyValueToState`; return
   * null to ignore the result.
   */
  applyReloadResultToState?(
    state: St,
    reloadResult: V,
    action: Action<St, TArgs>
  ): St | null | undefined;
}

interface Applied<V> {
  readonly optimisticValue: V;
  readonly lastAppliedValue: V;
  readonly rollbackValue: V | undefined;
  readonly failure: { readonly error: unknown } | undefined;
}

/**
 * Defines an action that shows a new value at once, saves it, and rolls
 * it back if the save fails.
 *
 * Each dispatch stands alone: concurrent dispatches each apply and save
 * their own value. A failed dispatch rolls back only while the state still
 * holds the value it wrote.
 *
 * @example
 * ```ts
 * const renameList = optimisticUpdate<AppState, [title: string], string>({
 *   name: "renameList",
 *   newValue: ({ args: [title] }) => title,
 *   getValueFromState: (state) => state.title,
 *   applyValueToState: (state, title) => ({ ...state, title }),
 *   saveValue: (title) => api.rename(title),
 *   reloadValue: () => api.title(),
 * });
 * ```
 */
export function optimisticUpdate<St, TArgs extends readonly unknown[], V>(
  options: OptimisticUpdateOptions<St, TArgs, V>
): ActionSpec<St, TArgs, "gate" | "retry" | "sync"> {
  const equals = resolveEquality(options.equals ?? "deep");

  const save = (value: V, action: Action<St, TArgs>): Promise<unknown> => {
    const retry = options.retry;
    return retry
      ? retryLoop(() => options.saveValue(value, action), retry)
      : options.saveValue(value, action);
  };

  const shouldRollback = (
    info: RollbackInfo<V> & { readonly currentValue: V },
    action: Action<St, TArgs>
  ) =>
    options.shouldRollback
      ? options.shouldRollback(info, action)
      : equals(info.currentValue, info.optimisticValue);

  const rollbackState = (state: St, info: RollbackInfo<V>, action: Action<St, TArgs>) =>
    options.rollbackState
      ? options.rollbackState(state, info, action)
      : options.applyValueToState(state, info.initialValue, action);

  const reload = async (action: Action<St, TArgs>, applied: Applied<V>) => {
    const { reloadValue } = options;
    if (!reloadValue) return;

    const info = (): ReloadInfo<V> => ({
      currentValue: options.getValueFromState(action.state, action),
      lastAppliedValue: applied.lastAppliedValue,
      optimisticValue: applied.optimisticValue,
      rollbackValue: applied.rollbackValue,
      error: applied.failure ? applied.failure.error : null,
    });
    if (options.shouldReload && !options.shouldReload(info(), action)) return;

    try {
      const reloadResult = await reloadValue(action);
      if (
        options.shouldApplyReload &&
        !options.shouldApplyReload({ ...info(), reloadResult }, action)
      ) {
        return;
      }
      const next = options.applyReloadResultToState
        ? options.applyReloadResultToState(action.state, reloadResult, action)
        : options.applyValueToState(action.state, reloadResult, action);
      if (next !== null && next !== undefined) action.dispatchState(next);
    } catch (error) {
      if (error instanceof NotImplementedError) return;
      // A failed save stays the error the dispatcher sees.
      if (!applied.failure) throw error;
      action.store.logger.error(
        `${LOG_PREFIX} ${action.name} could not reload after a failed save.`,
        error
      );
    }
  };

  return actionKind<St, TArgs, "gate" | "retry" | "sync">(
    "optimisticUpdate",
    ["gate", "retry", "sync"],
    {
      name: options.name,
      async reduce(action) {
        const optimisticValue = options.newValue(action);
        action.dispatchState(
          options.applyValueToState(action.state, optimisticValue, action)
        );

        let lastAppliedValue = optimisticValue;
        let rollbackValue: V | undefined;
        let failure: { error: unknown } | undefined;
        try {
          const response = await save(optimisticValue, action);
          const apply = options.applyServerResponseToState;
          if (apply && response !== null && response !== undefined) {
            const next = apply(action.state, response, action);
            if (next !== null && next !== undefined) {
              action.dispatchState(next);
              lastAppliedValue = options.getValueFromState(next, action);
            }
          }
        } catch (error) {
          failure = { error };
          const info: RollbackInfo<V> = {
            initialValue: options.getValueFromState(action.initialState, action),
            optimisticValue,
            error,
          };
          const currentValue = options.getValueFromState(action.state, action);
          if (shouldRollback({ ...info, currentValue }, action)) {
            const next = rollbackState(action.state, info, action);
            if (next !== null && next !== undefined) {
              action.dispatchState(next);
              rollbackValue = options.getValueFromState(next, action);
              lastAppliedValue = rollbackValue;
            }
          }
        }

        await reload(action, { optimisticValue, lastAppliedValue, rollbackValue, failure });
        if (failure) throw failure.error;
        return null;
      },
    }
  );
}
