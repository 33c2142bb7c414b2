import type { ActionStatus, ActionStatusFields } from "../types";

const EMPTY: ActionStatusFields = {
  isDispatched: false,
  isDispatchAborted: false,
  hasFinishedMethodBefore: false,
  hasFinishedMethodReduce: false,
  hasFinishedMethodAfter: false,
  hasError: false,
  originalError: undefined,
  wrappedError: undefined,
};

/**
 * Creates an immutable action status. Every pipeline step produces a new
 * one through `copy`.
 *
 * @example
 * ```ts
 * const status = await store.dispatchAndWait(saveTodo(todo));
 * if (status.isCompletedFailed) {
 *   console.warn(status.wrappedError);
 * }
 * ```
 */
export function actionStatus(
  fields: Partial<ActionStatusFields> = {}
): ActionStatus {
  const values: ActionStatusFields = { ...EMPTY, ...fields };
  const failed = values.hasError;

  return Object.freeze({
    ...values,
    isCompleted: values.hasFinishedMethodAfter,
    isCompletedOk: values.hasFinishedMethodAfter && !failed,
    isCompletedFailed: values.hasFinishedMethodAfter && failed,
    copy: (patch: Partial<ActionStatusFields>) =>
      actionStatus({ ...values, ...patch }),
  });
}

/** Whether `before` or `reduce` threw (abort sentinels excluded). */
export function hasFailed(status: ActionStatus): boolean {
  return status.hasError;
}
