/**
 * Ready-made observers.
 */

import { LOG_PREFIX } from "../dev";
import type { ActionObserver, ErrorObserver, Logger } from "../types";

/**
 * Logs one line when an action starts and one when it ends.
 *
 * ```
 * [actuate] ▶ loadUser #3
 * [actuate] ◀ loadUser #3 ok
 * ```
 */
export function logActions<St>(logger: Logger = console): ActionObserver<St> {
  return (action, dispatchCount, ini) => {
    if (ini) {
      logger.log(`${LOG_PREFIX} ▶ ${action.name} #${dispatchCount}`);
      return;
    }
    const { status } = action;
    const outcome = status.isDispatchAborted
      ? "aborted"
      : status.hasError
      ? "failed"
      : "ok";
    logger.log(`${LOG_PREFIX} ◀ ${action.name} #${dispatchCount} ${outcome}`);
  };
}

/** Logs the error, then rethrows it to the dispatcher. */
export function logAndRethrowErrors<St>(logger: Logger = console): ErrorObserver<St> {
  return (error, action) => {
    logger.error(`${LOG_PREFIX} ${action.name} failed.`, error);
    return true;
  };
}

/** Never rethrows; user errors are still queued. */
export function swallowErrors<St>(): ErrorObserver<St> {
  return () => false;
}
