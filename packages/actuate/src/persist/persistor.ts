/**
 * Persistence backends.
 *
 * The store never decides how state is stored; it hands every new state to
 * a Persistor through a throttled writer (see processPersistence).
 */

import type { Logger } from "../types";
import { LOG_PREFIX } from "../dev";

export interface PersistChange<St> {
  /** `undefined` when nothing has been persisted yet. */
  readonly lastPersistedState: St | undefined;
  readonly newState: St;
}

export interface Persistor<St> {
  /** The persisted state, or `undefined` when there is none. */
  readState(): Promise<St | undefined>;

  deleteState(): Promise<void>;

  /**
   * Write `newState`. Backends that store diffs may compare it against
   * `lastPersistedState`.
   */
  persistDifference(change: PersistChange<St>): Promise<void>;

  /** Defaults to `persistDifference` from nothing. */
  saveInitialState?(state: St): Promise<void>;

  /**
   * Minimum milliseconds between two writes (default: 2000).
   * `null` writes every change.
   */
  readonly throttle?: number | null;
}

export const DEFAULT_PERSIST_THROTTLE = 2000;

export function resolveThrottle(persistor: {
  readonly throttle?: number | null;
}): number {
  if (persistor.throttle === null) return 0;
  return persistor.throttle ?? DEFAULT_PERSIST_THROTTLE;
}

/**
 * Logs every call before delegating to `persistor`.
 *
 * @example
 * ```ts
 * const app = store({ state, persistor: loggingPersistor(filePersistor) });
 * ```
 */
export function loggingPersistor<St>(
  persistor: Persistor<St>,
  logger: Logger = console
): Persistor<St> {
  return {
    throttle: persistor.throttle,
    readState() {
      logger.log(`${LOG_PREFIX} Persistor: read state.`);
      return persistor.readState();
    },
    deleteState() {
      logger.log(`${LOG_PREFIX} Persistor: delete state.`);
      return persistor.deleteState();
    },
    persistDifference(change) {
      logger.log(`${LOG_PREFIX} Persistor: persist difference.`, change.newState);
      return persistor.persistDifference(change);
    },
    saveInitialState(state) {
      logger.log(`${LOG_PREFIX} Persistor: save initial state.`, state);
      return persistor.saveInitialState
        ? persistor.saveInitialState(state)
        : persistor.persistDifference({ lastPersistedState: undefined, newState: state });
    },
  };
}

/**
 * A persistor that stores nothing and reads nothing.
 */
export function noopPersistor<St>(): Persistor<St> {
  return {
    throttle: null,
    readState: async () => undefined,
    deleteState: async () => {},
    persistDifference: async () => {},
  };
}
