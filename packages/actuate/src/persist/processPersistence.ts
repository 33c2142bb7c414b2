/**
 * Throttled writer between the store and a Persistor.
 *
 * - At most one write is in flight; states arriving meanwhile are coalesced
 *   and written when it completes.
 * - Outside the throttle window a state is written at once; inside it a
 *   single timer writes the newest state when the window ends.
 * - A `persistNow()` action skips the window.
 */

import { isPersistNow } from "../core/builtins";
import { LOG_PREFIX } from "../dev";
import { PersistError } from "../errors";
import type { Action, Logger } from "../types";
import { safely } from "../utils/safely";
import { resolveThrottle, type Persistor } from "./persistor";

export interface ProcessPersistenceOptions {
  /** Called when a backend call fails (default: log through `logger`) */
  onError?: (error: PersistError) => void;
  logger?: Logger;
}

export interface ProcessPersistence<St> {
  /**
   * Offer a new state. Returns true when a write started right now.
   */
  process(action: Action<St> | undefined, newState: St): boolean;
  pause(): void;
  /** Pause, writing the newest state first if it was never written. */
  persistAndPause(): void;
  resume(): void;
  saveInitialState(state: St): Promise<void>;
  readState(): Promise<St | undefined>;
  deleteState(): Promise<void>;
  readonly lastPersistedState: St | undefined;
  readonly isPersisting: boolean;
  readonly isPaused: boolean;
  /** Cancel the pending timer and stop writing for good. */
  dispose(): void;
}

export function processPersistence<St>(
  persistor: Persistor<St>,
  initialState: St | undefined,
  options: ProcessPersistenceOptions = {}
): ProcessPersistence<St> {
  const logger = options.logger ?? console;
  const onError =
    options.onError ??
    ((error: PersistError) =>
      logger.error(`${LOG_PREFIX} ${error.message}`, error.cause));
  const report = (error: PersistError) =>
    safely(
      () => onError(error),
      (thrown) => logger.error(`${LOG_PREFIX} onPersistError threw.`, thrown)
    );
  const throttle = resolveThrottle(persistor);

  let lastPersistedState = initialState;
  let newest: { value: St } | undefined;
  let isPersisting = false;
  let newStateAvailable = false;
  let lastPersistTime = Date.now();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let isPaused = false;
  let disposed = false;

  const cancelTimer = () => {
    if (timer !== undefined) {
      clearTimeout(timer);
      timer = undefined;
    }
  };

  const persist = async (now: number, newState: St): Promise<void> => {
    isPersisting = true;
    lastPersistTime = now;
    newStateAvailable = false;
    try {
      await persistor.persistDifference({ lastPersistedState, newState });
    } catch (error) {
      report(new PersistError("persist", error));
    } finally {
      lastPersistedState = newState;
      isPersisting = false;
      if (newStateAvailable && newest) {
        newStateAvailable = false;
        process(undefined, newest.value);
      }
    }
  };

  function process(action: Action<St> | undefined, newState: St): boolean {
    if (disposed) return false;
    newest = { value: newState };
    if (isPaused || Object.is(lastPersistedState, newState)) return false;

    if (isPersisting) {
      newStateAvailable = true;
      return false;
    }

    const now = Date.now();
    const elapsed = now - lastPersistTime;
    if (elapsed >= throttle || (action !== undefined && isPersistNow(action))) {
      cancelTimer();
      void persist(now, newState);
      return true;
    }

    if (timer === undefined) {
      timer = setTimeout(() => {
        timer = undefined;
        if (newest) process(undefined, newest.value);
      }, throttle - elapsed);
    }
    return false;
  }

  return {
    process,
    pause() {
      isPaused = true;
    },
    persistAndPause() {
      isPaused = true;
      cancelTimer();
      if (newest && !isPersisting && !Object.is(lastPersistedState, newest.value)) {
        void persist(Date.now(), newest.value);
      }
    },
    resume() {
      isPaused = false;
      if (newest) process(undefined, newest.value);
    },
    async saveInitialState(state) {
      lastPersistedState = state;
      try {
        await (persistor.saveInitialState
          ? persistor.saveInitialState(state)
          : persistor.persistDifference({ lastPersistedState: undefined, newState: state }));
      } catch (error) {
        throw new PersistError("saveInitial", error);
      }
    },
    async readState() {
      let state: St | undefined;
      try {
        state = await persistor.readState();
      } catch (error) {
        throw new PersistError("read", error);
      }
      lastPersistedState = state;
      return state;
    },
    async deleteState() {
      lastPersistedState = undefined;
      try {
        await persistor.deleteState();
      } catch (error) {
        throw new PersistError("delete", error);
      }
    },
    get lastPersistedState() {
      return lastPersistedState;
    },
    get isPersisting() {
      return isPersisting;
    },
    get isPaused() {
      return isPaused;
    },
    dispose() {
      disposed = true;
      newest = undefined;
      cancelTimer();
    },
  };
}
