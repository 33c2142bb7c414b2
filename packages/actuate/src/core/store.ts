/**
 * The store: one state cell, one dispatch pipeline.
 *
 * Pipeline for every dispatched action:
 *   bind -> abortDispatch -> before -> reduce (wrapped by policies)
 *   -> register state -> after -> error processing -> observers
 *
 * An action whose hooks are all synchronous runs to completion inside
 * `dispatch` and gets its status back directly; any suspending hook sends
 * it down the async path and `dispatch` returns a Promise.
 */

import { dev, LOG_PREFIX } from "../dev";
import { emitter } from "../emitter";
import {
  AbortDispatchError,
  StoreError,
  TimeoutError,
  UserError,
  type PersistError,
} from "../errors";
import {
  connectivityService,
  hasConnection,
  type ConnectivityService,
} from "../network/connectivity";
import type { Persistor } from "../persist/persistor";
import { processPersistence } from "../persist/processPersistence";
import {
  ACTION_RUNTIME,
  ACTUATE_TYPE,
  type Action,
  type ActionObserver,
  type ActionRuntime,
  type ActionStatus,
  type ActionType,
  type DispatchOptions,
  type ErrorObserver,
  type GlobalWrapError,
  type GlobalWrapReduce,
  type Logger,
  type ReduceResult,
  type StateObserver,
  type Store,
  type WaitTarget,
} from "../types";
import { isPromiseLike } from "../utils/isPromiseLike";
import { safely } from "../utils/safely";
import { updateState } from "./builtins";
import { generateStoreName } from "./generator";
import { policyTables } from "./tables";

// =============================================================================
// Options
// =============================================================================

export interface StoreOptions<St> {
  /** Initial state */
  state: St;
  /** Display name for logs (default: auto-generated) */
  name?: string;
  /** Where the store and its policies log (default: console) */
  logger?: Logger;
  /** Notified when an action starts (`ini: true`) and ends (`ini: false`) */
  actionObservers?: readonly ActionObserver<St>[];
  /** Notified after every reduce and every failure */
  stateObservers?: readonly StateObserver<St>[];
  /**
   * Decides whether an error is rethrown to the dispatcher.
   * Without one, everything except UserError is rethrown.
   */
  errorObserver?: ErrorObserver<St>;
  /** Runs after the action's own `wrapError` */
  globalWrapError?: GlobalWrapError<St>;
  /** Post-processes every new state before it is stored */
  wrapReduce?: GlobalWrapReduce<St>;
  persistor?: Persistor<St>;
  onPersistError?: (error: PersistError) => void;
  /** Capacity of the user-facing error queue; oldest are dropped (default: 10) */
  maxErrorsQueued?: number;
  /** Connectivity check for the Internet-aware policies (default: always online) */
  connectivity?: ConnectivityService;
}

function isInstance<St>(target: ActionType | Action<St>): target is Action<St> {
  return ACTION_RUNTIME in target;
}

function isTargetList<St>(
  target: WaitTarget<St>
): target is readonly (ActionType | Action<St>)[] {
  return Array.isArray(target);
}

// =============================================================================
// Store Factory
// =============================================================================

/**
 * Create a store.
 *
 * @example
 * ```ts
 * const counter = store({ state: { count: 0 } });
 *
 * counter.dispatch(increment(1));
 * await counter.dispatchAndWait(loadCount());
 * ```
 */
export function store<St>(options: StoreOptions<St>): Store<St> {
  const name = options.name ?? generateStoreName();
  const logger = options.logger ?? console;
  const maxErrorsQueued = options.maxErrorsQueued ?? 10;
  const connectivity = options.connectivity ?? connectivityService();
  const tables = policyTables();
  const inProgress = new Set<Action<St>>();
  const errorQueue: UserError[] = [];
  /** Rejects a pending waitCondition. */
  const waiters = new Set<(error: unknown) => void>();

  const report = (what: string) => (error: unknown) =>
    logger.error(`${LOG_PREFIX} ${what} threw an error.`, error);

  const changes = emitter<St>(report("State listener"));
  const userErrors = emitter<UserError>(report("Error listener"));
  const persistence = options.persistor
    ? processPersistence(options.persistor, options.state, {
        onError: options.onPersistError,
        logger,
      })
    : undefined;

  let state = options.state;
  let stateTimestamp = Date.now();
  let dispatchCount = 0;
  let reduceCount = 0;
  let isShutdown = false;
  let internetSimulation: boolean | undefined;

  // ===========================================================================
  // Observers
  // ===========================================================================

  const notifyActionObservers = (action: Action<St>, ini: boolean) => {
    options.actionObservers?.forEach((observer) =>
      safely(() => observer(action, dispatchCount, ini), report("Action observer"))
    );
  };

  const notifyStateObservers = (
    action: Action<St>,
    prevState: St,
    newState: St,
    error: unknown
  ) => {
    options.stateObservers?.forEach((observer) =>
      safely(
        () => observer(action, prevState, newState, error, dispatchCount),
        report("State observer")
      )
    );
  };

  // ===========================================================================
  // Pipeline
  // ===========================================================================

  /** Binds the action and runs abortDispatch. False means "do not run". */
  const admit = (action: Action<St>, run: ActionRuntime<St>): boolean => {
    run.bind(self);
    if (isShutdown) {
      dev.warn(`${action.name} was dispatched after ${name} shut down; ignored.`);
      return false;
    }

    if (run.abortDispatch()) {
      run.setStatus(action.status.copy({ isDispatchAborted: true }));
      notifyActionObservers(action, false);
      return false;
    }

    dispatchCount++;
    inProgress.add(action);
    notifyActionObservers(action, true);
    return true;
  };

  const registerState = (
    action: Action<St>,
    result: ReduceResult<St>,
    notify: boolean
  ) => {
    if (isShutdown) return;
    const prevState = state;

    if (result !== null && result !== undefined) {
      const next = options.wrapReduce
        ? options.wrapReduce(prevState, result, action)
        : result;
      if (!Object.is(next, state)) {
        state = next;
        stateTimestamp = Date.now();
        if (notify) changes.emit(state);
      }
    }

    notifyStateObservers(action, prevState, state, undefined);
    persistence?.process(action, state);
  };

  const runAfter = (action: Action<St>, run: ActionRuntime<St>) => {
    if (action.status.hasFinishedMethodAfter) return;
    run.after();
    run.setStatus(action.status.copy({ hasFinishedMethodAfter: true }));
  };

  const queueError = (error: UserError) => {
    errorQueue.push(error);
    while (errorQueue.length > maxErrorsQueued) errorQueue.shift();
    userErrors.emit(error);
  };

  /**
   * Runs the error steps and `after`. Throws when the error should reach
   * the dispatcher.
   */
  const processError = (
    action: Action<St>,
    run: ActionRuntime<St>,
    error: unknown
  ): void => {
    if (error instanceof AbortDispatchError) {
      run.setStatus(action.status.copy({ isDispatchAborted: true }));
      runAfter(action, run);
      return;
    }

    notifyStateObservers(action, state, state, error);
    run.setStatus(action.status.copy({ originalError: error, hasError: true }));

    let wrapped: unknown;
    try {
      wrapped = run.wrapError(error);
    } catch (thrown) {
      wrapped = thrown;
    }
    if (options.globalWrapError && wrapped !== null && wrapped !== undefined) {
      try {
        wrapped = options.globalWrapError(wrapped, action);
      } catch (thrown) {
        wrapped = thrown;
      }
    }
    run.setStatus(action.status.copy({ wrappedError: wrapped }));

    runAfter(action, run);

    if (wrapped === null || wrapped === undefined) return;
    if (wrapped instanceof UserError) queueError(wrapped);

    const observer = options.errorObserver;
    let rethrow = !(wrapped instanceof UserError);
    if (observer) {
      try {
        rethrow = observer(wrapped, action, self);
      } catch (thrown) {
        report("Error observer")(thrown);
        rethrow = true;
      }
    }
    if (rethrow) throw wrapped;
  };

  const finalize = (action: Action<St>, run: ActionRuntime<St>) => {
    runAfter(action, run);
    inProgress.delete(action);
    notifyActionObservers(action, false);
  };

  /** A sync hook handed back a promise; keep its rejection from going unheard. */
  const strayPromise = (action: Action<St>, hook: string, value: PromiseLike<unknown>) => {
    void Promise.resolve(value).then(undefined, report(`${action.name}.${hook}()`));
    return new StoreError(
      `${hook}() of sync action ${action.name} returned a Promise. Declare it async.`
    );
  };

  const runSync = (
    action: Action<St>,
    run: ActionRuntime<St>,
    notify: boolean
  ): ActionStatus => {
    try {
      const before = run.before();
      if (isPromiseLike(before)) throw strayPromise(action, "before", before);
      run.setStatus(action.status.copy({ hasFinishedMethodBefore: true }));

      reduceCount++;
      const result = run.reduce();
      if (isPromiseLike(result)) throw strayPromise(action, "reduce", result);
      registerState(action, result, notify);
      run.setStatus(action.status.copy({ hasFinishedMethodReduce: true }));
    } catch (error) {
      processError(action, run, error);
    } finally {
      finalize(action, run);
    }
    return action.status;
  };

  const runAsync = async (
    action: Action<St>,
    run: ActionRuntime<St>,
    notify: boolean
  ): Promise<ActionStatus> => {
    try {
      await run.before();
      run.setStatus(action.status.copy({ hasFinishedMethodBefore: true }));

      reduceCount++;
      const result = await run.reduce();
      registerState(action, result, notify);
      run.setStatus(action.status.copy({ hasFinishedMethodReduce: true }));
    } catch (error) {
      processError(action, run, error);
    } finally {
      finalize(action, run);
    }
    return action.status;
  };

  function dispatch<TArgs extends readonly unknown[]>(
    action: Action<St, TArgs>,
    { notify = true }: DispatchOptions = {}
  ): ActionStatus | Promise<ActionStatus> {
    const run = action[ACTION_RUNTIME];
    if (!admit(action, run)) return action.status;
    return run.isSync ? runSync(action, run, notify) : runAsync(action, run, notify);
  }

  function dispatchSync<TArgs extends readonly unknown[]>(
    action: Action<St, TArgs>,
    { notify = true }: DispatchOptions = {}
  ): ActionStatus {
    const run = action[ACTION_RUNTIME];
    if (!run.isSync) {
      throw new StoreError(
        `Can't dispatchSync(${action.name}) because ${action.name} is async.`
      );
    }
    if (!admit(action, run)) return action.status;
    return runSync(action, run, notify);
  }

  // ===========================================================================
  // Waiting
  // ===========================================================================

  const isWaitingForType = (type: ActionType) => {
    for (const action of inProgress) {
      if (action.type === type) return true;
    }
    return false;
  };

  const isWaitingFor = (target: ActionType | Action<St>) =>
    isInstance(target) ? inProgress.has(target) : isWaitingForType(target);

  // ===========================================================================
  // Instance
  // ===========================================================================

  const self: Store<St> = {
    [ACTUATE_TYPE]: "store",
    name,
    logger,
    policyTables: tables,
    get state() {
      return state;
    },
    get stateTimestamp() {
      return stateTimestamp;
    },
    get dispatchCount() {
      return dispatchCount;
    },
    get reduceCount() {
      return reduceCount;
    },
    get isShutdown() {
      return isShutdown;
    },
    get errors() {
      return [...errorQueue];
    },
    get lastPersistedState() {
      return persistence?.lastPersistedState;
    },

    dispatch,
    dispatchSync,
    async dispatchAndWait(action, options) {
      return dispatch(action, options);
    },
    dispatchAll(actions) {
      actions.forEach((action) => {
        void Promise.resolve(dispatch(action)).then(undefined, report(action.name));
      });
      return actions;
    },
    async dispatchAndWaitAll(actions) {
      await Promise.all(actions.map((action) => dispatch(action)));
      return actions;
    },
    dispatchState(newState) {
      return dispatchSync(updateState<St>(() => newState));
    },

    isWaiting(target) {
      return isTargetList(target) ? target.some(isWaitingFor) : isWaitingFor(target);
    },
    isWaitingForType,
    isWaitingForAction(action) {
      return inProgress.has(action);
    },

    subscribe(listener) {
      return changes.on(listener);
    },
    subscribeErrors(listener) {
      return userErrors.on(listener);
    },
    waitCondition(predicate, { timeoutMillis } = {}) {
      // A throwing predicate rejects the promise.
      return new Promise<St>((resolve, reject) => {
        if (predicate(state)) {
          resolve(state);
          return;
        }
        let timer: ReturnType<typeof setTimeout> | undefined;
        const settle = () => {
          off();
          clearTimeout(timer);
          waiters.delete(fail);
        };
        const fail = (error: unknown) => {
          settle();
          reject(error);
        };
        const off = changes.on((next) => {
          let matched: boolean;
          try {
            matched = predicate(next);
          } catch (error) {
            fail(error);
            return;
          }
          if (!matched) return;
          settle();
          resolve(next);
        });
        waiters.add(fail);
        if (timeoutMillis !== undefined) {
          timer = setTimeout(() => fail(new TimeoutError(timeoutMillis)), timeoutMillis);
        }
      });
    },
    getAndRemoveFirstError() {
      return errorQueue.shift();
    },

    async hasInternet() {
      if (internetSimulation !== undefined) return internetSimulation;
      return hasConnection(await connectivity.check());
    },
    simulateInternet(online) {
      internetSimulation = online;
    },

    pausePersistor() {
      persistence?.pause();
    },
    persistAndPausePersistor() {
      persistence?.persistAndPause();
    },
    resumePersistor() {
      persistence?.resume();
    },
    async saveInitialStateInPersistence() {
      await persistence?.saveInitialState(state);
    },
    async readStateFromPersistence() {
      return persistence?.readState();
    },
    async deleteStateFromPersistence() {
      await persistence?.deleteState();
    },

    shutdown() {
      isShutdown = true;
    },
    teardown({ emptyState } = {}) {
      if (emptyState !== undefined) {
        state = emptyState;
        stateTimestamp = Date.now();
      }
      Array.from(waiters).forEach((fail) =>
        fail(new StoreError(`${name} was torn down while waiting for a condition.`))
      );
      changes.clear();
      userErrors.clear();
      persistence?.dispose();
      tables.clear();
      inProgress.clear();
      errorQueue.length = 0;
    },
  };

  return self;
}
