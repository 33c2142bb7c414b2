/**
 * Action specs - definitions of units of state-mutation intent.
 *
 * An action spec is both a definition AND a factory:
 * - As object: holds displayName, definition, policies and ACTUATE_TYPE
 * - As function: `spec(...args) => Action`, a fresh instance per dispatch
 */

import { IncompatiblePoliciesError, StoreError } from "../errors";
import { LOG_PREFIX } from "../dev";
import {
  ACTION_RUNTIME,
  ACTUATE_TYPE,
  type Action,
  type ActionDefinition,
  type ActionRuntime,
  type ActionSpec,
  type ActionType,
  type MaybePromise,
  type Policy,
  type PolicyHooks,
  type PolicySlot,
  type Reducer,
  type Store,
} from "../types";
import { isAsyncFunction, isPromiseLike } from "../utils/isPromiseLike";
import { safely } from "../utils/safely";
import { generateActionName } from "./generator";
import { actionStatus } from "./status";

/** Something that claims extension points on an action. */
interface SlotOwner {
  readonly name: string;
  readonly slots: readonly PolicySlot[];
}

// =============================================================================
// Action Spec Factory
// =============================================================================

/**
 * Define an action.
 *
 * @example
 * ```ts
 * const increment = action<Counter, [by: number]>({
 *   name: "increment",
 *   reduce: ({ state, args: [by] }) => ({ count: state.count + by }),
 * });
 *
 * store.dispatch(increment(2));
 * ```
 *
 * @example Layering policies
 * ```ts
 * const search = action<AppState, [query: string]>({
 *   name: "search",
 *   reduce: async ({ args: [query] }) => ({ results: await api.search(query) }),
 * }).use(debounce({ ms: 300 }));
 * ```
 */
export function action<St, TArgs extends readonly unknown[] = []>(
  definition: ActionDefinition<St, TArgs>
): ActionSpec<St, TArgs> {
  return createSpec<St, TArgs, never>(
    definition.name ?? generateActionName(),
    definition,
    [],
    undefined
  );
}

/**
 * Define an action kind that owns some slots itself, e.g. an optimistic
 * sync action that already manages its own locking.
 * @internal
 */
export function actionKind<
  St,
  TArgs extends readonly unknown[],
  TSlot extends PolicySlot
>(
  kind: string,
  slots: readonly TSlot[],
  definition: ActionDefinition<St, TArgs>
): ActionSpec<St, TArgs, TSlot> {
  return createSpec<St, TArgs, TSlot>(
    definition.name ?? generateActionName(),
    definition,
    [],
    { name: kind, slots }
  );
}

function createSpec<St, TArgs extends readonly unknown[], TUsed extends PolicySlot>(
  displayName: string,
  definition: ActionDefinition<St, TArgs>,
  policies: readonly Policy<PolicySlot, TArgs>[],
  reserved: SlotOwner | undefined
): ActionSpec<St, TArgs, TUsed> {
  const create = (...args: TArgs): Action<St, TArgs> =>
    createAction(spec, definition, policies, args);

  const spec = Object.assign(create, {
    [ACTUATE_TYPE]: "action.spec" as const,
    displayName,
    definition,
    policies,
    reservedSlots: reserved?.slots ?? [],
    use<TSlot extends Exclude<PolicySlot, TUsed>>(
      policy: Policy<TSlot, TArgs>
    ): ActionSpec<St, TArgs, TUsed | TSlot> {
      const owners: SlotOwner[] = reserved ? [reserved, ...policies] : [...policies];
      assertCompatible(displayName, owners, policy);
      return createSpec<St, TArgs, TUsed | TSlot>(
        displayName,
        definition,
        [...policies, policy],
        reserved
      );
    },
  });

  return spec;
}

/**
 * Throws when `next` claims a slot one of `owners` already holds.
 */
export function assertCompatible(
  actionName: string,
  owners: readonly SlotOwner[],
  next: SlotOwner
): void {
  for (const owner of owners) {
    if (owner.slots.some((slot) => next.slots.includes(slot))) {
      throw new IncompatiblePoliciesError(actionName, owner.name, next.name);
    }
  }
}

// =============================================================================
// Action Instances
// =============================================================================

/**
 * Runs the steps in order, switching to promise chaining only once a step
 * actually returns a promise.
 */
function runInOrder(steps: readonly (() => MaybePromise<void>)[]): MaybePromise<void> {
  for (let i = 0; i < steps.length; i++) {
    const result = steps[i]();
    if (isPromiseLike(result)) {
      const rest = steps.slice(i + 1);
      return Promise.resolve(result).then(() => runInOrder(rest));
    }
  }
  return undefined;
}

function createAction<St, TArgs extends readonly unknown[]>(
  type: ActionType,
  definition: ActionDefinition<St, TArgs>,
  policies: readonly Policy<PolicySlot, TArgs>[],
  args: TArgs
): Action<St, TArgs> {
  const name = type.displayName;
  let store: Store<St> | undefined;
  let initial: { value: St } | undefined;
  let status = actionStatus();
  let hooks: PolicyHooks<St>[] = [];

  const isSync =
    !policies.some((policy) => policy.suspends) &&
    ![definition.before, definition.reduce, definition.wrapReduce].some(
      isAsyncFunction
    );

  const requireStore = (): Store<St> => {
    if (!store) {
      throw new StoreError(`Action ${name} has not been dispatched yet.`);
    }
    return store;
  };

  const report = (hook: string) => (error: unknown) =>
    requireStore().logger.error(
      `${LOG_PREFIX} Method "${name}.${hook}()" threw an error.`,
      error
    );

  const runtime: ActionRuntime<St> = {
    isSync,
    get isBound() {
      return store !== undefined;
    },
    bind(target) {
      if (store) {
        throw new StoreError(
          `Action ${name} was already dispatched. Create a new instance to dispatch again.`
        );
      }
      store = target;
      initial = { value: target.state };
      status = status.copy({ isDispatched: true });
      hooks = policies.map((policy) => policy.attach(self));
    },
    setStatus(next) {
      status = next;
    },
    abortDispatch() {
      if (definition.abortDispatch?.(self)) return true;
      return hooks.some((hook) => hook.abortDispatch?.() === true);
    },
    before() {
      const steps: (() => MaybePromise<void>)[] = [];
      for (const hook of hooks) {
        const before = hook.before;
        if (before) steps.push(() => before.call(hook));
      }
      const own = definition.before;
      if (own) steps.push(() => own.call(definition, self));
      return runInOrder(steps);
    },
    reduce() {
      let reducer: Reducer<St> = () => definition.reduce(self);
      const own = definition.wrapReduce;
      if (own) {
        const inner = reducer;
        reducer = () => own.call(definition, inner, self);
      }
      for (const hook of hooks) {
        const wrap = hook.wrapReduce;
        if (wrap) {
          const inner = reducer;
          reducer = () => wrap.call(hook, inner);
        }
      }
      return reducer();
    },
    after() {
      const own = definition.after;
      if (own) safely(() => own.call(definition, self), report("after"));
      hooks.forEach((hook, index) => {
        const after = hook.after;
        if (after) {
          safely(() => after.call(hook), report(`${policies[index].name}.after`));
        }
      });
    },
    wrapError(error) {
      const wrap = definition.wrapError;
      return wrap ? wrap.call(definition, error, self) : error;
    },
  };

  const self: Action<St, TArgs> = {
    [ACTUATE_TYPE]: "action",
    [ACTION_RUNTIME]: runtime,
    type,
    name,
    args,
    get status() {
      return status;
    },
    get store() {
      return requireStore();
    },
    get state() {
      return requireStore().state;
    },
    get initialState() {
      if (!initial) {
        throw new StoreError(`Action ${name} has not been dispatched yet.`);
      }
      return initial.value;
    },
    isSync: () => isSync,
    dispatchState: (state) => requireStore().dispatchState(state),
    dispatch: (other) => requireStore().dispatch(other),
    dispatchAndWait: (other) => requireStore().dispatchAndWait(other),
    toString: () => `Action ${name}`,
  };

  return self;
}
