/**
 * actuate - single-writer store with composable concurrency policies
 *
 * @packageDocumentation
 */

// Core types
export {
  ACTUATE_TYPE,
  type ActuateKind,
  type ActuateObject,
  type MaybePromise,
  type ReduceResult,
  type Reducer,
  type Logger,
  type Equality,
  type ActionStatusFields,
  type ActionStatus,
  type ActionType,
  type Action,
  type ActionDefinition,
  type PolicySlot,
  type PolicyHooks,
  type Policy,
  type ActionSpec,
  type ActionObserver,
  type StateObserver,
  type ErrorObserver,
  type GlobalWrapError,
  type GlobalWrapReduce,
  type WaitTarget,
  type DispatchOptions,
  type Store,
  type KeyedMap,
  type KeySet,
  type FreshEntry,
  type RevisionEntry,
  type PolicyTables,
} from "./types";

// Type guards
export { is, isActuate } from "./is";

// Core functions
export { store, type StoreOptions } from "./core/store";
export { action } from "./core/action";
export { updateState, persistNow } from "./core/builtins";
export { actionStatus, hasFailed } from "./core/status";
export { policyKey } from "./core/keys";

// Observers
export {
  logActions,
  logAndRethrowErrors,
  swallowErrors,
} from "./core/observers";

// Equality utilities
export {
  shallowEqual,
  deepEqual,
  strictEqual,
  resolveEquality,
} from "./core/equality";

// Errors
export {
  ActuateError,
  StoreError,
  IncompatiblePoliciesError,
  AbortDispatchError,
  UserError,
  ConnectionError,
  TooManyFollowUpsError,
  MissingServerRevisionError,
  NotImplementedError,
  TimeoutError,
  PersistError,
  type UserErrorOptions,
} from "./errors";

// Dev utilities
export { dev, LOG_PREFIX } from "./dev";

export { emitter, type Emitter, type Listener } from "./emitter";
