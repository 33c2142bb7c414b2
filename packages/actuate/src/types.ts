import type { UserError } from "./errors";

export const ACTUATE_TYPE = Symbol("ACTUATE");

/**
 * Symbol-keyed slot holding the pipeline-facing side of an action.
 * Not exported from the package entry; only the store reads it.
 */
export const ACTION_RUNTIME = Symbol("ACTUATE.runtime");

/**
 * Kind identifiers for actuate objects.
 * Used with ACTUATE_TYPE for runtime type discrimination.
 */
export type ActuateKind = "action.spec" | "action" | "store" | "policy";

export interface ActuateObject<K extends ActuateKind = ActuateKind> {
  readonly [ACTUATE_TYPE]: K;
}

// =============================================================================
// Base Types
// =============================================================================

export type MaybePromise<T> = T | Promise<T>;

/** `null`/`undefined` mean "leave the state alone". */
export type ReduceResult<St> = St | null | undefined;

export type Reducer<St> = () => MaybePromise<ReduceResult<St>>;

export type Logger = Pick<Console, "log" | "warn" | "error">;

/**
 * Equality function or shorthand.
 * - "strict": Object.is
 * - "shallow": top-level keys by reference
 * - "deep": structural (lodash isEqual)
 */
export type Equality<T = unknown> =
  | "strict"
  | "shallow"
  | "deep"
  | ((a: T, b: T) => boolean);

// =============================================================================
// Action Status
// =============================================================================

export interface ActionStatusFields {
  readonly isDispatched: boolean;
  readonly isDispatchAborted: boolean;
  readonly hasFinishedMethodBefore: boolean;
  readonly hasFinishedMethodReduce: boolean;
  readonly hasFinishedMethodAfter: boolean;
  /** `before` or `reduce` threw, even if what it threw was `undefined`. */
  readonly hasError: boolean;
  /** What `before`/`reduce` threw, before any wrapping. */
  readonly originalError: unknown;
  /** The error after the action's and the store's wrapError steps. */
  readonly wrappedError: unknown;
}

export interface ActionStatus extends ActionStatusFields {
  /** `after` has run, whatever the outcome. */
  readonly isCompleted: boolean;
  readonly isCompletedOk: boolean;
  readonly isCompletedFailed: boolean;
  copy(patch: Partial<ActionStatusFields>): ActionStatus;
}

// =============================================================================
// Actions
// =============================================================================

/**
 * The runtime identity of an action: what `isWaiting` and the default
 * policy keys compare against. Every ActionSpec is one.
 */
export interface ActionType extends ActuateObject<"action.spec"> {
  readonly displayName: string;
}

/**
 * Hooks the store drives. Built once per action instance when it is bound.
 */
export interface ActionRuntime<St> {
  readonly isSync: boolean;
  readonly isBound: boolean;
  bind(store: Store<St>): void;
  setStatus(status: ActionStatus): void;
  abortDispatch(): boolean;
  before(): MaybePromise<void>;
  reduce(): MaybePromise<ReduceResult<St>>;
  /** Runs every `after` hook; failures are reported, never thrown. */
  after(): void;
  wrapError(error: unknown): unknown;
}

export interface Action<
  St,
  TArgs extends readonly unknown[] = readonly unknown[]
> extends ActuateObject<"action"> {
  readonly type: ActionType;
  readonly name: string;
  readonly args: TArgs;
  readonly status: ActionStatus;
  /** Throws StoreError before the action is dispatched. */
  readonly store: Store<St>;
  /** Current store state. */
  readonly state: St;
  /** Store state when the action was dispatched. */
  readonly initialState: St;
  isSync(): boolean;
  /** Replaces the store state through a nested update action. */
  dispatchState(state: St): ActionStatus;
  dispatch<TOther extends readonly unknown[]>(
    action: Action<St, TOther>
  ): ActionStatus | Promise<ActionStatus>;
  dispatchAndWait<TOther extends readonly unknown[]>(
    action: Action<St, TOther>
  ): Promise<ActionStatus>;
  toString(): string;
  readonly [ACTION_RUNTIME]: ActionRuntime<St>;
}

export interface ActionDefinition<St, TArgs extends readonly unknown[]> {
  name?: string;
  /** Returning true drops the dispatch before anything else runs. */
  abortDispatch?(action: Action<St, TArgs>): boolean;
  before?(action: Action<St, TArgs>): MaybePromise<void>;
  reduce(action: Action<St, TArgs>): MaybePromise<ReduceResult<St>>;
  /** Innermost wrapper around `reduce`; policies wrap outside it. */
  wrapReduce?(
    reduce: Reducer<St>,
    action: Action<St, TArgs>
  ): MaybePromise<ReduceResult<St>>;
  /** Always runs once `before` has been attempted. */
  after?(action: Action<St, TArgs>): void;
  /** Return `null` to swallow the error. */
  wrapError?(error: unknown, action: Action<St, TArgs>): unknown;
}

// =============================================================================
// Policies
// =============================================================================

/**
 * Extension points a policy may own. Two policies owning the same slot
 * cannot be combined on one action.
 */
export type PolicySlot = "gate" | "connectivity" | "reduceLoop" | "retry" | "sync";

export interface PolicyHooks<St> {
  abortDispatch?(): boolean;
  before?(): MaybePromise<void>;
  wrapReduce?(next: Reducer<St>): MaybePromise<ReduceResult<St>>;
  after?(): void;
}

export interface Policy<
  TSlot extends PolicySlot = PolicySlot,
  TArgs extends readonly unknown[] = readonly unknown[]
> extends ActuateObject<"policy"> {
  readonly name: string;
  readonly slots: readonly TSlot[];
  /** Whether the hooks await anything; forces the async dispatch path. */
  readonly suspends: boolean;
  attach<St>(action: Action<St, TArgs>): PolicyHooks<St>;
}

export interface ActionSpec<
  St,
  TArgs extends readonly unknown[] = [],
  TUsed extends PolicySlot = never
> extends ActionType {
  (...args: TArgs): Action<St, TArgs>;
  readonly definition: ActionDefinition<St, TArgs>;
  readonly policies: readonly Policy<PolicySlot, TArgs>[];
  /** Slots claimed by the action kind itself (e.g. optimistic sync). */
  readonly reservedSlots: readonly PolicySlot[];
  /**
   * Returns a new spec with the policy layered on top. Policies whose slots
   * are already taken are rejected by the compiler.
   */
  use<TSlot extends Exclude<PolicySlot, TUsed>>(
    policy: Policy<TSlot, TArgs>
  ): ActionSpec<St, TArgs, TUsed | TSlot>;
}

// =============================================================================
// Observers
// =============================================================================

export type ActionObserver<St> = (
  action: Action<St>,
  dispatchCount: number,
  ini: boolean
) => void;

export type StateObserver<St> = (
  action: Action<St>,
  prevState: St,
  newState: St,
  error: unknown,
  dispatchCount: number
) => void;

/** Return true to rethrow the error to the dispatcher. */
export type ErrorObserver<St> = (
  error: unknown,
  action: Action<St>,
  store: Store<St>
) => boolean;

export type GlobalWrapError<St> = (
  error: unknown,
  action: Action<St>
) => unknown;

export type GlobalWrapReduce<St> = (
  prevState: St,
  nextState: St,
  action: Action<St>
) => St;

// =============================================================================
// Store
// =============================================================================

export type WaitTarget<St> =
  | ActionType
  | Action<St>
  | readonly (ActionType | Action<St>)[];

export interface DispatchOptions {
  /** Emit a change to subscribers when the state is replaced (default: true) */
  notify?: boolean;
}

export interface Store<St> extends ActuateObject<"store"> {
  readonly name: string;
  readonly state: St;
  readonly stateTimestamp: number;
  readonly dispatchCount: number;
  readonly reduceCount: number;
  readonly isShutdown: boolean;
  readonly logger: Logger;
  readonly policyTables: PolicyTables;
  /** Queued user-facing errors, oldest first. */
  readonly errors: readonly UserError[];
  readonly lastPersistedState: St | undefined;

  dispatch<TArgs extends readonly unknown[]>(
    action: Action<St, TArgs>,
    options?: DispatchOptions
  ): ActionStatus | Promise<ActionStatus>;
  dispatchAndWait<TArgs extends readonly unknown[]>(
    action: Action<St, TArgs>,
    options?: DispatchOptions
  ): Promise<ActionStatus>;
  dispatchSync<TArgs extends readonly unknown[]>(
    action: Action<St, TArgs>,
    options?: DispatchOptions
  ): ActionStatus;
  dispatchAll(actions: readonly Action<St>[]): readonly Action<St>[];
  dispatchAndWaitAll(actions: readonly Action<St>[]): Promise<readonly Action<St>[]>;
  dispatchState(state: St): ActionStatus;

  isWaiting(target: WaitTarget<St>): boolean;
  isWaitingForType(type: ActionType): boolean;
  isWaitingForAction(action: Action<St>): boolean;

  /** Called with the new state after every replacement. */
  subscribe(listener: (state: St) => void): VoidFunction;
  /** Called whenever a user-facing error is queued. */
  subscribeErrors(listener: (error: UserError) => void): VoidFunction;
  waitCondition(
    predicate: (state: St) => boolean,
    options?: { timeoutMillis?: number }
  ): Promise<St>;
  getAndRemoveFirstError(): UserError | undefined;

  hasInternet(): Promise<boolean>;
  /** `undefined` restores the real connectivity service. */
  simulateInternet(online: boolean | undefined): void;

  pausePersistor(): void;
  persistAndPausePersistor(): void;
  resumePersistor(): void;
  saveInitialStateInPersistence(): Promise<void>;
  readStateFromPersistence(): Promise<St | undefined>;
  deleteStateFromPersistence(): Promise<void>;

  shutdown(): void;
  teardown(options?: { emptyState?: St }): void;
}

// =============================================================================
// Policy bookkeeping
// =============================================================================

export interface KeyedMap<V> {
  get(key: unknown): V | undefined;
  has(key: unknown): boolean;
  set(key: unknown, value: V): void;
  delete(key: unknown): boolean;
  /** Deletes every entry the predicate accepts. */
  prune(predicate: (value: V, key: unknown) => boolean): number;
  clear(): void;
  readonly size: number;
}

export interface KeySet {
  has(key: unknown): boolean;
  /** Returns false when the key was already present. */
  add(key: unknown): boolean;
  delete(key: unknown): boolean;
  clear(): void;
  readonly size: number;
}

export interface FreshEntry {
  readonly expiresAt: number;
  /** Identifies the dispatch that wrote the entry. */
  readonly owner: object;
}

export interface RevisionEntry {
  /** Bumped once per dispatch of a push-aware sync action. */
  readonly localRevision: number;
  /** Newest server revision seen, `undefined` while nothing is known. */
  readonly serverRevision: number | undefined;
  /** Server revision current when the newest local intent was created. */
  readonly intentBaseServerRevision: number;
}

export interface PolicyTables {
  readonly throttle: KeyedMap<number>;
  readonly debounce: KeyedMap<number>;
  readonly fresh: KeyedMap<FreshEntry>;
  readonly nonReentrant: KeySet;
  readonly syncLocks: KeySet;
  readonly revisions: KeyedMap<RevisionEntry>;
  /** Adds a table of your own that `clear()` empties too. */
  register(table: { clear(): void }): void;
  clear(): void;
}
