/**
 * Coalesced optimistic sync: many local writes, one request in flight per
 * key, converging on the value the user ended up with.
 *
 * Every dispatch applies its value to the state right away. The first
 * dispatch for an idle key takes the key's lock and sends; dispatches that
 * find the lock taken only update the state. When the request returns, the
 * sender checks whether a newer value arrived meanwhile and sends again if
 * so. The server response is applied only once the value has settled.
 */

import { actionKind } from "../core/action";
import { resolveEquality } from "../core/equality";
import { keyedMap } from "../core/keys";
import { MissingServerRevisionError, TooManyFollowUpsError } from "../errors";
import { resolveKey } from "../policies/policy";
import type {
  Action,
  ActionSpec,
  Equality,
  KeyedMap,
  MaybePromise,
  PolicyTables,
} from "../types";
import { bestKnownServerRevision, localRevisionOf, nextEntry } from "./revisions";

export interface StableSyncContext<St, TArgs extends readonly unknown[]> {
  readonly action: Action<St, TArgs>;
  readonly key: unknown;
  /**
   * The key's local revision. The first call in a dispatch bumps it;
   * later calls return the current value.
   */
  localRevision(): number;
  /** Newest server revision known for the key (0 when none). */
  serverRevision(): number;
  /** Report the revision the server assigned to the value just sent. */
  informServerRevision(revision: number): void;
}

export interface StableSyncOptions<St, TArgs extends readonly unknown[], V> {
  name?: string;
  /** Splits the lock per resource, e.g. per item id */
  keyParams?: (...args: TArgs) => unknown;
  valueToApply(action: Action<St, TArgs>): V;
  applyOptimisticValueToState(state: St, value: V, action: Action<St, TArgs>): St;
  getValueFromState(state: St, action: Action<St, TArgs>): V;
  /** Resolves to the server response, or null when there is none. */
  sendValueToServer(value: V, context: StableSyncContext<St, TArgs>): Promise<unknown>;
  applyServerResponseToState?(
    state: St,
    response: unknown,
    action: Action<St, TArgs>
  ): St | null | undefined;
  /**
   * Called once the key is idle again. `error` is null on success.
   * A returned state replaces the current one.
   */
  onFinish?(error: unknown, action: Action<St, TArgs>): MaybePromise<St | null | undefined>;
  /** Compares the sent value with the newest one (default: "deep") */
  equals?: Equality<V>;
  /** Requests per dispatch before giving up; -1 is unlimited (default: 10000) */
  maxFollowUpRequests?: number;
}

export interface StableSyncWithPushOptions<St, TArgs extends readonly unknown[], V>
  extends StableSyncOptions<St, TArgs, V> {
  /** Server revision saved in the state, e.g. restored from persistence. */
  getServerRevisionFromState(state: St, key: unknown): number | undefined;
}

type SyncKind = "gate" | "retry" | "sync";

interface Intent<V> {
  readonly value: V;
}

/**
 * Per-dispatch sync state. `push` holds the latest local intent per key
 * when the action is push-aware.
 */
function syncRun<St, TArgs extends readonly unknown[], V>(
  action: Action<St, TArgs>,
  options: StableSyncOptions<St, TArgs, V>,
  push:
    | {
        intents: KeyedMap<Intent<V>>;
        revisionFromState: (state: St, key: unknown) => number | undefined;
      }
    | undefined
) {
  const { store } = action;
  const { revisions, syncLocks } = store.policyTables;
  const key = resolveKey(action, { keyParams: options.keyParams });
  const equals = resolveEquality(options.equals ?? "deep");
  const maxFollowUps = options.maxFollowUpRequests ?? 10000;

  let bumped = false;
  let informed: number | undefined;

  const serverRevision = () =>
    push
      ? bestKnownServerRevision(revisions, key, push.revisionFromState(action.state, key))
      : revisions.get(key)?.serverRevision ?? 0;

  const context: StableSyncContext<St, TArgs> = {
    action,
    key,
    localRevision() {
      if (!bumped) {
        bumped = true;
        const entry = revisions.get(key);
        const fromState = push?.revisionFromState(action.state, key);
        const base = serverRevision();
        revisions.set(key, {
          localRevision: (entry?.localRevision ?? 0) + 1,
          serverRevision:
            entry?.serverRevision === undefined && fromState === undefined
              ? undefined
              : base,
          intentBaseServerRevision: base,
        });
      }
      return localRevisionOf(revisions, key);
    },
    serverRevision,
    informServerRevision(revision) {
      informed = revision;
      const current = serverRevision();
      const entry = revisions.get(key);
      if (revision > current) {
        revisions.set(
          key,
          nextEntry(entry, {
            serverRevision: revision,
            intentBaseServerRevision: entry?.intentBaseServerRevision ?? current,
          })
        );
      }
    },
  };

  const checkLimit = (requestCount: number) => {
    if (maxFollowUps !== -1 && requestCount > maxFollowUps) {
      throw new TooManyFollowUpsError(action.name, maxFollowUps);
    }
  };

  /** The value to send next, or undefined when the key has settled. */
  const followUp = (
    sent: V,
    sentLocalRevision: number,
    requestCount: number
  ): Intent<V> | undefined => {
    const stateValue = options.getValueFromState(action.state, action);

    if (!push) {
      checkLimit(requestCount);
      return equals(stateValue, sent) ? undefined : { value: stateValue };
    }

    if (localRevisionOf(revisions, key) <= sentLocalRevision) return undefined;

    // A push newer than both this response and the newest local intent wins.
    const current = serverRevision();
    const intentBase = revisions.get(key)?.intentBaseServerRevision ?? 0;
    if (current > (informed ?? 0) && current > intentBase) return undefined;

    const intent = push.intents.get(key);
    const latest = intent ? intent.value : stateValue;
    checkLimit(requestCount);
    return equals(latest, sent) ? undefined : { value: latest };
  };

  const applyResponse = (response: unknown) => {
    const apply = options.applyServerResponseToState;
    if (!apply || response === null || response === undefined) return;
    if (informed !== undefined && informed !== serverRevision()) return;
    const next = apply(action.state, response, action);
    if (next !== null && next !== undefined) action.dispatchState(next);
  };

  const finish = async (error: unknown) => {
    const next = await options.onFinish?.(error, action);
    if (next !== null && next !== undefined) action.dispatchState(next);
  };

  const sendAndFollowUp = async (value: V): Promise<void> => {
    let sent = value;
    let requestCount = 0;

    for (;;) {
      requestCount++;
      const sentLocalRevision = localRevisionOf(revisions, key);
      informed = undefined;

      try {
        const response = await options.sendValueToServer(sent, context);
        if (push && informed === undefined) {
          throw new MissingServerRevisionError(action.name);
        }
        const next = followUp(sent, sentLocalRevision, requestCount);
        if (next) {
          sent = next.value;
          continue;
        }
        applyResponse(response);
      } catch (error) {
        syncLocks.delete(key);
        await finish(error);
        throw error;
      }

      syncLocks.delete(key);
      await finish(null);
      return;
    }
  };

  return {
    async run(): Promise<null> {
      if (push) context.localRevision();
      const value = options.valueToApply(action);
      push?.intents.set(key, { value });

      action.dispatchState(options.applyOptimisticValueToState(action.state, value, action));

      // Someone is already sending; they will pick the new value up.
      if (!syncLocks.add(key)) return null;
      await sendAndFollowUp(value);
      return null;
    },
  };
}

/**
 * Defines a coalescing optimistic sync action.
 *
 * @example Like button
 * ```ts
 * const toggleLike = stableSync<AppState, [itemId: string], boolean>({
 *   name: "toggleLike",
 *   keyParams: (itemId) => itemId,
 *   valueToApply: ({ state, args: [id] }) => !state.liked[id],
 *   applyOptimisticValueToState: (state, liked, { args: [id] }) => ({
 *     ...state,
 *     liked: { ...state.liked, [id]: liked },
 *   }),
 *   getValueFromState: (state, { args: [id] }) => state.liked[id],
 *   sendValueToServer: (liked, { action }) => api.setLiked(action.args[0], liked),
 * });
 * ```
 */
export function stableSync<St, TArgs extends readonly unknown[], V>(
  options: StableSyncOptions<St, TArgs, V>
): ActionSpec<St, TArgs, SyncKind> {
  return actionKind<St, TArgs, SyncKind>("stableSync", ["gate", "retry", "sync"], {
    name: options.name,
    async reduce(action) {
      return syncRun(action, options, undefined).run();
    },
  });
}

/**
 * stableSync for data the server also pushes. Follow-ups are decided by
 * local revisions instead of state values, because a push may overwrite
 * the state while a request is in flight. `sendValueToServer` must call
 * `informServerRevision`.
 *
 * Pair it with `serverPush` actions that use the same key.
 */
export function stableSyncWithPush<St, TArgs extends readonly unknown[], V>(
  options: StableSyncWithPushOptions<St, TArgs, V>
): ActionSpec<St, TArgs, SyncKind> {
  const intentsByStore = new WeakMap<PolicyTables, KeyedMap<Intent<V>>>();

  const intentsFor = (tables: PolicyTables) => {
    let intents = intentsByStore.get(tables);
    if (!intents) {
      intents = keyedMap<Intent<V>>();
      intentsByStore.set(tables, intents);
      tables.register(intents);
    }
    return intents;
  };

  return actionKind<St, TArgs, SyncKind>(
    "stableSyncWithPush",
    ["gate", "retry", "sync"],
    {
      name: options.name,
      async reduce(action) {
        return syncRun(action, options, {
          intents: intentsFor(action.store.policyTables),
          revisionFromState: (state, key) =>
            options.getServerRevisionFromState(state, key),
        }).run();
      },
    }
  );
}
