import { actionKind } from "../core/action";
import { policyKey } from "../core/keys";
import type { Action, ActionSpec, ActionType } from "../types";
import { nextEntry } from "./revisions";

export interface ServerPushOptions<St, TArgs extends readonly unknown[]> {
  name?: string;
  /** The stableSyncWithPush action whose key this push updates. */
  associatedAction: ActionType;
  /** Must produce the same key params as the associated action */
  keyParams?: (...args: TArgs) => unknown;
  /** Revision carried by the pushed data. */
  serverRevision(action: Action<St, TArgs>): number;
  /** Return null to ignore the push. */
  applyServerPushToState(
    state: St,
    key: unknown,
    serverRevision: number,
    action: Action<St, TArgs>
  ): St | null | undefined;
  getServerRevisionFromState(state: St, key: unknown): number | undefined;
  /** Apply while the associated key is sending (default: true) */
  applyEvenIfLocked?: boolean;
}

/**
 * Defines the action that applies data pushed by the server, e.g. from a
 * websocket. Pushes no newer than the newest known revision are ignored.
 * A push never bumps the local revision, so it never causes a follow-up
 * request on its own.
 *
 * @example
 * ```ts
 * const likePushed = serverPush<AppState, [PushedLike]>({
 *   associatedAction: toggleLike,
 *   keyParams: (push) => push.itemId,
 *   serverRevision: ({ args: [push] }) => push.revision,
 *   applyServerPushToState: (state, _key, revision, { args: [push] }) => ({
 *     ...state,
 *     liked: { ...state.liked, [push.itemId]: push.liked },
 *     revisions: { ...state.revisions, [push.itemId]: revision },
 *   }),
 *   getServerRevisionFromState: (state, key) => revisionOf(state, key),
 * });
 *
 * socket.on("like", (push) => app.dispatch(likePushed(push)));
 * ```
 */
export function serverPush<St, TArgs extends readonly unknown[]>(
  options: ServerPushOptions<St, TArgs>
): ActionSpec<St, TArgs, "sync"> {
  const applyEvenIfLocked = options.applyEvenIfLocked ?? true;

  return actionKind<St, TArgs, "sync">("serverPush", ["sync"], {
    name: options.name,
    reduce(self) {
      const { revisions, syncLocks } = self.store.policyTables;
      const key = policyKey(
        options.associatedAction,
        options.keyParams ? options.keyParams(...self.args) : null
      );
      const incoming = options.serverRevision(self);

      const seeded = revisions.get(key);
      const fromTable = seeded?.serverRevision;
      const fromState = options.getServerRevisionFromState(self.state, key);
      const current =
        fromTable === undefined && fromState === undefined
          ? undefined
          : Math.max(fromTable ?? 0, fromState ?? 0);

      // Seed from persisted state even when the push turns out stale.
      if (fromTable === undefined && fromState !== undefined) {
        revisions.set(
          key,
          nextEntry(seeded, {
            serverRevision: fromState,
            intentBaseServerRevision: seeded?.intentBaseServerRevision ?? fromState,
          })
        );
      }

      if (current !== undefined && incoming <= current) return null;
      if (!applyEvenIfLocked && syncLocks.has(key)) return null;

      const next = options.applyServerPushToState(self.state, key, incoming, self);
      if (next === null || next === undefined) return null;

      const entry = revisions.get(key);
      revisions.set(
        key,
        nextEntry(entry, {
          serverRevision: incoming,
          intentBaseServerRevision: entry?.intentBaseServerRevision ?? current ?? 0,
        })
      );
      return next;
    },
  });
}
