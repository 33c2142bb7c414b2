import { hasFailed } from "../core/status";
import { pruneStale } from "../core/tables";
import type { FreshEntry, Policy, Store } from "../types";
import { definePolicy, resolveKey, type KeyOptions } from "./policy";

export interface FreshOptions<TArgs extends readonly unknown[]>
  extends KeyOptions<TArgs> {
  /** How long a successful run stays fresh in ms (default: 1000) */
  freshFor?: number;
  /** Run anyway and start a new freshness period */
  ignoreFresh?: boolean | ((...args: TArgs) => boolean);
}

/**
 * Skips the dispatch while data loaded by an earlier one with the same key
 * is still fresh.
 *
 * A failed run never extends freshness: its entry is rolled back to what
 * was there before, unless a later dispatch has written a newer one.
 *
 * @example
 * ```ts
 * const loadProfile = action<AppState, [userId: string]>({ reduce: async ... })
 *   .use(fresh({ freshFor: 60_000, keyParams: (userId) => userId }));
 * ```
 */
export function fresh<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: FreshOptions<TArgs> = {}
): Policy<"gate", TArgs> {
  const freshFor = options.freshFor ?? 1000;

  return definePolicy<"gate", TArgs>("fresh", ["gate"], false, (action) => {
    const entries = action.store.policyTables.fresh;
    const key = resolveKey(action, options);
    const { ignoreFresh } = options;
    // Identifies this dispatch's write.
    const owner = {};
    let wrote = false;
    let previous: FreshEntry | undefined;

    const write = (now: number) => {
      entries.set(key, { expiresAt: now + freshFor, owner });
      wrote = true;
    };

    return {
      abortDispatch() {
        const now = Date.now();
        const ignore =
          typeof ignoreFresh === "function"
            ? ignoreFresh(...action.args)
            : ignoreFresh === true;

        if (ignore) {
          previous = undefined;
          write(now);
          return false;
        }

        const entry = entries.get(key);
        if (entry === undefined || entry.expiresAt <= now) {
          previous = entry;
          write(now);
          return false;
        }
        return true;
      },
      after() {
        if (wrote && hasFailed(action.status) && entries.get(key)?.owner === owner) {
          if (previous) {
            entries.set(key, previous);
          } else {
            entries.delete(key);
          }
        }
        pruneStale(entries, Date.now());
      },
    };
  });
}

/** Makes one key stale, so the next dispatch runs. */
export function removeFreshKey<St>(store: Store<St>, key: unknown): void {
  store.policyTables.fresh.delete(key);
}

export function removeAllFreshKeys<St>(store: Store<St>): void {
  store.policyTables.fresh.clear();
}
