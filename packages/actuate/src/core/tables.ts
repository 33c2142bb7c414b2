/**
 * Per-store bookkeeping shared by the concurrency policies.
 * One set per store; `store.teardown()` clears it.
 */

import type {
  FreshEntry,
  KeyedMap,
  PolicyTables,
  RevisionEntry,
} from "../types";
import { keyedMap, keySet } from "./keys";

export function policyTables(): PolicyTables {
  const tables = {
    throttle: keyedMap<number>(),
    debounce: keyedMap<number>(),
    fresh: keyedMap<FreshEntry>(),
    nonReentrant: keySet(),
    syncLocks: keySet(),
    revisions: keyedMap<RevisionEntry>(),
  };

  const registered = new Set<{ clear(): void }>();

  return {
    ...tables,
    register(table) {
      registered.add(table);
    },
    clear() {
      Object.values(tables).forEach((table) => table.clear());
      registered.forEach((table) => table.clear());
    },
  };
}

/** Removes every expiry at or before `now`. */
export function pruneExpired(table: KeyedMap<number>, now: number): void {
  table.prune((expiresAt) => expiresAt <= now);
}

export function pruneStale(table: KeyedMap<FreshEntry>, now: number): void {
  table.prune((entry) => entry.expiresAt <= now);
}
