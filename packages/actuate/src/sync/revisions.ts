import type { KeyedMap, RevisionEntry } from "../types";

/** Copies `previous` (or an empty entry) with the given fields replaced. */
export function nextEntry(
  previous: RevisionEntry | undefined,
  patch: Partial<RevisionEntry>
): RevisionEntry {
  return {
    localRevision: previous?.localRevision ?? 0,
    serverRevision: previous?.serverRevision,
    intentBaseServerRevision: previous?.intentBaseServerRevision ?? 0,
    ...patch,
  };
}

export function localRevisionOf(
  revisions: KeyedMap<RevisionEntry>,
  key: unknown
): number {
  return revisions.get(key)?.localRevision ?? 0;
}

/**
 * The newest server revision known for `key`, from the table or from the
 * state. A newer revision found in the state is copied into the table.
 */
export function bestKnownServerRevision(
  revisions: KeyedMap<RevisionEntry>,
  key: unknown,
  fromState: number | undefined
): number {
  const entry = revisions.get(key);
  const fromTable = entry?.serverRevision ?? 0;
  const stateRevision = fromState ?? 0;
  if (stateRevision > fromTable) {
    revisions.set(
      key,
      nextEntry(entry, {
        serverRevision: stateRevision,
        intentBaseServerRevision: entry?.intentBaseServerRevision ?? stateRevision,
      })
    );
    return stateRevision;
  }
  return fromTable;
}
