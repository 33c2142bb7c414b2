/**
 * Structural key tables used by policies.
 *
 * Keys are compared with lodash `isEqual`, so `[spec, { id: 1 }]` built in
 * two different dispatches finds the same entry. Functions (and therefore
 * action specs) compare by reference.
 */

import isEqual from "lodash/isEqual";
import type { ActionType, KeyedMap, KeySet } from "../types";

const OTHER = Symbol("other");

/**
 * Coarse bucket for a key: the first element of an array key when that is a
 * function or primitive, else the key itself when primitive.
 */
function bucketOf(key: unknown): unknown {
  const head = Array.isArray(key) && key.length > 0 ? key[0] : key;
  if (typeof head === "function") return head;
  if (head === null || typeof head !== "object") return head;
  return OTHER;
}

/**
 * The default key for a policy: the action's type plus optional params.
 *
 * @example
 * ```ts
 * removeThrottleLock(store, policyKey(loadUser, userId));
 * ```
 */
export function policyKey(type: ActionType, params: unknown = null): unknown {
  return [type, params];
}

export function keyedMap<V>(): KeyedMap<V> {
  const buckets = new Map<unknown, Array<[unknown, V]>>();
  let size = 0;

  const find = (key: unknown) => {
    const bucket = buckets.get(bucketOf(key));
    if (!bucket) return { bucket: undefined, index: -1 };
    return { bucket, index: bucket.findIndex(([k]) => isEqual(k, key)) };
  };

  return {
    get(key) {
      const { bucket, index } = find(key);
      return bucket && index >= 0 ? bucket[index][1] : undefined;
    },
    has(key) {
      return find(key).index >= 0;
    },
    set(key, value) {
      const { bucket, index } = find(key);
      if (bucket && index >= 0) {
        bucket[index][1] = value;
        return;
      }
      if (bucket) {
        bucket.push([key, value]);
      } else {
        buckets.set(bucketOf(key), [[key, value]]);
      }
      size++;
    },
    delete(key) {
      const { bucket, index } = find(key);
      if (!bucket || index < 0) return false;
      bucket.splice(index, 1);
      if (bucket.length === 0) buckets.delete(bucketOf(key));
      size--;
      return true;
    },
    prune(predicate) {
      let removed = 0;
      for (const [head, bucket] of Array.from(buckets)) {
        const kept = bucket.filter(([k, v]) => !predicate(v, k));
        removed += bucket.length - kept.length;
        if (kept.length === 0) {
          buckets.delete(head);
        } else {
          buckets.set(head, kept);
        }
      }
      size -= removed;
      return removed;
    },
    clear() {
      buckets.clear();
      size = 0;
    },
    get size() {
      return size;
    },
  };
}

export function keySet(): KeySet {
  const map = keyedMap<true>();

  return {
    has: (key) => map.has(key),
    add(key) {
      if (map.has(key)) return false;
      map.set(key, true);
      return true;
    },
    delete: (key) => map.delete(key),
    clear: () => map.clear(),
    get size() {
      return map.size;
    },
  };
}
