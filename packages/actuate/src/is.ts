/**
 * Type guards for actuate objects.
 *
 * Use `is(value, kind)` to check if a value is a specific actuate object.
 */

import {
  ACTUATE_TYPE,
  type Action,
  type ActionType,
  type ActuateKind,
  type ActuateObject,
  type Policy,
  type Store,
} from "./types";

type ActuateObjectForKind<K extends ActuateKind> = K extends "action.spec"
  ? ActionType
  : K extends "action"
  ? Action<unknown>
  : K extends "store"
  ? Store<unknown>
  : K extends "policy"
  ? Policy
  : ActuateObject<K>;

/**
 * Check if a value is an actuate object of a specific kind.
 *
 * @example
 * if (is(target, "action.spec")) {
 *   store.isWaitingForType(target);
 * }
 */
export function is<K extends ActuateKind>(
  value: unknown,
  kind: K
): value is ActuateObjectForKind<K> {
  return (
    value !== null &&
    (typeof value === "object" || typeof value === "function") &&
    ACTUATE_TYPE in value &&
    Reflect.get(value, ACTUATE_TYPE) === kind
  );
}

/**
 * Check if a value is any actuate object.
 */
export function isActuate(value: unknown): value is ActuateObject {
  return (
    value !== null &&
    (typeof value === "object" || typeof value === "function") &&
    ACTUATE_TYPE in value &&
    typeof Reflect.get(value, ACTUATE_TYPE) === "string"
  );
}
