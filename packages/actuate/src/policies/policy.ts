/**
 * Shared plumbing for policy factories.
 */

import { policyKey } from "../core/keys";
import {
  ACTUATE_TYPE,
  type Action,
  type Policy,
  type PolicyHooks,
  type PolicySlot,
} from "../types";

/**
 * How a policy partitions its bookkeeping. By default every dispatch of the
 * same action spec shares one key.
 */
export interface KeyOptions<TArgs extends readonly unknown[]> {
  /** Extra key part, e.g. a resource id: the key becomes `[spec, params]` */
  keyParams?: (...args: TArgs) => unknown;
  /** Replaces the whole key, e.g. to share it across action specs */
  key?: (...args: TArgs) => unknown;
}

export function resolveKey<St, TArgs extends readonly unknown[]>(
  action: Action<St, TArgs>,
  options: KeyOptions<TArgs>
): unknown {
  if (options.key) return options.key(...action.args);
  return policyKey(
    action.type,
    options.keyParams ? options.keyParams(...action.args) : null
  );
}

export function definePolicy<TSlot extends PolicySlot, TArgs extends readonly unknown[]>(
  name: string,
  slots: readonly TSlot[],
  suspends: boolean,
  attach: <St>(action: Action<St, TArgs>) => PolicyHooks<St>
): Policy<TSlot, TArgs> {
  return {
    [ACTUATE_TYPE]: "policy",
    name,
    slots,
    suspends,
    attach,
  };
}
