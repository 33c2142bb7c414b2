/**
 * Internet-aware policies.
 */

import { AbortDispatchError, ConnectionError } from "../errors";
import { LOG_PREFIX } from "../dev";
import type { Policy } from "../types";
import { delay } from "../utils/delay";
import { backoff, type BackoffOptions } from "./backoff";
import { definePolicy } from "./policy";

export interface CheckInternetOptions {
  /** Whether the raised ConnectionError asks for a dialog (default: true) */
  ifOpenDialog?: boolean;
}

/**
 * Fails the dispatch with a ConnectionError before `before` runs when
 * there is no connection.
 */
export function checkInternet<TArgs extends readonly unknown[] = readonly unknown[]>(
  options: CheckInternetOptions = {}
): Policy<"connectivity", TArgs> {
  const ifOpenDialog = options.ifOpenDialog ?? true;

  return definePolicy<"connectivity", TArgs>(
    ifOpenDialog ? "checkInternet" : "noDialog",
    ["connectivity"],
    true,
    (action) => ({
      async before() {
        if (!(await action.store.hasInternet())) {
          throw ConnectionError.noConnectivity.withDialog(ifOpenDialog);
        }
      },
    })
  );
}

/** checkInternet whose error shows no dialog. */
export function noDialog<TArgs extends readonly unknown[] = readonly unknown[]>(): Policy<
  "connectivity",
  TArgs
> {
  return checkInternet<TArgs>({ ifOpenDialog: false });
}

/**
 * Drops the dispatch silently when there is no connection.
 */
export function abortWhenNoInternet<
  TArgs extends readonly unknown[] = readonly unknown[]
>(): Policy<"connectivity", TArgs> {
  return definePolicy<"connectivity", TArgs>(
    "abortWhenNoInternet",
    ["connectivity"],
    true,
    (action) => ({
      async before() {
        if (!(await action.store.hasInternet())) {
          throw new AbortDispatchError();
        }
      },
    })
  );
}

export interface UnlimitedRetryCheckInternetOptions extends BackoffOptions {
  /** Delay cap while offline in ms (default: 1000) */
  maxDelayNoInternet?: number;
}

/**
 * Keeps trying until the reducer succeeds, treating a missing connection as
 * one more retryable failure with a shorter delay cap. Also drops the
 * dispatch while another of the same action spec is running.
 *
 * Logs one line per attempt:
 * ```
 * [actuate] Trying loadFeed.
 * [actuate] Retrying loadFeed; aborted because of no internet (attempt 1).
 * [actuate] Retrying loadFeed (attempt 2).
 * ```
 */
export function unlimitedRetryCheckInternet<
  TArgs extends readonly unknown[] = readonly unknown[]
>(
  options: UnlimitedRetryCheckInternetOptions = {}
): Policy<"gate" | "connectivity" | "reduceLoop" | "retry", TArgs> {
  const maxDelayNoInternet = options.maxDelayNoInternet ?? 1000;

  return definePolicy<"gate" | "connectivity" | "reduceLoop" | "retry", TArgs>(
    "unlimitedRetryCheckInternet",
    ["gate", "connectivity", "reduceLoop", "retry"],
    true,
    (action) => {
      const { store, name } = action;

      const log = (attempts: number, offline: boolean) => {
        const verb = attempts === 0 ? "Trying" : "Retrying";
        const suffix = attempts === 0 ? "" : ` (attempt ${attempts})`;
        store.logger.log(
          offline
            ? `${LOG_PREFIX} ${verb} ${name}; aborted because of no internet${suffix}.`
            : `${LOG_PREFIX} ${verb} ${name}${suffix}.`
        );
      };

      return {
        abortDispatch: () => store.isWaitingForType(action.type),
        async wrapReduce(next) {
          const state = backoff({
            ...options,
            maxRetries: options.maxRetries ?? -1,
          });
          for (;;) {
            try {
              // A failing connectivity check counts as online; its error is retried.
              let online = true;
              try {
                online = await store.hasInternet();
              } finally {
                log(state.attempts, !online);
              }
              if (!online) throw ConnectionError.noConnectivity;
              return await next();
            } catch (error) {
              if (!state.fail()) throw error;
              await delay(
                state.nextDelay(
                  error instanceof ConnectionError ? maxDelayNoInternet : undefined
                )
              );
            }
          }
        },
      };
    }
  );
}
