/**
 * Connectivity checks for the Internet-aware policies.
 */

import type { MaybePromise } from "../types";

export type ConnectivityResult =
  | "wifi"
  | "mobile"
  | "ethernet"
  | "vpn"
  | "bluetooth"
  | "other"
  | "none";

export interface ConnectivityService {
  /** Current network interfaces; `["none"]` means offline. */
  check(): Promise<readonly ConnectivityResult[]>;
}

/**
 * Whether any of the results is a usable connection.
 */
export function hasConnection(results: readonly ConnectivityResult[]): boolean {
  return results.some((result) => result !== "none");
}

/**
 * Creates a connectivity service.
 *
 * Without `isOnline` the service is optimistic and always reports a
 * connection. Pass one to plug in a real check:
 *
 * ```ts
 * const connectivity = connectivityService(async () => {
 *   try {
 *     await dns.promises.lookup("example.com");
 *     return true;
 *   } catch {
 *     return false;
 *   }
 * });
 * ```
 */
export function connectivityService(
  isOnline?: () => MaybePromise<boolean>
): ConnectivityService {
  return {
    async check() {
      if (!isOnline) return ["other"];
      return (await isOnline()) ? ["other"] : ["none"];
    },
  };
}
