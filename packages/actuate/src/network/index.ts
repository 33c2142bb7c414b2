/**
 * Network connectivity for actuate.
 *
 * @example
 * ```ts
 * import { connectivityService } from "actuate/network";
 *
 * const app = store({ state, connectivity: connectivityService(isOnline) });
 * ```
 */

export {
  connectivityService,
  hasConnection,
  type ConnectivityResult,
  type ConnectivityService,
} from "./connectivity";
