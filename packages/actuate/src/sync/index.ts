/**
 * Optimistic updates and server synchronisation.
 *
 * ```ts
 * import { stableSync, serverPush } from "actuate/sync";
 * ```
 */

export {
  optimisticUpdate,
  type OptimisticUpdateOptions,
  type ReloadInfo,
  type RollbackInfo,
} from "./optimisticUpdate";
export {
  stableSync,
  stableSyncWithPush,
  type StableSyncContext,
  type StableSyncOptions,
  type StableSyncWithPushOptions,
} from "./stableSync";
export { serverPush, type ServerPushOptions } from "./serverPush";
