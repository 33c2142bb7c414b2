/**
 * State persistence for actuate.
 *
 * @example
 * ```ts
 * import { store } from "actuate";
 * import { loggingPersistor } from "actuate/persist";
 *
 * const app = store({ state, persistor: loggingPersistor(myPersistor) });
 * await app.saveInitialStateInPersistence();
 * ```
 */

export {
  DEFAULT_PERSIST_THROTTLE,
  loggingPersistor,
  noopPersistor,
  type PersistChange,
  type Persistor,
} from "./persistor";

export {
  processPersistence,
  type ProcessPersistence,
  type ProcessPersistenceOptions,
} from "./processPersistence";

export { persistNow } from "../core/builtins";
