import { ConfigLoader } from '../config/ConfigLoader'
import { StateStore, StateStoreOptions } from './StateStore'

/**
 * Build a store from the project's statekeeper config file.
 * Explicit options win over the file.
 */
export function createStateStore(
  configLoader: ConfigLoader = new ConfigLoader(),
  overrides: StateStoreOptions = {}
): StateStore {
  const config = configLoader.getConfig()

  return new StateStore({
    maxSnapshots: config.history.maxSnapshots,
    maxTransactions: config.history.maxTransactions,
    mtimeToleranceMs: config.consistency.mtimeToleranceMs,
    ...overrides,
  })
}
