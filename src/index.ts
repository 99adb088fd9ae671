export { StateStore } from './store/StateStore'
export type { StateStoreOptions, ExecuteOptions } from './store/StateStore'
export { createStateStore } from './store/createStateStore'
export { ConfigLoader } from './config/ConfigLoader'
export {
  StateStoreError,
  NoStateError,
  ValidationError,
  TransactionConflictError,
  TransactionNotFoundError,
  NotFoundError,
} from './errors/StateErrors'
export { validateProjectState } from './validation/stateValidator'
export { diffStates, formatStateDiff, calculateStateHash } from './snapshot/StateDiff'
export type { StateDiff, StateChange, DiffSummary, ChangeType, DiffComponent } from './snapshot/types'
export type {
  ClassRecord,
  ProjectState,
  StateSnapshot,
  SnapshotRef,
  StateTransaction,
  TransactionStatus,
  ConsistencyIssue,
  ConsistencyIssueKind,
  ConsistencyReport,
  StatekeeperConfig,
} from './contracts/types'
