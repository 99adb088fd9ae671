import { v4 as uuidv4 } from 'uuid'
import {
  ConsistencyReport,
  ProjectState,
  SnapshotRef,
  StateSnapshot,
  StateTransaction,
} from '../contracts'
import {
  NoStateError,
  TransactionConflictError,
  TransactionNotFoundError,
  ValidationError,
} from '../errors/StateErrors'
import { HistoryManager } from '../history/HistoryManager'
import { SnapshotManager } from '../snapshot/SnapshotManager'
import { diffStates } from '../snapshot/StateDiff'
import { StateDiff } from '../snapshot/types'
import { ConsistencyChecker, collectTrackedFiles } from '../consistency/ConsistencyChecker'
import { validateProjectState } from '../validation/stateValidator'
import { debugLog } from '../logging/debugLog'

export interface StateStoreOptions {
  maxSnapshots?: number
  maxTransactions?: number
  mtimeToleranceMs?: number
  now?: () => Date
}

export interface ExecuteOptions {
  /** Called after the rollback, before the original error is rethrown */
  onError?: (error: unknown) => void
}

interface LiveState {
  state: ProjectState
  // Sequence of the history snapshot this state was recorded as
  sequence: number
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`)
  }
}

/**
 * Transactional store for the analysis state of a single project.
 *
 * Every public method except the two async ones runs to completion without
 * yielding, so the live state, both histories and the active-transaction slot
 * are only ever observed in a consistent combination. Async methods copy what
 * they need synchronously before their first await.
 *
 * Create one store per project and pass it to the stages that need it.
 */
export class StateStore {
  private live: LiveState | null = null
  private activeTransaction: StateTransaction | null = null
  private readonly snapshotManager: SnapshotManager
  private readonly transactionHistory: HistoryManager<StateTransaction>
  private readonly consistencyChecker: ConsistencyChecker
  private readonly now: () => Date

  constructor(options: StateStoreOptions = {}) {
    const maxSnapshots = options.maxSnapshots ?? 10
    const maxTransactions = options.maxTransactions ?? 50
    assertPositiveInteger('maxSnapshots', maxSnapshots)
    assertPositiveInteger('maxTransactions', maxTransactions)

    this.now = options.now ?? ((): Date => new Date())
    this.snapshotManager = new SnapshotManager(maxSnapshots, this.now)
    this.transactionHistory = new HistoryManager<StateTransaction>(maxTransactions)
    this.consistencyChecker = new ConsistencyChecker(options.mtimeToleranceMs ?? 0)
  }

  hasState(): boolean {
    return this.live !== null
  }

  getState(): ProjectState {
    if (!this.live) {
      throw new NoStateError()
    }
    return structuredClone(this.live.state)
  }

  /**
   * Replace the live state and record a snapshot of it.
   * The caller's object is copied; mutating it afterwards has no effect.
   */
  setState(state: ProjectState, operation: string = 'set_state'): StateSnapshot {
    const next = structuredClone(state)
    const violations = validateProjectState(next)
    if (violations.length > 0) {
      debugLog({ event: 'state_rejected', operation, violations })
      throw new ValidationError(violations)
    }

    const snapshot = this.snapshotManager.record(next, operation)
    this.live = { state: next, sequence: snapshot.sequence }

    debugLog({
      event: 'state_set',
      operation,
      sequence: snapshot.sequence,
      projectName: next.project_name,
      classCount: next.classes.length,
      inTransaction: this.activeTransaction?.id,
    })

    return snapshot
  }

  validateState(state: unknown): string[] {
    return validateProjectState(state)
  }

  beginTransaction(operation: string): string {
    if (this.activeTransaction) {
      throw new TransactionConflictError(
        operation,
        this.activeTransaction.id,
        this.activeTransaction.operation
      )
    }

    const transaction: StateTransaction = {
      id: uuidv4(),
      operation,
      status: 'active',
      startedAt: this.now().toISOString(),
      preImage: this.live
        ? this.snapshotManager.capture(this.live.state, this.live.sequence, operation)
        : null,
    }
    this.activeTransaction = transaction

    debugLog({
      event: 'transaction_begin',
      transactionId: transaction.id,
      operation,
      preImageSequence: transaction.preImage?.sequence ?? null,
    })

    return transaction.id
  }

  /**
   * Accept everything written since beginTransaction.
   * On a validation failure the transaction stays active so the caller can
   * fix the state and retry, or roll back.
   */
  commitTransaction(transactionId: string): void {
    const transaction = this.requireActive(transactionId)

    let resultSequence: number | undefined
    if (this.live) {
      const violations = validateProjectState(this.live.state)
      if (violations.length > 0) {
        debugLog({ event: 'commit_rejected', transactionId, violations })
        throw new ValidationError(violations)
      }

      const snapshot = this.snapshotManager.record(this.live.state, transaction.operation)
      this.live = { state: this.live.state, sequence: snapshot.sequence }
      resultSequence = snapshot.sequence
    }

    this.finish({
      ...transaction,
      status: 'committed',
      endedAt: this.now().toISOString(),
      resultSequence,
    })

    debugLog({
      event: 'transaction_commit',
      transactionId,
      operation: transaction.operation,
      resultSequence: resultSequence ?? null,
    })
  }

  /**
   * Restore the state captured by beginTransaction, discarding every write
   * made since. A transaction begun with no state returns the store to the
   * uninitialized condition.
   */
  rollbackTransaction(transactionId: string, error?: string): void {
    const transaction = this.requireActive(transactionId)
    const { preImage } = transaction

    this.live = preImage
      ? { state: structuredClone(preImage.state), sequence: preImage.sequence }
      : null

    this.finish({
      ...transaction,
      status: 'rolled_back',
      endedAt: this.now().toISOString(),
      error,
    })

    debugLog({
      event: 'transaction_rollback',
      transactionId,
      operation: transaction.operation,
      restoredSequence: preImage?.sequence ?? null,
      error,
    })
  }

  /**
   * Run `operation` inside a transaction. Its result is returned after a
   * successful commit; if it throws (or the commit is rejected) the state is
   * rolled back and the original error is rethrown as is.
   */
  async executeWithRollback<T>(
    operation: string,
    fn: () => T | Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const transactionId = this.beginTransaction(operation)

    try {
      const result = await fn()
      this.commitTransaction(transactionId)
      return result
    } catch (error) {
      // clearState() may have discarded the transaction while fn was running
      if (this.activeTransaction?.id === transactionId) {
        this.rollbackTransaction(transactionId, errorMessage(error))
      }
      this.notifyError(transactionId, options.onError, error)
      throw error
    }
  }

  async verifyStateConsistency(state?: ProjectState): Promise<ConsistencyReport> {
    const source = state ?? this.live?.state
    if (!source) {
      throw new NoStateError()
    }

    const target = collectTrackedFiles(source)
    return this.consistencyChecker.check(target)
  }

  /**
   * Drop the cached analysis of one class and record the result as a new
   * snapshot. Does nothing when the class (or any state) is absent.
   */
  invalidateClassState(className: string): void {
    if (!this.live) return

    const { state } = this.live
    const remaining = state.classes.filter((record) => record.name !== className)
    if (remaining.length === state.classes.length) return

    this.setState({ ...state, classes: remaining }, 'invalidate_class_state')
  }

  getSnapshot(ref: SnapshotRef = 'latest'): StateSnapshot {
    return this.snapshotManager.getSnapshot(ref)
  }

  getSnapshotsSince(since: Date): StateSnapshot[] {
    return this.snapshotManager.getSnapshotsSince(since)
  }

  diffSnapshots(from: SnapshotRef, to: SnapshotRef = 'latest'): StateDiff {
    const before = this.snapshotManager.getSnapshot(from)
    const after = this.snapshotManager.getSnapshot(to)
    return diffStates(before.state, after.state, this.now())
  }

  /**
   * Resolved transactions, most recent first
   */
  getTransactionHistory(limit: number = 10): StateTransaction[] {
    return this.transactionHistory
      .getRecent(limit)
      .map((transaction) => structuredClone(transaction))
  }

  getActiveTransaction(): StateTransaction | null {
    return this.activeTransaction ? structuredClone(this.activeTransaction) : null
  }

  /**
   * Hard reset for teardown. An active transaction is discarded, not rolled back.
   */
  clearState(): void {
    debugLog({
      event: 'state_cleared',
      discardedTransaction: this.activeTransaction?.id ?? null,
    })

    this.live = null
    this.activeTransaction = null
    this.snapshotManager.clear()
    this.transactionHistory.clear()
  }

  // A failing hook is logged; the operation's error is what the caller sees
  private notifyError(
    transactionId: string,
    onError: ExecuteOptions['onError'],
    error: unknown
  ): void {
    if (!onError) return
    try {
      onError(error)
    } catch (hookError) {
      debugLog({
        event: 'on_error_failed',
        transactionId,
        error: errorMessage(hookError),
      })
    }
  }

  private requireActive(transactionId: string): StateTransaction {
    if (!this.activeTransaction || this.activeTransaction.id !== transactionId) {
      throw new TransactionNotFoundError(transactionId)
    }
    return this.activeTransaction
  }

  private finish(transaction: StateTransaction): void {
    this.transactionHistory.addRecord(transaction)
    this.activeTransaction = null
  }
}
