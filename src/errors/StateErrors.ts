import { SnapshotRef } from '../contracts'

/**
 * Base class for every error the state store raises itself.
 * Errors thrown by operations passed to executeWithRollback are never wrapped.
 */
export class StateStoreError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'StateStoreError'
  }
}

/**
 * Raised when state is read before any has been set.
 */
export class NoStateError extends StateStoreError {
  constructor() {
    super('No project state has been set')
    this.name = 'NoStateError'
  }
}

export class ValidationError extends StateStoreError {
  /** Human-readable violations, one per failed check. */
  public readonly violations: string[]

  constructor(violations: string[]) {
    super(`Invalid project state: ${violations.join('; ')}`)
    this.name = 'ValidationError'
    this.violations = violations
  }
}

export class TransactionConflictError extends StateStoreError {
  public readonly activeTransactionId: string

  constructor(requestedOperation: string, activeTransactionId: string, activeOperation: string) {
    super(
      `Cannot begin '${requestedOperation}': transaction ${activeTransactionId} ` +
      `('${activeOperation}') is still active`
    )
    this.name = 'TransactionConflictError'
    this.activeTransactionId = activeTransactionId
  }
}

export class TransactionNotFoundError extends StateStoreError {
  public readonly transactionId: string

  constructor(transactionId: string) {
    super(`Transaction ${transactionId} is not the active transaction`)
    this.name = 'TransactionNotFoundError'
    this.transactionId = transactionId
  }
}

/**
 * Raised for a snapshot sequence that was evicted or never recorded.
 */
export class NotFoundError extends StateStoreError {
  public readonly sequence: SnapshotRef

  constructor(sequence: SnapshotRef) {
    super(
      sequence === 'latest'
        ? 'Snapshot history is empty'
        : `Snapshot ${sequence} is not in history`
    )
    this.name = 'NotFoundError'
    this.sequence = sequence
  }
}
