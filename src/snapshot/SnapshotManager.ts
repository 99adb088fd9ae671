import { ProjectState, SnapshotRef, StateSnapshot } from '../contracts'
import { NotFoundError } from '../errors/StateErrors'
import { debugLog } from '../logging/debugLog'
import { checksumOf } from './checksum'

/**
 * Append-only snapshot history with FIFO eviction.
 * Snapshots never leave this class by reference.
 */
export class SnapshotManager {
  private static readonly DEFAULT_MAX_SNAPSHOTS = 10

  private snapshots: StateSnapshot[] = []
  private nextSequence = 1

  constructor(
    private maxSnapshots: number = SnapshotManager.DEFAULT_MAX_SNAPSHOTS,
    private now: () => Date = () => new Date()
  ) {}

  /**
   * Record a new snapshot of the given state and return a copy of it
   */
  record(state: ProjectState, operation: string): StateSnapshot {
    const snapshot = this.capture(state, this.nextSequence, operation)
    this.nextSequence += 1
    this.snapshots.push(snapshot)

    while (this.snapshots.length > this.maxSnapshots) {
      const evicted = this.snapshots.shift()
      debugLog({
        event: 'snapshot_evicted',
        sequence: evicted?.sequence,
        operation: evicted?.operation,
      })
    }

    debugLog({
      event: 'snapshot_recorded',
      sequence: snapshot.sequence,
      operation,
      checksum: snapshot.checksum,
      retained: this.snapshots.length,
    })

    return structuredClone(snapshot)
  }

  /**
   * Build a snapshot without adding it to history.
   * Used for transaction pre-images, which reuse the sequence of the
   * history entry the live state came from.
   */
  capture(state: ProjectState, sequence: number, operation: string): StateSnapshot {
    return {
      sequence,
      timestamp: this.now().toISOString(),
      operation,
      checksum: checksumOf(state),
      state: structuredClone(state),
    }
  }

  getSnapshot(ref: SnapshotRef = 'latest'): StateSnapshot {
    const snapshot = ref === 'latest'
      ? this.snapshots.at(-1)
      : this.snapshots.find((candidate) => candidate.sequence === ref)

    if (!snapshot) {
      throw new NotFoundError(ref)
    }
    return structuredClone(snapshot)
  }

  getSnapshotsSince(since: Date): StateSnapshot[] {
    const threshold = since.getTime()
    return this.snapshots
      .filter((snapshot) => Date.parse(snapshot.timestamp) >= threshold)
      .map((snapshot) => structuredClone(snapshot))
  }

  /**
   * Sequences currently retained, oldest first
   */
  getRetainedSequences(): number[] {
    return this.snapshots.map((snapshot) => snapshot.sequence)
  }

  get size(): number {
    return this.snapshots.length
  }

  clear(): void {
    this.snapshots = []
    this.nextSequence = 1
  }
}
