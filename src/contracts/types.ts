export interface ClassRecord {
  name?: string
  file_path?: string
  // epoch milliseconds, as reported by fs.Stats#mtimeMs
  last_modified?: number
  [key: string]: unknown
}

export interface ProjectState {
  project_path: string
  project_name: string
  classes: ClassRecord[]
  // Pipeline-specific fields (build status, dependencies, retry counters).
  // Transported and copied, never inspected by the store.
  extensions?: Record<string, unknown>
}

export interface StateSnapshot {
  sequence: number
  timestamp: string
  operation: string
  checksum: string
  state: ProjectState
}

export type SnapshotRef = number | 'latest'

export type TransactionStatus = 'active' | 'committed' | 'rolled_back'

export interface StateTransaction {
  id: string
  operation: string
  status: TransactionStatus
  startedAt: string
  endedAt?: string
  // null when the transaction began before any state was set
  preImage: StateSnapshot | null
  resultSequence?: number
  error?: string
}

export type ConsistencyIssueKind = 'project-missing' | 'file-missing' | 'file-modified'

export interface ConsistencyIssue {
  kind: ConsistencyIssueKind
  filePath: string
  message: string
}

export interface ConsistencyReport {
  consistent: boolean
  issues: ConsistencyIssue[]
}

export interface StatekeeperConfig {
  history: {
    maxSnapshots: number
    maxTransactions: number
  }
  consistency: {
    mtimeToleranceMs: number
  }
}
