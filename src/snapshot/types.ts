export type ChangeType = 'added' | 'removed' | 'modified'

export type DiffComponent = 'classes' | 'fields' | 'methods' | 'build_status'

export interface StateChange {
  changeType: ChangeType
  component: DiffComponent
  // Class name, or Class.member for fields and methods
  identifier: string
  before: unknown
  after: unknown
  details: string
}

export interface DiffSummary {
  added: number
  removed: number
  modified: number
  classesChanged: number
  fieldsChanged: number
  methodsChanged: number
}

export interface StateDiff {
  timestamp: string
  beforeHash: string
  afterHash: string
  changes: StateChange[]
  summary: DiffSummary
}
