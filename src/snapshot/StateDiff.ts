import { ClassRecord, ProjectState } from '../contracts'
import { canonicalJson, checksumOf } from './checksum'
import { DiffComponent, DiffSummary, StateChange, StateDiff } from './types'

// Extension keys that change on every pipeline step and say nothing about the analysis
const VOLATILE_EXTENSION_KEYS = ['messages', 'last_action', 'summary_report', 'retry_count']

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function sameValue(a: unknown, b: unknown): boolean {
  return canonicalJson(a) === canonicalJson(b)
}

/**
 * Hash of the state without volatile extension keys, for comparing two
 * analyses of the same project
 */
export function calculateStateHash(state: ProjectState): string {
  const extensions = { ...(state.extensions ?? {}) }
  for (const key of VOLATILE_EXTENSION_KEYS) {
    delete extensions[key]
  }
  return checksumOf({ ...state, extensions })
}

function classesByName(state: ProjectState): Map<string, ClassRecord> {
  const classes = new Map<string, ClassRecord>()
  for (const record of state.classes) {
    if (typeof record.name === 'string') {
      classes.set(record.name, record)
    }
  }
  return classes
}

/**
 * Index the named entries of a member list (fields, methods).
 * Entries without a string name are not comparable and are skipped.
 */
function membersByName(value: unknown): Map<string, unknown> {
  const members = new Map<string, unknown>()
  if (!Array.isArray(value)) return members

  for (const member of value) {
    if (isRecord(member) && typeof member.name === 'string') {
      members.set(member.name, member)
    }
  }
  return members
}

function buildStatusOf(state: ProjectState): unknown {
  const buildStatus = state.extensions?.build_status
  return isRecord(buildStatus) ? buildStatus.build_status : undefined
}

class DiffCollector {
  readonly changes: StateChange[] = []
  readonly summary: DiffSummary = {
    added: 0,
    removed: 0,
    modified: 0,
    classesChanged: 0,
    fieldsChanged: 0,
    methodsChanged: 0,
  }

  add(change: StateChange): void {
    this.changes.push(change)
    this.summary[change.changeType] += 1

    switch (change.component) {
      case 'classes':
        this.summary.classesChanged += 1
        break
      case 'fields':
        this.summary.fieldsChanged += 1
        break
      case 'methods':
        this.summary.methodsChanged += 1
        break
    }
  }
}

function compareMembers(
  collector: DiffCollector,
  className: string,
  component: Extract<DiffComponent, 'fields' | 'methods'>,
  before: unknown,
  after: unknown
): number {
  const label = component === 'fields' ? 'Field' : 'Method'
  const beforeMembers = membersByName(before)
  const afterMembers = membersByName(after)
  const recorded = collector.changes.length

  for (const [name, member] of beforeMembers) {
    const afterMember = afterMembers.get(name)
    if (afterMember === undefined) {
      collector.add({
        changeType: 'removed',
        component,
        identifier: `${className}.${name}`,
        before: member,
        after: undefined,
        details: `${label} ${name} removed from class ${className}`,
      })
    } else if (!sameValue(member, afterMember)) {
      collector.add({
        changeType: 'modified',
        component,
        identifier: `${className}.${name}`,
        before: member,
        after: afterMember,
        details: `${label} ${name} modified in class ${className}`,
      })
    }
  }

  for (const [name, member] of afterMembers) {
    if (!beforeMembers.has(name)) {
      collector.add({
        changeType: 'added',
        component,
        identifier: `${className}.${name}`,
        before: undefined,
        after: member,
        details: `${label} ${name} added to class ${className}`,
      })
    }
  }

  return collector.changes.length - recorded
}

/**
 * Compare two project states class by class.
 * Classes are matched by name; unnamed records are ignored.
 */
export function diffStates(before: ProjectState, after: ProjectState, now: Date = new Date()): StateDiff {
  const collector = new DiffCollector()
  const beforeClasses = classesByName(before)
  const afterClasses = classesByName(after)

  for (const [name, record] of beforeClasses) {
    if (!afterClasses.has(name)) {
      collector.add({
        changeType: 'removed',
        component: 'classes',
        identifier: name,
        before: record,
        after: undefined,
        details: `Class ${name} removed`,
      })
    }
  }

  for (const [name, record] of afterClasses) {
    if (!beforeClasses.has(name)) {
      collector.add({
        changeType: 'added',
        component: 'classes',
        identifier: name,
        before: undefined,
        after: record,
        details: `Class ${name} added`,
      })
    }
  }

  for (const [name, beforeRecord] of beforeClasses) {
    const afterRecord = afterClasses.get(name)
    if (!afterRecord || sameValue(beforeRecord, afterRecord)) continue

    const memberChanges =
      compareMembers(collector, name, 'fields', beforeRecord.fields, afterRecord.fields) +
      compareMembers(collector, name, 'methods', beforeRecord.methods, afterRecord.methods)

    // Anything else about the class changed (path, timestamp, status)
    if (memberChanges === 0) {
      collector.add({
        changeType: 'modified',
        component: 'classes',
        identifier: name,
        before: beforeRecord,
        after: afterRecord,
        details: `Class ${name} modified`,
      })
    }
  }

  const beforeBuild = buildStatusOf(before)
  const afterBuild = buildStatusOf(after)
  if (!sameValue(beforeBuild, afterBuild)) {
    collector.add({
      changeType: 'modified',
      component: 'build_status',
      identifier: 'build_status',
      before: beforeBuild,
      after: afterBuild,
      details: `Build status changed from ${String(beforeBuild)} to ${String(afterBuild)}`,
    })
  }

  return {
    timestamp: now.toISOString(),
    beforeHash: calculateStateHash(before),
    afterHash: calculateStateHash(after),
    changes: collector.changes,
    summary: collector.summary,
  }
}

function describeValue(value: unknown): string {
  return typeof value === 'string' ? value : canonicalJson(value)
}

/**
 * Plain-text rendering of a diff, one numbered entry per change
 */
export function formatStateDiff(diff: StateDiff): string {
  const rule = '='.repeat(80)
  const lines = [
    rule,
    'STATE DIFF REPORT',
    `Timestamp: ${diff.timestamp}`,
    `Before Hash: ${diff.beforeHash}`,
    `After Hash: ${diff.afterHash}`,
    rule,
    '',
    'SUMMARY:',
    `  Changes: ${diff.changes.length}`,
    `  Added: ${diff.summary.added}`,
    `  Removed: ${diff.summary.removed}`,
    `  Modified: ${diff.summary.modified}`,
    `  Classes Changed: ${diff.summary.classesChanged}`,
    `  Fields Changed: ${diff.summary.fieldsChanged}`,
    `  Methods Changed: ${diff.summary.methodsChanged}`,
    '',
    rule,
    'CHANGES:',
    '',
  ]

  diff.changes.forEach((change, index) => {
    lines.push(`${index + 1}. [${change.changeType.toUpperCase()}] ${change.component}: ${change.identifier}`)
    lines.push(`   ${change.details}`)
    if (change.before !== undefined) {
      lines.push(`   Before: ${describeValue(change.before)}`)
    }
    if (change.after !== undefined) {
      lines.push(`   After: ${describeValue(change.after)}`)
    }
    lines.push('')
  })

  lines.push(rule)

  return lines.join('\n')
}
