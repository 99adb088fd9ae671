import { describe, it, expect } from 'vitest'
import { calculateStateHash, diffStates, formatStateDiff } from './StateDiff'
import { ProjectState } from '../contracts'

const createState = (overrides: Partial<ProjectState> = {}): ProjectState => ({
  project_path: '/work/demo',
  project_name: 'demo',
  classes: [],
  ...overrides,
})

const fixedDate = new Date('2024-01-20T12:00:00.000Z')

describe('diffStates', () => {
  it('should report nothing for equal states', () => {
    const state = createState({ classes: [{ name: 'Foo', methods: [{ name: 'run' }] }] })

    const diff = diffStates(state, createState({ classes: [{ name: 'Foo', methods: [{ name: 'run' }] }] }), fixedDate)

    expect(diff.changes).toEqual([])
    expect(diff.summary).toEqual({
      added: 0,
      removed: 0,
      modified: 0,
      classesChanged: 0,
      fieldsChanged: 0,
      methodsChanged: 0,
    })
    expect(diff.beforeHash).toBe(diff.afterHash)
    expect(diff.timestamp).toBe('2024-01-20T12:00:00.000Z')
  })

  it('should report class and member changes', () => {
    const before = createState({
      classes: [
        {
          name: 'Foo',
          fields: [{ name: 'count', type: 'int' }],
          methods: [{ name: 'run' }, { name: 'stop' }],
        },
        { name: 'Old' },
      ],
    })
    const after = createState({
      classes: [
        {
          name: 'Foo',
          fields: [{ name: 'count', type: 'long' }, { name: 'label', type: 'String' }],
          methods: [{ name: 'run' }],
        },
        { name: 'New' },
      ],
    })

    const diff = diffStates(before, after, fixedDate)

    expect(diff.changes.map((change) => [change.changeType, change.component, change.identifier])).toEqual([
      ['removed', 'classes', 'Old'],
      ['added', 'classes', 'New'],
      ['modified', 'fields', 'Foo.count'],
      ['added', 'fields', 'Foo.label'],
      ['removed', 'methods', 'Foo.stop'],
    ])
    expect(diff.changes[2]).toEqual({
      changeType: 'modified',
      component: 'fields',
      identifier: 'Foo.count',
      before: { name: 'count', type: 'int' },
      after: { name: 'count', type: 'long' },
      details: 'Field count modified in class Foo',
    })
    expect(diff.summary).toEqual({
      added: 2,
      removed: 2,
      modified: 1,
      classesChanged: 2,
      fieldsChanged: 2,
      methodsChanged: 1,
    })
    expect(diff.beforeHash).not.toBe(diff.afterHash)
  })

  it('should report a class modified outside its members', () => {
    const before = createState({ classes: [{ name: 'Foo', file_path: 'src/Foo.java', last_modified: 1 }] })
    const after = createState({ classes: [{ name: 'Foo', file_path: 'src/Foo.java', last_modified: 2 }] })

    const diff = diffStates(before, after, fixedDate)

    expect(diff.changes).toHaveLength(1)
    expect(diff.changes[0].details).toBe('Class Foo modified')
    expect(diff.summary.modified).toBe(1)
    expect(diff.summary.classesChanged).toBe(1)
  })

  it('should report build status changes', () => {
    const before = createState({ extensions: { build_status: { build_status: 'FAILED' } } })
    const after = createState({ extensions: { build_status: { build_status: 'SUCCESS' } } })

    const diff = diffStates(before, after, fixedDate)

    expect(diff.changes).toEqual([{
      changeType: 'modified',
      component: 'build_status',
      identifier: 'build_status',
      before: 'FAILED',
      after: 'SUCCESS',
      details: 'Build status changed from FAILED to SUCCESS',
    }])
    expect(diff.summary.modified).toBe(1)
    expect(diff.summary.classesChanged).toBe(0)
  })

  it('should ignore class records without a name', () => {
    const diff = diffStates(
      createState({ classes: [{ file_path: 'a.java' }] }),
      createState({ classes: [{ file_path: 'b.java' }] }),
      fixedDate
    )

    expect(diff.changes).toEqual([])
  })
})

describe('calculateStateHash', () => {
  it('should ignore volatile extension fields', () => {
    const before = createState({ extensions: { retry_count: 0, messages: ['a'], dependencies: ['junit'] } })
    const after = createState({ extensions: { retry_count: 3, messages: ['a', 'b'], dependencies: ['junit'] } })

    expect(calculateStateHash(before)).toBe(calculateStateHash(after))
  })

  it('should change when analysed content changes', () => {
    const before = createState({ extensions: { dependencies: ['junit'] } })
    const after = createState({ extensions: { dependencies: ['junit', 'mockito'] } })

    expect(calculateStateHash(before)).not.toBe(calculateStateHash(after))
  })
})

describe('formatStateDiff', () => {
  it('should render a numbered report', () => {
    const diff = diffStates(createState(), createState({ classes: [{ name: 'Foo' }] }), fixedDate)

    const lines = formatStateDiff(diff).split('\n')

    expect(lines[0]).toBe('='.repeat(80))
    expect(lines[1]).toBe('STATE DIFF REPORT')
    expect(lines[2]).toBe('Timestamp: 2024-01-20T12:00:00.000Z')
    expect(lines).toContain('  Changes: 1')
    expect(lines).toContain('  Added: 1')
    expect(lines).toContain('  Classes Changed: 1')
    expect(lines).toContain('1. [ADDED] classes: Foo')
    expect(lines).toContain('   Class Foo added')
    expect(lines).toContain('   After: {"name":"Foo"}')
    expect(lines.some((line) => line.startsWith('   Before:'))).toBe(false)
    expect(lines[lines.length - 1]).toBe('='.repeat(80))
  })
})
