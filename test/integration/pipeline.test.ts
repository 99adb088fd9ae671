import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'fs'
import path from 'path'
import os from 'os'
import { StateStore } from '../../src'
import type { ClassRecord, ProjectState } from '../../src'

// Stand-ins for the pipeline stages that drive the store

const SOURCE_DIR = path.join('src', 'main', 'java', 'com', 'demo')

function scanClasses(projectPath: string): ClassRecord[] {
  const sourceDir = path.join(projectPath, SOURCE_DIR)
  return fs.readdirSync(sourceDir)
    .filter((file) => file.endsWith('.java'))
    .sort()
    .map((file) => {
      const filePath = path.join(sourceDir, file)
      return {
        name: path.basename(file, '.java'),
        file_path: filePath,
        last_modified: fs.statSync(filePath).mtimeMs,
        status: 'analyzed',
      }
    })
}

async function analyzeProject(store: StateStore, projectPath: string): Promise<number> {
  return store.executeWithRollback('analyze_project', async () => {
    const classes = scanClasses(projectPath)
    store.setState({
      project_path: projectPath,
      project_name: path.basename(projectPath),
      classes,
      extensions: { test_classes: [], retry_count: 0 },
    })
    return classes.length
  })
}

function testClassesOf(state: ProjectState): unknown {
  return state.extensions?.test_classes
}

describe('pipeline integration', () => {
  let projectPath: string
  let store: StateStore

  const writeSource = (name: string): string => {
    const filePath = path.join(projectPath, SOURCE_DIR, `${name}.java`)
    fs.writeFileSync(filePath, `package com.demo;\n\npublic class ${name} {}\n`)
    return filePath
  }

  beforeEach(() => {
    projectPath = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-test-'))
    fs.mkdirSync(path.join(projectPath, SOURCE_DIR), { recursive: true })
    writeSource('Calculator')
    writeSource('Parser')
    store = new StateStore()
  })

  afterEach(() => {
    fs.rmSync(projectPath, { recursive: true, force: true })
  })

  it('should analyze, retry a failed generation and recover from drift', async () => {
    expect(await analyzeProject(store, projectPath)).toBe(2)
    const analyzedSequence = store.getSnapshot('latest').sequence
    expect(await store.verifyStateConsistency()).toEqual({ consistent: true, issues: [] })

    // First attempt fails after writing a half-generated test class
    let attempt = 0
    let generated: string | undefined
    while (generated === undefined && attempt < 3) {
      attempt += 1
      try {
        generated = await store.executeWithRollback('generate_and_validate', async () => {
          const state = store.getState()
          state.extensions = {
            ...state.extensions,
            test_classes: ['CalculatorTest'],
            retry_count: attempt - 1,
          }
          store.setState(state)

          await Promise.resolve()
          if (attempt === 1) {
            throw new Error('compilation failed: missing import org.junit.jupiter.api.Test')
          }

          const validated = store.getState()
          validated.extensions = { ...validated.extensions, build_status: { build_status: 'SUCCESS' } }
          store.setState(validated)
          return 'CalculatorTest'
        })
      } catch (error) {
        expect(error).toEqual(new Error('compilation failed: missing import org.junit.jupiter.api.Test'))
        expect(testClassesOf(store.getState())).toEqual([])
      }
    }

    expect(generated).toBe('CalculatorTest')
    expect(attempt).toBe(2)
    expect(store.getState().extensions).toEqual({
      test_classes: ['CalculatorTest'],
      retry_count: 1,
      build_status: { build_status: 'SUCCESS' },
    })
    expect(store.getTransactionHistory().map((t) => `${t.operation}:${t.status}`)).toEqual([
      'generate_and_validate:committed',
      'generate_and_validate:rolled_back',
      'analyze_project:committed',
    ])

    // Parser.java changes on disk after it was analyzed
    const parserPath = path.join(projectPath, SOURCE_DIR, 'Parser.java')
    fs.utimesSync(parserPath, new Date('2021-06-01T00:00:00.000Z'), new Date('2021-06-01T00:00:00.000Z'))

    const drift = await store.verifyStateConsistency()
    expect(drift.consistent).toBe(false)
    expect(drift.issues.map((issue) => [issue.kind, issue.filePath])).toEqual([
      ['file-modified', parserPath],
    ])

    for (const issue of drift.issues) {
      store.invalidateClassState(path.basename(issue.filePath, '.java'))
    }

    expect(store.getState().classes.map((record) => record.name)).toEqual(['Calculator'])
    expect(await store.verifyStateConsistency()).toEqual({ consistent: true, issues: [] })

    const diff = store.diffSnapshots(analyzedSequence, 'latest')
    expect(diff.changes.map((change) => `${change.changeType}:${change.identifier}`)).toEqual([
      'removed:Parser',
      'modified:build_status',
    ])
  })

  it('should leave no state behind when the first analysis fails', async () => {
    await expect(store.executeWithRollback('analyze_project', () => {
      store.setState({
        project_path: projectPath,
        project_name: 'demo',
        classes: scanClasses(projectPath),
      })
      throw new Error('pom.xml not found')
    })).rejects.toThrow('pom.xml not found')

    expect(store.hasState()).toBe(false)
    await expect(store.verifyStateConsistency()).rejects.toThrow('No project state has been set')
  })

  it('should report deleted sources', async () => {
    await analyzeProject(store, projectPath)
    const calculatorPath = path.join(projectPath, SOURCE_DIR, 'Calculator.java')
    fs.unlinkSync(calculatorPath)

    const report = await store.verifyStateConsistency()

    expect(report.consistent).toBe(false)
    expect(report.issues).toEqual([{
      kind: 'file-missing',
      filePath: calculatorPath,
      message: `Class file not found on disk: ${calculatorPath}`,
    }])
    // verification is read-only
    expect(store.getState().classes).toHaveLength(2)
  })

  it('should verify an explicit state without a live one', async () => {
    const report = await store.verifyStateConsistency({
      project_path: projectPath,
      project_name: 'demo',
      classes: [{ name: 'Missing', file_path: path.join(projectPath, 'Missing.java') }],
    })

    expect(report.issues.map((issue) => issue.kind)).toEqual(['file-missing'])
    expect(store.hasState()).toBe(false)
  })
})
