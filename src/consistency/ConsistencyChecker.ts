import { promises as fs } from 'fs'
import type { Stats } from 'fs'
import path from 'path'
import { ConsistencyIssue, ConsistencyReport, ProjectState } from '../contracts'
import { debugLog } from '../logging/debugLog'

export interface TrackedFile {
  filePath: string
  lastModified?: number
}

export interface ConsistencyTarget {
  projectPath: string
  files: TrackedFile[]
}

function isMissingFileError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false
  return error.code === 'ENOENT' || error.code === 'ENOTDIR'
}

/**
 * Pull the paths and timestamps a consistency check needs out of a state.
 * Done before any I/O so the check never reads the live state while awaiting.
 */
export function collectTrackedFiles(state: ProjectState): ConsistencyTarget {
  const files: TrackedFile[] = []
  for (const record of state.classes) {
    if (typeof record.file_path === 'string' && record.file_path.length > 0) {
      files.push({ filePath: record.file_path, lastModified: record.last_modified })
    }
  }
  return { projectPath: state.project_path, files }
}

/**
 * Compares recorded file metadata against the filesystem. Read-only.
 */
export class ConsistencyChecker {
  constructor(private mtimeToleranceMs: number = 0) {}

  async check(target: ConsistencyTarget): Promise<ConsistencyReport> {
    const projectStats = await this.statOrNull(target.projectPath)

    if (!projectStats?.isDirectory()) {
      return this.report(target, [{
        kind: 'project-missing',
        filePath: target.projectPath,
        message: `Project directory does not exist: ${target.projectPath}`,
      }])
    }

    const results = await Promise.all(
      target.files.map((file) => this.checkFile(target.projectPath, file))
    )
    const issues = results.filter((issue): issue is ConsistencyIssue => issue !== null)

    return this.report(target, issues)
  }

  private async checkFile(projectPath: string, file: TrackedFile): Promise<ConsistencyIssue | null> {
    const absolutePath = path.resolve(projectPath, file.filePath)
    const stats = await this.statOrNull(absolutePath)

    if (!stats) {
      return {
        kind: 'file-missing',
        filePath: file.filePath,
        message: `Class file not found on disk: ${file.filePath}`,
      }
    }

    if (file.lastModified !== undefined &&
        Math.abs(stats.mtimeMs - file.lastModified) > this.mtimeToleranceMs) {
      return {
        kind: 'file-modified',
        filePath: file.filePath,
        message: `Class file modified since it was analyzed: ${file.filePath} ` +
          `(recorded ${file.lastModified}, on disk ${stats.mtimeMs})`,
      }
    }

    return null
  }

  private async statOrNull(filePath: string): Promise<Stats | null> {
    try {
      return await fs.stat(filePath)
    } catch (error) {
      if (isMissingFileError(error)) return null
      throw error
    }
  }

  private report(target: ConsistencyTarget, issues: ConsistencyIssue[]): ConsistencyReport {
    debugLog({
      event: 'consistency_checked',
      projectPath: target.projectPath,
      fileCount: target.files.length,
      issueCount: issues.length,
      issues: issues.map((issue) => issue.message),
    })

    return {
      consistent: issues.length === 0,
      issues,
    }
  }
}
