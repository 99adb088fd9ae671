import { ZodIssue } from 'zod'
import { ProjectStateSchema } from '../contracts/schemas'

/**
 * Render a zod issue path the way the state is usually written,
 * e.g. ['classes', 2, 'file_path'] -> 'classes[2].file_path'
 */
export function formatIssuePath(issuePath: Array<string | number>): string {
  return issuePath.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`
    }
    return acc ? `${acc}.${segment}` : segment
  }, '')
}

function formatIssue(issue: ZodIssue): string {
  const location = formatIssuePath(issue.path) || 'state'
  return `${location}: ${issue.message}`
}

/**
 * Check a candidate project state without side effects.
 * Returns one message per violation; an empty array means the state is valid.
 * File existence is deliberately not checked here (see ConsistencyChecker).
 */
export function validateProjectState(state: unknown): string[] {
  const result = ProjectStateSchema.safeParse(state)
  if (result.success) {
    return []
  }
  return result.error.issues.map(formatIssue)
}
