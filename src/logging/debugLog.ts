import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'

// Debug logging - only enabled when STATEKEEPER_DEBUG environment variable is set
const DEBUG = process.env.STATEKEEPER_DEBUG === 'true' || process.env.STATEKEEPER_DEBUG === '1'

export const isDebugEnabled = (): boolean => DEBUG

export const debugLogPath = (): string => join(homedir(), '.statekeeper', 'debug.log')

export const debugLog = (message: Record<string, unknown>): void => {
  if (!DEBUG) return

  const logPath = debugLogPath()

  // Ensure directory exists
  mkdirSync(join(homedir(), '.statekeeper'), { recursive: true })

  appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
}
