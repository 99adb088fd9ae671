import fs from 'fs'
import path from 'path'
import { StatekeeperConfig } from '../contracts/types'
import { StatekeeperConfigSchema } from '../contracts/schemas'

export const CONFIG_FILE_NAMES = ['.statekeeper.config.json', 'statekeeper.config.json']

export function defaultConfig(): StatekeeperConfig {
  return StatekeeperConfigSchema.parse({})
}

/**
 * Nearest config file at or above `startDir`, the filesystem root included
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir)

  for (;;) {
    const found = CONFIG_FILE_NAMES
      .map((name) => path.join(dir, name))
      .find((candidate) => fs.existsSync(candidate))
    if (found) return found

    const parent = path.dirname(dir)
    if (parent === dir) return null
    dir = parent
  }
}

function parseConfigFile(configPath: string): StatekeeperConfig | null {
  let raw: unknown
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'))
  } catch (error) {
    if (error instanceof SyntaxError) {
      console.error(`Invalid JSON in config file ${configPath}`)
    } else {
      console.error(`Error loading config from ${configPath}:`, error)
    }
    return null
  }

  const result = StatekeeperConfigSchema.safeParse(raw)
  if (!result.success) {
    console.error(`Invalid config at ${configPath}:`, result.error.errors)
    return null
  }
  return result.data
}

/**
 * Store settings from an explicit path or the nearest config file.
 * Anything unreadable or invalid is reported on stderr and replaced by defaults.
 */
export class ConfigLoader {
  private config: StatekeeperConfig

  constructor(private configPath?: string, private startDir: string = process.cwd()) {
    this.config = this.loadConfig()
  }

  private loadConfig(): StatekeeperConfig {
    const configPath = this.configPath ?? findConfigFile(this.startDir)
    if (!configPath || !fs.existsSync(configPath)) {
      return defaultConfig()
    }
    return parseConfigFile(configPath) ?? defaultConfig()
  }

  getConfig(): StatekeeperConfig {
    return structuredClone(this.config)
  }

  reloadConfig(): void {
    this.config = this.loadConfig()
  }
}
