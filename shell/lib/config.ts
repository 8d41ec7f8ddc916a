import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'
import os from 'os'
import path from 'path'
import { ConfigError } from './errors'

export type OutputMode = 'table' | 'csv' | 'sql' | 'null'

export const OUTPUT_MODES: readonly OutputMode[] = ['table', 'csv', 'sql', 'null']

export interface ShellConfig {
  history_file: string
  history_size: number
  mode: OutputMode
  prompt: string
  /** Empty string disables the pager */
  pager: string
  pager_threshold: number
  highlight: boolean
  hints: boolean
  debug: boolean
}

const DEFAULT_CONFIG: ShellConfig = {
  history_file: path.join(os.homedir(), '.litesh_history'),
  history_size: 1000,
  mode: 'table',
  prompt: '>> ',
  pager: 'less',
  pager_threshold: 100,
  highlight: true,
  hints: true,
  debug: false,
}

let loadedConfig: ShellConfig = { ...DEFAULT_CONFIG }

export function isOutputMode(value: unknown): value is OutputMode {
  return typeof value === 'string' && OUTPUT_MODES.some((mode) => mode === value)
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p
}

/**
 * Default config location: $XDG_CONFIG_HOME/litesh/config.toml, falling back
 * to ~/.config/litesh/config.toml.
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config')
  return path.join(base, 'litesh', 'config.toml')
}

/**
 * Parse and validate TOML config text. Unknown keys are ignored.
 */
export function parseConfig(content: string): ShellConfig {
  let parsed: Record<string, unknown>
  try {
    parsed = parse(content)
  } catch (error) {
    throw new ConfigError(`invalid TOML: ${error instanceof Error ? error.message : error}`, { cause: error })
  }

  const config: ShellConfig = { ...DEFAULT_CONFIG }
  if (parsed.shell === undefined) return config
  if (!isRecord(parsed.shell)) {
    throw new ConfigError('shell must be a table')
  }
  const s = parsed.shell

  if (s.history_file !== undefined) {
    if (typeof s.history_file !== 'string' || !s.history_file) {
      throw new ConfigError('shell.history_file must be a non-empty string')
    }
    config.history_file = expandHome(s.history_file)
  }

  if (s.history_size !== undefined) {
    if (typeof s.history_size !== 'number' || !Number.isInteger(s.history_size) || s.history_size < 0) {
      throw new ConfigError('shell.history_size must be a non-negative integer')
    }
    config.history_size = s.history_size
  }

  if (s.mode !== undefined) {
    if (!isOutputMode(s.mode)) {
      throw new ConfigError(`shell.mode must be one of: ${OUTPUT_MODES.join(', ')}`)
    }
    config.mode = s.mode
  }

  if (s.prompt !== undefined) {
    if (typeof s.prompt !== 'string') {
      throw new ConfigError('shell.prompt must be a string')
    }
    config.prompt = s.prompt
  }

  if (s.pager !== undefined) {
    if (typeof s.pager !== 'string') {
      throw new ConfigError('shell.pager must be a string')
    }
    config.pager = s.pager
  }

  if (s.pager_threshold !== undefined) {
    if (typeof s.pager_threshold !== 'number' || !Number.isInteger(s.pager_threshold) || s.pager_threshold < 1) {
      throw new ConfigError('shell.pager_threshold must be a positive integer')
    }
    config.pager_threshold = s.pager_threshold
  }

  for (const key of ['highlight', 'hints', 'debug'] as const) {
    const value = s[key]
    if (value === undefined) continue
    if (typeof value !== 'boolean') {
      throw new ConfigError(`shell.${key} must be a boolean`)
    }
    config[key] = value
  }

  return config
}

/**
 * Load config from `configPath`. A missing file is an error only when the
 * path was given explicitly.
 */
export function loadConfig(configPath: string | undefined): ShellConfig {
  const target = configPath ?? defaultConfigPath()

  if (!existsSync(target)) {
    if (configPath !== undefined) {
      throw new ConfigError(`Config file not found: ${configPath}`)
    }
    loadedConfig = { ...DEFAULT_CONFIG }
    return loadedConfig
  }

  loadedConfig = parseConfig(readFileSync(target, 'utf-8'))
  return loadedConfig
}

export function resetConfig(): void {
  loadedConfig = { ...DEFAULT_CONFIG }
}

export function getConfig(): ShellConfig {
  return loadedConfig
}

export function isDebug(): boolean {
  return loadedConfig.debug
}
