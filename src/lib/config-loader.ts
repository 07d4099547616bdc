/**
 * vaultline Config Loader
 *
 * Loads .vaultline/config.yaml (searched upward from the working directory)
 * and merges .vaultline/config.local.yaml on top of it.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { VaultlineConfig } from '../types.js'
import { isToggleMode } from '../types.js'
import { InvalidConfigError } from './errors.js'
import { parseVaultId } from './vault-ids.js'

export const CONFIG_DIR = '.vaultline'
const CONFIG_FILE = 'config.yaml'
const CONFIG_LOCAL_FILE = 'config.local.yaml'
const MAX_SEARCH_DEPTH = 5

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  str = str.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
    return env[varName] || ''
  })

  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }

  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }

  return value
}

function optionalString(raw: Record<string, unknown>, field: string, configPath: string): string | undefined {
  const value = raw[field]
  if (value === undefined || value === null) {
    return undefined
  }
  if (typeof value !== 'string') {
    throw new InvalidConfigError(`"${field}" must be a string`, configPath)
  }
  return value
}

/**
 * Validate parsed YAML into a VaultlineConfig
 */
export function validateConfig(raw: unknown, configPath: string): VaultlineConfig {
  if (raw === null || raw === undefined) {
    return {}
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new InvalidConfigError('expected a mapping at the top level', configPath)
  }

  const fields: Record<string, unknown> = Object.fromEntries(Object.entries(raw))
  const config: VaultlineConfig = {}

  const identity = optionalString(fields, 'identity', configPath)
  if (identity) config.identity = identity

  const passwordFile = optionalString(fields, 'vault_password_file', configPath)
  if (passwordFile) config.vault_password_file = passwordFile

  const vaultIds = fields.vault_ids
  if (vaultIds !== undefined && vaultIds !== null) {
    if (!Array.isArray(vaultIds) || !vaultIds.every((id): id is string => typeof id === 'string')) {
      throw new InvalidConfigError('"vault_ids" must be a list of label@source strings', configPath)
    }
    config.vault_ids = vaultIds
  }

  const mode = fields.mode
  if (mode !== undefined && mode !== null) {
    if (!isToggleMode(mode)) {
      throw new InvalidConfigError('"mode" must be one of auto, encrypt, decrypt', configPath)
    }
    config.mode = mode
  }

  return config
}

/**
 * Find the .vaultline directory by searching up from the current directory
 */
export function findConfigDir(startDir: string = process.cwd()): string | null {
  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    const configDir = path.join(currentDir, CONFIG_DIR)

    if (fs.existsSync(path.join(configDir, CONFIG_FILE))) {
      return configDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

/**
 * Resolve a relative password source against the project root.
 * Absolute, home-relative and `prompt` sources are kept as written.
 */
function resolvePasswordSource(source: string, projectRoot: string): string {
  if (source.length === 0 || source === 'prompt' || source.startsWith('~') || path.isAbsolute(source)) {
    return source
  }
  return path.resolve(projectRoot, source)
}

/**
 * Load a single config file
 */
function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv): VaultlineConfig {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  let parsed: unknown
  try {
    parsed = parseYaml(fs.readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new InvalidConfigError(
      err instanceof Error ? err.message : String(err),
      configPath,
      err instanceof Error ? err : undefined
    )
  }

  const config = validateConfig(expandEnvVarsInValue(parsed, env), configPath)

  // Relative password sources are relative to the project root, not the cwd
  const projectRoot = path.dirname(path.dirname(configPath))

  if (config.vault_password_file) {
    config.vault_password_file = resolvePasswordSource(config.vault_password_file, projectRoot)
  }

  if (config.vault_ids) {
    config.vault_ids = config.vault_ids.map(id => {
      const { label, source } = parseVaultId(id)
      const resolved = resolvePasswordSource(source, projectRoot)
      return id.includes('@') ? `${label}@${resolved}` : resolved
    })
  }

  return config
}

/**
 * Load configuration from the nearest .vaultline/config.yaml
 * Returns an empty config when there is none.
 */
export function loadConfig(startDir?: string, env: NodeJS.ProcessEnv = process.env): VaultlineConfig {
  const configDir = findConfigDir(startDir)

  if (!configDir) {
    return {}
  }

  const config = loadConfigFile(path.join(configDir, CONFIG_FILE), env)
  const localConfig = loadConfigFile(path.join(configDir, CONFIG_LOCAL_FILE), env)

  return { ...config, ...localConfig }
}

/**
 * Check if a config directory exists
 */
export function configExists(startDir?: string): boolean {
  return findConfigDir(startDir) !== null
}
