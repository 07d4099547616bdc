/**
 * vaultline Vault Identity Resolution
 *
 * Turns vault ids (`label@source`) into resolved secrets for the toggle
 * engine. This is the only place that reads the environment, password
 * files or password scripts; the engine receives finished secrets.
 *
 * Vault id resolution order:
 * 1. --vault-id (comma-separated)
 * 2. --vault-password-file (label "default")
 * 3. Config vault_ids, then vault_password_file
 * 4. ANSIBLE_VAULT_IDENTITY_LIST (comma-separated)
 * 5. ANSIBLE_VAULT_PASSWORD_FILE (label "default")
 *
 * Encryption identity: positional argument, then ANSIBLE_VAULT_IDENTITY,
 * then config identity.
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { execFileSync } from 'node:child_process'
import type { ToggleMode, VaultSecret, VaultlineConfig } from '../types.js'
import { DEFAULT_VAULT_LABEL } from '../types.js'
import { IdentityNotFoundError, MissingSecretError, PasswordSourceError } from './errors.js'

export interface VaultIdSpec {
  label: string
  source: string
}

export interface ResolveVaultSecretsOptions {
  /** Encryption identity from the command line */
  identity?: string
  /** --vault-id values (each may be comma-separated) */
  vaultIds?: string[]
  /** --vault-password-file */
  passwordFile?: string
  config?: VaultlineConfig
  mode?: ToggleMode
  env?: NodeJS.ProcessEnv
  cwd?: string
}

export interface ResolvedSecrets {
  secrets: VaultSecret[]
  encryptIdentity?: string
}

/**
 * Parse `label@source` (or a bare source, labelled "default")
 */
export function parseVaultId(spec: string): VaultIdSpec {
  const trimmed = spec.trim()
  const at = trimmed.indexOf('@')

  if (at === -1) {
    return { label: DEFAULT_VAULT_LABEL, source: trimmed }
  }

  return {
    label: trimmed.slice(0, at) || DEFAULT_VAULT_LABEL,
    source: trimmed.slice(at + 1)
  }
}

function splitList(value: string | undefined): string[] {
  if (!value) {
    return []
  }
  return value.split(',').map(item => item.trim()).filter(item => item.length > 0)
}

/**
 * Collect vault ids from every source, dropping duplicates
 */
export function collectVaultIds(options: ResolveVaultSecretsOptions = {}): VaultIdSpec[] {
  const env = options.env ?? process.env
  const config = options.config ?? {}

  const specs: VaultIdSpec[] = [
    ...(options.vaultIds ?? []).flatMap(splitList).map(parseVaultId),
    ...(options.passwordFile ? [{ label: DEFAULT_VAULT_LABEL, source: options.passwordFile }] : []),
    ...(config.vault_ids ?? []).map(parseVaultId),
    ...(config.vault_password_file ? [{ label: DEFAULT_VAULT_LABEL, source: config.vault_password_file }] : []),
    ...splitList(env.ANSIBLE_VAULT_IDENTITY_LIST).map(parseVaultId),
    ...(env.ANSIBLE_VAULT_PASSWORD_FILE ? [{ label: DEFAULT_VAULT_LABEL, source: env.ANSIBLE_VAULT_PASSWORD_FILE }] : [])
  ]

  const seen = new Set<string>()
  return specs.filter(spec => {
    if (spec.source.length === 0) {
      return false
    }
    const id = `${spec.label}@${spec.source}`
    if (seen.has(id)) {
      return false
    }
    seen.add(id)
    return true
  })
}

function resolveSourcePath(source: string, cwd: string): string {
  if (source === '~' || source.startsWith('~/')) {
    return path.join(os.homedir(), source.slice(1))
  }
  return path.resolve(cwd, source)
}

function isExecutable(stats: fs.Stats): boolean {
  return process.platform !== 'win32' && (stats.mode & 0o111) !== 0
}

/**
 * Read the password behind a vault id source.
 * Executable files are run and their stdout is used.
 */
export function readVaultPassword(source: string, cwd: string = process.cwd()): Buffer {
  if (source === 'prompt') {
    throw new PasswordSourceError(
      'prompt',
      'interactive prompts are unavailable while stdin carries the YAML being filtered'
    )
  }

  const filePath = resolveSourcePath(source, cwd)

  let stats: fs.Stats
  try {
    stats = fs.statSync(filePath)
  } catch (err) {
    throw new PasswordSourceError(filePath, 'file not found', err instanceof Error ? err : undefined)
  }

  if (!stats.isFile()) {
    throw new PasswordSourceError(filePath, 'not a regular file')
  }

  let raw: Buffer
  try {
    raw = isExecutable(stats)
      ? execFileSync(filePath, [], { encoding: 'buffer', stdio: ['ignore', 'pipe', 'pipe'] })
      : fs.readFileSync(filePath)
  } catch (err) {
    throw new PasswordSourceError(
      filePath,
      err instanceof Error ? err.message : String(err),
      err instanceof Error ? err : undefined
    )
  }

  const password = Buffer.from(raw.toString('utf8').trim(), 'utf8')
  if (password.length === 0) {
    throw new MissingSecretError(`vault password from ${filePath} is empty`)
  }

  return password
}

/**
 * Resolve the secrets and the encryption identity for one filter run
 */
export function resolveVaultSecrets(options: ResolveVaultSecretsOptions = {}): ResolvedSecrets {
  const env = options.env ?? process.env
  const cwd = options.cwd ?? process.cwd()
  const identity = options.identity || env.ANSIBLE_VAULT_IDENTITY || options.config?.identity

  const specs = collectVaultIds(options)
  let encryptIdentity: string | undefined

  if (identity && identity.includes('@')) {
    // A full vault id: use it for encryption and try it first for decryption
    const spec = parseVaultId(identity)
    encryptIdentity = spec.label
    if (!specs.some(existing => existing.label === spec.label && existing.source === spec.source)) {
      specs.unshift(spec)
    }
  } else if (identity) {
    encryptIdentity = identity
    const labels = specs.map(spec => spec.label)
    if (options.mode !== 'decrypt' && specs.length > 0 && !labels.includes(identity)) {
      throw new IdentityNotFoundError(identity, [...new Set(labels)])
    }
  }

  const secrets = specs.map(spec => ({
    label: spec.label,
    secret: readVaultPassword(spec.source, cwd)
  }))

  return { secrets, encryptIdentity }
}
