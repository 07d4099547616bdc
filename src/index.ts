/**
 * vaultline - toggle YAML values between plaintext and inline vault blocks
 *
 * Main library exports for programmatic usage
 */

// Types
export type {
  ToggleMode,
  VaultEnvelope,
  VaultFormatVersion,
  VaultCipherId,
  CipherFields,
  DerivedKeyMaterial,
  VaultSecret,
  VaultlineConfig
} from './types.js'

export { TOGGLE_MODES, DEFAULT_VAULT_LABEL, isToggleMode } from './types.js'

// Envelope codec
export {
  decodeEnvelope,
  encodeEnvelope,
  parseVaultHeader,
  formatVaultHeader,
  isVaultHeader,
  VAULT_LINE_WIDTH
} from './lib/envelope.js'
export type { VaultHeader } from './lib/envelope.js'

// Cipher
export { Aes256VaultCipher, getVaultCipher } from './lib/crypto.js'
export type { VaultCipher } from './lib/crypto.js'

// Scanner
export { scanLines, splitLines, parseKeyLine } from './lib/scanner.js'
export type { RawLine, ValueUnit, ValueKind, LineGroup } from './lib/scanner.js'

// Toggle engine and driver
export { ValueToggleEngine } from './lib/toggle.js'
export type { ToggleOptions, ToggleOutcome, ToggleLogger, UnitState } from './lib/toggle.js'
export { filterYaml, runFilter, readStream } from './lib/filter.js'
export type { FilterResult, FilterStats, RunFilterOptions } from './lib/filter.js'

// Identities and config
export { resolveVaultSecrets, collectVaultIds, parseVaultId, readVaultPassword } from './lib/vault-ids.js'
export type { VaultIdSpec, ResolveVaultSecretsOptions, ResolvedSecrets } from './lib/vault-ids.js'
export { loadConfig, findConfigDir, configExists } from './lib/config-loader.js'

// Errors
export * from './lib/errors.js'
