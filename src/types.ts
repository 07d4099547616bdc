/**
 * vaultline - Type Definitions
 */

// ============================================================================
// Toggle Mode
// ============================================================================

/**
 * Direction of the toggle:
 * - 'auto': encrypt plaintext values, decrypt vaulted ones
 * - 'encrypt': encrypt plaintext values, leave vaulted ones as they are
 * - 'decrypt': decrypt vaulted values, leave plaintext ones as they are
 */
export type ToggleMode = 'auto' | 'encrypt' | 'decrypt'

export const TOGGLE_MODES: readonly ToggleMode[] = ['auto', 'encrypt', 'decrypt']

export function isToggleMode(value: unknown): value is ToggleMode {
  return typeof value === 'string' && TOGGLE_MODES.some(mode => mode === value)
}

// ============================================================================
// Vault Envelope
// ============================================================================

export type VaultFormatVersion = '1.1' | '1.2'

export type VaultCipherId = 'AES256'

/**
 * Decoded `$ANSIBLE_VAULT` envelope.
 * `label` is present only for format 1.2.
 */
export interface VaultEnvelope {
  version: VaultFormatVersion
  cipherId: VaultCipherId
  label?: string
  salt: Buffer
  hmac: Buffer
  ciphertext: Buffer
}

/**
 * Raw fields produced by a cipher and serialized by the envelope codec
 */
export interface CipherFields {
  salt: Buffer
  hmac: Buffer
  ciphertext: Buffer
}

/**
 * Key material derived per encrypt/decrypt call. Never persisted.
 */
export interface DerivedKeyMaterial {
  encryptionKey: Buffer
  hmacKey: Buffer
  iv: Buffer
}

// ============================================================================
// Secrets
// ============================================================================

/** Label used by vault ids that do not name one */
export const DEFAULT_VAULT_LABEL = 'default'

/**
 * A resolved vault identity: label plus the password bytes
 */
export interface VaultSecret {
  label: string
  secret: Buffer
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * .vaultline/config.yaml
 */
export interface VaultlineConfig {
  /** Encryption identity: a label from vault_ids, or a full label@source */
  identity?: string
  /** Vault ids as label@source (or just source) */
  vault_ids?: string[]
  /** Password file for the default label */
  vault_password_file?: string
  /** Default toggle direction */
  mode?: ToggleMode
}
