/**
 * vaultline Error Hierarchy
 *
 * Typed error classes shared by the library and the CLI.
 *
 * Hierarchy:
 *   VaultlineError (base)
 *   ├── ConfigError
 *   │   └── InvalidConfigError
 *   ├── IdentityError (vault id / password source resolution)
 *   │   ├── IdentityNotFoundError
 *   │   └── PasswordSourceError
 *   ├── VaultError (envelope and cipher failures)
 *   │   ├── MissingSecretError
 *   │   ├── MalformedEnvelopeError
 *   │   ├── UnsupportedFormatError
 *   │   └── AuthenticationFailedError
 *   └── ValueToggleError (a VaultError located at a key and line)
 */

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all vaultline errors
 */
export class VaultlineError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'VaultlineError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends VaultlineError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your .vaultline/config.yaml syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Identity Errors
// =============================================================================

export class IdentityError extends VaultlineError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'IdentityError'
  }
}

/**
 * Thrown when the encryption identity names a label no vault id provides
 */
export class IdentityNotFoundError extends IdentityError {
  constructor(label: string, availableLabels: string[]) {
    super(
      `Vault identity "${label}" not found`,
      'IDENTITY_NOT_FOUND',
      {
        suggestion: availableLabels.length > 0
          ? `Available identities: ${availableLabels.join(', ')}`
          : 'Pass --vault-id label@/path/to/password-file or set ANSIBLE_VAULT_IDENTITY_LIST',
        context: { label, availableLabels }
      }
    )
    this.name = 'IdentityNotFoundError'
  }
}

/**
 * Thrown when a password file or script cannot be read
 */
export class PasswordSourceError extends IdentityError {
  constructor(source: string, reason: string, cause?: Error) {
    super(
      `Cannot read vault password from ${source}: ${reason}`,
      'PASSWORD_SOURCE_FAILED',
      {
        suggestion: 'Check that the password file exists and is readable',
        context: { source },
        cause
      }
    )
    this.name = 'PasswordSourceError'
  }
}

// =============================================================================
// Vault Errors
// =============================================================================

export class VaultError extends VaultlineError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'VaultError'
  }
}

/**
 * Thrown when encryption or decryption is needed and no secret was resolved
 */
export class MissingSecretError extends VaultError {
  constructor(reason: string = 'no vault secret resolved') {
    super(
      `Missing vault secret: ${reason}`,
      'MISSING_SECRET',
      {
        suggestion: 'Pass an identity argument or set ANSIBLE_VAULT_IDENTITY, and provide its password with --vault-id or ANSIBLE_VAULT_PASSWORD_FILE'
      }
    )
    this.name = 'MissingSecretError'
  }
}

/**
 * Thrown when a vault block is not a valid header + hex body
 */
export class MalformedEnvelopeError extends VaultError {
  constructor(reason: string) {
    super(
      `Malformed vault envelope: ${reason}`,
      'MALFORMED_ENVELOPE',
      {
        suggestion: 'The vaulted value looks corrupted; restore it from version control',
        context: { reason }
      }
    )
    this.name = 'MalformedEnvelopeError'
  }
}

/**
 * Thrown for a well-formed header naming a version or cipher that is not supported
 */
export class UnsupportedFormatError extends VaultError {
  constructor(field: 'version' | 'cipher', value: string) {
    super(
      `Vault format not supported: ${field} "${value}"`,
      'UNSUPPORTED_FORMAT',
      {
        suggestion: 'Only $ANSIBLE_VAULT;1.1;AES256 and $ANSIBLE_VAULT;1.2;AES256;<label> are supported',
        context: { field, value }
      }
    )
    this.name = 'UnsupportedFormatError'
  }
}

/**
 * Thrown when the HMAC over the ciphertext does not verify
 */
export class AuthenticationFailedError extends VaultError {
  constructor(label?: string) {
    super(
      label
        ? `Decryption failed: HMAC verification failed for identity "${label}"`
        : 'Decryption failed: HMAC verification failed',
      'AUTHENTICATION_FAILED',
      {
        suggestion: 'Ensure you are using the vault password the value was encrypted with',
        context: label ? { label } : undefined
      }
    )
    this.name = 'AuthenticationFailedError'
  }
}

/**
 * A vault failure located at one value of the input.
 * Keeps the code of the underlying error so callers can still tell
 * a wrong secret from corrupt data.
 */
export class ValueToggleError extends VaultlineError {
  readonly key: string
  readonly line: number

  constructor(action: 'encrypt' | 'decrypt', key: string, line: number, cause: VaultError) {
    super(
      `Cannot ${action} "${key}" (line ${line}): ${cause.message}`,
      cause.code,
      {
        suggestion: cause.suggestion,
        context: { ...cause.context, key, line },
        cause
      }
    )
    this.name = 'ValueToggleError'
    this.key = key
    this.line = line
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isVaultlineError(error: unknown): error is VaultlineError {
  return error instanceof VaultlineError
}

export function isVaultError(error: unknown): error is VaultError {
  return error instanceof VaultError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isIdentityError(error: unknown): error is IdentityError {
  return error instanceof IdentityError
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isVaultlineError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a VaultlineError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): VaultlineError {
  if (isVaultlineError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new VaultlineError(error.message, defaultCode, { cause: error })
  }
  return new VaultlineError(String(error), defaultCode)
}
