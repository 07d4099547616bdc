/**
 * vaultline - Value Toggle Engine
 *
 * Takes one value unit at a time through
 *   classified → transformed → rendered
 * encrypting plaintext values and decrypting vaulted ones as the mode allows.
 */

import type { ToggleMode, VaultEnvelope, VaultSecret } from '../types.js'
import { DEFAULT_VAULT_LABEL } from '../types.js'
import { decodeEnvelope, encodeEnvelope } from './envelope.js'
import { getVaultCipher, type VaultCipher } from './crypto.js'
import { decodePlainValue, renderPlaintext } from './scalar.js'
import type { ValueUnit } from './scanner.js'
import {
  AuthenticationFailedError,
  MissingSecretError,
  ValueToggleError,
  isVaultError
} from './errors.js'

export type ToggleOutcome = 'encrypted' | 'decrypted' | 'unchanged'

export type UnitState =
  | { state: 'classified'; unit: ValueUnit }
  | { state: 'transformed'; unit: ValueUnit; outcome: ToggleOutcome; lines: string[] }
  | { state: 'rendered'; unit: ValueUnit; outcome: ToggleOutcome; text: string }

export interface ToggleLogger {
  debug(message: string): void
  warn(message: string): void
}

export interface ToggleOptions {
  mode: ToggleMode
  /** Resolved secrets, tried in order when decrypting */
  secrets: VaultSecret[]
  /** Label of the secret used for encryption */
  encryptIdentity?: string
  /** Cipher used for encryption (default: AES256) */
  cipher?: VaultCipher
  logger?: ToggleLogger
}

const silentLogger: ToggleLogger = {
  debug: () => {},
  warn: () => {}
}

export class ValueToggleEngine {
  private readonly mode: ToggleMode
  private readonly secrets: VaultSecret[]
  private readonly encryptIdentity?: string
  private readonly cipher: VaultCipher
  private readonly logger: ToggleLogger

  constructor(options: ToggleOptions) {
    this.mode = options.mode
    this.secrets = options.secrets
    this.encryptIdentity = options.encryptIdentity
    this.cipher = options.cipher ?? getVaultCipher('AES256')
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Whether toggling this unit would encrypt it
   */
  willEncrypt(unit: ValueUnit): boolean {
    return unit.kind === 'plain' && this.mode !== 'decrypt' && decodePlainValue(unit) !== null
  }

  /**
   * Secret used for encryption; fails when none can be chosen
   */
  encryptionSecret(): VaultSecret {
    if (this.encryptIdentity !== undefined) {
      const match = this.secrets.find(secret => secret.label === this.encryptIdentity)
      if (!match) {
        throw new MissingSecretError(`no vault secret for identity "${this.encryptIdentity}"`)
      }
      return match
    }

    if (this.secrets.length === 1) {
      return this.secrets[0]
    }
    if (this.secrets.length === 0) {
      throw new MissingSecretError()
    }
    throw new MissingSecretError('several vault ids are configured; name the encryption identity')
  }

  toggle(unit: ValueUnit): Extract<UnitState, { state: 'rendered' }> {
    return this.render(this.transform({ state: 'classified', unit }))
  }

  transform(classified: Extract<UnitState, { state: 'classified' }>): Extract<UnitState, { state: 'transformed' }> {
    const { unit } = classified

    if (unit.kind === 'plain') {
      if (this.mode === 'decrypt') {
        return this.unchanged(unit)
      }

      const plaintext = decodePlainValue(unit)
      if (plaintext === null) {
        this.logger.warn(`Skipping "${unit.key}" (line ${unit.lines[0].number}): not a plain scalar value`)
        return this.unchanged(unit)
      }

      return { state: 'transformed', unit, outcome: 'encrypted', lines: this.encryptUnit(unit, plaintext) }
    }

    if (this.mode === 'encrypt') {
      return this.unchanged(unit)
    }

    return { state: 'transformed', unit, outcome: 'decrypted', lines: this.decryptUnit(unit) }
  }

  /**
   * Join transformed lines with the unit's own line terminators
   */
  render(transformed: Extract<UnitState, { state: 'transformed' }>): Extract<UnitState, { state: 'rendered' }> {
    const { unit, outcome, lines } = transformed

    if (outcome === 'unchanged') {
      return { state: 'rendered', unit, outcome, text: unit.lines.map(line => line.text + line.eol).join('') }
    }

    const first = unit.lines[0]
    const last = unit.lines[unit.lines.length - 1]
    const separator = first.eol || '\n'

    const text = lines
      .map((line, index) => line + (index === lines.length - 1 ? last.eol : separator))
      .join('')

    return { state: 'rendered', unit, outcome, text }
  }

  private unchanged(unit: ValueUnit): Extract<UnitState, { state: 'transformed' }> {
    return { state: 'transformed', unit, outcome: 'unchanged', lines: unit.lines.map(line => line.text) }
  }

  private encryptUnit(unit: ValueUnit, plaintext: string): string[] {
    const line = unit.lines[0].number

    try {
      const secret = this.encryptionSecret()
      const fields = this.cipher.encrypt(Buffer.from(plaintext, 'utf8'), secret.secret)
      const envelope: VaultEnvelope = secret.label !== DEFAULT_VAULT_LABEL
        ? { version: '1.2', cipherId: this.cipher.id, label: secret.label, ...fields }
        : { version: '1.1', cipherId: this.cipher.id, ...fields }

      this.logger.debug(`Encrypted "${unit.key}" (line ${line}) with identity "${secret.label}"`)

      const comment = unit.comment ? ` ${unit.comment}` : ''
      const pad = ' '.repeat(unit.indent + 2)
      return [
        `${unit.keyPrefix}!vault |${comment}`,
        ...encodeEnvelope(envelope).map(envelopeLine => pad + envelopeLine)
      ]
    } catch (err) {
      if (isVaultError(err)) {
        throw new ValueToggleError('encrypt', unit.key, line, err)
      }
      throw err
    }
  }

  private decryptUnit(unit: ValueUnit): string[] {
    const line = unit.lines[0].number

    try {
      const envelope = decodeEnvelope(unit.lines.slice(1).map(raw => raw.text))
      const plaintext = this.decryptEnvelope(envelope)

      this.logger.debug(`Decrypted "${unit.key}" (line ${line})`)

      return renderPlaintext(unit, plaintext.toString('utf8'))
    } catch (err) {
      if (isVaultError(err)) {
        throw new ValueToggleError('decrypt', unit.key, line, err)
      }
      throw err
    }
  }

  /**
   * Try the secret whose label matches the envelope first, then the rest
   */
  private decryptEnvelope(envelope: VaultEnvelope): Buffer {
    if (this.secrets.length === 0) {
      throw new MissingSecretError()
    }

    const cipher = getVaultCipher(envelope.cipherId)
    const candidates = [
      ...this.secrets.filter(secret => secret.label === envelope.label),
      ...this.secrets.filter(secret => secret.label !== envelope.label)
    ]

    for (const candidate of candidates) {
      try {
        return cipher.decrypt(envelope, candidate.secret)
      } catch (err) {
        if (!(err instanceof AuthenticationFailedError)) {
          throw err
        }
        this.logger.debug(`Identity "${candidate.label}" did not verify`)
      }
    }

    throw new AuthenticationFailedError(envelope.label)
  }
}
