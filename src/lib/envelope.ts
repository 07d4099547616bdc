/**
 * Vault Envelope Codec
 *
 * Text form of an encrypted value:
 *
 *   $ANSIBLE_VAULT;1.1;AES256
 *   6162633132...   (80 hex chars per line)
 *
 * The body is hexlified twice: the outer hex decodes to the ASCII text
 * `hex(salt)\nhex(hmac)\nhex(ciphertext)`.
 */

import type { VaultEnvelope, VaultFormatVersion, VaultCipherId } from '../types.js'
import { MalformedEnvelopeError, UnsupportedFormatError } from './errors.js'

export const VAULT_MAGIC = '$ANSIBLE_VAULT'
export const VAULT_LINE_WIDTH = 80
export const SALT_LENGTH = 32
export const HMAC_LENGTH = 32

const SUPPORTED_VERSIONS: readonly VaultFormatVersion[] = ['1.1', '1.2']
const SUPPORTED_CIPHERS: readonly VaultCipherId[] = ['AES256']
const HEX_PATTERN = /^(?:[0-9a-fA-F]{2})*$/

export interface VaultHeader {
  version: VaultFormatVersion
  cipherId: VaultCipherId
  label?: string
}

function toVersion(value: string): VaultFormatVersion | undefined {
  return SUPPORTED_VERSIONS.find(version => version === value)
}

function toCipherId(value: string): VaultCipherId | undefined {
  return SUPPORTED_CIPHERS.find(cipher => cipher === value)
}

/**
 * Check whether a line looks like a vault header (it may still be unsupported)
 */
export function isVaultHeader(line: string): boolean {
  return line.trim().startsWith(`${VAULT_MAGIC};`)
}

/**
 * Parse `$ANSIBLE_VAULT;<version>;<cipher>[;<label>]`
 */
export function parseVaultHeader(line: string): VaultHeader {
  const fields = line.trim().split(';').map(field => field.trim())

  if (fields[0] !== VAULT_MAGIC || fields.length < 3) {
    throw new MalformedEnvelopeError('missing $ANSIBLE_VAULT header')
  }

  const version = toVersion(fields[1])
  if (!version) {
    throw new UnsupportedFormatError('version', fields[1])
  }

  const cipherId = toCipherId(fields[2])
  if (!cipherId) {
    throw new UnsupportedFormatError('cipher', fields[2])
  }

  if (version === '1.1') {
    // Extra fields after the cipher id carry no meaning in 1.1
    return { version, cipherId }
  }

  const label = fields[3]
  if (!label) {
    throw new MalformedEnvelopeError('format 1.2 header without a vault id label')
  }

  return { version, cipherId, label }
}

export function formatVaultHeader(header: VaultHeader): string {
  const fields: string[] = [VAULT_MAGIC, header.version, header.cipherId]
  if (header.version === '1.2' && header.label) {
    fields.push(header.label)
  }
  return fields.join(';')
}

function decodeHexField(hex: string, field: string): Buffer {
  if (!HEX_PATTERN.test(hex)) {
    throw new MalformedEnvelopeError(`${field} is not valid hex`)
  }
  return Buffer.from(hex, 'hex')
}

/**
 * Decode envelope lines (header first, then the hex body).
 * Indentation and blank lines are ignored.
 */
export function decodeEnvelope(lines: readonly string[]): VaultEnvelope {
  const content = lines.map(line => line.trim()).filter(line => line.length > 0)

  if (content.length === 0) {
    throw new MalformedEnvelopeError('empty vault block')
  }

  const header = parseVaultHeader(content[0])
  const body = content.slice(1).join('')

  if (body.length === 0) {
    throw new MalformedEnvelopeError('missing hex body')
  }

  const inner = decodeHexField(body, 'body').toString('latin1')
  const parts = inner.split('\n')

  if (parts.length !== 3) {
    throw new MalformedEnvelopeError(`expected salt, hmac and ciphertext, found ${parts.length} field(s)`)
  }

  const salt = decodeHexField(parts[0], 'salt')
  const hmac = decodeHexField(parts[1], 'hmac')
  const ciphertext = decodeHexField(parts[2], 'ciphertext')

  if (salt.length !== SALT_LENGTH) {
    throw new MalformedEnvelopeError(`salt must be ${SALT_LENGTH} bytes, got ${salt.length}`)
  }
  if (hmac.length !== HMAC_LENGTH) {
    throw new MalformedEnvelopeError(`hmac must be ${HMAC_LENGTH} bytes, got ${hmac.length}`)
  }

  return { ...header, salt, hmac, ciphertext }
}

/**
 * Encode an envelope to its header line followed by body lines
 * of VAULT_LINE_WIDTH hex characters.
 */
export function encodeEnvelope(envelope: VaultEnvelope): string[] {
  const inner = [
    envelope.salt.toString('hex'),
    envelope.hmac.toString('hex'),
    envelope.ciphertext.toString('hex')
  ].join('\n')
  const body = Buffer.from(inner, 'latin1').toString('hex')

  const lines = [formatVaultHeader(envelope)]
  for (let i = 0; i < body.length; i += VAULT_LINE_WIDTH) {
    lines.push(body.slice(i, i + VAULT_LINE_WIDTH))
  }
  return lines
}
