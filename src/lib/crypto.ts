/**
 * vaultline Crypto Module
 *
 * Vault cipher suites. The AES256 suite is the one used by
 * `$ANSIBLE_VAULT;1.1;AES256` and `1.2` envelopes:
 *
 * 1. Derive 80 bytes with PBKDF2-HMAC-SHA256 (10 000 iterations) from
 *    the secret and a random 32-byte salt
 * 2. Split into AES key (32) | HMAC key (32) | counter IV (16)
 * 3. PKCS#7-pad the plaintext, encrypt with AES-256-CTR
 * 4. HMAC-SHA256 over the ciphertext
 */

import crypto from 'node:crypto'
import type { CipherFields, DerivedKeyMaterial, VaultCipherId } from '../types.js'
import {
  AuthenticationFailedError,
  MalformedEnvelopeError,
  MissingSecretError,
  UnsupportedFormatError
} from './errors.js'
import { SALT_LENGTH } from './envelope.js'

// ============================================================================
// Cipher Interface
// ============================================================================

export interface VaultCipher {
  readonly id: VaultCipherId
  deriveKeys(secret: Buffer, salt: Buffer): DerivedKeyMaterial
  encrypt(plaintext: Buffer, secret: Buffer): CipherFields
  decrypt(fields: CipherFields, secret: Buffer): Buffer
}

// ============================================================================
// AES256
// ============================================================================

export const PBKDF2_ITERATIONS = 10000
export const KEY_LENGTH = 32
export const IV_LENGTH = 16
const AES_BLOCK_SIZE = 16

function assertSecret(secret: Buffer): void {
  if (secret.length === 0) {
    throw new MissingSecretError('vault secret is empty')
  }
}

function pad(data: Buffer): Buffer {
  const padLength = AES_BLOCK_SIZE - (data.length % AES_BLOCK_SIZE)
  return Buffer.concat([data, Buffer.alloc(padLength, padLength)])
}

function unpad(data: Buffer): Buffer {
  if (data.length === 0 || data.length % AES_BLOCK_SIZE !== 0) {
    throw new MalformedEnvelopeError('ciphertext is not a whole number of blocks')
  }

  const padLength = data[data.length - 1]
  if (padLength < 1 || padLength > AES_BLOCK_SIZE) {
    throw new MalformedEnvelopeError('invalid padding')
  }
  for (let i = data.length - padLength; i < data.length; i++) {
    if (data[i] !== padLength) {
      throw new MalformedEnvelopeError('invalid padding')
    }
  }

  return data.subarray(0, data.length - padLength)
}

export class Aes256VaultCipher implements VaultCipher {
  readonly id = 'AES256' as const

  constructor(private readonly randomBytes: (size: number) => Buffer = crypto.randomBytes) {}

  deriveKeys(secret: Buffer, salt: Buffer): DerivedKeyMaterial {
    const derived = crypto.pbkdf2Sync(
      secret,
      salt,
      PBKDF2_ITERATIONS,
      KEY_LENGTH * 2 + IV_LENGTH,
      'sha256'
    )

    return {
      encryptionKey: derived.subarray(0, KEY_LENGTH),
      hmacKey: derived.subarray(KEY_LENGTH, KEY_LENGTH * 2),
      iv: derived.subarray(KEY_LENGTH * 2)
    }
  }

  encrypt(plaintext: Buffer, secret: Buffer): CipherFields {
    assertSecret(secret)

    const salt = this.randomBytes(SALT_LENGTH)
    const keys = this.deriveKeys(secret, salt)

    const cipher = crypto.createCipheriv('aes-256-ctr', keys.encryptionKey, keys.iv)
    const ciphertext = Buffer.concat([cipher.update(pad(plaintext)), cipher.final()])
    const hmac = crypto.createHmac('sha256', keys.hmacKey).update(ciphertext).digest()

    return { salt, hmac, ciphertext }
  }

  decrypt(fields: CipherFields, secret: Buffer): Buffer {
    assertSecret(secret)

    const keys = this.deriveKeys(secret, fields.salt)
    const expected = crypto.createHmac('sha256', keys.hmacKey).update(fields.ciphertext).digest()

    if (expected.length !== fields.hmac.length || !crypto.timingSafeEqual(expected, fields.hmac)) {
      throw new AuthenticationFailedError()
    }

    const decipher = crypto.createDecipheriv('aes-256-ctr', keys.encryptionKey, keys.iv)
    const padded = Buffer.concat([decipher.update(fields.ciphertext), decipher.final()])

    return unpad(padded)
  }
}

// ============================================================================
// Registry
// ============================================================================

const CIPHERS: Record<VaultCipherId, VaultCipher> = {
  AES256: new Aes256VaultCipher()
}

/**
 * Look up the cipher suite named by an envelope header
 */
export function getVaultCipher(id: string): VaultCipher {
  const cipher = Object.values(CIPHERS).find(candidate => candidate.id === id)
  if (!cipher) {
    throw new UnsupportedFormatError('cipher', id)
  }
  return cipher
}
