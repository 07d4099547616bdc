/**
 * "secret123" vaulted under "test-secret" with a salt of 32 0x07 bytes,
 * produced with Python hashlib (PBKDF2, HMAC) and `openssl enc -aes-256-ctr`.
 */

export const KNOWN_SECRET = 'test-secret'
export const KNOWN_PLAINTEXT = 'secret123'
export const KNOWN_SALT_BYTE = 0x07

export const KNOWN_VAULT = [
  '$ANSIBLE_VAULT;1.1;AES256',
  '30373037303730373037303730373037303730373037303730373037303730373037303730373037',
  '3037303730373037303730373037303730373037303730370a386364386330356537346266373938',
  '32613434373637653936373766336631653038626661326434626236323337343733323461333535',
  '3930626437386563320a636261653964306230616531316238653931643535653166353939613262',
  '3437'
]
