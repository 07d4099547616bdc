/**
 * Tests for filter.ts
 */

import { describe, it, expect } from 'vitest'
import { Readable, Writable } from 'node:stream'
import { filterYaml, readStream, runFilter } from '../../src/lib/filter.js'
import { MissingSecretError, ValueToggleError } from '../../src/lib/errors.js'
import type { VaultSecret } from '../../src/types.js'

const SECRETS: VaultSecret[] = [{ label: 'default', secret: Buffer.from('test-secret') }]

function collector(): { stream: Writable; chunks: string[] } {
  const chunks: string[] = []
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf8'))
      callback()
    }
  })
  return { stream, chunks }
}

const DOCUMENT = [
  '# database settings',
  '---',
  'db_host: localhost # primary',
  'db_password: secret123',
  '',
  'servers:',
  '  - web1',
  'nested:',
  '  api_key: abc-123',
  ''
].join('\n')

describe('filter', () => {
  describe('filterYaml', () => {
    it('should encrypt every plain value and keep the other lines', () => {
      const { output, stats } = filterYaml(DOCUMENT, { mode: 'auto', secrets: SECRETS })
      const lines = output.split('\n')

      expect(stats).toEqual({ encrypted: 3, decrypted: 0, unchanged: 0, passthrough: 6 })
      expect(lines[0]).toBe('# database settings')
      expect(lines[1]).toBe('---')
      expect(lines[2]).toBe('db_host: !vault | # primary')
      expect(lines).toContain('db_password: !vault |')
      expect(lines).toContain('servers:')
      expect(lines).toContain('  - web1')
      expect(lines).toContain('  api_key: !vault |')
      expect(lines).toContain('    $ANSIBLE_VAULT;1.1;AES256')
    })

    it('should restore the document on the second pass', () => {
      const first = filterYaml(DOCUMENT, { mode: 'auto', secrets: SECRETS })
      const second = filterYaml(first.output, { mode: 'auto', secrets: SECRETS })

      expect(second.output).toBe(DOCUMENT)
      expect(second.stats).toEqual({ encrypted: 0, decrypted: 3, unchanged: 0, passthrough: 6 })
    })

    it('should not encrypt anything in decrypt mode', () => {
      const { output, stats } = filterYaml(DOCUMENT, { mode: 'decrypt', secrets: [] })

      expect(output).toBe(DOCUMENT)
      expect(stats).toEqual({ encrypted: 0, decrypted: 0, unchanged: 3, passthrough: 6 })
    })

    it('should only encrypt new values in encrypt mode', () => {
      const vaulted = filterYaml('a: one\n', { mode: 'auto', secrets: SECRETS }).output
      const { output, stats } = filterYaml(`${vaulted}b: two\n`, { mode: 'encrypt', secrets: SECRETS })

      expect(output.startsWith(vaulted)).toBe(true)
      expect(output.slice(vaulted.length).split('\n')[0]).toBe('b: !vault |')
      expect(stats).toEqual({ encrypted: 1, decrypted: 0, unchanged: 1, passthrough: 0 })
    })

    it('should keep a comment line that follows an encrypted value', () => {
      const input = 'password: abc\n  # rotate quarterly\nnext: x\n'
      const { output, stats } = filterYaml(input, { mode: 'encrypt', secrets: SECRETS })
      const lines = output.split('\n')
      const commentIndex = lines.indexOf('  # rotate quarterly')

      expect(stats).toEqual({ encrypted: 2, decrypted: 0, unchanged: 0, passthrough: 1 })
      expect(commentIndex).toBeGreaterThan(1)
      expect(lines[commentIndex - 1]).toMatch(/^ {2}[0-9a-f]+$/)
      expect(lines[commentIndex + 1]).toBe('next: !vault |')
      expect(filterYaml(output, { mode: 'decrypt', secrets: SECRETS }).output).toBe(input)
    })

    it('should toggle values in a sequence of mappings', () => {
      const input = 'users:\n  - name: bob\n    password: hunter2\n'
      const { output, stats } = filterYaml(input, { mode: 'encrypt', secrets: SECRETS })
      const lines = output.split('\n')

      expect(stats).toEqual({ encrypted: 2, decrypted: 0, unchanged: 0, passthrough: 1 })
      expect(lines[0]).toBe('users:')
      expect(lines[1]).toBe('  - name: !vault |')
      expect(lines).toContain('    password: !vault |')
      expect(filterYaml(output, { mode: 'decrypt', secrets: SECRETS }).output).toBe(input)
    })

    it('should echo input without values unchanged', () => {
      const input = '# only comments\n\n- a list\r\n'
      expect(filterYaml(input, { mode: 'auto', secrets: [] }).output).toBe(input)
    })

    it('should return empty output for empty input', () => {
      expect(filterYaml('', { mode: 'auto', secrets: [] })).toEqual({
        output: '',
        stats: { encrypted: 0, decrypted: 0, unchanged: 0, passthrough: 0 }
      })
    })

    it('should fail before toggling when no encryption secret can be chosen', () => {
      expect(() => filterYaml(DOCUMENT, { mode: 'auto', secrets: [] })).toThrow(MissingSecretError)
    })

    it('should abort the whole run on a decryption failure', () => {
      const vaulted = filterYaml('a: one\n', { mode: 'auto', secrets: SECRETS }).output
      const wrong: VaultSecret[] = [{ label: 'default', secret: Buffer.from('wrong-secret') }]

      expect(() => filterYaml(`b: two\n${vaulted}`, { mode: 'decrypt', secrets: wrong })).toThrow(
        'Cannot decrypt "a" (line 2): Decryption failed: HMAC verification failed'
      )
    })
  })

  describe('readStream', () => {
    it('should join string and buffer chunks', async () => {
      const input = Readable.from([Buffer.from('a: '), 'b\n'])
      await expect(readStream(input)).resolves.toBe('a: b\n')
    })

    it('should decode UTF-8 split across chunks', async () => {
      const bytes = Buffer.from('k: ü\n')
      const input = Readable.from([bytes.subarray(0, 4), bytes.subarray(4)])
      await expect(readStream(input)).resolves.toBe('k: ü\n')
    })
  })

  describe('runFilter', () => {
    it('should write the toggled document to the output', async () => {
      const out = collector()
      const stats = await runFilter({
        input: Readable.from(['db_password: secret123\n']),
        output: out.stream,
        mode: 'encrypt',
        secrets: SECRETS
      })

      expect(stats.encrypted).toBe(1)
      expect(out.chunks).toHaveLength(1)
      expect(out.chunks[0].split('\n')[0]).toBe('db_password: !vault |')
    })

    it('should write nothing when a value fails', async () => {
      const vaulted = filterYaml('a: one\n', { mode: 'auto', secrets: SECRETS }).output
      const out = collector()

      await expect(runFilter({
        input: Readable.from([`first: plain\n${vaulted}`]),
        output: out.stream,
        mode: 'auto',
        secrets: [{ label: 'default', secret: Buffer.from('wrong-secret') }]
      })).rejects.toBeInstanceOf(ValueToggleError)

      expect(out.chunks).toEqual([])
    })

    it('should write nothing for empty input', async () => {
      const out = collector()
      await runFilter({ input: Readable.from([]), output: out.stream, mode: 'auto', secrets: [] })
      expect(out.chunks).toEqual([])
    })
  })
})
