/**
 * Tests for scanner.ts
 */

import { describe, it, expect } from 'vitest'
import {
  indentOf,
  isVaultOpener,
  parseKeyLine,
  scanLines,
  splitLines,
  splitTrailingComment,
  type LineGroup
} from '../../src/lib/scanner.js'

function line(text: string, number = 1) {
  return { number, text, eol: '\n' }
}

function scan(content: string): LineGroup[] {
  return [...scanLines(splitLines(content))]
}

/** Compact view of the groups: passthrough text or kind:key:lineCount */
function shape(groups: LineGroup[]): string[] {
  return groups.map(group =>
    group.type === 'passthrough'
      ? `pass:${group.line.text}`
      : `${group.unit.kind}:${group.unit.key}:${group.unit.lines.length}`
  )
}

describe('scanner', () => {
  describe('splitLines', () => {
    it('should keep each line terminator', () => {
      expect(splitLines('a\nb\r\nc')).toEqual([
        { number: 1, text: 'a', eol: '\n' },
        { number: 2, text: 'b', eol: '\r\n' },
        { number: 3, text: 'c', eol: '' }
      ])
    })

    it('should not invent a line after a final newline', () => {
      expect(splitLines('a\n')).toEqual([{ number: 1, text: 'a', eol: '\n' }])
    })

    it('should return no lines for empty input', () => {
      expect(splitLines('')).toEqual([])
    })

    it('should keep empty lines', () => {
      expect(splitLines('\n\n').map(raw => raw.text)).toEqual(['', ''])
    })
  })

  describe('indentOf', () => {
    it('should count leading spaces', () => {
      expect(indentOf('    key: v')).toBe(4)
      expect(indentOf('key: v')).toBe(0)
    })
  })

  describe('splitTrailingComment', () => {
    it('should split a plain value from its comment', () => {
      expect(splitTrailingComment('hunter2 # rotate monthly')).toEqual({ value: 'hunter2', comment: '# rotate monthly' })
    })

    it('should keep a hash without a preceding space in the value', () => {
      expect(splitTrailingComment('abc#def')).toEqual({ value: 'abc#def' })
    })

    it('should skip over double-quoted text', () => {
      expect(splitTrailingComment('"a # b" # c')).toEqual({ value: '"a # b"', comment: '# c' })
    })

    it('should skip over single-quoted text with doubled quotes', () => {
      expect(splitTrailingComment("'it''s # here' # c")).toEqual({ value: "'it''s # here'", comment: '# c' })
    })
  })

  describe('isVaultOpener', () => {
    it('should accept the vault block opener', () => {
      expect(isVaultOpener('!vault |')).toBe(true)
      expect(isVaultOpener('!vault |-')).toBe(true)
      expect(isVaultOpener('!vault | # prod')).toBe(true)
    })

    it('should reject other values', () => {
      expect(isVaultOpener('!vault')).toBe(false)
      expect(isVaultOpener('!vault "inline"')).toBe(false)
      expect(isVaultOpener('vault |')).toBe(false)
    })
  })

  describe('parseKeyLine', () => {
    it('should parse a plain key line', () => {
      expect(parseKeyLine(line('db_password: secret123'))).toEqual({
        kind: 'plain',
        key: 'db_password',
        keyPrefix: 'db_password: ',
        indent: 0,
        valueText: 'secret123',
        comment: undefined,
        lines: [line('db_password: secret123')]
      })
    })

    it('should keep indentation and extra spacing in the prefix', () => {
      const unit = parseKeyLine(line('  api_key:   abc'))
      expect(unit?.keyPrefix).toBe('  api_key:   ')
      expect(unit?.indent).toBe(2)
      expect(unit?.valueText).toBe('abc')
    })

    it('should separate a trailing comment', () => {
      const unit = parseKeyLine(line('password: hunter2 # prod'))
      expect(unit?.valueText).toBe('hunter2')
      expect(unit?.comment).toBe('# prod')
    })

    it('should accept quoted keys', () => {
      expect(parseKeyLine(line('"my key": v'))?.key).toBe('"my key"')
      expect(parseKeyLine(line("'other key': v"))?.key).toBe("'other key'")
    })

    it('should classify a vault opener as vaulted', () => {
      const unit = parseKeyLine(line('token: !vault | # ci'))
      expect(unit?.kind).toBe('vaulted')
      expect(unit?.valueText).toBe('!vault |')
      expect(unit?.comment).toBe('# ci')
    })

    it('should not treat vault-looking inline text as vaulted', () => {
      expect(parseKeyLine(line('note: $ANSIBLE_VAULT;1.1;AES256'))?.kind).toBe('plain')
    })

    it('should ignore lines that are not key: value', () => {
      expect(parseKeyLine(line('parent:'))).toBeNull()
      expect(parseKeyLine(line('- item'))).toBeNull()
      expect(parseKeyLine(line('# key: value'))).toBeNull()
      expect(parseKeyLine(line('just text'))).toBeNull()
      expect(parseKeyLine(line('---'))).toBeNull()
    })

    it('should ignore a key followed only by a comment', () => {
      expect(parseKeyLine(line('parent: # nested below'))).toBeNull()
    })

    it('should parse a mapping inside a sequence entry', () => {
      const unit = parseKeyLine(line('  - name: bob'))
      expect(unit?.kind).toBe('plain')
      expect(unit?.key).toBe('name')
      expect(unit?.keyPrefix).toBe('  - name: ')
      expect(unit?.indent).toBe(4)
      expect(unit?.valueText).toBe('bob')
    })

    it('should parse a vault opener inside a sequence entry', () => {
      const unit = parseKeyLine(line('- token: !vault |'))
      expect(unit?.kind).toBe('vaulted')
      expect(unit?.keyPrefix).toBe('- token: ')
      expect(unit?.indent).toBe(2)
    })
  })

  describe('scanLines', () => {
    it('should classify plain, vaulted and passthrough lines', () => {
      const groups = scan([
        '# settings',
        'plain: abc',
        'vaulted: !vault |',
        '  $ANSIBLE_VAULT;1.1;AES256',
        '  3031',
        'other: x',
        '- item',
        ''
      ].join('\n'))

      expect(shape(groups)).toEqual([
        'pass:# settings',
        'plain:plain:1',
        'vaulted:vaulted:3',
        'plain:other:1',
        'pass:- item'
      ])
    })

    it('should end a vault block at a blank line', () => {
      const groups = scan('k: !vault |\n  $ANSIBLE_VAULT;1.1;AES256\n\n  stray\n')
      expect(shape(groups)).toEqual(['vaulted:k:2', 'pass:', 'pass:  stray'])
    })

    it('should end a vault block at a line indented like its key', () => {
      const groups = scan('  k: !vault |\n    $ANSIBLE_VAULT;1.1;AES256\n  next: v\n')
      expect(shape(groups)).toEqual(['vaulted:k:2', 'plain:next:1'])
    })

    it('should absorb continuation lines into a plain value', () => {
      const groups = scan('desc: first\n  second\n\n  third\nnext: y\n')
      expect(shape(groups)).toEqual(['plain:desc:4', 'plain:next:1'])
    })

    it('should leave blank lines after a plain value as passthrough', () => {
      const groups = scan('desc: |\n  text\n\n\nnext: y\n')
      expect(shape(groups)).toEqual(['plain:desc:2', 'pass:', 'pass:', 'plain:next:1'])
    })

    it('should flush trailing blank lines at the end of input', () => {
      const groups = scan('k: v\n\n')
      expect(shape(groups)).toEqual(['plain:k:1', 'pass:'])
    })

    it('should handle nested mappings line by line', () => {
      const groups = scan('db:\n  host: localhost\n  password: secret\n')
      expect(shape(groups)).toEqual(['pass:db:', 'plain:host:1', 'plain:password:1'])
    })

    it('should emit a vault block that runs to the end of input', () => {
      const groups = scan('k: !vault |\n  $ANSIBLE_VAULT;1.1;AES256\n  abcd')
      expect(shape(groups)).toEqual(['vaulted:k:3'])
    })

    it('should keep original line numbers', () => {
      const groups = scan('# a\n# b\nkey: v\n')
      const unit = groups[2]
      expect(unit.type === 'value' ? unit.unit.lines[0].number : 0).toBe(3)
    })

    it('should end a plain value at an indented comment line', () => {
      const groups = scan('password: abc\n  # rotate quarterly\nnext: x\n')
      expect(shape(groups)).toEqual(['plain:password:1', 'pass:  # rotate quarterly', 'plain:next:1'])
    })

    it('should not resume a plain value after a comment line', () => {
      const groups = scan('k: v\n\n  # note\n  more\n')
      expect(shape(groups)).toEqual(['plain:k:1', 'pass:', 'pass:  # note', 'pass:  more'])
    })

    it('should keep comment-like lines inside a block scalar', () => {
      const groups = scan('script: |\n  # not a comment\n  echo hi\n')
      expect(shape(groups)).toEqual(['plain:script:3'])
    })

    it('should end a vault block at a comment line', () => {
      const groups = scan('k: !vault |\n  $ANSIBLE_VAULT;1.1;AES256\n  3031\n  # rotated\n')
      expect(shape(groups)).toEqual(['vaulted:k:3', 'pass:  # rotated'])
    })

    it('should find values in a sequence of mappings', () => {
      const groups = scan('users:\n  - name: bob\n    password: hunter2\n  - name: amy\n')
      expect(shape(groups)).toEqual(['pass:users:', 'plain:name:1', 'plain:password:1', 'plain:name:1'])
    })
  })
})
