/**
 * vaultline - Line Scanner
 *
 * Classifies a line-oriented YAML fragment into groups:
 * - plain:       `key: value` plus any more-indented continuation lines
 * - vaulted:     `key: !vault |` plus its more-indented envelope lines
 * - passthrough: anything else, echoed verbatim
 *
 * Only flat `key: value` lines and the vault block sub-grammar are
 * understood; nested mappings are handled line by line.
 */

export interface RawLine {
  /** 1-based line number in the input */
  number: number
  /** Line content without its terminator */
  text: string
  /** Original terminator: '\n', '\r\n' or '' for an unterminated last line */
  eol: string
}

export type ValueKind = 'plain' | 'vaulted'

export interface ValueUnit {
  kind: ValueKind
  /** Key as written (quotes kept) */
  key: string
  /** Leading text up to and including the colon and the spaces after it */
  keyPrefix: string
  /** Column where the key starts */
  indent: number
  /** Value text on the key line, without its trailing comment */
  valueText: string
  /** Trailing `# comment` on the key line, if any */
  comment?: string
  /** All lines of the unit, key line first */
  lines: RawLine[]
}

export type LineGroup =
  | { type: 'passthrough'; line: RawLine }
  | { type: 'value'; unit: ValueUnit }

type ScannerState =
  | { name: 'idle' }
  | { name: 'vault-block'; unit: ValueUnit }
  | { name: 'plain-block'; unit: ValueUnit; blockScalar: boolean; pendingBlank: RawLine[] }

/**
 * `<indent>[- ]<key>:<gap><value>` where key is quoted or a plain scalar
 * that does not start with a YAML indicator. The optional `- ` is a
 * sequence entry holding a mapping.
 */
const KEY_LINE_PATTERN =
  /^( *)((?:- +)?)("(?:[^"\\]|\\.)*"|'(?:[^']|'')*'|(?:[^\s\-?:,[\]{}#&*!|>'"%@`]|[-?:][^\s])[^\t\n]*?):([ \t]+)(\S.*)$/

const VAULT_OPENER_PATTERN = /^!vault[ \t]+\|[-+]?[ \t]*(#.*)?$/

/** `|` or `>` header, with optional chomping and indentation indicators */
const BLOCK_SCALAR_PATTERN = /^[|>](?:[-+][1-9]?|[1-9][-+]?)?$/

// ============================================================================
// Line splitting
// ============================================================================

/**
 * Split text into lines, keeping each line's terminator
 */
export function splitLines(content: string): RawLine[] {
  const lines: RawLine[] = []
  const pattern = /([^\n]*?)(\r?\n|$)/g
  let number = 0

  for (const match of content.matchAll(pattern)) {
    const [whole, text, eol] = match
    if (whole.length === 0) {
      break
    }
    number++
    lines.push({ number, text, eol })
  }

  return lines
}

export function indentOf(text: string): number {
  let count = 0
  while (count < text.length && text[count] === ' ') {
    count++
  }
  return count
}

function isBlank(text: string): boolean {
  return text.trim().length === 0
}

function isComment(text: string): boolean {
  return text.trimStart().startsWith('#')
}

// ============================================================================
// Value text helpers
// ============================================================================

/**
 * Split the value part of a key line into the value and a trailing comment.
 * Quoted scalars are skipped over so `#` inside quotes stays in the value.
 */
export function splitTrailingComment(value: string): { value: string; comment?: string } {
  let end = 0

  if (value.startsWith('"')) {
    end = 1
    while (end < value.length && value[end] !== '"') {
      end += value[end] === '\\' ? 2 : 1
    }
    end = Math.min(end + 1, value.length)
  } else if (value.startsWith("'")) {
    end = 1
    while (end < value.length) {
      if (value[end] === "'" && value[end + 1] === "'") {
        end += 2
      } else if (value[end] === "'") {
        break
      } else {
        end++
      }
    }
    end = Math.min(end + 1, value.length)
  }

  const commentMatch = /[ \t]#/.exec(value.slice(end))
  if (!commentMatch) {
    return { value: value.trimEnd() }
  }

  const commentStart = end + commentMatch.index
  return {
    value: value.slice(0, commentStart).trimEnd(),
    comment: value.slice(commentStart).trim()
  }
}

/**
 * Check whether a value is the `!vault |` block opener
 */
export function isVaultOpener(value: string): boolean {
  return VAULT_OPENER_PATTERN.test(value.trim())
}

/**
 * Parse a key line into a value unit (without continuation lines)
 */
export function parseKeyLine(line: RawLine): ValueUnit | null {
  const match = KEY_LINE_PATTERN.exec(line.text)
  if (!match) {
    return null
  }

  const [, indentText, entry, key, gap, rawValue] = match

  if (rawValue.startsWith('#')) {
    // `key: # comment` opens a nested mapping
    return null
  }

  const keyPrefix = `${indentText}${entry}${key}:${gap}`
  const indent = indentText.length + entry.length
  const { value, comment } = splitTrailingComment(rawValue)

  if (isVaultOpener(rawValue)) {
    const opener = /^!vault[ \t]+\|[-+]?/.exec(rawValue.trim())
    return {
      kind: 'vaulted',
      key,
      keyPrefix,
      indent,
      valueText: opener ? opener[0] : rawValue,
      comment,
      lines: [line]
    }
  }

  return {
    kind: 'plain',
    key,
    keyPrefix,
    indent,
    valueText: value,
    comment,
    lines: [line]
  }
}

// ============================================================================
// Scanner
// ============================================================================

/**
 * Lazily group lines into passthrough lines and value units.
 *
 * A vault block ends at the first blank or comment-only line, or the
 * first line indented at or left of its key. A plain value absorbs
 * more-indented lines; blank lines inside it are kept only when a
 * continuation line follows.
 * A comment-only line ends a plain value unless the value is a `|`/`>`
 * block scalar, whose content it belongs to.
 */
export function* scanLines(lines: Iterable<RawLine>): Generator<LineGroup> {
  let state: ScannerState = { name: 'idle' }

  for (const line of lines) {
    if (state.name === 'vault-block') {
      if (!isBlank(line.text) && !isComment(line.text) && indentOf(line.text) > state.unit.indent) {
        state.unit.lines.push(line)
        continue
      }
      yield { type: 'value', unit: state.unit }
      state = { name: 'idle' }
    } else if (state.name === 'plain-block') {
      if (isBlank(line.text)) {
        state.pendingBlank.push(line)
        continue
      }
      const continues = indentOf(line.text) > state.unit.indent &&
        (state.blockScalar || !isComment(line.text))
      if (continues) {
        state.unit.lines.push(...state.pendingBlank, line)
        state.pendingBlank = []
        continue
      }
      yield { type: 'value', unit: state.unit }
      for (const blank of state.pendingBlank) {
        yield { type: 'passthrough', line: blank }
      }
      state = { name: 'idle' }
    }

    const unit = parseKeyLine(line)
    if (!unit) {
      yield { type: 'passthrough', line }
    } else if (unit.kind === 'vaulted') {
      state = { name: 'vault-block', unit }
    } else {
      state = {
        name: 'plain-block',
        unit,
        blockScalar: BLOCK_SCALAR_PATTERN.test(unit.valueText),
        pendingBlank: []
      }
    }
  }

  if (state.name === 'vault-block') {
    yield { type: 'value', unit: state.unit }
  } else if (state.name === 'plain-block') {
    yield { type: 'value', unit: state.unit }
    for (const blank of state.pendingBlank) {
      yield { type: 'passthrough', line: blank }
    }
  }
}
