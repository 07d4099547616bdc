/**
 * YAML scalar decoding and rendering for value units.
 */

import { isMap, isScalar, parse, parseDocument, stringify } from 'yaml'
import type { ValueUnit } from './scanner.js'

const STR_TAG = 'tag:yaml.org,2002:str'

/** Control characters (CR included, tab and LF excluded) a literal block cannot hold */
const BLOCK_UNSAFE_PATTERN = /[\x00-\x08\x0b-\x1f]/

/**
 * Decode the scalar held by a plain unit.
 *
 * Returns null when the value is not a plain scalar this filter can vault:
 * flow sequences/mappings, aliases, anchored or custom-tagged nodes and
 * anything the YAML parser rejects.
 * Numbers, booleans and null words are returned as their source text.
 */
export function decodePlainValue(unit: ValueUnit): string | null {
  const source = unit.lines.map(line => line.text.slice(unit.indent)).join('\n')
  const doc = parseDocument(source)

  if (doc.errors.length > 0 || !isMap(doc.contents) || doc.contents.items.length !== 1) {
    return null
  }

  const node = doc.contents.items[0].value
  if (!isScalar(node) || node.anchor) {
    return null
  }
  if (node.tag !== undefined && node.tag !== STR_TAG) {
    return null
  }

  return typeof node.value === 'string' ? node.value : unit.valueText
}

/**
 * Render a string as a single-line YAML scalar, plain when possible
 */
export function renderInlineScalar(text: string): string {
  const rendered = stringify(text, { lineWidth: 0 }).replace(/\n$/, '')

  if (!rendered.includes('\n') && parse(rendered) === text) {
    return rendered
  }

  // JSON strings are valid YAML double-quoted scalars
  return JSON.stringify(text)
}

/**
 * Literal block scalar header and body lines for a multi-line string.
 * Chomping follows the trailing newlines: none → `|-`, one → `|`, more → `|+`.
 */
export function renderBlockScalar(text: string, indent: number): { header: string; body: string[] } {
  let chomp: '' | '-' | '+'
  let content: string

  if (/^\n+$/.test(text) || text.endsWith('\n\n')) {
    chomp = '+'
    content = text.slice(0, -1)
  } else if (text.endsWith('\n')) {
    chomp = ''
    content = text.slice(0, -1)
  } else {
    chomp = '-'
    content = text
  }

  const lines = content.split('\n')
  const firstContentLine = lines.find(line => line.length > 0) ?? ''
  const indentIndicator = firstContentLine.startsWith(' ') ? '2' : ''
  const pad = ' '.repeat(indent + 2)
  const body = lines.map(line => (line.length > 0 ? pad + line : ''))

  return { header: `|${indentIndicator}${chomp}`, body }
}

/**
 * Render decrypted text back under the unit's key
 */
export function renderPlaintext(unit: ValueUnit, text: string): string[] {
  const comment = unit.comment ? ` ${unit.comment}` : ''

  if (!text.includes('\n')) {
    return [`${unit.keyPrefix}${renderInlineScalar(text)}${comment}`]
  }

  if (BLOCK_UNSAFE_PATTERN.test(text)) {
    return [`${unit.keyPrefix}${JSON.stringify(text)}${comment}`]
  }

  const { header, body } = renderBlockScalar(text, unit.indent)
  return [`${unit.keyPrefix}${header}${comment}`, ...body]
}
