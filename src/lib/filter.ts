/**
 * vaultline - Filter Driver
 *
 * Runs the scanner and the toggle engine over a whole input.
 * Output is produced only once every value has been toggled, so a failure
 * never leaves a partially toggled document on the output stream.
 */

import { scanLines, splitLines, type LineGroup } from './scanner.js'
import { ValueToggleEngine, type ToggleOptions } from './toggle.js'

export interface FilterStats {
  encrypted: number
  decrypted: number
  unchanged: number
  passthrough: number
}

export interface FilterResult {
  output: string
  stats: FilterStats
}

/**
 * Toggle every value in a YAML fragment
 *
 * @example
 * ```typescript
 * const { output } = filterYaml('db_password: secret123\n', {
 *   mode: 'auto',
 *   secrets: [{ label: 'default', secret: Buffer.from('test-secret') }]
 * })
 * ```
 */
export function filterYaml(input: string, options: ToggleOptions): FilterResult {
  const engine = new ValueToggleEngine(options)
  const groups: LineGroup[] = [...scanLines(splitLines(input))]

  // Fail before any transform when encryption is needed but impossible
  if (groups.some(group => group.type === 'value' && engine.willEncrypt(group.unit))) {
    engine.encryptionSecret()
  }

  const stats: FilterStats = { encrypted: 0, decrypted: 0, unchanged: 0, passthrough: 0 }
  const chunks: string[] = []

  for (const group of groups) {
    if (group.type === 'passthrough') {
      stats.passthrough++
      chunks.push(group.line.text + group.line.eol)
      continue
    }

    const rendered = engine.toggle(group.unit)
    stats[rendered.outcome]++
    chunks.push(rendered.text)
  }

  return { output: chunks.join(''), stats }
}

/**
 * Read a whole stream as UTF-8 text
 */
export function readStream(input: NodeJS.ReadableStream): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []

    input.on('data', (chunk: Buffer | string) => {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk)
    })
    input.on('end', () => {
      resolve(Buffer.concat(chunks).toString('utf8'))
    })
    input.on('error', reject)
  })
}

function writeStream(output: NodeJS.WritableStream, data: string): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(data, err => {
      if (err) {
        reject(err)
      } else {
        resolve()
      }
    })
  })
}

export interface RunFilterOptions extends ToggleOptions {
  input: NodeJS.ReadableStream
  output: NodeJS.WritableStream
}

/**
 * Read the input stream, toggle it, and write the result
 */
export async function runFilter(options: RunFilterOptions): Promise<FilterStats> {
  const { input, output, ...toggleOptions } = options
  const content = await readStream(input)
  const result = filterYaml(content, toggleOptions)

  if (result.output.length > 0) {
    await writeStream(output, result.output)
  }

  return result.stats
}
