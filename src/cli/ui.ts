/**
 * CLI UI utilities
 *
 * stdout carries only filtered YAML; every message goes to stderr.
 */

import { c, symbols } from './lib/colors.js'

export const isStderrTTY = process.stderr.isTTY ?? false

let quiet = false
let verboseEnabled = false

export function setQuiet(value: boolean): void {
  quiet = value
}

export function setVerbose(value: boolean): void {
  verboseEnabled = value
}

/**
 * Output data to stdout
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log verbose message (only with the verbose flag)
 */
export function verbose(message: string): void {
  if (verboseEnabled) {
    console.error(c.muted(`[vaultline] ${message}`))
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(c.error(message))
}

/**
 * Log success message (TTY only, suppressed by --quiet)
 */
export function success(message: string): void {
  if (isStderrTTY && !quiet) {
    console.error(`${symbols.success} ${message}`)
  }
}

/**
 * Log warning message (suppressed by --quiet)
 */
export function warn(message: string): void {
  if (!quiet) {
    console.error(`${symbols.warning} ${c.warning(`Warning: ${message}`)}`)
  }
}
