/**
 * vaultline CLI - Colors Utility
 *
 * Terminal colors for stderr messages and help output.
 * Supports NO_COLOR and FORCE_COLOR.
 */

import { colorize, style } from 'tuiuiu.js'
import type { Formatter } from 'cli-args-parser'

const isColorEnabled = (): boolean => {
  if (process.env.NO_COLOR !== undefined) return false
  if (process.env.FORCE_COLOR !== undefined) return true
  // Messages go to stderr, so that is the stream to check
  return process.stderr.isTTY ?? false
}

const enabled = isColorEnabled()

const color = (text: string, col: string): string => {
  if (!enabled) return text
  return colorize(text, col)
}

const bold = (text: string): string => {
  if (!enabled) return text
  return style(text, 'bold')
}

const dim = (text: string): string => {
  if (!enabled) return text
  return style(text, 'dim')
}

/**
 * Help/version formatter for cli-args-parser
 */
export const vaultlineFormatter: Formatter = {
  'section-header': s => bold(s),

  'program-name': s => bold(color(s, 'cyan')),
  'version': s => color(s, 'cyan'),
  'description': s => s,

  'command-name': s => color(s, 'cyan'),
  'command-alias': s => color(s, 'gray'),
  'command-description': s => s,

  'option-flag': s => color(s, 'cyanBright'),
  'option-type': s => color(s, 'blue'),
  'option-default': s => dim(s),
  'option-description': s => s,

  'positional-name': s => color(s, 'blueBright'),

  'error-header': s => bold(color(s, 'red')),
  'error-message': s => color(s, 'red'),
  'error-option': s => color(s, 'cyan'),
}

// Semantic colors
export const c = {
  key: (text: string) => color(text, 'cyanBright'),
  error: (text: string) => color(text, 'red'),
  warning: (text: string) => color(text, 'yellow'),
  muted: (text: string) => dim(text),
}

export const symbols = {
  success: enabled ? color('✓', 'green') : '[OK]',
  warning: enabled ? color('⚠', 'yellow') : '[WARN]',
  lock: enabled ? '🔒' : '[LOCKED]',
  unlock: enabled ? '🔓' : '[UNLOCKED]',
}
