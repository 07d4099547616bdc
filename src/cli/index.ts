#!/usr/bin/env node
/**
 * vaultline CLI
 *
 * Pipe `key: value` YAML lines through to vault or unvault their values:
 *
 *   vaultline toggle prod < vars.yml
 *   vaultline decrypt --vault-id dev@~/.vault-dev < vars.yml
 */

import { createCLI, type CLISchema } from 'cli-args-parser'
import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { ToggleMode } from '../types.js'
import { loadConfig } from '../lib/config-loader.js'
import { resolveVaultSecrets } from '../lib/vault-ids.js'
import { runFilter } from '../lib/filter.js'
import { formatErrorForCli } from '../lib/errors.js'
import { c, symbols, vaultlineFormatter } from './lib/colors.js'
import * as ui from './ui.js'

const VERSION = process.env.VAULTLINE_VERSION || getPackageVersion() || '0.0.0'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from dist/cli or src/cli to the package root
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (pkg !== null && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

const identityPositional = [
  { name: 'identity', required: false, description: 'Encryption vault identity (overrides ANSIBLE_VAULT_IDENTITY)' }
]

const cliSchema: CLISchema = {
  name: 'vaultline',
  version: VERSION,
  description: 'Toggle YAML values between plaintext and inline vault blocks',
  autoShort: false,
  strict: true,
  formatter: vaultlineFormatter,
  help: {
    includeGlobalOptionsInCommands: true
  },

  options: {
    help: {
      short: 'h',
      type: 'boolean',
      default: false,
      description: 'Show help'
    },
    version: {
      type: 'boolean',
      default: false,
      description: 'Show version'
    },
    'vault-id': {
      type: 'string',
      description: 'Vault ids as label@password-file (comma-separated)'
    },
    'vault-password-file': {
      type: 'string',
      description: 'Password file for the default vault id'
    },
    verbose: {
      short: 'v',
      type: 'boolean',
      default: false,
      description: 'Show which values are toggled (never their contents)'
    },
    quiet: {
      short: 'q',
      type: 'boolean',
      default: false,
      description: 'Suppress warnings and the summary (errors still shown)'
    }
  },

  commands: {
    toggle: {
      description: 'Encrypt plaintext values and decrypt vaulted ones (default mode from config)',
      aliases: ['auto'],
      positional: identityPositional
    },
    encrypt: {
      description: 'Encrypt plaintext values, leave vaulted ones untouched',
      aliases: ['vault'],
      positional: identityPositional
    },
    decrypt: {
      description: 'Decrypt vaulted values, leave plaintext ones untouched',
      aliases: ['unvault'],
      positional: identityPositional
    }
  }
}

const COMMAND_MODES: Record<string, ToggleMode | undefined> = {
  encrypt: 'encrypt',
  vault: 'encrypt',
  decrypt: 'decrypt',
  unvault: 'decrypt'
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

const cli = createCLI(cliSchema)

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const result = cli.parse(process.argv.slice(2))
  const opts = result.options as Record<string, unknown>
  const pos = result.positional as Record<string, unknown>

  if (opts.version) {
    ui.output(`vaultline v${VERSION}`)
    return
  }

  if (opts.help || result.command.length === 0) {
    ui.output(cli.help(result.command))
    return
  }

  if (result.errors.length > 0) {
    for (const error of result.errors) {
      ui.error(error)
    }
    process.exit(1)
  }

  ui.setVerbose(opts.verbose === true)
  ui.setQuiet(opts.quiet === true)

  const command = result.command[0]

  try {
    const config = loadConfig()
    const mode: ToggleMode = COMMAND_MODES[command] ?? config.mode ?? 'auto'
    const vaultId = stringOption(opts['vault-id'])

    const { secrets, encryptIdentity } = resolveVaultSecrets({
      identity: stringOption(pos.identity),
      vaultIds: vaultId ? [vaultId] : [],
      passwordFile: stringOption(opts['vault-password-file']),
      config,
      mode
    })

    ui.verbose(`Mode: ${mode}`)
    ui.verbose(`Vault ids: ${secrets.map(secret => secret.label).join(', ') || '(none)'}`)
    if (encryptIdentity) {
      ui.verbose(`Encryption identity: ${encryptIdentity}`)
    }

    const stats = await runFilter({
      input: process.stdin,
      output: process.stdout,
      mode,
      secrets,
      encryptIdentity,
      logger: {
        debug: message => ui.verbose(message),
        warn: message => ui.warn(message)
      }
    })

    ui.success(
      `${symbols.lock} ${c.key(String(stats.encrypted))} encrypted, ` +
      `${symbols.unlock} ${c.key(String(stats.decrypted))} decrypted, ` +
      `${stats.unchanged} unchanged`
    )
  } catch (err) {
    ui.error(formatErrorForCli(err))
    process.exit(1)
  }
}

main().catch(err => {
  ui.error(formatErrorForCli(err))
  process.exit(1)
})
