/**
 * `baton config` command group
 *
 * Subcommands:
 *   - `baton config show`              display merged config (credentials masked)
 *   - `baton config get <key>`         print one value by dot-notation key
 *   - `baton config set <key> <value>` update a project config value
 */

import type { Command } from 'commander'
import yaml from 'js-yaml'
import { resolve } from 'node:path'
import { ConfigError } from '../../core/errors.js'
import { createConfigSystem, getByPath } from '../../modules/config/config-system-impl.js'
import type { ConfigSystem } from '../../modules/config/config-system.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'

const logger = createLogger('config-cmd')

// ---------------------------------------------------------------------------
// Exit codes
// ---------------------------------------------------------------------------

export const CONFIG_EXIT_SUCCESS = 0
export const CONFIG_EXIT_ERROR = 1
export const CONFIG_EXIT_INVALID = 2

// ---------------------------------------------------------------------------
// Coerce string value to appropriate JS type
// ---------------------------------------------------------------------------

export function coerceValue(raw: string): unknown {
  const trimmed = raw.trim()
  if (trimmed === 'true') return true
  if (trimmed === 'false') return false
  if (/^-?\d+$/.test(trimmed)) return parseInt(trimmed, 10)
  if (/^-?\d*\.\d+$/.test(trimmed)) return parseFloat(trimmed)
  return trimmed
}

export interface ConfigCommandOptions {
  projectRoot?: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

async function openConfig(opts: ConfigCommandOptions): Promise<ConfigSystem | number> {
  const system = createConfigSystem({
    projectConfigDir: opts.projectConfigDir ?? resolve(opts.projectRoot ?? process.cwd(), '.baton'),
    ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
    ...(opts.env !== undefined && { env: opts.env }),
  })
  try {
    await system.load()
    return system
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    logger.error({ err }, 'Failed to load configuration')
    process.stderr.write(`Error loading configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// `config show` action
// ---------------------------------------------------------------------------

export interface ConfigShowOptions extends ConfigCommandOptions {
  format?: 'yaml' | 'json'
}

export async function runConfigShow(opts: ConfigShowOptions = {}): Promise<number> {
  const system = await openConfig(opts)
  if (typeof system === 'number') return system

  const masked = system.getMasked()
  if (opts.format === 'json') {
    process.stdout.write(JSON.stringify(masked, null, 2) + '\n')
  } else {
    process.stdout.write('# Baton configuration (credentials masked)\n\n')
    process.stdout.write(yaml.dump(masked))
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config get` action
// ---------------------------------------------------------------------------

export async function runConfigGet(key: string, opts: ConfigCommandOptions = {}): Promise<number> {
  const system = await openConfig(opts)
  if (typeof system === 'number') return system

  const masked = getByPath(system.getMasked(), key)
  if (masked === undefined) {
    process.stderr.write(`Error: Unknown config key: ${key}\n`)
    return CONFIG_EXIT_INVALID
  }
  if (typeof masked === 'object' && masked !== null) {
    process.stdout.write(yaml.dump(masked))
  } else {
    process.stdout.write(`${String(masked)}\n`)
  }
  return CONFIG_EXIT_SUCCESS
}

// ---------------------------------------------------------------------------
// `config set` action
// ---------------------------------------------------------------------------

export async function runConfigSet(key: string, rawValue: string, opts: ConfigCommandOptions = {}): Promise<number> {
  if (key.trim() === '') {
    process.stderr.write('Error: key must not be empty\n')
    return CONFIG_EXIT_INVALID
  }

  const system = await openConfig(opts)
  if (typeof system === 'number') return system

  const value = coerceValue(rawValue)
  try {
    await system.set(key, value)
    process.stdout.write(`Set ${key} = ${JSON.stringify(value)}\n`)
    return CONFIG_EXIT_SUCCESS
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return CONFIG_EXIT_INVALID
    }
    process.stderr.write(`Error updating configuration: ${errorMessage(err)}\n`)
    return CONFIG_EXIT_ERROR
  }
}

// ---------------------------------------------------------------------------
// Command registration
// ---------------------------------------------------------------------------

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command('config').description('View and modify Baton configuration')

  configCmd
    .command('show')
    .description('Display the merged configuration with credentials masked')
    .option('--format <format>', 'Output format: yaml (default) or json', 'yaml')
    .option('--project-config-dir <dir>', 'Path to project .baton/ directory')
    .option('--global-config-dir <dir>', 'Path to global .baton/ directory')
    .action(async (opts: { format: string; projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigShow({
        format: opts.format === 'json' ? 'json' : 'yaml',
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('get <key>')
    .description('Print one configuration value (e.g. budgets.paid_call_budget)')
    .option('--project-config-dir <dir>', 'Path to project .baton/ directory')
    .option('--global-config-dir <dir>', 'Path to global .baton/ directory')
    .action(async (key: string, opts: { projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigGet(key, {
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })

  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value using dot-notation (e.g. global.log_level debug)')
    .option('--project-config-dir <dir>', 'Path to project .baton/ directory')
    .option('--global-config-dir <dir>', 'Path to global .baton/ directory')
    .action(async (key: string, value: string, opts: { projectConfigDir?: string; globalConfigDir?: string }) => {
      const exitCode = await runConfigSet(key, value, {
        ...(opts.projectConfigDir !== undefined && { projectConfigDir: opts.projectConfigDir }),
        ...(opts.globalConfigDir !== undefined && { globalConfigDir: opts.globalConfigDir }),
      })
      process.exit(exitCode)
    })
}
