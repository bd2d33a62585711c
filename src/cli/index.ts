#!/usr/bin/env node
/**
 * Baton CLI - Main entry point
 * Provides the `baton` command-line interface
 */

import { Command } from 'commander'
import { fileURLToPath } from 'url'
import { dirname, resolve } from 'path'
import { readFile } from 'fs/promises'
import { createLogger } from '../utils/logger.js'
import { registerAdaptersCommand } from './commands/adapters.js'
import { registerConfigCommand } from './commands/config.js'
import { registerReviewCommand } from './commands/review.js'
import { registerRunCommand } from './commands/run.js'
import { registerStatusCommand } from './commands/status.js'

const logger = createLogger('cli')

/** Resolve the package version relative to this file (dist/ or src/) */
async function getPackageVersion(): Promise<string> {
  const here = dirname(fileURLToPath(import.meta.url))
  for (const pkgPath of [resolve(here, '../../package.json'), resolve(here, '../package.json')]) {
    try {
      const pkg: unknown = JSON.parse(await readFile(pkgPath, 'utf-8'))
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        return pkg.version
      }
    } catch (err) {
      logger.debug({ pkgPath, err }, 'package.json not readable here')
    }
  }
  return '0.0.0'
}

/** Create and configure the CLI program */
export async function createProgram(): Promise<Command> {
  const version = await getPackageVersion()

  const program = new Command()
  program
    .name('baton')
    .description('Baton - stage-by-stage pipelines for external text-generation CLIs')
    .version(version, '-v, --version', 'Output the current version')

  registerRunCommand(program)
  registerReviewCommand(program)
  registerStatusCommand(program)
  registerConfigCommand(program)
  registerAdaptersCommand(program)

  return program
}

/** Main entry point */
async function main(): Promise<void> {
  try {
    const program = await createProgram()
    await program.parseAsync(process.argv)
  } catch (error) {
    logger.error({ error }, 'CLI error')
    process.exit(1)
  }
}

// Errors are handled internally by main() which calls process.exit(1)
void main()
