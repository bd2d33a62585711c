/**
 * Config loading and task directory resolution shared by CLI commands.
 */

import { isAbsolute, resolve } from 'node:path'
import { ConfigError } from '../../core/errors.js'
import type { BatonConfig } from '../../modules/config/config-schema.js'
import { createConfigSystem } from '../../modules/config/config-system-impl.js'
import { errorMessage } from '../../utils/helpers.js'
import { setLogLevel } from '../../utils/logger.js'

export const EXIT_SUCCESS = 0
export const EXIT_ERROR = 1
export const EXIT_USAGE = 2

export interface ConfigLocationOptions {
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  cliOverrides?: Record<string, unknown>
}

export type LoadedConfig = { ok: true; config: BatonConfig } | { ok: false; exitCode: number }

/**
 * Load and validate the merged configuration, reporting failures on stderr.
 */
export async function loadConfig(opts: ConfigLocationOptions): Promise<LoadedConfig> {
  const system = createConfigSystem({
    projectConfigDir: opts.projectConfigDir ?? resolve(opts.projectRoot, '.baton'),
    ...(opts.globalConfigDir !== undefined ? { globalConfigDir: opts.globalConfigDir } : {}),
    ...(opts.env !== undefined ? { env: opts.env } : {}),
    ...(opts.cliOverrides !== undefined ? { cliOverrides: opts.cliOverrides } : {}),
  })
  try {
    await system.load()
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`Configuration error: ${err.message}\n`)
      return { ok: false, exitCode: EXIT_USAGE }
    }
    process.stderr.write(`Error loading configuration: ${errorMessage(err)}\n`)
    return { ok: false, exitCode: EXIT_ERROR }
  }
  const config = system.getConfig()
  setLogLevel(config.global.log_level)
  return { ok: true, config }
}

/** A bare task name lives under `global.tasks_dir`; a path is used as given */
export function resolveTaskDir(config: BatonConfig, task: string, projectRoot: string): string {
  if (isAbsolute(task)) return task
  if (task.includes('/') || task.startsWith('.')) return resolve(projectRoot, task)
  return resolve(projectRoot, config.global.tasks_dir, task)
}
