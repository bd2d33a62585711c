/**
 * ConfigSystem implementation - loads configuration in hierarchy order and
 * exposes get/set/getMasked operations.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults
 *     → global user config  (~/.baton/config.yaml)
 *     → project config      (./.baton/config.yaml)
 *     → environment vars    (BATON_* prefixed)
 *     → CLI flag overrides  (passed via ConfigSystemOptions.cliOverrides)
 *
 * Layers are merged as plain trees and validated once, after the last layer.
 * Arrays replace rather than concatenate.
 */

import { readFile, writeFile, mkdir } from 'fs/promises'
import { join, resolve } from 'path'
import { homedir } from 'os'
import yaml from 'js-yaml'
import { createLogger } from '../../utils/logger.js'
import { ConfigError } from '../../core/errors.js'
import { isPlainObject } from '../../utils/helpers.js'
import { deepMask } from '../../cli/utils/masking.js'
import {
  BatonConfigSchema,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
  type BatonConfig,
} from './config-schema.js'
import { DEFAULT_CONFIG } from './defaults.js'
import type { ConfigSystem, ConfigSystemOptions } from './config-system.js'

const logger = createLogger('config')

type Tree = Record<string, unknown>

// ---------------------------------------------------------------------------
// Deep merge utility
// ---------------------------------------------------------------------------

export function deepMerge(base: Tree, override: Tree): Tree {
  const result: Tree = { ...base }
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined) continue
    const current = result[key]
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val
  }
  return result
}

// ---------------------------------------------------------------------------
// Environment variable resolution
// ---------------------------------------------------------------------------

/**
 * Map of BATON_ environment variable names to config paths.
 * Only scalar values can be overridden this way.
 */
export const ENV_VAR_MAP: Readonly<Record<string, string>> = {
  BATON_LOG_LEVEL: 'global.log_level',
  BATON_TASKS_DIR: 'global.tasks_dir',
  BATON_PAID_CALL_BUDGET: 'budgets.paid_call_budget',
  BATON_RETRY_BUDGET: 'budgets.retry_budget',
  BATON_RETRY_DELAY_MS: 'budgets.retry_delay_ms',
  BATON_PROGRESS_INTERVAL_SEC: 'execution.heartbeat_sec',
  BATON_DIGEST_POLICY: 'execution.digest_policy',
  BATON_SESSION_MODE: 'session.mode',
  BATON_REVIEW_PARALLEL_TIMEOUT_SEC: 'review.timeout_sec',
  BATON_SECURITY_MODE: 'review.security_mode',
  BATON_SECURITY_FIX_MAX_ROUNDS: 'review.security_max_rounds',
  BATON_CODEX_ENABLED: 'tools.codex.enabled',
  BATON_GEMINI_ENABLED: 'tools.gemini.enabled',
  BATON_CLAUDE_ENABLED: 'tools.claude.enabled',
}

function coerce(raw: string): unknown {
  if (raw === 'true') return true
  if (raw === 'false') return false
  if (/^\d+$/.test(raw)) return parseInt(raw, 10)
  if (/^\d*\.\d+$/.test(raw)) return parseFloat(raw)
  return raw
}

/** Build the overlay contributed by BATON_* variables */
export function readEnvOverrides(env: NodeJS.ProcessEnv): Tree {
  let overrides: Tree = {}
  for (const [envKey, configPath] of Object.entries(ENV_VAR_MAP)) {
    const rawValue = env[envKey]
    if (rawValue === undefined || rawValue === '') continue
    overrides = setByPath(overrides, configPath, coerce(rawValue))
  }
  return overrides
}

// ---------------------------------------------------------------------------
// Dot-notation key accessor / setter
// ---------------------------------------------------------------------------

export function getByPath(obj: unknown, path: string): unknown {
  let cursor: unknown = obj
  for (const part of path.split('.')) {
    if (!isPlainObject(cursor)) return undefined
    cursor = cursor[part]
  }
  return cursor
}

/**
 * Return a copy of `obj` with `path` set to `value`.
 * Intermediate objects are created or copied as needed.
 */
export function setByPath(obj: Tree, path: string, value: unknown): Tree {
  const [head, ...rest] = path.split('.')
  if (head === undefined || head === '') return obj
  if (rest.length === 0) return { ...obj, [head]: value }
  const child = obj[head]
  return { ...obj, [head]: setByPath(isPlainObject(child) ? child : {}, rest.join('.'), value) }
}

function formatIssues(issues: ReadonlyArray<{ path: (string | number)[]; message: string }>): string {
  return issues.map((issue) => `  • ${issue.path.join('.')}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// ConfigSystemImpl
// ---------------------------------------------------------------------------

export class ConfigSystemImpl implements ConfigSystem {
  private _config: BatonConfig | null = null
  private readonly _projectConfigDir: string
  private readonly _globalConfigDir: string
  private readonly _cliOverrides: Tree
  private readonly _env: NodeJS.ProcessEnv

  constructor(options: ConfigSystemOptions = {}) {
    this._projectConfigDir = options.projectConfigDir !== undefined
      ? resolve(options.projectConfigDir)
      : resolve(process.cwd(), '.baton')
    this._globalConfigDir = options.globalConfigDir !== undefined
      ? resolve(options.globalConfigDir)
      : resolve(homedir(), '.baton')
    this._cliOverrides = options.cliOverrides ?? {}
    this._env = options.env ?? process.env
  }

  get isLoaded(): boolean {
    return this._config !== null
  }

  async load(): Promise<void> {
    let merged: Tree = structuredClone(DEFAULT_CONFIG)

    const globalConfig = await this._loadYamlFile(join(this._globalConfigDir, 'config.yaml'))
    if (globalConfig !== null) merged = deepMerge(merged, globalConfig)

    const projectConfig = await this._loadYamlFile(join(this._projectConfigDir, 'config.yaml'))
    if (projectConfig !== null) merged = deepMerge(merged, projectConfig)

    const envOverrides = readEnvOverrides(this._env)
    if (Object.keys(envOverrides).length > 0) merged = deepMerge(merged, envOverrides)

    if (Object.keys(this._cliOverrides).length > 0) merged = deepMerge(merged, this._cliOverrides)

    const result = BatonConfigSchema.safeParse(merged)
    if (!result.success) {
      throw new ConfigError(`Configuration validation failed:\n${formatIssues(result.error.issues)}`, {
        issues: result.error.issues,
      })
    }

    this._config = result.data
    logger.debug('Configuration loaded successfully')
  }

  getConfig(): BatonConfig {
    if (this._config === null) {
      throw new ConfigError('Configuration has not been loaded. Call load() before getConfig().')
    }
    return this._config
  }

  get(key: string): unknown {
    return getByPath(this.getConfig(), key)
  }

  async set(key: string, value: unknown): Promise<void> {
    const existing = getByPath(this.getConfig(), key)
    if (existing === undefined) {
      throw new ConfigError(`Unknown config key: ${key}`, { key })
    }
    if (typeof existing === 'object' && existing !== null) {
      throw new ConfigError(`Cannot set object key "${key}"; use a more specific dot-notation path`, { key })
    }

    const projectConfigPath = join(this._projectConfigDir, 'config.yaml')
    const projectConfigRaw = (await this._loadYamlFile(projectConfigPath)) ?? {}
    const updated = setByPath(projectConfigRaw, key, value)

    // Validate the update against the full merged document before writing
    const candidate = BatonConfigSchema.safeParse(setByPath(structuredClone(this.getConfig()), key, value))
    if (!candidate.success) {
      throw new ConfigError(`Invalid value for "${key}":\n${formatIssues(candidate.error.issues)}`, {
        key,
        value,
        issues: candidate.error.issues,
      })
    }

    await mkdir(this._projectConfigDir, { recursive: true })
    await writeFile(projectConfigPath, yaml.dump(updated), 'utf-8')
    await this.load()
  }

  getMasked(): BatonConfig {
    return BatonConfigSchema.parse(deepMask(this.getConfig()))
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _loadYamlFile(filePath: string): Promise<Tree | null> {
    let raw: string
    try {
      raw = await readFile(filePath, 'utf-8')
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Failed to read config file at ${filePath}: ${message}`, { filePath })
    }

    let parsed: unknown
    try {
      parsed = yaml.load(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ConfigError(`Invalid YAML in config file at ${filePath}: ${message}`, { filePath })
    }

    if (parsed === undefined || parsed === null) return {}
    if (!isPlainObject(parsed)) {
      throw new ConfigError(`Config file at ${filePath} must contain a mapping`, { filePath })
    }

    const version = parsed['config_format_version']
    if (version !== undefined && (typeof version !== 'string' || !SUPPORTED_CONFIG_FORMAT_VERSIONS.includes(version))) {
      throw new ConfigError(
        `Unsupported config_format_version ${JSON.stringify(version)} in ${filePath}; supported: ${SUPPORTED_CONFIG_FORMAT_VERSIONS.join(', ')}`,
        { filePath, version }
      )
    }
    return parsed
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new ConfigSystem instance.
 *
 * @example
 * const config = createConfigSystem()
 * await config.load()
 * const cfg = config.getConfig()
 */
export function createConfigSystem(options: ConfigSystemOptions = {}): ConfigSystem {
  return new ConfigSystemImpl(options)
}
