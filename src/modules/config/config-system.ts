/**
 * ConfigSystem interface - public contract for the configuration subsystem.
 *
 * All callers should depend on this interface, not the concrete implementation.
 * Create an instance via `createConfigSystem()` from config-system-impl.ts.
 */

import type { BatonConfig } from './config-schema.js'

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ConfigSystemOptions {
  /** Path to the project-level .baton/ directory (default: <cwd>/.baton) */
  projectConfigDir?: string
  /** Path to the global user-level .baton/ directory (default: ~/.baton) */
  globalConfigDir?: string
  /**
   * Values that override every file layer and the environment.
   * Typically populated from CLI flags.
   */
  cliOverrides?: Record<string, unknown>
  /** Environment consulted for BATON_* overrides (default: process.env) */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------------------------------
// ConfigSystem interface
// ---------------------------------------------------------------------------

/**
 * Provides access to fully-merged, validated configuration.
 *
 * Hierarchy (lowest → highest priority):
 *   built-in defaults < global config < project config < env vars < CLI flags
 */
export interface ConfigSystem {
  /**
   * Load and validate configuration from all sources in hierarchy order.
   * Must be called before `getConfig()`.
   */
  load(): Promise<void>

  /**
   * @throws {ConfigError} if `load()` has not been called.
   */
  getConfig(): BatonConfig

  /** Single value by dot-notation key, or undefined when the key does not exist */
  get(key: string): unknown

  /**
   * Persist a scalar value to the project config file and reload.
   * @throws {ConfigError} if the key is unknown, names a section, or the value is invalid.
   */
  set(key: string, value: unknown): Promise<void>

  /** Merged config with credential fields masked; safe for display */
  getMasked(): BatonConfig

  readonly isLoaded: boolean
}
