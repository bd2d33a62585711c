/**
 * AdapterRegistry - central registry of ToolAdapter instances keyed by tool id.
 */

import { ToolNotFoundError } from '../core/errors.js'
import type { ToolId } from '../core/types.js'
import { ClaudeCLIAdapter } from './claude-adapter.js'
import type { CliToolAdapterOptions } from './cli-tool-adapter.js'
import { CodexCLIAdapter } from './codex-adapter.js'
import { GeminiCLIAdapter } from './gemini-adapter.js'
import type { ProbeResult, ToolAdapter } from './types.js'

/** Per-tool construction settings, usually taken from the `tools` config section */
export interface ToolSettings {
  enabled: boolean
  binary?: string
  max_prompt_bytes: number
  extra_args: string[]
  session_state_dir?: string
}

export class AdapterRegistry {
  private readonly _adapters = new Map<ToolId, ToolAdapter>()

  /** Register an adapter; replaces any adapter with the same id */
  register(adapter: ToolAdapter): void {
    this._adapters.set(adapter.id, adapter)
  }

  get(id: ToolId): ToolAdapter | undefined {
    return this._adapters.get(id)
  }

  /**
   * @throws {ToolNotFoundError} when no adapter is registered for `id`
   */
  require(id: ToolId): ToolAdapter {
    const adapter = this._adapters.get(id)
    if (adapter === undefined) throw new ToolNotFoundError(id)
    return adapter
  }

  getAll(): ToolAdapter[] {
    return Array.from(this._adapters.values())
  }

  /**
   * Probe every registered adapter sequentially.
   * A probe that throws is reported as unsupported rather than aborting the scan.
   */
  async probeAll(): Promise<Map<ToolId, ProbeResult>> {
    const results = new Map<ToolId, ProbeResult>()
    for (const adapter of this.getAll()) {
      try {
        results.set(adapter.id, await adapter.probe())
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err)
        results.set(adapter.id, {
          resumeSupported: false,
          idSource: 'unknown',
          binaryFound: false,
          binaryPath: '',
          notes: `probe failed: ${message}`,
        })
      }
    }
    return results
  }
}

const BUILT_IN: Record<string, (options: CliToolAdapterOptions) => ToolAdapter> = {
  codex: (options) => new CodexCLIAdapter(options),
  gemini: (options) => new GeminiCLIAdapter(options),
  claude: (options) => new ClaudeCLIAdapter(options),
}

/**
 * Build a registry holding the enabled built-in adapters.
 * Tools without a built-in adapter are ignored.
 */
export function createAdapterRegistry(
  tools: Record<string, ToolSettings>,
  shared: Pick<CliToolAdapterOptions, 'runner' | 'probeExec'> = {}
): AdapterRegistry {
  const registry = new AdapterRegistry()
  for (const [id, settings] of Object.entries(tools)) {
    const factory = BUILT_IN[id]
    if (factory === undefined || !settings.enabled) continue
    registry.register(
      factory({
        ...shared,
        ...(settings.binary !== undefined ? { binary: settings.binary } : {}),
        ...(settings.session_state_dir !== undefined ? { sessionStateDir: settings.session_state_dir } : {}),
        maxPromptBytes: settings.max_prompt_bytes,
        extraArgs: settings.extra_args,
      })
    )
  }
  return registry
}
