/**
 * `baton adapters` command group
 *
 *   - `baton adapters probe`  detect binaries and session resume support per enabled tool
 */

import type { Command } from 'commander'
import type { AdapterRegistry } from '../../adapters/adapter-registry.js'
import { createAdapterRegistry } from '../../adapters/adapter-registry.js'
import type { ProbeResult } from '../../adapters/types.js'
import { EXIT_ERROR, EXIT_SUCCESS, loadConfig } from '../utils/task-context.js'

export const EXIT_CODE_NO_ADAPTERS = 2

export interface AdaptersProbeOptions {
  outputFormat: 'table' | 'json'
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  registry?: AdapterRegistry
}

export function formatProbeTable(results: ReadonlyMap<string, ProbeResult>): string {
  const header = ['TOOL', 'BINARY', 'RESUME', 'SESSION ID SOURCE', 'NOTES']
  const rows = Array.from(results, ([tool, r]) => [
    tool,
    r.binaryFound ? r.binaryPath : 'not found',
    r.resumeSupported ? 'yes' : 'no',
    r.idSource,
    r.notes,
  ])
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((row) => (row[i] ?? '').length)))
  const format = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd()
  return [format(header), ...rows.map(format)].join('\n') + '\n'
}

export async function runAdaptersProbe(opts: AdaptersProbeOptions): Promise<number> {
  let registry = opts.registry
  if (registry === undefined) {
    const loaded = await loadConfig(opts)
    if (!loaded.ok) return loaded.exitCode
    registry = createAdapterRegistry(loaded.config.tools)
  }

  if (registry.getAll().length === 0) {
    process.stderr.write('No tools are enabled\n')
    return EXIT_CODE_NO_ADAPTERS
  }

  const results = await registry.probeAll()
  if (opts.outputFormat === 'json') {
    process.stdout.write(JSON.stringify(Object.fromEntries(results), null, 2) + '\n')
  } else {
    process.stdout.write(formatProbeTable(results))
  }
  const anyFound = Array.from(results.values()).some((r) => r.binaryFound)
  return anyFound ? EXIT_SUCCESS : EXIT_ERROR
}

export function registerAdaptersCommand(program: Command): void {
  const adaptersCmd = program.command('adapters').description('Inspect the external tool adapters')

  adaptersCmd
    .command('probe')
    .description('Detect tool binaries and session resume support')
    .option('--output-format <format>', 'Output format: table (default) or json', 'table')
    .option('--project-root <path>', 'Project root directory', process.cwd())
    .action(async (opts: { outputFormat: string; projectRoot: string }) => {
      const exitCode = await runAdaptersProbe({
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'table',
        projectRoot: opts.projectRoot,
      })
      process.exit(exitCode)
    })
}
