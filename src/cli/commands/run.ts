/**
 * `baton run` command
 *
 * Resolves a configured pipeline into a stage plan and runs it against one
 * task directory, stopping at the first failed stage.
 *
 * Usage:
 *   baton run <pipeline> --task <name>                  Run every stage
 *   baton run <pipeline> --task <name> --stage <id>     Run a single stage
 *   baton run <pipeline> --task <name> --model codex=o4 Per-tool model override
 *
 * Exit codes:
 *   0 - Pipeline completed
 *   1 - A stage failed, or a system error occurred
 *   2 - Usage error (invalid config, unknown pipeline or stage)
 */

import type { Command } from 'commander'
import type { AdapterRegistry } from '../../adapters/adapter-registry.js'
import { BatonError, StagePlanError } from '../../core/errors.js'
import type { DeadlineMode, StagePlan } from '../../core/types.js'
import { resolveStagePlan, type PlanOverrides } from '../../modules/config/plan-resolver.js'
import type { PipelineResult } from '../../modules/pipeline-orchestrator/pipeline-orchestrator.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { createRuntime } from '../runtime.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE, loadConfig, resolveTaskDir } from '../utils/task-context.js'

const logger = createLogger('run-cmd')

export interface RunActionOptions {
  pipeline: string
  task: string
  stage?: string
  /** `tool=model` pairs */
  models?: string[]
  deadlineSec?: number
  deadlineMode?: DeadlineMode
  outputFormat: 'human' | 'json'
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  /** Injected adapters; defaults to the built-in tools from config */
  registry?: AdapterRegistry
}

/** Parse `tool=model` pairs; returns null on a malformed pair */
export function parseModelOverrides(pairs: readonly string[]): Record<string, string> | null {
  const models: Record<string, string> = {}
  for (const pair of pairs) {
    const eq = pair.indexOf('=')
    if (eq <= 0 || eq === pair.length - 1) return null
    models[pair.slice(0, eq)] = pair.slice(eq + 1)
  }
  return models
}

export function formatPipelineResult(result: PipelineResult): string {
  const lines = result.results.map((r) => {
    const attempts = r.attempts > 0 ? ` (${String(r.attempts)} attempt${r.attempts === 1 ? '' : 's'})` : ''
    return `  ${r.stageId}: ${r.status}${attempts}`
  })
  if (result.status === 'completed') {
    lines.push(`Pipeline ${result.pipelineId} completed`)
    return lines.join('\n') + '\n'
  }
  lines.push(`Pipeline ${result.pipelineId} failed at ${result.failedStage ?? '(unknown)'}`)
  const failure = result.results.find((r) => r.status === 'failed')?.failure
  if (failure !== undefined) {
    lines.push(`  class: ${failure.errorClass}`, `  reason: ${failure.reason}`)
    if (failure.manualReroute) lines.push('  manual reroute required')
    for (const action of failure.suggestedActions) lines.push(`  - ${action}`)
  }
  return lines.join('\n') + '\n'
}

export async function runRunAction(opts: RunActionOptions): Promise<number> {
  const loaded = await loadConfig(opts)
  if (!loaded.ok) return loaded.exitCode
  const { config } = loaded

  const toolModels = parseModelOverrides(opts.models ?? [])
  if (toolModels === null) {
    process.stderr.write('Error: --model expects tool=model\n')
    return EXIT_USAGE
  }

  const overrides: PlanOverrides = {
    toolModels,
    ...(opts.stage !== undefined ? { stageId: opts.stage } : {}),
    ...(opts.deadlineSec !== undefined ? { deadlineSec: opts.deadlineSec } : {}),
    ...(opts.deadlineMode !== undefined ? { deadlineMode: opts.deadlineMode } : {}),
  }

  let plan: StagePlan
  try {
    plan = resolveStagePlan(config, opts.pipeline, overrides)
  } catch (err) {
    if (err instanceof StagePlanError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return EXIT_USAGE
    }
    throw err
  }

  const taskDir = resolveTaskDir(config, opts.task, opts.projectRoot)
  const runtime = createRuntime({
    config,
    taskDir,
    cwd: opts.projectRoot,
    ...(opts.registry !== undefined ? { registry: opts.registry } : {}),
  })

  try {
    const result = await runtime.orchestrator.run(plan)
    if (opts.outputFormat === 'json') {
      process.stdout.write(JSON.stringify(result, null, 2) + '\n')
    } else {
      process.stdout.write(formatPipelineResult(result))
    }
    return result.status === 'completed' ? EXIT_SUCCESS : EXIT_ERROR
  } catch (err) {
    logger.error({ err, pipeline: opts.pipeline, taskDir }, 'Pipeline run aborted')
    const prefix = err instanceof BatonError ? `${err.code}: ` : ''
    process.stderr.write(`Error: ${prefix}${errorMessage(err)}\n`)
    return EXIT_ERROR
  }
}

function isDeadlineMode(value: string): value is DeadlineMode {
  return value === 'enforce' || value === 'wait_done'
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

export function registerRunCommand(program: Command): void {
  program
    .command('run <pipeline>')
    .description('Run a configured pipeline stage by stage against a task directory')
    .requiredOption('--task <name>', 'Task name under global.tasks_dir, or a task directory path')
    .option('--stage <id>', 'Run only this stage of the pipeline')
    .option('--model <tool=model>', 'Model override for a tool (repeatable)', collect, [])
    .option('--deadline <sec>', 'Deadline in seconds for stages without their own')
    .option('--deadline-mode <mode>', 'enforce or wait_done')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <path>', 'Project root directory', process.cwd())
    .action(
      async (
        pipeline: string,
        opts: {
          task: string
          stage?: string
          model: string[]
          deadline?: string
          deadlineMode?: string
          outputFormat: string
          projectRoot: string
        }
      ) => {
        const deadlineSec = opts.deadline !== undefined ? Number(opts.deadline) : undefined
        if (deadlineSec !== undefined && (!Number.isInteger(deadlineSec) || deadlineSec < 0)) {
          process.stderr.write('Error: --deadline must be a non-negative integer\n')
          process.exit(EXIT_USAGE)
        }
        const mode = opts.deadlineMode
        if (mode !== undefined && !isDeadlineMode(mode)) {
          process.stderr.write('Error: --deadline-mode must be enforce or wait_done\n')
          process.exit(EXIT_USAGE)
        }
        const exitCode = await runRunAction({
          pipeline,
          task: opts.task,
          models: opts.model,
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
          projectRoot: opts.projectRoot,
          ...(opts.stage !== undefined ? { stage: opts.stage } : {}),
          ...(deadlineSec !== undefined ? { deadlineSec } : {}),
          ...(mode !== undefined && isDeadlineMode(mode) ? { deadlineMode: mode } : {}),
        })
        process.exit(exitCode)
      }
    )
}
