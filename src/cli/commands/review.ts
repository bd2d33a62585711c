/**
 * `baton review` command
 *
 * Runs the parallel review coordinator once against a task directory,
 * outside any pipeline. Unlike a `parallel_review` stage it ignores the
 * done-marker, so it can be repeated after fixes.
 *
 * Exit codes:
 *   0 - Review completed (security gate clean or warning)
 *   1 - Review failed (join barrier, budget) or a system error occurred
 *   2 - Usage error
 *   3 - Critical security finding; human confirmation required
 */

import type { Command } from 'commander'
import type { AdapterRegistry } from '../../adapters/adapter-registry.js'
import { ToolNotFoundError } from '../../core/errors.js'
import { SecurityModeSchema, type SecurityMode } from '../../modules/config/config-schema.js'
import type { ReviewResult } from '../../modules/review-coordinator/types.js'
import { errorMessage } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { createRuntime } from '../runtime.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE, loadConfig, resolveTaskDir } from '../utils/task-context.js'

const logger = createLogger('review-cmd')

export const REVIEW_EXIT_STOPPED = 3

export interface ReviewActionOptions {
  task: string
  tool?: string
  lenses?: string[]
  securityMode?: SecurityMode
  outputFormat: 'human' | 'json'
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
  registry?: AdapterRegistry
  /** Watchdog grace after the barrier deadline */
  graceMs?: number
}

export function formatReviewResult(result: ReviewResult): string {
  const lines: string[] = []
  for (const outcome of result.barrier.outcomes) {
    lines.push(`  lens ${outcome.lens}: ${outcome.status}`)
  }
  lines.push(
    `  findings: ${String(result.merge.log.final_count)} (dedup removed ${String(result.merge.log.dedup_removed)}, conflicts resolved ${String(result.merge.log.conflict_resolved)})`
  )
  const applied = result.queue.filter((q) => q.status === 'applied').length
  lines.push(`  fixes applied: ${String(applied)} of ${String(result.queue.length)}`)
  if (result.security !== undefined) {
    lines.push(`  security: ${result.security.outcome} (final severity ${result.security.result.final_severity})`)
  }
  lines.push(`Review ${result.status}${result.reason !== undefined ? `: ${result.reason}` : ''}`)
  return lines.join('\n') + '\n'
}

export async function runReviewAction(opts: ReviewActionOptions): Promise<number> {
  const loaded = await loadConfig(opts)
  if (!loaded.ok) return loaded.exitCode
  const { config } = loaded

  const runtime = createRuntime({
    config,
    taskDir: resolveTaskDir(config, opts.task, opts.projectRoot),
    cwd: opts.projectRoot,
    ...(opts.registry !== undefined ? { registry: opts.registry } : {}),
    ...(opts.graceMs !== undefined ? { reviewGraceMs: opts.graceMs } : {}),
  })

  let result: ReviewResult
  try {
    const coordinator = await runtime.createReviewCoordinator({
      ...(opts.tool !== undefined ? { tool: opts.tool } : {}),
      ...(opts.lenses !== undefined ? { lenses: opts.lenses } : {}),
      ...(opts.securityMode !== undefined ? { securityMode: opts.securityMode } : {}),
    })
    result = await coordinator.review()
  } catch (err) {
    if (err instanceof ToolNotFoundError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return EXIT_USAGE
    }
    logger.error({ err }, 'Review aborted')
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return EXIT_ERROR
  }

  if (opts.outputFormat === 'json') {
    process.stdout.write(JSON.stringify(result, null, 2) + '\n')
  } else {
    process.stdout.write(formatReviewResult(result))
  }

  switch (result.status) {
    case 'completed':
      return EXIT_SUCCESS
    case 'stopped':
      return REVIEW_EXIT_STOPPED
    case 'failed':
      return EXIT_ERROR
  }
}

export function registerReviewCommand(program: Command): void {
  program
    .command('review')
    .description('Run the parallel review lenses, merge findings and apply the fix queue')
    .requiredOption('--task <name>', 'Task name under global.tasks_dir, or a task directory path')
    .option('--tool <tool>', 'Tool running the lenses (defaults to review.tool)')
    .option('--lenses <list>', 'Comma-separated lens names')
    .option('--security-mode <mode>', 'off, auto or on')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <path>', 'Project root directory', process.cwd())
    .action(
      async (opts: {
        task: string
        tool?: string
        lenses?: string
        securityMode?: string
        outputFormat: string
        projectRoot: string
      }) => {
        const mode = opts.securityMode !== undefined ? SecurityModeSchema.safeParse(opts.securityMode) : undefined
        if (mode !== undefined && !mode.success) {
          process.stderr.write('Error: --security-mode must be off, auto or on\n')
          process.exit(EXIT_USAGE)
        }
        const lenses = opts.lenses
          ?.split(',')
          .map((l) => l.trim())
          .filter((l) => l !== '')
        const exitCode = await runReviewAction({
          task: opts.task,
          outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
          projectRoot: opts.projectRoot,
          ...(opts.tool !== undefined ? { tool: opts.tool } : {}),
          ...(lenses !== undefined && lenses.length > 0 ? { lenses } : {}),
          ...(mode?.success === true ? { securityMode: mode.data } : {}),
        })
        process.exit(exitCode)
      }
    )
}
