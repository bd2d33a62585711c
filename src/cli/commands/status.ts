/**
 * `baton status` command
 *
 * Prints the running task summary, or a JSON snapshot of the task's stats
 * and last failure.
 *
 * Exit codes:
 *   0 - Success
 *   1 - System error (unreadable or corrupt state)
 *   2 - Usage error (task directory not found)
 */

import { existsSync } from 'node:fs'
import type { Command } from 'commander'
import { SUMMARY_PATH } from '../../modules/pipeline-orchestrator/summary.js'
import type { LastFailure } from '../../modules/state-store/schemas.js'
import { createStateStore } from '../../modules/state-store/file-state-store.js'
import { errorMessage } from '../../utils/helpers.js'
import { EXIT_ERROR, EXIT_SUCCESS, EXIT_USAGE, loadConfig, resolveTaskDir } from '../utils/task-context.js'

export interface StatusActionOptions {
  task: string
  outputFormat: 'human' | 'json'
  projectRoot: string
  projectConfigDir?: string
  globalConfigDir?: string
  env?: NodeJS.ProcessEnv
}

export interface StatusSnapshot {
  task_dir: string
  paid_calls_used: number
  paid_call_budget: number
  stages_completed: string[]
  last_failure: LastFailure | null
}

export async function runStatusAction(opts: StatusActionOptions): Promise<number> {
  const loaded = await loadConfig(opts)
  if (!loaded.ok) return loaded.exitCode
  const { config } = loaded

  const taskDir = resolveTaskDir(config, opts.task, opts.projectRoot)
  if (!existsSync(taskDir)) {
    process.stderr.write(`Error: task directory not found: ${taskDir}\n`)
    return EXIT_USAGE
  }

  const store = createStateStore(taskDir)
  try {
    if (opts.outputFormat === 'json') {
      const stats = await store.readStats()
      const snapshot: StatusSnapshot = {
        task_dir: taskDir,
        paid_calls_used: stats.paid_calls_used,
        paid_call_budget: config.budgets.paid_call_budget,
        stages_completed: stats.stages_completed,
        last_failure: await store.readLastFailure(),
      }
      process.stdout.write(JSON.stringify(snapshot, null, 2) + '\n')
      return EXIT_SUCCESS
    }

    const summary = await store.readText(SUMMARY_PATH)
    process.stdout.write(summary ?? `No summary yet for ${taskDir}\n`)
    return EXIT_SUCCESS
  } catch (err) {
    process.stderr.write(`Error: ${errorMessage(err)}\n`)
    return EXIT_ERROR
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the task summary, budgets and last failure')
    .requiredOption('--task <name>', 'Task name under global.tasks_dir, or a task directory path')
    .option('--output-format <format>', 'Output format: human (default) or json', 'human')
    .option('--project-root <path>', 'Project root directory', process.cwd())
    .action(async (opts: { task: string; outputFormat: string; projectRoot: string }) => {
      const exitCode = await runStatusAction({
        task: opts.task,
        outputFormat: opts.outputFormat === 'json' ? 'json' : 'human',
        projectRoot: opts.projectRoot,
      })
      process.exit(exitCode)
    })
}
