/**
 * Adapter-backed collaborators of the review coordinator: the lens runner,
 * the fix applier and the regression verifier.
 *
 * Lens and fix calls always run fresh; they never resume a phase session.
 */

import { EXIT_CODES, type ToolAdapter, type ToolResponse } from '../../adapters/types.js'
import type { ProcessRunner } from '../../adapters/process-runner.js'
import { runProcess } from '../../adapters/process-runner.js'
import { createLogger } from '../../utils/logger.js'
import { CONTEXT_PACK_PATH } from '../request-composer/request-composer.js'
import { SUMMARY_PATH } from '../pipeline-orchestrator/summary.js'
import type { StateStore } from '../state-store/state-store.js'
import { buildLensPrompt } from './lenses.js'
import { REVIEW_PATHS } from './paths.js'
import type { Finding, FixApplier, FixQueueItem, LensRun, LensRunner, RegressionVerifier } from './types.js'

const logger = createLogger('review:runner')

interface InvokeSettings {
  store: StateStore
  adapter: ToolAdapter
  cwd: string
  /** Per-call deadline; 0 waits for the tool */
  deadlineSec: number
  model?: string
}

async function invokeFresh(
  settings: InvokeSettings,
  stageId: string,
  prompt: string,
  signal?: AbortSignal
): Promise<ToolResponse> {
  return settings.adapter.invoke(
    {
      stageId,
      prompt,
      deadlineSec: settings.deadlineSec,
      deadlineMode: settings.deadlineSec > 0 ? 'enforce' : 'wait_done',
      cwd: settings.cwd,
      ...(settings.model !== undefined ? { model: settings.model } : {}),
    },
    signal
  )
}

/**
 * Count one paid call before it is sent. Concurrent lenses reserve under
 * the stats lock, so together they never pass the budget.
 */
async function reservePaidCall(store: StateStore, budget: number | undefined): Promise<boolean> {
  let reserved = false
  await store.updateStats((stats) => {
    if (budget !== undefined && stats.paid_calls_used >= budget) return stats
    reserved = true
    return { ...stats, paid_calls_used: stats.paid_calls_used + 1 }
  })
  return reserved
}

async function readInputs(store: StateStore): Promise<{ contextPack: string; report: string }> {
  return {
    contextPack: (await store.readText(CONTEXT_PACK_PATH)) ?? '',
    report: (await store.readText(SUMMARY_PATH)) ?? '',
  }
}

// ---------------------------------------------------------------------------
// Lens runner
// ---------------------------------------------------------------------------

export interface AdapterLensRunnerSettings extends InvokeSettings {
  /** No call is made once paid_calls_used reaches this */
  paidCallBudget?: number
}

export class AdapterLensRunner implements LensRunner {
  constructor(private readonly _settings: AdapterLensRunnerSettings) {}

  async run(lens: string, signal: AbortSignal): Promise<LensRun> {
    const { store, paidCallBudget } = this._settings
    if (!(await reservePaidCall(store, paidCallBudget))) {
      logger.warn({ lens, budget: paidCallBudget }, 'Budget exhausted; lens not run')
      await store.writeText(REVIEW_PATHS.lensLog(lens), 'paid call budget exhausted\n')
      return { exitCode: EXIT_CODES.general_failure, artifact: '' }
    }

    const { contextPack, report } = await readInputs(store)
    const prompt = buildLensPrompt(lens, contextPack, report)
    await store.writeText(REVIEW_PATHS.lensInput(lens), prompt)

    logger.info({ lens, tool: this._settings.adapter.id }, 'Lens started')
    const response = await invokeFresh(this._settings, `review_${lens}`, prompt, signal)
    await store.writeText(REVIEW_PATHS.lensLog(lens), response.diagnostics)
    return { exitCode: response.exitCode, artifact: response.artifact }
  }
}

// ---------------------------------------------------------------------------
// Fix applier
// ---------------------------------------------------------------------------

export interface AdapterFixApplierSettings extends InvokeSettings {
  /** No call is made once paid_calls_used reaches this */
  paidCallBudget: number
}

export class AdapterFixApplier implements FixApplier {
  constructor(private readonly _settings: AdapterFixApplierSettings) {}

  async applyFix(item: FixQueueItem, finding: Finding | undefined): Promise<boolean> {
    const lines = [
      '## Review Fix Request',
      `Queue item: ${item.queue_id} (finding ${item.finding_id})`,
      `Target: ${item.target_file || '(unspecified)'}${item.target_location ? ` ${item.target_location}` : ''}`,
      `Action: ${item.action}`,
    ]
    if (finding !== undefined) lines.push(`Issue: ${finding.issue}`, `Severity: ${finding.severity}`)
    return this._fix(`review_fix_${item.queue_id}`, REVIEW_PATHS.fix(item.queue_id), lines)
  }

  async applySecurityFixes(round: number, findings: Finding[]): Promise<boolean> {
    const dir = REVIEW_PATHS.securityRound(round)
    await this._settings.store.writeJson(`${dir}/findings.json`, { round, security_findings: findings })
    const lines = [
      '## Security Fix Request',
      `Round: ${String(round)}`,
      ...findings.map((f) => `- [${f.severity}] ${f.issue}`),
    ]
    return this._fix(`review_security_fix_${String(round)}`, `${dir}/fix.md`, lines)
  }

  private async _fix(stageId: string, artifactPath: string, request: string[]): Promise<boolean> {
    const { store, paidCallBudget } = this._settings
    if (!(await reservePaidCall(store, paidCallBudget))) {
      logger.warn({ stageId, budget: paidCallBudget }, 'Budget exhausted; fix not attempted')
      return false
    }
    const { contextPack } = await readInputs(store)
    const response = await invokeFresh(this._settings, stageId, `${contextPack.trimEnd()}\n\n${request.join('\n')}\n`)
    await store.writeText(artifactPath, response.artifact)
    if (response.status !== 'success') {
      logger.warn({ stageId, status: response.status, exitCode: response.exitCode }, 'Fix call failed')
      return false
    }
    return true
  }
}

// ---------------------------------------------------------------------------
// Regression verifier
// ---------------------------------------------------------------------------

export interface CommandVerifierOptions {
  command: string
  cwd: string
  timeoutSec?: number
  runner?: ProcessRunner
}

/** Runs a shell command; exit 0 means the regression check passed */
export class CommandVerifier implements RegressionVerifier {
  private readonly _runner: ProcessRunner

  constructor(private readonly _options: CommandVerifierOptions) {
    this._runner = _options.runner ?? runProcess
  }

  async verify(round: number): Promise<boolean> {
    const result = await this._runner({
      command: { binary: 'sh', args: ['-c', this._options.command], cwd: this._options.cwd },
      ...(this._options.timeoutSec !== undefined ? { timeoutMs: this._options.timeoutSec * 1000 } : {}),
    })
    const ok = result.exitCode === 0 && !result.timedOut
    logger.info({ round, exitCode: result.exitCode, ok }, 'Regression verification finished')
    return ok
  }
}
