/**
 * PipelineOrchestrator - runs a resolved StagePlan stage by stage.
 *
 * Forward-only: the run stops at the first failed stage and never reverts
 * artifacts of stages that already completed. The summary is regenerated
 * after every stage, whatever its outcome.
 */

import { basename } from 'node:path'
import type { TypedEventBus } from '../../core/event-bus.js'
import type { StagePlan, StageSpec } from '../../core/types.js'
import { errorMessage, isoNow } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { StageExecutor, StageResult } from '../stage-executor/types.js'
import type { StateStore } from '../state-store/state-store.js'
import { writeSummary } from './summary.js'

const logger = createLogger('pipeline')

export interface PipelineResult {
  pipelineId: string
  status: 'completed' | 'failed'
  results: StageResult[]
  /** Stage that stopped the run */
  failedStage?: string
}

export interface PipelineOrchestrator {
  run(plan: StagePlan): Promise<PipelineResult>
}

export interface PipelineOrchestratorOptions {
  store: StateStore
  executor: StageExecutor
  paidCallBudget: number
  eventBus?: TypedEventBus
  /** Defaults to the task directory name */
  taskId?: string
  now?: () => Date
}

export class PipelineOrchestratorImpl implements PipelineOrchestrator {
  private readonly _store: StateStore
  private readonly _executor: StageExecutor
  private readonly _budget: number
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _taskId: string
  private readonly _now: () => Date

  constructor(options: PipelineOrchestratorOptions) {
    this._store = options.store
    this._executor = options.executor
    this._budget = options.paidCallBudget
    this._eventBus = options.eventBus
    this._taskId = options.taskId ?? basename(options.store.taskDir)
    this._now = options.now ?? (() => new Date())
  }

  async run(plan: StagePlan): Promise<PipelineResult> {
    const { pipelineId } = plan
    const taskId = this._taskId
    logger.info({ pipelineId, taskId, stages: plan.stages.map((s) => s.stageId) }, 'Pipeline started')
    this._eventBus?.emit('pipeline:started', { pipelineId, taskId, stageCount: plan.stages.length })

    const attempted: StageSpec[] = []
    const results: StageResult[] = []

    for (const stage of plan.stages) {
      attempted.push(stage)
      let result: StageResult
      try {
        result = await this._executor.execute(stage)
      } catch (err) {
        await this._recordThrown(stage, err)
        throw err
      } finally {
        await writeSummary(this._store, taskId, attempted, this._budget, this._now())
      }
      results.push(result)

      if (result.status === 'failed') {
        const errorClass = result.failure?.errorClass ?? 'unknown'
        logger.error({ pipelineId, stage: stage.stageId, errorClass }, 'Pipeline stopped')
        this._eventBus?.emit('pipeline:failed', { pipelineId, taskId, stageId: stage.stageId, errorClass })
        return { pipelineId, status: 'failed', results, failedStage: stage.stageId }
      }
    }

    logger.info({ pipelineId, taskId, stages: results.length }, 'Pipeline complete')
    this._eventBus?.emit('pipeline:completed', { pipelineId, taskId, stagesRun: results.length })
    return { pipelineId, status: 'completed', results }
  }

  /** A stage that throws leaves the same failure record as one that fails */
  private async _recordThrown(stage: StageSpec, err: unknown): Promise<void> {
    const message = errorMessage(err)
    logger.error({ stage: stage.stageId, error: message }, 'Stage threw')
    await this._store.writeLastFailure({
      stage: stage.stageId,
      tool: stage.tool,
      class: 'unknown',
      signature: 'unknown',
      exit_code: 1,
      suggested_actions: [`Inspect the ${stage.stageId} stage log`, 'Resume the task once the cause is fixed'],
      retry_decision: 'stop',
      manual_reroute: false,
      stderr_excerpt: message,
      timestamp: isoNow(this._now()),
    })
  }
}

export function createPipelineOrchestrator(options: PipelineOrchestratorOptions): PipelineOrchestrator {
  return new PipelineOrchestratorImpl(options)
}
