/**
 * Stage executor decorator that routes `parallel_review` stages to the
 * review coordinator and every other role to the wrapped executor.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import type { StageSpec } from '../../core/types.js'
import { isoNow } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { StateStore } from '../state-store/state-store.js'
import type { StageExecutor, StageFailure, StageResult } from '../stage-executor/types.js'
import { REVIEW_PATHS } from './paths.js'
import type { ReviewCoordinator, ReviewResult } from './types.js'

const logger = createLogger('review:stage')

export const PARALLEL_REVIEW_ROLE = 'parallel_review'

export interface ReviewStageExecutorOptions {
  inner: StageExecutor
  store: StateStore
  /** Builds the coordinator for one review stage; the stage's tool runs the lenses */
  createCoordinator: (stage: StageSpec) => Promise<ReviewCoordinator>
  eventBus?: TypedEventBus
  now?: () => Date
}

export class ReviewStageExecutor implements StageExecutor {
  constructor(private readonly _options: ReviewStageExecutorOptions) {}

  async execute(stage: StageSpec): Promise<StageResult> {
    if (stage.role !== PARALLEL_REVIEW_ROLE) return this._options.inner.execute(stage)

    const { store, eventBus } = this._options
    const base = { stageId: stage.stageId, tool: stage.tool }

    if (await store.hasDoneMarker(stage.stageId)) {
      logger.info({ stage: stage.stageId }, 'Done-marker present; skipping review')
      eventBus?.emit('stage:skipped', { stageId: stage.stageId, reason: 'done_marker' })
      return { ...base, status: 'skipped', artifact: (await store.readText(REVIEW_PATHS.summary)) ?? '', attempts: 0 }
    }

    eventBus?.emit('stage:started', { stageId: stage.stageId, tool: stage.tool, attempt: 1 })
    const start = Date.now()
    const review = await (await this._options.createCoordinator(stage)).review()
    const artifact = (await store.readText(REVIEW_PATHS.summary)) ?? ''
    const attempts = review.barrier.outcomes.length

    if (review.status === 'completed') {
      await store.writeDoneMarker(stage.stageId)
      await store.updateStats((stats) => ({
        ...stats,
        stages_completed: stats.stages_completed.includes(stage.stageId)
          ? stats.stages_completed
          : [...stats.stages_completed, stage.stageId],
      }))
      const durationSec = Math.round((Date.now() - start) / 1000)
      eventBus?.emit('stage:completed', { stageId: stage.stageId, tool: stage.tool, durationSec })
      return { ...base, status: 'done', artifact, attempts }
    }

    const failure = reviewFailure(review)
    await store.writeLastFailure({
      stage: stage.stageId,
      tool: stage.tool,
      class: failure.errorClass,
      signature: failure.signature,
      exit_code: failure.exitCode,
      suggested_actions: failure.suggestedActions,
      retry_decision: 'stop',
      manual_reroute: failure.manualReroute,
      stderr_excerpt: failure.reason,
      timestamp: isoNow((this._options.now ?? (() => new Date()))()),
    })
    eventBus?.emit('stage:failed', {
      stageId: stage.stageId,
      tool: stage.tool,
      errorClass: failure.errorClass,
      signature: failure.signature,
      exitCode: failure.exitCode,
    })
    logger.error({ stage: stage.stageId, status: review.status, reason: failure.reason }, 'Review stage failed')
    return { ...base, status: 'failed', artifact, attempts, failure }
  }
}

function reviewFailure(review: ReviewResult): StageFailure {
  const reason = review.reason ?? `review ${review.status}`
  switch (review.code) {
    case 'security_critical':
      return {
        errorClass: 'security_critical',
        signature: 'security_critical',
        exitCode: 1,
        reason,
        suggestedActions: [
          `Inspect ${REVIEW_PATHS.securityGate}`,
          'Confirm or fix the critical findings before re-running the review',
        ],
        manualReroute: true,
      }
    case 'budget_exhausted':
      return {
        errorClass: 'budget_exhausted',
        signature: 'budget_exhausted',
        exitCode: 1,
        reason,
        suggestedActions: ['Raise budgets.paid_call_budget'],
        manualReroute: false,
      }
    case 'join_barrier':
    case undefined:
      return {
        errorClass: 'join_barrier',
        signature: 'join_barrier',
        exitCode: 1,
        reason,
        suggestedActions: ['Raise review.timeout_sec', `Inspect ${REVIEW_PATHS.summary}`],
        manualReroute: false,
      }
  }
}

export function createReviewStageExecutor(options: ReviewStageExecutorOptions): StageExecutor {
  return new ReviewStageExecutor(options)
}
