/**
 * ParallelReviewCoordinator implementation.
 *
 * Launch → Join → Merge → BuildQueue → ExecuteQueue → SecurityEscalation
 *
 * Lenses run concurrently and write only their own findings artifact. Every
 * later step is sequential. When the join barrier reports failed lenses the
 * merge and queue are still produced from the lenses that finished, but no
 * fix is applied and the review ends failed.
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { isoNow } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { SecurityMode } from '../config/config-schema.js'
import { CONTEXT_PACK_PATH } from '../request-composer/request-composer.js'
import { SUMMARY_PATH } from '../pipeline-orchestrator/summary.js'
import type { StateStore } from '../state-store/state-store.js'
import { mergeFindings, parseLensFindings } from './finding-parser.js'
import { buildFixQueue, executeFixQueue } from './fix-queue.js'
import { runJoinBarrier } from './join-barrier.js'
import { SECURITY_LENS, securityTrigger } from './lenses.js'
import { REVIEW_PATHS } from './paths.js'
import { runSecurityEscalation, type SecurityEscalationResult } from './security-escalation.js'
import { renderReviewSummary } from './review-summary.js'
import type {
  BarrierResult,
  FixApplier,
  FixQueueItem,
  LensOutcome,
  LensRunner,
  MergeResult,
  RegressionVerifier,
  ReviewCoordinator,
  ReviewResult,
} from './types.js'

const logger = createLogger('review')

export interface ReviewCoordinatorOptions {
  store: StateStore
  runner: LensRunner
  lenses: readonly string[]
  /** One deadline for the whole barrier */
  timeoutSec: number
  securityMode: SecurityMode
  securityMaxRounds: number
  /** Omit when no fix capability is available */
  applier?: FixApplier
  verifier?: RegressionVerifier
  /** Review is refused when paid_calls_used has already reached this */
  paidCallBudget?: number
  eventBus?: TypedEventBus
  /** Watchdog grace after the barrier deadline */
  graceMs?: number
  now?: () => Date
}

export class ReviewCoordinatorImpl implements ReviewCoordinator {
  private readonly _options: ReviewCoordinatorOptions
  private readonly _store: StateStore
  private readonly _now: () => Date

  constructor(options: ReviewCoordinatorOptions) {
    this._options = options
    this._store = options.store
    this._now = options.now ?? (() => new Date())
  }

  async review(): Promise<ReviewResult> {
    const lenses = await this.resolveLenses()

    const budget = this._options.paidCallBudget
    if (budget !== undefined) {
      const { paid_calls_used: used } = await this._store.readStats()
      if (used >= budget) {
        logger.error({ used, budget }, 'Paid call budget exhausted; review not started')
        return {
          status: 'failed',
          barrier: { outcomes: [], timedOut: false, failed: [], elapsedMs: 0 },
          merge: mergeFindings([]),
          queue: [],
          code: 'budget_exhausted',
          reason: `Paid call budget exhausted: ${String(used)} of ${String(budget)} calls used`,
        }
      }
    }

    logger.info({ lenses, timeoutSec: this._options.timeoutSec }, 'Launching review lenses')

    // Launch + Join
    const barrier = await this._join(lenses)
    const completed = barrier.outcomes.filter((o) => o.status !== 'failed')
    for (const outcome of completed) {
      await this._store.writeText(REVIEW_PATHS.findings(outcome.lens), lensArtifact(outcome))
    }

    // Merge
    const merge = mergeFindings(completed.map((o) => ({ lens: o.lens, text: lensArtifact(o) })))
    await this._writeMerge(merge)

    // BuildQueue
    let queue = buildFixQueue(merge.findings)
    await this._writeQueue(queue)

    if (barrier.failed.length > 0) {
      const reason = `join barrier failed for lenses: ${barrier.failed.join(', ')}`
      await this._writeSummary(barrier, merge, queue, undefined)
      return { status: 'failed', barrier, merge, queue, code: 'join_barrier', reason }
    }

    // ExecuteQueue
    queue = await executeFixQueue(queue, {
      applier: this._options.applier,
      findings: merge.findings,
      onUpdate: async (current, item, status) => {
        await this._writeQueue(current)
        this._options.eventBus?.emit('review:fix-applied', { queueId: item.queue_id, status })
      },
    })

    // SecurityEscalation
    let security: SecurityEscalationResult | undefined
    const securityOutcome = completed.find((o) => o.lens === SECURITY_LENS)
    if (securityOutcome !== undefined) {
      // Dedup can credit a shared finding to another lens; gate on the security lens's own output
      const securityFindings = parseLensFindings(SECURITY_LENS, lensArtifact(securityOutcome))
      security = await runSecurityEscalation(securityFindings, {
        mode: this._options.securityMode,
        maxRounds: this._options.securityMaxRounds,
        ...(this._options.applier !== undefined ? { applier: this._options.applier } : {}),
        ...(this._options.verifier !== undefined ? { verifier: this._options.verifier } : {}),
        rerunSecurityLens: (round) => this._rerunSecurity(round),
        onRound: (round, severity) => this._options.eventBus?.emit('review:security-round', { round, severity }),
        now: this._now,
      })
      await this._store.writeJson(REVIEW_PATHS.securityGate, security.result)
    }

    await this._writeSummary(barrier, merge, queue, security)

    if (security?.outcome === 'critical_stop') {
      return {
        status: 'stopped',
        barrier,
        merge,
        queue,
        security,
        code: 'security_critical',
        reason: 'critical security finding requires human confirmation (STOP_AND_CONFIRM)',
      }
    }
    return { status: 'completed', barrier, merge, queue, ...(security !== undefined ? { security } : {}) }
  }

  /**
   * Apply the security mode to the configured lenses.
   * `auto` keeps the security lens only when the context pack or the
   * implementation report mentions a security keyword.
   */
  async resolveLenses(): Promise<string[]> {
    const configured = [...new Set(this._options.lenses)]
    const withoutSecurity = configured.filter((l) => l !== SECURITY_LENS)

    switch (this._options.securityMode) {
      case 'off':
        return withoutSecurity
      case 'on':
        return configured.includes(SECURITY_LENS) ? configured : [...configured, SECURITY_LENS]
      case 'auto': {
        if (!configured.includes(SECURITY_LENS)) return configured
        const texts = [
          (await this._store.readText(CONTEXT_PACK_PATH)) ?? '',
          (await this._store.readText(SUMMARY_PATH)) ?? '',
        ]
        const keyword = securityTrigger(texts)
        if (keyword === undefined) {
          logger.info('Security auto mode: no trigger keyword; security lens skipped')
          return withoutSecurity
        }
        logger.info({ keyword }, 'Security auto mode triggered')
        return configured
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _join(lenses: readonly string[]): Promise<BarrierResult> {
    const bus = this._options.eventBus
    const barrier = await runJoinBarrier(lenses, this._options.runner, {
      timeoutMs: this._options.timeoutSec * 1000,
      ...(this._options.graceMs !== undefined ? { graceMs: this._options.graceMs } : {}),
      onStart: (lens) => bus?.emit('review:lens-started', { lens }),
      onSettled: (outcome) => bus?.emit('review:lens-completed', { lens: outcome.lens, status: outcome.status }),
    })
    if (barrier.timedOut) {
      bus?.emit('review:barrier-timeout', { pending: barrier.failed, timeoutSec: this._options.timeoutSec })
    }
    return barrier
  }

  private async _rerunSecurity(round: number): Promise<string | null> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), this._options.timeoutSec * 1000)
    try {
      const run = await this._options.runner.run(SECURITY_LENS, controller.signal)
      await this._store.writeText(`${REVIEW_PATHS.securityRound(round)}/security.md`, run.artifact)
      if (run.exitCode !== 0 || controller.signal.aborted) {
        logger.warn({ round, exitCode: run.exitCode }, 'Security lens rerun degraded')
        return null
      }
      return run.artifact
    } finally {
      clearTimeout(timer)
    }
  }

  private async _writeMerge(merge: MergeResult): Promise<void> {
    const generatedAt = isoNow(this._now())
    await this._store.writeJson(REVIEW_PATHS.merged, {
      task_name: taskName(this._store.taskDir),
      lens_count: merge.log.lenses.length,
      finding_count: merge.findings.length,
      findings: merge.findings,
      generated_at: generatedAt,
    })
    await this._store.writeJson(REVIEW_PATHS.mergeLog, { ...merge.log, generated_at: generatedAt })
    this._options.eventBus?.emit('review:merged', {
      finalCount: merge.log.final_count,
      dedupRemoved: merge.log.dedup_removed,
      conflictResolved: merge.log.conflict_resolved,
    })
  }

  private async _writeQueue(queue: readonly FixQueueItem[]): Promise<void> {
    await this._store.writeJson(REVIEW_PATHS.queue, {
      task_name: taskName(this._store.taskDir),
      queue,
      generated_at: isoNow(this._now()),
    })
  }

  private async _writeSummary(
    barrier: BarrierResult,
    merge: MergeResult,
    queue: readonly FixQueueItem[],
    security: SecurityEscalationResult | undefined
  ): Promise<void> {
    await this._store.writeText(
      REVIEW_PATHS.summary,
      renderReviewSummary({ barrier, merge, queue, security, generatedAt: isoNow(this._now()) })
    )
  }
}

function lensArtifact(outcome: LensOutcome): string {
  if (outcome.text.trim() !== '') return outcome.text
  return `# Lens: ${outcome.lens}\n\nNo summary artifact found for this lens.\n`
}

function taskName(taskDir: string): string {
  return taskDir.replace(/[\\/]+$/, '').split(/[\\/]/).pop() ?? ''
}

export function createReviewCoordinator(options: ReviewCoordinatorOptions): ReviewCoordinator {
  return new ReviewCoordinatorImpl(options)
}
