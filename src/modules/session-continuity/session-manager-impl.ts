/**
 * SessionContinuityManager implementation.
 *
 * Pre-stage:
 *   probe once per (phase, tool) → forced mode? → lease → resume supported?
 *   → baseline exists? resume it : run fresh (baseline establishment)
 *
 * Post-stage:
 *   extract the id actually used →
 *     none:     hard failure if a resume was required, else a warning
 *     resumed:  must equal the baseline, else recovery record + SessionMismatchError
 *     fresh:    becomes the baseline when none exists
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { SessionMismatchError } from '../../core/errors.js'
import type { ToolResponse } from '../../adapters/types.js'
import { isoNow } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { CapabilityProbe, SessionRecord } from '../state-store/schemas.js'
import type { StateStore } from '../state-store/state-store.js'
import { extractSessionId, isStreamSource, snapshotStateDir } from './extractor.js'
import { renderRecoveryDocument } from './recovery.js'
import { SessionLeases, defaultSessionLeases } from './session-lease.js'
import type {
  PostStageOutcome,
  PreStageDecision,
  SessionContext,
  SessionContinuityManager,
} from './types.js'

const logger = createLogger('session-continuity')

export interface SessionManagerOptions {
  store: StateStore
  eventBus?: TypedEventBus
  leases?: SessionLeases
  now?: () => Date
}

export class SessionContinuityManagerImpl implements SessionContinuityManager {
  private readonly _store: StateStore
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _leases: SessionLeases
  private readonly _now: () => Date

  constructor(options: SessionManagerOptions) {
    this._store = options.store
    this._eventBus = options.eventBus
    this._leases = options.leases ?? defaultSessionLeases
    this._now = options.now ?? (() => new Date())
  }

  // ---------------------------------------------------------------------------
  // Pre-stage
  // ---------------------------------------------------------------------------

  async preStage(ctx: SessionContext): Promise<PreStageDecision> {
    const probe = await this._ensureProbe(ctx)
    const stateDir = ctx.adapter.sessionStateDir()
    const snapshot =
      probe.id_source === 'state_dir' && stateDir !== undefined ? await snapshotStateDir(stateDir) : undefined
    const withSnapshot = snapshot !== undefined ? { snapshot } : {}

    if (ctx.mode !== 'forced_within_phase') {
      return { action: 'fresh', reason: 'session continuity disabled', probe, baseline: null, ...withSnapshot }
    }

    const leaseToken = this._leases.acquire(ctx.phase, ctx.tool, ctx.stageId)
    try {
      const baseline = await this._store.readSessionRecord(ctx.phase, ctx.tool)

      if (!probe.resume_supported) {
        logger.warn({ tool: ctx.tool, phase: ctx.phase }, 'Resume not supported; starting fresh')
        await this._event(ctx, 'resume_unsupported', 'fresh', probe.notes)
        return { action: 'fresh', reason: 'resume not supported', probe, baseline, leaseToken, ...withSnapshot }
      }

      if (baseline === null) {
        logger.info({ tool: ctx.tool, phase: ctx.phase }, 'No baseline session yet; fresh start')
        return {
          action: 'fresh',
          reason: 'establishing baseline',
          probe,
          baseline: null,
          leaseToken,
          ...withSnapshot,
        }
      }

      await this._event(ctx, 'stage_resume', 'starting', `session_id=${baseline.session_id}`)
      return {
        action: 'resume',
        resumeSessionId: baseline.session_id,
        reason: 'resuming phase baseline',
        probe,
        baseline,
        leaseToken,
        ...withSnapshot,
      }
    } catch (err) {
      this._leases.release(ctx.phase, ctx.tool, leaseToken)
      throw err
    }
  }

  // ---------------------------------------------------------------------------
  // Post-stage
  // ---------------------------------------------------------------------------

  async postStage(
    ctx: SessionContext,
    decision: PreStageDecision,
    response: ToolResponse
  ): Promise<PostStageOutcome> {
    if (ctx.mode !== 'forced_within_phase') {
      return { status: 'untracked', reason: 'session continuity disabled' }
    }

    const extraction = await extractSessionId(decision.probe.id_source, ctx.adapter, response, decision.snapshot)
    const baseline = decision.baseline

    if (extraction.sessionId === undefined) {
      const reason = extraction.reason ?? 'session id not extracted'
      if (decision.action === 'resume' && baseline !== null) {
        await this._failFast(ctx, 'session_id not extracted after forced resume', baseline.session_id, null)
      }
      logger.warn({ tool: ctx.tool, phase: ctx.phase, stage: ctx.stageId, reason }, 'No session id extracted')
      await this._event(ctx, 'session_id_missing', 'warn', reason)
      return { status: 'untracked', reason }
    }

    const sessionId = extraction.sessionId
    const now = isoNow(this._now())

    if (decision.action === 'resume' && baseline !== null) {
      if (sessionId !== baseline.session_id) {
        await this._failFast(ctx, 'session_id mismatch: context continuity broken', baseline.session_id, sessionId)
      }
      const record: SessionRecord = { ...baseline, status: 'active', updated_at: now, last_used_at: now }
      await this._store.writeSessionRecord(record)
      await this._store.appendSessionValidation(ctx.phase, ctx.tool, {
        timestamp: now,
        stage: ctx.stageId,
        check: 'session_match',
        ok: true,
        details: `session_id=${sessionId}`,
      })
      await this._event(ctx, 'session_validated', 'ok', `session_id=${sessionId}`)
      this._eventBus?.emit('session:validated', { phase: ctx.phase, tool: ctx.tool, sessionId })
      return { status: 'validated', record }
    }

    if (baseline !== null) {
      // Ran fresh although a baseline exists (resume unsupported); the baseline stays authoritative
      await this._event(ctx, 'session_unlinked', 'warn', `baseline=${baseline.session_id},got=${sessionId}`)
      return { status: 'untracked', reason: 'fresh call while a baseline exists' }
    }

    const confidence = isStreamSource(decision.probe.id_source) ? 'high' : 'medium'
    const record: SessionRecord = {
      phase: ctx.phase,
      tool: ctx.tool,
      session_id: sessionId,
      source: decision.probe.id_source,
      confidence,
      status: 'baseline',
      created_at: now,
      updated_at: now,
      last_used_at: now,
    }
    await this._store.writeSessionRecord(record)
    await this._event(ctx, 'session_baseline', 'ok', `session_id=${sessionId},confidence=${confidence}`)
    this._eventBus?.emit('session:baseline', { phase: ctx.phase, tool: ctx.tool, sessionId, confidence })
    logger.info({ tool: ctx.tool, phase: ctx.phase, sessionId }, 'Session baseline established')
    return { status: 'baseline', record }
  }

  release(ctx: SessionContext, decision: PreStageDecision): void {
    if (decision.leaseToken !== undefined) {
      this._leases.release(ctx.phase, ctx.tool, decision.leaseToken)
    }
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private async _ensureProbe(ctx: SessionContext): Promise<CapabilityProbe> {
    const cached = await this._store.readProbe(ctx.phase, ctx.tool)
    if (cached !== null) return cached

    logger.info({ tool: ctx.tool, phase: ctx.phase }, 'Running session capability probe')
    const result = await ctx.adapter.probe()
    const probe: CapabilityProbe = {
      tool: ctx.tool,
      phase: ctx.phase,
      resume_supported: result.resumeSupported,
      id_source: result.idSource,
      probe_ran_at: isoNow(this._now()),
      binary_found: result.binaryFound,
      binary_path: result.binaryPath,
      notes: result.notes,
    }
    await this._store.writeProbe(probe)
    return probe
  }

  private async _failFast(
    ctx: SessionContext,
    reason: string,
    expected: string,
    actual: string | null
  ): Promise<never> {
    const now = isoNow(this._now())
    const recovery = {
      phase: ctx.phase,
      tool: ctx.tool,
      stage: ctx.stageId,
      reason,
      expected,
      actual,
      resume_target: actual === null ? null : expected,
      generated_at: now,
    }
    await this._store.writeSessionRecovery(recovery, renderRecoveryDocument(recovery))
    await this._store.appendSessionValidation(ctx.phase, ctx.tool, {
      timestamp: now,
      stage: ctx.stageId,
      check: 'session_match',
      ok: false,
      details: `expected=${expected},got=${actual ?? 'none'}`,
    })
    await this._event(ctx, actual === null ? 'stage_failed' : 'session_mismatch', 'fail_fast',
      `expected=${expected},got=${actual ?? 'none'}`)
    this._eventBus?.emit('session:mismatch', { phase: ctx.phase, tool: ctx.tool, expected, actual })
    logger.error({ tool: ctx.tool, phase: ctx.phase, expected, actual }, 'Session continuity broken; fail-fast')

    throw new SessionMismatchError(reason, expected, actual, {
      phase: ctx.phase,
      tool: ctx.tool,
      stage: ctx.stageId,
      recoveryPath: this._store.resolve('state/session_recovery.md'),
    })
  }

  private async _event(ctx: SessionContext, event: string, status: string, details: string): Promise<void> {
    await this._store.appendSessionEvent({
      timestamp: isoNow(this._now()),
      event,
      phase: ctx.phase,
      tool: ctx.tool,
      stage: ctx.stageId,
      status,
      details,
    })
  }
}

/**
 * Create a SessionContinuityManager bound to one task's state store.
 */
export function createSessionManager(options: SessionManagerOptions): SessionContinuityManager {
  return new SessionContinuityManagerImpl(options)
}
