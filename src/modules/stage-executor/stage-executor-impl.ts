/**
 * StageExecutor implementation.
 *
 * One call to execute() runs a stage to a terminal outcome:
 *
 *   done-marker? → skipped
 *   loop:
 *     budget precheck → compose → session preStage → invoke (heartbeats)
 *     → meta + outputs → paid_calls_used += 1 → session postStage → gate
 *     pass: done-marker, stats, brief propagation → done
 *     fail: classify → signature count → last failure → retry policy
 */

import type { TypedEventBus } from '../../core/event-bus.js'
import { SessionMismatchError } from '../../core/errors.js'
import type { DigestPolicy, StageSpec } from '../../core/types.js'
import type { AdapterRegistry } from '../../adapters/adapter-registry.js'
import type { ToolResponse } from '../../adapters/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { isoNow, sleep } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { classifyError } from '../error-classifier/classifier.js'
import { decideRetry } from '../error-classifier/retry-policy.js'
import { diagnosticHead } from '../error-classifier/signature.js'
import type { Classification, RetryDecision } from '../error-classifier/types.js'
import type { GateResult, GateValidator } from '../gate-validator/types.js'
import { CONTEXT_PACK_PATH, type RequestComposer } from '../request-composer/request-composer.js'
import type { SessionContext, SessionContinuityManager } from '../session-continuity/types.js'
import type { StateStore } from '../state-store/state-store.js'
import { extractUpdatedContextPack, extractVerifyCommands } from './brief-sync.js'
import type { StageExecutor, StageExecutorSettings, StageFailure, StageResult } from './types.js'

const logger = createLogger('stage-executor')

export const VERIFY_COMMANDS_PATH = 'state/verify_commands.json'

/** Role whose output refreshes the shared context pack */
const BRIEF_ROLE = 'brief'

export interface StageExecutorOptions {
  store: StateStore
  adapters: AdapterRegistry
  composer: RequestComposer
  gate: GateValidator
  sessions: SessionContinuityManager
  settings: StageExecutorSettings
  eventBus?: TypedEventBus
  now?: () => Date
}

interface AttemptOutcome {
  response: ToolResponse
  gate?: GateResult
  mismatch?: SessionMismatchError
}

export class StageExecutorImpl implements StageExecutor {
  private readonly _store: StateStore
  private readonly _adapters: AdapterRegistry
  private readonly _composer: RequestComposer
  private readonly _gate: GateValidator
  private readonly _sessions: SessionContinuityManager
  private readonly _settings: StageExecutorSettings
  private readonly _eventBus: TypedEventBus | undefined
  private readonly _now: () => Date

  constructor(options: StageExecutorOptions) {
    this._store = options.store
    this._adapters = options.adapters
    this._composer = options.composer
    this._gate = options.gate
    this._sessions = options.sessions
    this._settings = options.settings
    this._eventBus = options.eventBus
    this._now = options.now ?? (() => new Date())
  }

  async execute(stage: StageSpec): Promise<StageResult> {
    const base = { stageId: stage.stageId, tool: stage.tool }

    if (await this._store.hasDoneMarker(stage.stageId)) {
      logger.info({ stage: stage.stageId }, 'Done-marker present; skipping')
      this._eventBus?.emit('stage:skipped', { stageId: stage.stageId, reason: 'done_marker' })
      const previous = await this._store.readStageOutput(stage.stageId, stage.tool)
      return { ...base, status: 'skipped', artifact: previous?.artifact ?? '', attempts: 0 }
    }

    const adapter = this._adapters.require(stage.tool)
    const { paidCallBudget } = this._settings.budgets
    let digestPolicy: DigestPolicy = stage.digestPolicy
    let attempts = 0

    for (;;) {
      const stats = await this._store.readStats()
      if (stats.paid_calls_used >= paidCallBudget) {
        const failure = await this._budgetExhausted(stage, stats.paid_calls_used)
        return { ...base, status: 'failed', artifact: '', attempts, failure }
      }

      attempts += 1
      const attempt = await this._runAttempt(stage, adapter.id, digestPolicy, attempts)
      const { response } = attempt

      if (attempt.mismatch !== undefined) {
        const failure = await this._sessionMismatch(stage, response, attempt.mismatch)
        return { ...base, status: 'failed', artifact: response.artifact, attempts, failure }
      }

      if (response.status === 'success' && attempt.gate?.pass === true) {
        await this._onSuccess(stage, response.artifact)
        return { ...base, status: 'done', artifact: response.artifact, attempts }
      }

      const classification = classifyError({
        exitCode: response.exitCode,
        status: response.status,
        stderr: response.diagnostics,
        ...(attempt.gate?.violation !== undefined ? { gateViolation: attempt.gate.violation } : {}),
      })
      const count = await this._bumpSignature(classification)
      const decision = decideRetry({
        errorClass: classification.errorClass,
        signatureCount: count,
        retryBudget: this._settings.budgets.retryBudget,
        digestPolicy,
      })
      const reasons = attempt.gate?.reasons ?? []
      await this._recordFailure(stage, response, classification, decision, reasons)

      if (decision.action === 'retry') {
        if (decision.escalateCompaction) digestPolicy = 'aggressive'
        this._eventBus?.emit('stage:retrying', {
          stageId: stage.stageId,
          errorClass: classification.errorClass,
          signature: classification.signature,
          attempt: attempts + 1,
          escalateCompaction: decision.escalateCompaction,
        })
        logger.warn(
          { stage: stage.stageId, errorClass: classification.errorClass, count, reason: decision.reason },
          'Retrying stage'
        )
        if (this._settings.budgets.retryDelayMs > 0) await sleep(this._settings.budgets.retryDelayMs)
        continue
      }

      const failure: StageFailure = {
        errorClass: classification.errorClass,
        signature: classification.signature,
        exitCode: response.exitCode,
        reason: reasons.length > 0 ? reasons.join('; ') : decision.reason,
        suggestedActions: classification.suggestedActions,
        manualReroute: decision.manualReroute,
      }
      return { ...base, status: 'failed', artifact: response.artifact, attempts, failure }
    }
  }

  // ---------------------------------------------------------------------------
  // One attempt
  // ---------------------------------------------------------------------------

  private async _runAttempt(
    stage: StageSpec,
    tool: string,
    digestPolicy: DigestPolicy,
    attempt: number
  ): Promise<AttemptOutcome> {
    const adapter = this._adapters.require(tool)
    const composed = await this._composer.compose(stage, digestPolicy)
    const ctx: SessionContext = {
      phase: stage.phase,
      tool,
      stageId: stage.stageId,
      mode: this._settings.sessionMode,
      adapter,
    }
    const decision = await this._sessions.preStage(ctx)

    try {
      this._eventBus?.emit('stage:started', { stageId: stage.stageId, tool, attempt })
      logger.info({ stage: stage.stageId, tool, attempt, session: decision.action }, 'Invoking tool')

      const start = this._now()
      const stopHeartbeat = this._startHeartbeat(stage.stageId, tool, start)
      let response: ToolResponse
      try {
        response = await adapter.invoke({
          stageId: stage.stageId,
          prompt: composed.prompt,
          deadlineSec: stage.deadlineSec,
          deadlineMode: stage.deadlineMode,
          cwd: this._settings.cwd,
          ...(stage.model !== undefined ? { model: stage.model } : {}),
          ...(stage.effort !== undefined ? { effort: stage.effort } : {}),
          ...(decision.resumeSessionId !== undefined ? { resumeSessionId: decision.resumeSessionId } : {}),
        })
      } finally {
        stopHeartbeat()
      }
      const end = this._now()

      await this._store.writeStageOutput(stage.stageId, tool, {
        artifact: response.artifact,
        diagnostics: response.diagnostics,
      })
      await this._store.writeStageMeta({
        stage: stage.stageId,
        tool,
        role: stage.role,
        attempt,
        exit_code: response.exitCode,
        status: response.status,
        start: isoNow(start),
        end: isoNow(end),
        duration_sec: Math.max(0, Math.round((end.getTime() - start.getTime()) / 1000)),
        prompt_sha256: composed.sha256,
        session_id: response.sessionId ?? null,
      })
      await this._store.updateStats((stats) => ({ ...stats, paid_calls_used: stats.paid_calls_used + 1 }))

      if (response.status !== 'success') return { response }

      try {
        await this._sessions.postStage(ctx, decision, response)
      } catch (err) {
        if (err instanceof SessionMismatchError) return { response, mismatch: err }
        throw err
      }

      const gate = await this._gate.validate({ stageId: stage.stageId, role: stage.role, artifact: response.artifact })
      return { response, gate }
    } finally {
      this._sessions.release(ctx, decision)
    }
  }

  private _startHeartbeat(stageId: string, tool: string, start: Date): () => void {
    const periodSec = this._settings.heartbeatSec
    if (periodSec <= 0) return () => undefined
    const timer = setInterval(() => {
      const elapsedSec = Math.round((Date.now() - start.getTime()) / 1000)
      logger.info({ stage: stageId, tool, elapsedSec }, 'Tool call in progress')
      this._eventBus?.emit('stage:heartbeat', { stageId, tool, elapsedSec })
    }, periodSec * 1000)
    timer.unref()
    return () => clearInterval(timer)
  }

  // ---------------------------------------------------------------------------
  // Outcomes
  // ---------------------------------------------------------------------------

  private async _onSuccess(stage: StageSpec, artifact: string): Promise<void> {
    if (stage.role === BRIEF_ROLE) await this._propagateBrief(stage.stageId, artifact)

    await this._store.writeDoneMarker(stage.stageId)
    await this._store.updateStats((stats) => ({
      ...stats,
      stages_completed: stats.stages_completed.includes(stage.stageId)
        ? stats.stages_completed
        : [...stats.stages_completed, stage.stageId],
    }))
    const meta = await this._store.readStageMeta(stage.stageId, stage.tool)
    const durationSec = meta?.duration_sec ?? 0
    this._eventBus?.emit('stage:completed', { stageId: stage.stageId, tool: stage.tool, durationSec })
    logger.info({ stage: stage.stageId, durationSec }, 'Stage completed')
  }

  private async _propagateBrief(stageId: string, artifact: string): Promise<void> {
    const sync = extractUpdatedContextPack(artifact)
    if (sync.content !== undefined) {
      await this._store.writeText(CONTEXT_PACK_PATH, sync.content)
      logger.info({ stage: stageId }, 'Context pack updated from brief output')
    } else {
      logger.warn({ stage: stageId, status: sync.status }, 'Brief output did not update the context pack')
    }
    await this._store.writeJson(VERIFY_COMMANDS_PATH, extractVerifyCommands(artifact))
  }

  /** Increment the signature's cumulative count and return it */
  private async _bumpSignature(classification: Classification): Promise<number> {
    const now = isoNow(this._now())
    const stats = await this._store.updateStats((current) => {
      const previous = current.signatures[classification.signature]
      return {
        ...current,
        signatures: {
          ...current.signatures,
          [classification.signature]: {
            count: (previous?.count ?? 0) + 1,
            class: classification.errorClass,
            first_seen: previous?.first_seen ?? now,
            last_seen: now,
          },
        },
      }
    })
    return stats.signatures[classification.signature]?.count ?? 1
  }

  private async _recordFailure(
    stage: StageSpec,
    response: ToolResponse,
    classification: Classification,
    decision: RetryDecision,
    gateReasons: string[]
  ): Promise<void> {
    const excerpt = gateReasons.length > 0 ? gateReasons.join('\n') : diagnosticHead(response.diagnostics)
    await this._store.writeLastFailure({
      stage: stage.stageId,
      tool: stage.tool,
      class: classification.errorClass,
      signature: classification.signature,
      exit_code: response.exitCode,
      suggested_actions: classification.suggestedActions,
      retry_decision: decision.action,
      manual_reroute: decision.manualReroute,
      stderr_excerpt: maskSecrets(excerpt),
      timestamp: isoNow(this._now()),
    })
    this._eventBus?.emit('stage:failed', {
      stageId: stage.stageId,
      tool: stage.tool,
      errorClass: classification.errorClass,
      signature: classification.signature,
      exitCode: response.exitCode,
    })
    logger.error(
      { stage: stage.stageId, errorClass: classification.errorClass, signature: classification.signature },
      'Stage attempt failed'
    )
  }

  private async _budgetExhausted(stage: StageSpec, used: number): Promise<StageFailure> {
    const limit = this._settings.budgets.paidCallBudget
    const failure: StageFailure = {
      errorClass: 'budget_exhausted',
      signature: 'budget_exhausted',
      exitCode: 1,
      reason: `Paid call budget exhausted: ${String(used)} of ${String(limit)} calls used`,
      suggestedActions: ['Raise budgets.paid_call_budget', 'Review retry history in state/stats.json'],
      manualReroute: false,
    }
    await this._writeFatal(stage, failure, failure.reason)
    logger.error({ stage: stage.stageId, used, limit }, 'Paid call budget exhausted')
    return failure
  }

  private async _sessionMismatch(
    stage: StageSpec,
    response: ToolResponse,
    err: SessionMismatchError
  ): Promise<StageFailure> {
    const failure: StageFailure = {
      errorClass: 'session_mismatch',
      signature: 'session_mismatch',
      exitCode: response.exitCode,
      reason: err.message,
      suggestedActions: [
        'Follow state/session_recovery.md',
        `Resume the baseline session ${err.expectedId ?? '(none)'} manually`,
      ],
      manualReroute: true,
    }
    await this._writeFatal(
      stage,
      failure,
      `expected=${err.expectedId ?? 'none'} actual=${err.actualId ?? 'none'}`
    )
    return failure
  }

  private async _writeFatal(stage: StageSpec, failure: StageFailure, excerpt: string): Promise<void> {
    await this._store.writeLastFailure({
      stage: stage.stageId,
      tool: stage.tool,
      class: failure.errorClass,
      signature: failure.signature,
      exit_code: failure.exitCode,
      suggested_actions: failure.suggestedActions,
      retry_decision: 'stop',
      manual_reroute: failure.manualReroute,
      stderr_excerpt: excerpt,
      timestamp: isoNow(this._now()),
    })
    this._eventBus?.emit('stage:failed', {
      stageId: stage.stageId,
      tool: stage.tool,
      errorClass: failure.errorClass,
      signature: failure.signature,
      exitCode: failure.exitCode,
    })
  }
}

export function createStageExecutor(options: StageExecutorOptions): StageExecutor {
  return new StageExecutorImpl(options)
}
