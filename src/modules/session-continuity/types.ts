/**
 * Types for the Session Continuity Manager.
 */

import type { SessionMode } from '../../core/types.js'
import type { ToolAdapter, ToolResponse } from '../../adapters/types.js'
import type { CapabilityProbe, SessionRecord } from '../state-store/schemas.js'

/** Identifies one stage call within a phase */
export interface SessionContext {
  phase: string
  tool: string
  stageId: string
  mode: SessionMode
  adapter: ToolAdapter
}

/**
 * What the manager decided before a call.
 *  - fresh:  start a new session (no baseline yet, resume unsupported, or mode off)
 *  - resume: resume `resumeSessionId`, the phase baseline
 */
export interface PreStageDecision {
  action: 'fresh' | 'resume'
  resumeSessionId?: string
  reason: string
  probe: CapabilityProbe
  /** Baseline at decision time, if any */
  baseline: SessionRecord | null
  /** State-directory listing taken before the call, for diff extraction */
  snapshot?: string[]
  /** Lease that must be handed back through release() */
  leaseToken?: string
}

/** Outcome of post-call validation */
export type PostStageOutcome =
  | { status: 'baseline'; record: SessionRecord }
  | { status: 'validated'; record: SessionRecord }
  | { status: 'untracked'; reason: string }

/** Result of recovering a session id after a call */
export interface ExtractionResult {
  sessionId?: string
  /** Why no id was found */
  reason?: string
}

export interface SessionContinuityManager {
  /** Probe (cached per phase and tool), take a lease and decide fresh vs resume */
  preStage(ctx: SessionContext): Promise<PreStageDecision>

  /**
   * Validate the session id the call actually used and update the record.
   * @throws {SessionMismatchError} when continuity was required and broken
   */
  postStage(ctx: SessionContext, decision: PreStageDecision, response: ToolResponse): Promise<PostStageOutcome>

  /** Hand back the lease taken in preStage; safe to call more than once */
  release(ctx: SessionContext, decision: PreStageDecision): void
}
