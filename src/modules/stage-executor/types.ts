/**
 * Types for the Stage Executor.
 */

import type { SessionMode, StageSpec } from '../../core/types.js'
import type { ErrorClass } from '../error-classifier/types.js'

/**
 * Failure classes a stage can end with: the generic taxonomy plus the fatal
 * conditions handled outside it.
 */
export type StageFailureClass =
  | ErrorClass
  | 'session_mismatch'
  | 'budget_exhausted'
  | 'join_barrier'
  | 'security_critical'

export interface StageFailure {
  errorClass: StageFailureClass
  signature: string
  exitCode: number
  reason: string
  suggestedActions: string[]
  manualReroute: boolean
}

/**
 * Outcome of `execute()`.
 *  - done:    ran and passed its gate
 *  - skipped: done-marker already present; nothing was invoked
 *  - failed:  stopped after classification and retry policy
 */
export interface StageResult {
  stageId: string
  tool: string
  status: 'done' | 'skipped' | 'failed'
  artifact: string
  /** Attempts actually sent to the adapter during this call */
  attempts: number
  failure?: StageFailure
}

export interface StageExecutor {
  execute(stage: StageSpec): Promise<StageResult>
}

/** Budget knobs read from the `budgets` config section */
export interface StageBudgets {
  paidCallBudget: number
  retryBudget: number
  /** Pause before an automatic retry */
  retryDelayMs: number
}

export interface StageExecutorSettings {
  budgets: StageBudgets
  /** Heartbeat period while a tool call is in flight; 0 disables heartbeats */
  heartbeatSec: number
  sessionMode: SessionMode
  /** Working directory handed to tools */
  cwd: string
}
