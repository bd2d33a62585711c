/**
 * PipelineEvents interface - defines all typed events for the event bus.
 *
 * Event naming convention: {module}:{action} (e.g. "stage:completed", "review:merged")
 * Payloads use plain primitives so this file imports nothing from the modules.
 */

// ---------------------------------------------------------------------------
// PipelineEvents
// ---------------------------------------------------------------------------

/**
 * Complete typed map of all events emitted on the pipeline event bus.
 */
export interface PipelineEvents {
  // -------------------------------------------------------------------------
  // Pipeline lifecycle
  // -------------------------------------------------------------------------

  /** A resolved plan started executing */
  'pipeline:started': { pipelineId: string; taskId: string; stageCount: number }

  /** Every stage in the plan finished successfully */
  'pipeline:completed': { pipelineId: string; taskId: string; stagesRun: number }

  /** The plan halted on its first failing stage */
  'pipeline:failed': {
    pipelineId: string
    taskId: string
    stageId: string
    errorClass: string
  }

  // -------------------------------------------------------------------------
  // Stage lifecycle
  // -------------------------------------------------------------------------

  /** Stage short-circuited by its done-marker */
  'stage:skipped': { stageId: string; reason: 'done_marker' }

  /** An attempt is about to be sent to the tool adapter */
  'stage:started': { stageId: string; tool: string; attempt: number }

  /** Periodic progress tick while the tool call is in flight */
  'stage:heartbeat': { stageId: string; tool: string; elapsedSec: number }

  /** Stage passed its gate and wrote its done-marker */
  'stage:completed': { stageId: string; tool: string; durationSec: number }

  /** Attempt failed and was classified */
  'stage:failed': {
    stageId: string
    tool: string
    errorClass: string
    signature: string
    exitCode: number
  }

  /** Retry policy granted another attempt */
  'stage:retrying': {
    stageId: string
    errorClass: string
    signature: string
    attempt: number
    escalateCompaction: boolean
  }

  // -------------------------------------------------------------------------
  // Session continuity
  // -------------------------------------------------------------------------

  'session:baseline': { phase: string; tool: string; sessionId: string; confidence: string }

  'session:validated': { phase: string; tool: string; sessionId: string }

  'session:mismatch': {
    phase: string
    tool: string
    expected: string | null
    actual: string | null
  }

  // -------------------------------------------------------------------------
  // Parallel review
  // -------------------------------------------------------------------------

  'review:lens-started': { lens: string }

  /** Lens worker settled; `degraded` lenses produced a placeholder artifact */
  'review:lens-completed': { lens: string; status: 'ok' | 'degraded' | 'failed' }

  /** Barrier deadline passed; listed lenses were cancelled */
  'review:barrier-timeout': { pending: string[]; timeoutSec: number }

  'review:merged': { finalCount: number; dedupRemoved: number; conflictResolved: number }

  'review:fix-applied': { queueId: string; status: 'applied' | 'failed' | 'skipped' }

  'review:security-round': { round: number; severity: string }
}
