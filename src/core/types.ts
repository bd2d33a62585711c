/**
 * Core types for Baton
 * Shared type definitions used across all modules
 */

/** Identifier of an external text-generation tool (e.g. "codex", "gemini") */
export type ToolId = string

/** Role a stage plays in the pipeline (e.g. "brief", "impl", "verify") */
export type StageRole = string

/** Stage identifier, conventionally `<tool>_<role>` */
export type StageId = string

/** Top-level grouping of stages sharing one session-continuity scope */
export type PhaseId = string

/**
 * How a stage deadline is applied.
 *  - enforce:   the call is killed when the deadline passes (maps to timeout)
 *  - wait_done: the deadline is advisory; the tool runs until it exits
 */
export type DeadlineMode = 'enforce' | 'wait_done'

/** Reasoning effort hint forwarded to tools that accept one */
export type ReasoningEffort = 'low' | 'medium' | 'high'

/** Context compaction applied while composing a request */
export type DigestPolicy = 'off' | 'auto' | 'aggressive'

/** Session continuity mode for a phase */
export type SessionMode = 'off' | 'forced_within_phase'

/**
 * One resolved unit of pipeline work.
 * Produced by the plan resolver; immutable for the duration of a run.
 */
export interface StageSpec {
  stageId: StageId
  tool: ToolId
  role: StageRole
  phase: PhaseId
  model?: string
  effort?: ReasoningEffort
  /** Deadline in seconds; 0 disables it */
  deadlineSec: number
  deadlineMode: DeadlineMode
  digestPolicy: DigestPolicy
}

/** Ordered, resolved sequence of stages for one run */
export interface StagePlan {
  pipelineId: string
  stages: readonly StageSpec[]
}
