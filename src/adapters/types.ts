/**
 * Type definitions for the Tool Adapter subsystem
 * All adapter types are defined here for consistency and reuse
 */

import type { DeadlineMode, ReasoningEffort, ToolId } from '../core/types.js'

export type { ToolId }

// ---------------------------------------------------------------------------
// Exit statuses
// ---------------------------------------------------------------------------

/**
 * Exit status normalized at the adapter boundary.
 * Every tool dialect is folded into one of these.
 */
export type ToolExitStatus =
  | 'success'
  | 'missing_binary'
  | 'missing_input'
  | 'general_failure'
  | 'timeout'
  | 'input_too_large'

/** Exit code recorded for each normalized status */
export const EXIT_CODES: Readonly<Record<ToolExitStatus, number>> = {
  success: 0,
  missing_input: 2,
  missing_binary: 10,
  general_failure: 12,
  input_too_large: 14,
  timeout: 124,
}

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

/**
 * A spawn command descriptor built by an adapter.
 */
export interface SpawnCommand {
  /** The binary to execute (e.g. "codex", "gemini") */
  binary: string
  args: string[]
  /** Environment variable overrides merged over process.env */
  env?: Record<string, string>
  cwd: string
  /** Data piped to stdin; the prompt for every built-in adapter */
  stdin?: string
}

/** One call to an external tool */
export interface ToolRequest {
  stageId: string
  prompt: string
  model?: string
  effort?: ReasoningEffort
  /** Deadline in seconds; 0 disables it */
  deadlineSec: number
  deadlineMode: DeadlineMode
  /** Resume this session instead of starting fresh */
  resumeSessionId?: string
  cwd: string
}

/** Normalized result of one call */
export interface ToolResponse {
  artifact: string
  /** Diagnostic (stderr) stream */
  diagnostics: string
  status: ToolExitStatus
  exitCode: number
  /** Exit code the process actually returned, null when it never ran or was killed */
  rawExitCode: number | null
  /** Session id reported by the tool's structured output stream, if any */
  sessionId?: string
}

// ---------------------------------------------------------------------------
// Capability probe
// ---------------------------------------------------------------------------

/**
 * How the session id of a call can be recovered.
 *  - stream_json_init / thread_started: structured protocol event (high confidence)
 *  - state_dir: before/after diff of the tool's local session directory (medium)
 *  - unknown: no mechanism
 */
export type SessionIdSource = 'stream_json_init' | 'thread_started' | 'state_dir' | 'unknown'

/** Result of probing a tool for resume support */
export interface ProbeResult {
  resumeSupported: boolean
  idSource: SessionIdSource
  binaryFound: boolean
  binaryPath: string
  notes: string
}

// ---------------------------------------------------------------------------
// Adapter contract
// ---------------------------------------------------------------------------

/**
 * Contract every tool adapter implements.
 */
export interface ToolAdapter {
  readonly id: ToolId
  readonly displayName: string

  /** Run one call. `signal` aborts the call and reports it as a timeout. */
  invoke(request: ToolRequest, signal?: AbortSignal): Promise<ToolResponse>

  /** Detect resume support and the session id extraction mechanism */
  probe(): Promise<ProbeResult>

  /**
   * Local directory the tool writes one entry per session into.
   * Used for directory-diff session extraction; undefined when the tool has none.
   */
  sessionStateDir(): string | undefined

  /** Pull a session id out of one new state-directory entry name */
  sessionIdFromStateEntry(entry: string): string | undefined
}
