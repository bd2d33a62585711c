/**
 * Types for error classification and retry decisions.
 */

import type { GateViolation } from '../gate-validator/types.js'
import type { ToolExitStatus } from '../../adapters/types.js'

/** Failure taxonomy for a stage attempt */
export type ErrorClass =
  | 'transient'
  | 'prompt_too_large'
  | 'auth'
  | 'tooling'
  | 'scope_violation'
  | 'contract_violation'
  | 'unknown'

export const ERROR_CLASSES: readonly ErrorClass[] = [
  'transient',
  'prompt_too_large',
  'auth',
  'tooling',
  'scope_violation',
  'contract_violation',
  'unknown',
]

/** Everything the classifier looks at for one failed attempt */
export interface ClassificationInput {
  exitCode: number
  /** Normalized adapter status; takes priority over the raw exit-code table when present */
  status?: ToolExitStatus
  stderr: string
  /** Set when the gate failed after a successful tool call */
  gateViolation?: GateViolation
}

export interface Classification {
  errorClass: ErrorClass
  /** `<class>:sig:<16 hex>`; the key under which counts accumulate */
  signature: string
  suggestedActions: string[]
}

/** What the retry policy decided for one classified failure */
export interface RetryDecision {
  action: 'retry' | 'stop'
  reason: string
  /** Next attempt must compose with aggressive context compaction */
  escalateCompaction: boolean
  /** Repeated contract violations are handed back for manual re-routing */
  manualReroute: boolean
}
