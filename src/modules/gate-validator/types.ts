/**
 * Shared types for the Gate Validator.
 */

import type { StageRole } from '../../core/types.js'

/** Which contract a failing gate reports */
export type GateViolation = 'scope_violation' | 'contract_violation'

/**
 * Outcome of validating one stage artifact.
 * `violation` is set only when `pass` is false.
 */
export interface GateResult {
  pass: boolean
  violation?: GateViolation
  reasons: string[]
}

/** Input handed to the gate after a successful tool call */
export interface GateInput {
  stageId: string
  role: StageRole
  artifact: string
}

/**
 * Validates a stage artifact against the contract of its role.
 */
export interface GateValidator {
  validate(input: GateInput): Promise<GateResult>
}

/** Path scope limits for roles that emit diffs */
export interface ScopeRules {
  allow: string[]
  deny: string[]
}

/** Contract for one role */
export interface RoleContract {
  /** Heading fragments that must appear (case-insensitive) */
  requiredSections: string[]
  /** Minimum non-empty line count; 0 disables the check */
  minLines: number
  /** Whether the artifact must carry a unified diff checked against scope */
  expectsDiff: boolean
}
