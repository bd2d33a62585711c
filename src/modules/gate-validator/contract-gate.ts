/**
 * ContractGate - GateValidator that checks a stage artifact against the
 * contract registered for its role.
 *
 * Checks, in order:
 *  - the artifact is non-empty
 *  - every required section heading is present (case-insensitive)
 *  - the artifact has at least `minLines` non-blank lines
 *  - roles that emit diffs carry a unified diff whose paths stay inside scope
 *
 * Any scope failure makes the whole result a scope_violation; any other
 * failure is a contract_violation. Roles without a contract only need a
 * non-empty artifact.
 */

import { createLogger } from '../../utils/logger.js'
import { DEFAULT_ROLE_CONTRACTS } from './contracts.js'
import type { GateInput, GateResult, GateValidator, RoleContract, ScopeRules } from './types.js'

const logger = createLogger('gate')

const DIFF_MARKER = /^(---|\+\+\+|@@)/m
const FENCED_DIFF = /^```diff[ \t]*\n([\s\S]*?)^```[ \t]*$/m
const NO_CHANGE_MARKERS = ['no changes required.', 'no diff required.']

export interface ContractGateOptions {
  contracts?: Record<string, RoleContract>
  scope?: ScopeRules
}

function normalizePath(path: string): string {
  return path.replace(/^\.\//, '').replace(/\/$/, '')
}

function pathMatches(file: string, rule: string): boolean {
  const prefix = normalizePath(rule)
  return prefix !== '' && (file === prefix || file.startsWith(`${prefix}/`))
}

/** Files touched by a unified diff, in first-seen order */
export function changedFiles(diff: string): string[] {
  const files: string[] = []
  for (const line of diff.split('\n')) {
    const match = /^(?:\+\+\+|---) (?:[ab]\/)?(\S+)/.exec(line)
    const file = match?.[1]
    if (file === undefined || file === '/dev/null') continue
    const normalized = normalizePath(file)
    if (!files.includes(normalized)) files.push(normalized)
  }
  return files
}

/** Scope failures for a set of changed files */
export function scopeViolations(files: string[], scope: ScopeRules): string[] {
  const reasons: string[] = []
  for (const file of files) {
    if (scope.allow.length > 0 && !scope.allow.some((rule) => pathMatches(file, rule))) {
      reasons.push(`Scope violation: file '${file}' is outside scope.allow`)
    }
    const denied = scope.deny.find((rule) => pathMatches(file, rule))
    if (denied !== undefined) {
      reasons.push(`Scope violation: file '${file}' matches deny path '${normalizePath(denied)}'`)
    }
  }
  return reasons
}

export class ContractGate implements GateValidator {
  private readonly _contracts: Record<string, RoleContract>
  private readonly _scope: ScopeRules

  constructor(options: ContractGateOptions = {}) {
    this._contracts = { ...DEFAULT_ROLE_CONTRACTS, ...(options.contracts ?? {}) }
    this._scope = options.scope ?? { allow: [], deny: [] }
  }

  async validate(input: GateInput): Promise<GateResult> {
    const { role, artifact } = input
    if (artifact.trim() === '') {
      return { pass: false, violation: 'contract_violation', reasons: [`${role}: Output is empty`] }
    }

    const contract = this._contracts[role]
    if (contract === undefined) return { pass: true, reasons: [] }

    const contractReasons: string[] = []
    const scopeReasons: string[] = []
    const lowered = artifact.toLowerCase()

    for (const section of contract.requiredSections) {
      if (!lowered.includes(section.toLowerCase())) {
        contractReasons.push(`${role}: Missing required section: '${section}'`)
      }
    }

    if (contract.minLines > 0) {
      const lines = artifact.split('\n').filter((l) => l.trim() !== '').length
      if (lines < contract.minLines) {
        contractReasons.push(
          `${role}: Output too short (${String(lines)} lines < ${String(contract.minLines)} minimum)`
        )
      }
    }

    if (contract.expectsDiff && !NO_CHANGE_MARKERS.some((m) => lowered.includes(m))) {
      const diff = FENCED_DIFF.exec(artifact)?.[1] ?? artifact
      if (!DIFF_MARKER.test(diff)) {
        contractReasons.push(`${role}: Output does not contain a unified diff (missing ---, +++ or @@ markers)`)
      } else {
        scopeReasons.push(...scopeViolations(changedFiles(diff), this._scope))
      }
    }

    const reasons = [...scopeReasons, ...contractReasons]
    if (reasons.length === 0) return { pass: true, reasons: [] }

    logger.warn({ stageId: input.stageId, role, reasons }, 'Gate failed')
    return {
      pass: false,
      violation: scopeReasons.length > 0 ? 'scope_violation' : 'contract_violation',
      reasons,
    }
  }
}

/**
 * Create a GateValidator enforcing the built-in role contracts plus any overrides.
 */
export function createContractGate(options: ContractGateOptions = {}): GateValidator {
  return new ContractGate(options)
}
