/**
 * Error classifier - maps a failed attempt to an ErrorClass, a stable
 * signature and a list of suggested recovery actions.
 *
 * Precedence:
 *   gate violation > adapter status / exit-code table > stderr patterns > unknown
 *
 * Pure: no I/O, no clock.
 */

import type { ToolExitStatus } from '../../adapters/types.js'
import { computeSignature, diagnosticHead } from './signature.js'
import type { Classification, ClassificationInput, ErrorClass } from './types.js'

// ---------------------------------------------------------------------------
// Suggested actions
// ---------------------------------------------------------------------------

const ACTIONS = {
  scope: ['Review scope.allow/deny for the task', 'Split task into smaller scope', 'Clarify scope with user'],
  contract: ['Review role prompt template', 'Try alternate tool for this role', 'Check gate requirements match prompt'],
  missingBinary: ['Verify CLI installations', 'Verify PATH includes CLI tools'],
  inputPaths: ['Check input file paths', 'Verify CLI installations'],
  oversizeInput: ['Set digest_policy=aggressive for the stage', 'Remove attachments', 'Reduce context pack size'],
  timeout: ['Retry once', 'Increase the stage deadline', 'Reduce prompt size'],
  auth: ['Re-authenticate CLI', 'Check API key/token expiry', 'No auto-retry: manual intervention required'],
  contextLimit: ['Set digest_policy=aggressive for the stage', 'Trim attachments', 'Split task into smaller pieces'],
  network: ['Retry once', 'Check network connectivity'],
  tooling: ['Verify CLI installations', 'Verify PATH includes CLI tools'],
  unknown: ['Retry once (first occurrence of this error)', 'Check stderr for details'],
} satisfies Record<string, string[]>

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

interface Verdict {
  errorClass: ErrorClass
  actions: string[]
}

const STATUS_TABLE: Partial<Record<ToolExitStatus, Verdict>> = {
  missing_binary: { errorClass: 'tooling', actions: ACTIONS.missingBinary },
  missing_input: { errorClass: 'tooling', actions: ACTIONS.inputPaths },
  timeout: { errorClass: 'transient', actions: ACTIONS.timeout },
  input_too_large: { errorClass: 'prompt_too_large', actions: ACTIONS.oversizeInput },
}

const OVERSIZE_HINT = /too large|size|50kb|limit/i

const STDERR_PATTERNS: ReadonlyArray<{ pattern: RegExp; verdict: Verdict }> = [
  {
    pattern: /401|403|unauthorized|forbidden|invalid.*(token|key|credential)|authentication/i,
    verdict: { errorClass: 'auth', actions: ACTIONS.auth },
  },
  {
    pattern: /context.*(length|window)|too (large|long|many)|token.*(limit|exceed)|prompt.*too/i,
    verdict: { errorClass: 'prompt_too_large', actions: ACTIONS.contextLimit },
  },
  {
    pattern: /connection|network|timeout|socket|refused|ECONNRESET|ETIMEDOUT/i,
    verdict: { errorClass: 'transient', actions: ACTIONS.network },
  },
  {
    pattern: /not found|command not found|No such file|binary|executable|ENOENT/i,
    verdict: { errorClass: 'tooling', actions: ACTIONS.tooling },
  },
]

function fromExitCode(exitCode: number, stderr: string): Verdict | null {
  switch (exitCode) {
    case 10:
    case 30:
      return { errorClass: 'tooling', actions: ACTIONS.missingBinary }
    case 2:
    case 11:
      return { errorClass: 'tooling', actions: ACTIONS.inputPaths }
    case 31:
      return OVERSIZE_HINT.test(stderr)
        ? { errorClass: 'prompt_too_large', actions: ACTIONS.oversizeInput }
        : { errorClass: 'tooling', actions: ACTIONS.inputPaths }
    case 13:
    case 33:
    case 124:
      return { errorClass: 'transient', actions: ACTIONS.timeout }
    case 14:
      return { errorClass: 'prompt_too_large', actions: ACTIONS.oversizeInput }
    default:
      return null
  }
}

function fromStderr(stderr: string): Verdict | null {
  for (const { pattern, verdict } of STDERR_PATTERNS) {
    if (pattern.test(stderr)) return verdict
  }
  return null
}

// ---------------------------------------------------------------------------
// classifyError
// ---------------------------------------------------------------------------

/**
 * Classify a failed attempt.
 *
 * A zero exit with no gate violation and no recognizable diagnostics
 * classifies as `unknown`, as does any unrecognized non-zero exit.
 */
export function classifyError(input: ClassificationInput): Classification {
  const stderr = diagnosticHead(input.stderr)

  let verdict: Verdict | null = null
  if (input.gateViolation === 'scope_violation') {
    verdict = { errorClass: 'scope_violation', actions: ACTIONS.scope }
  } else if (input.gateViolation === 'contract_violation') {
    verdict = { errorClass: 'contract_violation', actions: ACTIONS.contract }
  } else {
    verdict =
      (input.status !== undefined ? (STATUS_TABLE[input.status] ?? null) : null) ??
      fromExitCode(input.exitCode, stderr) ??
      fromStderr(stderr)
  }

  const resolved = verdict ?? { errorClass: 'unknown', actions: ACTIONS.unknown }
  return {
    errorClass: resolved.errorClass,
    signature: computeSignature(resolved.errorClass, input.stderr),
    suggestedActions: [...resolved.actions],
  }
}
