/**
 * Security escalation loop.
 *
 *   critical            → STOP_AND_CONFIRM, no fixes attempted
 *   none/low/minor/medium → clean
 *   high (major)        → up to maxRounds × (fix → verify → rerun security lens → recheck)
 *
 * Terminates in exactly one of: clean, warning_high_remaining, critical_stop.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage, isoNow } from '../../utils/helpers.js'
import { parseLensFindings } from './finding-parser.js'
import { SECURITY_LENS } from './lenses.js'
import {
  SEVERITY_RANK,
  type FixApplier,
  type RawFinding,
  type RegressionVerifier,
  type SecurityFinalSeverity,
  type SecurityGateResult,
  type SecurityOutcome,
} from './types.js'

const logger = createLogger('review:security')

export const DEFAULT_SECURITY_MAX_ROUNDS = 3

/** Highest security-lens severity, with `major` reported as `high` */
export function securitySeverity(findings: readonly RawFinding[]): SecurityFinalSeverity {
  let top: RawFinding['severity'] | undefined
  for (const finding of findings) {
    if (finding.lens !== SECURITY_LENS) continue
    if (top === undefined || SEVERITY_RANK[finding.severity] > SEVERITY_RANK[top]) top = finding.severity
  }
  if (top === undefined) return 'none'
  return top === 'major' ? 'high' : top
}

export function securityIssues(findings: readonly RawFinding[], level: 'critical' | 'high'): string[] {
  const wanted = level === 'high' ? 'major' : 'critical'
  return findings
    .filter((f) => f.lens === SECURITY_LENS && f.severity === wanted)
    .map((f) => f.issue.trim())
    .filter((issue) => issue !== '')
}

export interface SecurityEscalationOptions {
  /** Resolved security mode, recorded in the gate result */
  mode: string
  maxRounds?: number
  applier?: FixApplier
  verifier?: RegressionVerifier
  /** Run the security lens alone; null when the rerun itself failed */
  rerunSecurityLens: (round: number) => Promise<string | null>
  onRound?: (round: number, severity: SecurityFinalSeverity) => void
  now?: () => Date
}

export interface SecurityEscalationResult {
  outcome: SecurityOutcome
  result: SecurityGateResult
}

export async function runSecurityEscalation(
  findings: readonly RawFinding[],
  options: SecurityEscalationOptions
): Promise<SecurityEscalationResult> {
  const maxRounds = options.maxRounds ?? DEFAULT_SECURITY_MAX_ROUNDS
  const now = options.now ?? (() => new Date())

  const gate = (
    current: readonly RawFinding[],
    finalSeverity: SecurityFinalSeverity,
    roundsRun: number
  ): SecurityGateResult => ({
    enabled: true,
    mode: options.mode,
    final_severity: finalSeverity,
    stop_action: finalSeverity === 'critical' ? 'STOP_AND_CONFIRM' : null,
    rounds_run: roundsRun,
    critical_findings: securityIssues(current, 'critical'),
    high_findings_remaining: securityIssues(current, 'high'),
    timestamp: isoNow(now()),
  })

  let current: readonly RawFinding[] = findings
  let severity = securitySeverity(current)
  logger.info({ severity }, 'Security gate initial severity')

  if (severity === 'critical') {
    logger.warn('Critical security finding; STOP_AND_CONFIRM')
    return { outcome: 'critical_stop', result: gate(current, 'critical', 0) }
  }
  if (severity !== 'high') {
    return { outcome: 'clean', result: gate(current, severity, 0) }
  }

  for (let round = 1; round <= maxRounds; round++) {
    logger.info({ round, maxRounds }, 'Security fix round')
    const securityFindings = current.filter((f) => f.lens === SECURITY_LENS)

    if (options.applier === undefined) {
      logger.warn({ round }, 'No fix capability; re-checking without applying fixes')
    } else {
      try {
        const applied = await options.applier.applySecurityFixes(round, securityFindings.map((f, i) => ({
          ...f,
          finding_id: `S${String(round)}-${String(i + 1).padStart(3, '0')}`,
        })))
        if (!applied) logger.warn({ round }, 'Security fix failed')
      } catch (err) {
        logger.warn({ round, error: errorMessage(err) }, 'Security fix threw')
      }
    }

    if (options.verifier !== undefined) {
      try {
        if (!(await options.verifier.verify(round))) logger.warn({ round }, 'Regression verification failed')
      } catch (err) {
        logger.warn({ round, error: errorMessage(err) }, 'Regression verification threw')
      }
    }

    const recheck = await options.rerunSecurityLens(round)
    if (recheck === null) {
      // Without a fresh result the previous HIGH findings still stand
      logger.warn({ round }, 'Security lens rerun failed; keeping previous findings')
      options.onRound?.(round, severity)
      continue
    }
    current = parseLensFindings(SECURITY_LENS, recheck)
    severity = securitySeverity(current)
    options.onRound?.(round, severity)
    logger.info({ round, severity }, 'Security recheck')

    if (severity === 'critical') {
      logger.warn({ round }, 'Critical finding during security fix loop; STOP_AND_CONFIRM')
      return { outcome: 'critical_stop', result: gate(current, 'critical', round) }
    }
    if (severity !== 'high') {
      return { outcome: 'clean', result: gate(current, 'none', round) }
    }
  }

  logger.warn({ maxRounds }, 'Security fix loop exhausted with HIGH findings remaining')
  return { outcome: 'warning_high_remaining', result: gate(current, 'high', maxRounds) }
}
