/**
 * Types for the Parallel Review Coordinator.
 */

// ---------------------------------------------------------------------------
// Findings
// ---------------------------------------------------------------------------

export type Severity = 'critical' | 'major' | 'medium' | 'minor' | 'low'
export type Confidence = 'high' | 'medium' | 'low'

/** Higher is more severe */
export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  critical: 5,
  major: 4,
  medium: 3,
  minor: 2,
  low: 1,
}

/** Fix-queue priority; lower runs first */
export const SEVERITY_PRIORITY: Readonly<Record<Severity, number>> = {
  critical: 1,
  major: 2,
  medium: 3,
  minor: 4,
  low: 5,
}

/** One issue parsed out of a lens artifact, before ids are assigned */
export interface RawFinding {
  lens: string
  target_file: string
  target_location: string
  issue: string
  proposed_improvement: string
  severity: Severity
  confidence: Confidence
  uses_external_evidence: boolean
  evidence_ids: string[]
}

export interface Finding extends RawFinding {
  /** `F001`, `F002`, … in first-seen order */
  finding_id: string
}

export interface MergeLog {
  lenses: string[]
  raw_finding_counts: Record<string, number>
  dedup_removed: number
  conflict_resolved: number
  evidence_rejected: number
  final_count: number
}

export interface MergeResult {
  findings: Finding[]
  log: MergeLog
}

// ---------------------------------------------------------------------------
// Fix queue
// ---------------------------------------------------------------------------

export type FixStatus = 'pending' | 'applied' | 'failed' | 'skipped'

export interface FixQueueItem {
  queue_id: string
  finding_id: string
  target_file: string
  target_location: string
  action: string
  priority: number
  status: FixStatus
}

/** Applies fixes on behalf of the coordinator; absent means no fix capability */
export interface FixApplier {
  /** Apply one queued fix; resolves true when the fix landed */
  applyFix(item: FixQueueItem, finding: Finding | undefined): Promise<boolean>
  /** Apply fixes for the security findings of one escalation round */
  applySecurityFixes(round: number, findings: Finding[]): Promise<boolean>
}

/** Regression check run between security fix rounds */
export interface RegressionVerifier {
  verify(round: number): Promise<boolean>
}

// ---------------------------------------------------------------------------
// Lenses and the join barrier
// ---------------------------------------------------------------------------

/** Raw result of one lens run */
export interface LensRun {
  exitCode: number
  artifact: string
}

/**
 * Runs a single lens. Must stop promptly once `signal` aborts.
 * A rejection is an invalid-handle condition and fails the barrier for that lens.
 */
export interface LensRunner {
  run(lens: string, signal: AbortSignal): Promise<LensRun>
}

export type LensStatus = 'ok' | 'degraded' | 'failed'

export interface LensOutcome {
  lens: string
  status: LensStatus
  exitCode: number | null
  /** Findings text written for the lens; empty for failed lenses */
  text: string
  reason?: string
}

export interface BarrierResult {
  outcomes: LensOutcome[]
  timedOut: boolean
  /** Lenses that timed out or had no valid handle */
  failed: string[]
  elapsedMs: number
}

// ---------------------------------------------------------------------------
// Security gate
// ---------------------------------------------------------------------------

export type SecurityFinalSeverity = 'none' | 'low' | 'minor' | 'medium' | 'high' | 'critical'

export type SecurityOutcome = 'clean' | 'warning_high_remaining' | 'critical_stop'

export interface SecurityGateResult {
  enabled: boolean
  mode: string
  final_severity: SecurityFinalSeverity
  stop_action: 'STOP_AND_CONFIRM' | null
  rounds_run: number
  critical_findings: string[]
  high_findings_remaining: string[]
  timestamp: string
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

/** Why a review did not complete */
export type ReviewStopCode = 'budget_exhausted' | 'join_barrier' | 'security_critical'

export interface ReviewResult {
  status: 'completed' | 'stopped' | 'failed'
  barrier: BarrierResult
  merge: MergeResult
  queue: FixQueueItem[]
  security?: { outcome: SecurityOutcome; result: SecurityGateResult }
  code?: ReviewStopCode
  reason?: string
}

export interface ReviewCoordinator {
  review(): Promise<ReviewResult>
}
