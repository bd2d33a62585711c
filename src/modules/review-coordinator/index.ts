export { createReviewCoordinator, ReviewCoordinatorImpl } from './review-coordinator-impl.js'
export type { ReviewCoordinatorOptions } from './review-coordinator-impl.js'
export { createReviewStageExecutor, ReviewStageExecutor, PARALLEL_REVIEW_ROLE } from './review-stage.js'
export type { ReviewStageExecutorOptions } from './review-stage.js'
export { AdapterFixApplier, AdapterLensRunner, CommandVerifier } from './lens-runner.js'
export type { AdapterFixApplierSettings, AdapterLensRunnerSettings, CommandVerifierOptions } from './lens-runner.js'
export { dedupKey, detectSeverity, mergeFindings, parseLensFindings } from './finding-parser.js'
export type { LensText } from './finding-parser.js'
export { actionFor, buildFixQueue, executeFixQueue } from './fix-queue.js'
export { degradedArtifact, runJoinBarrier, WATCHDOG_GRACE_MS } from './join-barrier.js'
export { buildLensPrompt, SECURITY_LENS, securityTrigger } from './lenses.js'
export { REVIEW_PATHS } from './paths.js'
export { DEFAULT_SECURITY_MAX_ROUNDS, runSecurityEscalation, securitySeverity } from './security-escalation.js'
export type { SecurityEscalationOptions, SecurityEscalationResult } from './security-escalation.js'
export { renderReviewSummary } from './review-summary.js'
export { SEVERITY_PRIORITY, SEVERITY_RANK } from './types.js'
export type {
  BarrierResult,
  Finding,
  FixApplier,
  FixQueueItem,
  FixStatus,
  LensOutcome,
  LensRun,
  LensRunner,
  MergeLog,
  MergeResult,
  RawFinding,
  RegressionVerifier,
  ReviewCoordinator,
  ReviewResult,
  ReviewStopCode,
  SecurityGateResult,
  SecurityOutcome,
  Severity,
} from './types.js'
