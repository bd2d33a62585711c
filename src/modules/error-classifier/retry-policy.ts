/**
 * Retry policy - decides whether a classified failure earns another attempt.
 *
 * Decisions depend only on the class, the cumulative count of the failing
 * signature (already including the current failure) and the compaction
 * level the failed attempt ran with.
 */

import type { DigestPolicy } from '../../core/types.js'
import type { ErrorClass, RetryDecision } from './types.js'

export interface RetryContext {
  errorClass: ErrorClass
  /** Cumulative count for this signature, including the failure being judged */
  signatureCount: number
  retryBudget: number
  /** Compaction the failed attempt was composed with */
  digestPolicy: DigestPolicy
}

const stop = (reason: string, manualReroute = false): RetryDecision => ({
  action: 'stop',
  reason,
  escalateCompaction: false,
  manualReroute,
})

const retry = (reason: string, escalateCompaction = false): RetryDecision => ({
  action: 'retry',
  reason,
  escalateCompaction,
  manualReroute: false,
})

/**
 * Apply the per-class retry table.
 *
 * The `count < retryBudget` guard caps automatic retries of any signature
 * below the configured budget.
 */
export function decideRetry(ctx: RetryContext): RetryDecision {
  const { errorClass, signatureCount, retryBudget } = ctx
  const withinBudget = signatureCount < retryBudget

  switch (errorClass) {
    case 'auth':
      return stop('authentication failures are never retried')

    case 'transient':
      return withinBudget
        ? retry(`transient failure ${String(signatureCount)} of ${String(retryBudget)}`)
        : stop(`retry budget exhausted (${String(signatureCount)} >= ${String(retryBudget)})`)

    case 'prompt_too_large':
      if (ctx.digestPolicy === 'aggressive') {
        return stop('input still too large under aggressive compaction')
      }
      return withinBudget
        ? retry('retrying with aggressive context compaction', true)
        : stop(`retry budget exhausted (${String(signatureCount)} >= ${String(retryBudget)})`)

    case 'tooling':
      return stop('tooling failures need manual repair')

    case 'contract_violation':
      return signatureCount >= 2
        ? stop('repeated contract violation: re-route the role manually', true)
        : stop('contract violation is not retried automatically')

    case 'scope_violation':
      return stop('scope violations are never retried')

    case 'unknown':
      return signatureCount === 1 && withinBudget
        ? retry('unrecognized failure, first occurrence')
        : stop('unrecognized failure repeated')
  }
}
