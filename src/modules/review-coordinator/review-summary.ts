/**
 * Human-readable review summary written to review/summary.md.
 */

import type { SecurityEscalationResult } from './security-escalation.js'
import type { BarrierResult, FixQueueItem, MergeResult } from './types.js'

export interface ReviewSummaryInput {
  barrier: BarrierResult
  merge: MergeResult
  queue: readonly FixQueueItem[]
  security: SecurityEscalationResult | undefined
  generatedAt: string
}

export function renderReviewSummary(input: ReviewSummaryInput): string {
  const { barrier, merge, queue, security } = input
  const lines: string[] = ['# Parallel Review Summary', '', `Generated: ${input.generatedAt}`, '', '## Lenses', '']

  for (const outcome of barrier.outcomes) {
    const detail = outcome.reason !== undefined ? ` (${outcome.reason})` : outcome.exitCode !== null && outcome.exitCode !== 0 ? ` (exit=${String(outcome.exitCode)})` : ''
    lines.push(`- ${outcome.lens}: ${outcome.status}${detail}`)
  }
  if (barrier.timedOut) lines.push('', 'Join barrier timed out.')

  lines.push(
    '',
    '## Merge',
    '',
    `- findings: ${String(merge.log.final_count)}`,
    `- dedup_removed: ${String(merge.log.dedup_removed)}`,
    `- conflict_resolved: ${String(merge.log.conflict_resolved)}`,
    '',
    '## Fix Queue',
    ''
  )
  if (queue.length === 0) lines.push('No fixes queued.')
  for (const item of queue) {
    const target = item.target_file !== '' ? ` ${item.target_file}` : ''
    lines.push(`- ${item.queue_id} [P${String(item.priority)}] ${item.finding_id}${target}: ${item.status}`)
  }

  lines.push('', '## Security Gate', '')
  if (security === undefined) {
    lines.push('Not run.')
  } else {
    lines.push(
      `- outcome: ${security.outcome}`,
      `- final_severity: ${security.result.final_severity}`,
      `- rounds_run: ${String(security.result.rounds_run)}`
    )
    if (security.result.stop_action !== null) lines.push(`- stop_action: ${security.result.stop_action}`)
  }

  return lines.join('\n') + '\n'
}
