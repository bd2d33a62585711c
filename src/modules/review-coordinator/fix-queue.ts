/**
 * Fix queue - ordering and strictly sequential execution of merged findings.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import { SEVERITY_PRIORITY, type Finding, type FixApplier, type FixQueueItem, type FixStatus } from './types.js'

const logger = createLogger('review:fix-queue')

export function actionFor(finding: Pick<Finding, 'proposed_improvement' | 'issue'>): string {
  const proposed = finding.proposed_improvement.trim()
  if (proposed !== '') return proposed
  const issue = finding.issue.trim()
  return issue !== '' ? issue : 'Address finding'
}

/**
 * Most severe first; ties keep merge order (Array.prototype.sort is stable).
 */
export function buildFixQueue(findings: readonly Finding[]): FixQueueItem[] {
  return [...findings]
    .sort((a, b) => SEVERITY_PRIORITY[a.severity] - SEVERITY_PRIORITY[b.severity])
    .map((finding, index): FixQueueItem => ({
      queue_id: `Q${String(index + 1).padStart(3, '0')}`,
      finding_id: finding.finding_id,
      target_file: finding.target_file,
      target_location: finding.target_location,
      action: actionFor(finding),
      priority: SEVERITY_PRIORITY[finding.severity],
      status: 'pending',
    }))
}

export type SettledFixStatus = Exclude<FixStatus, 'pending'>

export interface ExecuteQueueOptions {
  /** Undefined means no fix capability: every pending item is skipped */
  applier: FixApplier | undefined
  findings: readonly Finding[]
  /** Called after each status change, e.g. to persist the queue */
  onUpdate?: (queue: FixQueueItem[], item: FixQueueItem, status: SettledFixStatus) => Promise<void>
}

/**
 * Apply pending items one at a time in queue order.
 * A failing item is recorded and the next one still runs.
 */
export async function executeFixQueue(
  queue: readonly FixQueueItem[],
  options: ExecuteQueueOptions
): Promise<FixQueueItem[]> {
  const current = queue.map((item) => ({ ...item }))
  const byId = new Map(options.findings.map((f) => [f.finding_id, f]))

  for (const [index, item] of current.entries()) {
    if (item.status !== 'pending') continue

    let status: SettledFixStatus
    if (options.applier === undefined) {
      status = 'skipped'
    } else {
      try {
        status = (await options.applier.applyFix(item, byId.get(item.finding_id))) ? 'applied' : 'failed'
      } catch (err) {
        logger.warn({ queueId: item.queue_id, error: errorMessage(err) }, 'Fix application threw')
        status = 'failed'
      }
    }

    const updated = { ...item, status }
    current[index] = updated
    logger.info({ queueId: item.queue_id, findingId: item.finding_id, status }, 'Fix queue item processed')
    await options.onUpdate?.(current, updated, status)
  }
  return current
}
