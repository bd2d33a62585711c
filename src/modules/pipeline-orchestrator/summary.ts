/**
 * Running task summary (`outputs/_summary.md`).
 *
 * Rendering is pure; the writer gathers records from the StateStore and
 * commits the document atomically.
 */

import type { StageSpec } from '../../core/types.js'
import { maskSecrets } from '../../cli/utils/masking.js'
import { isoNow } from '../../utils/helpers.js'
import type { LastFailure, StageMeta } from '../state-store/schemas.js'
import type { StageOutput, StateStore } from '../state-store/state-store.js'

export const SUMMARY_PATH = 'outputs/_summary.md'
export const SUMMARY_MAX_LINES = 80
const STDERR_HEAD = 20
const STDERR_TAIL = 20

export type SummaryStageStatus = 'done' | 'failed' | 'pending'

export interface SummaryStage {
  stage: StageSpec
  status: SummaryStageStatus
  meta: StageMeta | null
  output: StageOutput | null
}

export interface SummaryInput {
  taskId: string
  updatedAt: string
  stages: SummaryStage[]
  lastFailure: LastFailure | null
  paidCallsUsed: number
  paidCallBudget: number
}

function splitLines(text: string): string[] {
  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  return lines
}

/** First `head` and last `tail` lines with an omission marker between them */
export function headTail(text: string, head = STDERR_HEAD, tail = STDERR_TAIL): string[] {
  const lines = splitLines(text)
  if (lines.length <= head + tail) return lines
  return [
    ...lines.slice(0, head),
    `... [${String(lines.length - head - tail)} lines omitted] ...`,
    ...lines.slice(lines.length - tail),
  ]
}

export function truncateLines(lines: string[], max = SUMMARY_MAX_LINES): string[] {
  if (lines.length <= max) return lines
  return [...lines.slice(0, max), `... [${String(lines.length - max)} lines truncated] ...`]
}

export function renderSummary(input: SummaryInput): string {
  const lines: string[] = [
    '# Task Summary',
    `Task: ${input.taskId}`,
    `Updated: ${input.updatedAt}`,
    '',
    '## Stages',
    '',
  ]

  for (const { stage, status, meta, output } of input.stages) {
    lines.push(`### ${stage.stageId} (${stage.tool}/${stage.role}) - ${status}`)
    if (meta !== null) {
      lines.push(`- exit_code: ${String(meta.exit_code)} | duration: ${String(meta.duration_sec)}s`)
    }
    if (output !== null && output.diagnostics.trim() !== '') {
      lines.push('', '**stderr (head 20 + tail 20):**', '```', ...headTail(maskSecrets(output.diagnostics)), '```')
    }
    if (output !== null && output.artifact !== '') {
      lines.push(`- output: ${String(splitLines(output.artifact).length)} lines`)
    }
    lines.push('')
  }

  if (input.lastFailure !== null) {
    lines.push('## Last Failure', '```json', ...JSON.stringify(input.lastFailure, null, 2).split('\n'), '```', '')
  }

  lines.push('## Budgets', `- paid_calls_used: ${String(input.paidCallsUsed)} / ${String(input.paidCallBudget)}`, '')

  return `${truncateLines(lines).join('\n')}\n`
}

/**
 * Regenerate the summary for the stages attempted so far.
 */
export async function writeSummary(
  store: StateStore,
  taskId: string,
  stages: readonly StageSpec[],
  paidCallBudget: number,
  now: Date = new Date()
): Promise<string> {
  const lastFailure = await store.readLastFailure()
  const entries: SummaryStage[] = []
  for (const stage of stages) {
    const meta = await store.readStageMeta(stage.stageId, stage.tool)
    const done = await store.hasDoneMarker(stage.stageId)
    const failed = meta !== null || lastFailure?.stage === stage.stageId
    entries.push({
      stage,
      status: done ? 'done' : failed ? 'failed' : 'pending',
      meta,
      output: await store.readStageOutput(stage.stageId, stage.tool),
    })
  }
  const stats = await store.readStats()
  const content = renderSummary({
    taskId,
    updatedAt: isoNow(now),
    stages: entries,
    lastFailure,
    paidCallsUsed: stats.paid_calls_used,
    paidCallBudget,
  })
  await store.writeText(SUMMARY_PATH, content)
  return content
}
