/**
 * Join barrier for concurrently running lenses.
 *
 * Every lens shares one AbortController and one deadline. When the deadline
 * passes the watchdog aborts all of them, waits at most `graceMs` for the
 * runners to wind down, and reports every lens that had not finished by the
 * deadline as failed. The barrier therefore always settles within
 * `timeoutMs + graceMs`.
 *
 * A lens whose run resolves with a non-zero exit code before the deadline is
 * degraded, not failed: it still reaches the merge with a placeholder
 * artifact.
 */

import { createLogger } from '../../utils/logger.js'
import { errorMessage } from '../../utils/helpers.js'
import type { BarrierResult, LensOutcome, LensRun, LensRunner } from './types.js'

const logger = createLogger('review:barrier')

/** Time granted to aborted runners before the barrier stops waiting */
export const WATCHDOG_GRACE_MS = 5000

export interface JoinBarrierOptions {
  timeoutMs: number
  graceMs?: number
  onStart?: (lens: string) => void
  onSettled?: (outcome: LensOutcome) => void
}

type Settled = { lens: string; run: LensRun } | { lens: string; error: string }

export function degradedArtifact(lens: string, exitCode: number): string {
  return `# Lens: ${lens}\n\nStatus: DEGRADED (exit=${String(exitCode)})\n`
}

export async function runJoinBarrier(
  lenses: readonly string[],
  runner: LensRunner,
  options: JoinBarrierOptions
): Promise<BarrierResult> {
  const started = Date.now()
  const graceMs = options.graceMs ?? WATCHDOG_GRACE_MS
  const controller = new AbortController()
  const finished = new Map<string, Settled>()
  let timedOut = false

  const tasks = lenses.map(async (lens) => {
    options.onStart?.(lens)
    let settled: Settled
    try {
      settled = { lens, run: await runner.run(lens, controller.signal) }
    } catch (err) {
      settled = { lens, error: errorMessage(err) }
    }
    // Anything settling after the deadline is a casualty of the watchdog
    if (!timedOut) finished.set(lens, settled)
  })

  let deadline: NodeJS.Timeout | undefined
  let grace: NodeJS.Timeout | undefined
  const watchdog = new Promise<void>((resolve) => {
    deadline = setTimeout(() => {
      timedOut = true
      logger.error({ timeoutMs: options.timeoutMs }, 'Join barrier timeout; aborting running lenses')
      controller.abort()
      grace = setTimeout(resolve, graceMs)
    }, options.timeoutMs)
  })

  try {
    await Promise.race([Promise.all(tasks), watchdog])
  } finally {
    clearTimeout(deadline)
    clearTimeout(grace)
  }

  const outcomes: LensOutcome[] = []
  const failed: string[] = []
  for (const lens of lenses) {
    const settled = finished.get(lens)
    let outcome: LensOutcome
    if (settled === undefined) {
      outcome = { lens, status: 'failed', exitCode: null, text: '', reason: 'timed out in join barrier' }
      failed.push(lens)
    } else if ('error' in settled) {
      outcome = { lens, status: 'failed', exitCode: null, text: '', reason: `invalid lens handle: ${settled.error}` }
      failed.push(lens)
    } else if (settled.run.exitCode !== 0) {
      outcome = {
        lens,
        status: 'degraded',
        exitCode: settled.run.exitCode,
        text: degradedArtifact(lens, settled.run.exitCode),
      }
    } else {
      outcome = { lens, status: 'ok', exitCode: 0, text: settled.run.artifact }
    }
    outcomes.push(outcome)
    options.onSettled?.(outcome)
  }

  const elapsedMs = Date.now() - started
  if (failed.length > 0) {
    logger.error({ failed, timedOut, elapsedMs }, 'Join barrier finished with failed lenses')
  } else {
    logger.info({ lenses, elapsedMs }, 'Join barrier passed')
  }
  return { outcomes, timedOut, failed, elapsedMs }
}
