/**
 * Unit tests for ReviewStageExecutor and the review summary renderer.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createReviewStageExecutor, PARALLEL_REVIEW_ROLE } from '../review-stage.js'
import { renderReviewSummary } from '../review-summary.js'
import { mergeFindings } from '../finding-parser.js'
import { REVIEW_PATHS } from '../paths.js'
import type { ReviewResult } from '../types.js'
import { createStateStore } from '../../state-store/file-state-store.js'
import type { StateStore } from '../../state-store/state-store.js'
import type { StageResult } from '../../stage-executor/types.js'
import type { StageSpec } from '../../../core/types.js'

let taskDir: string
let store: StateStore

beforeEach(async () => {
  taskDir = await mkdtemp(join(tmpdir(), 'baton-review-stage-'))
  store = createStateStore(taskDir)
})

afterEach(async () => {
  await rm(taskDir, { recursive: true, force: true })
})

function stage(role: string): StageSpec {
  return {
    stageId: `codex_${role}`,
    tool: 'codex',
    role,
    phase: 'impl',
    deadlineSec: 0,
    deadlineMode: 'wait_done',
    digestPolicy: 'auto',
  }
}

const EMPTY_BARRIER = { outcomes: [], timedOut: false, failed: [], elapsedMs: 0 }

function reviewResult(overrides: Partial<ReviewResult> = {}): ReviewResult {
  return {
    status: 'completed',
    barrier: {
      outcomes: [
        { lens: 'correctness', status: 'ok', exitCode: 0, text: '' },
        { lens: 'security', status: 'ok', exitCode: 0, text: '' },
      ],
      timedOut: false,
      failed: [],
      elapsedMs: 5,
    },
    merge: mergeFindings([]),
    queue: [],
    ...overrides,
  }
}

function harness(result: ReviewResult) {
  const inner = {
    execute: vi.fn(
      (stage: StageSpec): Promise<StageResult> =>
        Promise.resolve({ stageId: stage.stageId, tool: stage.tool, status: 'done', artifact: 'inner', attempts: 1 })
    ),
  }
  const review = vi.fn(async () => {
    await store.writeText(REVIEW_PATHS.summary, '# Parallel Review Summary\n')
    return result
  })
  const createCoordinator = vi.fn((_stage: StageSpec) => Promise.resolve({ review }))
  const executor = createReviewStageExecutor({
    inner,
    store,
    createCoordinator,
    now: () => new Date('2026-01-01T00:00:00.000Z'),
  })
  return { executor, inner, review, createCoordinator }
}

describe('ReviewStageExecutor', () => {
  it('delegates other roles to the wrapped executor', async () => {
    const { executor, inner, createCoordinator } = harness(reviewResult())
    const result = await executor.execute(stage('impl'))
    expect(result.artifact).toBe('inner')
    expect(inner.execute).toHaveBeenCalledTimes(1)
    expect(createCoordinator).not.toHaveBeenCalled()
  })

  it('marks a completed review done and skips it afterwards', async () => {
    const { executor, review } = harness(reviewResult())
    const first = await executor.execute(stage(PARALLEL_REVIEW_ROLE))

    expect(first).toEqual({
      stageId: 'codex_parallel_review',
      tool: 'codex',
      status: 'done',
      artifact: '# Parallel Review Summary\n',
      attempts: 2,
    })
    expect(await store.hasDoneMarker('codex_parallel_review')).toBe(true)
    expect((await store.readStats()).stages_completed).toEqual(['codex_parallel_review'])

    const second = await executor.execute(stage(PARALLEL_REVIEW_ROLE))
    expect(second.status).toBe('skipped')
    expect(second.attempts).toBe(0)
    expect(review).toHaveBeenCalledTimes(1)
  })

  it('turns a critical stop into a manual re-route failure', async () => {
    const { executor } = harness(
      reviewResult({ status: 'stopped', code: 'security_critical', reason: 'critical security finding' })
    )
    const result = await executor.execute(stage(PARALLEL_REVIEW_ROLE))

    expect(result.status).toBe('failed')
    expect(result.failure?.errorClass).toBe('security_critical')
    expect(result.failure?.manualReroute).toBe(true)
    expect(await store.hasDoneMarker('codex_parallel_review')).toBe(false)

    const lastFailure = await store.readLastFailure()
    expect(lastFailure).toMatchObject({
      stage: 'codex_parallel_review',
      class: 'security_critical',
      retry_decision: 'stop',
      manual_reroute: true,
      stderr_excerpt: 'critical security finding',
      timestamp: '2026-01-01T00:00:00Z',
    })
  })

  it('maps barrier and budget failures', async () => {
    const barrier = await harness(reviewResult({ status: 'failed', code: 'join_barrier' })).executor.execute(
      stage(PARALLEL_REVIEW_ROLE)
    )
    expect(barrier.failure?.errorClass).toBe('join_barrier')
    expect(barrier.failure?.reason).toBe('review failed')

    const budget = await harness(
      reviewResult({ status: 'failed', code: 'budget_exhausted', barrier: EMPTY_BARRIER, reason: 'spent' })
    ).executor.execute(stage('parallel_review'))
    expect(budget.failure?.errorClass).toBe('budget_exhausted')
    expect(budget.attempts).toBe(0)
  })
})

// ---------------------------------------------------------------------------
// renderReviewSummary
// ---------------------------------------------------------------------------

describe('renderReviewSummary', () => {
  it('renders lenses, merge counts, the queue and the gate', () => {
    const content = renderReviewSummary({
      barrier: {
        outcomes: [
          { lens: 'correctness', status: 'ok', exitCode: 0, text: 'x' },
          { lens: 'maintainability', status: 'degraded', exitCode: 3, text: 'y' },
          { lens: 'security', status: 'failed', exitCode: null, text: '', reason: 'timed out in join barrier' },
        ],
        timedOut: true,
        failed: ['security'],
        elapsedMs: 10,
      },
      merge: mergeFindings([{ lens: 'correctness', text: '- src/a.ts L3 missing null guard here' }]),
      queue: [
        {
          queue_id: 'Q001',
          finding_id: 'F001',
          target_file: 'src/a.ts',
          target_location: 'L3',
          action: 'a',
          priority: 4,
          status: 'skipped',
        },
      ],
      security: undefined,
      generatedAt: 'G',
    })

    expect(content).toBe(
      [
        '# Parallel Review Summary',
        '',
        'Generated: G',
        '',
        '## Lenses',
        '',
        '- correctness: ok',
        '- maintainability: degraded (exit=3)',
        '- security: failed (timed out in join barrier)',
        '',
        'Join barrier timed out.',
        '',
        '## Merge',
        '',
        '- findings: 1',
        '- dedup_removed: 0',
        '- conflict_resolved: 0',
        '',
        '## Fix Queue',
        '',
        '- Q001 [P4] F001 src/a.ts: skipped',
        '',
        '## Security Gate',
        '',
        'Not run.',
      ].join('\n') + '\n'
    )
  })

  it('renders the gate outcome', () => {
    const content = renderReviewSummary({
      barrier: EMPTY_BARRIER,
      merge: mergeFindings([]),
      queue: [],
      security: {
        outcome: 'critical_stop',
        result: {
          enabled: true,
          mode: 'on',
          final_severity: 'critical',
          stop_action: 'STOP_AND_CONFIRM',
          rounds_run: 0,
          critical_findings: ['rce'],
          high_findings_remaining: [],
          timestamp: 'T',
        },
      },
      generatedAt: 'G',
    })
    expect(content).toContain('No fixes queued.')
    expect(content).toContain('- outcome: critical_stop\n- final_severity: critical\n- rounds_run: 0\n- stop_action: STOP_AND_CONFIRM\n')
  })
})
