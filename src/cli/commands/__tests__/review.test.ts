/**
 * Unit tests for the `baton review` command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { runReviewAction, type ReviewActionOptions } from '../review.js'
import { AdapterRegistry } from '../../../adapters/adapter-registry.js'
import { FakeAdapter, type FakeReply } from '../../../../test/helpers/fake-adapter.js'
import { captureOutput, createTestProject, type TestProject } from '../../../../test/helpers/cli-harness.js'

let project: TestProject

beforeEach(async () => {
  project = await createTestProject('review-cmd')
})

afterEach(async () => {
  vi.restoreAllMocks()
  await project.cleanup()
})

function options(replies: FakeReply[], overrides: Partial<ReviewActionOptions> = {}) {
  const adapter = new FakeAdapter('codex', replies)
  const registry = new AdapterRegistry()
  registry.register(adapter)
  const opts: ReviewActionOptions = {
    task: 't1',
    outputFormat: 'human',
    projectRoot: project.root,
    projectConfigDir: project.projectConfigDir,
    globalConfigDir: project.globalConfigDir,
    env: project.env,
    registry,
    graceMs: 10,
    ...overrides,
  }
  return { adapter, opts }
}

describe('runReviewAction', () => {
  it('reviews, applies the fix queue and exits 0', async () => {
    await project.writeConfig({
      review: { tool: 'codex', fix_tool: 'codex', lenses: ['correctness'], security_mode: 'off', timeout_sec: 5 },
    })
    const out = captureOutput()
    const { adapter, opts } = options([{ artifact: '- src/app.ts:3 off-by-one in the pagination loop' }, { artifact: 'patched' }])

    expect(await runReviewAction(opts)).toBe(0)
    expect(out.stdout()).toBe(
      [
        '  lens correctness: ok',
        '  findings: 1 (dedup removed 0, conflicts resolved 0)',
        '  fixes applied: 1 of 1',
        'Review completed',
        '',
      ].join('\n')
    )
    expect(adapter.requests.map((r) => r.stageId)).toEqual(['review_correctness', 'review_fix_Q001'])
  })

  it('takes lens and security overrides from the options', async () => {
    await project.writeConfig({ review: { timeout_sec: 5 } })
    captureOutput()
    const { adapter, opts } = options([{ artifact: '- src/app.ts:3 minor naming nit here' }], {
      lenses: ['maintainability'],
      securityMode: 'off',
    })

    expect(await runReviewAction(opts)).toBe(0)
    expect(adapter.requests.map((r) => r.stageId)).toEqual(['review_maintainability'])
  })

  it('exits 3 on a critical security finding', async () => {
    await project.writeConfig({ review: { lenses: ['security'], security_mode: 'on', timeout_sec: 5 } })
    const out = captureOutput()
    const { opts } = options([{ artifact: '- src/shell.ts critical command injection via exec' }])

    expect(await runReviewAction(opts)).toBe(3)
    expect(out.stdout()).toContain('  security: critical_stop (final severity critical)\n')
    expect(out.stdout()).toContain(
      'Review stopped: critical security finding requires human confirmation (STOP_AND_CONFIRM)\n'
    )
  })

  it('exits 1 when a lens cannot run', async () => {
    await project.writeConfig({ review: { lenses: ['correctness'], security_mode: 'off', timeout_sec: 5 } })
    const out = captureOutput()
    const { opts } = options([() => Promise.reject(new Error('spawn ENOENT'))])

    expect(await runReviewAction(opts)).toBe(1)
    expect(out.stdout()).toContain('  lens correctness: failed\n')
    expect(out.stdout()).toContain('Review failed: join barrier failed for lenses: correctness\n')
  })

  it('treats an unknown tool as a usage error', async () => {
    const out = captureOutput()
    const { opts } = options([], { tool: 'nope' })
    expect(await runReviewAction(opts)).toBe(2)
    expect(out.stderr().startsWith('Error: ')).toBe(true)
  })

  it('writes a JSON result', async () => {
    await project.writeConfig({ review: { lenses: ['correctness'], security_mode: 'off', timeout_sec: 5 } })
    const out = captureOutput()
    const { opts } = options([{ artifact: '- src/app.ts:3 off-by-one in the pagination loop' }], { outputFormat: 'json' })

    expect(await runReviewAction(opts)).toBe(0)
    const parsed: unknown = JSON.parse(out.stdout())
    expect(parsed).toMatchObject({ status: 'completed', queue: [{ queue_id: 'Q001', status: 'skipped' }] })
  })
})
