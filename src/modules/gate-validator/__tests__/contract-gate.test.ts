/**
 * Unit tests for ContractGate
 */

import { describe, it, expect } from 'vitest'
import { changedFiles, createContractGate, scopeViolations } from '../contract-gate.js'

function fencedDiff(file: string): string {
  return ['```diff', `--- a/${file}`, `+++ b/${file}`, '@@ -1 +1 @@', '-old', '+new', '```'].join('\n')
}

// ---------------------------------------------------------------------------
// Diff helpers
// ---------------------------------------------------------------------------

describe('changedFiles', () => {
  it('collects each touched path once, without a/ b/ prefixes', () => {
    expect(changedFiles('--- a/src/x.ts\n+++ b/src/x.ts\n--- a/y.ts\n+++ b/y.ts\n')).toEqual(['src/x.ts', 'y.ts'])
  })

  it('skips /dev/null for created files', () => {
    expect(changedFiles('--- /dev/null\n+++ b/new.ts\n')).toEqual(['new.ts'])
  })
})

describe('scopeViolations', () => {
  it('matches rules on path segments, not string prefixes', () => {
    expect(scopeViolations(['srcx/a.ts'], { allow: ['src'], deny: [] })).toEqual([
      "Scope violation: file 'srcx/a.ts' is outside scope.allow",
    ])
    expect(scopeViolations(['src/a.ts'], { allow: ['./src/'], deny: [] })).toEqual([])
  })

  it('reports deny matches with the normalized rule', () => {
    expect(scopeViolations(['secrets/key.txt'], { allow: [], deny: ['secrets/'] })).toEqual([
      "Scope violation: file 'secrets/key.txt' matches deny path 'secrets'",
    ])
  })
})

// ---------------------------------------------------------------------------
// ContractGate
// ---------------------------------------------------------------------------

describe('ContractGate', () => {
  it('fails an empty artifact', async () => {
    const gate = createContractGate()
    expect(await gate.validate({ stageId: 's', role: 'impl', artifact: '  \n' })).toEqual({
      pass: false,
      violation: 'contract_violation',
      reasons: ['impl: Output is empty'],
    })
  })

  it('passes any non-empty artifact for a role without a contract', async () => {
    const gate = createContractGate()
    expect(await gate.validate({ stageId: 's', role: 'notes', artifact: 'anything' })).toEqual({
      pass: true,
      reasons: [],
    })
  })

  it('lists every missing section', async () => {
    const gate = createContractGate()
    const result = await gate.validate({ stageId: 's', role: 'review', artifact: '## FINDINGS\nnone\n' })
    expect(result.violation).toBe('contract_violation')
    expect(result.reasons).toEqual([
      "review: Missing required section: '## Test gaps'",
      "review: Missing required section: '## Breaking changes'",
      "review: Missing required section: '## Minimal fix'",
    ])
  })

  it('enforces the minimum line count', async () => {
    const gate = createContractGate()
    const result = await gate.validate({ stageId: 's', role: 'test_design', artifact: 'a\n\nb\nc\n' })
    expect(result.reasons).toEqual(['test_design: Output too short (3 lines < 10 minimum)'])
  })

  it('requires a diff for diff-emitting roles', async () => {
    const gate = createContractGate()
    const result = await gate.validate({ stageId: 's', role: 'impl', artifact: 'I changed things.' })
    expect(result.reasons).toEqual([
      'impl: Output does not contain a unified diff (missing ---, +++ or @@ markers)',
    ])
  })

  it('accepts an explicit no-change marker instead of a diff', async () => {
    const gate = createContractGate()
    expect((await gate.validate({ stageId: 's', role: 'impl', artifact: 'No changes required.' })).pass).toBe(true)
  })

  it('accepts a fenced diff inside scope', async () => {
    const gate = createContractGate({ scope: { allow: ['src'], deny: [] } })
    const result = await gate.validate({ stageId: 's', role: 'impl', artifact: `Done.\n\n${fencedDiff('src/a.ts')}\n` })
    expect(result).toEqual({ pass: true, reasons: [] })
  })

  it('reports scope failures ahead of contract failures', async () => {
    const gate = createContractGate({ scope: { allow: [], deny: ['secrets'] } })
    const result = await gate.validate({
      stageId: 's',
      role: 'test_impl',
      artifact: `## Unified Diff\n${fencedDiff('secrets/key.txt')}\n`,
    })
    expect(result.violation).toBe('scope_violation')
    expect(result.reasons).toEqual([
      "Scope violation: file 'secrets/key.txt' matches deny path 'secrets'",
      "test_impl: Missing required section: '## Added or Updated Tests'",
      "test_impl: Missing required section: '## Rationale'",
    ])
  })

  it('lets configured contracts replace the built-in ones', async () => {
    const gate = createContractGate({
      contracts: { review: { requiredSections: ['## Verdict'], minLines: 0, expectsDiff: false } },
    })
    expect((await gate.validate({ stageId: 's', role: 'review', artifact: '## Verdict\nok' })).pass).toBe(true)
  })
})
