/**
 * Unit tests for the RequestComposer and context-pack digest.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createRequestComposer, shouldDigest } from '../request-composer.js'
import { digestContextPack, isDigestSection } from '../digest.js'
import { createStateStore } from '../../state-store/file-state-store.js'
import type { StateStore } from '../../state-store/state-store.js'
import type { StageSpec } from '../../../core/types.js'
import { sha256Hex } from '../../../utils/helpers.js'

const stage: StageSpec = {
  stageId: 'codex_impl',
  tool: 'codex',
  role: 'impl',
  phase: 'impl',
  deadlineSec: 0,
  deadlineMode: 'wait_done',
  digestPolicy: 'auto',
}

let taskDir: string
let store: StateStore

beforeEach(async () => {
  taskDir = await mkdtemp(join(tmpdir(), 'baton-compose-'))
  store = createStateStore(taskDir)
})

afterEach(async () => {
  await rm(taskDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// shouldDigest
// ---------------------------------------------------------------------------

describe('shouldDigest', () => {
  it('always digests under aggressive', () => {
    expect(shouldDigest('aggressive', 1, 100)).toBe(true)
  })

  it('digests only above the threshold under auto', () => {
    expect(shouldDigest('auto', 100, 100)).toBe(false)
    expect(shouldDigest('auto', 101, 100)).toBe(true)
  })

  it('never digests under off', () => {
    expect(shouldDigest('off', 1_000_000, 100)).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// compose
// ---------------------------------------------------------------------------

describe('RequestComposer', () => {
  it('frames each part and hashes the payload', async () => {
    const composer = createRequestComposer({ store })
    const result = await composer.compose(stage, 'auto')
    const expected = [
      '--- BEGIN ROLE TEMPLATE ---',
      'Role: impl',
      '--- END ROLE TEMPLATE ---',
      '',
      '--- BEGIN CONTEXT PACK ---',
      '',
      '--- END CONTEXT PACK ---',
      '',
      '--- BEGIN USER REQUEST ---',
      '',
      '--- END USER REQUEST ---',
      '',
    ].join('\n')
    expect(result).toEqual({ prompt: expected, sha256: sha256Hex(expected), digested: false })
  })

  it('reads the role template, shared rules and request from the task', async () => {
    await store.writeText('inputs/shared_rules.md', 'Be terse.')
    await store.writeText('prompts/impl.md', 'Implement the change.')
    await store.writeText('inputs/request.md', 'Add a flag.')
    const { prompt } = await createRequestComposer({ store }).compose(stage, 'auto')

    expect(prompt.startsWith('Be terse.\n\n--- END SHARED RULES ---\n\n--- BEGIN ROLE TEMPLATE ---\nImplement the change.\n')).toBe(
      true
    )
    expect(prompt).toContain('--- BEGIN USER REQUEST ---\nAdd a flag.\n--- END USER REQUEST ---')
  })

  it('replaces a large context pack with its digest', async () => {
    await store.writeText('inputs/context_pack.md', `## Goal\n${'x'.repeat(50)}\n## History\nlong story\n`)
    const composer = createRequestComposer({ store, digestThresholdChars: 20 })
    const result = await composer.compose(stage, 'auto')

    expect(result.digested).toBe(true)
    expect(result.prompt).toContain('# Context Pack Digest (auto-generated)')
    expect(result.prompt).not.toContain('long story')
  })

  it('keeps the raw pack when digesting is off', async () => {
    await store.writeText('inputs/context_pack.md', 'x'.repeat(100))
    const result = await createRequestComposer({ store, digestThresholdChars: 20 }).compose(stage, 'off')
    expect(result.digested).toBe(false)
    expect(result.prompt).toContain(`--- BEGIN CONTEXT PACK ---\n${'x'.repeat(100)}\n--- END CONTEXT PACK ---`)
  })

  it('does not digest an empty pack even under aggressive', async () => {
    expect((await createRequestComposer({ store }).compose(stage, 'aggressive')).digested).toBe(false)
  })
})

// ---------------------------------------------------------------------------
// digest
// ---------------------------------------------------------------------------

describe('digestContextPack', () => {
  it('keeps essential sections cut to the line limit', () => {
    const pack = '# Title\n## Goal\ng1\ng2\n## History\nh\n## Scope\ns'
    expect(digestContextPack(pack, { maxLinesPerSection: 1 })).toBe(
      '# Context Pack Digest (auto-generated)\n\n---\n\n## Goal\ng1\n... [1 lines truncated]\n\n## Scope\ns\n'
    )
  })

  it('falls back to the head of a pack without standard sections', () => {
    expect(digestContextPack('plain\ntext')).toBe(
      '# Context Pack Digest (auto-generated)\n\n---\n\n## (No standard sections found: first 100 lines)\n\nplain\ntext'
    )
  })

  it('adds source and timestamp lines when given', () => {
    const out = digestContextPack('## Goal\ng', { source: 'inputs/context_pack.md', generatedAt: '2026-01-01T00:00:00Z' })
    expect(out.split('\n').slice(0, 3)).toEqual([
      '# Context Pack Digest (auto-generated)',
      'Source: inputs/context_pack.md',
      'Generated: 2026-01-01T00:00:00Z',
    ])
  })
})

describe('isDigestSection', () => {
  it('matches numbered and plural headings', () => {
    expect(isDigestSection('1. Goal')).toBe(true)
    expect(isDigestSection('Non-goals')).toBe(true)
    expect(isDigestSection('Files to read')).toBe(true)
    expect(isDigestSection('Notes')).toBe(false)
  })
})
