/**
 * Unit tests for FileStateStore and the atomic primitives.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, readdir, readFile, rm, utimes, writeFile, mkdir } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { z } from 'zod'
import { FileStateStore, createStateStore } from '../file-state-store.js'
import { KeyedMutex, atomicWriteFile, withFileLock } from '../atomic.js'
import { StateStoreError } from '../../../core/errors.js'
import type { StageMeta } from '../schemas.js'

let taskDir: string

beforeEach(async () => {
  taskDir = await mkdtemp(join(tmpdir(), 'baton-state-'))
})

afterEach(async () => {
  await rm(taskDir, { recursive: true, force: true })
})

// ---------------------------------------------------------------------------
// atomic primitives
// ---------------------------------------------------------------------------

describe('atomicWriteFile', () => {
  it('creates parent directories and leaves no partial file behind', async () => {
    const path = join(taskDir, 'a', 'b', 'file.txt')
    await atomicWriteFile(path, 'hello')
    expect(await readFile(path, 'utf-8')).toBe('hello')
    expect(await readdir(join(taskDir, 'a', 'b'))).toEqual(['file.txt'])
  })
})

describe('KeyedMutex', () => {
  it('serializes sections that share a key', async () => {
    const mutex = new KeyedMutex()
    const order: string[] = []
    const slow = mutex.run('k', async () => {
      order.push('slow:start')
      await new Promise((r) => setTimeout(r, 20))
      order.push('slow:end')
    })
    const fast = mutex.run('k', async () => {
      order.push('fast')
    })
    await Promise.all([slow, fast])
    expect(order).toEqual(['slow:start', 'slow:end', 'fast'])
  })

  it('releases the key when a section throws', async () => {
    const mutex = new KeyedMutex()
    await expect(mutex.run('k', () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    expect(await mutex.run('k', () => Promise.resolve(42))).toBe(42)
  })
})

describe('withFileLock', () => {
  it('removes the lock file after the section', async () => {
    const path = join(taskDir, 'stats.json')
    await withFileLock(path, () => Promise.resolve())
    expect(await readdir(taskDir)).toEqual([])
  })

  it('times out while another holder keeps the lock', async () => {
    const path = join(taskDir, 'stats.json')
    await writeFile(`${path}.lock`, '1')
    await expect(withFileLock(path, () => Promise.resolve(), 60)).rejects.toThrow(StateStoreError)
  })

  it('breaks a stale lock', async () => {
    const path = join(taskDir, 'stats.json')
    await writeFile(`${path}.lock`, '1')
    const old = new Date(Date.now() - 60_000)
    await utimes(`${path}.lock`, old, old)
    expect(await withFileLock(path, () => Promise.resolve('ran'), 60)).toBe('ran')
  })
})

// ---------------------------------------------------------------------------
// Stats
// ---------------------------------------------------------------------------

describe('FileStateStore - stats', () => {
  it('returns empty stats for a fresh task', async () => {
    const store = createStateStore(taskDir)
    expect(await store.readStats()).toEqual({ paid_calls_used: 0, stages_completed: [], signatures: {} })
  })

  it('loses no increments under concurrent updates', async () => {
    const a = createStateStore(taskDir)
    const b = createStateStore(taskDir)
    await Promise.all(
      Array.from({ length: 20 }, (_, i) =>
        (i % 2 === 0 ? a : b).updateStats((s) => ({ ...s, paid_calls_used: s.paid_calls_used + 1 }))
      )
    )
    expect((await a.readStats()).paid_calls_used).toBe(20)
  })

  it('fills defaults for older stats documents', async () => {
    await mkdir(join(taskDir, 'state'), { recursive: true })
    await writeFile(join(taskDir, 'state', 'stats.json'), '{"paid_calls_used": 3}')
    expect(await createStateStore(taskDir).readStats()).toEqual({
      paid_calls_used: 3,
      stages_completed: [],
      signatures: {},
    })
  })

  it('rejects a corrupt stats file', async () => {
    await mkdir(join(taskDir, 'state'), { recursive: true })
    await writeFile(join(taskDir, 'state', 'stats.json'), '{not json')
    await expect(createStateStore(taskDir).readStats()).rejects.toThrow(/Corrupt JSON in state\/stats.json/)
  })

  it('rejects a stats file with the wrong shape', async () => {
    await mkdir(join(taskDir, 'state'), { recursive: true })
    await writeFile(join(taskDir, 'state', 'stats.json'), '{"paid_calls_used": -1}')
    await expect(createStateStore(taskDir).readStats()).rejects.toThrow(/Invalid record in state\/stats.json/)
  })
})

// ---------------------------------------------------------------------------
// Done markers and stage records
// ---------------------------------------------------------------------------

describe('FileStateStore - stage records', () => {
  const meta: StageMeta = {
    stage: 'codex_impl',
    tool: 'codex',
    role: 'impl',
    attempt: 1,
    exit_code: 0,
    status: 'ok',
    start: '2026-01-01T00:00:00.000Z',
    end: '2026-01-01T00:00:05.000Z',
    duration_sec: 5,
    prompt_sha256: 'abc',
    session_id: null,
  }

  it('writes, detects and clears done markers', async () => {
    const store = createStateStore(taskDir)
    expect(await store.hasDoneMarker('codex_impl')).toBe(false)
    await store.writeDoneMarker('codex_impl')
    expect(await store.hasDoneMarker('codex_impl')).toBe(true)
    await store.clearDoneMarker('codex_impl')
    expect(await store.hasDoneMarker('codex_impl')).toBe(false)
  })

  it('refuses stage ids that would escape the task directory', async () => {
    const store = createStateStore(taskDir)
    await expect(store.writeDoneMarker('../evil')).rejects.toThrow(StateStoreError)
  })

  it('round-trips stage meta under outputs/', async () => {
    const store = createStateStore(taskDir)
    await store.writeStageMeta(meta)
    expect(await store.readStageMeta('codex_impl', 'codex')).toEqual(meta)
    expect(await readdir(join(taskDir, 'outputs'))).toEqual(['codex_impl.codex.meta.json'])
  })

  it('stores artifact and diagnostics side by side', async () => {
    const store = createStateStore(taskDir)
    expect(await store.readStageOutput('codex_impl', 'codex')).toBeNull()
    await store.writeStageOutput('codex_impl', 'codex', { artifact: 'out', diagnostics: 'err' })
    expect(await store.readStageOutput('codex_impl', 'codex')).toEqual({ artifact: 'out', diagnostics: 'err' })
    expect(await readFile(join(taskDir, 'outputs', 'codex_impl.codex.err'), 'utf-8')).toBe('err')
  })
})

// ---------------------------------------------------------------------------
// Session events
// ---------------------------------------------------------------------------

describe('FileStateStore - session events', () => {
  it('appends events and skips malformed lines on read', async () => {
    const store = new FileStateStore(taskDir)
    const event = {
      timestamp: '2026-01-01T00:00:00.000Z',
      event: 'session_saved',
      phase: 'impl',
      tool: 'codex',
      stage: 'codex_impl',
      status: 'ok',
      details: '',
    }
    await store.appendSessionEvent(event)
    await writeFile(store.resolve('state/session-events.jsonl'), '{broken\n{"event":"partial"}\n', { flag: 'a' })
    await store.appendSessionEvent({ ...event, event: 'session_resumed' })

    expect((await store.readSessionEvents()).map((e) => e.event)).toEqual(['session_saved', 'session_resumed'])
  })
})

// ---------------------------------------------------------------------------
// Free-form JSON
// ---------------------------------------------------------------------------

describe('FileStateStore - readJson', () => {
  it('returns null for a missing file', async () => {
    expect(await createStateStore(taskDir).readJson('review/x.json', z.object({}))).toBeNull()
  })

  it('validates against the caller schema', async () => {
    const store = createStateStore(taskDir)
    await store.writeJson('review/x.json', { n: 1 })
    expect(await store.readJson('review/x.json', z.object({ n: z.number() }))).toEqual({ n: 1 })
    await expect(store.readJson('review/x.json', z.object({ n: z.string() }))).rejects.toThrow(StateStoreError)
  })
})
