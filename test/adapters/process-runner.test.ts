/**
 * Tests for runProcess against small shell commands.
 */

import { describe, it, expect } from 'vitest'
import { runProcess } from '../../src/adapters/process-runner.js'

describe('runProcess', () => {
  it('feeds stdin and collects both streams', async () => {
    const result = await runProcess({
      command: { binary: 'sh', args: ['-c', 'cat; echo err >&2'], cwd: process.cwd(), stdin: 'hello' },
    })

    expect(result.exitCode).toBe(0)
    expect(result.stdout).toBe('hello')
    expect(result.stderr).toBe('err\n')
    expect(result.timedOut).toBe(false)
  })

  it('returns the exit code of a failing command', async () => {
    const result = await runProcess({ command: { binary: 'sh', args: ['-c', 'exit 7'], cwd: process.cwd() } })
    expect(result.exitCode).toBe(7)
  })

  it('reports a missing binary as a spawn error', async () => {
    const result = await runProcess({ command: { binary: 'baton-no-such-binary', args: [], cwd: process.cwd() } })
    expect(result.spawnError).toBe('ENOENT')
    expect(result.exitCode).toBeNull()
  })

  it('terminates a process that outlives its timeout', async () => {
    const result = await runProcess({
      command: { binary: 'sh', args: ['-c', 'exec sleep 5'], cwd: process.cwd() },
      timeoutMs: 100,
    })
    expect(result.timedOut).toBe(true)
    expect(result.durationMs).toBeLessThan(4_000)
  })

  it('terminates on abort', async () => {
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 50)
    const result = await runProcess({
      command: { binary: 'sh', args: ['-c', 'exec sleep 5'], cwd: process.cwd() },
      signal: controller.signal,
    })
    expect(result.aborted).toBe(true)
  })
})
