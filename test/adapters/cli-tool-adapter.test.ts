/**
 * Tests for the shared CliToolAdapter behaviour: input checks, exit-status
 * normalization and probing. Codex is used as the concrete dialect.
 */

import { describe, it, expect } from 'vitest'
import { CodexCLIAdapter } from '../../src/adapters/codex-adapter.js'
import { parseJsonLines, stringField, type ProbeExec } from '../../src/adapters/cli-tool-adapter.js'
import type { ToolRequest } from '../../src/adapters/types.js'
import { fakeRunner } from '../helpers/fake-runner.js'

function request(overrides: Partial<ToolRequest> = {}): ToolRequest {
  return {
    stageId: 'codex_impl',
    prompt: 'implement the brief',
    deadlineSec: 30,
    deadlineMode: 'enforce',
    cwd: '/work',
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

describe('parseJsonLines', () => {
  it('keeps JSON objects and skips everything else', () => {
    const stdout = ['log line', '{"type":"a"}', '[1,2]', '{broken', '  {"type":"b"}  ', ''].join('\n')
    expect(parseJsonLines(stdout)).toEqual([{ type: 'a' }, { type: 'b' }])
  })
})

describe('stringField', () => {
  it('returns strings only', () => {
    expect(stringField({ a: 'x', b: 1 }, 'a')).toBe('x')
    expect(stringField({ a: 'x', b: 1 }, 'b')).toBeUndefined()
  })
})

// ---------------------------------------------------------------------------
// invoke
// ---------------------------------------------------------------------------

describe('CliToolAdapter.invoke', () => {
  it('refuses an empty prompt without spawning', async () => {
    const fake = fakeRunner()
    const adapter = new CodexCLIAdapter({ runner: fake.runner })

    const response = await adapter.invoke(request({ prompt: '  \n' }))

    expect(response).toEqual({
      artifact: '',
      diagnostics: 'prompt payload is empty',
      status: 'missing_input',
      exitCode: 2,
      rawExitCode: null,
    })
    expect(fake.requests).toHaveLength(0)
  })

  it('refuses a prompt over the byte limit', async () => {
    const fake = fakeRunner()
    const adapter = new CodexCLIAdapter({ runner: fake.runner, maxPromptBytes: 4 })

    const response = await adapter.invoke(request({ prompt: 'hello' }))

    expect(response.status).toBe('input_too_large')
    expect(response.exitCode).toBe(14)
    expect(response.diagnostics).toBe('prompt is 5 bytes; codex accepts at most 4')
    expect(fake.requests).toHaveLength(0)
  })

  it('passes the deadline as a timeout in enforce mode', async () => {
    const fake = fakeRunner()
    await new CodexCLIAdapter({ runner: fake.runner }).invoke(request())
    expect(fake.requests[0]?.timeoutMs).toBe(30_000)
  })

  it('passes no timeout in wait_done mode', async () => {
    const fake = fakeRunner()
    await new CodexCLIAdapter({ runner: fake.runner }).invoke(request({ deadlineMode: 'wait_done' }))
    expect(fake.requests[0]).not.toHaveProperty('timeoutMs')
  })

  it('maps a missing binary', async () => {
    const fake = fakeRunner({ exitCode: null, spawnError: 'ENOENT' })
    const response = await new CodexCLIAdapter({ runner: fake.runner, binary: 'codex-nope' }).invoke(request())

    expect(response.status).toBe('missing_binary')
    expect(response.exitCode).toBe(10)
    expect(response.diagnostics).toBe('codex-nope: command not found (ENOENT)')
  })

  it('maps other spawn errors to a general failure', async () => {
    const fake = fakeRunner({ exitCode: null, spawnError: 'EACCES' })
    const response = await new CodexCLIAdapter({ runner: fake.runner }).invoke(request())

    expect(response.status).toBe('general_failure')
    expect(response.diagnostics).toBe('codex: failed to start (EACCES)')
  })

  it('reports a deadline overrun as a timeout', async () => {
    const fake = fakeRunner({ exitCode: null, stderr: 'partial', timedOut: true })
    const response = await new CodexCLIAdapter({ runner: fake.runner }).invoke(request())

    expect(response).toEqual({
      artifact: '',
      diagnostics: 'partial\n[codex] timeout: exceeded 30s deadline',
      status: 'timeout',
      exitCode: 124,
      rawExitCode: null,
    })
  })

  it('reports cancellation as a timeout', async () => {
    const fake = fakeRunner({ exitCode: null, aborted: true })
    const response = await new CodexCLIAdapter({ runner: fake.runner }).invoke(request(), new AbortController().signal)

    expect(response.status).toBe('timeout')
    expect(response.diagnostics).toBe('[codex] timeout: cancelled')
    expect(fake.requests[0]?.signal).toBeDefined()
  })

  it('maps a non-zero exit to a general failure and keeps the raw code', async () => {
    const fake = fakeRunner({ exitCode: 3, stdout: 'oops', stderr: 'bad flag' })
    const response = await new CodexCLIAdapter({ runner: fake.runner }).invoke(request())

    expect(response).toEqual({
      artifact: 'oops',
      diagnostics: 'bad flag',
      status: 'general_failure',
      exitCode: 12,
      rawExitCode: 3,
    })
  })
})

// ---------------------------------------------------------------------------
// probe
// ---------------------------------------------------------------------------

describe('CliToolAdapter.probe', () => {
  const binary = '/opt/tools/codex'

  it('reports resume support when the help text mentions it', async () => {
    const probeExec: ProbeExec = async () => ({ stdout: 'Commands:\n  resume  Resume a session', stderr: '' })
    const result = await new CodexCLIAdapter({ binary, probeExec }).probe()

    expect(result).toEqual({
      resumeSupported: true,
      idSource: 'thread_started',
      binaryFound: true,
      binaryPath: binary,
      notes: '',
    })
  })

  it('reports no resume support when the marker is absent', async () => {
    const probeExec: ProbeExec = async () => ({ stdout: 'Usage: codex exec', stderr: '' })
    const result = await new CodexCLIAdapter({ binary, probeExec }).probe()

    expect(result.resumeSupported).toBe(false)
    expect(result.idSource).toBe('unknown')
    expect(result.notes).toBe('resume support not advertised by /opt/tools/codex exec --help')
  })

  it('reports a missing binary', async () => {
    const probeExec: ProbeExec = async () => {
      throw Object.assign(new Error('spawn codex ENOENT'), { code: 'ENOENT' })
    }
    const result = await new CodexCLIAdapter({ binary, probeExec }).probe()

    expect(result).toEqual({
      resumeSupported: false,
      idSource: 'unknown',
      binaryFound: false,
      binaryPath: '',
      notes: '/opt/tools/codex binary not found in PATH',
    })
  })

  it('reads help text printed by a command that exits non-zero', async () => {
    const probeExec: ProbeExec = async () => {
      throw Object.assign(new Error('exit 1'), { code: 1, stdout: '', stderr: 'codex exec resume <id>' })
    }
    const result = await new CodexCLIAdapter({ binary, probeExec }).probe()
    expect(result.resumeSupported).toBe(true)
  })

  it('reports a failing probe with no output', async () => {
    const probeExec: ProbeExec = async () => {
      throw new Error('exit 1')
    }
    const result = await new CodexCLIAdapter({ binary, probeExec }).probe()

    expect(result.binaryFound).toBe(true)
    expect(result.notes).toBe('/opt/tools/codex exec --help returned non-zero')
  })
})
