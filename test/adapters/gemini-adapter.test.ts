/**
 * Tests for GeminiCLIAdapter
 */

import { describe, it, expect } from 'vitest'
import { GeminiCLIAdapter } from '../../src/adapters/gemini-adapter.js'
import type { ToolRequest } from '../../src/adapters/types.js'
import { fakeRunner } from '../helpers/fake-runner.js'

const base: ToolRequest = {
  stageId: 'gemini_test_design',
  prompt: 'design tests',
  deadlineSec: 0,
  deadlineMode: 'wait_done',
  cwd: '/work',
}

describe('GeminiCLIAdapter', () => {
  it('builds a stream-json call', () => {
    const command = new GeminiCLIAdapter({ extraArgs: ['--yolo'] }).buildCommand({ ...base, model: 'gemini-pro' })
    expect(command.args).toEqual(['--output-format', 'stream-json', '--model', 'gemini-pro', '--yolo'])
  })

  it('joins assistant messages and reads the init session id', () => {
    const stdout = [
      JSON.stringify({ type: 'init', session_id: 'g-1' }),
      JSON.stringify({ type: 'message', role: 'user', content: 'design tests' }),
      JSON.stringify({ type: 'message', role: 'assistant', content: 'part one, ' }),
      JSON.stringify({ type: 'message', role: 'assistant', content: 'part two' }),
    ].join('\n')

    expect(new GeminiCLIAdapter().parseOutput(stdout)).toEqual({ artifact: 'part one, part two', sessionId: 'g-1' })
  })

  it('maps exit code 42 to input_too_large', async () => {
    const fake = fakeRunner({ exitCode: 42, stderr: 'input rejected' })
    const response = await new GeminiCLIAdapter({ runner: fake.runner }).invoke(base)

    expect(response.status).toBe('input_too_large')
    expect(response.exitCode).toBe(14)
    expect(response.rawExitCode).toBe(42)
  })

  it('maps other non-zero exits to a general failure', async () => {
    const fake = fakeRunner({ exitCode: 1 })
    const response = await new GeminiCLIAdapter({ runner: fake.runner }).invoke(base)
    expect(response.status).toBe('general_failure')
  })
})
