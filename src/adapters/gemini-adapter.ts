/**
 * Gemini CLI adapter
 *
 * Binary: `gemini`
 * Output format: `--output-format stream-json`; the `init` event carries
 * the session id, assistant `message` events carry the reply.
 */

import type { SpawnCommand, SessionIdSource, ToolExitStatus, ToolRequest } from './types.js'
import {
  CliToolAdapter,
  parseJsonLines,
  stringField,
  type CliToolAdapterOptions,
  type ParsedOutput,
} from './cli-tool-adapter.js'

/** Gemini CLI exit code for rejected input */
const GEMINI_INPUT_ERROR = 42

export class GeminiCLIAdapter extends CliToolAdapter {
  readonly id = 'gemini'
  readonly displayName = 'Gemini CLI'
  protected readonly idSource: SessionIdSource = 'stream_json_init'
  protected readonly probeArgs = ['--help']
  protected readonly resumeMarker = /--resume/

  constructor(options: CliToolAdapterOptions = {}) {
    super('gemini', options)
  }

  buildCommand(request: ToolRequest): SpawnCommand {
    const args = ['--output-format', 'stream-json']
    if (request.model !== undefined) args.push('--model', request.model)
    if (request.resumeSessionId !== undefined) args.push('--resume', request.resumeSessionId)
    args.push(...this._extraArgs)
    return { binary: this._binary, args, cwd: request.cwd, stdin: request.prompt }
  }

  parseOutput(stdout: string): ParsedOutput {
    const events = parseJsonLines(stdout)
    if (events.length === 0) return { artifact: stdout }

    let sessionId: string | undefined
    const parts: string[] = []
    for (const event of events) {
      const type = stringField(event, 'type')
      if (type === 'init') {
        sessionId = stringField(event, 'session_id') ?? sessionId
      } else if (type === 'message' && stringField(event, 'role') === 'assistant') {
        parts.push(stringField(event, 'content') ?? '')
      }
    }
    const artifact = parts.join('')
    return sessionId !== undefined ? { artifact, sessionId } : { artifact }
  }

  protected override mapExitCode(code: number): ToolExitStatus {
    return code === GEMINI_INPUT_ERROR ? 'input_too_large' : 'general_failure'
  }
}
