/**
 * Claude CLI adapter
 *
 * Binary: `claude`
 * Execution: `claude -p --output-format stream-json --verbose` with the
 * prompt on stdin. The `system/init` event carries the session id and the
 * final `result` event carries the reply.
 */

import type { SpawnCommand, SessionIdSource, ToolRequest } from './types.js'
import {
  CliToolAdapter,
  parseJsonLines,
  stringField,
  type CliToolAdapterOptions,
  type ParsedOutput,
} from './cli-tool-adapter.js'

export class ClaudeCLIAdapter extends CliToolAdapter {
  readonly id = 'claude'
  readonly displayName = 'Claude CLI'
  protected readonly idSource: SessionIdSource = 'stream_json_init'
  protected readonly probeArgs = ['--help']
  protected readonly resumeMarker = /--resume/

  constructor(options: CliToolAdapterOptions = {}) {
    super('claude', options)
  }

  buildCommand(request: ToolRequest): SpawnCommand {
    const args = ['-p', '--output-format', 'stream-json', '--verbose']
    if (request.model !== undefined) args.push('--model', request.model)
    if (request.resumeSessionId !== undefined) args.push('--resume', request.resumeSessionId)
    args.push(...this._extraArgs)
    return { binary: this._binary, args, cwd: request.cwd, stdin: request.prompt }
  }

  parseOutput(stdout: string): ParsedOutput {
    const events = parseJsonLines(stdout)
    if (events.length === 0) return { artifact: stdout }

    let sessionId: string | undefined
    let artifact = ''
    for (const event of events) {
      const type = stringField(event, 'type')
      if (type === 'system' && stringField(event, 'subtype') === 'init') {
        sessionId = stringField(event, 'session_id') ?? sessionId
      } else if (type === 'result') {
        artifact = stringField(event, 'result') ?? artifact
        sessionId ??= stringField(event, 'session_id')
      }
    }
    return sessionId !== undefined ? { artifact, sessionId } : { artifact }
  }
}
