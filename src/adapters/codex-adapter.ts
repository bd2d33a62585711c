/**
 * Codex CLI adapter
 *
 * Binary: `codex`
 * Execution: `codex exec --json -` with the prompt on stdin;
 * resumed calls use `codex exec resume --json <id> -`.
 * Output: JSONL events; `thread.started` carries the session (thread) id.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'
import type { SpawnCommand, SessionIdSource, ToolRequest } from './types.js'
import {
  CliToolAdapter,
  parseJsonLines,
  stringField,
  type CliToolAdapterOptions,
  type ParsedOutput,
} from './cli-tool-adapter.js'

const ROLLOUT_ID = /([0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12})\.jsonl$/i

export class CodexCLIAdapter extends CliToolAdapter {
  readonly id = 'codex'
  readonly displayName = 'Codex CLI'
  protected readonly idSource: SessionIdSource = 'thread_started'
  protected readonly probeArgs = ['exec', '--help']
  protected readonly resumeMarker = /\bresume\b/

  constructor(options: CliToolAdapterOptions = {}) {
    super('codex', options)
  }

  buildCommand(request: ToolRequest): SpawnCommand {
    const args = request.resumeSessionId !== undefined
      ? ['exec', 'resume', '--json']
      : ['exec', '--json']

    if (request.model !== undefined) args.push('--model', request.model)
    if (request.effort !== undefined) args.push('-c', `model_reasoning_effort=${request.effort}`)
    args.push(...this._extraArgs)
    if (request.resumeSessionId !== undefined) args.push(request.resumeSessionId)
    args.push('-')

    return { binary: this._binary, args, cwd: request.cwd, stdin: request.prompt }
  }

  /**
   * The artifact is the last `agent_message` item; when stdout carries no
   * events at all it is taken verbatim.
   */
  parseOutput(stdout: string): ParsedOutput {
    const events = parseJsonLines(stdout)
    if (events.length === 0) return { artifact: stdout }

    let sessionId: string | undefined
    let artifact = ''
    for (const event of events) {
      const type = stringField(event, 'type')
      if (type === 'thread.started') {
        sessionId = stringField(event, 'thread_id') ?? sessionId
      } else if (type === 'item.completed') {
        const item = event.item
        if (typeof item === 'object' && item !== null && 'type' in item && item.type === 'agent_message') {
          const text = 'text' in item && typeof item.text === 'string' ? item.text : ''
          if (text !== '') artifact = text
        }
      }
    }
    return sessionId !== undefined ? { artifact, sessionId } : { artifact }
  }

  override sessionStateDir(): string {
    return this._stateDirOverride ?? join(homedir(), '.codex', 'sessions')
  }

  /** Rollout files are named `rollout-<timestamp>-<uuid>.jsonl` */
  override sessionIdFromStateEntry(entry: string): string | undefined {
    return ROLLOUT_ID.exec(entry)?.[1]
  }
}
