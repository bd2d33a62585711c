/**
 * CliToolAdapter - shared base for adapters that drive a headless CLI.
 *
 * Subclasses describe their dialect (command line, output stream format,
 * resume flag, probe command); the base class owns process execution,
 * input checks and exit-status normalization.
 */

import { execFile } from 'node:child_process'
import { access, constants } from 'node:fs/promises'
import { delimiter, join } from 'node:path'
import { promisify } from 'node:util'
import type { ToolId } from '../core/types.js'
import { runProcess, type ProcessRunner } from './process-runner.js'
import {
  EXIT_CODES,
  type ProbeResult,
  type SessionIdSource,
  type SpawnCommand,
  type ToolAdapter,
  type ToolExitStatus,
  type ToolRequest,
  type ToolResponse,
} from './types.js'

const execFileAsync = promisify(execFile)

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

/** Output of a probe command */
export interface ProbeOutput {
  stdout: string
  stderr: string
}

/** Runs `binary args` and resolves with its output; rejects like execFile */
export type ProbeExec = (binary: string, args: string[]) => Promise<ProbeOutput>

export interface CliToolAdapterOptions {
  /** Binary name or absolute path; defaults to the adapter's own binary */
  binary?: string
  /** Refuse prompts larger than this many bytes; 0 = unlimited */
  maxPromptBytes?: number
  /** Extra flags appended to every call */
  extraArgs?: string[]
  runner?: ProcessRunner
  probeExec?: ProbeExec
  /** Override the tool's local session directory */
  sessionStateDir?: string
}

/** Parsed stdout of a call */
export interface ParsedOutput {
  artifact: string
  sessionId?: string
}

const defaultProbeExec: ProbeExec = async (binary, args) => {
  const { stdout, stderr } = await execFileAsync(binary, args, { timeout: 10_000 })
  return { stdout, stderr }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Parse newline-delimited JSON, skipping lines that are not JSON objects */
export function parseJsonLines(stdout: string): Record<string, unknown>[] {
  const events: Record<string, unknown>[] = []
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed.startsWith('{')) continue
    try {
      const parsed: unknown = JSON.parse(trimmed)
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        events.push(Object.fromEntries(Object.entries(parsed)))
      }
    } catch {
      // Tools interleave plain log lines with events
      continue
    }
  }
  return events
}

/** Read a string field from a loosely-typed record */
export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' ? value : undefined
}

async function resolveBinaryPath(binary: string): Promise<string> {
  if (binary.includes('/')) return binary
  for (const dir of (process.env.PATH ?? '').split(delimiter)) {
    if (dir === '') continue
    const candidate = join(dir, binary)
    try {
      await access(candidate, constants.X_OK)
      return candidate
    } catch {
      continue
    }
  }
  return ''
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

function probeOutputOf(err: unknown): ProbeOutput | null {
  if (typeof err !== 'object' || err === null) return null
  const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : ''
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : ''
  return stdout === '' && stderr === '' ? null : { stdout, stderr }
}

// ---------------------------------------------------------------------------
// CliToolAdapter
// ---------------------------------------------------------------------------

export abstract class CliToolAdapter implements ToolAdapter {
  abstract readonly id: ToolId
  abstract readonly displayName: string

  /** Where session ids come from when resume is supported */
  protected abstract readonly idSource: SessionIdSource
  /** Arguments whose output advertises resume support */
  protected abstract readonly probeArgs: string[]
  /** Text the probe output must contain for resume to count as supported */
  protected abstract readonly resumeMarker: RegExp

  protected readonly _binary: string
  protected readonly _extraArgs: string[]
  private readonly _maxPromptBytes: number
  private readonly _runner: ProcessRunner
  private readonly _probeExec: ProbeExec
  protected readonly _stateDirOverride: string | undefined

  constructor(defaultBinary: string, options: CliToolAdapterOptions = {}) {
    this._binary = options.binary ?? defaultBinary
    this._extraArgs = options.extraArgs ?? []
    this._maxPromptBytes = options.maxPromptBytes ?? 0
    this._runner = options.runner ?? runProcess
    this._probeExec = options.probeExec ?? defaultProbeExec
    this._stateDirOverride = options.sessionStateDir
  }

  /** Build the command line for one call */
  abstract buildCommand(request: ToolRequest): SpawnCommand

  /** Extract the artifact (and session id, when streamed) from stdout */
  abstract parseOutput(stdout: string): ParsedOutput

  /** Map a non-zero process exit code to a normalized status */
  protected mapExitCode(_code: number): ToolExitStatus {
    return 'general_failure'
  }

  sessionStateDir(): string | undefined {
    return this._stateDirOverride
  }

  sessionIdFromStateEntry(_entry: string): string | undefined {
    return undefined
  }

  async invoke(request: ToolRequest, signal?: AbortSignal): Promise<ToolResponse> {
    if (request.prompt.trim() === '') {
      return this._failure('missing_input', 'prompt payload is empty')
    }

    const promptBytes = Buffer.byteLength(request.prompt, 'utf-8')
    if (this._maxPromptBytes > 0 && promptBytes > this._maxPromptBytes) {
      return this._failure(
        'input_too_large',
        `prompt is ${String(promptBytes)} bytes; ${this.id} accepts at most ${String(this._maxPromptBytes)}`
      )
    }

    const command = this.buildCommand(request)
    const enforce = request.deadlineMode === 'enforce' && request.deadlineSec > 0
    const run = await this._runner({
      command,
      ...(enforce ? { timeoutMs: request.deadlineSec * 1000 } : {}),
      ...(signal !== undefined ? { signal } : {}),
    })

    if (run.spawnError === 'ENOENT') {
      return this._failure('missing_binary', `${command.binary}: command not found (ENOENT)`)
    }
    if (run.spawnError !== undefined) {
      return this._failure('general_failure', `${command.binary}: failed to start (${run.spawnError})`)
    }

    const parsed = this.parseOutput(run.stdout)
    const base = {
      artifact: parsed.artifact,
      rawExitCode: run.timedOut || run.aborted ? null : run.exitCode,
      ...(parsed.sessionId !== undefined ? { sessionId: parsed.sessionId } : {}),
    }

    if (run.timedOut || run.aborted) {
      const why = run.aborted ? 'cancelled' : `exceeded ${String(request.deadlineSec)}s deadline`
      return {
        ...base,
        diagnostics: `${run.stderr}\n[${this.id}] timeout: ${why}`.trimStart(),
        status: 'timeout',
        exitCode: EXIT_CODES.timeout,
      }
    }

    const status: ToolExitStatus = run.exitCode === 0 ? 'success' : this.mapExitCode(run.exitCode ?? 1)
    return { ...base, diagnostics: run.stderr, status, exitCode: EXIT_CODES[status] }
  }

  async probe(): Promise<ProbeResult> {
    const binaryPath = await resolveBinaryPath(this._binary)
    let output: ProbeOutput
    try {
      output = await this._probeExec(this._binary, this.probeArgs)
    } catch (err) {
      if (isMissingBinary(err)) {
        return {
          resumeSupported: false,
          idSource: 'unknown',
          binaryFound: false,
          binaryPath: '',
          notes: `${this._binary} binary not found in PATH`,
        }
      }
      // Some CLIs print help and still exit non-zero
      const partial = probeOutputOf(err)
      if (partial === null) {
        return {
          resumeSupported: false,
          idSource: 'unknown',
          binaryFound: true,
          binaryPath,
          notes: `${this._binary} ${this.probeArgs.join(' ')} returned non-zero`,
        }
      }
      output = partial
    }

    const supported = this.resumeMarker.test(`${output.stdout}\n${output.stderr}`)
    return {
      resumeSupported: supported,
      idSource: supported ? this.idSource : 'unknown',
      binaryFound: true,
      binaryPath,
      notes: supported ? '' : `resume support not advertised by ${this._binary} ${this.probeArgs.join(' ')}`,
    }
  }

  private _failure(status: ToolExitStatus, diagnostics: string): ToolResponse {
    return {
      artifact: '',
      diagnostics,
      status,
      exitCode: EXIT_CODES[status],
      rawExitCode: null,
    }
  }
}
