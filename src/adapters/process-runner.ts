/**
 * ProcessRunner - spawns one CLI process, feeds the prompt on stdin and
 * collects its output streams.
 *
 * Termination:
 *  - `timeoutMs` elapses or `signal` aborts → SIGTERM, then SIGKILL after a grace period
 *  - spawn failure (e.g. ENOENT) resolves with `spawnError` instead of rejecting
 */

import { spawn } from 'node:child_process'
import { createLogger } from '../utils/logger.js'
import type { SpawnCommand } from './types.js'

const logger = createLogger('process-runner')

/** Grace period between SIGTERM and SIGKILL */
export const KILL_GRACE_MS = 5_000

export interface ProcessRunRequest {
  command: SpawnCommand
  /** Hard deadline; omit to wait for the process to exit on its own */
  timeoutMs?: number
  signal?: AbortSignal
}

export interface ProcessRunResult {
  exitCode: number | null
  stdout: string
  stderr: string
  timedOut: boolean
  aborted: boolean
  /** errno code when the process could not be started */
  spawnError?: string
  durationMs: number
}

export type ProcessRunner = (request: ProcessRunRequest) => Promise<ProcessRunResult>

function errnoCode(err: Error): string {
  return 'code' in err && typeof err.code === 'string' ? err.code : 'EUNKNOWN'
}

/**
 * Default ProcessRunner backed by child_process.spawn.
 */
export const runProcess: ProcessRunner = (request) => {
  const { command, timeoutMs, signal } = request

  return new Promise<ProcessRunResult>((resolve) => {
    const startedAt = Date.now()
    const stdoutChunks: Buffer[] = []
    const stderrChunks: Buffer[] = []
    let timedOut = false
    let aborted = false
    let settled = false
    let timeoutHandle: ReturnType<typeof setTimeout> | null = null
    let killHandle: ReturnType<typeof setTimeout> | null = null

    const proc = spawn(command.binary, command.args, {
      cwd: command.cwd,
      env: { ...process.env, ...(command.env ?? {}) },
      stdio: ['pipe', 'pipe', 'pipe'],
    })

    const finish = (result: Omit<ProcessRunResult, 'durationMs' | 'stdout' | 'stderr' | 'timedOut' | 'aborted'>): void => {
      if (settled) return
      settled = true
      if (timeoutHandle !== null) clearTimeout(timeoutHandle)
      if (killHandle !== null) clearTimeout(killHandle)
      signal?.removeEventListener('abort', onAbort)
      resolve({
        ...result,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
        timedOut,
        aborted,
        durationMs: Date.now() - startedAt,
      })
    }

    const terminate = (): void => {
      proc.kill('SIGTERM')
      killHandle = setTimeout(() => {
        if (proc.exitCode === null && proc.signalCode === null) {
          logger.warn({ binary: command.binary, pid: proc.pid }, 'Process ignored SIGTERM; sending SIGKILL')
          proc.kill('SIGKILL')
        }
      }, KILL_GRACE_MS)
    }

    function onAbort(): void {
      aborted = true
      terminate()
    }

    proc.on('error', (err) => {
      finish({ exitCode: null, spawnError: errnoCode(err) })
    })

    proc.stdout.on('data', (chunk: Buffer) => {
      stdoutChunks.push(chunk)
    })
    proc.stderr.on('data', (chunk: Buffer) => {
      stderrChunks.push(chunk)
    })

    proc.stdin.on('error', (err: Error) => {
      // The process may exit before reading its whole prompt
      if (errnoCode(err) !== 'EPIPE') {
        logger.warn({ binary: command.binary, error: err.message }, 'stdin write error')
      }
    })
    proc.stdin.end(command.stdin ?? '')

    if (timeoutMs !== undefined && timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        timedOut = true
        terminate()
      }, timeoutMs)
    }

    if (signal !== undefined) {
      if (signal.aborted) onAbort()
      else signal.addEventListener('abort', onAbort, { once: true })
    }

    proc.on('close', (code) => {
      finish({ exitCode: code })
    })
  })
}
