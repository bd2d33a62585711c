/**
 * Session id extraction.
 *
 * Two mechanisms, chosen by the capability probe:
 *  - structured protocol event: the adapter already parsed the id from its output stream
 *  - state-directory diff: list the tool's session directory before and after
 *    the call; exactly one new entry identifies the session
 */

import { readdir } from 'node:fs/promises'
import { join } from 'node:path'
import type { SessionIdSource, ToolAdapter, ToolResponse } from '../../adapters/types.js'
import type { ExtractionResult } from './types.js'

const MAX_DEPTH = 4

/** Whether an id source is a structured event (high confidence) */
export function isStreamSource(source: SessionIdSource): boolean {
  return source === 'stream_json_init' || source === 'thread_started'
}

/**
 * Sorted relative paths of every file under `dir`.
 * A missing directory yields an empty listing.
 */
export async function snapshotStateDir(dir: string): Promise<string[]> {
  const entries: string[] = []

  async function walk(current: string, prefix: string, depth: number): Promise<void> {
    const dirents = await readdir(current, { withFileTypes: true }).catch((err: unknown) => {
      if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') return null
      throw err
    })
    if (dirents === null) return
    for (const dirent of dirents) {
      const relative = prefix === '' ? dirent.name : `${prefix}/${dirent.name}`
      if (dirent.isDirectory()) {
        if (depth < MAX_DEPTH) await walk(join(current, dirent.name), relative, depth + 1)
      } else {
        entries.push(relative)
      }
    }
  }

  await walk(dir, '', 0)
  return entries.sort()
}

/**
 * Identify the session created between two snapshots.
 * Zero or several new entries are ambiguous and yield no id.
 */
export function diffSnapshots(
  before: readonly string[],
  after: readonly string[],
  parseId: (entry: string) => string | undefined
): ExtractionResult {
  const known = new Set(before)
  const added = after.filter((entry) => !known.has(entry))

  if (added.length === 0) return { reason: 'no new session entries found' }
  if (added.length > 1) {
    return { reason: `ambiguous: ${String(added.length)} new session entries found` }
  }

  const entry = added[0] ?? ''
  const sessionId = parseId(entry)
  return sessionId !== undefined
    ? { sessionId }
    : { reason: `cannot parse session id from: ${entry}` }
}

/**
 * Recover the session id a call actually used.
 */
export async function extractSessionId(
  source: SessionIdSource,
  adapter: ToolAdapter,
  response: ToolResponse,
  snapshot: readonly string[] | undefined
): Promise<ExtractionResult> {
  if (isStreamSource(source)) {
    return response.sessionId !== undefined
      ? { sessionId: response.sessionId }
      : { reason: 'no session id in the output stream' }
  }

  if (source === 'state_dir') {
    const dir = adapter.sessionStateDir()
    if (dir === undefined || snapshot === undefined) {
      return { reason: 'no session state directory to diff' }
    }
    const after = await snapshotStateDir(dir)
    return diffSnapshots(snapshot, after, (entry) => adapter.sessionIdFromStateEntry(entry))
  }

  return { reason: 'tool has no session id mechanism' }
}
