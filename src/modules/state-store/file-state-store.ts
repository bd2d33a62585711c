/**
 * FileStateStore - StateStore backed by a task directory.
 *
 * Layout (relative to taskDir):
 *   state/stats.json                      paid calls, completed stages, signature counters
 *   state/done/<stage>.done               done-markers (ISO timestamp)
 *   state/last_failure.json
 *   state/session-probe/<phase>/<tool>.json
 *   state/session-events.jsonl
 *   state/session-validation/<phase>-<tool>.jsonl
 *   state/session_recovery.{md,json}
 *   sessions/<phase>/<tool>.json
 *   outputs/<stage>.<tool>.{out,err,meta.json}
 */

import { appendFile, mkdir, readFile, rm, stat } from 'node:fs/promises'
import { dirname, join, resolve } from 'node:path'
import type { z } from 'zod'
import { StateStoreError } from '../../core/errors.js'
import { isoNow } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import { KeyedMutex, atomicWriteFile, withFileLock } from './atomic.js'
import {
  CapabilityProbeSchema,
  EMPTY_STATS,
  LastFailureSchema,
  SessionEventSchema,
  SessionRecordSchema,
  StageMetaSchema,
  StatsDocumentSchema,
  type CapabilityProbe,
  type LastFailure,
  type SessionEvent,
  type SessionRecord,
  type SessionRecovery,
  type StageMeta,
  type StatsDocument,
} from './schemas.js'
import type { StageOutput, StateStore } from './state-store.js'

const logger = createLogger('state-store')

const STATS_PATH = 'state/stats.json'
const LAST_FAILURE_PATH = 'state/last_failure.json'
const SESSION_EVENTS_PATH = 'state/session-events.jsonl'

/** Stage, phase and tool ids become path segments; keep them to one segment */
function segment(value: string, what: string): string {
  if (value === '' || value.includes('/') || value.includes('\\') || value === '.' || value === '..') {
    throw new StateStoreError(`Invalid ${what} for a state path: "${value}"`, { [what]: value })
  }
  return value
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

// One mutex per process: several stores may point at the same task directory
const statsMutex = new KeyedMutex()

export class FileStateStore implements StateStore {
  readonly taskDir: string

  constructor(taskDir: string) {
    this.taskDir = resolve(taskDir)
  }

  // ---------------------------------------------------------------------------
  // Stats
  // ---------------------------------------------------------------------------

  async readStats(): Promise<StatsDocument> {
    return (await this.readJson(STATS_PATH, StatsDocumentSchema)) ?? structuredClone(EMPTY_STATS)
  }

  async updateStats(mutator: (stats: StatsDocument) => StatsDocument): Promise<StatsDocument> {
    const path = this.resolve(STATS_PATH)
    return statsMutex.run(path, () =>
      withFileLock(path, async () => {
        const next = mutator(await this.readStats())
        await atomicWriteFile(path, `${JSON.stringify(next, null, 2)}\n`)
        return next
      })
    )
  }

  // ---------------------------------------------------------------------------
  // Done markers
  // ---------------------------------------------------------------------------

  async hasDoneMarker(stageId: string): Promise<boolean> {
    try {
      await stat(this._donePath(stageId))
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  async writeDoneMarker(stageId: string): Promise<void> {
    await atomicWriteFile(this._donePath(stageId), `${isoNow()}\n`)
  }

  async clearDoneMarker(stageId: string): Promise<void> {
    await rm(this._donePath(stageId), { force: true })
  }

  // ---------------------------------------------------------------------------
  // Stage records
  // ---------------------------------------------------------------------------

  async writeStageMeta(meta: StageMeta): Promise<void> {
    await this.writeJson(this._outputPath(meta.stage, meta.tool, 'meta.json'), meta)
  }

  async readStageMeta(stageId: string, tool: string): Promise<StageMeta | null> {
    return this.readJson(this._outputPath(stageId, tool, 'meta.json'), StageMetaSchema)
  }

  async writeStageOutput(stageId: string, tool: string, output: StageOutput): Promise<void> {
    await this.writeText(this._outputPath(stageId, tool, 'out'), output.artifact)
    await this.writeText(this._outputPath(stageId, tool, 'err'), output.diagnostics)
  }

  async readStageOutput(stageId: string, tool: string): Promise<StageOutput | null> {
    const artifact = await this.readText(this._outputPath(stageId, tool, 'out'))
    if (artifact === null) return null
    const diagnostics = (await this.readText(this._outputPath(stageId, tool, 'err'))) ?? ''
    return { artifact, diagnostics }
  }

  async writeLastFailure(failure: LastFailure): Promise<void> {
    await this.writeJson(LAST_FAILURE_PATH, failure)
  }

  async readLastFailure(): Promise<LastFailure | null> {
    return this.readJson(LAST_FAILURE_PATH, LastFailureSchema)
  }

  // ---------------------------------------------------------------------------
  // Session continuity
  // ---------------------------------------------------------------------------

  async readSessionRecord(phase: string, tool: string): Promise<SessionRecord | null> {
    return this.readJson(this._sessionPath(phase, tool), SessionRecordSchema)
  }

  async writeSessionRecord(record: SessionRecord): Promise<void> {
    await this.writeJson(this._sessionPath(record.phase, record.tool), record)
  }

  async readProbe(phase: string, tool: string): Promise<CapabilityProbe | null> {
    return this.readJson(this._probePath(phase, tool), CapabilityProbeSchema)
  }

  async writeProbe(probe: CapabilityProbe): Promise<void> {
    await this.writeJson(this._probePath(probe.phase, probe.tool), probe)
  }

  async appendSessionEvent(event: SessionEvent): Promise<void> {
    await this._appendLine(SESSION_EVENTS_PATH, JSON.stringify(event))
  }

  async readSessionEvents(): Promise<SessionEvent[]> {
    const raw = await this.readText(SESSION_EVENTS_PATH)
    if (raw === null) return []
    const events: SessionEvent[] = []
    for (const line of raw.split('\n')) {
      if (line.trim() === '') continue
      let data: unknown
      try {
        data = JSON.parse(line)
      } catch {
        logger.warn({ line }, 'Skipping unparseable session event')
        continue
      }
      const parsed = SessionEventSchema.safeParse(data)
      if (parsed.success) events.push(parsed.data)
      else logger.warn({ line }, 'Skipping malformed session event')
    }
    return events
  }

  async appendSessionValidation(phase: string, tool: string, entry: Record<string, unknown>): Promise<void> {
    const path = `state/session-validation/${segment(phase, 'phase')}-${segment(tool, 'tool')}.jsonl`
    await this._appendLine(path, JSON.stringify(entry))
  }

  async writeSessionRecovery(recovery: SessionRecovery, markdown: string): Promise<void> {
    await this.writeJson('state/session_recovery.json', recovery)
    await this.writeText('state/session_recovery.md', markdown)
  }

  // ---------------------------------------------------------------------------
  // Free-form artifacts
  // ---------------------------------------------------------------------------

  resolve(relativePath: string): string {
    return join(this.taskDir, relativePath)
  }

  async writeText(relativePath: string, content: string): Promise<void> {
    await atomicWriteFile(this.resolve(relativePath), content)
  }

  async readText(relativePath: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(relativePath), 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }
  }

  async writeJson(relativePath: string, value: unknown): Promise<void> {
    await this.writeText(relativePath, `${JSON.stringify(value, null, 2)}\n`)
  }

  async readJson<T>(
    relativePath: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ): Promise<T | null> {
    const raw = await this.readText(relativePath)
    if (raw === null) return null

    let data: unknown
    try {
      data = JSON.parse(raw)
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new StateStoreError(`Corrupt JSON in ${relativePath}: ${message}`, { path: relativePath })
    }

    const parsed = schema.safeParse(data)
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
      throw new StateStoreError(`Invalid record in ${relativePath}: ${issues}`, {
        path: relativePath,
        issues: parsed.error.issues,
      })
    }
    return parsed.data
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private _donePath(stageId: string): string {
    return this.resolve(`state/done/${segment(stageId, 'stage')}.done`)
  }

  private _outputPath(stageId: string, tool: string, suffix: string): string {
    return `outputs/${segment(stageId, 'stage')}.${segment(tool, 'tool')}.${suffix}`
  }

  private _sessionPath(phase: string, tool: string): string {
    return `sessions/${segment(phase, 'phase')}/${segment(tool, 'tool')}.json`
  }

  private _probePath(phase: string, tool: string): string {
    return `state/session-probe/${segment(phase, 'phase')}/${segment(tool, 'tool')}.json`
  }

  /** Append-only logs: one JSON document per line, never rewritten */
  private async _appendLine(relativePath: string, line: string): Promise<void> {
    const path = this.resolve(relativePath)
    await mkdir(dirname(path), { recursive: true })
    await appendFile(path, `${line}\n`, 'utf-8')
  }
}

/**
 * Create a StateStore rooted at `taskDir`.
 */
export function createStateStore(taskDir: string): StateStore {
  return new FileStateStore(taskDir)
}
