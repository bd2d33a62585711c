/**
 * StateStore interface - the single persistence seam for one task.
 *
 * Components receive a StateStore by injection; nothing reads task files
 * directly. Every write is an atomic temp-write + rename.
 */

import type { z } from 'zod'
import type {
  CapabilityProbe,
  LastFailure,
  SessionEvent,
  SessionRecord,
  SessionRecovery,
  StageMeta,
  StatsDocument,
} from './schemas.js'

/** Artifact and diagnostic stream of a stage's latest attempt */
export interface StageOutput {
  artifact: string
  diagnostics: string
}

export interface StateStore {
  /** Root directory of the task */
  readonly taskDir: string

  // -- stats ----------------------------------------------------------------

  readStats(): Promise<StatsDocument>

  /**
   * Atomic read-modify-write of the stats document.
   * The mutator receives a private copy and returns the next document.
   */
  updateStats(mutator: (stats: StatsDocument) => StatsDocument): Promise<StatsDocument>

  // -- done markers ---------------------------------------------------------

  hasDoneMarker(stageId: string): Promise<boolean>
  writeDoneMarker(stageId: string): Promise<void>
  clearDoneMarker(stageId: string): Promise<void>

  // -- stage records --------------------------------------------------------

  writeStageMeta(meta: StageMeta): Promise<void>
  readStageMeta(stageId: string, tool: string): Promise<StageMeta | null>
  writeStageOutput(stageId: string, tool: string, output: StageOutput): Promise<void>
  readStageOutput(stageId: string, tool: string): Promise<StageOutput | null>

  /** Overwrites any previous failure record */
  writeLastFailure(failure: LastFailure): Promise<void>
  readLastFailure(): Promise<LastFailure | null>

  // -- session continuity ---------------------------------------------------

  readSessionRecord(phase: string, tool: string): Promise<SessionRecord | null>
  writeSessionRecord(record: SessionRecord): Promise<void>
  readProbe(phase: string, tool: string): Promise<CapabilityProbe | null>
  writeProbe(probe: CapabilityProbe): Promise<void>
  appendSessionEvent(event: SessionEvent): Promise<void>
  readSessionEvents(): Promise<SessionEvent[]>
  appendSessionValidation(phase: string, tool: string, entry: Record<string, unknown>): Promise<void>
  writeSessionRecovery(recovery: SessionRecovery, markdown: string): Promise<void>

  // -- free-form artifacts --------------------------------------------------

  /** Path of a task-relative file */
  resolve(relativePath: string): string
  writeText(relativePath: string, content: string): Promise<void>
  readText(relativePath: string): Promise<string | null>
  writeJson(relativePath: string, value: unknown): Promise<void>
  readJson<T>(relativePath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null>
}
