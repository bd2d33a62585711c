/**
 * Zod schemas for every record persisted under a task directory.
 *
 * Records are validated on read; a record that fails validation is treated
 * as corrupt and surfaces as a StateStoreError rather than being guessed at.
 */

import { z } from 'zod'

// ---------------------------------------------------------------------------
// Stats store
// ---------------------------------------------------------------------------

export const SignatureEntrySchema = z.object({
  count: z.number().int().min(0),
  class: z.string(),
  first_seen: z.string(),
  last_seen: z.string(),
})

export type SignatureEntry = z.infer<typeof SignatureEntrySchema>

export const StatsDocumentSchema = z.object({
  paid_calls_used: z.number().int().min(0).default(0),
  stages_completed: z.array(z.string()).default([]),
  signatures: z.record(z.string(), SignatureEntrySchema).default({}),
})

export type StatsDocument = z.infer<typeof StatsDocumentSchema>

export const EMPTY_STATS: StatsDocument = {
  paid_calls_used: 0,
  stages_completed: [],
  signatures: {},
}

// ---------------------------------------------------------------------------
// Stage records
// ---------------------------------------------------------------------------

/** Latest attempt of a stage; overwritten by each new attempt */
export const StageMetaSchema = z.object({
  stage: z.string(),
  tool: z.string(),
  role: z.string(),
  attempt: z.number().int().min(1),
  exit_code: z.number().int(),
  status: z.string(),
  start: z.string(),
  end: z.string(),
  duration_sec: z.number().min(0),
  prompt_sha256: z.string(),
  session_id: z.string().nullable(),
})

export type StageMeta = z.infer<typeof StageMetaSchema>

export const LastFailureSchema = z.object({
  stage: z.string(),
  tool: z.string(),
  class: z.string(),
  signature: z.string(),
  exit_code: z.number().int(),
  suggested_actions: z.array(z.string()),
  retry_decision: z.string(),
  manual_reroute: z.boolean(),
  stderr_excerpt: z.string(),
  timestamp: z.string(),
})

export type LastFailure = z.infer<typeof LastFailureSchema>

// ---------------------------------------------------------------------------
// Session continuity
// ---------------------------------------------------------------------------

export const SessionConfidenceSchema = z.enum(['high', 'medium'])
export type SessionConfidence = z.infer<typeof SessionConfidenceSchema>

export const SessionRecordSchema = z.object({
  phase: z.string(),
  tool: z.string(),
  session_id: z.string(),
  source: z.string(),
  confidence: SessionConfidenceSchema,
  status: z.enum(['baseline', 'active']),
  created_at: z.string(),
  updated_at: z.string(),
  last_used_at: z.string(),
})

export type SessionRecord = z.infer<typeof SessionRecordSchema>

export const CapabilityProbeSchema = z.object({
  tool: z.string(),
  phase: z.string(),
  resume_supported: z.boolean(),
  id_source: z.enum(['stream_json_init', 'thread_started', 'state_dir', 'unknown']),
  probe_ran_at: z.string(),
  binary_found: z.boolean(),
  binary_path: z.string(),
  notes: z.string(),
})

export type CapabilityProbe = z.infer<typeof CapabilityProbeSchema>

export const SessionEventSchema = z.object({
  timestamp: z.string(),
  event: z.string(),
  phase: z.string(),
  tool: z.string(),
  stage: z.string(),
  status: z.string(),
  details: z.string(),
})

export type SessionEvent = z.infer<typeof SessionEventSchema>

export const SessionRecoverySchema = z.object({
  phase: z.string(),
  tool: z.string(),
  stage: z.string(),
  reason: z.string(),
  expected: z.string().nullable(),
  actual: z.string().nullable(),
  resume_target: z.string().nullable(),
  generated_at: z.string(),
})

export type SessionRecovery = z.infer<typeof SessionRecoverySchema>
