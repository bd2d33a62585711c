/**
 * Zod validation schemas for the Baton configuration system.
 *
 * Sections:
 *  - global settings
 *  - tools (one entry per external CLI)
 *  - budgets, execution, session
 *  - review
 *  - gate scope and contract overrides
 *  - pipelines (stage plans)
 */

import { z } from 'zod'

export const CURRENT_CONFIG_FORMAT_VERSION = '1'
export const SUPPORTED_CONFIG_FORMAT_VERSIONS: readonly string[] = ['1']

// ---------------------------------------------------------------------------
// Shared enums
// ---------------------------------------------------------------------------

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
export const DeadlineModeSchema = z.enum(['enforce', 'wait_done'])
export const ReasoningEffortSchema = z.enum(['low', 'medium', 'high'])
export const DigestPolicySchema = z.enum(['off', 'auto', 'aggressive'])
export const SessionModeSchema = z.enum(['off', 'forced_within_phase'])

/** auto: enable the security gate when the request touches sensitive areas */
export const SecurityModeSchema = z.enum(['off', 'auto', 'on'])
export type SecurityMode = z.infer<typeof SecurityModeSchema>

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export const GlobalSettingsSchema = z
  .object({
    log_level: LogLevelSchema,
    /** Directory holding task directories, relative to the project root */
    tasks_dir: z.string().min(1),
  })
  .strict()

export type GlobalSettings = z.infer<typeof GlobalSettingsSchema>

export const ToolConfigSchema = z
  .object({
    enabled: z.boolean(),
    /** Binary name or path; defaults to the tool id */
    binary: z.string().min(1).optional(),
    default_model: z.string().min(1).optional(),
    /** Requests above this size are rejected as input_too_large before spawning */
    max_prompt_bytes: z.number().int().min(0),
    extra_args: z.array(z.string()),
    /** Local session directory used for directory-diff session extraction */
    session_state_dir: z.string().optional(),
  })
  .strict()

export type ToolConfig = z.infer<typeof ToolConfigSchema>

export const BudgetsSchema = z
  .object({
    paid_call_budget: z.number().int().min(0),
    retry_budget: z.number().int().min(0),
    retry_delay_ms: z.number().int().min(0),
  })
  .strict()

export type BudgetsConfig = z.infer<typeof BudgetsSchema>

export const ExecutionSchema = z
  .object({
    /** Heartbeat period while a tool call is in flight; 0 disables */
    heartbeat_sec: z.number().int().min(0),
    default_deadline_sec: z.number().int().min(0),
    default_deadline_mode: DeadlineModeSchema,
    digest_policy: DigestPolicySchema,
    digest_threshold_chars: z.number().int().min(0),
  })
  .strict()

export type ExecutionConfig = z.infer<typeof ExecutionSchema>

export const SessionSchema = z
  .object({
    mode: SessionModeSchema,
  })
  .strict()

export const ReviewSchema = z
  .object({
    /** Tool running the lenses */
    tool: z.string().min(1),
    /** Tool applying queued fixes; omitted means no fix capability */
    fix_tool: z.string().min(1).optional(),
    lenses: z.array(z.string().min(1)).min(1),
    /** One deadline for the whole join barrier */
    timeout_sec: z.number().int().min(1),
    security_mode: SecurityModeSchema,
    security_max_rounds: z.number().int().min(1),
    /** Regression command run between security fix rounds */
    verify_command: z.string().optional(),
  })
  .strict()

export type ReviewConfig = z.infer<typeof ReviewSchema>

export const ScopeSchema = z
  .object({
    allow: z.array(z.string()),
    deny: z.array(z.string()),
  })
  .strict()

export const RoleContractSchema = z
  .object({
    required_sections: z.array(z.string()),
    min_lines: z.number().int().min(0),
    expects_diff: z.boolean(),
  })
  .strict()

export const GatesSchema = z
  .object({
    scope: ScopeSchema,
    contracts: z.record(z.string(), RoleContractSchema),
  })
  .strict()

// ---------------------------------------------------------------------------
// Pipelines
// ---------------------------------------------------------------------------

export const StageConfigSchema = z
  .object({
    /** Defaults to `<tool>_<role>` */
    id: z.string().regex(/^[A-Za-z0-9._-]+$/).optional(),
    tool: z.string().min(1),
    role: z.string().min(1),
    model: z.string().min(1).optional(),
    effort: ReasoningEffortSchema.optional(),
    deadline_sec: z.number().int().min(0).optional(),
    deadline_mode: DeadlineModeSchema.optional(),
    digest_policy: DigestPolicySchema.optional(),
  })
  .strict()

export type StageConfig = z.infer<typeof StageConfigSchema>

export const PipelineConfigSchema = z
  .object({
    phase: z.string().regex(/^[A-Za-z0-9._-]+$/),
    stages: z.array(StageConfigSchema).min(1),
  })
  .strict()

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

// ---------------------------------------------------------------------------
// Full document
// ---------------------------------------------------------------------------

export const BatonConfigSchema = z
  .object({
    config_format_version: z.string(),
    global: GlobalSettingsSchema,
    tools: z.record(z.string(), ToolConfigSchema),
    budgets: BudgetsSchema,
    execution: ExecutionSchema,
    session: SessionSchema,
    review: ReviewSchema,
    gates: GatesSchema,
    pipelines: z.record(z.string(), PipelineConfigSchema),
  })
  .strict()

export type BatonConfig = z.infer<typeof BatonConfigSchema>
