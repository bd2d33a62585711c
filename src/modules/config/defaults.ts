/**
 * Built-in default values for the Baton configuration system.
 *
 * These are the lowest-priority defaults; they are overridden by:
 *   global config → project config → environment variables → CLI flags
 */

import { CURRENT_CONFIG_FORMAT_VERSION, type BatonConfig, type ToolConfig } from './config-schema.js'

const tool = (enabled: boolean): ToolConfig => ({
  enabled,
  max_prompt_bytes: 0,
  extra_args: [],
})

export const DEFAULT_CONFIG: BatonConfig = {
  config_format_version: CURRENT_CONFIG_FORMAT_VERSION,
  global: {
    log_level: 'info',
    tasks_dir: '.baton/tasks',
  },
  tools: {
    codex: tool(true),
    gemini: { ...tool(true), max_prompt_bytes: 51_200 },
    claude: tool(true),
  },
  budgets: {
    paid_call_budget: 10,
    retry_budget: 2,
    retry_delay_ms: 5000,
  },
  execution: {
    heartbeat_sec: 10,
    default_deadline_sec: 0,
    default_deadline_mode: 'wait_done',
    digest_policy: 'auto',
    digest_threshold_chars: 8000,
  },
  session: {
    mode: 'forced_within_phase',
  },
  review: {
    tool: 'codex',
    lenses: ['correctness', 'security', 'maintainability'],
    timeout_sec: 900,
    security_mode: 'auto',
    security_max_rounds: 3,
  },
  gates: {
    scope: { allow: [], deny: [] },
    contracts: {},
  },
  pipelines: {
    plan: {
      phase: 'plan',
      stages: [
        { tool: 'claude', role: 'brief' },
        { tool: 'gemini', role: 'review' },
      ],
    },
    impl: {
      phase: 'impl',
      stages: [
        { tool: 'codex', role: 'impl' },
        { tool: 'codex', role: 'test_impl' },
        { tool: 'codex', role: 'static_verify' },
        { tool: 'codex', role: 'parallel_review' },
      ],
    },
  },
}
