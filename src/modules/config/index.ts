/**
 * Barrel exports for the config module.
 */

export { createConfigSystem, ConfigSystemImpl, deepMerge, readEnvOverrides, ENV_VAR_MAP } from './config-system-impl.js'
export type { ConfigSystem, ConfigSystemOptions } from './config-system.js'
export {
  BatonConfigSchema,
  CURRENT_CONFIG_FORMAT_VERSION,
  SUPPORTED_CONFIG_FORMAT_VERSIONS,
} from './config-schema.js'
export type {
  BatonConfig,
  BudgetsConfig,
  ExecutionConfig,
  PipelineConfig,
  ReviewConfig,
  SecurityMode,
  StageConfig,
  ToolConfig,
} from './config-schema.js'
export { DEFAULT_CONFIG } from './defaults.js'
export { resolveStagePlan, stageIdOf } from './plan-resolver.js'
export type { PlanOverrides } from './plan-resolver.js'
