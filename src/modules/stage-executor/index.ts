export { createStageExecutor, StageExecutorImpl, VERIFY_COMMANDS_PATH } from './stage-executor-impl.js'
export type { StageExecutorOptions } from './stage-executor-impl.js'
export { extractUpdatedContextPack, extractVerifyCommands } from './brief-sync.js'
export type { ContextSync, ContextSyncStatus } from './brief-sync.js'
export type {
  StageBudgets,
  StageExecutor,
  StageExecutorSettings,
  StageFailure,
  StageFailureClass,
  StageResult,
} from './types.js'
