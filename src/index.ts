/**
 * Baton - Main module exports
 * Public API surface for embedding the pipeline runner
 */

// Core types
export * from './core/types.js'
// Core errors
export * from './core/errors.js'
// Utilities
export { createLogger, childLogger, logger, setLogLevel } from './utils/logger.js'
export * from './utils/helpers.js'

// Event Bus
export type { TypedEventBus } from './core/event-bus.js'
export type { PipelineEvents } from './core/event-bus.types.js'
export { createEventBus } from './core/event-bus.js'

// Adapter subsystem
export { AdapterRegistry, createAdapterRegistry } from './adapters/adapter-registry.js'
export type { ToolSettings } from './adapters/adapter-registry.js'
export type {
  SpawnCommand,
  ToolAdapter,
  ToolExitStatus,
  ToolRequest,
  ToolResponse,
  ProbeResult,
  SessionIdSource,
} from './adapters/types.js'
export { EXIT_CODES } from './adapters/types.js'
export { runProcess } from './adapters/process-runner.js'
export type { ProcessRunner, ProcessRunRequest, ProcessRunResult } from './adapters/process-runner.js'
export { CliToolAdapter } from './adapters/cli-tool-adapter.js'
export type { CliToolAdapterOptions } from './adapters/cli-tool-adapter.js'
export { ClaudeCLIAdapter } from './adapters/claude-adapter.js'
export { CodexCLIAdapter } from './adapters/codex-adapter.js'
export { GeminiCLIAdapter } from './adapters/gemini-adapter.js'

// Modules
export * from './modules/config/index.js'
export * from './modules/state-store/index.js'
export * from './modules/error-classifier/index.js'
export * from './modules/gate-validator/index.js'
export * from './modules/request-composer/index.js'
export * from './modules/session-continuity/index.js'
export * from './modules/stage-executor/index.js'
export * from './modules/pipeline-orchestrator/index.js'
export * from './modules/review-coordinator/index.js'

// Wiring
export { createRuntime } from './cli/runtime.js'
export type { Runtime, RuntimeOptions, ReviewOverrides } from './cli/runtime.js'
