export { createPipelineOrchestrator, PipelineOrchestratorImpl } from './pipeline-orchestrator.js'
export type { PipelineOrchestrator, PipelineOrchestratorOptions, PipelineResult } from './pipeline-orchestrator.js'
export {
  headTail,
  renderSummary,
  truncateLines,
  writeSummary,
  SUMMARY_MAX_LINES,
  SUMMARY_PATH,
} from './summary.js'
export type { SummaryInput, SummaryStage, SummaryStageStatus } from './summary.js'
