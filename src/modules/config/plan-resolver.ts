/**
 * Stage plan resolution.
 *
 * Turns a configured pipeline into a fully resolved StagePlan. Per-stage
 * values win over run overrides, which win over tool defaults, which win
 * over the `execution` section.
 */

import { StagePlanError } from '../../core/errors.js'
import type { StagePlan, StageSpec } from '../../core/types.js'
import type { BatonConfig, StageConfig } from './config-schema.js'

export interface PlanOverrides {
  /** Run a single stage of the pipeline */
  stageId?: string
  /** Model per tool, applied where the stage names none */
  toolModels?: Record<string, string>
  deadlineSec?: number
  deadlineMode?: StageSpec['deadlineMode']
}

export function stageIdOf(stage: StageConfig): string {
  return stage.id ?? `${stage.tool}_${stage.role}`
}

export function resolveStagePlan(
  config: BatonConfig,
  pipelineId: string,
  overrides: PlanOverrides = {}
): StagePlan {
  const pipeline = config.pipelines[pipelineId]
  if (pipeline === undefined) {
    throw new StagePlanError(`Unknown pipeline: ${pipelineId}`, {
      pipelineId,
      available: Object.keys(config.pipelines),
    })
  }

  const seen = new Set<string>()
  const stages: StageSpec[] = pipeline.stages.map((stage) => {
    const stageId = stageIdOf(stage)
    if (seen.has(stageId)) {
      throw new StagePlanError(`Duplicate stage id "${stageId}" in pipeline ${pipelineId}`, { pipelineId, stageId })
    }
    seen.add(stageId)

    const tool = config.tools[stage.tool]
    if (tool === undefined || !tool.enabled) {
      throw new StagePlanError(`Stage "${stageId}" uses tool "${stage.tool}", which is not enabled`, {
        pipelineId,
        stageId,
        tool: stage.tool,
      })
    }

    const model = stage.model ?? overrides.toolModels?.[stage.tool] ?? tool.default_model
    return {
      stageId,
      tool: stage.tool,
      role: stage.role,
      phase: pipeline.phase,
      ...(model !== undefined ? { model } : {}),
      ...(stage.effort !== undefined ? { effort: stage.effort } : {}),
      deadlineSec: stage.deadline_sec ?? overrides.deadlineSec ?? config.execution.default_deadline_sec,
      deadlineMode: stage.deadline_mode ?? overrides.deadlineMode ?? config.execution.default_deadline_mode,
      digestPolicy: stage.digest_policy ?? config.execution.digest_policy,
    }
  })

  if (overrides.stageId !== undefined) {
    const only = stages.filter((s) => s.stageId === overrides.stageId)
    if (only.length === 0) {
      throw new StagePlanError(`Stage "${overrides.stageId}" is not part of pipeline ${pipelineId}`, {
        pipelineId,
        stageId: overrides.stageId,
      })
    }
    return { pipelineId, stages: only }
  }

  return { pipelineId, stages }
}
