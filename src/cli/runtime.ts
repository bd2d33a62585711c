/**
 * Runtime wiring shared by the CLI commands.
 *
 * Builds the collaborators for one task directory from a loaded config:
 * state store, adapter registry, request composer, gate, session manager,
 * stage executor (with the parallel-review decorator) and orchestrator.
 */

import { z } from 'zod'
import { createAdapterRegistry, type AdapterRegistry } from '../adapters/adapter-registry.js'
import type { ProcessRunner } from '../adapters/process-runner.js'
import { createEventBus, type TypedEventBus } from '../core/event-bus.js'
import type { StageSpec } from '../core/types.js'
import type { BatonConfig } from '../modules/config/config-schema.js'
import { createContractGate } from '../modules/gate-validator/contract-gate.js'
import type { RoleContract } from '../modules/gate-validator/types.js'
import { createPipelineOrchestrator, type PipelineOrchestrator } from '../modules/pipeline-orchestrator/pipeline-orchestrator.js'
import { createRequestComposer } from '../modules/request-composer/request-composer.js'
import { AdapterFixApplier, AdapterLensRunner, CommandVerifier } from '../modules/review-coordinator/lens-runner.js'
import { createReviewCoordinator } from '../modules/review-coordinator/review-coordinator-impl.js'
import { createReviewStageExecutor } from '../modules/review-coordinator/review-stage.js'
import type { RegressionVerifier, ReviewCoordinator } from '../modules/review-coordinator/types.js'
import { createSessionManager } from '../modules/session-continuity/session-manager-impl.js'
import { createStageExecutor, VERIFY_COMMANDS_PATH } from '../modules/stage-executor/stage-executor-impl.js'
import type { StageExecutor } from '../modules/stage-executor/types.js'
import { createStateStore } from '../modules/state-store/file-state-store.js'
import type { StateStore } from '../modules/state-store/state-store.js'

export interface RuntimeOptions {
  config: BatonConfig
  taskDir: string
  /** Working directory handed to tools */
  cwd: string
  eventBus?: TypedEventBus
  /** Replaces the registry built from `config.tools` */
  registry?: AdapterRegistry
  /** Process runner for the regression verifier */
  runner?: ProcessRunner
  /** Watchdog grace after the review barrier deadline */
  reviewGraceMs?: number
}

export interface ReviewOverrides {
  tool?: string
  lenses?: string[]
  securityMode?: BatonConfig['review']['security_mode']
}

export interface Runtime {
  config: BatonConfig
  store: StateStore
  registry: AdapterRegistry
  eventBus: TypedEventBus
  executor: StageExecutor
  orchestrator: PipelineOrchestrator
  createReviewCoordinator(overrides?: ReviewOverrides): Promise<ReviewCoordinator>
}

const VerifyCommandsSchema = z.array(z.string())

function roleContracts(config: BatonConfig): Record<string, RoleContract> {
  const contracts: Record<string, RoleContract> = {}
  for (const [role, contract] of Object.entries(config.gates.contracts)) {
    contracts[role] = {
      requiredSections: contract.required_sections,
      minLines: contract.min_lines,
      expectsDiff: contract.expects_diff,
    }
  }
  return contracts
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { config, cwd } = options
  const store = createStateStore(options.taskDir)
  const registry = options.registry ?? createAdapterRegistry(config.tools)
  const eventBus = options.eventBus ?? createEventBus()
  const paidCallBudget = config.budgets.paid_call_budget

  const coreExecutor = createStageExecutor({
    store,
    adapters: registry,
    composer: createRequestComposer({ store, digestThresholdChars: config.execution.digest_threshold_chars }),
    gate: createContractGate({ contracts: roleContracts(config), scope: config.gates.scope }),
    sessions: createSessionManager({ store, eventBus }),
    settings: {
      budgets: {
        paidCallBudget,
        retryBudget: config.budgets.retry_budget,
        retryDelayMs: config.budgets.retry_delay_ms,
      },
      heartbeatSec: config.execution.heartbeat_sec,
      sessionMode: config.session.mode,
      cwd,
    },
    eventBus,
  })

  const resolveVerifier = async (): Promise<RegressionVerifier | undefined> => {
    let command = config.review.verify_command
    if (command === undefined) {
      const commands = (await store.readJson(VERIFY_COMMANDS_PATH, VerifyCommandsSchema)) ?? []
      if (commands.length > 0) command = commands.join(' && ')
    }
    if (command === undefined) return undefined
    return new CommandVerifier({
      command,
      cwd,
      ...(options.runner !== undefined ? { runner: options.runner } : {}),
    })
  }

  const createReview = async (overrides: ReviewOverrides = {}): Promise<ReviewCoordinator> => {
    const review = config.review
    const tool = overrides.tool ?? review.tool
    const adapter = registry.require(tool)
    const deadlineSec = review.timeout_sec
    const fixAdapter = review.fix_tool !== undefined ? registry.get(review.fix_tool) : undefined
    const verifier = await resolveVerifier()

    return createReviewCoordinator({
      store,
      runner: new AdapterLensRunner({ store, adapter, cwd, deadlineSec, paidCallBudget }),
      lenses: overrides.lenses ?? review.lenses,
      timeoutSec: review.timeout_sec,
      securityMode: overrides.securityMode ?? review.security_mode,
      securityMaxRounds: review.security_max_rounds,
      paidCallBudget,
      eventBus,
      ...(fixAdapter !== undefined
        ? { applier: new AdapterFixApplier({ store, adapter: fixAdapter, cwd, deadlineSec, paidCallBudget }) }
        : {}),
      ...(verifier !== undefined ? { verifier } : {}),
      ...(options.reviewGraceMs !== undefined ? { graceMs: options.reviewGraceMs } : {}),
    })
  }

  const executor = createReviewStageExecutor({
    inner: coreExecutor,
    store,
    createCoordinator: (stage: StageSpec) => createReview({ tool: stage.tool }),
    eventBus,
  })

  return {
    config,
    store,
    registry,
    eventBus,
    executor,
    orchestrator: createPipelineOrchestrator({ store, executor, paidCallBudget, eventBus }),
    createReviewCoordinator: createReview,
  }
}
