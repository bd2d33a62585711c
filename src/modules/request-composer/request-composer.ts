/**
 * RequestComposer - assembles the prompt payload for one stage attempt.
 *
 * Payload layout:
 *   shared rules (optional)
 *   --- BEGIN ROLE TEMPLATE --- ... --- END ROLE TEMPLATE ---
 *   --- BEGIN CONTEXT PACK ---  ... --- END CONTEXT PACK ---
 *   --- BEGIN USER REQUEST ---  ... --- END USER REQUEST ---
 *
 * Inputs are read from the task directory:
 *   inputs/shared_rules.md, inputs/context_pack.md, inputs/request.md,
 *   prompts/<role>.md
 */

import type { DigestPolicy, StageSpec } from '../../core/types.js'
import { isoNow, sha256Hex } from '../../utils/helpers.js'
import { createLogger } from '../../utils/logger.js'
import type { StateStore } from '../state-store/state-store.js'
import { digestContextPack } from './digest.js'

const logger = createLogger('request-composer')

export const CONTEXT_PACK_PATH = 'inputs/context_pack.md'
export const REQUEST_PATH = 'inputs/request.md'
export const SHARED_RULES_PATH = 'inputs/shared_rules.md'

/** Context packs above this size are digested under the `auto` policy */
export const DEFAULT_DIGEST_THRESHOLD_CHARS = 8000

export interface ComposedRequest {
  prompt: string
  sha256: string
  /** Whether the context pack was replaced by its digest */
  digested: boolean
}

export interface RequestComposer {
  compose(stage: StageSpec, digestPolicy: DigestPolicy): Promise<ComposedRequest>
}

export interface RequestComposerOptions {
  store: StateStore
  digestThresholdChars?: number
}

export function shouldDigest(policy: DigestPolicy, contextChars: number, thresholdChars: number): boolean {
  if (policy === 'aggressive') return true
  if (policy === 'auto') return contextChars > thresholdChars
  return false
}

export class FileRequestComposer implements RequestComposer {
  private readonly _store: StateStore
  private readonly _threshold: number

  constructor(options: RequestComposerOptions) {
    this._store = options.store
    this._threshold = options.digestThresholdChars ?? DEFAULT_DIGEST_THRESHOLD_CHARS
  }

  async compose(stage: StageSpec, digestPolicy: DigestPolicy): Promise<ComposedRequest> {
    const shared = await this._store.readText(SHARED_RULES_PATH)
    const template = (await this._store.readText(`prompts/${stage.role}.md`)) ?? `Role: ${stage.role}`
    const request = (await this._store.readText(REQUEST_PATH)) ?? ''
    let context = (await this._store.readText(CONTEXT_PACK_PATH)) ?? ''

    const digested = context !== '' && shouldDigest(digestPolicy, context.length, this._threshold)
    if (digested) {
      const before = context.length
      context = digestContextPack(context, { source: CONTEXT_PACK_PATH, generatedAt: isoNow() })
      logger.info({ stage: stage.stageId, policy: digestPolicy, before, after: context.length }, 'Context pack digested')
    }

    const parts: string[] = []
    if (shared !== null) parts.push(shared, '', '--- END SHARED RULES ---', '')
    parts.push('--- BEGIN ROLE TEMPLATE ---', template, '--- END ROLE TEMPLATE ---', '')
    parts.push('--- BEGIN CONTEXT PACK ---', context, '--- END CONTEXT PACK ---', '')
    parts.push('--- BEGIN USER REQUEST ---', request, '--- END USER REQUEST ---', '')

    const prompt = parts.join('\n')
    return { prompt, sha256: sha256Hex(prompt), digested }
  }
}

export function createRequestComposer(options: RequestComposerOptions): RequestComposer {
  return new FileRequestComposer(options)
}
