/**
 * Error definitions for Baton
 * Provides structured error hierarchy for all pipeline operations
 */

/** Base error class for all Baton errors */
export class BatonError extends Error {
  public readonly code: string
  public readonly context: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {}
  ) {
    super(message)
    this.name = 'BatonError'
    this.code = code
    this.context = context
    // Maintains proper stack trace for V8 (not available in all environments)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, BatonError)
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    }
  }
}

/** Error thrown when configuration is invalid */
export class ConfigError extends BatonError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'CONFIG_ERROR', context)
    this.name = 'ConfigError'
  }
}

/** Error thrown when a stage plan cannot be resolved or is malformed */
export class StagePlanError extends BatonError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STAGE_PLAN_ERROR', context)
    this.name = 'StagePlanError'
  }
}

/** Error thrown when a persisted state record cannot be read or written */
export class StateStoreError extends BatonError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, 'STATE_STORE_ERROR', context)
    this.name = 'StateStoreError'
  }
}

/** Error thrown when no adapter is registered for a tool */
export class ToolNotFoundError extends BatonError {
  constructor(tool: string) {
    super(`No tool adapter registered for: ${tool}`, 'TOOL_NOT_FOUND', { tool })
    this.name = 'ToolNotFoundError'
  }
}

/**
 * Fatal continuity failure: a resumed call returned a session id other than
 * the phase baseline, or no id at all when one was required.
 *
 * Never retried. The recovery document path is carried in `context`.
 */
export class SessionMismatchError extends BatonError {
  public readonly expectedId: string | null
  public readonly actualId: string | null

  constructor(
    message: string,
    expectedId: string | null,
    actualId: string | null,
    context: Record<string, unknown> = {}
  ) {
    super(message, 'SESSION_MISMATCH', { expectedId, actualId, ...context })
    this.name = 'SessionMismatchError'
    this.expectedId = expectedId
    this.actualId = actualId
  }
}

/** Error thrown when a second caller tries to resume a (phase, tool) session that is already leased */
export class SessionLeaseError extends BatonError {
  constructor(phase: string, tool: string, holder: string) {
    super(
      `Session for phase "${phase}" and tool "${tool}" is already being resumed by "${holder}"`,
      'SESSION_LEASE_HELD',
      { phase, tool, holder }
    )
    this.name = 'SessionLeaseError'
  }
}
