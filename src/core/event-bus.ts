/**
 * TypedEventBus - typed internal pub/sub for decoupled module communication.
 *
 * Built on top of Node.js EventEmitter.
 *
 * Event dispatch is synchronous: handlers run immediately when emit() is
 * called. Async work should be scheduled by the handler itself.
 */

import { EventEmitter } from 'node:events'
import type { PipelineEvents } from './event-bus.types.js'

// ---------------------------------------------------------------------------
// TypedEventBus interface
// ---------------------------------------------------------------------------

/**
 * A typed publish-subscribe bus.
 *
 * All event names and payload types are enforced by the `PipelineEvents` map.
 */
export interface TypedEventBus {
  /** Emit an event; all registered handlers run before emit() returns. */
  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void

  /** Subscribe to an event. */
  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void

  /** Unsubscribe a previously registered handler. No-op when not registered. */
  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void
}

// ---------------------------------------------------------------------------
// TypedEventBusImpl
// ---------------------------------------------------------------------------

/**
 * Concrete implementation of TypedEventBus backed by Node.js EventEmitter.
 *
 * @example
 * const bus = new TypedEventBusImpl()
 * bus.on('stage:completed', ({ stageId }) => {
 *   console.log(`${stageId} done`)
 * })
 */
export class TypedEventBusImpl implements TypedEventBus {
  private readonly _emitter: EventEmitter

  constructor() {
    this._emitter = new EventEmitter()
    this._emitter.setMaxListeners(100)
  }

  emit<K extends keyof PipelineEvents>(event: K, payload: PipelineEvents[K]): void {
    this._emitter.emit(event, payload)
  }

  on<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.on(event, handler)
  }

  off<K extends keyof PipelineEvents>(
    event: K,
    handler: (payload: PipelineEvents[K]) => void
  ): void {
    this._emitter.off(event, handler)
  }
}

// ---------------------------------------------------------------------------
// Factory function
// ---------------------------------------------------------------------------

/**
 * Create a new TypedEventBus instance.
 */
export function createEventBus(): TypedEventBus {
  return new TypedEventBusImpl()
}
