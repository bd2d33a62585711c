/**
 * SessionLeases - at most one active resumer per (phase, tool).
 *
 * A second caller asking for a held pair is rejected outright; concurrent
 * resumes of one baseline are not supported.
 */

import { randomUUID } from 'node:crypto'
import { SessionLeaseError } from '../../core/errors.js'

interface Lease {
  token: string
  holder: string
}

export class SessionLeases {
  private readonly _held = new Map<string, Lease>()

  /**
   * @returns a token to pass to release()
   * @throws {SessionLeaseError} when another holder has the pair
   */
  acquire(phase: string, tool: string, holder: string): string {
    const key = `${phase}\u0000${tool}`
    const current = this._held.get(key)
    if (current !== undefined) {
      throw new SessionLeaseError(phase, tool, current.holder)
    }
    const token = randomUUID()
    this._held.set(key, { token, holder })
    return token
  }

  /** Release a lease; a stale or unknown token is ignored */
  release(phase: string, tool: string, token: string): void {
    const key = `${phase}\u0000${tool}`
    if (this._held.get(key)?.token === token) this._held.delete(key)
  }

  isHeld(phase: string, tool: string): boolean {
    return this._held.has(`${phase}\u0000${tool}`)
  }
}

/** Process-wide lease table shared by every manager that is not given its own */
export const defaultSessionLeases = new SessionLeases()
