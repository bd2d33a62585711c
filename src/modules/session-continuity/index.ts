export { createSessionManager, SessionContinuityManagerImpl } from './session-manager-impl.js'
export type { SessionManagerOptions } from './session-manager-impl.js'
export { SessionLeases, defaultSessionLeases } from './session-lease.js'
export { diffSnapshots, extractSessionId, isStreamSource, snapshotStateDir } from './extractor.js'
export { renderRecoveryDocument } from './recovery.js'
export type * from './types.js'
