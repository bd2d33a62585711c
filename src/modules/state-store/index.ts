export type { StateStore, StageOutput } from './state-store.js'
export { FileStateStore, createStateStore } from './file-state-store.js'
export { atomicWriteFile, withFileLock, KeyedMutex, STALE_LOCK_MS } from './atomic.js'
export * from './schemas.js'
