/**
 * Atomic file primitives.
 *
 *  - atomicWriteFile: write a unique `.partial` sibling, then rename over the target
 *  - KeyedMutex: serializes async critical sections per key within this process
 *  - withFileLock: advisory `<path>.lock` created with O_EXCL, for writers in other processes
 */

import { randomBytes } from 'node:crypto'
import { mkdir, open, rename, rm, stat, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { StateStoreError } from '../../core/errors.js'
import { sleep } from '../../utils/helpers.js'

/** Lock files older than this are considered abandoned */
export const STALE_LOCK_MS = 30_000

const LOCK_POLL_MS = 25

/**
 * Replace `path` with `data` in one rename. Readers see either the old or
 * the new content, never a partial write.
 */
export async function atomicWriteFile(path: string, data: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true })
  const partial = `${path}.${String(process.pid)}.${randomBytes(4).toString('hex')}.partial`
  try {
    await writeFile(partial, data, 'utf-8')
    await rename(partial, path)
  } catch (err) {
    await rm(partial, { force: true })
    throw err
  }
}

/**
 * In-process mutex keyed by string (usually a file path).
 */
export class KeyedMutex {
  private readonly _tails = new Map<string, Promise<void>>()

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this._tails.get(key) ?? Promise.resolve()
    let release: () => void = () => undefined
    const current = new Promise<void>((resolve) => {
      release = resolve
    })
    const tail = previous.then(() => current)
    this._tails.set(key, tail)

    await previous
    try {
      return await fn()
    } finally {
      release()
      if (this._tails.get(key) === tail) this._tails.delete(key)
    }
  }
}

async function isStale(lockPath: string): Promise<boolean> {
  try {
    const info = await stat(lockPath)
    return Date.now() - info.mtimeMs > STALE_LOCK_MS
  } catch {
    // Vanished between the failed open and the stat: the holder released it
    return false
  }
}

/**
 * Run `fn` while holding `<path>.lock`.
 *
 * @throws {StateStoreError} when the lock cannot be taken within `timeoutMs`
 */
export async function withFileLock<T>(
  path: string,
  fn: () => Promise<T>,
  timeoutMs = 10_000
): Promise<T> {
  const lockPath = `${path}.lock`
  await mkdir(dirname(lockPath), { recursive: true })
  const deadline = Date.now() + timeoutMs

  for (;;) {
    try {
      const handle = await open(lockPath, 'wx')
      await handle.writeFile(String(process.pid))
      await handle.close()
      break
    } catch (err) {
      const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined
      if (code !== 'EEXIST') throw err
      if (await isStale(lockPath)) {
        await rm(lockPath, { force: true })
        continue
      }
      if (Date.now() >= deadline) {
        throw new StateStoreError(`Timed out waiting for lock ${lockPath}`, { lockPath, timeoutMs })
      }
      await sleep(LOCK_POLL_MS)
    }
  }

  try {
    return await fn()
  } finally {
    await rm(lockPath, { force: true })
  }
}
