/**
 * Shared setup for CLI command tests: a throwaway project with its own
 * config directories, and stdout/stderr capture.
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import yaml from 'js-yaml'
import { vi } from 'vitest'

export interface TestProject {
  root: string
  projectConfigDir: string
  globalConfigDir: string
  /** Empty environment so BATON_* variables of the host never leak in */
  env: NodeJS.ProcessEnv
  /** Write `.baton/config.yaml` */
  writeConfig(config: Record<string, unknown>): Promise<void>
  cleanup(): Promise<void>
}

export async function createTestProject(prefix: string): Promise<TestProject> {
  const root = await mkdtemp(join(tmpdir(), `baton-${prefix}-`))
  const projectConfigDir = join(root, '.baton')
  const globalConfigDir = join(root, 'global')
  await mkdir(projectConfigDir, { recursive: true })
  await mkdir(globalConfigDir, { recursive: true })
  return {
    root,
    projectConfigDir,
    globalConfigDir,
    env: {},
    writeConfig: (config) => writeFile(join(projectConfigDir, 'config.yaml'), yaml.dump(config), 'utf-8'),
    cleanup: () => rm(root, { recursive: true, force: true }),
  }
}

export interface CapturedOutput {
  stdout: () => string
  stderr: () => string
}

/** Capture process.stdout and process.stderr until vi.restoreAllMocks() */
export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString('utf-8')
    return true
  })
  vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString('utf-8')
    return true
  })
  return { stdout: () => stdout, stderr: () => stderr }
}
