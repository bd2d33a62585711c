/**
 * Pure extraction of the parts of a brief artifact that feed later stages:
 * the refreshed context pack and the verify command block.
 */

export type ContextSyncStatus = 'updated' | 'missing-section' | 'empty-section' | 'invalid-content'

export interface ContextSync {
  status: ContextSyncStatus
  content?: string
}

const UPDATED_CONTEXT_HEADING = /^##\s+Updated Context Pack\s*$/i
const H2 = /^##\s+(.+?)\s*$/
const NUMBERED = /^\d+\.\s+/
const FENCE = '```'

/**
 * Pull the numbered `## N. ...` sections following `## Updated Context Pack`.
 * Collection stops at the first un-numbered `##` heading after them.
 */
export function extractUpdatedContextPack(artifact: string): ContextSync {
  const lines = artifact.split('\n')
  const start = lines.findIndex((l) => UPDATED_CONTEXT_HEADING.test(l))
  if (start === -1) return { status: 'missing-section' }

  const context: string[] = []
  let inContext = false
  for (const line of lines.slice(start + 1)) {
    const heading = H2.exec(line)?.[1]
    if (heading !== undefined) {
      if (NUMBERED.test(heading.trim())) {
        inContext = true
        context.push(line)
        continue
      }
      if (inContext) break
    }
    if (inContext) context.push(line)
  }

  while (context.length > 0 && context[0]?.trim() === '') context.shift()
  while (context.length > 0 && context[context.length - 1]?.trim() === '') context.pop()
  if (context.length === 0) return { status: 'empty-section' }

  const content = `${context.join('\n')}\n`
  if (!/^##\s+\d+\.\s+/m.test(content)) return { status: 'invalid-content' }
  return { status: 'updated', content }
}

/**
 * Commands from the first fenced block under `## Verify Commands`.
 * Returns an empty list when the section or its block is absent.
 */
export function extractVerifyCommands(artifact: string): string[] {
  const commands: string[] = []
  let inSection = false
  let inBlock = false
  for (const line of artifact.split('\n')) {
    const heading = H2.exec(line)?.[1]
    if (heading !== undefined) {
      if (heading.trim().toLowerCase() === 'verify commands') {
        inSection = true
        inBlock = false
        continue
      }
      if (inSection && !inBlock) break
    }
    if (!inSection) continue

    if (line.trim().startsWith(FENCE)) {
      if (!inBlock) {
        inBlock = true
        continue
      }
      break
    }
    if (inBlock && line.trim() !== '') commands.push(line.trim())
  }
  return commands
}
