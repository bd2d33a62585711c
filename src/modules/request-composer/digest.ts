/**
 * Context-pack digest - the aggressive compaction applied when a request
 * is too large.
 *
 * Keeps only the essential `##` sections (goal, non-goals, scope,
 * acceptance, fixed decisions, files to read, prohibited actions), each cut
 * to `maxLinesPerSection` body lines. A pack with none of those sections is
 * reduced to its first `FALLBACK_LINES` lines.
 */

export const DIGEST_SECTIONS: readonly string[] = [
  'goal',
  'non-goal',
  'scope',
  'acceptance',
  'fixed decision',
  'files to read',
  'prohibited action',
]

export const DEFAULT_MAX_LINES_PER_SECTION = 40
export const FALLBACK_LINES = 100

interface Section {
  heading: string
  lines: string[]
}

function normalizeHeading(heading: string): string {
  return heading.trim().replace(/^\d+\.\s*/, '').toLowerCase()
}

export function isDigestSection(heading: string): boolean {
  const h = normalizeHeading(heading)
  return DIGEST_SECTIONS.some((name) => h.includes(name.replace(/s$/, '')))
}

function splitSections(lines: string[]): Section[] {
  const sections: Section[] = []
  let current: Section | null = null
  for (const line of lines) {
    const match = /^(#{1,2})\s+(.+)/.exec(line)
    if (match?.[2] !== undefined) {
      current = { heading: match[2].trim(), lines: [line] }
      sections.push(current)
    } else if (current !== null) {
      current.lines.push(line)
    }
  }
  return sections
}

export interface DigestOptions {
  maxLinesPerSection?: number
  source?: string
  generatedAt?: string
}

export function digestContextPack(content: string, options: DigestOptions = {}): string {
  const maxLines = options.maxLinesPerSection ?? DEFAULT_MAX_LINES_PER_SECTION
  const lines = content.split('\n')
  const out: string[] = ['# Context Pack Digest (auto-generated)']
  if (options.source !== undefined) out.push(`Source: ${options.source}`)
  if (options.generatedAt !== undefined) out.push(`Generated: ${options.generatedAt}`)
  out.push('', '---', '')

  const kept = splitSections(lines).filter((s) => isDigestSection(s.heading))
  if (kept.length === 0) {
    out.push('## (No standard sections found: first 100 lines)', '')
    out.push(...lines.slice(0, FALLBACK_LINES))
    if (lines.length > FALLBACK_LINES) {
      out.push(`... [${String(lines.length - FALLBACK_LINES)} lines truncated]`)
    }
    return out.join('\n')
  }

  for (const section of kept) {
    const limit = maxLines + 1 // heading line plus body
    out.push(...section.lines.slice(0, limit))
    if (section.lines.length > limit) {
      out.push(`... [${String(section.lines.length - limit)} lines truncated]`)
    }
    out.push('')
  }
  return out.join('\n')
}
