/**
 * Finding parser and merger.
 *
 * Pure functions turning free-text lens artifacts into Finding records.
 * Severity, confidence, target and evidence are keyword heuristics over a
 * single candidate line; they are deliberately simple and must stay stable,
 * since downstream queue order and dedup depend on them.
 */

import {
  SEVERITY_RANK,
  type Confidence,
  type Finding,
  type MergeResult,
  type RawFinding,
  type Severity,
} from './types.js'

const FENCE = '```'
const NUMBERED = /^\d+\.\s+/
const SEVERITY_KEYWORD = /\b(critical|high|major|medium|warning|minor|low|info)\b/i
const TARGET_FILE = /([A-Za-z0-9_./-]+\.(?:sh|py|md|json|ya?ml|ts|js|tsx|jsx|go|rs|java|kt|rb|php|c|cpp|h))/
const TARGET_LOCATION = /((?:L|line)\s*\d+|:\d+(?::\d+)?)/i
const EVIDENCE_ID = /\b(?:CVE-\d{4}-\d+|RFC\s*\d+|EVID-\d+)\b/gi
const PROPOSAL = /\b(?:fix|suggestion|suggest|recommendation|recommend)\s*:\s*(.+)$/i
const MIN_CANDIDATE_CHARS = 8

// Dedup keys ignore severity and confidence labels so the same issue reported
// at different severities collides
const LABEL = /\b(?:severity|confidence)\s*[:=]\s*[a-z]+/g
const SEVERITY_WORDS = /\b(?:critical|high|major|medium|warning|minor|low|info)\b/g

// ---------------------------------------------------------------------------
// Field heuristics
// ---------------------------------------------------------------------------

/** Substring priority: critical > high/major > medium/warning > low/info, else minor */
export function detectSeverity(text: string): Severity {
  const t = text.toLowerCase()
  if (t.includes('critical')) return 'critical'
  if (t.includes('high') || t.includes('major')) return 'major'
  if (t.includes('medium') || t.includes('warning')) return 'medium'
  if (t.includes('low') || t.includes('info')) return 'low'
  return 'minor'
}

export function detectConfidence(text: string, hasFile: boolean, hasLocation: boolean): Confidence {
  const t = text.toLowerCase()
  if (t.includes('confidence: high') || (hasFile && hasLocation)) return 'high'
  if (t.includes('confidence: low')) return 'low'
  return 'medium'
}

export function findTargetFile(text: string): string {
  return TARGET_FILE.exec(text)?.[1] ?? ''
}

export function findTargetLocation(text: string): string {
  return TARGET_LOCATION.exec(text)?.[1]?.trim() ?? ''
}

export function extractEvidenceIds(text: string): string[] {
  const ids: string[] = []
  for (const match of text.matchAll(EVIDENCE_ID)) {
    const id = match[0].toUpperCase().replace(/\s+/g, '')
    if (!ids.includes(id)) ids.push(id)
  }
  return ids
}

function normalizeIssue(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/** (target file, normalized issue text) */
export function dedupKey(finding: Pick<RawFinding, 'target_file' | 'issue'>): string {
  const issue = finding.issue
    .toLowerCase()
    .replace(LABEL, ' ')
    .replace(SEVERITY_WORDS, ' ')
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
  return `${finding.target_file.toLowerCase()}\u0000${issue}`
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function candidateOf(stripped: string): string | null {
  if (stripped.startsWith('- ') || stripped.startsWith('* ')) return stripped.slice(2).trim()
  if (NUMBERED.test(stripped)) return stripped.replace(NUMBERED, '').trim()
  if (SEVERITY_KEYWORD.test(stripped)) return stripped
  return null
}

/**
 * Extract raw findings from one lens artifact.
 *
 * Candidates are bullet or numbered lines, or any line naming a severity
 * keyword. Code fences, blank lines and headings are skipped.
 */
export function parseLensFindings(lens: string, text: string): RawFinding[] {
  const findings: RawFinding[] = []
  let inCode = false

  for (const line of text.split('\n')) {
    const stripped = line.trim()
    if (stripped.startsWith(FENCE)) {
      inCode = !inCode
      continue
    }
    if (inCode || stripped === '' || stripped.startsWith('#')) continue

    const candidate = candidateOf(stripped)
    if (candidate === null || candidate.length < MIN_CANDIDATE_CHARS) continue

    const targetFile = findTargetFile(candidate)
    const targetLocation = findTargetLocation(candidate)
    const evidenceIds = extractEvidenceIds(candidate)
    const lowered = candidate.toLowerCase()

    findings.push({
      lens,
      target_file: targetFile,
      target_location: targetLocation,
      issue: normalizeIssue(candidate),
      proposed_improvement: PROPOSAL.exec(candidate)?.[1]?.trim() ?? '',
      severity: detectSeverity(candidate),
      confidence: detectConfidence(candidate, targetFile !== '', targetLocation !== ''),
      uses_external_evidence:
        evidenceIds.length > 0 || lowered.includes('http://') || lowered.includes('https://'),
      evidence_ids: evidenceIds,
    })
  }
  return findings
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

export interface LensText {
  lens: string
  text: string
}

/**
 * Merge lens outputs into deduplicated findings.
 *
 * Every key collision counts toward `dedup_removed`; when the newcomer is
 * strictly more severe it replaces the kept record and `conflict_resolved`
 * is incremented. Ids follow first-seen key order, so identical input always
 * yields identical output.
 */
export function mergeFindings(outputs: readonly LensText[]): MergeResult {
  const rawCounts: Record<string, number> = {}
  const kept = new Map<string, RawFinding>()
  let dedupRemoved = 0
  let conflictResolved = 0

  for (const { lens, text } of outputs) {
    const parsed = parseLensFindings(lens, text)
    rawCounts[lens] = (rawCounts[lens] ?? 0) + parsed.length

    for (const finding of parsed) {
      const key = dedupKey(finding)
      const existing = kept.get(key)
      if (existing === undefined) {
        kept.set(key, finding)
        continue
      }
      dedupRemoved += 1
      if (SEVERITY_RANK[finding.severity] > SEVERITY_RANK[existing.severity]) {
        // Map.set on an existing key keeps its original insertion position
        kept.set(key, finding)
        conflictResolved += 1
      }
    }
  }

  const findings: Finding[] = Array.from(kept.values(), (finding, index) => ({
    ...finding,
    finding_id: `F${String(index + 1).padStart(3, '0')}`,
  }))

  return {
    findings,
    log: {
      lenses: outputs.map((o) => o.lens),
      raw_finding_counts: rawCounts,
      dedup_removed: dedupRemoved,
      conflict_resolved: conflictResolved,
      evidence_rejected: 0,
      final_count: findings.length,
    },
  }
}
