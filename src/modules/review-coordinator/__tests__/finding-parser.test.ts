/**
 * Unit tests for finding-parser.ts
 */

import { describe, it, expect } from 'vitest'
import {
  dedupKey,
  detectConfidence,
  detectSeverity,
  extractEvidenceIds,
  findTargetFile,
  findTargetLocation,
  mergeFindings,
  parseLensFindings,
} from '../finding-parser.js'

// ---------------------------------------------------------------------------
// Field heuristics
// ---------------------------------------------------------------------------

describe('detectSeverity', () => {
  it('applies substring priority', () => {
    expect(detectSeverity('Highly critical')).toBe('critical')
    expect(detectSeverity('HIGH risk')).toBe('major')
    expect(detectSeverity('a warning')).toBe('medium')
    expect(detectSeverity('info only')).toBe('low')
    expect(detectSeverity('odd naming')).toBe('minor')
  })
})

describe('detectConfidence', () => {
  it('is high with both a file and a location', () => {
    expect(detectConfidence('whatever', true, true)).toBe('high')
  })

  it('honours explicit labels', () => {
    expect(detectConfidence('Confidence: high', false, false)).toBe('high')
    expect(detectConfidence('confidence: low', true, false)).toBe('low')
    expect(detectConfidence('no label', true, false)).toBe('medium')
  })
})

describe('targets and evidence', () => {
  it('finds the first file with a known extension', () => {
    expect(findTargetFile('see src/app.ts:12 and docs/a.md')).toBe('src/app.ts')
    expect(findTargetFile('no file here')).toBe('')
  })

  it('finds line references in either form', () => {
    expect(findTargetLocation('src/a.ts L10 unsafe')).toBe('L10')
    expect(findTargetLocation('src/a.ts:12:4 unsafe')).toBe(':12:4')
    expect(findTargetLocation('nothing')).toBe('')
  })

  it('normalizes evidence ids and drops duplicates', () => {
    expect(extractEvidenceIds('CVE-2020-1234, rfc 7519 and cve-2020-1234')).toEqual(['CVE-2020-1234', 'RFC7519'])
  })
})

describe('dedupKey', () => {
  it('ignores severity and confidence labels', () => {
    const a = dedupKey({ target_file: 'src/App.ts', issue: 'Severity: high. Missing null check' })
    const b = dedupKey({ target_file: 'src/app.ts', issue: 'severity=low missing   null check' })
    expect(a).toBe(b)
  })
})

// ---------------------------------------------------------------------------
// parseLensFindings
// ---------------------------------------------------------------------------

describe('parseLensFindings', () => {
  it('builds a full record from a bullet line', () => {
    const [finding] = parseLensFindings('security', '- src/a.ts L10 unsafe eval of input, fix: use JSON.parse')
    expect(finding).toEqual({
      lens: 'security',
      target_file: 'src/a.ts',
      target_location: 'L10',
      issue: 'src/a.ts L10 unsafe eval of input, fix: use JSON.parse',
      proposed_improvement: 'use JSON.parse',
      severity: 'minor',
      confidence: 'high',
      uses_external_evidence: false,
      evidence_ids: [],
    })
  })

  it('takes numbered lines and bare severity lines', () => {
    const text = ['1. docs/readme.md typo in the install section', 'Warning: token printed to stdout'].join('\n')
    const findings = parseLensFindings('correctness', text)
    expect(findings.map((f) => [f.issue, f.severity])).toEqual([
      ['docs/readme.md typo in the install section', 'minor'],
      ['Warning: token printed to stdout', 'medium'],
    ])
  })

  it('skips headings, code fences, blank and short lines', () => {
    const text = ['# Lens: security', '', '```', '- src/x.ts critical inside a fence', '```', '- ok', 'plain prose line'].join(
      '\n'
    )
    expect(parseLensFindings('security', text)).toEqual([])
  })

  it('flags external evidence', () => {
    const [withId] = parseLensFindings('security', '- lib/x.py weak digest, see CVE-2020-1234')
    expect(withId?.uses_external_evidence).toBe(true)
    expect(withId?.evidence_ids).toEqual(['CVE-2020-1234'])

    const [withUrl] = parseLensFindings('security', '- see https://example.com/advisory for details')
    expect(withUrl?.uses_external_evidence).toBe(true)
    expect(withUrl?.evidence_ids).toEqual([])
  })
})

// ---------------------------------------------------------------------------
// mergeFindings
// ---------------------------------------------------------------------------

describe('mergeFindings', () => {
  const correctness = [
    '- src/app.ts:12 severity: medium missing null check on user input',
    '1. docs/readme.md typo in the install section',
  ].join('\n')
  const security = '- src/app.ts:12 severity: critical missing null check on user input'

  it('keeps the most severe of colliding findings in first-seen position', () => {
    const result = mergeFindings([
      { lens: 'correctness', text: correctness },
      { lens: 'security', text: security },
    ])

    expect(result.findings.map((f) => [f.finding_id, f.lens, f.severity, f.target_file])).toEqual([
      ['F001', 'security', 'critical', 'src/app.ts'],
      ['F002', 'correctness', 'minor', 'docs/readme.md'],
    ])
    expect(result.log).toEqual({
      lenses: ['correctness', 'security'],
      raw_finding_counts: { correctness: 2, security: 1 },
      dedup_removed: 1,
      conflict_resolved: 1,
      evidence_rejected: 0,
      final_count: 2,
    })
  })

  it('keeps the existing record when the newcomer is less severe', () => {
    const result = mergeFindings([
      { lens: 'security', text: security },
      { lens: 'correctness', text: correctness },
    ])
    expect(result.findings[0]?.lens).toBe('security')
    expect(result.log.dedup_removed).toBe(1)
    expect(result.log.conflict_resolved).toBe(0)
  })

  it('is deterministic for identical input', () => {
    const input = [
      { lens: 'correctness', text: correctness },
      { lens: 'security', text: security },
    ]
    expect(mergeFindings(input)).toEqual(mergeFindings(input))
  })

  it('handles no outputs', () => {
    expect(mergeFindings([])).toEqual({
      findings: [],
      log: {
        lenses: [],
        raw_finding_counts: {},
        dedup_removed: 0,
        conflict_resolved: 0,
        evidence_rejected: 0,
        final_count: 0,
      },
    })
  })
})
