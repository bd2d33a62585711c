/**
 * Unit tests for security-escalation.ts
 */

import { describe, it, expect, vi } from 'vitest'
import { runSecurityEscalation, securityIssues, securitySeverity } from '../security-escalation.js'
import type { Finding, FixApplier, RawFinding, Severity } from '../types.js'

function raw(lens: string, severity: Severity, issue: string): RawFinding {
  return {
    lens,
    target_file: 'src/auth.ts',
    target_location: '',
    issue,
    proposed_improvement: '',
    severity,
    confidence: 'medium',
    uses_external_evidence: false,
    evidence_ids: [],
  }
}

const NOW = (): Date => new Date('2026-01-01T00:00:00.500Z')

function applier() {
  const applySecurityFixes = vi.fn((_round: number, _findings: Finding[]) => Promise.resolve(true))
  return { applyFix: () => Promise.resolve(true), applySecurityFixes }
}

// ---------------------------------------------------------------------------
// Severity helpers
// ---------------------------------------------------------------------------

describe('securitySeverity', () => {
  it('reports major as high and ignores other lenses', () => {
    expect(securitySeverity([raw('security', 'major', 'a'), raw('security', 'minor', 'b')])).toBe('high')
    expect(securitySeverity([raw('correctness', 'critical', 'c')])).toBe('none')
    expect(securitySeverity([raw('security', 'low', 'd')])).toBe('low')
  })

  it('lists issues per level', () => {
    const findings = [raw('security', 'critical', ' rce '), raw('security', 'major', 'weak hash'), raw('security', 'major', '')]
    expect(securityIssues(findings, 'critical')).toEqual(['rce'])
    expect(securityIssues(findings, 'high')).toEqual(['weak hash'])
  })
})

// ---------------------------------------------------------------------------
// Escalation loop
// ---------------------------------------------------------------------------

describe('runSecurityEscalation', () => {
  it('stops on an initial critical finding without fixing', async () => {
    const fixes = applier()
    const rerun = vi.fn(() => Promise.resolve<string | null>(''))
    const { outcome, result } = await runSecurityEscalation([raw('security', 'critical', 'rce via eval')], {
      mode: 'auto',
      applier: fixes,
      rerunSecurityLens: rerun,
      now: NOW,
    })

    expect(outcome).toBe('critical_stop')
    expect(result).toEqual({
      enabled: true,
      mode: 'auto',
      final_severity: 'critical',
      stop_action: 'STOP_AND_CONFIRM',
      rounds_run: 0,
      critical_findings: ['rce via eval'],
      high_findings_remaining: [],
      timestamp: '2026-01-01T00:00:00Z',
    })
    expect(fixes.applySecurityFixes).not.toHaveBeenCalled()
    expect(rerun).not.toHaveBeenCalled()
  })

  it('is clean below high without running a round', async () => {
    const { outcome, result } = await runSecurityEscalation([raw('security', 'medium', 'verbose errors')], {
      mode: 'on',
      rerunSecurityLens: () => Promise.resolve(null),
      now: NOW,
    })
    expect(outcome).toBe('clean')
    expect(result.final_severity).toBe('medium')
    expect(result.rounds_run).toBe(0)
    expect(result.stop_action).toBeNull()
  })

  it('fixes, verifies and reruns until the recheck is clean', async () => {
    const fixes = applier()
    const verify = vi.fn(() => Promise.resolve(true))
    const onRound = vi.fn()
    const { outcome, result } = await runSecurityEscalation([raw('security', 'major', 'weak hash')], {
      mode: 'auto',
      applier: fixes,
      verifier: { verify },
      rerunSecurityLens: () => Promise.resolve('- src/auth.ts medium risk token logged'),
      onRound,
      now: NOW,
    })

    expect(outcome).toBe('clean')
    expect(result.final_severity).toBe('none')
    expect(result.rounds_run).toBe(1)
    expect(verify).toHaveBeenCalledWith(1)
    expect(onRound).toHaveBeenCalledWith(1, 'medium')
    const [round, sent] = fixes.applySecurityFixes.mock.calls[0] ?? []
    expect(round).toBe(1)
    expect(sent).toEqual([{ ...raw('security', 'major', 'weak hash'), finding_id: 'S1-001' }])
  })

  it('stops when a recheck turns up a critical finding', async () => {
    const { outcome, result } = await runSecurityEscalation([raw('security', 'major', 'weak hash')], {
      mode: 'auto',
      applier: applier(),
      rerunSecurityLens: () => Promise.resolve('- src/auth.ts critical rce via eval'),
      now: NOW,
    })
    expect(outcome).toBe('critical_stop')
    expect(result.rounds_run).toBe(1)
    expect(result.stop_action).toBe('STOP_AND_CONFIRM')
    expect(result.critical_findings).toEqual(['src/auth.ts critical rce via eval'])
  })

  it('warns when HIGH findings survive every round', async () => {
    const fixes = applier()
    const { outcome, result } = await runSecurityEscalation([raw('security', 'major', 'weak hash')], {
      mode: 'auto',
      maxRounds: 2,
      applier: fixes,
      rerunSecurityLens: () => Promise.resolve('- src/auth.ts high risk weak hash'),
      now: NOW,
    })
    expect(outcome).toBe('warning_high_remaining')
    expect(result.final_severity).toBe('high')
    expect(result.rounds_run).toBe(2)
    expect(result.high_findings_remaining).toEqual(['src/auth.ts high risk weak hash'])
    expect(fixes.applySecurityFixes).toHaveBeenCalledTimes(2)
  })

  it('keeps the previous HIGH findings when a rerun fails', async () => {
    const onRound = vi.fn()
    const { outcome, result } = await runSecurityEscalation([raw('security', 'major', 'weak hash')], {
      mode: 'auto',
      maxRounds: 2,
      rerunSecurityLens: () => Promise.resolve(null),
      onRound,
      now: NOW,
    })
    expect(outcome).toBe('warning_high_remaining')
    expect(result.high_findings_remaining).toEqual(['weak hash'])
    expect(onRound.mock.calls).toEqual([
      [1, 'high'],
      [2, 'high'],
    ])
  })

  it('carries on when a fix round throws', async () => {
    const fixes: FixApplier = {
      applyFix: () => Promise.resolve(true),
      applySecurityFixes: () => Promise.reject(new Error('tool crashed')),
    }
    const { outcome } = await runSecurityEscalation([raw('security', 'major', 'weak hash')], {
      mode: 'auto',
      applier: fixes,
      rerunSecurityLens: () => Promise.resolve('- src/auth.ts minor naming'),
      now: NOW,
    })
    expect(outcome).toBe('clean')
  })
})
