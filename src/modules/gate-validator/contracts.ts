/**
 * Built-in role contracts.
 */

import type { RoleContract } from './types.js'

const sections = (requiredSections: string[], expectsDiff = false): RoleContract => ({
  requiredSections,
  minLines: 0,
  expectsDiff,
})

export const DEFAULT_ROLE_CONTRACTS: Readonly<Record<string, RoleContract>> = {
  brief: sections([
    '## Summary',
    '## Acceptance',
    '## Scope',
    '## Constraints',
    '## Verify Commands',
    '## Updated Context Pack',
  ]),
  impl: sections([], true),
  review: sections(['## Findings', '## Test gaps', '## Breaking changes', '## Minimal fix']),
  runbook: sections(['## Problem', '## Plan', '## Commands', '## Risks']),
  static_verify: sections(['## Pre-execution checks', '## Dangerous changes', '## Rollback plan', '## Go/No-Go']),
  test_design: { requiredSections: [], minLines: 10, expectsDiff: false },
  test_impl: sections(['## Added or Updated Tests', '## Unified Diff', '## Rationale'], true),
}
