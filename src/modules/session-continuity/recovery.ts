/**
 * Session recovery document.
 */

import type { SessionRecovery } from '../state-store/schemas.js'

export function renderRecoveryDocument(recovery: SessionRecovery): string {
  const none = (value: string | null): string => value ?? '<none>'
  return [
    '# Session Recovery Required',
    '',
    `Generated: ${recovery.generated_at}`,
    `Phase: ${recovery.phase}`,
    `Tool: ${recovery.tool}`,
    `Stage: ${recovery.stage}`,
    '',
    '## Reason',
    '',
    recovery.reason,
    '',
    '## Session Values',
    '',
    `- Expected session ID: ${none(recovery.expected)}`,
    `- Actual session ID: ${none(recovery.actual)}`,
    `- Resume target: ${none(recovery.resume_target)}`,
    '',
    '## Recovery Procedure (Required)',
    '',
    '1. Re-run the capability probe and confirm `resume_supported` for this tool.',
    '2. Re-detect session candidates and validate which ID is the correct continuation.',
    `3. Update the phase session record at \`sessions/${recovery.phase}/${recovery.tool}.json\`.`,
    '4. Resume the same phase from the failed stage.',
    '5. Do not continue with a fresh session for this phase unless the session policy is changed.',
    '',
  ].join('\n')
}
