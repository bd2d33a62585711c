/**
 * Lens focus text, lens prompts and the security auto-trigger.
 */

export const SECURITY_LENS = 'security'

const FOCUS: Readonly<Record<string, string>> = {
  correctness: [
    'Focus strictly on correctness and behavioral defects.',
    'Prioritize logic errors, incorrect edge-case handling, state transitions, and regressions.',
  ].join('\n'),
  security: [
    'Focus strictly on security risks and unsafe patterns.',
    'Prioritize injection vectors, authz/authn gaps, secret exposure, data leaks, and unsafe shell usage.',
  ].join('\n'),
  maintainability: [
    'Focus strictly on maintainability and long-term code health.',
    'Prioritize clarity, cohesion, duplication, fragile coupling, and testability gaps.',
  ].join('\n'),
}

const GENERIC_FOCUS = 'Focus on actionable code review findings for this specific lens.'

export function lensFocusPrompt(lens: string): string {
  return FOCUS[lens] ?? GENERIC_FOCUS
}

/** Context pack followed by the lens section appended for one lens run */
export function buildLensPrompt(lens: string, contextPack: string, implReport: string): string {
  return [
    contextPack.trimEnd(),
    '',
    '## Parallel Review Lens',
    `Lens: ${lens}`,
    '',
    lensFocusPrompt(lens),
    '',
    'Additional constraints:',
    '- Analysis only. Do not apply fixes.',
    '- Produce concrete, file-targeted findings.',
    '- Include severity and confidence in findings.',
    '',
    '## Implementation Report',
    implReport.trimEnd(),
    '',
  ].join('\n')
}

export const SECURITY_KEYWORDS: readonly string[] = [
  'auth', 'crypto', 'secret', 'token', 'apikey', 'api_key', 'permission', 'rbac', 'acl', 'session',
  'password', 'passwd', 'hash', 'hmac', 'sign', 'eval', 'exec', 'cors', 'csrf', 'csp', 'infra',
  'firewall', 'certificate', 'tls', 'ssl', 'private_key', 'ssh_key',
]

/**
 * First security keyword found (case-insensitive substring) in any of the
 * texts, or undefined when none matches.
 */
export function securityTrigger(texts: readonly string[]): string | undefined {
  for (const text of texts) {
    const lowered = text.toLowerCase()
    const hit = SECURITY_KEYWORDS.find((kw) => lowered.includes(kw))
    if (hit !== undefined) return hit
  }
  return undefined
}
