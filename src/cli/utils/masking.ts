/**
 * Credential masking for CLI output, persisted excerpts and pino redaction.
 *
 * Tool diagnostics are copied into summaries and failure records; anything
 * that looks like a provider key is scrubbed on the way out.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Placeholder shown instead of a real credential */
export const MASKED_VALUE = '***'

/** Patterns that identify credential values inside free text */
export const API_KEY_PATTERNS: RegExp[] = [
  // Anthropic: sk-ant-...
  /sk-ant-[A-Za-z0-9_-]{20,}/g,
  // OpenAI: sk-...
  /sk-[A-Za-z0-9_-]{20,}/g,
  // Google / Gemini: AIza...
  /AIza[A-Za-z0-9_-]{35,}/g,
  // GitHub tokens
  /gh[pousr]_[A-Za-z0-9]{20,}/g,
  // Authorization headers
  /Bearer\s+[A-Za-z0-9._~+/-]{16,}=*/g,
]

/**
 * Pino redaction paths for credential fields.
 * Pass this array to the `pino({ redact: ... })` option.
 */
export const PINO_REDACT_PATHS: string[] = [
  'apiKey',
  'api_key',
  'token',
  '*.apiKey',
  '*.api_key',
  '*.token',
  'env.ANTHROPIC_API_KEY',
  'env.OPENAI_API_KEY',
  'env.GEMINI_API_KEY',
  'env.GOOGLE_API_KEY',
]

// ---------------------------------------------------------------------------
// String scrubbing
// ---------------------------------------------------------------------------

/**
 * Replace any known credential patterns in a string with `***`.
 * Best-effort: unknown secret formats pass through untouched.
 */
export function maskSecrets(input: string): string {
  let result = input
  for (const pattern of API_KEY_PATTERNS) {
    pattern.lastIndex = 0
    result = result.replace(pattern, MASKED_VALUE)
  }
  return result
}

// ---------------------------------------------------------------------------
// Object masking (for config display)
// ---------------------------------------------------------------------------

const CREDENTIAL_FIELDS = new Set([
  'api_key',
  'apiKey',
  'api_key_value',
  'token',
  'secret',
  'password',
])

/**
 * Deep-clone a plain-object tree and replace known credential fields with `***`.
 * Strings are scrubbed with maskSecrets; other primitives are returned as-is.
 */
export function deepMask(value: unknown): unknown {
  if (value === null || value === undefined) return value
  if (typeof value === 'string') return maskSecrets(value)
  if (Array.isArray(value)) return value.map(deepMask)
  if (typeof value === 'object') {
    const masked: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      masked[k] = CREDENTIAL_FIELDS.has(k) ? MASKED_VALUE : deepMask(v)
    }
    return masked
  }
  return value
}
