/**
 * Diagnostic-stream normalization and signature hashing.
 *
 * Two failures that differ only in volatile tokens (timestamps, UUIDs,
 * task-local paths, bearer-like credentials) must hash to the same
 * signature so their counts accumulate together.
 */

import { sha256Hex } from '../../utils/helpers.js'

/** Only the head of the diagnostic stream is examined */
export const MAX_DIAGNOSTIC_LINES = 100

/** Prefix length fed to the hash after normalization */
export const SIGNATURE_PREFIX_CHARS = 500

const REPLACEMENTS: ReadonlyArray<readonly [RegExp, string]> = [
  [/\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g, 'TIMESTAMP'],
  [/\b\d{10,13}\b/g, 'EPOCH'],
  [/\b[0-9]{8}-[0-9]{3,}\b/g, 'TASK_ID'],
  [/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, 'UUID'],
  [/(\.baton\/tasks|\.tmp\/task)\/[^\s/]+/g, '$1/TASK'],
  [/(sk-|ghp_|Bearer )[a-zA-Z0-9._-]{10,}/g, 'REDACTED_TOKEN'],
]

/** First `MAX_DIAGNOSTIC_LINES` lines of a diagnostic stream */
export function diagnosticHead(stderr: string): string {
  return stderr.split('\n').slice(0, MAX_DIAGNOSTIC_LINES).join('\n')
}

/**
 * Strip volatile tokens from a diagnostic stream and cut it to the
 * signature prefix length.
 */
export function normalizeDiagnostics(stderr: string): string {
  let content = diagnosticHead(stderr)
  for (const [pattern, replacement] of REPLACEMENTS) {
    content = content.replace(pattern, replacement)
  }
  return content.slice(0, SIGNATURE_PREFIX_CHARS).trim()
}

/** `sig:` followed by the first 16 hex chars of the normalized text's SHA-256 */
export function hashDiagnostics(stderr: string): string {
  return `sig:${sha256Hex(normalizeDiagnostics(stderr)).slice(0, 16)}`
}

/** Class-prefixed signature key, e.g. `transient:sig:0123456789abcdef` */
export function computeSignature(errorClass: string, stderr: string): string {
  return `${errorClass}:${hashDiagnostics(stderr)}`
}
