export { classifyError } from './classifier.js'
export { decideRetry, type RetryContext } from './retry-policy.js'
export {
  computeSignature,
  hashDiagnostics,
  normalizeDiagnostics,
  diagnosticHead,
  MAX_DIAGNOSTIC_LINES,
  SIGNATURE_PREFIX_CHARS,
} from './signature.js'
export type { ErrorClass, Classification, ClassificationInput, RetryDecision } from './types.js'
export { ERROR_CLASSES } from './types.js'
