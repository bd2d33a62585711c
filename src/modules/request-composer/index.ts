export {
  createRequestComposer,
  FileRequestComposer,
  shouldDigest,
  CONTEXT_PACK_PATH,
  REQUEST_PATH,
  SHARED_RULES_PATH,
  DEFAULT_DIGEST_THRESHOLD_CHARS,
} from './request-composer.js'
export type { ComposedRequest, RequestComposer, RequestComposerOptions } from './request-composer.js'
export { digestContextPack, isDigestSection, DIGEST_SECTIONS } from './digest.js'
