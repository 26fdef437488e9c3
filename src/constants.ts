/**
 * @file constants.ts
 * @description Shared constants for the policy builder
 */

/**
 * Directive names defined by CSP levels 1, 2 and 3.
 * @see https://developer.mozilla.org/en-US/docs/Web/HTTP/Headers/Content-Security-Policy
 */
export const WELL_KNOWN_DIRECTIVES = [
  // level 1
  'default-src',
  'connect-src',
  'font-src',
  'frame-src',
  'img-src',
  'media-src',
  'object-src',
  'sandbox',
  'script-src',
  'style-src',
  // level 2
  'base-uri',
  'child-src',
  'frame-ancestors',
  'plugin-types',
  'form-action',
  // level 3
  'trusted-types',
  'require-trusted-types-for',
  'style-src-attr',
  'style-src-elem',
  'script-src-attr',
  'script-src-elem',
  'worker-src',
  'navigate-to',
  'prefetch-src',
  'manifest-src',
  'report-to',
] as const

/**
 * Source flags in the order they are rendered.
 */
export const SOURCE_FLAGS = [
  'nonce',
  'strict-dynamic',
  'self',
  'unsafe-inline',
  'unsafe-eval',
  'unsafe-allow-redirects',
  'unsafe-hashes',
  'blob:',
  'data:',
  'mediastream:',
  'filesystem:',
] as const

export const DEFAULT_NONCE_PLACEHOLDER = '$NONCE'

/** Random bytes drawn per nonce (128 bits). */
export const NONCE_BYTES = 16

export const CSP_HEADER = 'Content-Security-Policy'
export const CSP_REPORT_ONLY_HEADER = 'Content-Security-Policy-Report-Only'

// Literal sources, for use with Directive.add()
export const NONE = "'none'"
export const ALL = '*'
export const SELF = "'self'"
export const STRICT_DYNAMIC = "'strict-dynamic'"
export const UNSAFE_INLINE = "'unsafe-inline'"
export const UNSAFE_EVAL = "'unsafe-eval'"
export const UNSAFE_HASHES = "'unsafe-hashes'"
export const UNSAFE_ALLOW_REDIRECTS = "'unsafe-allow-redirects'"
export const REPORT_SAMPLE = "'report-sample'"
export const TRUSTED_SCRIPT = "'script'"
export const BLOB = 'blob:'
export const DATA = 'data:'
export const MEDIASTREAM = 'mediastream:'
export const FILESYSTEM = 'filesystem:'
