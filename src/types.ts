/**
 * @file types.ts
 * @description Shared types for the policy model, middleware and CLI
 */

import type {SOURCE_FLAGS, WELL_KNOWN_DIRECTIVES} from './constants'

/**
 * Directive names predefined by CSP levels 1 to 3.
 */
export type WellKnownDirective = (typeof WELL_KNOWN_DIRECTIVES)[number]

/**
 * Any directive name. Well-known names autocomplete, experimental ones are
 * accepted verbatim.
 */
export type DirectiveName = WellKnownDirective | (string & {})

/**
 * Keyword and scheme sources a directive can switch on, in render order.
 */
export type SourceFlag = (typeof SOURCE_FLAGS)[number]

/**
 * Digest sizes accepted for hash sources.
 */
export type HashAlgorithm = 256 | 384 | 512

/**
 * Shared logger interface used by the policy, the middleware and the CLI.
 */
export interface Logger
  extends Pick<Console, 'error' | 'warn' | 'info' | 'debug'> {}

/**
 * Initial state of a directive.
 */
export interface DirectiveInit {
  flags?: readonly SourceFlag[]
  sources?: readonly string[]
  all?: boolean
  none?: boolean
}

/**
 * A request-scoped set of directives to merge into a compiled policy.
 */
export type DirectiveAdditions<D> =
  | ReadonlyMap<DirectiveName, D>
  | Readonly<Record<string, D | undefined>>

export interface PolicyOptions {
  /**
   * Appends `upgrade-insecure-requests` (default: false).
   */
  upgradeInsecureRequests?: boolean

  /**
   * Appends `report-uri <reportUri>` when non-empty (default: '').
   */
  reportUri?: string

  /**
   * Token left in the compiled template wherever a nonce is required
   * (default: '$NONCE').
   */
  noncePlaceholder?: string

  /**
   * A logger implementing error, warn, info, debug (default: console).
   */
  logger?: Logger
}

/**
 * Result of compiling a policy, with or without request-scoped additions.
 */
export interface CompiledPolicy {
  header: string
  requiresNonce: boolean
}

/**
 * Header value with its nonce substituted, and the nonce itself
 * ('' when the policy needs none).
 */
export interface NonceResult {
  header: string
  nonce: string
}

export interface CSPMiddlewareOptions {
  /**
   * Sends Content-Security-Policy-Report-Only instead of the enforcing header.
   */
  reportOnly?: boolean

  /**
   * A logger implementing error, warn, info, debug (default: console).
   */
  logger?: Logger
}

/**
 * Options collected by the CLI from flags and environment variables.
 */
export interface CLIOptions {
  configPath: string
  presets: Record<string, readonly string[]>
  starter?: boolean
  upgradeInsecureRequests?: boolean
  reportUri?: string
  noncePlaceholder?: string
  reportOnly: boolean
  withNonce: boolean
  outputFormat: 'header' | 'raw' | 'json'
}
