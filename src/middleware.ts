/**
 * @file middleware.ts
 * @description
 *   Express/connect middleware emitting the Content-Security-Policy header of
 *   a Policy. The policy is built once, when the middleware is created.
 *   Per response it:
 *     - substitutes a fresh nonce when the policy requires one
 *     - lets downstream handlers read that nonce with cspNonce(res)
 *     - lets them extend declared directives for this response only
 *       (cspAllow, cspHash, cspHashInline); the header is re-set on every
 *       addition and can no longer change once headers are sent
 *
 * @example
 * const app = express()
 * app.use(contentSecurityPolicy(policy))
 * app.get('/', (req, res) => {
 *   const script = 'doSomething()'
 *   cspHash(res, 'script-src', 256, script)
 *   res.send(`<script>${script}</script>`)
 * })
 */

import {CSP_HEADER, CSP_REPORT_ONLY_HEADER} from './constants'
import {substituteNonce} from './compiler'
import {Directive} from './directive'
import {HeadersSentError} from './errors'
import {hashInlineContent} from './inline'
import {generateNonce} from './nonce'
import type {Policy} from './policy'
import type {
  CSPMiddlewareOptions,
  DirectiveName,
  HashAlgorithm,
  Logger,
} from './types'

/**
 * The part of a Node/Express response the middleware writes to.
 */
export interface ResponseLike {
  readonly headersSent: boolean
  setHeader(name: string, value: string): unknown
}

export type CSPHandler = (
  req: unknown,
  res: ResponseLike,
  next: (err?: unknown) => void,
) => void

interface ResponseState {
  readonly policy: Policy
  readonly headerName: string
  readonly logger: Logger
  nonce: string
  readonly additions: Map<DirectiveName, Directive>
}

const states = new WeakMap<ResponseLike, ResponseState>()

function stateOf(res: ResponseLike): ResponseState {
  const state = states.get(res)
  if (!state) {
    throw new Error('contentSecurityPolicy middleware has not run for this response')
  }
  return state
}

/**
 * Creates the middleware. The returned handler fits `app.use()`.
 */
export function contentSecurityPolicy(
  policy: Policy,
  opts: CSPMiddlewareOptions = {},
): CSPHandler {
  const {reportOnly = false, logger = console} = opts
  const headerName = reportOnly ? CSP_REPORT_ONLY_HEADER : CSP_HEADER

  policy.build()

  return (_req, res, next) => {
    let header = policy.compiled
    let nonce = ''

    if (policy.requiresNonce) {
      const issued = policy.withNonce()
      header = issued.header
      nonce = issued.nonce
      logger.debug('Issued CSP nonce for response')
    }

    states.set(res, {policy, headerName, logger, nonce, additions: new Map()})
    res.setHeader(headerName, header)
    next()
  }
}

/**
 * Returns the nonce issued for this response, or '' when the policy
 * does not use one.
 */
export function cspNonce(res: ResponseLike): string {
  return stateOf(res).nonce
}

/**
 * Adds literal sources to a declared directive for this response only.
 * @throws HeadersSentError once the response headers are flushed
 */
export function cspAllow(
  res: ResponseLike,
  name: DirectiveName,
  ...sources: string[]
): void {
  extend(res, name, (directive) => directive.add(...sources))
}

/**
 * Adds the hash source of `content` to a declared directive for this
 * response only.
 * @throws HeadersSentError once the response headers are flushed
 */
export function cspHash(
  res: ResponseLike,
  name: DirectiveName,
  algorithm: HashAlgorithm,
  content: string | Uint8Array,
): void {
  extend(res, name, (directive) => directive.hash(algorithm, content))
}

/**
 * Hashes the inline scripts and styles of rendered HTML into script-src and
 * style-src for this response only.
 * @throws HeadersSentError once the response headers are flushed
 */
export function cspHashInline(
  res: ResponseLike,
  html: string,
  algorithm: HashAlgorithm = 256,
): void {
  const {scripts, styles} = hashInlineContent(html, algorithm)
  if (scripts.length) cspAllow(res, 'script-src', ...scripts)
  if (styles.length) cspAllow(res, 'style-src', ...styles)
}

function extend(
  res: ResponseLike,
  name: DirectiveName,
  update: (directive: Directive) => void,
): void {
  const state = stateOf(res)
  if (res.headersSent) {
    state.logger.warn(`Dropped request-scoped ${name} sources: headers already sent`)
    throw new HeadersSentError()
  }

  const directive = state.additions.get(name) ?? new Directive()
  update(directive)
  state.additions.set(name, directive)

  const merged = state.policy.merge(state.additions)
  let header = merged.header
  if (merged.requiresNonce) {
    state.nonce ||= generateNonce()
    header = substituteNonce(header, state.policy.noncePlaceholder, state.nonce)
  }
  res.setHeader(state.headerName, header)
}
