/**
 * @file policy.ts
 * @description
 *   Policy: a named collection of directives plus the policy-wide
 *   upgrade-insecure-requests and report-uri settings.
 *
 *   Lifecycle:
 *     - configure directives (upsert by name, last write wins)
 *     - build() once at start-up; the result is cached as `compiled`
 *     - per request, read `compiled`, call withNonce(), or merge the
 *       request's own additions with mergeBuild()
 *
 *   build() is the only operation that writes the cached fields. withNonce(),
 *   merge(), mergeBuild() and toMap() leave the policy untouched, so they may be
 *   shared by concurrent requests once build() has run.
 *
 * @example
 * const policy = Policy.starter({reportUri: '/_csp-report'})
 * policy.directive('script-src').allow('self', 'nonce')
 * policy.build()
 *
 * const {header, nonce} = policy.withNonce()
 */

import {DEFAULT_NONCE_PLACEHOLDER, NONE} from './constants'
import {
  compilePolicy,
  directiveOrder,
  substituteNonce,
  toAdditionMap,
} from './compiler'
import {Directive, noneOnly, selfOnly, type ReadonlyDirective} from './directive'
import {PolicyConfigError} from './errors'
import {generateNonce} from './nonce'
import type {
  CompiledPolicy,
  DirectiveAdditions,
  DirectiveName,
  Logger,
  NonceResult,
  PolicyOptions,
} from './types'

export type {PolicyOptions}

export class Policy {
  upgradeInsecureRequests: boolean
  reportUri: string
  readonly noncePlaceholder: string

  private readonly logger: Logger
  private readonly directives = new Map<DirectiveName, ReadonlyDirective>()
  private _compiled: string | null = null
  private _requiresNonce = false

  constructor(opts: PolicyOptions = {}) {
    const {
      upgradeInsecureRequests = false,
      reportUri = '',
      noncePlaceholder = DEFAULT_NONCE_PLACEHOLDER,
      logger = console,
    } = opts

    if (!noncePlaceholder) {
      throw new PolicyConfigError('noncePlaceholder', 'must not be empty')
    }

    this.upgradeInsecureRequests = upgradeInsecureRequests
    this.reportUri = reportUri
    this.noncePlaceholder = noncePlaceholder
    this.logger = logger
  }

  /**
   * Creates a policy seeded with restrictive defaults:
   * default-src 'none', and 'self' for base-uri, connect-src, form-action,
   * img-src, script-src and style-src.
   */
  static starter(opts: PolicyOptions = {}): Policy {
    return new Policy(opts)
      .with('default-src', noneOnly)
      .with('base-uri', selfOnly)
      .with('script-src', selfOnly)
      .with('connect-src', selfOnly)
      .with('img-src', selfOnly)
      .with('style-src', selfOnly)
      .with('form-action', selfOnly)
  }

  /**
   * The last build() result, with the nonce placeholder left in place.
   * Empty until build() has run.
   */
  get compiled(): string {
    return this._compiled ?? ''
  }

  /**
   * Whether any directive asked for a nonce at the last build().
   */
  get requiresNonce(): boolean {
    return this._requiresNonce
  }

  /**
   * Sets a directive, replacing any existing one of the same name.
   */
  with(name: DirectiveName, directive: ReadonlyDirective): this {
    this.directives.set(name, directive)
    return this
  }

  /**
   * Creates an empty directive under `name`, replacing any existing one,
   * and returns it for further configuration.
   */
  directive(name: DirectiveName, ...sources: string[]): Directive {
    const directive = new Directive({sources})
    this.directives.set(name, directive)
    return directive
  }

  remove(name: DirectiveName): boolean {
    return this.directives.delete(name)
  }

  get(name: DirectiveName): ReadonlyDirective | undefined {
    return this.directives.get(name)
  }

  has(name: DirectiveName): boolean {
    return this.directives.has(name)
  }

  /**
   * Directive names in the order they are emitted.
   */
  names(): DirectiveName[] {
    return directiveOrder(this.directives.keys())
  }

  /**
   * Compiles the policy and caches the result as the request-time template.
   * Must not run concurrently with request traffic reading the policy.
   */
  build(): string {
    const {header, requiresNonce} = compilePolicy(this.compileInput())
    this._compiled = header
    this._requiresNonce = requiresNonce
    return header
  }

  /**
   * Returns the compiled header with a fresh nonce substituted for every
   * placeholder. When no directive requires a nonce, the compiled header is
   * returned as is and no randomness is drawn.
   * @throws NonceGenerationError when the random source fails
   */
  withNonce(): NonceResult {
    if (this._compiled === null) this.build()
    if (!this._requiresNonce) {
      return {header: this.compiled, nonce: ''}
    }
    const nonce = generateNonce()
    return {
      header: substituteNonce(this.compiled, this.noncePlaceholder, nonce),
      nonce,
    }
  }

  /**
   * Compiles the policy with request-scoped additions appended to the
   * directives of the same name. Additions for directives the policy does not
   * declare are ignored. The cached template is not touched; nonce
   * substitution, if `requiresNonce`, is left to the caller.
   */
  merge(additions?: DirectiveAdditions<ReadonlyDirective>): CompiledPolicy {
    const extra = toAdditionMap(additions)
    for (const name of extra.keys()) {
      if (!this.directives.has(name)) {
        this.logger.debug(`Ignoring ${name}: not declared by the policy`)
      }
    }
    return compilePolicy({...this.compileInput(), additions: extra})
  }

  mergeBuild(additions?: DirectiveAdditions<ReadonlyDirective>): string {
    return this.merge(additions).header
  }

  /**
   * Exports every directive's rendered sources by name, without the nonce
   * source, for tooling that can only emit a static header.
   */
  toMap(): Record<string, string> {
    const map: Record<string, string> = {}
    for (const name of this.names()) {
      const directive = this.directives.get(name)
      if (!directive) continue
      map[name] = directive.all
        ? '*'
        : directive.tokens(this.noncePlaceholder)
            .filter((token) => token !== this.noncePlaceholder)
            .join(' ') || NONE
    }
    return map
  }

  private compileInput() {
    return {
      directives: this.directives,
      upgradeInsecureRequests: this.upgradeInsecureRequests,
      reportUri: this.reportUri,
      noncePlaceholder: this.noncePlaceholder,
    }
  }
}
