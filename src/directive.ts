/**
 * @file directive.ts
 * @description
 *   Directive: the allowed sources of one CSP directive. A directive holds a
 *   set of keyword/scheme flags, an ordered list of literal sources, and the
 *   two special `all` (`*`) and `none` (`'none'`) states.
 *
 *   Rendering is a pure function of those fields:
 *     1. `all` renders `*` and nothing else
 *     2. no flags and no sources render `'none'`
 *     3. otherwise flags in SOURCE_FLAGS order, then sources as inserted
 *
 * @example
 * const scripts = new Directive()
 *   .allow('self', 'nonce')
 *   .add('https://cdn.example.com')
 *   .hash(256, 'doSomething()')
 */

import {ALL, DEFAULT_NONCE_PLACEHOLDER, NONE, SOURCE_FLAGS} from './constants'
import {ImmutableDirectiveError} from './errors'
import {hashSource} from './hash'
import type {DirectiveInit, HashAlgorithm, SourceFlag} from './types'

/**
 * Read-only view of a directive. Shared directives are handed out as this
 * type so that nothing can add sources to them.
 */
export interface ReadonlyDirective {
  readonly flags: ReadonlySet<SourceFlag>
  readonly sources: readonly string[]
  readonly all: boolean
  readonly none: boolean
  /** True when the nonce flag is set and the directive does not allow all. */
  readonly requiresNonce: boolean
  has(flag: SourceFlag): boolean
  /** Source tokens in render order, before the all/none rules apply. */
  tokens(noncePlaceholder?: string): string[]
  render(noncePlaceholder?: string): string
  clone(): Directive
}

/**
 * Renders a flag as its source token. Schemes stay bare, keywords are
 * single-quoted and the nonce flag becomes the placeholder.
 */
function flagToken(flag: SourceFlag, noncePlaceholder: string): string {
  if (flag === 'nonce') return noncePlaceholder
  if (flag.endsWith(':')) return flag
  return `'${flag}'`
}

export class Directive implements ReadonlyDirective {
  private readonly _flags = new Set<SourceFlag>()
  private readonly _sources: string[] = []
  private _all = false
  private _none = false
  private frozen = false

  constructor(init: DirectiveInit = {}) {
    const {flags = [], sources = [], all = false, none = false} = init
    for (const flag of flags) this._flags.add(flag)
    this._sources.push(...sources)
    this._all = all
    this._none = none
  }

  get flags(): ReadonlySet<SourceFlag> {
    return this._flags
  }

  get sources(): readonly string[] {
    return this._sources
  }

  get all(): boolean {
    return this._all
  }

  get none(): boolean {
    return this._none
  }

  get requiresNonce(): boolean {
    return !this._all && this._flags.has('nonce')
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  has(flag: SourceFlag): boolean {
    return this._flags.has(flag)
  }

  /**
   * Switches on keyword or scheme flags. Order of the arguments does not
   * matter: flags always render in SOURCE_FLAGS order.
   */
  allow(...flags: SourceFlag[]): this {
    this.assertMutable()
    for (const flag of flags) this._flags.add(flag)
    return this
  }

  /** Renders this directive as `*` regardless of its other fields. */
  allowAll(): this {
    this.assertMutable()
    this._all = true
    return this
  }

  allowNone(): this {
    this.assertMutable()
    this._none = true
    return this
  }

  /**
   * Appends literal sources (origins, schemes, quoted keywords) verbatim.
   * The caller is responsible for well-formed tokens.
   */
  add(...sources: string[]): this {
    this.assertMutable()
    this._sources.push(...sources)
    return this
  }

  /**
   * Appends the hash source of `content`.
   * @throws UnsupportedHashAlgorithmError for anything but 256, 384 or 512
   */
  hash(algorithm: HashAlgorithm, content: string | Uint8Array): this {
    this.assertMutable()
    this._sources.push(hashSource(algorithm, content))
    return this
  }

  tokens(noncePlaceholder: string = DEFAULT_NONCE_PLACEHOLDER): string[] {
    const tokens: string[] = []
    for (const flag of SOURCE_FLAGS) {
      if (this._flags.has(flag)) tokens.push(flagToken(flag, noncePlaceholder))
    }
    tokens.push(...this._sources)
    return tokens
  }

  /**
   * Renders the source list, without the directive name.
   */
  render(noncePlaceholder: string = DEFAULT_NONCE_PLACEHOLDER): string {
    if (this._all) return ALL
    const tokens = this.tokens(noncePlaceholder)
    return tokens.length ? tokens.join(' ') : NONE
  }

  /** Returns an independent, mutable copy. */
  clone(): Directive {
    return new Directive({
      flags: [...this._flags],
      sources: this._sources,
      all: this._all,
      none: this._none,
    })
  }

  /**
   * Makes this directive permanently immutable.
   */
  freeze(): ReadonlyDirective {
    this.frozen = true
    return this
  }

  toString(): string {
    return this.render()
  }

  private assertMutable(): void {
    if (this.frozen) throw new ImmutableDirectiveError()
  }
}

/** Shared `'self'` directive. */
export const selfOnly: ReadonlyDirective = new Directive({flags: ['self']}).freeze()

/** Shared `'none'` directive. */
export const noneOnly: ReadonlyDirective = new Directive({none: true}).freeze()
