/**
 * @file compiler.ts
 * @description
 *   Pure functions turning a set of directives into a header value. The
 *   Policy class caches the result of compilePolicy() as its template; the
 *   per-request path only ever calls these functions, never mutates it.
 *
 *   Output grammar:
 *     name sources(;name sources)*[;upgrade-insecure-requests][;report-uri <uri>]
 */

import type {ReadonlyDirective} from './directive'
import type {CompiledPolicy, DirectiveAdditions, DirectiveName} from './types'

export interface CompileInput {
  directives: ReadonlyMap<DirectiveName, ReadonlyDirective>
  upgradeInsecureRequests: boolean
  reportUri: string
  noncePlaceholder: string
  additions?: ReadonlyMap<DirectiveName, ReadonlyDirective>
}

/**
 * Emission order: default-src first, then every other name in code-unit order.
 */
export function directiveOrder(names: Iterable<DirectiveName>): DirectiveName[] {
  return [...names].sort((a, b) => {
    if (a === b) return 0
    if (a === 'default-src') return -1
    if (b === 'default-src') return 1
    return a < b ? -1 : 1
  })
}

function isMap<D>(
  additions: DirectiveAdditions<D>,
): additions is ReadonlyMap<DirectiveName, D> {
  return additions instanceof Map
}

/**
 * Normalizes a record or map of request-scoped directives into a map.
 */
export function toAdditionMap<D>(
  additions: DirectiveAdditions<D> | undefined,
): ReadonlyMap<DirectiveName, D> {
  if (!additions) return new Map()
  if (isMap(additions)) return additions
  const map = new Map<DirectiveName, D>()
  for (const [name, directive] of Object.entries(additions)) {
    if (directive !== undefined) map.set(name, directive)
  }
  return map
}

/**
 * Tokens an addition contributes after a static directive: `*` when it
 * allows everything, otherwise its own tokens (possibly none).
 */
function additionTokens(
  directive: ReadonlyDirective,
  noncePlaceholder: string,
): string[] {
  if (directive.all) return ['*']
  return directive.tokens(noncePlaceholder)
}

/**
 * A directive needs a nonce when its rendered tokens carry the placeholder,
 * whether from the nonce flag or a literal source. `*` carries none.
 */
function carriesPlaceholder(
  directive: ReadonlyDirective,
  noncePlaceholder: string,
): boolean {
  if (directive.all) return false
  return directive.tokens(noncePlaceholder).includes(noncePlaceholder)
}

export function compilePolicy(input: CompileInput): CompiledPolicy {
  const {directives, upgradeInsecureRequests, reportUri, noncePlaceholder} =
    input
  const additions = input.additions ?? new Map()
  let requiresNonce = false
  let header = ''

  for (const name of directiveOrder(directives.keys())) {
    const directive = directives.get(name)
    if (!directive) continue

    header += `${name} ${directive.render(noncePlaceholder)}`
    requiresNonce ||= carriesPlaceholder(directive, noncePlaceholder)

    const extra = additions.get(name)
    if (extra) {
      const tokens = additionTokens(extra, noncePlaceholder)
      if (tokens.length) header += ` ${tokens.join(' ')}`
      requiresNonce ||= carriesPlaceholder(extra, noncePlaceholder)
    }

    header += ';'
  }

  if (upgradeInsecureRequests) {
    header += 'upgrade-insecure-requests;'
  }

  if (reportUri) {
    header += `report-uri ${reportUri}`
  }

  if (header.endsWith(';')) {
    header = header.slice(0, -1)
  }

  return {header, requiresNonce}
}

/**
 * Replaces every occurrence of the placeholder with `'nonce-<nonce>'`.
 */
export function substituteNonce(
  template: string,
  noncePlaceholder: string,
  nonce: string,
): string {
  return template.split(noncePlaceholder).join(`'nonce-${nonce}'`)
}
