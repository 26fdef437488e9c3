export * from './constants'
export * from './errors'
export {hashSource, isHashAlgorithm} from './hash'
export {generateNonce} from './nonce'
export {Directive, selfOnly, noneOnly, type ReadonlyDirective} from './directive'
export {
  compilePolicy,
  directiveOrder,
  substituteNonce,
  type CompileInput,
} from './compiler'
export {Policy} from './policy'
export {hashInlineContent, type InlineHashes} from './inline'
export {
  contentSecurityPolicy,
  cspAllow,
  cspHash,
  cspHashInline,
  cspNonce,
  type CSPHandler,
  type ResponseLike,
} from './middleware'
export {
  loadPolicyConfig,
  parseDirective,
  policyFromConfig,
  type DirectiveConfig,
  type HashConfig,
  type PolicyConfig,
} from './config'
export type * from './types'
