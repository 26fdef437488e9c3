/**
 * @file errors.ts
 * @description Errors thrown for programmer and configuration mistakes
 */

export class UnsupportedHashAlgorithmError extends Error {
  override readonly name = 'UnsupportedHashAlgorithmError'

  constructor(readonly algorithm: unknown) {
    super(`Unsupported hash algorithm: ${String(algorithm)} (use 256, 384 or 512)`)
  }
}

export class ImmutableDirectiveError extends Error {
  override readonly name = 'ImmutableDirectiveError'

  constructor() {
    super('Directive is frozen: clone() it before adding sources')
  }
}

export class NonceGenerationError extends Error {
  override readonly name = 'NonceGenerationError'

  constructor(cause: unknown) {
    super('Secure random source failed while generating a nonce', {cause})
  }
}

/**
 * Invalid policy configuration. `path` locates the offending field,
 * e.g. `directives.script-src.hashes[0].algorithm`.
 */
export class PolicyConfigError extends Error {
  override readonly name = 'PolicyConfigError'

  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(path ? `${path}: ${message}` : message, options)
  }
}

export class HeadersSentError extends Error {
  override readonly name = 'HeadersSentError'

  constructor() {
    super('Cannot extend the Content-Security-Policy after headers were sent')
  }
}
