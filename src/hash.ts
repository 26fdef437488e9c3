/**
 * @file hash.ts
 * @description Hash-source literals for inline scripts and styles
 */

import {createHash} from 'crypto'
import {UnsupportedHashAlgorithmError} from './errors'
import type {HashAlgorithm} from './types'

const DIGESTS: Readonly<Record<HashAlgorithm, string>> = {
  256: 'sha256',
  384: 'sha384',
  512: 'sha512',
}

export function isHashAlgorithm(value: unknown): value is HashAlgorithm {
  return value === 256 || value === 384 || value === 512
}

/**
 * Computes a hash source such as `'sha256-<base64>'` over the exact content.
 * Strings are hashed as UTF-8.
 * @throws UnsupportedHashAlgorithmError for anything but 256, 384 or 512
 */
export function hashSource(
  algorithm: HashAlgorithm,
  content: string | Uint8Array,
): string {
  if (!isHashAlgorithm(algorithm)) {
    throw new UnsupportedHashAlgorithmError(algorithm)
  }
  const digest = createHash(DIGESTS[algorithm]).update(content).digest('base64')
  return `'sha${algorithm}-${digest}'`
}
