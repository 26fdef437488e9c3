/**
 * @file nonce.ts
 * @description Per-response nonce generation
 */

import {randomBytes} from 'crypto'
import {NONCE_BYTES} from './constants'
import {NonceGenerationError} from './errors'

/**
 * Generates a cryptographically secure random nonce.
 * @param byteLength - random bytes to draw, never fewer than 16
 * @returns base64url without padding
 * @throws NonceGenerationError when the random source fails
 */
export function generateNonce(byteLength: number = NONCE_BYTES): string {
  let bytes: Buffer
  try {
    bytes = randomBytes(Math.max(byteLength, NONCE_BYTES))
  } catch (err) {
    throw new NonceGenerationError(err)
  }
  return bytes.toString('base64url')
}
