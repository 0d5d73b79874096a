/**
 * @file Handshake Key Derivation
 *
 * `Sec-WebSocket-Key` generation and the matching `Sec-WebSocket-Accept`
 * computation (RFC 6455 section 1.3).
 *
 * @see https://www.rfc-editor.org/rfc/rfc6455#section-1.3
 */

import { createHash, timingSafeEqual } from 'node:crypto'
import type { RandomSource } from '../types.js'

/** Fixed GUID appended to the key before hashing */
export const WEBSOCKET_MAGIC_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11'

/** Size of the random nonce behind the key */
const KEY_NONCE_BYTES = 16

/**
 * Generates a fresh base64-encoded 16-byte nonce.
 */
export function generateHandshakeKey(random: RandomSource): string {
  return Buffer.from(random.randomBytes(KEY_NONCE_BYTES)).toString('base64')
}

/**
 * base64(SHA-1(key + GUID))
 *
 * @example
 * computeAcceptValue('dGhlIHNhbXBsZSBub25jZQ==') // 's3pPLMBiTxaQ9kYGzzhZRbK+xOo='
 */
export function computeAcceptValue(key: string): string {
  return createHash('sha1').update(key + WEBSOCKET_MAGIC_GUID).digest('base64')
}

/**
 * Compares a received `Sec-WebSocket-Accept` value with the expected one in
 * constant time.
 */
export function isValidAcceptValue(key: string, accept: string): boolean {
  const expected = Buffer.from(computeAcceptValue(key))
  const actual = Buffer.from(accept)

  if (expected.length !== actual.length) {
    return false
  }

  return timingSafeEqual(expected, actual)
}
