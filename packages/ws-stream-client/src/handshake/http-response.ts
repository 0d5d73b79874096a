/**
 * @file HTTP Upgrade Response Reading
 *
 * Reads the head of the server's HTTP response off the transport and parses
 * its status line and headers.
 *
 * Only the head is consumed: bytes after the `\r\n\r\n` terminator stay in
 * the transport, since a server may start sending frames right behind a
 * `101 Switching Protocols`.
 *
 * @module ws-stream-client/handshake/http-response
 */

import { HandshakeError, HandshakeErrorCodes } from '../errors.js'
import type { ByteSource } from '../transport/types.js'

/** Size of each peek while looking for the terminator */
const PEEK_SIZE = 4096

const HEAD_TERMINATOR = Buffer.from('\r\n\r\n')

/**
 * A parsed response head.
 *
 * Header names are case-sensitive; the last value wins on duplicate names.
 */
export interface HandshakeResponse {
  status: number
  statusText: string
  headers: Map<string, string>
}

// =============================================================================
// Reading
// =============================================================================

/**
 * Reads bytes up to and including the first `\r\n\r\n`.
 *
 * Peeks the stream, and consumes exactly the bytes that belong to the head.
 *
 * @returns The head as latin1 text, or `null` if the stream ended first
 * @throws {HandshakeError} When the head grows past `maxBytes`
 */
export async function readResponseHead(source: ByteSource, maxBytes: number): Promise<string | null> {
  let head = Buffer.alloc(0)

  for (;;) {
    const chunk = await source.receive(PEEK_SIZE, { peek: true })
    if (chunk === null) {
      return null
    }

    const combined = Buffer.concat([head, chunk])
    // The terminator may straddle the previous chunk boundary.
    const end = combined.indexOf(HEAD_TERMINATOR, Math.max(0, head.length - HEAD_TERMINATOR.length + 1))

    if (end !== -1) {
      const length = end + HEAD_TERMINATOR.length
      if (!(await consume(source, length - head.length))) {
        return null
      }
      return combined.subarray(0, length).toString('latin1')
    }

    if (combined.length > maxBytes) {
      throw new HandshakeError(
        `Handshake response exceeds ${maxBytes} bytes without a header terminator`,
        HandshakeErrorCodes.RESPONSE_TOO_LARGE
      )
    }

    if (!(await consume(source, chunk.length))) {
      return null
    }
    head = combined
  }
}

/**
 * Discards exactly `count` bytes that were previously peeked.
 */
async function consume(source: ByteSource, count: number): Promise<boolean> {
  let remaining = count
  while (remaining > 0) {
    const bytes = await source.receive(remaining)
    if (bytes === null) {
      return false
    }
    remaining -= bytes.length
  }
  return true
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parses a response head into status and headers.
 *
 * @example
 * ```typescript
 * const response = parseResponseHead('HTTP/1.1 101 Switching Protocols\r\nUpgrade: websocket\r\n\r\n')
 * response.status                 // 101
 * response.headers.get('Upgrade') // 'websocket'
 * ```
 *
 * @throws {HandshakeError} With code `malformed-status-line` when the status
 *   token is missing or not numeric
 */
export function parseResponseHead(head: string): HandshakeResponse {
  const lines = head.split('\r\n')
  const statusLine = lines[0] ?? ''

  const space = statusLine.indexOf(' ')
  if (space === -1) {
    throw malformed(statusLine)
  }

  const nextSpace = statusLine.indexOf(' ', space + 1)
  const token = statusLine.slice(space + 1, nextSpace === -1 ? undefined : nextSpace)
  if (!/^\d+$/.test(token)) {
    throw malformed(statusLine)
  }

  const headers = new Map<string, string>()
  for (const line of lines.slice(1)) {
    const colon = line.indexOf(': ')
    if (colon !== -1) {
      headers.set(line.slice(0, colon), line.slice(colon + 2))
    }
  }

  return {
    status: Number(token),
    statusText: nextSpace === -1 ? '' : statusLine.slice(nextSpace + 1),
    headers,
  }
}

function malformed(statusLine: string): HandshakeError {
  return new HandshakeError(
    `Malformed status line: "${statusLine}"`,
    HandshakeErrorCodes.MALFORMED_STATUS_LINE
  )
}
