/**
 * @file Upgrade Handshake Negotiator
 *
 * Drives the HTTP/1.1 upgrade exchange over an open transport, including the
 * NTLM / Negotiate retry loop, and validates the server's accept token.
 *
 * ## Negotiation Flow
 *
 * ```
 *        send request
 *             │
 *             ▼
 *    ┌──► read response ──── end of stream ───► HandshakeError(connection-closed)
 *    │        │
 *    │        ├── 401 + WWW-Authenticate ──► AuthSession.respond(challenge)
 *    │        │                                   │
 *    │        │                                   ▼
 *    └────────┼──────────────────── resend request + Authorization
 *             │
 *             ├── 101 ──► check Upgrade / Connection / Sec-WebSocket-Accept ──► done
 *             │
 *             └── other ──► HandshakeError(unexpected-status)
 * ```
 *
 * @module ws-stream-client/handshake/negotiator
 */

import {
  AuthSession,
  isSupportedScheme,
  parseAuthChallenge,
  servicePrincipalName,
  type SecurityProvider,
} from '../auth/security-provider.js'
import {
  AuthenticationError,
  AuthenticationErrorCodes,
  HandshakeError,
  HandshakeErrorCodes,
  toError,
} from '../errors.js'
import type { Transport } from '../transport/types.js'
import type { LogFn, RandomSource } from '../types.js'
import { generateHandshakeKey, isValidAcceptValue } from './accept-key.js'
import { parseResponseHead, readResponseHead, type HandshakeResponse } from './http-response.js'

// =============================================================================
// Types
// =============================================================================

export interface HandshakeOptions {
  host: string
  port: number
  path: string
  /** Extra request headers, written after the standard ones */
  headers: Record<string, string>
  random: RandomSource
  maxHandshakeBytes: number
  maxAuthRounds: number
  securityProvider?: SecurityProvider
  /** Overrides the `HTTP/<fqdn>` target name used for Negotiate */
  servicePrincipalName?: string
  log: LogFn
}

export interface HandshakeResult {
  /** The `Sec-WebSocket-Key` that was sent */
  key: string
  /** The accepted `101` response */
  response: HandshakeResponse
  /** Present when authentication took place; owned by the caller from here on */
  authSession?: AuthSession
}

// =============================================================================
// Request Construction
// =============================================================================

/**
 * Builds the upgrade request head, without the terminating empty line.
 *
 * @example
 * ```typescript
 * buildUpgradeRequest({ host: 'example.com', port: 80, path: '/chat', headers: {} }, key)
 * // 'GET /chat HTTP/1.1\r\nHost: example.com:80\r\nUpgrade: websocket\r\n...'
 * ```
 */
export function buildUpgradeRequest(
  target: Pick<HandshakeOptions, 'host' | 'port' | 'path' | 'headers'>,
  key: string
): string {
  const lines = [
    `GET ${target.path} HTTP/1.1`,
    `Host: ${target.host}:${target.port}`,
    'Upgrade: websocket',
    'Connection: Upgrade',
    `Sec-WebSocket-Key: ${key}`,
    'Sec-WebSocket-Version: 13',
    ...Object.entries(target.headers).map(([name, value]) => `${name}: ${value}`),
  ]
  return lines.map((line) => `${line}\r\n`).join('')
}

// =============================================================================
// Negotiation
// =============================================================================

/**
 * Performs the upgrade handshake.
 *
 * On failure any auth session is released before the error propagates; the
 * caller still owns (and must close) the transport.
 *
 * @throws {HandshakeError} For a closed stream, a malformed or refused response
 * @throws {AuthenticationError} When a 401 challenge cannot be answered
 */
export async function negotiateHandshake(
  transport: Transport,
  options: HandshakeOptions
): Promise<HandshakeResult> {
  const key = generateHandshakeKey(options.random)
  const request = buildUpgradeRequest(options, key)
  let session: AuthSession | undefined

  try {
    options.log('debug', 'Sending upgrade request', { path: options.path })
    await transport.send(Buffer.from(`${request}\r\n`))

    for (;;) {
      const head = await readResponseHead(transport, options.maxHandshakeBytes)
      if (head === null) {
        throw new HandshakeError(
          'Socket closed unexpectedly during handshake',
          HandshakeErrorCodes.CONNECTION_CLOSED
        )
      }

      const response = parseResponseHead(head)
      options.log('debug', 'Handshake response', {
        status: response.status,
        statusText: response.statusText,
      })

      const challengeHeader = response.status === 401 ? response.headers.get('WWW-Authenticate') : undefined
      if (challengeHeader !== undefined) {
        session = await continueAuthentication(transport, options, session, challengeHeader)
        const authorization = await session.respond(parseAuthChallenge(challengeHeader).token)
        options.log('debug', 'Answering authentication challenge', {
          scheme: session.scheme,
          round: session.rounds,
        })
        await transport.send(Buffer.from(`${request}Authorization: ${authorization}\r\n\r\n`))
        continue
      }

      if (response.status !== 101) {
        throw new HandshakeError(
          `Server returned HTTP status ${response.status}, expected 101`,
          HandshakeErrorCodes.UNEXPECTED_STATUS,
          { status: response.status }
        )
      }

      validateUpgradeResponse(response, key)
      return { key, response, authSession: session }
    }
  } catch (error) {
    await releaseSession(session, options.log)
    throw error
  }
}

/**
 * Opens the auth session on the first challenge and checks that later
 * challenges continue the same negotiation.
 */
async function continueAuthentication(
  transport: Transport,
  options: HandshakeOptions,
  session: AuthSession | undefined,
  header: string
): Promise<AuthSession> {
  const { scheme } = parseAuthChallenge(header)

  if (!isSupportedScheme(scheme)) {
    throw new AuthenticationError(
      `Unsupported authentication scheme "${scheme}"`,
      AuthenticationErrorCodes.UNSUPPORTED_SCHEME,
      { scheme }
    )
  }

  if (session === undefined) {
    if (!options.securityProvider) {
      throw new AuthenticationError(
        `Server requires ${scheme} authentication but no security provider is configured`,
        AuthenticationErrorCodes.NO_PROVIDER,
        { scheme }
      )
    }
    const targetName = scheme === 'Negotiate' ? await resolveTargetName(transport, options) : undefined
    return new AuthSession(options.securityProvider, scheme, targetName)
  }

  if (session.complete || session.scheme !== scheme || session.rounds >= options.maxAuthRounds) {
    throw new AuthenticationError(
      `Server rejected ${session.scheme} authentication after ${session.rounds} round(s)`,
      AuthenticationErrorCodes.REJECTED,
      { scheme }
    )
  }

  return session
}

async function resolveTargetName(
  transport: Transport,
  options: HandshakeOptions
): Promise<string | undefined> {
  if (options.servicePrincipalName) {
    return options.servicePrincipalName
  }
  const fqdn = await transport.canonicalHostname?.()
  return fqdn ? servicePrincipalName(fqdn) : undefined
}

function validateUpgradeResponse(response: HandshakeResponse, key: string): void {
  const upgrade = response.headers.get('Upgrade')
  const connection = response.headers.get('Connection')
  const accept = response.headers.get('Sec-WebSocket-Accept')

  if (upgrade !== 'websocket' || connection !== 'Upgrade' || accept === undefined) {
    throw new HandshakeError(
      'Malformed response: missing or unexpected Upgrade, Connection or Sec-WebSocket-Accept header',
      HandshakeErrorCodes.MISSING_UPGRADE_HEADERS,
      { status: response.status }
    )
  }

  if (!isValidAcceptValue(key, accept)) {
    throw new HandshakeError(
      'Invalid value for Sec-WebSocket-Accept',
      HandshakeErrorCodes.INVALID_ACCEPT,
      { status: response.status }
    )
  }
}

async function releaseSession(session: AuthSession | undefined, log: LogFn): Promise<void> {
  try {
    await session?.release()
  } catch (error) {
    log('warn', 'Failed to release security context', { error: toError(error).message })
  }
}
