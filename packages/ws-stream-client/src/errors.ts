/**
 * @file WebSocket Client Error Classes
 *
 * Custom error classes for connection setup, the upgrade handshake,
 * authentication, framing and transport failures.
 *
 * Setup-time errors (`ConfigurationError`, `ConnectError`, `HandshakeError`,
 * `AuthenticationError`) reject `WebSocketClient.connect()`. Errors raised
 * after the upgrade are delivered once through the disconnect handler, and a
 * caller blocked in `send()` receives the same transport error directly.
 *
 * @example
 * ```typescript
 * import { HandshakeError, AuthenticationError } from 'ws-stream-client'
 *
 * try {
 *   await WebSocketClient.connect({ host: 'localhost', port: 8080 })
 * } catch (error) {
 *   if (error instanceof HandshakeError && error.code === 'unexpected-status') {
 *     console.log('Server answered with', error.status)
 *   } else if (error instanceof AuthenticationError) {
 *     console.log('Authentication failed:', error.code)
 *   }
 * }
 * ```
 *
 * @module ws-stream-client/errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Reasons a handshake can fail.
 */
export const HandshakeErrorCodes = {
  CONNECTION_CLOSED: 'connection-closed',
  RESPONSE_TOO_LARGE: 'response-too-large',
  MALFORMED_STATUS_LINE: 'malformed-status-line',
  UNEXPECTED_STATUS: 'unexpected-status',
  MISSING_UPGRADE_HEADERS: 'missing-upgrade-headers',
  INVALID_ACCEPT: 'invalid-accept',
} as const

export type HandshakeErrorCode = (typeof HandshakeErrorCodes)[keyof typeof HandshakeErrorCodes]

/**
 * Reasons an authentication round can fail.
 */
export const AuthenticationErrorCodes = {
  NO_PROVIDER: 'no-provider',
  UNSUPPORTED_SCHEME: 'unsupported-scheme',
  MISSING_TARGET_NAME: 'missing-target-name',
  PROVIDER_FAILURE: 'provider-failure',
  EMPTY_TOKEN: 'empty-token',
  REJECTED: 'rejected',
} as const

export type AuthenticationErrorCode =
  (typeof AuthenticationErrorCodes)[keyof typeof AuthenticationErrorCodes]

/**
 * Framing violations detected on the wire or on the send path.
 */
export const ProtocolErrorCodes = {
  PAYLOAD_TOO_LARGE: 'payload-too-large',
  MESSAGE_TOO_LARGE: 'message-too-large',
  UNSENDABLE_OPCODE: 'unsendable-opcode',
} as const

export type ProtocolErrorCode = (typeof ProtocolErrorCodes)[keyof typeof ProtocolErrorCodes]

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error raised by the client.
 */
export class WebSocketClientError extends Error {
  /** The original cause of this error, if any */
  override readonly cause?: Error

  constructor(message: string, options?: { cause?: Error }) {
    super(message)
    this.name = 'WebSocketClientError'
    this.cause = options?.cause

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

// =============================================================================
// Setup Errors
// =============================================================================

/**
 * Thrown when client options fail validation.
 *
 * @example
 * ```typescript
 * try {
 *   await WebSocketClient.connect({ host: '', port: 0 })
 * } catch (error) {
 *   if (error instanceof ConfigurationError) {
 *     console.log(error.issues) // ['host: ...', 'port: ...']
 *   }
 * }
 * ```
 */
export class ConfigurationError extends WebSocketClientError {
  /** One entry per failed option, formatted as `path: message` */
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid client configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
    this.issues = issues
  }
}

/**
 * Thrown when the host cannot be resolved or none of its addresses accept
 * a connection.
 */
export class ConnectError extends WebSocketClientError {
  readonly host: string
  readonly port: number

  constructor(message: string, options: { host: string; port: number; cause?: Error }) {
    super(message, { cause: options.cause })
    this.name = 'ConnectError'
    this.host = options.host
    this.port = options.port
  }
}

/**
 * Thrown when the HTTP upgrade response is missing, malformed or refuses the
 * upgrade.
 *
 * @example
 * ```typescript
 * if (error instanceof HandshakeError && error.status === 404) {
 *   console.log('No WebSocket endpoint at that path')
 * }
 * ```
 */
export class HandshakeError extends WebSocketClientError {
  readonly code: HandshakeErrorCode

  /** HTTP status of the offending response, when one was parsed */
  readonly status?: number

  constructor(
    message: string,
    code: HandshakeErrorCode,
    options?: { status?: number; cause?: Error }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'HandshakeError'
    this.code = code
    this.status = options?.status
  }
}

/**
 * Thrown when NTLM / Negotiate authentication cannot be completed.
 */
export class AuthenticationError extends WebSocketClientError {
  readonly code: AuthenticationErrorCode

  /** The scheme named by the server, when known */
  readonly scheme?: string

  constructor(
    message: string,
    code: AuthenticationErrorCode,
    options?: { scheme?: string; cause?: Error }
  ) {
    super(message, { cause: options?.cause })
    this.name = 'AuthenticationError'
    this.code = code
    this.scheme = options?.scheme
  }
}

// =============================================================================
// Post-Handshake Errors
// =============================================================================

/**
 * Raised for frames that break the configured limits or cannot be encoded.
 */
export class ProtocolError extends WebSocketClientError {
  readonly code: ProtocolErrorCode

  constructor(message: string, code: ProtocolErrorCode) {
    super(message)
    this.name = 'ProtocolError'
    this.code = code
  }
}

/**
 * Raised when the underlying byte stream fails.
 *
 * `errno` carries the system error code (e.g. `EPIPE`) when the cause has one.
 */
export class TransportError extends WebSocketClientError {
  readonly errno?: string

  constructor(message: string, options?: { errno?: string; cause?: Error }) {
    super(message, { cause: options?.cause })
    this.name = 'TransportError'
    this.errno = options?.errno
  }
}

/**
 * Raised when a single send does not complete within its timeout.
 *
 * @example
 * ```typescript
 * try {
 *   await client.send(largePayload, 'binary', { timeout: 5000 })
 * } catch (error) {
 *   if (error instanceof SendTimeoutError) {
 *     console.log(`Send timed out after ${error.timeout}ms`)
 *   }
 * }
 * ```
 */
export class SendTimeoutError extends TransportError {
  /** The timeout duration in milliseconds */
  readonly timeout: number

  constructor(timeout: number) {
    super(`Send timed out after ${timeout}ms`, { errno: 'ETIMEDOUT' })
    this.name = 'SendTimeoutError'
    this.timeout = timeout
  }
}

/**
 * Raised by `send()` once the connection has left the `open` state.
 */
export class ConnectionClosedError extends WebSocketClientError {
  constructor(message = 'Connection is not open') {
    super(message)
    this.name = 'ConnectionClosedError'
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Normalizes an unknown thrown value into an `Error`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}

/**
 * Reads the `code` property Node attaches to system errors.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code
  }
  return undefined
}
