/**
 * @file Shared Types
 *
 * Types shared across the handshake, framing and client modules: the
 * pluggable logger, the owned random source and the application callbacks.
 *
 * @module ws-stream-client/types
 */

import { randomBytes } from 'node:crypto'
import type { WebSocketClient } from './client/websocket-client.js'
import type { Opcode } from './protocol/opcode.js'

// =============================================================================
// Logging
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Logger interface for client debug output.
 *
 * Implement this interface to integrate with your logging infrastructure.
 * All methods are optional; missing methods are no-ops.
 *
 * @example
 * ```typescript
 * const structuredLogger: WebSocketClientLogger = {
 *   debug: (msg, data) => console.debug(JSON.stringify({ level: 'debug', msg, ...data })),
 *   warn: (msg, data) => console.warn(JSON.stringify({ level: 'warn', msg, ...data })),
 *   error: (msg, data) => console.error(JSON.stringify({ level: 'error', msg, ...data })),
 * }
 * ```
 */
export interface WebSocketClientLogger {
  /** Frames, handshake rounds and state changes */
  debug?: (message: string, data?: Record<string, unknown>) => void
  /** Connection established or closed */
  info?: (message: string, data?: Record<string, unknown>) => void
  /** Recoverable problems such as a failed half-close */
  warn?: (message: string, data?: Record<string, unknown>) => void
  /** Failures delivered to the disconnect handler */
  error?: (message: string, data?: Record<string, unknown>) => void
}

/**
 * Bound log function handed to the handshake and client internals.
 */
export type LogFn = (level: LogLevel, message: string, data?: Record<string, unknown>) => void

// =============================================================================
// Randomness
// =============================================================================

/**
 * Source of the handshake nonce and frame mask keys.
 *
 * Each client owns one; tests pass a deterministic source.
 */
export interface RandomSource {
  randomBytes(size: number): Uint8Array
}

/**
 * Cryptographically secure source backed by `node:crypto`.
 */
export const cryptoRandomSource: RandomSource = {
  randomBytes: (size) => randomBytes(size),
}

// =============================================================================
// Application Callbacks
// =============================================================================

/**
 * Called on the receive loop for every complete message. A returned promise
 * is awaited before the next frame is processed.
 */
export type MessageHandler = (
  client: WebSocketClient,
  payload: Buffer,
  opcode: Opcode
) => void | Promise<void>

/**
 * Called exactly once when the receive loop ends. `error` is undefined after
 * a clean close.
 */
export type DisconnectHandler = (client: WebSocketClient, error?: Error) => void | Promise<void>
