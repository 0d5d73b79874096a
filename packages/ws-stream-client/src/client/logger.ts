/**
 * @file Client Logging
 *
 * Binds the optional `WebSocketClientLogger` into the `LogFn` the handshake
 * and receive loop call.
 *
 * @module ws-stream-client/client/logger
 */

import type { LogFn, WebSocketClientLogger } from '../types.js'

/**
 * Console logger used when `debug` is on and no logger is supplied.
 */
export function createDefaultLogger(): WebSocketClientLogger {
  return {
    debug: (msg, data) => console.debug(`[WebSocketClient] ${msg}`, data ?? ''),
    info: (msg, data) => console.info(`[WebSocketClient] ${msg}`, data ?? ''),
    warn: (msg, data) => console.warn(`[WebSocketClient] ${msg}`, data ?? ''),
    error: (msg, data) => console.error(`[WebSocketClient] ${msg}`, data ?? ''),
  }
}

/**
 * Binds the configured logger into a single log function.
 *
 * Logging is off unless `debug` is set; a custom `logger` replaces the
 * console one.
 */
export function createLogFn(debug: boolean, logger?: WebSocketClientLogger): LogFn {
  if (!debug) {
    return () => {} // No-op
  }

  const target = logger ?? createDefaultLogger()
  return (level, message, data) => {
    target[level]?.(message, data)
  }
}
