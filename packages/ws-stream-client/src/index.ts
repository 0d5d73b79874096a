/**
 * ws-stream-client
 *
 * RFC 6455 WebSocket client over a raw byte stream, with NTLM / Negotiate
 * authentication during the upgrade handshake.
 *
 * @packageDocumentation
 * @module ws-stream-client
 */

// ============================================================================
// Client
// ============================================================================

export { WebSocketClient, parseClosePayload } from './client/websocket-client.js'
export type {
  WebSocketClientOptions,
  WebSocketClientInit,
  SendOptions,
  CloseInfo,
} from './client/websocket-client.js'

export { ConnectionStateMachine } from './client/connection-state.js'
export type {
  ConnectionState,
  ConnectionEvent,
  ConnectionStateChange,
  StateChangeListener,
} from './client/connection-state.js'

export { createDefaultLogger, createLogFn } from './client/logger.js'

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_CLIENT_CONFIG,
  clientConfigSchema,
  resolveClientConfig,
} from './config/client-config.js'
export type { ClientConfig, ClientConfigInput } from './config/client-config.js'

// ============================================================================
// Authentication
// ============================================================================

export {
  AuthSession,
  SUPPORTED_AUTH_SCHEMES,
  isSupportedScheme,
  parseAuthChallenge,
  servicePrincipalName,
} from './auth/security-provider.js'
export type {
  AuthScheme,
  AuthChallenge,
  SecurityProvider,
  SecurityContextRequest,
  SecurityContextResult,
} from './auth/security-provider.js'

// ============================================================================
// Handshake
// ============================================================================

export {
  WEBSOCKET_MAGIC_GUID,
  computeAcceptValue,
  generateHandshakeKey,
  isValidAcceptValue,
} from './handshake/accept-key.js'
export { parseResponseHead, readResponseHead } from './handshake/http-response.js'
export type { HandshakeResponse } from './handshake/http-response.js'
export { buildUpgradeRequest, negotiateHandshake } from './handshake/negotiator.js'
export type { HandshakeOptions, HandshakeResult } from './handshake/negotiator.js'

// ============================================================================
// Framing
// ============================================================================

export {
  isControlOpcode,
  isSendableOpcode,
  opcodeFromBits,
  opcodeToBits,
} from './protocol/opcode.js'
export type { Opcode, SendableOpcode } from './protocol/opcode.js'
export { applyMask, decodeFrame, encodeFrame, readExactly } from './protocol/frame-codec.js'
export type { DecodeOptions, EncodedFrame, Frame } from './protocol/frame-codec.js'
export { FragmentReassembler } from './protocol/reassembler.js'
export type { Message } from './protocol/reassembler.js'

// ============================================================================
// Transport
// ============================================================================

export { SocketConnector, SocketTransport } from './transport/socket-transport.js'
export type { SocketTransportOptions } from './transport/socket-transport.js'
export type { ByteSource, ReceiveOptions, Transport, TransportConnector } from './transport/types.js'

// ============================================================================
// Shared Types and Errors
// ============================================================================

export { cryptoRandomSource } from './types.js'
export type {
  DisconnectHandler,
  LogFn,
  LogLevel,
  MessageHandler,
  RandomSource,
  WebSocketClientLogger,
} from './types.js'

export {
  AuthenticationError,
  AuthenticationErrorCodes,
  ConfigurationError,
  ConnectError,
  ConnectionClosedError,
  HandshakeError,
  HandshakeErrorCodes,
  ProtocolError,
  ProtocolErrorCodes,
  SendTimeoutError,
  TransportError,
  WebSocketClientError,
} from './errors.js'
export type { AuthenticationErrorCode, HandshakeErrorCode, ProtocolErrorCode } from './errors.js'
