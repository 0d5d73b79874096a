/**
 * @file WebSocket Client
 *
 * An RFC 6455 client connection over a raw byte stream: opens the transport,
 * completes the upgrade handshake, then runs a background receive loop that
 * decodes frames, reassembles fragmented messages and hands them to the
 * application.
 *
 * @module ws-stream-client/client/websocket-client
 *
 * @example Basic Usage
 * ```typescript
 * import { WebSocketClient } from 'ws-stream-client'
 *
 * const client = await WebSocketClient.connect({
 *   host: 'localhost',
 *   port: 8080,
 *   path: '/chat',
 *   onMessage: (client, payload, opcode) => {
 *     if (opcode === 'text') console.log('Received:', payload.toString())
 *   },
 *   onDisconnect: (client, error) => {
 *     console.log(error ? `Connection lost: ${error.message}` : 'Closed by server')
 *   },
 * })
 *
 * await client.send('hello')
 * await client.close()
 * ```
 *
 * ## Receive Loop
 *
 * ```
 *     transport ──► decodeFrame ──► FragmentReassembler ──► dispatch
 *                                                             │
 *          close ─► state closed, loop ends ◄─────────────────┤
 *          ping  ─► send pong, then onMessage ◄───────────────┤
 *          other ─► onMessage ◄───────────────────────────────┘
 *
 *     loop exit ─► release transport ─► onDisconnect(client, error?)  (once)
 * ```
 *
 * Handlers run on the receive loop and are awaited, so a slow handler holds
 * back every later frame, including pong replies. A handler may call
 * `close()`; it starts the shutdown and returns without waiting for the loop.
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import type { AuthSession, SecurityProvider } from '../auth/security-provider.js'
import { resolveClientConfig, type ClientConfigInput } from '../config/client-config.js'
import {
  ConnectionClosedError,
  ProtocolError,
  ProtocolErrorCodes,
  toError,
} from '../errors.js'
import { negotiateHandshake, type HandshakeResult } from '../handshake/negotiator.js'
import { decodeFrame, encodeFrame } from '../protocol/frame-codec.js'
import { isSendableOpcode, type Opcode, type SendableOpcode } from '../protocol/opcode.js'
import { FragmentReassembler, type Message } from '../protocol/reassembler.js'
import { SocketConnector } from '../transport/socket-transport.js'
import type { Transport, TransportConnector } from '../transport/types.js'
import {
  cryptoRandomSource,
  type DisconnectHandler,
  type LogFn,
  type MessageHandler,
  type RandomSource,
  type WebSocketClientLogger,
} from '../types.js'
import {
  ConnectionStateMachine,
  type ConnectionState,
  type StateChangeListener,
} from './connection-state.js'
import { createLogFn } from './logger.js'
import { SendLock } from './send-lock.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Options for `WebSocketClient.connect()`.
 */
export interface WebSocketClientOptions extends ClientConfigInput {
  /** Called for every complete message, on the receive loop */
  onMessage?: MessageHandler
  /** Called once when the receive loop ends */
  onDisconnect?: DisconnectHandler
  /** Answers NTLM / Negotiate challenges during the handshake */
  securityProvider?: SecurityProvider
  /**
   * Opens the byte stream.
   * @default new SocketConnector()
   */
  connector?: TransportConnector
  /**
   * Source of the handshake nonce and mask keys.
   * @default cryptoRandomSource
   */
  random?: RandomSource
  /** Receives log output when `debug` is true */
  logger?: WebSocketClientLogger
}

export interface SendOptions {
  /** Per-write timeout in milliseconds */
  timeout?: number
}

/**
 * Status carried by the peer's close frame.
 */
export interface CloseInfo {
  /** Absent when the close frame had no body */
  code?: number
  reason: string
}

/**
 * Everything a client needs once the handshake has succeeded.
 *
 * @internal
 */
export interface WebSocketClientInit {
  host: string
  port: number
  path: string
  transport: Transport
  random: RandomSource
  log: LogFn
  maxPayloadLength: number
  maxMessageLength: number
  shutdownTimeout: number
  authSession?: AuthSession
  onMessage?: MessageHandler
  onDisconnect?: DisconnectHandler
}

/** Mask key size per frame */
const MASK_KEY_BYTES = 4

/** The client whose receive loop is running the current async context */
const receiveLoopOwner = new AsyncLocalStorage<WebSocketClient>()

// =============================================================================
// WebSocketClient Class
// =============================================================================

export class WebSocketClient {
  readonly host: string
  readonly port: number
  readonly path: string

  private readonly transport: Transport
  private readonly random: RandomSource
  private readonly log: LogFn
  private readonly machine: ConnectionStateMachine
  private readonly reassembler: FragmentReassembler
  private readonly sendLock = new SendLock()
  private readonly maxPayloadLength: number
  private readonly shutdownTimeout: number
  private readonly onMessage?: MessageHandler
  private readonly onDisconnect?: DisconnectHandler
  private authSession?: AuthSession

  /** The receive loop; settles after the disconnect handler has run */
  private task: Promise<void> = Promise.resolve()
  private started = false
  private disconnected = false
  private shutdownTimer?: ReturnType<typeof setTimeout>
  private _closeInfo: CloseInfo | null = null

  // -------------------------------------------------------------------------
  // Construction
  // -------------------------------------------------------------------------

  /**
   * Opens a connection and completes the upgrade handshake.
   *
   * Resolves once the server has accepted the upgrade; the receive loop is
   * running by then. Nothing is left open when it rejects.
   *
   * @throws {ConfigurationError} If options are invalid
   * @throws {ConnectError} If the host cannot be resolved or reached
   * @throws {HandshakeError} If the server does not accept the upgrade
   * @throws {AuthenticationError} If a 401 challenge cannot be answered
   */
  static async connect(options: WebSocketClientOptions): Promise<WebSocketClient> {
    const { onMessage, onDisconnect, securityProvider, connector, random, logger, ...settings } = options
    const config = resolveClientConfig(settings)
    const log = createLogFn(config.debug, logger)
    const randomSource = random ?? cryptoRandomSource

    log('info', 'Connecting', { host: config.host, port: config.port, path: config.path })
    const transport = await (connector ?? new SocketConnector()).connect(config.host, config.port, {
      timeout: config.connectTimeout,
    })

    let handshake: HandshakeResult
    try {
      handshake = await negotiateHandshake(transport, {
        host: config.host,
        port: config.port,
        path: config.path,
        headers: config.headers,
        random: randomSource,
        maxHandshakeBytes: config.maxHandshakeBytes,
        maxAuthRounds: config.maxAuthRounds,
        securityProvider,
        servicePrincipalName: config.servicePrincipalName,
        log,
      })
    } catch (error) {
      log('error', 'Handshake failed', { error: toError(error).message })
      transport.close()
      throw error
    }

    log('info', 'Connected', { host: config.host, port: config.port, path: config.path })

    const client = new WebSocketClient({
      host: config.host,
      port: config.port,
      path: config.path,
      transport,
      random: randomSource,
      log,
      maxPayloadLength: config.maxPayloadLength,
      maxMessageLength: config.maxMessageLength,
      shutdownTimeout: config.shutdownTimeout,
      authSession: handshake.authSession,
      onMessage,
      onDisconnect,
    })
    client.start()
    return client
  }

  /**
   * Wraps an already upgraded transport. Use `WebSocketClient.connect()`
   * unless the handshake happened elsewhere; call `start()` afterwards.
   *
   * @internal
   */
  constructor(init: WebSocketClientInit) {
    this.host = init.host
    this.port = init.port
    this.path = init.path
    this.transport = init.transport
    this.random = init.random
    this.log = init.log
    this.maxPayloadLength = init.maxPayloadLength
    this.shutdownTimeout = init.shutdownTimeout
    this.authSession = init.authSession
    this.onMessage = init.onMessage
    this.onDisconnect = init.onDisconnect
    this.machine = new ConnectionStateMachine(init.log)
    this.reassembler = new FragmentReassembler({ maxMessageLength: init.maxMessageLength })
  }

  /**
   * Starts the receive loop. Later calls are no-ops.
   */
  start(): void {
    if (this.started) {
      return
    }
    this.started = true
    this.task = receiveLoopOwner.run(this, () => this.receiveLoop())
  }

  // -------------------------------------------------------------------------
  // Public Getters
  // -------------------------------------------------------------------------

  get state(): ConnectionState {
    return this.machine.current
  }

  /**
   * True until the connection starts closing; never becomes true again.
   */
  get isOpen(): boolean {
    return this.machine.current === 'open'
  }

  /**
   * Code and reason from the peer's close frame, once one has arrived.
   */
  get closeInfo(): CloseInfo | null {
    return this._closeInfo
  }

  onStateChange(listener: StateChangeListener): () => void {
    return this.machine.onStateChange(listener)
  }

  // -------------------------------------------------------------------------
  // Sending
  // -------------------------------------------------------------------------

  /**
   * Sends one unfragmented message.
   *
   * Concurrent calls are serialized, each frame is written whole. Strings
   * default to `text`, bytes to `binary`.
   *
   * @throws {ConnectionClosedError} If the connection is no longer open
   * @throws {ProtocolError} If `opcode` is `invalid`
   * @throws {SendTimeoutError} If a write exceeds `options.timeout`
   * @throws {TransportError} If the transport fails
   *
   * @example
   * ```typescript
   * await client.send('{"type":"subscribe"}')
   * await client.send(Buffer.from([1, 2, 3]), 'binary', { timeout: 5000 })
   * ```
   */
  async send(payload: string | Uint8Array, opcode?: Opcode, options?: SendOptions): Promise<void> {
    const resolved = opcode ?? (typeof payload === 'string' ? 'text' : 'binary')
    if (!isSendableOpcode(resolved)) {
      throw new ProtocolError(`Cannot send a frame with opcode "${resolved}"`, ProtocolErrorCodes.UNSENDABLE_OPCODE)
    }

    const bytes = typeof payload === 'string' ? Buffer.from(payload) : payload
    await this.writeFrame(bytes, resolved, options?.timeout)
  }

  private writeFrame(payload: Uint8Array, opcode: SendableOpcode, timeout?: number): Promise<void> {
    return this.sendLock.run(async () => {
      if (this.machine.current !== 'open') {
        throw new ConnectionClosedError()
      }
      const frame = encodeFrame(payload, opcode, this.random.randomBytes(MASK_KEY_BYTES))
      // One write per frame: a write that outlives its timeout still lands whole.
      await this.transport.send(Buffer.concat([frame.header, frame.payload]), timeout)
    })
  }

  // -------------------------------------------------------------------------
  // Shutdown
  // -------------------------------------------------------------------------

  /**
   * Starts a local shutdown: shuts down the write side and lets the receive
   * loop drain until the peer ends the stream. The transport is closed
   * forcibly after `shutdownTimeout` ms. A no-op unless the connection is
   * open.
   */
  async shutdown(): Promise<void> {
    if (!this.machine.transition('shutdown')) {
      return
    }

    this.shutdownTimer = setTimeout(() => {
      this.log('warn', 'Peer did not end the stream in time, closing transport', {
        timeoutMs: this.shutdownTimeout,
      })
      this.transport.close()
    }, this.shutdownTimeout)

    try {
      await this.sendLock.run(() => this.transport.halfCloseWrite())
    } catch (error) {
      this.log('warn', 'Half-close failed, closing transport', { error: toError(error).message })
      this.transport.close()
    }
  }

  /**
   * Waits for the receive loop to finish, including the disconnect handler.
   *
   * Called from a message or disconnect handler, resolves immediately: the
   * loop cannot finish while it is waiting on that handler.
   */
  join(): Promise<void> {
    if (receiveLoopOwner.getStore() === this) {
      return Promise.resolve()
    }
    return this.task
  }

  /**
   * Shuts down and waits for the receive loop. Safe to call repeatedly,
   * including from inside a handler.
   */
  async close(): Promise<void> {
    await this.shutdown()
    await this.join()
  }

  // -------------------------------------------------------------------------
  // Receive Loop
  // -------------------------------------------------------------------------

  private async receiveLoop(): Promise<void> {
    let failure: Error | undefined

    try {
      while (this.machine.current !== 'closed') {
        const frame = await decodeFrame(this.transport, { maxPayloadLength: this.maxPayloadLength })
        if (frame === null) {
          this.machine.transition('endOfStream')
          break
        }

        this.log('debug', 'Frame received', {
          opcode: frame.opcode,
          fin: frame.fin,
          length: frame.payloadLength,
        })

        if (this.machine.current === 'closing') {
          if (frame.opcode === 'close') {
            this._closeInfo = parseClosePayload(frame.payload)
            this.machine.transition('peerClose')
          } else {
            this.log('debug', 'Dropping frame while closing', { opcode: frame.opcode })
          }
          continue
        }

        const message = this.reassembler.push(frame)
        if (message) {
          await this.dispatch(message)
        }
      }
    } catch (error) {
      failure = toError(error)
      this.machine.transition('fail')
    }

    await this.release()
    await this.notifyDisconnect(failure)
  }

  private async dispatch(message: Message): Promise<void> {
    switch (message.opcode) {
      case 'close':
        this._closeInfo = parseClosePayload(message.payload)
        this.machine.transition('peerClose')
        return

      case 'ping':
        await this.writeFrame(message.payload, 'pong').catch((error: unknown) => {
          if (!(error instanceof ConnectionClosedError)) {
            throw error
          }
          this.log('debug', 'Skipped pong, connection is closing')
        })
        break

      default:
        break
    }

    await this.onMessage?.(this, message.payload, message.opcode)
  }

  private async release(): Promise<void> {
    clearTimeout(this.shutdownTimer)
    this.transport.close()

    const session = this.authSession
    this.authSession = undefined
    try {
      await session?.release()
    } catch (error) {
      this.log('warn', 'Failed to release security context', { error: toError(error).message })
    }
  }

  private async notifyDisconnect(failure: Error | undefined): Promise<void> {
    if (this.disconnected) {
      return
    }
    this.disconnected = true

    if (failure) {
      this.log('error', 'Connection failed', { error: failure.message, name: failure.name })
    } else {
      this.log('info', 'Disconnected', { code: this._closeInfo?.code, reason: this._closeInfo?.reason })
    }

    try {
      await this.onDisconnect?.(this, failure)
    } catch (error) {
      this.log('error', 'Disconnect handler threw', { error: toError(error).message })
    }
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Splits a close frame body into its status code and UTF-8 reason.
 */
export function parseClosePayload(payload: Buffer): CloseInfo {
  if (payload.length < 2) {
    return { reason: '' }
  }
  return { code: payload.readUInt16BE(0), reason: payload.subarray(2).toString('utf8') }
}
