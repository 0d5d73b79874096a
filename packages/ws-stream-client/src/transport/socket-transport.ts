/**
 * @file Socket Transport
 *
 * Default `Transport` over a Node.js stream socket. Incoming data is buffered
 * so that reads can be sized and peeked; the socket is paused while the
 * buffer is above its high water mark.
 *
 * ```
 *   socket 'data' ──► chunks[] ──► receive(max)        (consume)
 *                          └─────► receive(max, peek)  (copy only)
 *
 *   socket 'end' / 'close'      ──► receive() resolves null
 *   socket 'error' ECONNRESET   ──► receive() resolves null
 *   socket 'error' (other)      ──► receive() rejects TransportError
 * ```
 *
 * @module ws-stream-client/transport/socket-transport
 */

import { lookup, reverse } from 'node:dns/promises'
import type { LookupAddress } from 'node:dns'
import { createConnection, type Socket } from 'node:net'
import type { Duplex } from 'node:stream'
import {
  ConnectError,
  SendTimeoutError,
  TransportError,
  systemErrorCode,
  toError,
} from '../errors.js'
import type { ReceiveOptions, Transport, TransportConnector } from './types.js'

// =============================================================================
// Constants
// =============================================================================

/** Bytes buffered before the socket is paused */
const DEFAULT_HIGH_WATER_MARK = 1024 * 1024

/** Error codes that mean the peer went away rather than that the stream broke */
const CLEAN_CLOSE_CODES = new Set(['ECONNRESET'])

export interface SocketTransportOptions {
  /**
   * Numeric address of the peer, used for reverse lookups.
   */
  remoteAddress?: string

  /**
   * Buffered bytes above which reading from the socket is paused.
   * @default 1048576
   */
  highWaterMark?: number
}

// =============================================================================
// SocketTransport Class
// =============================================================================

/**
 * Buffered transport over any `Duplex` (normally a `net.Socket`).
 *
 * @example
 * ```typescript
 * const socket = net.connect(8080, '127.0.0.1')
 * const transport = new SocketTransport(socket, { remoteAddress: '127.0.0.1' })
 * await transport.send(Buffer.from('GET / HTTP/1.1\r\n\r\n'))
 * const head = await transport.receive(4096, { peek: true })
 * ```
 */
export class SocketTransport implements Transport {
  private readonly socket: Duplex
  private readonly remoteAddress?: string
  private readonly highWaterMark: number
  private chunks: Buffer[] = []
  private buffered = 0
  private ended = false
  private failure: Error | null = null
  private waiters: Array<() => void> = []
  private hostnameLookup?: Promise<string | undefined>

  constructor(socket: Duplex, options?: SocketTransportOptions) {
    this.socket = socket
    this.remoteAddress = options?.remoteAddress
    this.highWaterMark = options?.highWaterMark ?? DEFAULT_HIGH_WATER_MARK

    socket.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk) : chunk
      this.chunks.push(bytes)
      this.buffered += bytes.length
      if (this.buffered >= this.highWaterMark) {
        socket.pause()
      }
      this.wake()
    })
    socket.on('end', () => {
      this.ended = true
      this.wake()
    })
    socket.on('close', () => {
      this.ended = true
      this.wake()
    })
    socket.on('error', (error: Error) => {
      this.failure = error
      this.wake()
    })
  }

  // -------------------------------------------------------------------------
  // Reading
  // -------------------------------------------------------------------------

  async receive(maxBytes: number, options?: ReceiveOptions): Promise<Buffer | null> {
    while (this.buffered === 0) {
      if (this.failure) {
        if (CLEAN_CLOSE_CODES.has(systemErrorCode(this.failure) ?? '')) {
          return null
        }
        throw this.wrap('Receive failed', this.failure)
      }
      if (this.ended) {
        return null
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    }

    return this.take(maxBytes, !options?.peek)
  }

  private take(maxBytes: number, consume: boolean): Buffer {
    const all = this.chunks.length === 1 ? this.chunks[0] : Buffer.concat(this.chunks, this.buffered)
    const size = Math.min(maxBytes, all.length)
    const out = all.subarray(0, size)

    if (!consume) {
      this.chunks = [all]
      return out
    }

    const rest = all.subarray(size)
    this.chunks = rest.length > 0 ? [rest] : []
    this.buffered = rest.length
    if (this.buffered < this.highWaterMark && this.socket.isPaused()) {
      this.socket.resume()
    }
    return out
  }

  private wake(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }

  // -------------------------------------------------------------------------
  // Writing
  // -------------------------------------------------------------------------

  send(data: Uint8Array, timeout?: number): Promise<void> {
    if (this.failure) {
      return Promise.reject(this.wrap('Send failed', this.failure))
    }

    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined
      if (timeout !== undefined && timeout > 0) {
        timer = setTimeout(() => reject(new SendTimeoutError(timeout)), timeout)
      }

      this.socket.write(data, (error) => {
        clearTimeout(timer)
        if (error) {
          reject(this.wrap('Send failed', error))
        } else {
          resolve()
        }
      })
    })
  }

  halfCloseWrite(): Promise<void> {
    if (this.socket.writableEnded) {
      return Promise.resolve()
    }

    return new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(this.wrap('Shutdown failed', error))
      this.socket.once('error', onError)
      this.socket.end(() => {
        this.socket.off('error', onError)
        resolve()
      })
    })
  }

  close(): void {
    this.ended = true
    this.socket.destroy()
    this.wake()
  }

  // -------------------------------------------------------------------------
  // Peer Identity
  // -------------------------------------------------------------------------

  canonicalHostname(): Promise<string | undefined> {
    this.hostnameLookup ??= this.lookupHostname()
    return this.hostnameLookup
  }

  private async lookupHostname(): Promise<string | undefined> {
    if (!this.remoteAddress) {
      return undefined
    }
    try {
      const [name] = await reverse(this.remoteAddress)
      return name
    } catch {
      // No PTR record: the caller reports the missing target name.
      return undefined
    }
  }

  private wrap(message: string, error: Error): TransportError {
    const errno = systemErrorCode(error)
    return new TransportError(errno ? `${message} (${errno})` : `${message}: ${error.message}`, {
      errno,
      cause: error,
    })
  }
}

// =============================================================================
// SocketConnector Class
// =============================================================================

/**
 * Resolves a host name and connects to the first address that accepts.
 *
 * @example
 * ```typescript
 * const transport = await new SocketConnector().connect('example.com', 80, { timeout: 10000 })
 * ```
 */
export class SocketConnector implements TransportConnector {
  async connect(host: string, port: number, options: { timeout: number }): Promise<Transport> {
    let addresses: LookupAddress[]
    try {
      addresses = await lookup(host, { all: true })
    } catch (error) {
      throw new ConnectError(`Could not resolve ${host}`, { host, port, cause: toError(error) })
    }

    let lastError: Error | undefined
    for (const { address, family } of addresses) {
      try {
        const socket = await openSocket(address, family, port, options.timeout)
        return new SocketTransport(socket, { remoteAddress: address })
      } catch (error) {
        lastError = toError(error)
      }
    }

    throw new ConnectError(`Could not connect to ${host}:${port}`, { host, port, cause: lastError })
  }
}

function openSocket(address: string, family: number, port: number, timeout: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = createConnection({ host: address, port, family })

    const onError = (error: Error) => {
      clearTimeout(timer)
      socket.destroy()
      reject(error)
    }
    const timer = setTimeout(() => {
      socket.off('error', onError)
      socket.destroy()
      reject(new Error(`Timed out connecting to ${address}:${port} after ${timeout}ms`))
    }, timeout)

    socket.once('error', onError)
    socket.once('connect', () => {
      clearTimeout(timer)
      socket.off('error', onError)
      socket.setNoDelay(true)
      resolve(socket)
    })
  })
}
