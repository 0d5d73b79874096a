/**
 * @file In-process transport stand-ins shared by the handshake and client tests.
 */

import { vi } from 'vitest'
import { TransportError } from '../../src/errors.js'
import type { ReceiveOptions, Transport, TransportConnector } from '../../src/transport/types.js'
import type { RandomSource } from '../../src/types.js'

/**
 * Transport backed by an in-memory buffer. Tests push server bytes in and
 * inspect what the client wrote out.
 */
export class FakeTransport implements Transport {
  sent: Buffer[] = []
  halfClosed = false
  closed = false
  hostname: string | undefined = undefined

  private inbound = Buffer.alloc(0)
  private ended = false
  private failure: Error | null = null
  private waiters: Array<() => void> = []

  /** Queues bytes as if the server had sent them */
  push(data: string | Uint8Array): void {
    this.inbound = Buffer.concat([this.inbound, typeof data === 'string' ? Buffer.from(data, 'latin1') : data])
    this.wake()
  }

  /** Ends the inbound stream */
  end(): void {
    this.ended = true
    this.wake()
  }

  /** Makes pending and later reads reject */
  fail(error: Error): void {
    this.failure = error
    this.wake()
  }

  async receive(maxBytes: number, options?: ReceiveOptions): Promise<Buffer | null> {
    while (this.inbound.length === 0) {
      if (this.failure) {
        throw this.failure
      }
      if (this.ended || this.closed) {
        return null
      }
      await new Promise<void>((resolve) => this.waiters.push(resolve))
    }

    const out = Buffer.from(this.inbound.subarray(0, Math.min(maxBytes, this.inbound.length)))
    if (!options?.peek) {
      this.inbound = this.inbound.subarray(out.length)
    }
    return out
  }

  async send(data: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new TransportError('Send failed (EPIPE)', { errno: 'EPIPE' })
    }
    this.sent.push(Buffer.from(data))
  }

  async halfCloseWrite(): Promise<void> {
    this.halfClosed = true
  }

  close(): void {
    this.closed = true
    this.wake()
  }

  async canonicalHostname(): Promise<string | undefined> {
    return this.hostname
  }

  /** Everything written so far, as latin1 text */
  get written(): string {
    return Buffer.concat(this.sent).toString('latin1')
  }

  private wake(): void {
    const waiters = this.waiters
    this.waiters = []
    for (const resolve of waiters) {
      resolve()
    }
  }
}

export function fakeConnector(transport: Transport): TransportConnector {
  return { connect: vi.fn(async () => transport) }
}

/**
 * Deterministic random source: the 16-byte handshake nonce is
 * "the sample nonce" and every mask key is `maskKey`.
 */
export function fixedRandom(maskKey: number[] = [0, 0, 0, 0]): RandomSource {
  return {
    randomBytes: (size) => (size === 16 ? Buffer.from('the sample nonce') : Buffer.from(maskKey.slice(0, size))),
  }
}

/** `Sec-WebSocket-Key` produced by `fixedRandom()` */
export const SAMPLE_KEY = 'dGhlIHNhbXBsZSBub25jZQ=='

/** Accept value matching `SAMPLE_KEY` */
export const SAMPLE_ACCEPT = 's3pPLMBiTxaQ9kYGzzhZRbK+xOo='

export const SWITCHING_PROTOCOLS =
  'HTTP/1.1 101 Switching Protocols\r\n' +
  'Upgrade: websocket\r\n' +
  'Connection: Upgrade\r\n' +
  `Sec-WebSocket-Accept: ${SAMPLE_ACCEPT}\r\n` +
  '\r\n'

/**
 * Builds an unmasked server frame. Payloads up to 65535 bytes.
 */
export function serverFrame(opcode: number, payload: string | Uint8Array = '', fin = true): Buffer {
  const body = typeof payload === 'string' ? Buffer.from(payload) : Buffer.from(payload)
  const first = (fin ? 0x80 : 0) | opcode
  if (body.length <= 125) {
    return Buffer.concat([Buffer.from([first, body.length]), body])
  }
  const header = Buffer.alloc(4)
  header[0] = first
  header[1] = 126
  header.writeUInt16BE(body.length, 2)
  return Buffer.concat([header, body])
}

/**
 * Close frame body: 2-byte status code followed by a UTF-8 reason.
 */
export function closePayload(code: number, reason = ''): Buffer {
  const body = Buffer.alloc(2)
  body.writeUInt16BE(code, 0)
  return Buffer.concat([body, Buffer.from(reason)])
}

/**
 * A promise with its resolve function exposed.
 */
export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>((r) => {
    resolve = r
  })
  return { promise, resolve }
}
