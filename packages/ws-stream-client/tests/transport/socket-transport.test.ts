/**
 * @file Socket Transport Tests
 *
 * Uses in-memory `Duplex` streams in place of TCP sockets and mocks
 * `node:dns/promises`, so nothing leaves the process.
 */

import { Duplex } from 'node:stream'
import { describe, it, expect, vi, beforeEach } from 'vitest'
import { lookup, reverse } from 'node:dns/promises'
import type { LookupAddress, LookupAllOptions } from 'node:dns'
import { ConnectError, SendTimeoutError, TransportError } from '../../src/errors.js'
import { SocketConnector, SocketTransport } from '../../src/transport/socket-transport.js'

vi.mock('node:dns/promises', () => ({
  lookup: vi.fn(),
  reverse: vi.fn(),
}))

/**
 * Duplex stand-in: `push()` feeds the transport, writes are recorded.
 */
function createSocket(options: { stallWrites?: boolean } = {}) {
  const written: Buffer[] = []
  let finished = false
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk)
      if (!options.stallWrites) {
        callback()
      }
    },
    final(callback) {
      finished = true
      callback()
    },
  })
  return { socket, written, isFinished: () => finished }
}

function systemError(code: string): Error {
  return Object.assign(new Error(`${code} happened`), { code })
}

describe('SocketTransport', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe('receive', () => {
    it('should return at most maxBytes and keep the rest', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)
      socket.push(Buffer.from('hello world'))

      expect((await transport.receive(5))?.toString()).toBe('hello')
      expect((await transport.receive(100))?.toString()).toBe(' world')
    })

    it('should leave peeked bytes in place', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)
      socket.push(Buffer.from('hello'))

      expect((await transport.receive(3, { peek: true }))?.toString()).toBe('hel')
      expect((await transport.receive(10))?.toString()).toBe('hello')
    })

    it('should wait for data to arrive', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)

      const pending = transport.receive(10)
      socket.push(Buffer.from('late'))

      expect((await pending)?.toString()).toBe('late')
    })

    it('should return buffered data before reporting end of stream', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)
      socket.push(Buffer.from('tail'))
      socket.push(null)

      expect((await transport.receive(10))?.toString()).toBe('tail')
      expect(await transport.receive(10)).toBeNull()
    })

    it('should treat a connection reset as a clean close', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)

      socket.destroy(systemError('ECONNRESET'))

      expect(await transport.receive(10)).toBeNull()
    })

    it('should reject other socket errors with the system code', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)

      socket.destroy(systemError('EHOSTUNREACH'))

      const error = await transport.receive(10).catch((e: unknown) => e)
      expect(error).toBeInstanceOf(TransportError)
      expect(error).toMatchObject({ errno: 'EHOSTUNREACH', message: 'Receive failed (EHOSTUNREACH)' })
    })

    it('should return null after close', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)

      const pending = transport.receive(10)
      transport.close()

      expect(await pending).toBeNull()
      expect(socket.destroyed).toBe(true)
    })

    it('should pause the socket above the high water mark and resume once drained', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket, { highWaterMark: 4 })

      socket.push(Buffer.from('abcdef'))
      await vi.waitFor(() => expect(socket.isPaused()).toBe(true))

      await transport.receive(6)
      expect(socket.isPaused()).toBe(false)
    })
  })

  describe('send', () => {
    it('should write the bytes to the socket', async () => {
      const { socket, written } = createSocket()
      const transport = new SocketTransport(socket)

      await transport.send(Buffer.from('frame'))

      expect(Buffer.concat(written).toString()).toBe('frame')
    })

    it('should time out a write that does not complete', async () => {
      const { socket } = createSocket({ stallWrites: true })
      const transport = new SocketTransport(socket)

      const error = await transport.send(Buffer.from('stuck'), 20).catch((e: unknown) => e)

      expect(error).toBeInstanceOf(SendTimeoutError)
      expect(error).toMatchObject({ timeout: 20, errno: 'ETIMEDOUT' })
    })

    it('should refuse to write after the socket failed', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)
      socket.destroy(systemError('EPIPE'))
      await new Promise((resolve) => setImmediate(resolve))

      await expect(transport.send(Buffer.from('x'))).rejects.toMatchObject({ errno: 'EPIPE' })
    })
  })

  describe('halfCloseWrite', () => {
    it('should end the writable side and keep reading', async () => {
      const { socket, isFinished } = createSocket()
      const transport = new SocketTransport(socket)

      await transport.halfCloseWrite()
      socket.push(Buffer.from('still readable'))

      expect(isFinished()).toBe(true)
      expect((await transport.receive(100))?.toString()).toBe('still readable')
    })

    it('should resolve immediately when already ended', async () => {
      const { socket } = createSocket()
      const transport = new SocketTransport(socket)

      await transport.halfCloseWrite()
      await expect(transport.halfCloseWrite()).resolves.toBeUndefined()
    })
  })

  describe('canonicalHostname', () => {
    it('should reverse-resolve the peer address once', async () => {
      vi.mocked(reverse).mockResolvedValue(['server.example.test'])
      const transport = new SocketTransport(createSocket().socket, { remoteAddress: '192.0.2.10' })

      expect(await transport.canonicalHostname()).toBe('server.example.test')
      expect(await transport.canonicalHostname()).toBe('server.example.test')
      expect(reverse).toHaveBeenCalledTimes(1)
      expect(reverse).toHaveBeenCalledWith('192.0.2.10')
    })

    it('should return undefined when the address has no name', async () => {
      vi.mocked(reverse).mockRejectedValue(systemError('ENOTFOUND'))
      const transport = new SocketTransport(createSocket().socket, { remoteAddress: '192.0.2.10' })

      expect(await transport.canonicalHostname()).toBeUndefined()
    })

    it('should return undefined without a remote address', async () => {
      const transport = new SocketTransport(createSocket().socket)

      expect(await transport.canonicalHostname()).toBeUndefined()
      expect(reverse).not.toHaveBeenCalled()
    })
  })
})

describe('SocketConnector', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('should fail with ConnectError when the host does not resolve', async () => {
    vi.mocked(lookup).mockRejectedValue(systemError('ENOTFOUND'))

    const error = await new SocketConnector()
      .connect('nowhere.invalid', 80, { timeout: 100 })
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ConnectError)
    expect(error).toMatchObject({ message: 'Could not resolve nowhere.invalid', host: 'nowhere.invalid', port: 80 })
  })

  it('should fail with ConnectError when no address is returned', async () => {
    vi.mocked<(hostname: string, options: LookupAllOptions) => Promise<LookupAddress[]>>(lookup).mockResolvedValue([])

    await expect(new SocketConnector().connect('empty.invalid', 8080, { timeout: 100 })).rejects.toMatchObject({
      name: 'ConnectError',
      message: 'Could not connect to empty.invalid:8080',
    })
  })
})
