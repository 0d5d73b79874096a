/**
 * @file HTTP Upgrade Response Tests
 */

import { describe, it, expect } from 'vitest'
import { HandshakeError } from '../../src/errors.js'
import { parseResponseHead, readResponseHead } from '../../src/handshake/http-response.js'
import { FakeTransport } from '../helpers/fake-transport.js'

describe('parseResponseHead', () => {
  it('should parse the status, reason phrase and headers', () => {
    const response = parseResponseHead(
      'HTTP/1.1 101 Switching Protocols\r\nUpgrade: websocket\r\nConnection: Upgrade\r\n\r\n'
    )

    expect(response.status).toBe(101)
    expect(response.statusText).toBe('Switching Protocols')
    expect([...response.headers]).toEqual([
      ['Upgrade', 'websocket'],
      ['Connection', 'Upgrade'],
    ])
  })

  it('should allow a status line without a reason phrase', () => {
    const response = parseResponseHead('HTTP/1.1 204\r\n\r\n')
    expect(response.status).toBe(204)
    expect(response.statusText).toBe('')
  })

  it('should keep the last value of a repeated header', () => {
    const response = parseResponseHead('HTTP/1.1 401 Unauthorized\r\nX-A: first\r\nX-A: second\r\n\r\n')
    expect(response.headers.get('X-A')).toBe('second')
  })

  it('should match header names case-sensitively', () => {
    const response = parseResponseHead('HTTP/1.1 101 OK\r\nupgrade: websocket\r\n\r\n')
    expect(response.headers.get('Upgrade')).toBeUndefined()
    expect(response.headers.get('upgrade')).toBe('websocket')
  })

  it('should split header lines on the first colon-space only', () => {
    const response = parseResponseHead('HTTP/1.1 200 OK\r\nX-Time: 12: 30\r\nno-separator\r\n\r\n')
    expect(response.headers.get('X-Time')).toBe('12: 30')
    expect(response.headers.size).toBe(1)
  })

  it('should reject a status line without a space', () => {
    expect(() => parseResponseHead('HTTP/1.1OK\r\n\r\n')).toThrow('Malformed status line: "HTTP/1.1OK"')
  })

  it('should reject a non-numeric status', () => {
    let error: unknown
    try {
      parseResponseHead('HTTP/1.1 abc Nope\r\n\r\n')
    } catch (e) {
      error = e
    }
    expect(error).toBeInstanceOf(HandshakeError)
    expect(error).toMatchObject({ code: 'malformed-status-line' })
  })
})

describe('readResponseHead', () => {
  it('should consume only the head and leave later bytes unread', async () => {
    const transport = new FakeTransport()
    transport.push('HTTP/1.1 101 OK\r\nUpgrade: websocket\r\n\r\n\x81\x00')

    const head = await readResponseHead(transport, 1024)

    expect(head).toBe('HTTP/1.1 101 OK\r\nUpgrade: websocket\r\n\r\n')
    expect([...((await transport.receive(10)) ?? [])]).toEqual([0x81, 0x00])
  })

  it('should find a terminator split across reads', async () => {
    const transport = new FakeTransport()
    transport.push('HTTP/1.1 101 OK\r\nA: b\r')

    const pending = readResponseHead(transport, 1024)
    await new Promise((resolve) => setTimeout(resolve, 0))
    transport.push('\n\r\nrest')

    expect(await pending).toBe('HTTP/1.1 101 OK\r\nA: b\r\n\r\n')
    expect((await transport.receive(10))?.toString()).toBe('rest')
  })

  it('should return null when the stream ends before the terminator', async () => {
    const transport = new FakeTransport()
    transport.push('HTTP/1.1 101 OK\r\n')
    transport.end()

    expect(await readResponseHead(transport, 1024)).toBeNull()
  })

  it('should reject a head larger than the limit', async () => {
    const transport = new FakeTransport()
    transport.push('x'.repeat(100))

    await expect(readResponseHead(transport, 50)).rejects.toMatchObject({
      name: 'HandshakeError',
      code: 'response-too-large',
    })
  })
})
