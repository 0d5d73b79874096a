/**
 * @file Client Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import { DEFAULT_CLIENT_CONFIG, resolveClientConfig } from '../../src/config/client-config.js'
import { ConfigurationError } from '../../src/errors.js'

function issuesOf(run: () => unknown): string[] {
  try {
    run()
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return error.issues
    }
    throw error
  }
  return []
}

describe('resolveClientConfig', () => {
  it('should fill in every default', () => {
    expect(resolveClientConfig({ host: 'localhost', port: 8080 })).toEqual({
      host: 'localhost',
      port: 8080,
      ...DEFAULT_CLIENT_CONFIG,
    })
  })

  it('should keep explicit values', () => {
    const config = resolveClientConfig({
      host: 'server.example.test',
      port: 443,
      path: '/socket?v=2',
      headers: { 'X-Client': 'tests' },
      connectTimeout: 500,
      servicePrincipalName: 'HTTP/server.example.test',
      debug: true,
    })

    expect(config.path).toBe('/socket?v=2')
    expect(config.headers).toEqual({ 'X-Client': 'tests' })
    expect(config.connectTimeout).toBe(500)
    expect(config.servicePrincipalName).toBe('HTTP/server.example.test')
    expect(config.debug).toBe(true)
  })

  it('should reject an out-of-range port', () => {
    expect(issuesOf(() => resolveClientConfig({ host: 'localhost', port: 70000 }))).toEqual([
      expect.stringMatching(/^port: /),
    ])
  })

  it('should reject an empty host and a path without a leading slash together', () => {
    const issues = issuesOf(() => resolveClientConfig({ host: '', port: 80, path: 'chat' }))
    expect(issues).toHaveLength(2)
    expect(issues[0]).toMatch(/^host: /)
    expect(issues[1]).toMatch(/^path: /)
  })

  it('should reject a host containing a slash', () => {
    expect(issuesOf(() => resolveClientConfig({ host: 'example.test/chat', port: 80 }))).toEqual([
      'host: Host cannot contain whitespace or "/"',
    ])
  })

  it('should reject headers the handshake writes itself', () => {
    expect(
      issuesOf(() => resolveClientConfig({ host: 'localhost', port: 80, headers: { host: 'other' } }))
    ).toEqual(['headers.host: Header "host" is set by the handshake'])
  })

  it('should reject header values with line breaks', () => {
    expect(
      issuesOf(() =>
        resolveClientConfig({ host: 'localhost', port: 80, headers: { 'X-Bad': 'a\r\nInjected: yes' } })
      )
    ).toEqual(['headers.X-Bad: Header values cannot contain CR or LF'])
  })

  it('should reject invalid header names', () => {
    expect(
      issuesOf(() => resolveClientConfig({ host: 'localhost', port: 80, headers: { 'Bad Name': 'x' } }))
    ).toEqual(['headers.Bad Name: Invalid header name "Bad Name"'])
  })

  it('should reject a non-positive timeout', () => {
    expect(issuesOf(() => resolveClientConfig({ host: 'localhost', port: 80, shutdownTimeout: 0 }))).toEqual([
      expect.stringMatching(/^shutdownTimeout: /),
    ])
  })

  it('should name the failures in the error message', () => {
    expect(() => resolveClientConfig({ host: 'localhost', port: 0 })).toThrow(/^Invalid client configuration: port: /)
  })
})
