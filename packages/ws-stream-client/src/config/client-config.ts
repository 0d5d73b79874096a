/**
 * @file Client Configuration
 *
 * Validates user-supplied connection options with zod and merges them over
 * `DEFAULT_CLIENT_CONFIG`.
 *
 * Only plain settings are validated here; collaborators (connector, security
 * provider, random source, logger, handlers) are typed by their interfaces
 * and passed through untouched.
 *
 * @module ws-stream-client/config/client-config
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

// =============================================================================
// Defaults
// =============================================================================

/**
 * Defaults applied to every omitted option.
 */
export const DEFAULT_CLIENT_CONFIG = {
  path: '/',
  headers: {},
  connectTimeout: 10_000,
  shutdownTimeout: 5_000,
  maxHandshakeBytes: 16 * 1024,
  maxPayloadLength: 64 * 1024 * 1024,
  maxMessageLength: 64 * 1024 * 1024,
  maxAuthRounds: 8,
  debug: false,
} as const

// =============================================================================
// Schema
// =============================================================================

/** RFC 7230 token characters */
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/

/** Headers the handshake writes itself */
const RESERVED_HEADERS = new Set([
  'host',
  'upgrade',
  'connection',
  'sec-websocket-key',
  'sec-websocket-version',
  'authorization',
])

const headersSchema = z
  .record(z.string(), z.string())
  .superRefine((headers, ctx) => {
    for (const [name, value] of Object.entries(headers)) {
      if (!HEADER_NAME.test(name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid header name "${name}"`, path: [name] })
      } else if (RESERVED_HEADERS.has(name.toLowerCase())) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Header "${name}" is set by the handshake`, path: [name] })
      }
      if (/[\r\n]/.test(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Header values cannot contain CR or LF', path: [name] })
      }
    }
  })

const positiveInt = z.number().int().positive()

export const clientConfigSchema = z.object({
  host: z.string().min(1).refine((host) => !/[\s/]/.test(host), 'Host cannot contain whitespace or "/"'),
  port: z.number().int().min(1).max(65535),
  path: z
    .string()
    .startsWith('/')
    .refine((path) => !/\s/.test(path), 'Path cannot contain whitespace')
    .default(DEFAULT_CLIENT_CONFIG.path),
  headers: headersSchema.default(DEFAULT_CLIENT_CONFIG.headers),
  connectTimeout: positiveInt.default(DEFAULT_CLIENT_CONFIG.connectTimeout),
  shutdownTimeout: positiveInt.default(DEFAULT_CLIENT_CONFIG.shutdownTimeout),
  maxHandshakeBytes: positiveInt.default(DEFAULT_CLIENT_CONFIG.maxHandshakeBytes),
  maxPayloadLength: z.number().int().nonnegative().default(DEFAULT_CLIENT_CONFIG.maxPayloadLength),
  maxMessageLength: z.number().int().nonnegative().default(DEFAULT_CLIENT_CONFIG.maxMessageLength),
  maxAuthRounds: positiveInt.default(DEFAULT_CLIENT_CONFIG.maxAuthRounds),
  servicePrincipalName: z.string().min(1).optional(),
  debug: z.boolean().default(DEFAULT_CLIENT_CONFIG.debug),
})

/** Options as accepted from the caller */
export type ClientConfigInput = z.input<typeof clientConfigSchema>

/** Options after defaults are applied */
export type ClientConfig = z.output<typeof clientConfigSchema>

// =============================================================================
// Resolution
// =============================================================================

/**
 * Validates options and fills in defaults.
 *
 * @example
 * ```typescript
 * const config = resolveClientConfig({ host: 'localhost', port: 8080 })
 * config.path           // '/'
 * config.connectTimeout // 10000
 * ```
 *
 * @throws {ConfigurationError} Listing every invalid option
 */
export function resolveClientConfig(input: ClientConfigInput): ClientConfig {
  const result = clientConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    )
  }
  return result.data
}
