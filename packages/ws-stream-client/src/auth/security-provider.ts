/**
 * @file HTTP Authentication Security Provider
 *
 * NTLM / Negotiate challenge-response support for the upgrade handshake.
 *
 * The token computation itself belongs to a platform security provider
 * (SSPI, GSSAPI, or a pure implementation). The client reaches it through the
 * `SecurityProvider` interface and keeps the per-attempt state in an
 * `AuthSession`.
 *
 * ## Authentication Sequence
 *
 * ```
 * Client                                                     Server
 *   |                                                           |
 *   |  GET /path  (upgrade request)                             |
 *   |---------------------------------------------------------->|
 *   |                                                           |
 *   |  401  WWW-Authenticate: Negotiate                         |
 *   |<----------------------------------------------------------|
 *   |                                                           |
 *   |  [acquireCredentials('Negotiate')]                        |
 *   |  [initializeSecurityContext(no input token)]              |
 *   |                                                           |
 *   |  GET /path  Authorization: Negotiate <token-1>            |
 *   |---------------------------------------------------------->|
 *   |                                                           |
 *   |  401  WWW-Authenticate: Negotiate <challenge>             |
 *   |<----------------------------------------------------------|
 *   |                                                           |
 *   |  [initializeSecurityContext(challenge), same context]     |
 *   |                                                           |
 *   |  GET /path  Authorization: Negotiate <token-2>            |
 *   |---------------------------------------------------------->|
 *   |                                                           |
 *   |  101 Switching Protocols                                  |
 *   |<----------------------------------------------------------|
 * ```
 *
 * @module ws-stream-client/auth/security-provider
 */

import { AuthenticationError, AuthenticationErrorCodes, toError } from '../errors.js'

// =============================================================================
// Types
// =============================================================================

/**
 * Schemes the handshake negotiates.
 */
export type AuthScheme = 'NTLM' | 'Negotiate'

export const SUPPORTED_AUTH_SCHEMES: readonly AuthScheme[] = ['NTLM', 'Negotiate']

/**
 * A challenge taken from a `WWW-Authenticate` header.
 */
export interface AuthChallenge {
  /** Scheme name as sent by the server */
  scheme: string
  /** Base64 token after the scheme; empty on the first round */
  token: string
}

/**
 * Outcome of one `initializeSecurityContext` call.
 */
export interface SecurityContextResult<TContext> {
  /** Context to pass back on the next round */
  context: TContext
  /** Token to send in the `Authorization` header */
  outputToken: Uint8Array
  /** Whether the provider expects another server challenge */
  status: 'continue' | 'complete'
}

export interface SecurityContextRequest<TCredentials, TContext> {
  credentials: TCredentials
  /** Undefined on the first round */
  context: TContext | undefined
  scheme: AuthScheme
  /** Service principal name; only Negotiate requires one */
  targetName: string | undefined
  /** Decoded server challenge; undefined when the server sent none */
  inputToken: Uint8Array | undefined
}

/**
 * Pluggable token producer (SSPI / GSSAPI equivalent).
 *
 * @example
 * ```typescript
 * const provider: SecurityProvider<KerberosClient, KerberosClient> = {
 *   acquireCredentials: async () => kerberos.initializeClient(spn),
 *   async initializeSecurityContext({ credentials, inputToken }) {
 *     const token = await credentials.step(inputToken ? Buffer.from(inputToken).toString('base64') : '')
 *     return {
 *       context: credentials,
 *       outputToken: Buffer.from(token, 'base64'),
 *       status: credentials.contextComplete ? 'complete' : 'continue',
 *     }
 *   },
 * }
 * ```
 */
export interface SecurityProvider<TCredentials = unknown, TContext = unknown> {
  acquireCredentials(scheme: AuthScheme): Promise<TCredentials>
  initializeSecurityContext(
    request: SecurityContextRequest<TCredentials, TContext>
  ): Promise<SecurityContextResult<TContext>>
  /** Frees the context and credentials once the connection is done with them */
  releaseContext?(context: TContext | undefined, credentials: TCredentials): void | Promise<void>
}

// =============================================================================
// Challenge Parsing
// =============================================================================

/**
 * Splits a `WWW-Authenticate` value at its first space.
 *
 * @example
 * parseAuthChallenge('NTLM TlRMTVNTUAACAAAA') // { scheme: 'NTLM', token: 'TlRMTVNTUAACAAAA' }
 * parseAuthChallenge('Negotiate')            // { scheme: 'Negotiate', token: '' }
 */
export function parseAuthChallenge(header: string): AuthChallenge {
  const space = header.indexOf(' ')
  if (space === -1) {
    return { scheme: header, token: '' }
  }
  return { scheme: header.slice(0, space), token: header.slice(space + 1) }
}

export function isSupportedScheme(scheme: string): scheme is AuthScheme {
  return SUPPORTED_AUTH_SCHEMES.some((supported) => supported === scheme)
}

/**
 * Service principal name for Negotiate, from the peer's fully qualified name.
 */
export function servicePrincipalName(fqdn: string): string {
  return `HTTP/${fqdn}`
}

// =============================================================================
// AuthSession Class
// =============================================================================

/**
 * State of one authentication attempt.
 *
 * Credentials are acquired on the first round and the security context is
 * threaded through every later round.
 */
export class AuthSession<TCredentials = unknown, TContext = unknown> {
  readonly scheme: AuthScheme
  private readonly provider: SecurityProvider<TCredentials, TContext>
  private readonly targetName: string | undefined
  private credentials?: TCredentials
  private context?: TContext
  private _rounds = 0
  private _complete = false
  private released = false

  constructor(
    provider: SecurityProvider<TCredentials, TContext>,
    scheme: AuthScheme,
    targetName: string | undefined
  ) {
    if (scheme === 'Negotiate' && !targetName) {
      throw new AuthenticationError(
        'Cannot do Negotiate authentication as no target name is known',
        AuthenticationErrorCodes.MISSING_TARGET_NAME,
        { scheme }
      )
    }
    this.provider = provider
    this.scheme = scheme
    this.targetName = targetName
  }

  /** Rounds answered so far */
  get rounds(): number {
    return this._rounds
  }

  /** True once the provider reported `complete` */
  get complete(): boolean {
    return this._complete
  }

  /**
   * Answers a server challenge.
   *
   * @returns The `Authorization` header value, `<scheme> <base64 token>`
   * @throws {AuthenticationError} When the provider fails or yields no token
   */
  async respond(challengeToken: string): Promise<string> {
    const inputToken = challengeToken ? Buffer.from(challengeToken, 'base64') : undefined

    let result: SecurityContextResult<TContext>
    try {
      const credentials = this.credentials ?? (await this.provider.acquireCredentials(this.scheme))
      this.credentials = credentials
      result = await this.provider.initializeSecurityContext({
        credentials,
        context: this.context,
        scheme: this.scheme,
        targetName: this.targetName,
        inputToken,
      })
    } catch (error) {
      throw new AuthenticationError(
        `${this.scheme} security provider failed: ${toError(error).message}`,
        AuthenticationErrorCodes.PROVIDER_FAILURE,
        { scheme: this.scheme, cause: toError(error) }
      )
    }

    this.context = result.context
    this._rounds++
    this._complete = result.status === 'complete'

    if (result.outputToken.length === 0) {
      throw new AuthenticationError(
        `${this.scheme} security provider produced no token`,
        AuthenticationErrorCodes.EMPTY_TOKEN,
        { scheme: this.scheme }
      )
    }

    return `${this.scheme} ${Buffer.from(result.outputToken).toString('base64')}`
  }

  /**
   * Releases provider resources. Safe to call more than once.
   */
  async release(): Promise<void> {
    if (this.released || this.credentials === undefined) {
      return
    }
    this.released = true
    await this.provider.releaseContext?.(this.context, this.credentials)
  }
}
