/**
 * @file Transport Types
 *
 * The byte-stream seam between the WebSocket client and the network. The
 * client only ever talks to a `Transport`; `SocketConnector` provides the
 * default implementation over `node:net`, and tests substitute an
 * in-process fake.
 *
 * @module ws-stream-client/transport/types
 */

/**
 * Options for a single `receive()` call.
 */
export interface ReceiveOptions {
  /**
   * Return buffered bytes without consuming them.
   * @default false
   */
  peek?: boolean
}

/**
 * A readable source of bytes.
 *
 * `receive()` resolves once at least one byte is available and never returns
 * more than `maxBytes`. It resolves `null` at end of stream, which is a clean
 * close, and rejects with a `TransportError` on failure.
 */
export interface ByteSource {
  receive(maxBytes: number, options?: ReceiveOptions): Promise<Uint8Array | null>
}

/**
 * A connected, ordered, reliable byte stream.
 */
export interface Transport extends ByteSource {
  /**
   * Writes all of `data`. When `timeout` (ms) is given and the write does not
   * complete in time, rejects with `SendTimeoutError`.
   */
  send(data: Uint8Array, timeout?: number): Promise<void>

  /**
   * Shuts down the write side; reads continue until the peer ends the stream.
   */
  halfCloseWrite(): Promise<void>

  /**
   * Releases the stream. Pending and later reads resolve `null`.
   */
  close(): void

  /**
   * Fully qualified name of the connected peer, used to build the Negotiate
   * service principal name. Resolves `undefined` when no name is known.
   */
  canonicalHostname?(): Promise<string | undefined>
}

/**
 * Opens transports.
 */
export interface TransportConnector {
  connect(host: string, port: number, options: { timeout: number }): Promise<Transport>
}
