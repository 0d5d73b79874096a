/**
 * @file Frame Codec
 *
 * Encodes outbound frames and decodes inbound frames (RFC 6455 section 5.2).
 *
 * ```
 *  0                   1                   2                   3
 *  0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1 2 3 4 5 6 7 8 9 0 1
 * +-+-+-+-+-------+-+-------------+-------------------------------+
 * |F|R|R|R| opcode|M| Payload len |    Extended payload length    |
 * |I|S|S|S|  (4)  |A|     (7)     |             (16/64)           |
 * |N|V|V|V|       |S|             |   (if payload len==126/127)   |
 * | |1|2|3|       |K|             |                               |
 * +-+-+-+-+-------+-+-------------+ - - - - - - - - - - - - - - - +
 * |     Extended payload length continued, if payload len == 127  |
 * + - - - - - - - - - - - - - - - +-------------------------------+
 * |                               |Masking-key, if MASK set to 1  |
 * +-------------------------------+-------------------------------+
 * | Masking-key (continued)       |          Payload Data         |
 * +-------------------------------- - - - - - - - - - - - - - - - +
 * ```
 *
 * @see https://www.rfc-editor.org/rfc/rfc6455#section-5.2
 * @module ws-stream-client/protocol/frame-codec
 */

import { ProtocolError, ProtocolErrorCodes } from '../errors.js'
import type { ByteSource } from '../transport/types.js'
import { opcodeFromBits, opcodeToBits, type Opcode, type SendableOpcode } from './opcode.js'

// =============================================================================
// Types
// =============================================================================

/**
 * A decoded frame. `payload` is already unmasked.
 */
export interface Frame {
  fin: boolean
  opcode: Opcode
  masked: boolean
  payloadLength: number
  maskKey?: Buffer
  payload: Buffer
}

/**
 * An encoded outbound frame, written as two consecutive transport sends.
 */
export interface EncodedFrame {
  /** First byte, length field and mask key */
  header: Buffer
  /** Payload XORed with the mask key */
  payload: Buffer
}

export interface DecodeOptions {
  /** Frames announcing a longer payload are rejected before it is read */
  maxPayloadLength: number
}

const FIN_BIT = 0x80
const MASK_BIT = 0x80
const MASK_KEY_BYTES = 4

/** Largest length that fits the 7-bit field */
const MAX_SHORT_LENGTH = 125
const LENGTH_16 = 126
const LENGTH_64 = 127

// =============================================================================
// Masking
// =============================================================================

/**
 * XORs each byte with `maskKey[i % 4]` into a new buffer.
 *
 * Applying the same key twice returns the original bytes.
 */
export function applyMask(payload: Uint8Array, maskKey: Uint8Array): Buffer {
  const out = Buffer.alloc(payload.length)
  for (let i = 0; i < payload.length; i++) {
    out[i] = payload[i] ^ maskKey[i % MASK_KEY_BYTES]
  }
  return out
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Encodes a single unfragmented, masked frame.
 *
 * The header is 2, 4 or 10 bytes plus the 4-byte mask key, depending on the
 * payload length (<= 125, < 65536, otherwise).
 *
 * @example
 * ```typescript
 * const { header, payload } = encodeFrame(Buffer.from('hi'), 'text', Buffer.alloc(4))
 * // header: 81 82 00 00 00 00, payload: 68 69
 * ```
 */
export function encodeFrame(payload: Uint8Array, opcode: SendableOpcode, maskKey: Uint8Array): EncodedFrame {
  if (maskKey.length !== MASK_KEY_BYTES) {
    throw new RangeError(`Mask key must be ${MASK_KEY_BYTES} bytes, got ${maskKey.length}`)
  }

  const length = payload.length
  let header: Buffer

  if (length <= MAX_SHORT_LENGTH) {
    header = Buffer.alloc(2 + MASK_KEY_BYTES)
    header[1] = MASK_BIT | length
  } else if (length < 0x10000) {
    header = Buffer.alloc(4 + MASK_KEY_BYTES)
    header[1] = MASK_BIT | LENGTH_16
    header.writeUInt16BE(length, 2)
  } else {
    header = Buffer.alloc(10 + MASK_KEY_BYTES)
    header[1] = MASK_BIT | LENGTH_64
    header.writeBigUInt64BE(BigInt(length), 2)
  }

  header[0] = FIN_BIT | opcodeToBits(opcode)
  header.set(maskKey, header.length - MASK_KEY_BYTES)

  return { header, payload: applyMask(payload, maskKey) }
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Reads exactly `count` bytes.
 *
 * @returns The bytes, or `null` if the stream ended first
 */
export async function readExactly(source: ByteSource, count: number): Promise<Buffer | null> {
  if (count === 0) {
    return Buffer.alloc(0)
  }

  const parts: Uint8Array[] = []
  let received = 0
  while (received < count) {
    const bytes = await source.receive(count - received)
    if (bytes === null) {
      return null
    }
    parts.push(bytes)
    received += bytes.length
  }
  return Buffer.concat(parts, count)
}

/**
 * Reads and decodes the next frame.
 *
 * @returns The frame, or `null` when the peer closed the stream
 * @throws {ProtocolError} When the announced length exceeds `maxPayloadLength`
 * @throws {TransportError} When the transport fails
 */
export async function decodeFrame(source: ByteSource, options: DecodeOptions): Promise<Frame | null> {
  const head = await readExactly(source, 2)
  if (head === null) {
    return null
  }

  const fin = (head[0] & FIN_BIT) !== 0
  const opcode = opcodeFromBits(head[0])
  const masked = (head[1] & MASK_BIT) !== 0
  let length = head[1] & 0x7f

  if (length === LENGTH_16) {
    const extended = await readExactly(source, 2)
    if (extended === null) {
      return null
    }
    length = extended.readUInt16BE(0)
  } else if (length === LENGTH_64) {
    const extended = await readExactly(source, 8)
    if (extended === null) {
      return null
    }
    const wide = extended.readBigUInt64BE(0)
    if (wide > BigInt(options.maxPayloadLength)) {
      throw payloadTooLarge(wide, options.maxPayloadLength)
    }
    length = Number(wide)
  }

  if (length > options.maxPayloadLength) {
    throw payloadTooLarge(BigInt(length), options.maxPayloadLength)
  }

  let maskKey: Buffer | undefined
  if (masked) {
    const key = await readExactly(source, MASK_KEY_BYTES)
    if (key === null) {
      return null
    }
    maskKey = key
  }

  const raw = await readExactly(source, length)
  if (raw === null) {
    return null
  }

  return {
    fin,
    opcode,
    masked,
    payloadLength: length,
    maskKey,
    payload: maskKey ? applyMask(raw, maskKey) : raw,
  }
}

function payloadTooLarge(length: bigint, max: number): ProtocolError {
  return new ProtocolError(
    `Frame payload of ${length} bytes exceeds the ${max} byte limit`,
    ProtocolErrorCodes.PAYLOAD_TOO_LARGE
  )
}
