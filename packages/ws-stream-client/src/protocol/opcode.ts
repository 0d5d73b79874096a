/**
 * @file Frame Opcodes
 *
 * Maps the 4-bit opcode field of a frame header to named opcodes and back.
 *
 * | Value | Opcode         | Kind    |
 * |-------|----------------|---------|
 * | 0x0   | `continuation` | data    |
 * | 0x1   | `text`         | data    |
 * | 0x2   | `binary`       | data    |
 * | 0x8   | `close`        | control |
 * | 0x9   | `ping`         | control |
 * | 0xA   | `pong`         | control |
 *
 * Reserved values (0x3-0x7, 0xB-0xF) decode to `invalid`.
 *
 * @module ws-stream-client/protocol/opcode
 */

export type Opcode = 'continuation' | 'text' | 'binary' | 'close' | 'ping' | 'pong' | 'invalid'

/**
 * Opcodes that can be written to the wire.
 */
export type SendableOpcode = Exclude<Opcode, 'invalid'>

const OPCODE_VALUES: Record<SendableOpcode, number> = {
  continuation: 0x0,
  text: 0x1,
  binary: 0x2,
  close: 0x8,
  ping: 0x9,
  pong: 0xa,
}

const SENDABLE_OPCODES: readonly SendableOpcode[] = [
  'continuation',
  'text',
  'binary',
  'close',
  'ping',
  'pong',
]

const OPCODES_BY_VALUE = new Map<number, SendableOpcode>(
  SENDABLE_OPCODES.map((name) => [OPCODE_VALUES[name], name])
)

/**
 * Decodes the low 4 bits of the first header byte.
 */
export function opcodeFromBits(bits: number): Opcode {
  return OPCODES_BY_VALUE.get(bits & 0x0f) ?? 'invalid'
}

/**
 * Encodes an opcode into its 4-bit wire value.
 */
export function opcodeToBits(opcode: SendableOpcode): number {
  return OPCODE_VALUES[opcode]
}

export function isSendableOpcode(opcode: Opcode): opcode is SendableOpcode {
  return opcode !== 'invalid'
}

/**
 * Control frames may arrive between the fragments of a data message.
 */
export function isControlOpcode(opcode: Opcode): boolean {
  return opcode === 'close' || opcode === 'ping' || opcode === 'pong'
}
