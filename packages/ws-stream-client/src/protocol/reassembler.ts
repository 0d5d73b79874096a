/**
 * @file Fragmentation Reassembler
 *
 * Joins fragmented data frames into complete messages.
 *
 * ```
 *   [FIN=0 text "Hel"] [FIN=0 cont "lo "] [FIN=1 cont "World"]
 *           │                  │                   │
 *           ▼                  ▼                   ▼
 *     pending=text      buffer "Hello "     emit { text, "Hello World" }, reset
 * ```
 *
 * Control frames may be interleaved with fragments; they are emitted as-is
 * and leave the pending message alone.
 *
 * @module ws-stream-client/protocol/reassembler
 */

import { ProtocolError, ProtocolErrorCodes } from '../errors.js'
import type { Frame } from './frame-codec.js'
import { isControlOpcode, type Opcode } from './opcode.js'

/**
 * A complete message ready for dispatch.
 */
export interface Message {
  opcode: Opcode
  payload: Buffer
}

export class FragmentReassembler {
  private readonly maxMessageLength: number
  private fragments: Buffer[] = []
  private bufferedLength = 0
  private pendingOpcode: Opcode | null = null
  private inProgress = false

  constructor(options: { maxMessageLength: number }) {
    this.maxMessageLength = options.maxMessageLength
  }

  /** True while a fragmented message awaits its final frame */
  get isFragmenting(): boolean {
    return this.inProgress
  }

  /**
   * Feeds one frame.
   *
   * @returns The completed message, or `null` if more fragments are expected
   * @throws {ProtocolError} When the accumulated message exceeds `maxMessageLength`
   */
  push(frame: Frame): Message | null {
    if (isControlOpcode(frame.opcode)) {
      return { opcode: frame.opcode, payload: frame.payload }
    }

    if (!frame.fin) {
      if (frame.opcode !== 'continuation' && frame.opcode !== 'invalid') {
        this.pendingOpcode = frame.opcode
      }
      this.append(frame.payload)
      this.inProgress = true
      return null
    }

    if (!this.inProgress) {
      return { opcode: deliverable(frame.opcode), payload: frame.payload }
    }

    this.append(frame.payload)
    const message: Message = {
      opcode: this.pendingOpcode ?? deliverable(frame.opcode),
      payload: Buffer.concat(this.fragments, this.bufferedLength),
    }
    this.reset()
    return message
  }

  reset(): void {
    this.fragments = []
    this.bufferedLength = 0
    this.pendingOpcode = null
    this.inProgress = false
  }

  private append(payload: Buffer): void {
    if (this.bufferedLength + payload.length > this.maxMessageLength) {
      throw new ProtocolError(
        `Fragmented message exceeds the ${this.maxMessageLength} byte limit`,
        ProtocolErrorCodes.MESSAGE_TOO_LARGE
      )
    }
    this.fragments.push(payload)
    this.bufferedLength += payload.length
  }
}

/**
 * A continuation with no message to continue is reported as `invalid`.
 */
function deliverable(opcode: Opcode): Opcode {
  return opcode === 'continuation' ? 'invalid' : opcode
}
