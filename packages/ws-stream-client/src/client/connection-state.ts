/**
 * @file Connection State Machine
 * @module ws-stream-client/client/connection-state
 *
 * Finite state machine for the lifetime of an upgraded connection.
 *
 * ## State Diagram (ASCII)
 *
 * ```
 *     ┌──────────────────────────┐
 *     │           open           │
 *     └──────────────────────────┘
 *           │              │
 *  [shutdown]              │ [peerClose | endOfStream | fail]
 *           ▼              │
 *     ┌──────────────────────────┐
 *     │         closing          │
 *     │  (write side shut down,  │
 *     │   draining reads)        │
 *     └──────────────────────────┘
 *           │              │
 *           │ [peerClose | endOfStream | fail]
 *           ▼              ▼
 *     ┌──────────────────────────┐
 *     │          closed          │
 *     └──────────────────────────┘
 * ```
 *
 * ## Transition Table
 *
 * | From State | Event       | To State |
 * |------------|-------------|----------|
 * | open       | shutdown    | closing  |
 * | open       | peerClose   | closed   |
 * | open       | endOfStream | closed   |
 * | open       | fail        | closed   |
 * | closing    | peerClose   | closed   |
 * | closing    | endOfStream | closed   |
 * | closing    | fail        | closed   |
 *
 * `closed` is terminal: the machine never leaves it.
 */

import type { LogFn } from '../types.js'

export type ConnectionState = 'open' | 'closing' | 'closed'

export type ConnectionEvent = 'shutdown' | 'peerClose' | 'endOfStream' | 'fail'

/**
 * Payload passed to state change listeners.
 */
export interface ConnectionStateChange {
  from: ConnectionState
  to: ConnectionState
  event: ConnectionEvent
}

export type StateChangeListener = (change: ConnectionStateChange) => void

const TRANSITIONS: Record<ConnectionState, Partial<Record<ConnectionEvent, ConnectionState>>> = {
  open: {
    shutdown: 'closing',
    peerClose: 'closed',
    endOfStream: 'closed',
    fail: 'closed',
  },
  closing: {
    peerClose: 'closed',
    endOfStream: 'closed',
    fail: 'closed',
  },
  closed: {},
}

export class ConnectionStateMachine {
  private state: ConnectionState = 'open'
  private listeners: StateChangeListener[] = []
  private readonly log: LogFn

  constructor(log: LogFn) {
    this.log = log
  }

  get current(): ConnectionState {
    return this.state
  }

  canTransition(event: ConnectionEvent): boolean {
    return TRANSITIONS[this.state][event] !== undefined
  }

  /**
   * Applies an event.
   *
   * @returns `false` when the event is not valid in the current state
   */
  transition(event: ConnectionEvent): boolean {
    const from = this.state
    const to = TRANSITIONS[from][event]

    if (to === undefined) {
      this.log('debug', 'Ignored connection event', { state: from, event })
      return false
    }

    this.state = to
    this.log('debug', 'Connection state changed', { from, to, event })

    for (const listener of [...this.listeners]) {
      listener({ from, to, event })
    }
    return true
  }

  /**
   * Subscribes to state changes.
   *
   * @returns Unsubscribe function
   */
  onStateChange(listener: StateChangeListener): () => void {
    this.listeners.push(listener)
    return () => {
      this.listeners = this.listeners.filter((registered) => registered !== listener)
    }
  }
}
