import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogFn } from '../../src/client/logger.js'

describe('createLogFn', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should write prefixed lines to the console when debug is on', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    createLogFn(true)('info', 'Connected', { port: 8080 })

    expect(info).toHaveBeenCalledWith('[WebSocketClient] Connected', { port: 8080 })
  })

  it('should do nothing when debug is off', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const logger = { info: vi.fn() }

    createLogFn(false, logger)('info', 'Connected')

    expect(info).not.toHaveBeenCalled()
    expect(logger.info).not.toHaveBeenCalled()
  })

  it('should skip levels the custom logger does not implement', () => {
    const logger = { error: vi.fn() }
    const log = createLogFn(true, logger)

    log('debug', 'Frame received')
    log('error', 'Connection failed', { error: 'boom' })

    expect(logger.error).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledWith('Connection failed', { error: 'boom' })
  })
})
