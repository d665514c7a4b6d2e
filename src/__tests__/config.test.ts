import { describe, it, expect, vi, afterEach } from 'vitest'
import { configure, getConfig, log, resetConfig } from '../config'

describe('config', () => {
  afterEach(() => {
    resetConfig()
    vi.restoreAllMocks()
  })

  it('defaults to warn level without a custom logger', () => {
    expect(getConfig().logging.level).toBe('warn')
    expect(getConfig().logging.logger).toBeUndefined()
  })

  it('merges partial settings over the current ones', () => {
    const logger = vi.fn()
    configure({ logging: { logger } })
    configure({ logging: { level: 'debug' } })

    expect(getConfig().logging.level).toBe('debug')
    expect(getConfig().logging.logger).toBe(logger)
  })

  it('keeps the current settings for fields passed as undefined', () => {
    const logger = vi.fn()
    configure({ logging: { level: undefined, logger } })

    expect(getConfig().logging.level).toBe('warn')
    expect(getConfig().logging.logger).toBe(logger)

    log('debug', 'hidden')
    expect(logger).not.toHaveBeenCalled()

    configure({ logging: { logger: undefined } })
    expect(getConfig().logging.logger).toBe(logger)
  })

  it('returns a frozen configuration', () => {
    expect(Object.isFrozen(getConfig())).toBe(true)
    expect(Object.isFrozen(getConfig().logging)).toBe(true)
  })

  it('resetConfig restores the defaults', () => {
    configure({ logging: { level: 'error' } })
    resetConfig()
    expect(getConfig().logging.level).toBe('warn')
  })

  describe('log', () => {
    it('drops messages below the configured level', () => {
      const logger = vi.fn()
      configure({ logging: { level: 'warn', logger } })

      log('info', 'hidden')
      log('debug', 'hidden')
      log('warn', 'shown')
      log('error', 'also shown')

      expect(logger.mock.calls).toEqual([
        ['warn', 'shown'],
        ['error', 'also shown'],
      ])
    })

    it('writes to the console when no logger is configured', () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined)

      log('error', 'boom')

      expect(spy).toHaveBeenCalledWith('[infallible-bigint] boom')
    })
  })
})
