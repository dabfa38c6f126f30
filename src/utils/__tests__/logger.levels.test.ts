import { afterEach, describe, it, expect, vi } from 'vitest'
import { createLogger, resolveLogLevel } from '../logger'

describe('logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('LOG_LEVEL wins over the verbose flag', () => {
    expect(resolveLogLevel({ verbose: true, env: { LOG_LEVEL: 'WARN' } })).toBe('warn')
    expect(resolveLogLevel({ verbose: true, env: {} })).toBe('debug')
    expect(resolveLogLevel({ env: { LOG_LEVEL: 'loud' } })).toBe('info')
  })

  it('prefixes the tag and filters by level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const logger = createLogger('tick', 'info')
    logger.debug('hidden')
    logger.info('shown', 1)
    logger.warn('careful')
    expect(log).toHaveBeenCalledTimes(1)
    expect(log).toHaveBeenCalledWith('[tick]', 'shown', 1)
    expect(warn).toHaveBeenCalledWith('[tick]', 'careful')
  })

  it('silent logs nothing', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('tick', 'silent').error('nope')
    expect(error).not.toHaveBeenCalled()
  })
})
