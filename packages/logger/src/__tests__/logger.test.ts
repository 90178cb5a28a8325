import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger, currentLogLevel, setLogLevel } from '../index.js'

function restoreEnv(key: string, value: string | undefined): void {
  if (value === undefined) {
    delete process.env[key]
  } else {
    process.env[key] = value
  }
}

describe('logger', () => {
  const originalFormat = process.env.LOG_FORMAT
  const originalLevel = process.env.LOG_LEVEL

  afterEach(() => {
    vi.restoreAllMocks()
    setLogLevel(null)
    restoreEnv('LOG_FORMAT', originalFormat)
    restoreEnv('LOG_LEVEL', originalLevel)
  })

  it('writes JSON entries with nested component names and bindings', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    const logger = createLogger('crawler').child('walker', { siteId: 'centanet' }).child('page')
    logger.info('List page fetched', { page: 2 })

    expect(consoleInfo).toHaveBeenCalledTimes(1)
    const payload: unknown = JSON.parse(String(consoleInfo.mock.calls[0][0]))
    expect(payload).toMatchObject({
      service: 'crawler',
      component: 'walker:page',
      siteId: 'centanet',
      page: 2,
      message: 'List page fetched',
      level: 'info',
    })
  })

  it('drops entries below the active level', () => {
    process.env.LOG_FORMAT = 'json'
    process.env.LOG_LEVEL = 'warn'
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const logger = createLogger('crawler')
    logger.info('hidden')
    logger.warn('shown')

    expect(consoleInfo).not.toHaveBeenCalled()
    expect(consoleWarn).toHaveBeenCalledTimes(1)
  })

  it('lets setLogLevel override LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error'
    setLogLevel('debug')
    expect(currentLogLevel()).toBe('debug')

    setLogLevel(null)
    expect(currentLogLevel()).toBe('error')
  })

  it('serializes errors with their code', () => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('info')
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    const failure = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' })
    createLogger('crawler').error('Detail fetch failed', { url: 'https://example.test/a' }, failure)

    const payload: unknown = JSON.parse(String(consoleError.mock.calls[0][0]))
    expect(payload).toMatchObject({
      error: { name: 'Error', message: 'socket hang up', code: 'ECONNRESET' },
    })
  })
})
