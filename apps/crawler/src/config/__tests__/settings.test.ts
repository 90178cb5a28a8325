import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { classifyError } from '../../crawler/errors.js'
import { loadSettings } from '../settings.js'

describe('loadSettings', () => {
  it('applies defaults for an empty environment', () => {
    const settings = loadSettings({})
    expect(settings.outputDir).toBe('output')
    expect(settings.maxPages).toBe(5)
    expect(settings.maxProperties).toBeUndefined()
    expect(settings.maxResponseBytes).toBe(10 * 1024 * 1024)
  })

  it('coerces numeric values and treats blanks as unset', () => {
    const settings = loadSettings({
      CRAWL_MAX_PAGES: '3',
      CRAWL_MAX_PROPERTIES: '40',
      CRAWL_OUTPUT_DIR: '  ',
    })
    expect(settings.maxPages).toBe(3)
    expect(settings.maxProperties).toBe(40)
    expect(settings.outputDir).toBe('output')
  })

  it('rejects non-positive page limits as a configuration error', () => {
    let thrown: unknown
    try {
      loadSettings({ CRAWL_MAX_PAGES: '0' })
    } catch (error) {
      thrown = error
    }

    expect(thrown).toBeInstanceOf(ZodError)
    const classified = classifyError(thrown)
    expect(classified.category).toBe('config')
    expect(classified.code).toBe('CONFIGURATION_ERROR')
    expect(classified.details?.issues).toEqual([
      { path: 'CRAWL_MAX_PAGES', message: 'Number must be greater than 0' },
    ])
  })
})
