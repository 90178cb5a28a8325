/**
 * Crawler settings, read from the environment and validated with zod.
 * CLI flags override individual values after loading.
 */

import { z } from 'zod'

const positiveInt = z.coerce.number().int().positive()

export const settingsSchema = z.object({
  CRAWL_OUTPUT_DIR: z.string().trim().min(1).default('output'),
  CRAWL_MAX_PAGES: positiveInt.default(5),
  CRAWL_MAX_PROPERTIES: positiveInt.optional(),
  CRAWL_USER_AGENT: z
    .string()
    .trim()
    .min(1)
    .default('Mozilla/5.0 (compatible; HomescanCrawler/0.1)'),
  CRAWL_MAX_RESPONSE_BYTES: positiveInt.default(10 * 1024 * 1024),
})

export interface CrawlerSettings {
  outputDir: string
  maxPages: number
  maxProperties: number | undefined
  userAgent: string
  maxResponseBytes: number
}

/**
 * Parse settings from an env-like record. Blank values count as unset.
 * Throws ZodError on invalid input.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): CrawlerSettings {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )
  const parsed = settingsSchema.parse(present)

  return {
    outputDir: parsed.CRAWL_OUTPUT_DIR,
    maxPages: parsed.CRAWL_MAX_PAGES,
    maxProperties: parsed.CRAWL_MAX_PROPERTIES,
    userAgent: parsed.CRAWL_USER_AGENT,
    maxResponseBytes: parsed.CRAWL_MAX_RESPONSE_BYTES,
  }
}
