import { setLogLevel } from '@homescan/logger'
import { loadSettings } from '../../config/settings.js'
import { runCrawl, type CrawlOptions, type CrawlReport } from '../../crawler/crawl.js'
import { writeRunOutputs, type WrittenFiles } from '../../crawler/export/result-sink.js'
import { getSiteRegistry } from '../../crawler/sites/registry.js'
import type { ListingCategory, SiteProfile } from '../../crawler/types.js'
import { asChoice, asPositiveInt, asString, type Flags, UsageError } from '../parse-flags.js'

const CATEGORIES: readonly ListingCategory[] = ['buy', 'rent']

export interface CrawlCommandDeps {
  env?: NodeJS.ProcessEnv
  write?: (line: string) => void
  /** Test seam: fetcher and clock injection */
  crawlOverrides?: Pick<CrawlOptions, 'createFetcher' | 'rateLimiter' | 'clock'>
}

function resolveProfiles(site: string | undefined): SiteProfile[] {
  const registry = getSiteRegistry()
  if (site === undefined || site === 'all') return registry.list()

  const profile = registry.get(site)
  if (!profile) {
    throw new UsageError(`Unknown site '${site}'. Known sites: ${registry.ids().join(', ')}, all`)
  }
  return [profile]
}

function printSummary(report: CrawlReport, files: WrittenFiles, write: (line: string) => void): void {
  write('')
  write('Crawl summary')
  for (const site of report.sites) {
    const status = site.status === 'aborted' ? `aborted (${site.error ?? 'unknown error'})` : 'completed'
    write(
      `  ${site.siteId.padEnd(10)} found=${site.urlsFound} scheduled=${site.urlsScheduled} ` +
        `succeeded=${site.succeeded} failed=${site.failed} ${status}`
    )
  }
  const found = report.sites.reduce((sum, site) => sum + site.urlsFound, 0)
  write(`  total      found=${found} succeeded=${report.records.length} failed=${report.failures.length}`)
  if (report.region) {
    write(`  region     ${report.region} (filtered out ${report.filteredOut})`)
  }
  write('')
  write(`JSON:        ${files.json}`)
  write(`CSV:         ${files.csv}`)
  if (files.failedUrls) write(`Failed URLs: ${files.failedUrls}`)
}

/**
 * `crawl [--site id|all] [--max-pages N] [--max-properties N]
 * [--category buy|rent] [--region NAME] [--output-dir DIR] [--verbose]`
 *
 * Exit code 0 on success, 1 when no site produced a record. Records dropped
 * by the region filter still count as produced.
 */
export async function runCrawlCommand(flags: Flags, deps: CrawlCommandDeps = {}): Promise<number> {
  const write = deps.write ?? console.log
  const settings = loadSettings(deps.env ?? process.env)

  if (flags.verbose === true) setLogLevel('debug')

  const profiles = resolveProfiles(asString(flags.site))
  const category = asChoice('category', flags.category, CATEGORIES) ?? 'buy'
  const maxPages = asPositiveInt('max-pages', flags['max-pages']) ?? settings.maxPages
  const maxProperties = asPositiveInt('max-properties', flags['max-properties']) ?? settings.maxProperties
  const outputDir = asString(flags['output-dir']) ?? settings.outputDir

  const report = await runCrawl({
    profiles,
    category,
    maxPages,
    maxProperties,
    region: asString(flags.region),
    userAgent: settings.userAgent,
    maxResponseBytes: settings.maxResponseBytes,
    ...deps.crawlOverrides,
  })

  const files = await writeRunOutputs(outputDir, report, report.startedAt)
  printSummary(report, files, write)

  const succeeded = report.sites.reduce((sum, site) => sum + site.succeeded, 0)
  return succeeded > 0 ? 0 : 1
}
