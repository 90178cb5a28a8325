/**
 * Result Sink
 *
 * Writes one run's outputs into the output directory:
 * - properties_YYYYMMDD_HHMMSS.json: array of records
 * - properties_YYYYMMDD_HHMMSS.csv: one row per record, arrays joined with `|`
 * - failed_urls_YYYYMMDD_HHMMSS.txt: one URL per line, only when any failed
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import { loggers } from '../../config/logger.js'
import type { FailedUrl, ListingRecord } from '../types.js'

const log = loggers.export

/** Column order of the CSV export */
export const CSV_COLUMNS = [
  'propertyId',
  'source',
  'url',
  'title',
  'price',
  'priceDisplay',
  'monthlyMortgagePayment',
  'area',
  'areaDisplay',
  'district',
  'street',
  'address',
  'category',
  'region',
  'districtLevel2',
  'subDistrict',
  'estateName',
  'breadcrumb',
  'propertyType',
  'bedrooms',
  'bathrooms',
  'floor',
  'buildingAge',
  'orientation',
  'description',
  'images',
  'facilities',
  'updateDate',
  'crawledAt',
] as const satisfies readonly (keyof ListingRecord)[]

const LIST_SEPARATOR = '|'

export interface RunOutputs {
  records: readonly ListingRecord[]
  failures: readonly FailedUrl[]
}

export interface WrittenFiles {
  json: string
  csv: string
  failedUrls: string | null
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/** Local-time `YYYYMMDD_HHMMSS` */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

function toCsvCell(value: ListingRecord[keyof ListingRecord]): string {
  if (value === null) return ''
  if (Array.isArray(value)) return value.join(LIST_SEPARATOR)
  return String(value)
}

export function toCsv(records: readonly ListingRecord[]): string {
  const rows = records.map(record =>
    Object.fromEntries(CSV_COLUMNS.map(column => [column, toCsvCell(record[column])]))
  )
  return stringify(rows, { header: true, columns: [...CSV_COLUMNS] })
}

export async function writeRunOutputs(dir: string, outputs: RunOutputs, timestamp: Date): Promise<WrittenFiles> {
  await mkdir(dir, { recursive: true })
  const stamp = formatRunTimestamp(timestamp)

  const json = join(dir, `properties_${stamp}.json`)
  await writeFile(json, `${JSON.stringify(outputs.records, null, 2)}\n`, 'utf8')

  const csv = join(dir, `properties_${stamp}.csv`)
  await writeFile(csv, toCsv(outputs.records), 'utf8')

  let failedUrls: string | null = null
  if (outputs.failures.length > 0) {
    failedUrls = join(dir, `failed_urls_${stamp}.txt`)
    const lines = [...new Set(outputs.failures.map(failure => failure.url))]
    await writeFile(failedUrls, `${lines.join('\n')}\n`, 'utf8')
  }

  log.info('Run outputs written', {
    dir,
    records: outputs.records.length,
    failures: outputs.failures.length,
  })

  return { json, csv, failedUrls }
}
