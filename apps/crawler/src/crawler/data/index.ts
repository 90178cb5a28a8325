/**
 * Lookup data shipped beside this module: boilerplate stoplist, hierarchy
 * vocabulary, region spelling variants and the estate override table.
 * Each file is schema-checked once at load.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

const stoplistSchema = z.object({
  exact: z.array(z.string().min(1)),
  keywords: z.array(z.string().min(1)),
})

const vocabularySchema = z.object({
  homeSentinels: z.array(z.string().min(1)).min(1),
  categories: z.array(z.string().min(1)),
  regions: z.array(z.string().min(1)),
  districts: z.array(z.string().min(1)),
  propertyTypes: z.array(z.string().min(1)),
})

const regionVariantsSchema = z.record(z.string().min(1), z.array(z.string().min(1)).min(1))

const overrideFieldSchema = z.enum(['district', 'districtLevel2', 'subDistrict', 'estateName'])

const overrideRulesSchema = z.array(
  z.object({
    description: z.string(),
    match: z.object({
      fields: z.array(overrideFieldSchema).min(1),
      equals: z.string().min(1),
    }),
    set: z.record(overrideFieldSchema, z.string().min(1)),
  })
)

export type OverrideField = z.infer<typeof overrideFieldSchema>
export type OverrideRule = z.infer<typeof overrideRulesSchema>[number]
export type Vocabulary = z.infer<typeof vocabularySchema>

function loadDataFile<S extends z.ZodTypeAny>(fileName: string, schema: S): z.infer<S> {
  const raw: unknown = JSON.parse(readFileSync(new URL(`./${fileName}`, import.meta.url), 'utf8'))
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid data file ${fileName}`, {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    })
  }
  return parsed.data
}

const stoplist = loadDataFile('stoplist.json', stoplistSchema)

export const STOPLIST_EXACT: ReadonlySet<string> = new Set(stoplist.exact)
export const STOPLIST_KEYWORDS: readonly string[] = stoplist.keywords

export const VOCABULARY: Readonly<Vocabulary> = loadDataFile('vocabulary.json', vocabularySchema)

export const HOME_SENTINELS: ReadonlySet<string> = new Set(VOCABULARY.homeSentinels)
export const CATEGORY_NAMES: ReadonlySet<string> = new Set(VOCABULARY.categories)
export const REGION_NAMES: ReadonlySet<string> = new Set(VOCABULARY.regions)
export const DISTRICT_NAMES: ReadonlySet<string> = new Set(VOCABULARY.districts)

/** Canonical region name -> accepted spellings */
export const REGION_VARIANTS: Readonly<Record<string, string[]>> = loadDataFile(
  'regions.json',
  regionVariantsSchema
)

export const OVERRIDE_RULES: readonly OverrideRule[] = loadDataFile('overrides.json', overrideRulesSchema)
