/**
 * Word lists shipped under data/lexicon/, validated with Zod and read once.
 *
 * Paths resolve from this module (src/core or dist/core), so the lists are
 * found regardless of the working directory.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'

const LEXICON_DIR = new URL('../../data/lexicon/', import.meta.url)

const categoryLexiconSchema = z.record(
  z.string(),
  z.object({
    keywords: z.array(z.string().min(1)),
    sensitive: z.array(z.string().min(1)).default([]),
  }),
)

const countryListSchema = z.array(z.string().min(1))

export type CategoryLexicon = z.infer<typeof categoryLexiconSchema>

let categories: CategoryLexicon | null = null
let countries: string[] | null = null

/** Category → keyword / sensitive-topic lists, in file order. */
export function loadCategoryLexicon(): CategoryLexicon {
  categories ??= categoryLexiconSchema.parse(readJson('categories.json'))
  return categories
}

/** Lower-case country names, in file order. */
export function loadCountryList(): string[] {
  countries ??= countryListSchema.parse(readJson('countries.json'))
  return countries
}

function readJson(filename: string): unknown {
  return JSON.parse(readFileSync(new URL(filename, LEXICON_DIR), 'utf-8'))
}
