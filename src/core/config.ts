import { z } from 'zod'
import { readFile, writeFile, mkdir } from 'fs/promises'
import { resolve } from 'path'
import { newsCollectorSchema } from '../extension/news-collector/config.js'
import { exportSchema } from '../extension/exporter/config.js'

export const CONFIG_DIR = resolve('data/config')

// ==================== Individual Schemas ====================

const trendingSchema = z.object({
  /** Minimum mentions before a term counts as trending */
  thresholdMentions: z.number().int().positive().default(3),
  /** Look-back window, in hours */
  windowHours: z.number().int().positive().default(24),
})

const summarySchema = z.object({
  maxLength: z.number().int().positive().default(500),
})

const connectorsSchema = z.object({
  web: z.object({
    enabled: z.boolean().default(true),
    port: z.number().int().positive().default(3002),
  }).default({ enabled: true, port: 3002 }),
})

// ==================== Unified Config Type ====================

export type Config = {
  trending: z.infer<typeof trendingSchema>
  newsCollector: z.infer<typeof newsCollectorSchema>
  summary: z.infer<typeof summarySchema>
  export: z.infer<typeof exportSchema>
  connectors: z.infer<typeof connectorsSchema>
}

export type TrendingConfig = Config['trending']

// ==================== Loader ====================

/** Read a JSON config file. Returns undefined if file does not exist. */
async function loadJsonFile(dir: string, filename: string): Promise<unknown> {
  try {
    return JSON.parse(await readFile(resolve(dir, filename), 'utf-8'))
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined
    }
    throw err
  }
}

/** Parse with Zod; if the file was missing, seed it to disk with defaults. */
async function parseAndSeed<T>(dir: string, filename: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown): Promise<T> {
  const parsed = schema.parse(raw ?? {})
  if (raw === undefined) {
    await mkdir(dir, { recursive: true })
    await writeFile(resolve(dir, filename), JSON.stringify(parsed, null, 2) + '\n')
  }
  return parsed
}

export async function loadConfig(dir: string = CONFIG_DIR): Promise<Config> {
  const files = ['trending.json', 'news-collector.json', 'summary.json', 'export.json', 'connectors.json'] as const
  const raws = await Promise.all(files.map((f) => loadJsonFile(dir, f)))

  return {
    trending:      await parseAndSeed(dir, files[0], trendingSchema, raws[0]),
    newsCollector: await parseAndSeed(dir, files[1], newsCollectorSchema, raws[1]),
    summary:       await parseAndSeed(dir, files[2], summarySchema, raws[2]),
    export:        await parseAndSeed(dir, files[3], exportSchema, raws[3]),
    connectors:    await parseAndSeed(dir, files[4], connectorsSchema, raws[4]),
  }
}

// ==================== Hot-read helpers ====================

/** Read trending config from disk (called per-request for hot-reload). */
export async function readTrendingConfig(dir: string = CONFIG_DIR): Promise<TrendingConfig> {
  return trendingSchema.parse((await loadJsonFile(dir, 'trending.json')) ?? {})
}

// ==================== Writer ====================

export type ConfigSection = keyof Config

const sectionSchemas: Record<ConfigSection, z.ZodTypeAny> = {
  trending: trendingSchema,
  newsCollector: newsCollectorSchema,
  summary: summarySchema,
  export: exportSchema,
  connectors: connectorsSchema,
}

const sectionFiles: Record<ConfigSection, string> = {
  trending: 'trending.json',
  newsCollector: 'news-collector.json',
  summary: 'summary.json',
  export: 'export.json',
  connectors: 'connectors.json',
}

/** All valid config section names. */
export const validSections: readonly ConfigSection[] = ['trending', 'newsCollector', 'summary', 'export', 'connectors']

export function isConfigSection(name: string): name is ConfigSection {
  return validSections.some((section) => section === name)
}

/** Validate and write a config section to disk. Returns the validated config. */
export async function writeConfigSection(section: ConfigSection, data: unknown, dir: string = CONFIG_DIR): Promise<unknown> {
  const validated: unknown = sectionSchemas[section].parse(data)
  await mkdir(dir, { recursive: true })
  await writeFile(resolve(dir, sectionFiles[section]), JSON.stringify(validated, null, 2) + '\n')
  return validated
}
