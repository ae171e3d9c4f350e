/**
 * Exporter — Zod configuration schema
 *
 * Loaded from data/config/export.json.
 */

import { z } from 'zod'

export const EXPORT_FORMATS = ['json', 'csv', 'markdown'] as const

export type ExportFormat = (typeof EXPORT_FORMATS)[number]

export const exportSchema = z.object({
  /** Output directory, relative to the working directory */
  dir: z.string().min(1).default('exports'),
  /** Formats written by a pipeline run */
  formats: z.array(z.enum(EXPORT_FORMATS)).default([...EXPORT_FORMATS]),
})

export type ExportConfig = z.infer<typeof exportSchema>
