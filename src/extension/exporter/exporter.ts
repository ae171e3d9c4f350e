/**
 * Exporter — Writes article batches and trending reports to disk
 *
 * JSON (metadata + articles), CSV (one column per field seen) and a Markdown
 * report grouped by category. Filenames default to a local timestamp.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { DEFAULT_CATEGORY, type ImpactLevel, type NewsArticle } from '../../core/types.js'
import type { TrendingResult } from '../trending/index.js'
import type { ExportFormat } from './config.js'

export type ExportArticle = Partial<NewsArticle>

export type ExportPaths = Partial<Record<ExportFormat, string>>

export interface NewsExporterOpts {
  dir: string
  /** Clock for timestamps and report headers */
  now?: () => Date
}

const ENTITY_KINDS = ['locations', 'organizations', 'countries'] as const

const IMPACT_MARKERS: Record<ImpactLevel, string> = {
  high: '🔴',
  medium: '🟡',
  low: '🟢',
}

export class NewsExporter {
  private dir: string
  private now: () => Date

  constructor(opts: NewsExporterOpts) {
    this.dir = opts.dir
    this.now = opts.now ?? (() => new Date())
  }

  get exportDir(): string {
    return this.dir
  }

  // ==================== Articles ====================

  async exportJson(articles: readonly ExportArticle[], filename?: string): Promise<string> {
    const path = this.pathFor(filename ?? `news_${this.timestamp()}`, 'json')
    const data = {
      metadata: {
        exportedAt: this.now().toISOString(),
        totalArticles: articles.length,
        format: 'json',
      },
      articles,
    }
    await this.write(path, JSON.stringify(data, null, 2) + '\n')
    console.log(`exporter: wrote ${articles.length} articles to ${path}`)
    return path
  }

  async exportCsv(articles: readonly ExportArticle[], filename?: string): Promise<string> {
    const path = this.pathFor(filename ?? `news_${this.timestamp()}`, 'csv')
    if (articles.length === 0) {
      console.warn('exporter: no articles to export to CSV')
      return path
    }

    const fields = new Set<string>()
    const rows = articles.map((article) => {
      const entries: Array<[string, unknown]> = Object.entries(article)
      for (const [field] of entries) fields.add(field)
      return new Map(entries)
    })
    const header = [...fields].sort()

    const lines = [header.map(csvCell).join(',')]
    for (const row of rows) {
      lines.push(header.map((field) => csvCell(csvValue(row.get(field)))).join(','))
    }

    await this.write(path, lines.join('\r\n') + '\r\n')
    console.log(`exporter: wrote ${articles.length} articles to ${path}`)
    return path
  }

  async exportMarkdown(articles: readonly ExportArticle[], filename?: string): Promise<string> {
    const path = this.pathFor(filename ?? `news_${this.timestamp()}`, 'md')

    const lines = [
      '# News Intelligence Report',
      `\n**Generated:** ${formatDateTime(this.now())}`,
      `**Total Articles:** ${articles.length}`,
      '\n---\n',
    ]

    const groups = new Map<string, ExportArticle[]>()
    for (const article of articles) {
      const category = article.primaryCategory ?? DEFAULT_CATEGORY
      const group = groups.get(category)
      if (group) group.push(article)
      else groups.set(category, [article])
    }

    for (const category of [...groups.keys()].sort()) {
      const group = groups.get(category) ?? []
      lines.push(`\n## ${titleCase(category)}`, `**Articles:** ${group.length}`, '\n---\n')
      group.forEach((article, i) => lines.push(...articleSection(article, i + 1)))
    }

    await this.write(path, lines.join('\n'))
    console.log(`exporter: wrote ${articles.length} articles to ${path}`)
    return path
  }

  /** Write every requested format. A failing format is logged and left out. */
  async exportAllFormats(
    articles: readonly ExportArticle[],
    formats: readonly ExportFormat[],
    filename?: string,
  ): Promise<ExportPaths> {
    const base = filename ?? `news_${this.timestamp()}`
    const paths: ExportPaths = {}
    for (const format of formats) {
      try {
        if (format === 'json') paths.json = await this.exportJson(articles, base)
        else if (format === 'csv') paths.csv = await this.exportCsv(articles, base)
        else paths.markdown = await this.exportMarkdown(articles, base)
      } catch (err) {
        console.error(`exporter: failed to export ${format}:`, err)
      }
    }
    return paths
  }

  // ==================== Trending ====================

  async exportTrendingReport(result: TrendingResult, filename?: string): Promise<string> {
    const path = this.pathFor(filename ?? `trending_${this.timestamp()}`, 'md')

    const lines = [
      '# Trending Topics Report',
      `\n**Generated:** ${formatDateTime(this.now())}`,
      `**Time Window:** Last ${result.timeWindowHours} hours`,
      `**Articles Analyzed:** ${result.totalArticlesAnalyzed}`,
      '\n---\n',
    ]

    if (result.trendingKeywords.length > 0) {
      lines.push('## 🔥 Top Trending Keywords\n')
      for (const [keyword, count] of result.trendingKeywords) lines.push(`- **${titleCase(keyword)}**: ${count} mentions`)
      lines.push('\n---\n')
    }

    if (result.trendingPhrases.length > 0) {
      lines.push('## 🔥 Top Trending Phrases\n')
      for (const [phrase, count] of result.trendingPhrases) lines.push(`- **${titleCase(phrase)}**: ${count} mentions`)
      lines.push('\n---\n')
    }

    const categories = Object.entries(result.trendingByCategory)
    if (categories.length > 0) {
      lines.push('## 📊 Trending by Category\n')
      for (const [category, terms] of categories) {
        if (terms.length === 0) continue
        lines.push(`\n### ${titleCase(category)}\n`)
        for (const [keyword, count] of terms) lines.push(`- ${titleCase(keyword)}: ${count} mentions`)
      }
      lines.push('\n---\n')
    }

    await this.write(path, lines.join('\n'))
    console.log(`exporter: wrote trending report to ${path}`)
    return path
  }

  // ==================== Internals ====================

  private pathFor(filename: string, extension: string): string {
    return join(this.dir, `${filename}.${extension}`)
  }

  private async write(path: string, content: string): Promise<void> {
    await mkdir(this.dir, { recursive: true })
    await writeFile(path, content, 'utf-8')
  }

  /** YYYYMMDD_HHMMSS in local time, the default filename suffix */
  timestamp(): string {
    const d = this.now()
    return `${d.getFullYear()}${pad(d.getMonth() + 1)}${pad(d.getDate())}_${pad(d.getHours())}${pad(d.getMinutes())}${pad(d.getSeconds())}`
  }
}

// ==================== Helpers ====================

function articleSection(article: ExportArticle, index: number): string[] {
  const lines = [
    `### ${index}. ${article.title ?? 'No Title'}`,
    `**Source:** ${article.source || 'Unknown'}`,
    `**Date:** ${article.publishedDate ? article.publishedDate.toISOString() : ''}`,
    `**Link:** ${article.link || 'No link'}`,
  ]

  if (article.primaryCategory) lines.push(`**Category:** ${titleCase(article.primaryCategory)}`)
  if (article.impactLevel) {
    lines.push(`**Impact:** ${IMPACT_MARKERS[article.impactLevel]} ${titleCase(article.impactLevel)}`)
  }
  if (article.isSensitive) lines.push('**Status:** ⚠️ SENSITIVE')

  lines.push(`\n**Summary:**\n${article.summary ?? 'No summary'}`)
  if (article.insight) lines.push(`\n**Insight:**\n${article.insight}`)

  if (article.entities) {
    const { entities } = article
    const named = ENTITY_KINDS
      .filter((kind) => entities[kind].length > 0)
      .map((kind) => `${titleCase(kind)}: ${entities[kind].slice(0, 3).join(', ')}`)
    if (named.length > 0) lines.push(`\n**Entities:** ${named.join(', ')}`)
  }

  lines.push('\n---\n')
  return lines
}

function csvValue(value: unknown): string {
  if (value === undefined || value === null) return ''
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value
}

/** YYYY-MM-DD HH:MM:SS in local time */
function formatDateTime(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`
}

function titleCase(text: string): string {
  return text
    .split(' ')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ')
}

function pad(n: number): string {
  return String(n).padStart(2, '0')
}
