/**
 * Pipeline — one end-to-end intelligence run
 *
 * fetch → date filter → classify → (category filter) → trending → analyse →
 * summarise → score → export. Each stage returns new article objects.
 */

import type { Config, TrendingConfig } from './config.js'
import type { NewsArticle } from './types.js'
import { filterByDate, type NewsCollector } from '../extension/news-collector/index.js'
import { classifyArticles, getCategoryStats, formatCategoryDistribution } from '../extension/classifier/index.js'
import { detectTrending, scoreArticle, formatTrendingLog, type TrendingResult } from '../extension/trending/index.js'
import { analyzeArticles, getAnalysisSummary, type AnalysisSummary } from '../extension/analyzer/index.js'
import { summarizeArticles } from '../extension/summarizer/index.js'
import type { NewsExporter, ExportPaths } from '../extension/exporter/index.js'

// ==================== Types ====================

export type PipelineStatus = 'success' | 'empty' | 'error'

export interface PipelineResult {
  status: PipelineStatus
  startedAt: Date
  completedAt: Date
  articles: NewsArticle[]
  trending: TrendingResult | null
  analysis: AnalysisSummary | null
  exports: {
    articles?: ExportPaths
    trending?: string
  }
  error?: string
}

export interface RunPipelineOpts {
  /** Look-back window. Defaults to trending.windowHours */
  hours?: number
  /** Write export files (default true) */
  exportResults?: boolean
  /** Keep only articles whose primary category matches */
  category?: string
}

export interface Pipeline {
  runFullPipeline(opts?: RunPipelineOpts): Promise<PipelineResult>
  /** Fetch, classify and detect, without analysis or export */
  getTrending(hours?: number): Promise<TrendingResult>
}

export interface PipelineDeps {
  collector: Pick<NewsCollector, 'fetchAll'>
  exporter: Pick<NewsExporter, 'exportAllFormats' | 'exportTrendingReport' | 'timestamp'>
  config: Pick<Config, 'trending' | 'summary' | 'export'>
  /** Fresh trending config per run. Defaults to `config.trending` */
  readTrendingConfig?: () => Promise<TrendingConfig>
  now?: () => Date
}

// ==================== Factory ====================

export function createPipeline(deps: PipelineDeps): Pipeline {
  const { collector, exporter, config } = deps
  const now = deps.now ?? (() => new Date())
  const readTrendingConfig = deps.readTrendingConfig ?? (async () => config.trending)

  async function fetchRecent(hours: number): Promise<NewsArticle[]> {
    const { articles } = await collector.fetchAll()
    return filterByDate(articles, hours, now())
  }

  function trendingOver(articles: readonly NewsArticle[], hours: number, threshold: number): TrendingResult {
    return detectTrending(articles, {
      windowHours: hours,
      threshold,
      now: now(),
    })
  }

  async function runFullPipeline(opts: RunPipelineOpts = {}): Promise<PipelineResult> {
    const exportResults = opts.exportResults ?? true

    const result: PipelineResult = {
      status: 'success',
      startedAt: now(),
      completedAt: now(),
      articles: [],
      trending: null,
      analysis: null,
      exports: {},
    }

    try {
      const trendingConfig = await readTrendingConfig()
      const hours = opts.hours ?? trendingConfig.windowHours

      console.log('pipeline: [1/6] fetching feeds')
      const recent = await fetchRecent(hours)
      console.log(`pipeline: ${recent.length} articles in the last ${hours}h`)
      if (recent.length === 0) {
        console.warn('pipeline: no recent articles, stopping')
        return { ...result, status: 'empty', completedAt: now() }
      }

      console.log('pipeline: [2/6] classifying')
      let classified = classifyArticles(recent)
      if (opts.category) {
        classified = classified.filter((a) => a.primaryCategory === opts.category)
        console.log(`pipeline: ${classified.length} articles in category ${opts.category}`)
        if (classified.length === 0) {
          return { ...result, status: 'empty', completedAt: now() }
        }
      }
      console.log(`pipeline: categories ${formatCategoryDistribution(getCategoryStats(classified))}`)

      console.log('pipeline: [3/6] detecting trending topics')
      const trending = trendingOver(classified, hours, trendingConfig.thresholdMentions)
      for (const line of formatTrendingLog(trending)) console.log(line)

      console.log('pipeline: [4/6] analysing')
      const analysed = analyzeArticles(classified)

      console.log('pipeline: [5/6] summarising')
      const articles = summarizeArticles(analysed, config.summary.maxLength)
        .map((article) => ({ ...article, trendingScore: scoreArticle(article, trending) }))
      const analysis = getAnalysisSummary(articles)

      const exports: PipelineResult['exports'] = {}
      if (exportResults) {
        console.log('pipeline: [6/6] exporting')
        const stamp = exporter.timestamp()
        exports.articles = await exporter.exportAllFormats(articles, config.export.formats, `news_${stamp}`)
        exports.trending = await exporter.exportTrendingReport(trending, `trending_${stamp}`)
      }

      console.log(
        `pipeline: done, ${articles.length} articles, ${analysis.highImpactCount} high impact, ${analysis.negativeSentimentCount} negative`,
      )
      return { ...result, articles, trending, analysis, exports, completedAt: now() }
    } catch (err) {
      console.error('pipeline: run failed:', err)
      return {
        ...result,
        status: 'error',
        error: err instanceof Error ? err.message : String(err),
        completedAt: now(),
      }
    }
  }

  async function getTrending(hours?: number): Promise<TrendingResult> {
    const trendingConfig = await readTrendingConfig()
    const windowHours = hours ?? trendingConfig.windowHours
    const recent = await fetchRecent(windowHours)
    return trendingOver(classifyArticles(recent), windowHours, trendingConfig.thresholdMentions)
  }

  return { runFullPipeline, getTrending }
}
