import type { Config } from './config.js'
import type { NewsCollector, NewsCollectorStore } from '../extension/news-collector/index.js'
import type { Pipeline } from './pipeline.js'

export type { Config }

export interface Plugin {
  name: string
  start(ctx: EngineContext): Promise<void>
  stop(): Promise<void>
}

export interface EngineContext {
  config: Config
  store: NewsCollectorStore
  collector: NewsCollector
  pipeline: Pipeline
}

// ==================== Article ====================

export type ImpactLevel = 'high' | 'medium' | 'low'
export type Sentiment = 'positive' | 'negative' | 'neutral'

export interface ArticleEntities {
  locations: string[]
  organizations: string[]
  countries: string[]
}

/**
 * A single news article as it moves through the pipeline.
 *
 * The collector fills the base fields; each later stage returns a copy with
 * its own optional fields set.
 */
export interface NewsArticle {
  title: string
  link: string
  /** Plain-text summary (HTML stripped) */
  summary: string
  /** Null when the feed gave no usable date */
  publishedDate: Date | null
  /** Category hint from the feed configuration */
  category: string
  source: string
  contentLength: number
  fetchedAt: Date

  // ---- classifier ----
  primaryCategory?: string
  secondaryCategories?: string[]
  categoryScores?: Record<string, number>
  sensitiveTopics?: string[]
  isSensitive?: boolean

  // ---- analyzer ----
  impactLevel?: ImpactLevel
  sentiment?: Sentiment
  entities?: ArticleEntities

  // ---- summarizer / trending ----
  insight?: string
  trendingScore?: number
}

export const DEFAULT_CATEGORY = 'general'
