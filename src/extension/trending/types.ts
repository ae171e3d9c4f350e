/**
 * Trending — Type definitions
 */

/** The only article fields trending detection reads */
export interface TrendingInput {
  title?: string
  summary?: string
  /** Articles without a valid date never enter the window */
  publishedDate?: Date | null
  /** Falls back to "general" */
  primaryCategory?: string
}

/** Ordered (term, count) pair. Serialises as a two-element JSON array. */
export type RankedTerm = [term: string, count: number]

/** Snapshot produced by one detectTrending() call */
export interface TrendingResult {
  /** Top 10 keywords, count descending */
  readonly trendingKeywords: RankedTerm[]
  /** Top 5 two- and three-word phrases */
  readonly trendingPhrases: RankedTerm[]
  /** Top 5 keywords for every category seen in the window */
  readonly trendingByCategory: Record<string, RankedTerm[]>
  readonly timeWindowHours: number
  readonly totalArticlesAnalyzed: number
  readonly threshold: number
}

export interface DetectTrendingOptions {
  windowHours: number
  /** Minimum occurrences for a term to be ranked */
  threshold: number
  /** Window end. Defaults to the current time. */
  now?: Date
}
