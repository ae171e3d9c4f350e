/**
 * Trending — Windowed frequency analysis
 *
 * Pure functions over in-memory article lists. Nothing here logs or touches
 * shared state; callers log the returned result (see formatTrendingLog).
 */

import { DEFAULT_CATEGORY } from '../../core/types.js'
import { extractKeywords, phrasesFromKeywords } from './keywords.js'
import type { DetectTrendingOptions, RankedTerm, TrendingInput, TrendingResult } from './types.js'

export const TOP_KEYWORDS = 10
export const TOP_PHRASES = 5
export const TOP_PER_CATEGORY = 5
/** Keyword matches needed for a trending score of 1.0 */
export const SCORE_SATURATION = 5

const HOUR_MS = 60 * 60 * 1000

// ==================== Detection ====================

export function detectTrending(
  articles: readonly TrendingInput[],
  options: DetectTrendingOptions,
): TrendingResult {
  const { windowHours, threshold } = options
  const nowMs = (options.now ?? new Date()).getTime()

  // A non-positive window holds nothing
  const recent = windowHours > 0
    ? articles.filter((a) => isWithinWindow(a.publishedDate, nowMs - windowHours * HOUR_MS, nowMs))
    : []

  if (recent.length === 0) {
    return {
      trendingKeywords: [],
      trendingPhrases: [],
      trendingByCategory: {},
      timeWindowHours: windowHours,
      totalArticlesAnalyzed: 0,
      threshold,
    }
  }

  const keywordCounts = new Map<string, number>()
  const phraseCounts = new Map<string, number>()
  const categoryCounts = new Map<string, Map<string, number>>()

  for (const article of recent) {
    const keywords = extractKeywords(articleText(article))
    const category = article.primaryCategory || DEFAULT_CATEGORY

    let perCategory = categoryCounts.get(category)
    if (!perCategory) {
      perCategory = new Map()
      categoryCounts.set(category, perCategory)
    }

    countInto(keywordCounts, keywords)
    countInto(perCategory, keywords)
    countInto(phraseCounts, phrasesFromKeywords(keywords))
  }

  const trendingByCategory: Record<string, RankedTerm[]> = {}
  for (const [category, counts] of categoryCounts) {
    trendingByCategory[category] = rankTerms(counts, threshold, TOP_PER_CATEGORY)
  }

  return {
    trendingKeywords: rankTerms(keywordCounts, threshold, TOP_KEYWORDS),
    trendingPhrases: rankTerms(phraseCounts, threshold, TOP_PHRASES),
    trendingByCategory,
    timeWindowHours: windowHours,
    totalArticlesAnalyzed: recent.length,
    threshold,
  }
}

// ==================== Scoring ====================

/**
 * Rate how strongly an article matches a trending result: each occurrence of
 * a trending keyword counts, saturating at SCORE_SATURATION matches.
 */
export function scoreArticle(
  article: TrendingInput,
  trending: Pick<TrendingResult, 'trendingKeywords'>,
): number {
  const trendingTerms = new Set(trending.trendingKeywords.map(([term]) => term))
  if (trendingTerms.size === 0) return 0

  let matches = 0
  for (const keyword of extractKeywords(articleText(article))) {
    if (trendingTerms.has(keyword)) matches++
  }

  if (matches === 0) return 0
  return Math.round(Math.min(matches / SCORE_SATURATION, 1) * 100) / 100
}

// ==================== Ranking ====================

/**
 * Keep terms with count >= threshold, order by count descending then by term
 * (code-point order), and take the first `limit`.
 */
export function rankTerms(counts: ReadonlyMap<string, number>, threshold: number, limit: number): RankedTerm[] {
  const ranked: RankedTerm[] = []
  for (const [term, count] of counts) {
    if (count >= threshold) ranked.push([term, count])
  }
  ranked.sort((a, b) => b[1] - a[1] || compareTerms(a[0], b[0]))
  return ranked.slice(0, limit)
}

// ==================== Logging helper ====================

/** Human-readable summary lines for a result. The caller decides where they go. */
export function formatTrendingLog(result: TrendingResult): string[] {
  const lines = [
    `trending: last ${result.timeWindowHours}h, ${result.totalArticlesAnalyzed} articles, threshold ${result.threshold}`,
  ]

  for (const [keyword, count] of result.trendingKeywords.slice(0, 5)) {
    lines.push(`trending:   ${keyword}: ${count} mentions`)
  }

  for (const [category, items] of Object.entries(result.trendingByCategory)) {
    if (items.length > 0) lines.push(`trending:   [${category}] ${items.length} topics`)
  }

  return lines
}

// ==================== Helpers ====================

function articleText(article: TrendingInput): string {
  return `${article.title ?? ''} ${article.summary ?? ''}`
}

/** Window is [cutoff, now]; articles dated after now are outside it. */
function isWithinWindow(date: Date | null | undefined, cutoffMs: number, nowMs: number): boolean {
  if (!(date instanceof Date)) return false
  const ms = date.getTime()
  return !Number.isNaN(ms) && ms >= cutoffMs && ms <= nowMs
}

function countInto(counts: Map<string, number>, terms: readonly string[]): void {
  for (const term of terms) {
    counts.set(term, (counts.get(term) ?? 0) + 1)
  }
}

function compareTerms(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
