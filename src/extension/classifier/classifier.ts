/**
 * Classifier — keyword-count topic categorisation
 *
 * Each category scores one point per word of the article that appears in its
 * keyword list. The highest non-zero score wins; otherwise "general".
 */

import { DEFAULT_CATEGORY, type NewsArticle } from '../../core/types.js'
import { loadCategoryLexicon, type CategoryLexicon } from '../../core/lexicon.js'

export interface Classification {
  primaryCategory: string
  secondaryCategories: string[]
  categoryScores: Record<string, number>
  sensitiveTopics: string[]
  isSensitive: boolean
}

export interface CategoryStats {
  total: number
  byCategory: Record<string, number>
  sensitiveCount: number
  multiCategoryCount: number
}

type ClassifiableArticle = Pick<NewsArticle, 'title' | 'summary'>

export function classifyText(text: string, lexicon: CategoryLexicon = loadCategoryLexicon()): Classification {
  const lower = text.toLowerCase()
  const words = lower.match(/\b\w+\b/g) ?? []

  const categoryScores: Record<string, number> = {}
  for (const [category, { keywords }] of Object.entries(lexicon)) {
    const keywordSet = new Set(keywords.map((k) => k.toLowerCase()))
    categoryScores[category] = words.filter((w) => keywordSet.has(w)).length
  }

  // Stable sort: equal scores keep lexicon order
  const ranked = Object.entries(categoryScores)
    .filter(([, score]) => score > 0)
    .sort((a, b) => b[1] - a[1])

  const primaryCategory = ranked.length > 0 ? ranked[0][0] : DEFAULT_CATEGORY
  const secondaryCategories = ranked.slice(1).map(([category]) => category)

  const sensitiveTopics = (lexicon[primaryCategory]?.sensitive ?? [])
    .filter((topic) => lower.includes(topic.toLowerCase()))

  return {
    primaryCategory,
    secondaryCategories,
    categoryScores,
    sensitiveTopics,
    isSensitive: sensitiveTopics.length > 0,
  }
}

/** Returns a copy of the article with classification fields set. */
export function classifyArticle<T extends ClassifiableArticle>(article: T, lexicon?: CategoryLexicon): T & Classification {
  return { ...article, ...classifyText(`${article.title} ${article.summary}`, lexicon) }
}

export function classifyArticles<T extends ClassifiableArticle>(articles: readonly T[], lexicon?: CategoryLexicon): Array<T & Classification> {
  return articles.map((article) => classifyArticle(article, lexicon))
}

export function getCategoryStats(articles: readonly Partial<Classification>[]): CategoryStats {
  const byCategory: Record<string, number> = {}
  let sensitiveCount = 0
  let multiCategoryCount = 0

  for (const article of articles) {
    const category = article.primaryCategory ?? DEFAULT_CATEGORY
    byCategory[category] = (byCategory[category] ?? 0) + 1
    if (article.isSensitive) sensitiveCount++
    if ((article.secondaryCategories?.length ?? 0) > 0) multiCategoryCount++
  }

  return { total: articles.length, byCategory, sensitiveCount, multiCategoryCount }
}

/** "health: 4, general: 2" style distribution, most common first. */
export function formatCategoryDistribution(stats: CategoryStats): string {
  return Object.entries(stats.byCategory)
    .sort((a, b) => b[1] - a[1])
    .map(([category, count]) => `${category}: ${count}`)
    .join(', ')
}
