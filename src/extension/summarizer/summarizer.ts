/**
 * Summarizer — extractive summaries and one-line insights
 */

import { DEFAULT_CATEGORY, type NewsArticle } from '../../core/types.js'
import { extractKeywords, rankTerms } from '../trending/index.js'

export const DEFAULT_SUMMARY_MAX_LENGTH = 500

type SummarizableArticle = Pick<NewsArticle, 'title' | 'summary'>
type InsightArticle = Pick<NewsArticle, 'primaryCategory' | 'impactLevel' | 'sentiment' | 'isSensitive' | 'entities'>

/**
 * The feed summary when it already fits; otherwise title + summary, cleaned
 * and cut at the last sentence that fits.
 */
export function generateSummary(article: SummarizableArticle, maxLength: number = DEFAULT_SUMMARY_MAX_LENGTH): string {
  if (article.summary && article.summary.length <= maxLength) return article.summary
  return truncateText(cleanText(`${article.title} ${article.summary}`), maxLength)
}

export function cleanText(text: string): string {
  return text.replace(/[^\w\s.,;:-]/g, '').replace(/\s+/g, ' ').trim()
}

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text

  let result = ''
  let total = 0
  for (const raw of text.split(/[.!?]/)) {
    const sentence = raw.trim()
    if (!sentence) continue
    if (total + sentence.length + 1 > maxLength) break
    result += sentence + '. '
    total += sentence.length + 1
  }

  if (!result) {
    // No whole sentence fits: cut at the last space
    const cut = text.slice(0, maxLength)
    const lastSpace = cut.lastIndexOf(' ')
    return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut) + '...'
  }

  return result.trim()
}

export function generateInsight(article: InsightArticle): string {
  const category = article.primaryCategory ?? DEFAULT_CATEGORY
  const impact = article.impactLevel ?? 'unknown'

  const parts = [
    article.isSensitive
      ? `⚠️ SENSITIVE: This ${category} news requires attention.`
      : `📊 ${impact.toUpperCase()} impact ${category} update.`,
  ]

  if (article.sentiment === 'positive') parts.push('Positive developments indicated.')
  else if (article.sentiment === 'negative') parts.push('Concerning trend noted.')
  else parts.push('Neutral information.')

  const countries = article.entities?.countries ?? []
  if (countries.length > 0) parts.push(`Affects ${countries.slice(0, 2).join(', ')}.`)

  return parts.join(' ')
}

/** Markdown overview of one category: totals, impact split and top keywords. */
export function generateCategorySummary(
  articles: ReadonlyArray<SummarizableArticle & Pick<NewsArticle, 'primaryCategory' | 'impactLevel'>>,
  category: string,
): string {
  const inCategory = articles.filter((a) => a.primaryCategory === category)
  if (inCategory.length === 0) return `No articles found for category: ${category}`

  const impact = { high: 0, medium: 0, low: 0 }
  const keywordCounts = new Map<string, number>()
  for (const article of inCategory) {
    if (article.impactLevel) impact[article.impactLevel]++
    for (const keyword of extractKeywords(`${article.title} ${article.summary}`)) {
      keywordCounts.set(keyword, (keywordCounts.get(keyword) ?? 0) + 1)
    }
  }

  const topKeywords = rankTerms(keywordCounts, 1, 5)

  const lines = [
    `## ${capitalize(category)} News Summary`,
    '',
    `**Total Articles:** ${inCategory.length}`,
    `**High Impact:** ${impact.high}`,
    `**Medium Impact:** ${impact.medium}`,
    `**Low Impact:** ${impact.low}`,
  ]

  if (topKeywords.length > 0) {
    lines.push('', '**Top Topics:**')
    for (const [keyword, count] of topKeywords) {
      lines.push(`  - ${capitalize(keyword)}: ${count} mentions`)
    }
  }

  return lines.join('\n') + '\n'
}

/** Returns copies with `summary` and `insight` filled in. */
export function summarizeArticles<T extends SummarizableArticle & InsightArticle>(
  articles: readonly T[],
  maxLength: number = DEFAULT_SUMMARY_MAX_LENGTH,
): Array<T & { summary: string; insight: string }> {
  return articles.map((article) => ({
    ...article,
    summary: generateSummary(article, maxLength),
    insight: generateInsight(article),
  }))
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1)
}
