/**
 * Analyzer — rule-based impact, sentiment and entity tagging
 */

import type { ArticleEntities, ImpactLevel, NewsArticle, Sentiment } from '../../core/types.js'
import { loadCountryList } from '../../core/lexicon.js'
import { rankTerms } from '../trending/index.js'

const IMPACT_KEYWORDS = {
  high: [
    'crisis', 'emergency', 'disaster', 'deadly', 'fatal', 'severe',
    'collapse', 'critical', 'urgent', 'warning', 'threat', 'attack',
  ],
  medium: [
    'significant', 'major', 'important', 'serious', 'concern',
    'issue', 'problem', 'challenge', 'risk', 'developing',
  ],
} as const

const POSITIVE_WORDS = [
  'improvement', 'growth', 'success', 'positive', 'benefit',
  'recovery', 'increase', 'boost', 'advantage', 'gain',
] as const

const NEGATIVE_WORDS = [
  'decline', 'loss', 'crisis', 'failure', 'negative',
  'decrease', 'fall', 'threat', 'risk', 'danger', 'concern',
] as const

const LOCATIONS = [
  'New York', 'Washington', 'London', 'Paris', 'Tokyo', 'Beijing', 'Moscow', 'Berlin', 'Rome',
  'United States', 'USA', 'US', 'UK', 'Russia', 'China', 'India', 'Brazil', 'Australia',
  'California', 'Texas', 'Florida',
] as const

const ORGANIZATIONS = [
  'WHO', 'CDC', 'FDA', 'United Nations', 'NATO', 'World Bank', 'IMF',
  'Federal Reserve', 'European Central Bank',
] as const

export interface AnalysisSummary {
  totalArticles: number
  impactDistribution: Record<string, number>
  sentimentDistribution: Record<string, number>
  /** Ten most frequent values per entity type */
  topEntities: Record<keyof ArticleEntities, Record<string, number>>
  highImpactCount: number
  negativeSentimentCount: number
}

export interface ArticleAnalysis {
  impactLevel: ImpactLevel
  sentiment: Sentiment
  entities: ArticleEntities
}

type AnalyzableArticle = Pick<NewsArticle, 'title' | 'summary'>

// ==================== Single-text rules ====================

/** Any high-impact word → high; two or more medium words → medium. */
export function assessImpact(text: string): ImpactLevel {
  const lower = text.toLowerCase()
  if (countSubstrings(lower, IMPACT_KEYWORDS.high) > 0) return 'high'
  if (countSubstrings(lower, IMPACT_KEYWORDS.medium) > 1) return 'medium'
  return 'low'
}

export function assessSentiment(text: string): Sentiment {
  const lower = text.toLowerCase()
  const pos = countSubstrings(lower, POSITIVE_WORDS)
  const neg = countSubstrings(lower, NEGATIVE_WORDS)
  if (neg > pos) return 'negative'
  if (pos > neg) return 'positive'
  return 'neutral'
}

export function extractEntities(text: string, countries: readonly string[] = loadCountryList()): ArticleEntities {
  return {
    locations: matchNames(text, LOCATIONS),
    organizations: matchNames(text, ORGANIZATIONS),
    countries: matchNames(text, countries).map(titleCase),
  }
}

// ==================== Articles ====================

export function analyzeText(text: string): ArticleAnalysis {
  return {
    impactLevel: assessImpact(text),
    sentiment: assessSentiment(text),
    entities: extractEntities(text),
  }
}

/** Returns a copy of the article with analysis fields set. */
export function analyzeArticle<T extends AnalyzableArticle>(article: T): T & ArticleAnalysis {
  return { ...article, ...analyzeText(`${article.title} ${article.summary}`) }
}

export function analyzeArticles<T extends AnalyzableArticle>(articles: readonly T[]): Array<T & ArticleAnalysis> {
  return articles.map((article) => analyzeArticle(article))
}

export function getAnalysisSummary(articles: readonly Partial<ArticleAnalysis>[]): AnalysisSummary {
  const impactDistribution: Record<string, number> = {}
  const sentimentDistribution: Record<string, number> = {}
  const entityCounts: Record<keyof ArticleEntities, Map<string, number>> = {
    locations: new Map(),
    organizations: new Map(),
    countries: new Map(),
  }

  for (const article of articles) {
    const impact = article.impactLevel ?? 'unknown'
    const sentiment = article.sentiment ?? 'unknown'
    impactDistribution[impact] = (impactDistribution[impact] ?? 0) + 1
    sentimentDistribution[sentiment] = (sentimentDistribution[sentiment] ?? 0) + 1

    if (!article.entities) continue
    for (const type of ENTITY_TYPES) {
      for (const name of article.entities[type]) {
        entityCounts[type].set(name, (entityCounts[type].get(name) ?? 0) + 1)
      }
    }
  }

  return {
    totalArticles: articles.length,
    impactDistribution,
    sentimentDistribution,
    topEntities: {
      locations: topCounts(entityCounts.locations, 10),
      organizations: topCounts(entityCounts.organizations, 10),
      countries: topCounts(entityCounts.countries, 10),
    },
    highImpactCount: impactDistribution.high ?? 0,
    negativeSentimentCount: sentimentDistribution.negative ?? 0,
  }
}

// ==================== Helpers ====================

const ENTITY_TYPES: ReadonlyArray<keyof ArticleEntities> = ['locations', 'organizations', 'countries']

function countSubstrings(lower: string, words: readonly string[]): number {
  return words.filter((w) => lower.includes(w)).length
}

/**
 * Names found as whole words, in list order, without repeats. Acronyms
 * ("US", "WHO") must match in upper case; other names match in any case.
 */
function matchNames(text: string, names: readonly string[]): string[] {
  const found: string[] = []
  for (const name of names) {
    const flags = name === name.toUpperCase() ? '' : 'i'
    const pattern = new RegExp(`\\b${name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')}\\b`, flags)
    if (pattern.test(text) && !found.includes(name)) found.push(name)
  }
  return found
}

function titleCase(value: string): string {
  return value.replace(/\b[a-z]/g, (c) => c.toUpperCase())
}

function topCounts(counts: Map<string, number>, limit: number): Record<string, number> {
  return Object.fromEntries(rankTerms(counts, 1, limit))
}
