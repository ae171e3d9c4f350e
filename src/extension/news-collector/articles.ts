/**
 * News Collector — Feed item → article conversion and list helpers
 */

import type { NewsArticle } from '../../core/types.js'
import type { ParsedFeedItem } from './rss-parser.js'
import type { FeedConfig } from './types.js'

/** Remove URLs and collapse whitespace. */
export function sanitizeText(text: string | null | undefined): string {
  if (!text) return ''
  return text.replace(/https?:\/\/\S+/g, '').replace(/\s+/g, ' ').trim()
}

/** Host name without a leading "www.", or "unknown" for an unparseable URL. */
export function extractDomain(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '')
  } catch {
    return 'unknown'
  }
}

export function toArticle(item: ParsedFeedItem, feed: FeedConfig, fetchedAt: Date = new Date()): NewsArticle {
  const link = item.link ?? item.guid ?? ''
  const summary = sanitizeText(item.content)
  return {
    title: item.title,
    link,
    summary,
    publishedDate: item.pubDate,
    category: feed.category,
    source: feed.source || extractDomain(link),
    contentLength: summary.length,
    fetchedAt,
  }
}

/** Keep the first article for every link. Articles without a link are kept. */
export function removeDuplicates(articles: readonly NewsArticle[]): NewsArticle[] {
  const seen = new Set<string>()
  const unique: NewsArticle[] = []
  for (const article of articles) {
    if (article.link) {
      if (seen.has(article.link)) continue
      seen.add(article.link)
    }
    unique.push(article)
  }
  return unique
}

/** Articles published within the last `hours` up to `now`. Undated articles are dropped. */
export function filterByDate(articles: readonly NewsArticle[], hours: number, now: Date = new Date()): NewsArticle[] {
  const nowMs = now.getTime()
  const cutoff = nowMs - hours * 60 * 60 * 1000
  return articles.filter((a) => {
    if (a.publishedDate === null) return false
    const ms = a.publishedDate.getTime()
    return ms >= cutoff && ms <= nowMs
  })
}
