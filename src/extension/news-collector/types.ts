/**
 * News Collector — Type definitions
 */

/** On-disk JSONL record for a single article */
export interface StoredArticleRecord {
  /** Monotonic sequence number (for ordering / recovery) */
  seq: number
  /** Ingestion timestamp (epoch ms) */
  ts: number
  /** Publication timestamp (epoch ms), null when the feed had no usable date */
  pubTs: number | null
  /** Dedup key: the article link */
  link: string
  title: string
  summary: string
  category: string
  source: string
  /** Fetch timestamp (epoch ms) */
  fetchedTs: number
}

/** Feed configuration entry */
export interface FeedConfig {
  /** Human-readable name, e.g. "BBC News" */
  name: string
  /** RSS / Atom feed URL */
  url: string
  /** Source label; empty means "derive from the article link" */
  source: string
  /** Category hint attached to every article from this feed */
  category: string
}

/** Query for stored articles */
export interface RecentArticlesQuery {
  /** Look back this many hours from `now` */
  hours?: number
  now?: Date
  /** Match against the feed category hint */
  category?: string
  /** Most recent N after filtering */
  limit?: number
}
