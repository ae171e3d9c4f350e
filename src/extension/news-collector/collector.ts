/**
 * News Collector — feed fetch service
 *
 * fetchAll() walks the configured feeds once and returns this run's articles
 * (deduplicated by link) while persisting the new ones. start() repeats it on
 * an interval.
 */

import type { NewsArticle } from '../../core/types.js'
import { fetchAndParseFeed, type FetchFeedOpts } from './rss-parser.js'
import { removeDuplicates, toArticle } from './articles.js'
import type { NewsCollectorStore } from './store.js'
import type { FeedConfig } from './types.js'

export interface CollectorOpts {
  store: NewsCollectorStore
  feeds: FeedConfig[]
  intervalMs: number
  /** Pause between feeds */
  requestDelayMs?: number
  fetchOpts?: Omit<FetchFeedOpts, 'requestDelayMs'>
}

export interface CollectResult {
  /** Items parsed across all feeds, before dedup */
  total: number
  /** Articles not seen by the store before */
  new: number
  /** This run's articles, unique by link */
  articles: NewsArticle[]
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms))

export class NewsCollector {
  private timer: ReturnType<typeof setInterval> | null = null
  private store: NewsCollectorStore
  private feeds: FeedConfig[]
  private intervalMs: number
  private requestDelayMs: number
  private fetchOpts: FetchFeedOpts

  constructor(opts: CollectorOpts) {
    this.store = opts.store
    this.feeds = opts.feeds
    this.intervalMs = opts.intervalMs
    this.requestDelayMs = opts.requestDelayMs ?? 1000
    this.fetchOpts = { ...opts.fetchOpts, requestDelayMs: this.requestDelayMs }
  }

  /** Start periodic collection. Fetches immediately, then at interval. */
  start(): void {
    this.fetchAll().catch((err) =>
      console.warn(`news-collector: initial fetch failed: ${err instanceof Error ? err.message : err}`),
    )
    this.timer = setInterval(
      () => this.fetchAll().catch((err) =>
        console.warn(`news-collector: periodic fetch failed: ${err instanceof Error ? err.message : err}`),
      ),
      this.intervalMs,
    )
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
  }

  get running(): boolean {
    return this.timer !== null
  }

  /** Fetch all configured feeds once. A failing feed is skipped. */
  async fetchAll(): Promise<CollectResult> {
    const fetched: NewsArticle[] = []

    for (const [i, feed] of this.feeds.entries()) {
      if (i > 0 && this.requestDelayMs > 0) await sleep(this.requestDelayMs)
      try {
        fetched.push(...(await this.fetchFeed(feed)))
      } catch (err) {
        console.warn(
          `news-collector: failed to fetch ${feed.name} (${feed.url}): ${err instanceof Error ? err.message : err}`,
        )
      }
    }

    const articles = removeDuplicates(fetched)
    const ingested = await this.store.ingestBatch(articles)

    console.log(
      `news-collector: fetched ${fetched.length} items from ${this.feeds.length} feeds, ${articles.length} unique, ${ingested} new`,
    )

    return { total: fetched.length, new: ingested, articles }
  }

  private async fetchFeed(feed: FeedConfig): Promise<NewsArticle[]> {
    const items = await fetchAndParseFeed(feed.url, this.fetchOpts)
    const fetchedAt = new Date()
    return items.map((item) => toArticle(item, feed, fetchedAt))
  }
}
