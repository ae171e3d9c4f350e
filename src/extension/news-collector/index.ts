/**
 * News Collector — Public exports
 */

export { NewsCollectorStore } from './store.js'
export type { NewsCollectorStoreOpts } from './store.js'
export { NewsCollector } from './collector.js'
export type { CollectorOpts, CollectResult } from './collector.js'
export { fetchAndParseFeed, parseFeedXml } from './rss-parser.js'
export type { ParsedFeedItem, FetchFeedOpts } from './rss-parser.js'
export { toArticle, removeDuplicates, filterByDate, sanitizeText, extractDomain } from './articles.js'
export { newsCollectorSchema } from './config.js'
export type { NewsCollectorConfig } from './config.js'
export type { StoredArticleRecord, FeedConfig, RecentArticlesQuery } from './types.js'
