/**
 * News Collector — Zod configuration schema
 *
 * Loaded from data/config/news-collector.json (optional; defaults used if absent).
 */

import { z } from 'zod'

const feedSchema = z.object({
  name: z.string(),
  url: z.string().url(),
  source: z.string().default(''),
  category: z.string().default('general'),
})

export const newsCollectorSchema = z.object({
  /** Periodic collection switch (the pipeline can still fetch on demand) */
  enabled: z.boolean().default(true),
  /** Fetch interval in minutes */
  intervalMinutes: z.number().int().positive().default(30),
  /** Max articles kept in the in-memory buffer */
  maxInMemory: z.number().int().positive().default(2000),
  /** Articles older than this are not loaded into memory on startup */
  retentionDays: z.number().int().positive().default(7),
  /** Pause between feeds, and base of the retry backoff */
  requestDelayMs: z.number().int().nonnegative().default(1000),
  /** Total attempts per feed */
  maxRetries: z.number().int().positive().default(3),
  /** Per-request timeout */
  timeoutMs: z.number().int().positive().default(30_000),
  feeds: z.array(feedSchema).default([
    { name: 'WHO News', url: 'https://www.who.int/rss-feeds/news-english.xml', source: 'who.int', category: 'health' },
    { name: 'CDC', url: 'https://www.cdc.gov/api/v2/resources/rss/742226', source: 'cdc.gov', category: 'health' },
    { name: 'War News Updates', url: 'https://feeds.feedburner.com/WarNewsUpdates', source: '', category: 'military' },
    { name: 'Defense News', url: 'http://feeds.feedburner.com/DefenseNews', source: '', category: 'military' },
    { name: 'Yahoo Finance', url: 'https://feeds.finance.yahoo.com/rss/2.0/headline', source: 'yahoo', category: 'economy' },
    { name: 'BBC News', url: 'http://feeds.bbci.co.uk/news/rss.xml', source: 'bbc', category: 'general' },
    { name: 'NPR', url: 'https://feeds.npr.org/1001/rss.xml', source: 'npr', category: 'general' },
  ]),
})

export type NewsCollectorConfig = z.infer<typeof newsCollectorSchema>
