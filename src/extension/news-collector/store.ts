/**
 * News Collector — Persistent JSONL store with in-memory index
 *
 * - Append-only JSONL on disk
 * - In-memory buffer (retention window, size cap) for queries
 * - Recover from file on startup
 * - Link dedup set survives restarts
 */

import { appendFile, readFile, mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { z } from 'zod'
import type { NewsArticle } from '../../core/types.js'
import type { RecentArticlesQuery, StoredArticleRecord } from './types.js'

const DEFAULT_LOG_PATH = 'data/news-collector/news.jsonl'
const DEFAULT_MAX_IN_MEMORY = 2000
const DEFAULT_RETENTION_DAYS = 7
const DAY_MS = 24 * 60 * 60 * 1000

const recordSchema = z.object({
  seq: z.number().int(),
  ts: z.number(),
  pubTs: z.number().nullable(),
  link: z.string().min(1),
  title: z.string(),
  summary: z.string(),
  category: z.string(),
  source: z.string(),
  fetchedTs: z.number(),
})

export interface NewsCollectorStoreOpts {
  logPath?: string
  maxInMemory?: number
  retentionDays?: number
}

export class NewsCollectorStore {
  private logPath: string
  private maxInMemory: number
  private retentionDays: number

  /** In-memory buffer, ascending by publication time (undated first) */
  private buffer: StoredArticleRecord[] = []
  /** All known links (survives beyond retention window) */
  private links: Set<string> = new Set()
  private seq: number = 0

  constructor(opts?: NewsCollectorStoreOpts) {
    this.logPath = opts?.logPath ?? DEFAULT_LOG_PATH
    this.maxInMemory = opts?.maxInMemory ?? DEFAULT_MAX_IN_MEMORY
    this.retentionDays = opts?.retentionDays ?? DEFAULT_RETENTION_DAYS
  }

  /**
   * Read JSONL from disk, rebuild the link set and buffer.
   * Must be called before any other method.
   */
  async init(): Promise<void> {
    await mkdir(dirname(this.logPath), { recursive: true })

    let raw: string
    try {
      raw = await readFile(this.logPath, 'utf-8')
    } catch (err: unknown) {
      if (isENOENT(err)) return
      throw err
    }

    if (!raw.trim()) return

    const retentionCutoff = Date.now() - this.retentionDays * DAY_MS
    let skipped = 0

    for (const line of raw.split('\n')) {
      if (!line.trim()) continue
      const record = parseRecord(line)
      if (!record) {
        skipped++
        continue
      }

      this.links.add(record.link)
      if (record.seq > this.seq) this.seq = record.seq
      if ((record.pubTs ?? record.fetchedTs) >= retentionCutoff) {
        this.buffer.push(record)
      }
    }

    this.buffer.sort(byPubTs)
    if (this.buffer.length > this.maxInMemory) {
      this.buffer = this.buffer.slice(-this.maxInMemory)
    }

    console.log(
      `news-collector-store: recovered ${this.links.size} links, ${this.buffer.length} articles in memory` +
        (skipped > 0 ? `, skipped ${skipped} malformed lines` : ''),
    )
  }

  /** Persist one article. Returns false when its link is already known. */
  async ingest(article: NewsArticle): Promise<boolean> {
    if (!article.link || this.links.has(article.link)) return false

    this.seq += 1
    const record: StoredArticleRecord = {
      seq: this.seq,
      ts: Date.now(),
      pubTs: article.publishedDate ? article.publishedDate.getTime() : null,
      link: article.link,
      title: article.title,
      summary: article.summary,
      category: article.category,
      source: article.source,
      fetchedTs: article.fetchedAt.getTime(),
    }

    // Reserve the link before awaiting so a concurrent ingest sees it
    this.links.add(record.link)
    try {
      await appendFile(this.logPath, JSON.stringify(record) + '\n', 'utf-8')
    } catch (err) {
      this.links.delete(record.link)
      throw err
    }

    insertSorted(this.buffer, record)
    if (this.buffer.length > this.maxInMemory) {
      this.buffer = this.buffer.slice(-this.maxInMemory)
    }

    return true
  }

  /** Returns the number of new articles. */
  async ingestBatch(articles: readonly NewsArticle[]): Promise<number> {
    let count = 0
    for (const article of articles) {
      if (await this.ingest(article)) count++
    }
    return count
  }

  has(link: string): boolean {
    return this.links.has(link)
  }

  /** Articles in memory */
  get count(): number {
    return this.buffer.length
  }

  /** Links tracked, including articles beyond retention */
  get dedupCount(): number {
    return this.links.size
  }

  /** Stored articles, oldest first. */
  getRecent(query: RecentArticlesQuery = {}): NewsArticle[] {
    const nowMs = (query.now ?? new Date()).getTime()
    const cutoff = query.hours !== undefined ? nowMs - query.hours * 60 * 60 * 1000 : null

    let filtered = this.buffer.filter((r) => {
      if (query.category && r.category !== query.category) return false
      if (cutoff !== null && (r.pubTs === null || r.pubTs < cutoff || r.pubTs > nowMs)) return false
      return true
    })

    if (query.limit && filtered.length > query.limit) {
      filtered = filtered.slice(-query.limit)
    }

    return filtered.map(recordToArticle)
  }

  async close(): Promise<void> {
    this.buffer = []
    this.links.clear()
  }
}

// ==================== Helpers ====================

function parseRecord(line: string): StoredArticleRecord | null {
  try {
    const parsed = recordSchema.safeParse(JSON.parse(line))
    return parsed.success ? parsed.data : null
  } catch {
    return null
  }
}

function recordToArticle(record: StoredArticleRecord): NewsArticle {
  return {
    title: record.title,
    link: record.link,
    summary: record.summary,
    publishedDate: record.pubTs === null ? null : new Date(record.pubTs),
    category: record.category,
    source: record.source,
    contentLength: record.summary.length,
    fetchedAt: new Date(record.fetchedTs),
  }
}

function byPubTs(a: StoredArticleRecord, b: StoredArticleRecord): number {
  return (a.pubTs ?? -Infinity) - (b.pubTs ?? -Infinity) || a.seq - b.seq
}

function insertSorted(buffer: StoredArticleRecord[], record: StoredArticleRecord): void {
  let i = buffer.length
  while (i > 0 && byPubTs(buffer[i - 1], record) > 0) i--
  buffer.splice(i, 0, record)
}

function isENOENT(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}
