import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { appendFile, readFile, rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { randomUUID } from 'node:crypto'
import { NewsCollectorStore } from './store.js'
import { detectTrending } from '../trending/index.js'
import type { NewsArticle } from '../../core/types.js'

function makeArticle(overrides: Partial<NewsArticle> = {}): NewsArticle {
  return {
    title: 'Vaccine trial expands',
    link: 'https://example.com/a',
    summary: 'More sites join the trial.',
    publishedDate: new Date(Date.now() - 60_000),
    category: 'health',
    source: 'example.com',
    contentLength: 26,
    fetchedAt: new Date(),
    ...overrides,
  }
}

describe('NewsCollectorStore', () => {
  let dir: string
  let logPath: string
  let store: NewsCollectorStore

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    dir = join(tmpdir(), `news-store-test-${randomUUID()}`)
    logPath = join(dir, 'news.jsonl')
    store = new NewsCollectorStore({ logPath, maxInMemory: 100, retentionDays: 7 })
    await store.init()
  })

  afterEach(async () => {
    await store.close()
    await rm(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('starts empty', () => {
    expect(store.count).toBe(0)
    expect(store.dedupCount).toBe(0)
  })

  it('ingests a new article', async () => {
    expect(await store.ingest(makeArticle())).toBe(true)
    expect(store.count).toBe(1)
    expect(store.has('https://example.com/a')).toBe(true)
  })

  it('rejects a duplicate link', async () => {
    expect(await store.ingest(makeArticle())).toBe(true)
    expect(await store.ingest(makeArticle({ title: 'Different title' }))).toBe(false)
    expect(store.count).toBe(1)
  })

  it('rejects an article without a link', async () => {
    expect(await store.ingest(makeArticle({ link: '' }))).toBe(false)
    expect(store.count).toBe(0)
  })

  it('persists to JSONL and recovers on init', async () => {
    const published = new Date(Date.now() - 3600_000)
    await store.ingest(makeArticle({ link: 'https://example.com/1', publishedDate: published }))
    await store.ingest(makeArticle({ link: 'https://example.com/2', publishedDate: null }))
    await store.close()

    const recovered = new NewsCollectorStore({ logPath, maxInMemory: 100, retentionDays: 7 })
    await recovered.init()

    expect(recovered.count).toBe(2)
    expect(recovered.dedupCount).toBe(2)
    expect(await recovered.ingest(makeArticle({ link: 'https://example.com/1' }))).toBe(false)

    const [undated, dated] = recovered.getRecent()
    expect(undated.link).toBe('https://example.com/2')
    expect(undated.publishedDate).toBeNull()
    expect(dated.publishedDate).toEqual(published)
    expect(dated.title).toBe('Vaccine trial expands')
    await recovered.close()
  })

  it('skips malformed lines during recovery', async () => {
    await store.ingest(makeArticle({ link: 'https://example.com/ok' }))
    await appendFile(logPath, 'not json\n{"seq":"x"}\n', 'utf-8')
    await store.close()

    const recovered = new NewsCollectorStore({ logPath })
    await recovered.init()
    expect(recovered.count).toBe(1)
    expect(recovered.has('https://example.com/ok')).toBe(true)
    await recovered.close()
  })

  it('ingestBatch returns the number of new articles', async () => {
    const count = await store.ingestBatch([
      makeArticle({ link: 'https://example.com/x' }),
      makeArticle({ link: 'https://example.com/y' }),
      makeArticle({ link: 'https://example.com/x' }),
    ])
    expect(count).toBe(2)
    expect(store.count).toBe(2)
  })

  it('dedups the same link across concurrent batches', async () => {
    const article = makeArticle({ title: 'Vaccine vaccine vaccine', summary: '' })

    const counts = await Promise.all([store.ingestBatch([article]), store.ingestBatch([article])])

    expect(counts).toEqual([1, 0])
    expect(store.count).toBe(1)
    const lines = (await readFile(logPath, 'utf-8')).split('\n').filter((l) => l.length > 0)
    expect(lines).toHaveLength(1)
    const trending = detectTrending(store.getRecent({ hours: 24 }), { windowHours: 24, threshold: 1 })
    expect(trending.trendingKeywords).toEqual([['vaccine', 3]])
  })

  it('releases the link when the write fails', async () => {
    const broken = new NewsCollectorStore({ logPath: join(dir, 'missing', 'nested', 'news.jsonl') })
    await expect(broken.ingest(makeArticle())).rejects.toThrow()
    expect(broken.has('https://example.com/a')).toBe(false)
    expect(broken.count).toBe(0)
  })

  it('respects maxInMemory but keeps every link', async () => {
    const small = new NewsCollectorStore({ logPath: join(dir, 'small.jsonl'), maxInMemory: 3 })
    await small.init()
    for (let i = 0; i < 5; i++) {
      await small.ingest(makeArticle({ link: `https://example.com/${i}`, publishedDate: new Date(Date.now() - (5 - i) * 1000) }))
    }
    expect(small.count).toBe(3)
    expect(small.dedupCount).toBe(5)
    expect(small.getRecent().map((a) => a.link)).toEqual([
      'https://example.com/2',
      'https://example.com/3',
      'https://example.com/4',
    ])
    await small.close()
  })

  describe('getRecent', () => {
    const now = new Date('2026-03-01T12:00:00Z')

    beforeEach(async () => {
      for (let i = 0; i < 6; i++) {
        await store.ingest(makeArticle({
          title: `Story ${i}`,
          link: `https://example.com/story-${i}`,
          // one per hour, story 5 is the newest
          publishedDate: new Date(now.getTime() - (5 - i) * 3600_000),
          category: i % 2 === 0 ? 'health' : 'economy',
        }))
      }
    })

    it('returns articles oldest first', () => {
      expect(store.getRecent({ now }).map((a) => a.title)).toEqual([
        'Story 0', 'Story 1', 'Story 2', 'Story 3', 'Story 4', 'Story 5',
      ])
    })

    it('filters by hours', () => {
      expect(store.getRecent({ hours: 2, now }).map((a) => a.title)).toEqual(['Story 3', 'Story 4', 'Story 5'])
    })

    it('filters by category', () => {
      expect(store.getRecent({ category: 'economy', now }).map((a) => a.title)).toEqual(['Story 1', 'Story 3', 'Story 5'])
    })

    it('keeps the most recent N with a limit', () => {
      expect(store.getRecent({ limit: 2, now }).map((a) => a.title)).toEqual(['Story 4', 'Story 5'])
    })
  })
})
