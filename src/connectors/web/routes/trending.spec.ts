import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { randomUUID } from 'node:crypto'
import { NewsCollectorStore } from '../../../extension/news-collector/index.js'
import type { NewsArticle } from '../../../core/types.js'

const mockReadTrendingConfig = vi.fn()

vi.mock('../../../core/config.js', () => ({
  readTrendingConfig: mockReadTrendingConfig,
}))

const { createTrendingRoutes } = await import('./trending.js')

function makeArticle(title: string, summary: string): NewsArticle {
  return {
    title,
    link: `https://example.com/${randomUUID()}`,
    summary,
    publishedDate: new Date(Date.now() - 3600_000),
    category: 'health',
    source: 'example.com',
    contentLength: summary.length,
    fetchedAt: new Date(),
  }
}

describe('trending routes', () => {
  let dir: string
  let store: NewsCollectorStore

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    mockReadTrendingConfig.mockResolvedValue({ thresholdMentions: 3, windowHours: 24 })
    dir = join(tmpdir(), `trending-routes-test-${randomUUID()}`)
    store = new NewsCollectorStore({ logPath: join(dir, 'news.jsonl') })
    await store.init()
    await store.ingestBatch([
      makeArticle('Vaccine rollout', 'Vaccine clinics busy'),
      makeArticle('Vaccine supply', 'More vaccine doses'),
    ])
  })

  afterEach(async () => {
    await store.close()
    await rm(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('detects trending keywords over stored articles', async () => {
    const res = await createTrendingRoutes({ store }).request('http://localhost/')
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({
      trendingKeywords: [['vaccine', 4]],
      trendingPhrases: [],
      trendingByCategory: { health: [['vaccine', 4]] },
      timeWindowHours: 24,
      totalArticlesAnalyzed: 2,
      threshold: 3,
    })
  })

  it('takes threshold from the query', async () => {
    const res = await createTrendingRoutes({ store }).request('http://localhost/?threshold=5')
    expect(await res.json()).toMatchObject({ trendingKeywords: [], threshold: 5 })
  })

  it('rejects a non-positive window', async () => {
    const res = await createTrendingRoutes({ store }).request('http://localhost/?hours=-1')
    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: 'Validation failed' })
  })

  it('scores an article against current trending keywords', async () => {
    const res = await createTrendingRoutes({ store }).request('http://localhost/score', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ title: 'Vaccine news', summary: 'vaccine vaccine' }),
    })
    expect(res.status).toBe(200)
    expect(await res.json()).toEqual({ score: 0.6, trendingKeywords: [['vaccine', 4]] })
  })

  it('rejects a malformed score body', async () => {
    const res = await createTrendingRoutes({ store }).request('http://localhost/score', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ title: 5 }),
    })
    expect(res.status).toBe(400)
  })
})
