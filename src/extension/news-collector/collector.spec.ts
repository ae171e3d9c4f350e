import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { rm } from 'node:fs/promises'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { randomUUID } from 'node:crypto'
import { NewsCollector } from './collector.js'
import { NewsCollectorStore } from './store.js'
import type { FeedConfig } from './types.js'

function rss(...items: Array<{ title: string; link: string }>): string {
  const body = items
    .map((i) => `<item><title>${i.title}</title><link>${i.link}</link><pubDate>Sun, 01 Mar 2026 10:00:00 GMT</pubDate></item>`)
    .join('')
  return `<rss><channel>${body}</channel></rss>`
}

const FEEDS: FeedConfig[] = [
  { name: 'Health', url: 'https://health.example.com/rss', source: 'health-wire', category: 'health' },
  { name: 'Economy', url: 'https://economy.example.com/rss', source: '', category: 'economy' },
  { name: 'Broken', url: 'https://broken.example.com/rss', source: '', category: 'general' },
]

const RESPONSES: Record<string, string> = {
  'https://health.example.com/rss': rss(
    { title: 'Clinic opens', link: 'https://news.example.com/clinic' },
    { title: 'Shared story', link: 'https://news.example.com/shared' },
  ),
  'https://economy.example.com/rss': rss(
    { title: 'Shared story (copy)', link: 'https://news.example.com/shared' },
    { title: 'Rates hold', link: 'https://www.bank.example.com/rates' },
  ),
}

describe('NewsCollector', () => {
  let dir: string
  let store: NewsCollectorStore

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.stubGlobal('fetch', vi.fn(async (url: string) => {
      const body = RESPONSES[url]
      return body ? new Response(body, { status: 200 }) : new Response('down', { status: 500, statusText: 'Server Error' })
    }))

    dir = join(tmpdir(), `collector-test-${randomUUID()}`)
    store = new NewsCollectorStore({ logPath: join(dir, 'news.jsonl') })
    await store.init()
  })

  afterEach(async () => {
    await store.close()
    await rm(dir, { recursive: true, force: true })
    vi.unstubAllGlobals()
    vi.restoreAllMocks()
  })

  function makeCollector(): NewsCollector {
    return new NewsCollector({
      store,
      feeds: FEEDS,
      intervalMs: 60_000,
      requestDelayMs: 0,
      fetchOpts: { maxRetries: 1 },
    })
  }

  it('collects every feed, dedups by link and skips failing feeds', async () => {
    const result = await makeCollector().fetchAll()

    expect(result.total).toBe(4)
    expect(result.new).toBe(3)
    expect(result.articles.map((a) => a.title)).toEqual(['Clinic opens', 'Shared story', 'Rates hold'])
    expect(result.articles.map((a) => a.category)).toEqual(['health', 'health', 'economy'])
    expect(result.articles.map((a) => a.source)).toEqual(['health-wire', 'health-wire', 'bank.example.com'])
    expect(store.count).toBe(3)
  })

  it('reports no new articles on a second run', async () => {
    const collector = makeCollector()
    await collector.fetchAll()
    const second = await collector.fetchAll()

    expect(second.new).toBe(0)
    expect(second.articles).toHaveLength(3)
  })

  it('warns about a failing feed', async () => {
    await makeCollector().fetchAll()
    expect(console.warn).toHaveBeenCalledWith(
      'news-collector: failed to fetch Broken (https://broken.example.com/rss): feed fetch failed: 500 Server Error',
    )
  })

  it('starts and stops the interval', () => {
    const collector = makeCollector()
    const fetchAll = vi.spyOn(collector, 'fetchAll').mockResolvedValue({ total: 0, new: 0, articles: [] })
    collector.start()
    expect(fetchAll).toHaveBeenCalledTimes(1)
    expect(collector.running).toBe(true)
    collector.stop()
    expect(collector.running).toBe(false)
  })
})
