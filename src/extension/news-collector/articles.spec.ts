import { describe, it, expect } from 'vitest'
import { sanitizeText, extractDomain, toArticle, removeDuplicates, filterByDate } from './articles.js'
import type { NewsArticle } from '../../core/types.js'

const NOW = new Date('2026-03-01T12:00:00Z')
const FEED = { name: 'Test Feed', url: 'https://example.com/rss', source: '', category: 'health' }

function makeArticle(link: string, publishedDate: Date | null): NewsArticle {
  return {
    title: `Title ${link}`,
    link,
    summary: '',
    publishedDate,
    category: 'general',
    source: 'test',
    contentLength: 0,
    fetchedAt: NOW,
  }
}

describe('sanitizeText', () => {
  it('removes URLs and collapses whitespace', () => {
    expect(sanitizeText('Read more at https://example.com/a?b=1   now\n\tplease')).toBe('Read more at now please')
  })

  it('returns an empty string for empty input', () => {
    expect(sanitizeText('')).toBe('')
    expect(sanitizeText(null)).toBe('')
    expect(sanitizeText(undefined)).toBe('')
  })
})

describe('extractDomain', () => {
  it('drops a leading www.', () => {
    expect(extractDomain('https://www.example.com/news/1')).toBe('example.com')
    expect(extractDomain('https://feeds.example.org/x')).toBe('feeds.example.org')
  })

  it('returns "unknown" for an invalid URL', () => {
    expect(extractDomain('not a url')).toBe('unknown')
  })
})

describe('toArticle', () => {
  it('maps a feed item onto an article', () => {
    const article = toArticle(
      {
        title: 'Virus spreads',
        content: 'Cases rise. Details: https://example.com/details',
        link: 'https://www.example.com/virus',
        guid: 'virus-1',
        pubDate: new Date('2026-03-01T10:00:00Z'),
      },
      FEED,
      NOW,
    )

    expect(article).toEqual({
      title: 'Virus spreads',
      link: 'https://www.example.com/virus',
      summary: 'Cases rise. Details:',
      publishedDate: new Date('2026-03-01T10:00:00Z'),
      category: 'health',
      source: 'example.com',
      contentLength: 20,
      fetchedAt: NOW,
    })
  })

  it('prefers the configured source and falls back to the guid for the link', () => {
    const article = toArticle(
      { title: 'T', content: '', link: null, guid: 'https://example.net/1', pubDate: null },
      { ...FEED, source: 'wire' },
      NOW,
    )
    expect(article.link).toBe('https://example.net/1')
    expect(article.source).toBe('wire')
  })
})

describe('removeDuplicates', () => {
  it('keeps the first article per link', () => {
    const a = makeArticle('https://example.com/a', NOW)
    const b = makeArticle('https://example.com/b', NOW)
    const aAgain = { ...makeArticle('https://example.com/a', NOW), title: 'Second copy' }

    const unique = removeDuplicates([a, b, aAgain])
    expect(unique).toEqual([a, b])
  })
})

describe('filterByDate', () => {
  it('keeps articles inside the window and drops undated ones', () => {
    const fresh = makeArticle('fresh', new Date('2026-03-01T06:00:00Z'))
    const stale = makeArticle('stale', new Date('2026-02-27T06:00:00Z'))
    const undated = makeArticle('undated', null)

    expect(filterByDate([fresh, stale, undated], 24, NOW)).toEqual([fresh])
  })

  it('drops articles dated after now', () => {
    const edge = makeArticle('edge', new Date('2026-02-28T12:00:00Z'))
    const future = makeArticle('future', new Date('2026-03-01T13:00:00Z'))

    expect(filterByDate([edge, future], 24, NOW)).toEqual([edge])
  })
})
