/**
 * News Collector — RSS / Atom fetch and parse
 *
 * Handles RSS 2.0 (<item>) and Atom (<entry>) feeds with CDATA sections.
 * Extracts: title, content, link, guid/id, publication date.
 */

export interface ParsedFeedItem {
  title: string
  /** Plain text: HTML stripped, entities decoded */
  content: string
  link: string | null
  guid: string | null
  pubDate: Date | null
}

export interface FetchFeedOpts {
  /** Total attempts */
  maxRetries?: number
  /** Delay before retry n is `requestDelayMs * n` */
  requestDelayMs?: number
  timeoutMs?: number
  userAgent?: string
}

const DEFAULT_USER_AGENT = 'trendwire/0.1 NewsCollector'

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms))

/**
 * Fetch a feed URL and return parsed items.
 * Throws the last error once every attempt has failed.
 */
export async function fetchAndParseFeed(url: string, opts: FetchFeedOpts = {}): Promise<ParsedFeedItem[]> {
  const attempts = Math.max(1, opts.maxRetries ?? 3)
  const delayMs = opts.requestDelayMs ?? 1000
  const timeoutMs = opts.timeoutMs ?? 30_000

  let lastError: unknown
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const res = await fetch(url, {
        signal: AbortSignal.timeout(timeoutMs),
        headers: { 'User-Agent': opts.userAgent ?? DEFAULT_USER_AGENT },
      })
      if (!res.ok) throw new Error(`feed fetch failed: ${res.status} ${res.statusText}`)
      return parseFeedXml(await res.text())
    } catch (err) {
      lastError = err
      console.warn(
        `news-collector: ${url} attempt ${attempt}/${attempts} failed: ${err instanceof Error ? err.message : String(err)}`,
      )
      if (attempt < attempts) await sleep(delayMs * attempt)
    }
  }
  throw lastError
}

/**
 * Parse an RSS/Atom XML string into structured items.
 * Anything that is not a feed yields an empty list.
 */
export function parseFeedXml(xml: string): ParsedFeedItem[] {
  const items: ParsedFeedItem[] = []

  const blockRegex = /<(item|entry)[\s>]([\s\S]*?)<\/\1>/gi
  let match: RegExpExecArray | null
  while ((match = blockRegex.exec(xml)) !== null) {
    const block = match[2]
    items.push({
      title: toPlainText(firstTag(block, ['title'], false) ?? ''),
      content: toPlainText(
        firstTag(block, ['content:encoded', 'description', 'summary', 'content'], false) ?? '',
      ),
      link: firstTag(block, ['link'], true) ?? readAttr(block, 'link', 'href'),
      guid: firstTag(block, ['guid', 'id'], true),
      pubDate: parseDate(firstTag(block, ['pubDate', 'published', 'updated', 'dc:date'], true)),
    })
  }

  return items
}

// ==================== Helpers ====================

/** First non-empty tag among `tags`, in preference order. */
function firstTag(block: string, tags: string[], decode: boolean): string | null {
  for (const tag of tags) {
    const value = readTag(block, tag)
    if (value) return decode ? decodeXmlEntities(value) : value
  }
  return null
}

/**
 * Inner text of the first <tag>. CDATA is unwrapped; entities are left as-is
 * so the caller can strip markup before decoding.
 */
function readTag(xml: string, tag: string): string | null {
  const name = escapeRegex(tag)
  const regex = new RegExp(`<${name}(?:\\s[^>]*)?>([\\s\\S]*?)</${name}>`, 'i')
  const match = regex.exec(xml)
  if (!match) return null
  const inner = match[1].trim()
  const cdata = /^<!\[CDATA\[([\s\S]*?)\]\]>$/.exec(inner)
  return (cdata ? cdata[1] : inner).trim()
}

/** <link href="https://..."/> → "https://..." */
function readAttr(xml: string, tag: string, attr: string): string | null {
  const regex = new RegExp(`<${escapeRegex(tag)}\\b[^>]*\\b${attr}="([^"]*)"`, 'i')
  const match = regex.exec(xml)
  return match ? decodeXmlEntities(match[1]) : null
}

function parseDate(value: string | null): Date | null {
  if (!value) return null
  const d = new Date(value)
  return isNaN(d.getTime()) ? null : d
}

/** Strip markup first, then decode, so `&lt;b&gt;` survives as literal text. */
function toPlainText(raw: string): string {
  return decodeXmlEntities(raw.replace(/<[^>]+>/g, ' ')).replace(/\s+/g, ' ').trim()
}

function decodeXmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(Number(code)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/&amp;/g, '&')
}

function escapeRegex(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}
