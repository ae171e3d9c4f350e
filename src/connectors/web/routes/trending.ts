import { Hono } from 'hono'
import { z } from 'zod'
import type { EngineContext } from '../../../core/types.js'
import { readTrendingConfig } from '../../../core/config.js'
import { classifyArticles } from '../../../extension/classifier/index.js'
import { detectTrending, scoreArticle, type TrendingResult } from '../../../extension/trending/index.js'

const trendingQuerySchema = z.object({
  hours: z.coerce.number().positive().optional(),
  threshold: z.coerce.number().int().positive().optional(),
})

const scoreBodySchema = z.object({
  title: z.string().default(''),
  summary: z.string().default(''),
})

/** Trending routes: GET /, POST /score */
export function createTrendingRoutes(ctx: Pick<EngineContext, 'store'>) {
  const app = new Hono()

  async function currentTrending(hours?: number, threshold?: number): Promise<TrendingResult> {
    const config = await readTrendingConfig()
    const windowHours = hours ?? config.windowHours
    const articles = classifyArticles(ctx.store.getRecent({ hours: windowHours }))
    return detectTrending(articles, { windowHours, threshold: threshold ?? config.thresholdMentions })
  }

  app.get('/', async (c) => {
    try {
      const query = trendingQuerySchema.parse({
        hours: c.req.query('hours'),
        threshold: c.req.query('threshold'),
      })
      return c.json(await currentTrending(query.hours, query.threshold))
    } catch (err) {
      if (err instanceof Error && err.name === 'ZodError') {
        return c.json({ error: 'Validation failed', details: JSON.parse(err.message) }, 400)
      }
      return c.json({ error: String(err) }, 500)
    }
  })

  app.post('/score', async (c) => {
    try {
      const article = scoreBodySchema.parse(await c.req.json())
      const trending = await currentTrending()
      return c.json({
        score: scoreArticle(article, trending),
        trendingKeywords: trending.trendingKeywords,
      })
    } catch (err) {
      if (err instanceof Error && err.name === 'ZodError') {
        return c.json({ error: 'Validation failed', details: JSON.parse(err.message) }, 400)
      }
      return c.json({ error: String(err) }, 500)
    }
  })

  return app
}
