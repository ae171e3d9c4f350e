import { Hono } from 'hono'
import { z } from 'zod'
import type { EngineContext } from '../../../core/types.js'

const articlesQuerySchema = z.object({
  hours: z.coerce.number().positive().optional(),
  category: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().default(100),
})

/** Article routes: GET / */
export function createArticleRoutes(ctx: Pick<EngineContext, 'store'>) {
  const app = new Hono()

  app.get('/', (c) => {
    try {
      const query = articlesQuerySchema.parse({
        hours: c.req.query('hours'),
        category: c.req.query('category'),
        limit: c.req.query('limit'),
      })
      const articles = ctx.store.getRecent(query)
      return c.json({ articles, count: articles.length })
    } catch (err) {
      if (err instanceof Error && err.name === 'ZodError') {
        return c.json({ error: 'Validation failed', details: JSON.parse(err.message) }, 400)
      }
      return c.json({ error: String(err) }, 500)
    }
  })

  return app
}
