import { Hono } from 'hono'
import { z } from 'zod'
import type { EngineContext } from '../../../core/types.js'

const runBodySchema = z.object({
  hours: z.number().positive().optional(),
  export: z.boolean().default(true),
  category: z.string().min(1).optional(),
})

/** Pipeline routes: POST /run */
export function createPipelineRoutes(ctx: Pick<EngineContext, 'pipeline'>) {
  const app = new Hono()

  app.post('/run', async (c) => {
    try {
      // An empty body runs with defaults
      const text = await c.req.text()
      const body = runBodySchema.parse(text ? JSON.parse(text) : {})
      const result = await ctx.pipeline.runFullPipeline({
        hours: body.hours,
        exportResults: body.export,
        category: body.category,
      })
      return c.json(result, result.status === 'error' ? 500 : 200)
    } catch (err) {
      if (err instanceof Error && err.name === 'ZodError') {
        return c.json({ error: 'Validation failed', details: JSON.parse(err.message) }, 400)
      }
      if (err instanceof SyntaxError) {
        return c.json({ error: 'Invalid JSON body' }, 400)
      }
      return c.json({ error: String(err) }, 500)
    }
  })

  return app
}
