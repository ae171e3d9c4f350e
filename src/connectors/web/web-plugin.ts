import { Hono } from 'hono'
import { cors } from 'hono/cors'
import { serve } from '@hono/node-server'
import type { Plugin, EngineContext } from '../../core/types.js'
import { createTrendingRoutes } from './routes/trending.js'
import { createArticleRoutes } from './routes/articles.js'
import { createPipelineRoutes } from './routes/pipeline.js'
import { createConfigRoutes } from './routes/config.js'

export interface WebConfig {
  port: number
  onConnectorsChange?: () => Promise<void>
}

/** Build the HTTP API. Exposed separately so it can be exercised without a socket. */
export function createWebApp(ctx: EngineContext, config?: Pick<WebConfig, 'onConnectorsChange'>) {
  const app = new Hono()
  app.use('/api/*', cors())

  app.get('/api/health', (c) => {
    return c.json({
      ok: true,
      articles: ctx.store.count,
      collecting: ctx.collector.running,
    })
  })

  app.route('/api/trending', createTrendingRoutes(ctx))
  app.route('/api/articles', createArticleRoutes(ctx))
  app.route('/api/pipeline', createPipelineRoutes(ctx))
  app.route('/api/config', createConfigRoutes({ onConnectorsChange: config?.onConnectorsChange }))

  return app
}

export class WebPlugin implements Plugin {
  name = 'web'
  private server: ReturnType<typeof serve> | null = null

  constructor(private config: WebConfig) {}

  async start(ctx: EngineContext) {
    const app = createWebApp(ctx, this.config)
    this.server = serve({ fetch: app.fetch, port: this.config.port }, (info) => {
      console.log(`web plugin listening on http://localhost:${info.port}`)
    })
  }

  async stop() {
    this.server?.close()
    this.server = null
  }
}
