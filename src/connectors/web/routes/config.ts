import { Hono } from 'hono'
import { loadConfig, writeConfigSection, isConfigSection, validSections } from '../../../core/config.js'

interface ConfigRouteOpts {
  onConnectorsChange?: () => Promise<void>
}

/** Config routes: GET /, PUT /:section */
export function createConfigRoutes(opts?: ConfigRouteOpts) {
  const app = new Hono()

  app.get('/', async (c) => {
    try {
      const config = await loadConfig()
      return c.json(config)
    } catch (err) {
      return c.json({ error: String(err) }, 500)
    }
  })

  app.put('/:section', async (c) => {
    try {
      const section = c.req.param('section')
      if (!isConfigSection(section)) {
        return c.json({ error: `Invalid section "${section}". Valid: ${validSections.join(', ')}` }, 400)
      }
      const validated = await writeConfigSection(section, await c.req.json())
      // Hot-reload connectors when their config changes
      if (section === 'connectors') {
        await opts?.onConnectorsChange?.()
      }
      return c.json(validated)
    } catch (err) {
      if (err instanceof Error && err.name === 'ZodError') {
        return c.json({ error: 'Validation failed', details: JSON.parse(err.message) }, 400)
      }
      return c.json({ error: String(err) }, 500)
    }
  })

  return app
}
