import { parseArgs } from 'node:util'
import { resolve } from 'path'
import { loadConfig, readTrendingConfig } from './core/config.js'
import type { Plugin, EngineContext } from './core/types.js'
import { createPipeline } from './core/pipeline.js'
import { NewsCollector, NewsCollectorStore } from './extension/news-collector/index.js'
import { NewsExporter } from './extension/exporter/index.js'
import { WebPlugin } from './connectors/web/web-plugin.js'

async function main() {
  const { values: args } = parseArgs({
    options: {
      once: { type: 'boolean', default: false },
      hours: { type: 'string' },
      category: { type: 'string' },
      'no-export': { type: 'boolean', default: false },
    },
  })

  const config = await loadConfig()

  // ==================== Infrastructure ====================

  const store = new NewsCollectorStore({
    maxInMemory: config.newsCollector.maxInMemory,
    retentionDays: config.newsCollector.retentionDays,
  })
  await store.init()

  const collector = new NewsCollector({
    store,
    feeds: config.newsCollector.feeds,
    intervalMs: config.newsCollector.intervalMinutes * 60 * 1000,
    requestDelayMs: config.newsCollector.requestDelayMs,
    fetchOpts: {
      maxRetries: config.newsCollector.maxRetries,
      timeoutMs: config.newsCollector.timeoutMs,
    },
  })

  const exporter = new NewsExporter({ dir: resolve(config.export.dir) })
  const pipeline = createPipeline({ collector, exporter, config, readTrendingConfig: () => readTrendingConfig() })

  // ==================== One-shot run ====================

  if (args.once) {
    const hours = args.hours !== undefined ? Number(args.hours) : undefined
    if (hours !== undefined && !(hours > 0)) {
      throw new Error(`--hours must be a positive number, got "${args.hours}"`)
    }
    const result = await pipeline.runFullPipeline({
      hours,
      exportResults: !args['no-export'],
      category: args.category,
    })
    await store.close()
    if (result.status === 'error') {
      console.error(`pipeline failed: ${result.error ?? 'unknown error'}`)
      process.exit(1)
    }
    for (const [format, path] of Object.entries(result.exports.articles ?? {})) {
      console.log(`export: ${format} ${path}`)
    }
    if (result.exports.trending) console.log(`export: trending ${result.exports.trending}`)
    return
  }

  // ==================== Plugins ====================

  const ctx: EngineContext = { config, store, collector, pipeline }
  const plugins: Plugin[] = []

  let web: WebPlugin | null = null
  const reloadConnectors = async () => {
    const fresh = await loadConfig()
    if (web) {
      await web.stop()
      plugins.splice(plugins.indexOf(web), 1)
      web = null
    }
    if (fresh.connectors.web.enabled) {
      web = new WebPlugin({ port: fresh.connectors.web.port, onConnectorsChange: reloadConnectors })
      await web.start(ctx)
      plugins.push(web)
    }
    console.log('connectors: reloaded')
  }

  if (config.connectors.web.enabled) {
    web = new WebPlugin({ port: config.connectors.web.port, onConnectorsChange: reloadConnectors })
    plugins.push(web)
  }

  for (const plugin of plugins) {
    await plugin.start(ctx)
    console.log(`plugin started: ${plugin.name}`)
  }

  if (config.newsCollector.enabled) {
    collector.start()
    console.log(`news-collector: collecting every ${config.newsCollector.intervalMinutes}m from ${config.newsCollector.feeds.length} feeds`)
  }

  // ==================== Shutdown ====================

  const shutdown = async () => {
    collector.stop()
    for (const plugin of plugins) {
      await plugin.stop()
    }
    await store.close()
    process.exit(0)
  }
  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('shutdown failed:', err)
      process.exit(1)
    })
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  console.log('engine: started')
}

main().catch((err) => {
  console.error('fatal:', err)
  process.exit(1)
})
