export { NewsExporter } from './exporter.js'
export type { NewsExporterOpts, ExportArticle, ExportPaths } from './exporter.js'
export { exportSchema, EXPORT_FORMATS } from './config.js'
export type { ExportConfig, ExportFormat } from './config.js'
