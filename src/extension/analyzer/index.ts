export {
  assessImpact,
  assessSentiment,
  extractEntities,
  analyzeText,
  analyzeArticle,
  analyzeArticles,
  getAnalysisSummary,
} from './analyzer.js'
export type { AnalysisSummary, ArticleAnalysis } from './analyzer.js'
