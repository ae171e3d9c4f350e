/**
 * Trending — Public exports
 */

export { extractKeywords, extractPhrases, phrasesFromKeywords, DEFAULT_MIN_KEYWORD_LENGTH } from './keywords.js'
export {
  detectTrending,
  scoreArticle,
  rankTerms,
  formatTrendingLog,
  TOP_KEYWORDS,
  TOP_PHRASES,
  TOP_PER_CATEGORY,
  SCORE_SATURATION,
} from './detector.js'
export { STOP_WORDS } from './stopwords.js'
export type { TrendingInput, TrendingResult, RankedTerm, DetectTrendingOptions } from './types.js'
