export {
  generateSummary,
  generateInsight,
  generateCategorySummary,
  summarizeArticles,
  cleanText,
  truncateText,
  DEFAULT_SUMMARY_MAX_LENGTH,
} from './summarizer.js'
