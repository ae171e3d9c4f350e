export { classifyText, classifyArticle, classifyArticles, getCategoryStats, formatCategoryDistribution } from './classifier.js'
export type { Classification, CategoryStats } from './classifier.js'
