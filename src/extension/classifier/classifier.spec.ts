import { describe, it, expect } from 'vitest'
import {
  classifyText,
  classifyArticle,
  classifyArticles,
  getCategoryStats,
  formatCategoryDistribution,
} from './classifier.js'

describe('classifyText', () => {
  it('picks the highest-scoring category and flags sensitive topics', () => {
    const result = classifyText('WHO warns of virus outbreak. Hospital beds filling')
    expect(result).toEqual({
      primaryCategory: 'health',
      secondaryCategories: [],
      categoryScores: { health: 4, military: 0, economy: 0 },
      sensitiveTopics: ['outbreak'],
      isSensitive: true,
    })
  })

  it('breaks score ties by lexicon order and lists secondary categories', () => {
    const result = classifyText('Army drills near border as bank shares rise')
    expect(result.primaryCategory).toBe('military')
    expect(result.secondaryCategories).toEqual(['economy'])
    expect(result.isSensitive).toBe(false)
  })

  it('falls back to general when nothing matches', () => {
    const result = classifyText('Weekend weather stays pleasant')
    expect(result.primaryCategory).toBe('general')
    expect(result.secondaryCategories).toEqual([])
    expect(result.sensitiveTopics).toEqual([])
  })

  it('matches whole words only', () => {
    // "stocks" is not "stock", "warfare" is not "war"
    expect(classifyText('stocks warfare').primaryCategory).toBe('general')
  })

  it('accepts a custom lexicon', () => {
    const lexicon = { sports: { keywords: ['goal', 'match'], sensitive: ['injury'] } }
    const result = classifyText('Late goal wins the match despite injury', lexicon)
    expect(result).toEqual({
      primaryCategory: 'sports',
      secondaryCategories: [],
      categoryScores: { sports: 2 },
      sensitiveTopics: ['injury'],
      isSensitive: true,
    })
  })
})

describe('classifyArticle', () => {
  it('returns a classified copy without touching the input', () => {
    const article = { title: 'Missile test', summary: 'Navy confirms launch', link: 'https://example.com/m' }
    const classified = classifyArticle(article)

    expect(classified.link).toBe('https://example.com/m')
    expect(classified.primaryCategory).toBe('military')
    expect(classified.categoryScores.military).toBe(2)
    expect(article).not.toHaveProperty('primaryCategory')
  })
})

describe('getCategoryStats', () => {
  it('counts categories, sensitive and multi-category articles', () => {
    const classified = classifyArticles([
      { title: 'Pandemic fears', summary: 'Virus spreads' },
      { title: 'Troops and tax', summary: 'Budget for army' },
      { title: 'Garden show', summary: 'Flowers bloom' },
    ])
    const stats = getCategoryStats(classified)

    expect(stats).toEqual({
      total: 3,
      byCategory: { health: 1, military: 1, general: 1 },
      sensitiveCount: 1,
      multiCategoryCount: 1,
    })
    expect(formatCategoryDistribution(stats)).toBe('health: 1, military: 1, general: 1')
  })
})
