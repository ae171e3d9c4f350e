/**
 * Trending — Keyword and phrase extraction
 *
 * Fixed-rule tokenizer: ASCII letter runs, case-folded, stop words removed.
 * No stemming, no part-of-speech tagging.
 */

import { STOP_WORDS } from './stopwords.js'

export const DEFAULT_MIN_KEYWORD_LENGTH = 3

/**
 * Extract keywords in left-to-right order. Duplicates are kept because
 * multiplicity across the corpus is the trending signal.
 */
export function extractKeywords(text: string, minLength: number = DEFAULT_MIN_KEYWORD_LENGTH): string[] {
  if (!text) return []
  const min = Math.max(1, Math.floor(minLength))
  const words = text.toLowerCase().match(new RegExp(`\\b[a-z]{${min},}\\b`, 'g'))
  if (!words) return []
  return words.filter((word) => !STOP_WORDS.has(word))
}

/**
 * Extract consecutive 2-keyword phrases, followed by 3-keyword phrases when
 * there are at least three keywords.
 *
 * `minPhraseLength` is accepted for call-site compatibility; 2-grams are
 * always produced regardless of its value.
 */
export function extractPhrases(text: string, minPhraseLength: number = 2): string[] {
  void minPhraseLength
  return phrasesFromKeywords(extractKeywords(text))
}

/** Phrase generation over an already-extracted keyword sequence. */
export function phrasesFromKeywords(keywords: readonly string[]): string[] {
  const phrases: string[] = []
  if (keywords.length < 2) return phrases

  for (let i = 0; i < keywords.length - 1; i++) {
    phrases.push(`${keywords[i]} ${keywords[i + 1]}`)
  }

  for (let i = 0; i < keywords.length - 2; i++) {
    phrases.push(`${keywords[i]} ${keywords[i + 1]} ${keywords[i + 2]}`)
  }

  return phrases
}
