/** Fixed English function-word list. Not configurable. */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  'the', 'and', 'for', 'are', 'but', 'not', 'you', 'all', 'can', 'had',
  'her', 'was', 'one', 'our', 'out', 'with', 'this', 'that', 'have',
  'from', 'they', 'will', 'would', 'there', 'their', 'what', 'which',
  'when', 'make', 'like', 'into', 'year', 'your', 'just', 'over', 'also',
  'such', 'because', 'these', 'first', 'being', 'after', 'most', 'than',
  'said', 'has', 'been', 'were', 'its', 'his', 'she', 'him', 'them',
  'says', 'say', 'new', 'time',
])
