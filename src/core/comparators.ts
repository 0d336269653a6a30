/**
 * String comparators used by the similarity scorer
 * @module core/comparators
 */

/**
 * Options shared by the string comparators.
 */
export interface ComparatorOptions {
  /** Whether string comparison should be case-sensitive (default: false) */
  caseSensitive?: boolean
  /** Whether two null/undefined values should match (default: true) */
  nullMatchesNull?: boolean
}

/**
 * Compares two values for exact equality.
 * Returns 1 for exact match, 0 for no match.
 *
 * @example
 * ```typescript
 * exactMatch('2015', '2015') // 1
 * exactMatch('MIS Quarterly', 'mis quarterly') // 1 (case-insensitive by default)
 * ```
 */
export function exactMatch(
  a: string | undefined,
  b: string | undefined,
  options: ComparatorOptions = {}
): number {
  const { caseSensitive = false, nullMatchesNull = true } = options

  if (a === undefined && b === undefined) return nullMatchesNull ? 1 : 0
  if (a === undefined || b === undefined) return 0

  if (caseSensitive) return a === b ? 1 : 0
  return a.toLowerCase() === b.toLowerCase() ? 1 : 0
}

/**
 * Minimum number of single-character edits turning `a` into `b`
 * (Wagner-Fischer).
 */
export function levenshteinDistance(a: string, b: string): number {
  const lenA = a.length
  const lenB = b.length

  const matrix: number[][] = []
  for (let i = 0; i <= lenA; i++) {
    matrix[i] = [i]
  }
  for (let j = 0; j <= lenB; j++) {
    matrix[0][j] = j
  }

  for (let i = 1; i <= lenA; i++) {
    for (let j = 1; j <= lenB; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1
      matrix[i][j] = Math.min(
        matrix[i - 1][j] + 1, // deletion
        matrix[i][j - 1] + 1, // insertion
        matrix[i - 1][j - 1] + cost // substitution
      )
    }
  }

  return matrix[lenA][lenB]
}

/**
 * Normalized Levenshtein similarity between 0 (completely different) and
 * 1 (identical). Whitespace runs are collapsed before comparing.
 *
 * @example
 * ```typescript
 * levenshtein('hello', 'hello')  // 1.0
 * levenshtein('hello', 'hallo')  // 0.8
 * levenshtein('Hello', 'hello')  // 1.0 (case-insensitive by default)
 * ```
 */
export function levenshtein(
  a: string | undefined,
  b: string | undefined,
  options: ComparatorOptions = {}
): number {
  const { caseSensitive = false, nullMatchesNull = true } = options

  if (a === undefined && b === undefined) return nullMatchesNull ? 1 : 0
  if (a === undefined || b === undefined) return 0

  let strA = a.replace(/\s+/g, ' ').trim()
  let strB = b.replace(/\s+/g, ' ').trim()

  if (!caseSensitive) {
    strA = strA.toLowerCase()
    strB = strB.toLowerCase()
  }

  if (strA.length === 0 && strB.length === 0) return 1
  if (strA.length === 0 || strB.length === 0) return 0

  const distance = levenshteinDistance(strA, strB)
  return 1 - distance / Math.max(strA.length, strB.length)
}

/**
 * Levenshtein similarity after sorting the words of both values, so that
 * `Rai, Arun` and `Arun Rai` compare as equal. Punctuation is ignored.
 *
 * @example
 * ```typescript
 * tokenSortSimilarity('Rai, Arun', 'Arun Rai') // 1.0
 * ```
 */
export function tokenSortSimilarity(
  a: string | undefined,
  b: string | undefined,
  options: ComparatorOptions = {}
): number {
  const { caseSensitive = false, nullMatchesNull = true } = options

  if (a === undefined && b === undefined) return nullMatchesNull ? 1 : 0
  if (a === undefined || b === undefined) return 0

  return levenshtein(
    sortTokens(a, caseSensitive),
    sortTokens(b, caseSensitive),
    options
  )
}

function sortTokens(value: string, caseSensitive: boolean): string {
  return (caseSensitive ? value : value.toLowerCase())
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0)
    .sort()
    .join(' ')
}
