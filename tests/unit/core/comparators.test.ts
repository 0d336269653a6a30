import { describe, it, expect } from 'vitest'
import {
  exactMatch,
  levenshtein,
  levenshteinDistance,
  tokenSortSimilarity,
} from '../../../src/core/comparators.js'

describe('exactMatch', () => {
  it('returns 1 for equal values and 0 otherwise', () => {
    expect(exactMatch('2015', '2015')).toBe(1)
    expect(exactMatch('2015', '2016')).toBe(0)
  })

  it('ignores case unless told otherwise', () => {
    expect(exactMatch('MISQ', 'misq')).toBe(1)
    expect(exactMatch('MISQ', 'misq', { caseSensitive: true })).toBe(0)
  })

  it('handles absent values', () => {
    expect(exactMatch(undefined, undefined)).toBe(1)
    expect(exactMatch(undefined, undefined, { nullMatchesNull: false })).toBe(0)
    expect(exactMatch('2015', undefined)).toBe(0)
  })
})

describe('levenshteinDistance', () => {
  it('counts single-character edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3)
    expect(levenshteinDistance('', 'abc')).toBe(3)
    expect(levenshteinDistance('abc', 'abc')).toBe(0)
  })
})

describe('levenshtein', () => {
  it('normalizes the distance by the longer string', () => {
    expect(levenshtein('hello', 'hallo')).toBe(0.8)
    expect(levenshtein('abc', 'xyz')).toBe(0)
  })

  it('collapses whitespace and ignores case', () => {
    expect(levenshtein('MIS  Quarterly ', 'mis quarterly')).toBe(1)
  })

  it('is symmetric', () => {
    expect(levenshtein('service divide', 'digital divide')).toBe(
      levenshtein('digital divide', 'service divide')
    )
  })

  it('handles empty and absent values', () => {
    expect(levenshtein('', '')).toBe(1)
    expect(levenshtein('abc', '')).toBe(0)
    expect(levenshtein(undefined, 'abc')).toBe(0)
  })
})

describe('tokenSortSimilarity', () => {
  it('ignores word order and punctuation', () => {
    expect(tokenSortSimilarity('Rai, Arun', 'Arun Rai')).toBe(1)
    expect(
      tokenSortSimilarity(
        'Srivastava, Shirish C. and Shainesh, G.',
        'Shainesh, G. and Srivastava, Shirish C.'
      )
    ).toBe(1)
  })

  it('ignores case when sorting', () => {
    expect(tokenSortSimilarity('rai arun', 'Arun RAI')).toBe(1)
  })

  it('scores different names below 1', () => {
    expect(tokenSortSimilarity('Rai, Arun', 'Sipior, Janice')).toBeLessThan(0.5)
  })
})
