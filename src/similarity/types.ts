import type { BibRecord } from '../types/record.js'

/**
 * Record aspects the scorer compares. `container` is journal or booktitle.
 */
export type ComparedField = 'title' | 'author' | 'year' | 'container'

export type ComparisonStrategy = 'levenshtein' | 'token-sort' | 'exact'

/**
 * Score of a single compared field.
 */
export interface FieldSimilarity {
  field: ComparedField
  strategy: ComparisonStrategy
  leftValue?: string
  rightValue?: string
  /** False when the field is absent on both sides and drops out of the blend */
  compared: boolean
  similarity: number
  /** Configured weight of the field */
  weight: number
  /** Share of the final score contributed by this field */
  contribution: number
}

/**
 * Result of comparing two records field by field.
 */
export interface SimilarityBreakdown {
  /** Weighted similarity in [0, 1] */
  score: number
  fields: FieldSimilarity[]
}

/**
 * A record whose content moved away from its prior version.
 */
export interface RecordChange {
  prior: BibRecord
  current: BibRecord
  similarity: number
}
