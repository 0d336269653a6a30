/**
 * Weighted record similarity
 * @module similarity/similarity-scorer
 */

import type { BibRecord } from '../types/record.js'
import type { SimilarityConfig, SimilarityWeights } from '../types/config.js'
import { resolveSimilarityConfig } from '../utils/config.js'
import { getContainerTitle, getField } from '../records/fields.js'
import { exactMatch, levenshtein, tokenSortSimilarity } from '../core/comparators.js'
import type {
  ComparedField,
  ComparisonStrategy,
  FieldSimilarity,
  SimilarityBreakdown,
} from './types.js'
import { SimilarityExplainer } from './explainer.js'

interface FieldComparison {
  field: ComparedField
  strategy: ComparisonStrategy
  read: (record: BibRecord) => string | undefined
}

const COMPARISONS: readonly FieldComparison[] = [
  { field: 'title', strategy: 'levenshtein', read: (r) => getField(r, 'title') },
  { field: 'author', strategy: 'token-sort', read: (r) => getField(r, 'author') },
  { field: 'year', strategy: 'exact', read: (r) => getField(r, 'year') },
  { field: 'container', strategy: 'levenshtein', read: getContainerTitle },
]

/**
 * Scores how likely two records describe the same work.
 *
 * Fields absent on both sides drop out and the remaining weights are
 * renormalized; if all remaining weights are 0 they count equally. A field
 * present on only one side scores 0. When nothing is comparable the records
 * are considered identical. The score is symmetric.
 *
 * @example
 * ```typescript
 * const scorer = new SimilarityScorer({ weights: { title: 0.7, author: 0.1 } })
 * scorer.similarity(recordA, recordB) // 0.93
 * ```
 */
export class SimilarityScorer {
  readonly config: SimilarityConfig
  private readonly explainer = new SimilarityExplainer()

  constructor(config: { weights?: Partial<SimilarityWeights> } = {}) {
    this.config = resolveSimilarityConfig(config)
  }

  similarity(a: BibRecord, b: BibRecord): number {
    return this.score(a, b).score
  }

  /**
   * Per-field breakdown of the similarity between two records.
   */
  score(a: BibRecord, b: BibRecord): SimilarityBreakdown {
    const partial = COMPARISONS.map((comparison) => {
      const leftValue = comparison.read(a)
      const rightValue = comparison.read(b)
      const compared = leftValue !== undefined || rightValue !== undefined
      return {
        field: comparison.field,
        strategy: comparison.strategy,
        leftValue,
        rightValue,
        compared,
        similarity: compared
          ? compareValues(leftValue, rightValue, comparison.strategy)
          : 1,
        weight: this.config.weights[comparison.field],
      }
    })

    const compared = partial.filter((entry) => entry.compared)
    if (compared.length === 0) {
      return {
        score: 1,
        fields: partial.map((entry) => ({ ...entry, contribution: 0 })),
      }
    }

    // all compared weights zero: fall back to an unweighted mean
    const unweighted = compared.every((entry) => entry.weight === 0)
    const weightOf = (entry: { weight: number }) =>
      unweighted ? 1 : entry.weight

    let weightedSum = 0
    let totalWeight = 0
    for (const entry of compared) {
      weightedSum += entry.similarity * weightOf(entry)
      totalWeight += weightOf(entry)
    }

    const fields: FieldSimilarity[] = partial.map((entry) => ({
      ...entry,
      contribution: entry.compared
        ? (entry.similarity * weightOf(entry)) / totalWeight
        : 0,
    }))

    return { score: weightedSum / totalWeight, fields }
  }

  /**
   * Human-readable account of how the score came about.
   */
  explain(a: BibRecord, b: BibRecord): string {
    return this.explainer.explain(this.score(a, b))
  }
}

function compareValues(
  left: string | undefined,
  right: string | undefined,
  strategy: ComparisonStrategy
): number {
  switch (strategy) {
    case 'exact':
      return exactMatch(left, right)
    case 'token-sort':
      return tokenSortSimilarity(left, right)
    case 'levenshtein':
      return levenshtein(left, right)
  }
}

const defaultScorer = new SimilarityScorer()

/**
 * Similarity of two records under the default weights.
 */
export function similarity(a: BibRecord, b: BibRecord): number {
  return defaultScorer.similarity(a, b)
}
