import type { SimilarityWeights } from '../types/config.js'
import type { ComparedField } from '../similarity/types.js'
import { requireNonNegative } from '../utils/errors.js'

/**
 * Fluent configuration of the similarity weights.
 *
 * @example
 * ```typescript
 * .similarity(s => s.weight('title', 0.5).weight('author', 0.3))
 * ```
 */
export class SimilarityBuilder {
  private weights: Partial<SimilarityWeights> = {}

  weight(field: ComparedField, weight: number): this {
    requireNonNegative(weight, `weights.${field}`)
    this.weights[field] = weight
    return this
  }

  build(): { weights: Partial<SimilarityWeights> } {
    return { weights: { ...this.weights } }
  }
}
