import type { FieldSimilarity, SimilarityBreakdown } from './types.js'

export class SimilarityExplainer {
  /**
   * Renders a similarity breakdown as text: the overall score followed by
   * one block per compared field with both values and its contribution.
   */
  explain(breakdown: SimilarityBreakdown): string {
    const lines: string[] = []

    lines.push(`Similarity: ${breakdown.score.toFixed(2)}`)
    lines.push('')
    lines.push('Field Comparisons:')

    for (const field of breakdown.fields) {
      lines.push(...this.formatField(field))
    }

    return lines.join('\n')
  }

  private formatField(field: FieldSimilarity): string[] {
    if (!field.compared) {
      return [`- ${field.field}: not compared (absent on both sides)`]
    }

    const similarity = field.similarity.toFixed(2)
    const contribution = field.contribution.toFixed(2)
    const label = this.getSimilarityLabel(field.similarity)

    return [
      `${field.field}: ${label} (${similarity}, weight ${field.weight}, contributes ${contribution})`,
      `  Record A: ${this.formatValue(field.leftValue)}`,
      `  Record B: ${this.formatValue(field.rightValue)}`,
      `  Strategy: ${field.strategy}`,
    ]
  }

  private getSimilarityLabel(similarity: number): string {
    if (similarity === 1.0) {
      return 'exact match'
    }
    if (similarity >= 0.9) {
      return 'very high similarity'
    }
    if (similarity >= 0.8) {
      return 'high similarity'
    }
    if (similarity >= 0.6) {
      return 'moderate similarity'
    }
    if (similarity >= 0.4) {
      return 'low similarity'
    }
    return 'no match'
  }

  private formatValue(value: string | undefined): string {
    return value === undefined ? '(absent)' : `"${value}"`
  }
}
