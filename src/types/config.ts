/**
 * Thresholds and lists used by the field rules.
 */
export interface QualityConfig {
  /** Share of uppercase letters above which a field counts as mostly all caps */
  mostlyAllCapsThreshold: number
  /** Longest all-caps container title still treated as an abbreviation */
  containerAbbreviationMaxLength: number
  /** Short all-caps container titles that are the venue's full name */
  knownShortContainerTitles: string[]
  /** Source tag written to provenance entries the quality model creates */
  provenanceSource: string
}

/**
 * Relative weights of the compared fields. They need not sum to 1.
 */
export interface SimilarityWeights {
  title: number
  author: number
  year: number
  container: number
}

export interface SimilarityConfig {
  weights: SimilarityWeights
}

/**
 * Behaviour of the consistency checker.
 */
export interface CheckerConfig {
  /** Abort with a StatusTransitionError on the first illegal transition */
  strict: boolean
  /** Similarity at which two records sharing an ID are reported as the same work */
  nearDuplicateThreshold: number
  /** Re-run the quality model on a copy and flag stale annotations */
  verifyAnnotations: boolean
  /** Flag snapshots whose status transitions span more than one operation */
  requireSingleOperation: boolean
}

export const DEFAULT_QUALITY_CONFIG: QualityConfig = {
  mostlyAllCapsThreshold: 0.8,
  containerAbbreviationMaxLength: 5,
  knownShortContainerTitles: ['BMJ', 'JAMA', 'PNAS'],
  provenanceSource: 'quality-model',
}

export const DEFAULT_SIMILARITY_CONFIG: SimilarityConfig = {
  weights: {
    title: 0.6,
    author: 0.2,
    year: 0.1,
    container: 0.1,
  },
}

export const DEFAULT_CHECKER_CONFIG: CheckerConfig = {
  strict: false,
  nearDuplicateThreshold: 0.9,
  verifyAnnotations: false,
  requireSingleOperation: false,
}
