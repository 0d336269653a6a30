/**
 * bib-integrity: record lifecycle, quality defects, snapshot consistency and
 * record similarity for bibliographic curation pipelines
 * @module bib-integrity
 */

// Main API
export { BibIntegrity, IntegrityBuilder } from './builder/integrity-builder.js'
export { QualityBuilder, type QualityBuilderResult } from './builder/quality-builder.js'
export { SimilarityBuilder } from './builder/similarity-builder.js'
export { CheckerBuilder, type CheckerBuilderResult } from './builder/checker-builder.js'
export {
  RecordIntegrity,
  type RecordIntegrityOptions,
} from './core/record-integrity.js'

// Vocabulary and record types
export * from './types/index.js'

// Record boundary
export { parseRecord, parseSnapshot, toRawRecord } from './records/record-parser.js'
export {
  getField,
  hasField,
  getContainerTitle,
  splitNames,
  splitOrigin,
} from './records/fields.js'
export {
  splitNote,
  joinNote,
  isDefectNote,
  isSentinelNote,
  cloneProvenance,
} from './records/provenance.js'

// Quality
export * from './quality/index.js'

// Similarity
export {
  exactMatch,
  levenshtein,
  levenshteinDistance,
  tokenSortSimilarity,
  type ComparatorOptions,
} from './core/comparators.js'
export * from './similarity/index.js'

// State machine
export * from './state/index.js'

// Consistency checker
export * from './checker/index.js'

// Errors
export {
  BibIntegrityError,
  VocabularyError,
  RecordValidationError,
  StatusTransitionError,
  ProcessOrderViolationError,
  InvalidParameterError,
  ConfigurationError,
  isBibIntegrityError,
  requirePositive,
  requireNonNegative,
  requireInRange,
  requireNonEmptyString,
} from './utils/errors.js'

// Configuration
export {
  resolveQualityConfig,
  resolveSimilarityConfig,
  resolveCheckerConfig,
} from './utils/config.js'

// Logging
export {
  type Logger,
  type LogLevel,
  createConsoleLogger,
  createSilentLogger,
  createPrefixedLogger,
  defaultLogger,
} from './logging/logger.js'
