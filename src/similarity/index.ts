export { SimilarityScorer, similarity } from './similarity-scorer.js'
export { SimilarityExplainer } from './explainer.js'
export {
  validateChanges,
  type ChangeValidationOptions,
} from './change-validator.js'
export type {
  ComparedField,
  ComparisonStrategy,
  FieldSimilarity,
  SimilarityBreakdown,
  RecordChange,
} from './types.js'
