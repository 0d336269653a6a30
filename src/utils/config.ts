/**
 * Merging user configuration with defaults, and validating the result
 * @module utils/config
 */

import type {
  QualityConfig,
  SimilarityConfig,
  SimilarityWeights,
  CheckerConfig,
} from '../types/config.js'
import {
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_SIMILARITY_CONFIG,
  DEFAULT_CHECKER_CONFIG,
} from '../types/config.js'
import {
  ConfigurationError,
  requireInRange,
  requireNonEmptyString,
  requireNonNegative,
  requirePositive,
} from './errors.js'

export function resolveQualityConfig(
  config: Partial<QualityConfig> = {}
): QualityConfig {
  const resolved: QualityConfig = {
    ...DEFAULT_QUALITY_CONFIG,
    ...config,
    knownShortContainerTitles: [
      ...(config.knownShortContainerTitles ??
        DEFAULT_QUALITY_CONFIG.knownShortContainerTitles),
    ],
  }

  requireInRange(resolved.mostlyAllCapsThreshold, 0, 1, 'mostlyAllCapsThreshold')
  requirePositive(
    resolved.containerAbbreviationMaxLength,
    'containerAbbreviationMaxLength'
  )
  requireNonEmptyString(resolved.provenanceSource, 'provenanceSource')

  return resolved
}

export function resolveSimilarityConfig(
  config: { weights?: Partial<SimilarityWeights> } = {}
): SimilarityConfig {
  const weights: SimilarityWeights = {
    ...DEFAULT_SIMILARITY_CONFIG.weights,
    ...config.weights,
  }

  for (const [field, weight] of Object.entries(weights)) {
    requireNonNegative(weight, `weights.${field}`)
  }

  const total = weights.title + weights.author + weights.year + weights.container
  if (total <= 0) {
    throw new ConfigurationError(
      'At least one similarity weight must be positive',
      'weights',
      { weights }
    )
  }

  return { weights }
}

export function resolveCheckerConfig(
  config: Partial<CheckerConfig> = {}
): CheckerConfig {
  const resolved: CheckerConfig = { ...DEFAULT_CHECKER_CONFIG, ...config }
  requireInRange(
    resolved.nearDuplicateThreshold,
    0,
    1,
    'nearDuplicateThreshold'
  )
  return resolved
}
