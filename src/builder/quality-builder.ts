import type { QualityConfig } from '../types/config.js'
import type { FieldRule } from '../quality/types.js'
import { type RuleRegistry, createDefaultRuleRegistry } from '../quality/rule-registry.js'
import {
  ConfigurationError,
  requireInRange,
  requireNonEmptyString,
  requirePositive,
} from '../utils/errors.js'

export interface QualityBuilderResult {
  config: Partial<QualityConfig>
  registry: RuleRegistry
}

/**
 * Fluent configuration of the quality model and its rule set.
 *
 * @example
 * ```typescript
 * .quality(q => q
 *   .mostlyAllCapsThreshold(0.9)
 *   .knownShortContainerTitles(['BMJ', 'JAMA', 'PNAS', 'NEJM'])
 *   .withoutRule('language-format-error')
 * )
 * ```
 */
export class QualityBuilder {
  private config: Partial<QualityConfig> = {}
  private readonly registry = createDefaultRuleRegistry()

  mostlyAllCapsThreshold(threshold: number): this {
    requireInRange(threshold, 0, 1, 'mostlyAllCapsThreshold')
    this.config.mostlyAllCapsThreshold = threshold
    return this
  }

  containerAbbreviationMaxLength(length: number): this {
    requirePositive(length, 'containerAbbreviationMaxLength')
    this.config.containerAbbreviationMaxLength = length
    return this
  }

  knownShortContainerTitles(titles: string[]): this {
    this.config.knownShortContainerTitles = [...titles]
    return this
  }

  provenanceSource(source: string): this {
    requireNonEmptyString(source, 'provenanceSource')
    this.config.provenanceSource = source
    return this
  }

  /**
   * Adds a custom rule after the built-in ones.
   */
  rule(rule: FieldRule): this {
    this.registry.register(rule)
    return this
  }

  withoutRule(name: string): this {
    if (!this.registry.unregister(name)) {
      throw new ConfigurationError(`Unknown rule '${name}'`, 'rules', { rule: name })
    }
    return this
  }

  build(): QualityBuilderResult {
    return { config: { ...this.config }, registry: this.registry }
  }
}
