import type { CheckerConfig } from '../types/config.js'
import type { ConsistencyCheck } from '../checker/types.js'
import { DEFAULT_CHECKS } from '../checker/checks/index.js'
import { ConfigurationError, requireInRange } from '../utils/errors.js'

export interface CheckerBuilderResult {
  config: Partial<CheckerConfig>
  checks: ConsistencyCheck[]
}

/**
 * Fluent configuration of the consistency checker.
 *
 * @example
 * ```typescript
 * .checker(c => c.strict().nearDuplicateThreshold(0.95).verifyAnnotations())
 * ```
 */
export class CheckerBuilder {
  private config: Partial<CheckerConfig> = {}
  private checks: ConsistencyCheck[] = [...DEFAULT_CHECKS]

  strict(enabled = true): this {
    this.config.strict = enabled
    return this
  }

  nearDuplicateThreshold(threshold: number): this {
    requireInRange(threshold, 0, 1, 'nearDuplicateThreshold')
    this.config.nearDuplicateThreshold = threshold
    return this
  }

  verifyAnnotations(enabled = true): this {
    this.config.verifyAnnotations = enabled
    return this
  }

  requireSingleOperation(enabled = true): this {
    this.config.requireSingleOperation = enabled
    return this
  }

  /**
   * Appends a custom check, run after the built-in ones.
   */
  check(check: ConsistencyCheck): this {
    if (this.checks.some((existing) => existing.name === check.name)) {
      throw new ConfigurationError(
        `A check named '${check.name}' is already configured`,
        'checks'
      )
    }
    this.checks.push(check)
    return this
  }

  build(): CheckerBuilderResult {
    return { config: { ...this.config }, checks: [...this.checks] }
  }
}
