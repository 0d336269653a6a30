import type { QualityConfig, CheckerConfig, SimilarityWeights } from '../types/config.js'
import type { Logger } from '../logging/logger.js'
import { defaultLogger } from '../logging/logger.js'
import { QualityModel } from '../quality/quality-model.js'
import type { RuleRegistry } from '../quality/rule-registry.js'
import { SimilarityScorer } from '../similarity/similarity-scorer.js'
import { ConsistencyChecker } from '../checker/consistency-checker.js'
import type { ConsistencyCheck } from '../checker/types.js'
import { OverrideLog } from '../state/override-log.js'
import type { OverrideEntry } from '../state/override-log.js'
import { RecordIntegrity } from '../core/record-integrity.js'
import { QualityBuilder } from './quality-builder.js'
import { SimilarityBuilder } from './similarity-builder.js'
import { CheckerBuilder } from './checker-builder.js'

/**
 * Fluent builder for configuring and creating a RecordIntegrity instance.
 *
 * @example
 * ```typescript
 * const integrity = BibIntegrity.create()
 *   .quality(q => q.mostlyAllCapsThreshold(0.85))
 *   .similarity(s => s.weight('title', 0.7).weight('container', 0))
 *   .checker(c => c.strict().verifyAnnotations())
 *   .logger(createConsoleLogger('debug'))
 *   .build()
 * ```
 */
export class IntegrityBuilder {
  private qualityConfig: Partial<QualityConfig> = {}
  private ruleRegistry?: RuleRegistry
  private similarityWeights: Partial<SimilarityWeights> = {}
  private checkerConfig: Partial<CheckerConfig> = {}
  private checks?: ConsistencyCheck[]
  private loggerInstance: Logger = defaultLogger
  private overrideEntries: OverrideEntry[] = []

  /**
   * Configure quality thresholds and the rule set.
   *
   * @param configurator - Callback that receives a QualityBuilder
   */
  quality(
    configurator: (builder: QualityBuilder) => QualityBuilder | void
  ): this {
    const builder = new QualityBuilder()
    const result = (configurator(builder) ?? builder).build()
    this.qualityConfig = result.config
    this.ruleRegistry = result.registry
    return this
  }

  /**
   * Configure the weights of the similarity scorer.
   */
  similarity(
    configurator: (builder: SimilarityBuilder) => SimilarityBuilder | void
  ): this {
    const builder = new SimilarityBuilder()
    this.similarityWeights = (configurator(builder) ?? builder).build().weights
    return this
  }

  /**
   * Configure the consistency checker.
   */
  checker(
    configurator: (builder: CheckerBuilder) => CheckerBuilder | void
  ): this {
    const builder = new CheckerBuilder()
    const result = (configurator(builder) ?? builder).build()
    this.checkerConfig = result.config
    this.checks = result.checks
    return this
  }

  logger(logger: Logger): this {
    this.loggerInstance = logger
    return this
  }

  /**
   * Seed the override log with persisted entries.
   */
  overrides(entries: OverrideEntry[]): this {
    this.overrideEntries = [...entries]
    return this
  }

  build(): RecordIntegrity {
    const logger = this.loggerInstance
    const qualityModel = new QualityModel({
      config: this.qualityConfig,
      registry: this.ruleRegistry,
      logger,
    })
    const scorer = new SimilarityScorer({ weights: this.similarityWeights })
    const checker = new ConsistencyChecker({
      config: this.checkerConfig,
      checks: this.checks,
      scorer,
      qualityModel,
      logger,
    })

    return new RecordIntegrity({
      qualityModel,
      scorer,
      checker,
      logger,
      overrideLog: OverrideLog.from(this.overrideEntries),
    })
  }
}

/**
 * Main entry point for bib-integrity.
 */
export const BibIntegrity = {
  /**
   * Create a new integrity builder.
   */
  create(): IntegrityBuilder {
    return new IntegrityBuilder()
  },
}
