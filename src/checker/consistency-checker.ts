/**
 * Cross-snapshot consistency checking
 * @module checker/consistency-checker
 */

import type { SnapshotPair } from '../types/record.js'
import type { CheckerConfig } from '../types/config.js'
import { resolveCheckerConfig } from '../utils/config.js'
import type { Logger } from '../logging/logger.js'
import { createPrefixedLogger, defaultLogger } from '../logging/logger.js'
import { OverrideLog } from '../state/override-log.js'
import { QualityModel } from '../quality/quality-model.js'
import { SimilarityScorer } from '../similarity/similarity-scorer.js'
import { SnapshotIndex } from './snapshot-index.js'
import { DEFAULT_CHECKS } from './checks/index.js'
import type {
  CheckContext,
  CheckEnvironment,
  CheckFailure,
  CheckResult,
  ConsistencyCheck,
} from './types.js'

export interface ConsistencyCheckerOptions {
  config?: Partial<CheckerConfig>
  checks?: readonly ConsistencyCheck[]
  scorer?: SimilarityScorer
  /** Used for `verifyAnnotations`; must match the model that annotated the records */
  qualityModel?: QualityModel
  logger?: Logger
}

/**
 * ConsistencyChecker - validates a current snapshot against its predecessor
 *
 * Every check runs, and all failures are collected; the result passes only
 * when none fired. Records are read, never modified. Provenance must be
 * evaluated before checking.
 *
 * @example
 * ```typescript
 * const checker = new ConsistencyChecker({ config: { strict: false } })
 * const result = checker.check({ prior, current }, { sources })
 * if (result.status === 'fail') console.log(formatCheckReport(result))
 * ```
 */
export class ConsistencyChecker {
  readonly config: CheckerConfig
  private readonly checks: readonly ConsistencyCheck[]
  private readonly scorer: SimilarityScorer
  private readonly qualityModel: QualityModel
  private readonly logger: Logger

  constructor(options: ConsistencyCheckerOptions = {}) {
    this.config = resolveCheckerConfig(options.config)
    this.checks = options.checks ?? DEFAULT_CHECKS
    this.scorer = options.scorer ?? new SimilarityScorer()
    this.logger = createPrefixedLogger('checker', options.logger ?? defaultLogger)
    this.qualityModel =
      options.qualityModel ?? new QualityModel({ logger: this.logger })
  }

  /**
   * @throws {StatusTransitionError} In strict mode, on an illegal transition
   */
  check(pair: SnapshotPair, context: CheckContext): CheckResult {
    const env: CheckEnvironment = {
      index: new SnapshotIndex(pair, context.sources),
      context,
      config: this.config,
      overrideLog: OverrideLog.from(context.overrides ?? []),
      scorer: this.scorer,
      qualityModel: this.qualityModel,
      logger: this.logger,
    }

    const failures: CheckFailure[] = []
    for (const check of this.checks) {
      const found = check.run(env)
      this.logger.debug(`Check '${check.name}' found ${found.length} failure(s)`)
      failures.push(...found)
    }

    const result: CheckResult = {
      status: failures.length === 0 ? 'pass' : 'fail',
      failures,
    }

    if (result.status === 'pass') {
      this.logger.info('Consistency check passed', {
        records: pair.current.length,
      })
    } else {
      this.logger.warn('Consistency check failed', {
        records: pair.current.length,
        failures: failures.length,
      })
    }

    return result
  }
}
