/**
 * Facade over quality model, similarity scorer, state machine and checker
 * @module core/record-integrity
 */

import type { BibRecord, SnapshotPair } from '../types/record.js'
import type { Logger } from '../logging/logger.js'
import { InvalidParameterError } from '../utils/errors.js'
import { QualityModel } from '../quality/quality-model.js'
import { SimilarityScorer } from '../similarity/similarity-scorer.js'
import { validateChanges } from '../similarity/change-validator.js'
import type { RecordChange } from '../similarity/types.js'
import { ConsistencyChecker } from '../checker/consistency-checker.js'
import type { CheckContext, CheckResult } from '../checker/types.js'
import { OverrideLog } from '../state/override-log.js'
import {
  applyTransition,
  type TransitionOutcome,
  type TransitionRequest,
} from '../state/record-state-machine.js'

export interface RecordIntegrityOptions {
  qualityModel: QualityModel
  scorer: SimilarityScorer
  checker: ConsistencyChecker
  logger: Logger
  overrideLog?: OverrideLog
}

/**
 * RecordIntegrity - the entry point operations call before committing a
 * snapshot. Usually created through `BibIntegrity.create()...build()`.
 *
 * @example
 * ```typescript
 * const integrity = BibIntegrity.create().build()
 * const result = integrity.prepareAndCheck({ prior, current }, { sources })
 * if (result.status === 'pass') {
 *   // commit the snapshot
 * }
 * ```
 */
export class RecordIntegrity {
  readonly qualityModel: QualityModel
  readonly scorer: SimilarityScorer
  readonly checker: ConsistencyChecker
  /** Overrides performed through `transition`, included in every check */
  readonly overrides: OverrideLog
  private readonly logger: Logger

  constructor(options: RecordIntegrityOptions) {
    this.qualityModel = options.qualityModel
    this.scorer = options.scorer
    this.checker = options.checker
    this.logger = options.logger
    this.overrides = options.overrideLog ?? new OverrideLog()
  }

  /**
   * Annotates the record's provenance in place and returns it.
   */
  evaluate(record: BibRecord): BibRecord {
    return this.qualityModel.evaluate(record)
  }

  hasQualityDefects(record: BibRecord): boolean {
    return this.qualityModel.hasQualityDefects(record)
  }

  similarity(a: BibRecord, b: BibRecord): number {
    return this.scorer.similarity(a, b)
  }

  explainSimilarity(a: BibRecord, b: BibRecord): string {
    return this.scorer.explain(a, b)
  }

  /**
   * Moves a record to a new status. Manual overrides are recorded in
   * `overrides`.
   */
  transition(record: BibRecord, request: TransitionRequest): TransitionOutcome {
    if (request.kind === 'manual-override' && request.recordId !== record.ID) {
      throw new InvalidParameterError(
        'recordId',
        request.recordId,
        `must match the record being moved ('${record.ID}')`
      )
    }

    const outcome = applyTransition(record.colrev_status, request, this.overrides)
    record.colrev_status = outcome.to
    if (outcome.override !== undefined) {
      this.logger.info('Manual status override', {
        recordId: record.ID,
        from: outcome.from,
        to: outcome.to,
        authorizedBy: outcome.override.authorizedBy,
      })
    }
    return outcome
  }

  /**
   * Checks a snapshot pair whose provenance is already evaluated.
   */
  check(pair: SnapshotPair, context: CheckContext): CheckResult {
    return this.checker.check(pair, {
      ...context,
      overrides: [...(context.overrides ?? []), ...this.overrides.list()],
    })
  }

  /**
   * Evaluates every current record, then checks the pair. The prior
   * snapshot is left untouched.
   */
  prepareAndCheck(pair: SnapshotPair, context: CheckContext): CheckResult {
    for (const record of pair.current) {
      this.qualityModel.evaluate(record)
    }
    return this.check(pair, context)
  }

  validateChanges(pair: SnapshotPair, threshold?: number): RecordChange[] {
    return validateChanges(pair, { threshold, scorer: this.scorer })
  }
}
