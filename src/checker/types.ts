import type { IdRename, SearchSource } from '../types/record.js'
import type { CheckerConfig } from '../types/config.js'
import type { OverrideEntry, OverrideLog } from '../state/override-log.js'
import type { QualityModel } from '../quality/quality-model.js'
import type { SimilarityScorer } from '../similarity/similarity-scorer.js'
import type { Logger } from '../logging/logger.js'
import type { SnapshotIndex } from './snapshot-index.js'

export type CheckName =
  | 'sources'
  | 'unique-ids'
  | 'id-immutability'
  | 'origins'
  | 'provenance'
  | 'status-transitions'
  | 'screening'

export type FailureKind =
  | 'source-structure'
  | 'duplicate-id'
  | 'propagated-id-change'
  | 'origin'
  | 'field-value'
  | 'status-transition'
  | 'screening-criteria'

/**
 * One violated invariant.
 */
export interface CheckFailure {
  kind: FailureKind
  check: CheckName
  /** Records involved; empty for collection-level failures */
  recordIds: string[]
  message: string
}

export interface CheckResult {
  status: 'pass' | 'fail'
  failures: CheckFailure[]
}

/**
 * Project state the snapshot pair is checked against.
 */
export interface CheckContext {
  sources: SearchSource[]
  renames?: IdRename[]
  overrides?: OverrideEntry[]
  /** Screening criterion names in the order records list them */
  screeningCriteria?: string[]
}

/**
 * Everything a check may read. Built once per run and shared.
 */
export interface CheckEnvironment {
  index: SnapshotIndex
  context: CheckContext
  config: CheckerConfig
  overrideLog: OverrideLog
  scorer: SimilarityScorer
  qualityModel: QualityModel
  logger: Logger
}

/**
 * A single independent check. It must not mutate the records it reads.
 */
export interface ConsistencyCheck {
  name: CheckName
  run(env: CheckEnvironment): CheckFailure[]
}
