export type {
  ProvenanceAnnotation,
  ProvenanceMap,
  FieldMap,
  BibRecord,
  RawRecord,
  MasterdataField,
  SearchType,
  SearchSource,
  IdRename,
  SnapshotPair,
} from './record.js'
export {
  MASTERDATA_FIELDS,
  SEARCH_TYPES,
  isMasterdataField,
  isSearchType,
} from './record.js'

export type { RecordStatus, OperationType } from './status.js'
export {
  RECORD_STATUSES,
  OPERATION_TYPES,
  isRecordStatus,
  isOperationType,
  statusRank,
} from './status.js'

export type { EntryType } from './entry-type.js'
export { ENTRY_TYPES, THESIS_ENTRY_TYPES, isEntryType } from './entry-type.js'

export type { DefectCode } from './defects.js'
export {
  DEFECT_CODES,
  MISSING_NOTE,
  NOT_MISSING_NOTE,
  CLEAN_NOTE,
  isDefectCode,
} from './defects.js'

export type {
  QualityConfig,
  SimilarityWeights,
  SimilarityConfig,
  CheckerConfig,
} from './config.js'
export {
  DEFAULT_QUALITY_CONFIG,
  DEFAULT_SIMILARITY_CONFIG,
  DEFAULT_CHECKER_CONFIG,
} from './config.js'
