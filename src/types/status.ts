/**
 * Record lifecycle and operation vocabulary.
 * The string values are a wire contract: they are read from and written to
 * `colrev_status` by the record store.
 * @module types/status
 */

/**
 * All record statuses, in pipeline order.
 */
export const RECORD_STATUSES = [
  'md_retrieved',
  'md_imported',
  'md_needs_manual_preparation',
  'md_prepared',
  'md_needs_manual_deduplication',
  'md_processed',
  'rev_prescreen_excluded',
  'rev_prescreen_included',
  'pdf_needs_manual_retrieval',
  'pdf_imported',
  'pdf_not_available',
  'pdf_needs_manual_preparation',
  'pdf_prepared',
  'rev_excluded',
  'rev_included',
  'rev_synthesized',
] as const

/**
 * Current pipeline stage of a record.
 */
export type RecordStatus = (typeof RECORD_STATUSES)[number]

/**
 * Operations that move records between statuses.
 */
export const OPERATION_TYPES = [
  'load',
  'prep',
  'prep_man',
  'dedupe',
  'dedupe_man',
  'prescreen',
  'pdf_get',
  'pdf_get_man',
  'pdf_prep',
  'pdf_prep_man',
  'screen',
  'data',
] as const

export type OperationType = (typeof OPERATION_TYPES)[number]

const STATUS_SET: ReadonlySet<string> = new Set(RECORD_STATUSES)
const OPERATION_SET: ReadonlySet<string> = new Set(OPERATION_TYPES)

/**
 * Type guard for status strings coming from outside the library.
 */
export function isRecordStatus(value: unknown): value is RecordStatus {
  return typeof value === 'string' && STATUS_SET.has(value)
}

export function isOperationType(value: unknown): value is OperationType {
  return typeof value === 'string' && OPERATION_SET.has(value)
}

/**
 * Position of a status in the pipeline (0-based).
 */
export function statusRank(status: RecordStatus): number {
  return RECORD_STATUSES.indexOf(status)
}
