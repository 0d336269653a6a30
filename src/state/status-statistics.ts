/**
 * Status counts across a record collection
 * @module state/status-statistics
 */

import type { BibRecord } from '../types/record.js'
import type { RecordStatus } from '../types/status.js'
import { isExcluded, isManualState } from './record-state-machine.js'

export interface StatusStatistics {
  total: number
  byStatus: Record<RecordStatus, number>
  /** Records on one of the rejection branches */
  excluded: number
  /** Records waiting in a manual state */
  needsManualWork: number
  /** Records that reached `rev_synthesized` */
  completed: number
  /** Records neither excluded nor completed */
  active: number
}

export function computeStatusStatistics(
  records: readonly BibRecord[]
): StatusStatistics {
  const byStatus: Record<RecordStatus, number> = {
    md_retrieved: 0,
    md_imported: 0,
    md_needs_manual_preparation: 0,
    md_prepared: 0,
    md_needs_manual_deduplication: 0,
    md_processed: 0,
    rev_prescreen_excluded: 0,
    rev_prescreen_included: 0,
    pdf_needs_manual_retrieval: 0,
    pdf_imported: 0,
    pdf_not_available: 0,
    pdf_needs_manual_preparation: 0,
    pdf_prepared: 0,
    rev_excluded: 0,
    rev_included: 0,
    rev_synthesized: 0,
  }

  let excluded = 0
  let needsManualWork = 0

  for (const record of records) {
    byStatus[record.colrev_status]++
    if (isExcluded(record.colrev_status)) excluded++
    if (isManualState(record.colrev_status)) needsManualWork++
  }

  const completed = byStatus.rev_synthesized

  return {
    total: records.length,
    byStatus,
    excluded,
    needsManualWork,
    completed,
    active: records.length - excluded - completed,
  }
}
