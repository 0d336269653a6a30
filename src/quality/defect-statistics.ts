/**
 * Collection-wide defect statistics for manual preparation
 * @module quality/defect-statistics
 */

import type { BibRecord } from '../types/record.js'
import { isDefectNote, splitNote } from '../records/provenance.js'

export interface DefectStatistics {
  /** Records inspected */
  totalRecords: number
  /** Records with at least one defect note */
  recordsWithDefects: number
  /** Occurrences per note part (defect code or `missing`) */
  byCode: Record<string, number>
  /** Defective annotations per field */
  byField: Record<string, number>
  /** IDs of records waiting in `md_needs_manual_preparation` */
  needsManualPreparation: string[]
}

/**
 * Summarizes the provenance annotations of a collection. Reads the stored
 * notes, so run the quality model first.
 */
export function summarizeDefects(records: readonly BibRecord[]): DefectStatistics {
  const stats: DefectStatistics = {
    totalRecords: records.length,
    recordsWithDefects: 0,
    byCode: {},
    byField: {},
    needsManualPreparation: [],
  }

  for (const record of records) {
    let defective = false

    for (const [field, annotation] of Object.entries(
      record.colrev_masterdata_provenance
    )) {
      if (!isDefectNote(annotation.note)) continue
      defective = true
      stats.byField[field] = (stats.byField[field] ?? 0) + 1
      for (const code of splitNote(annotation.note)) {
        stats.byCode[code] = (stats.byCode[code] ?? 0) + 1
      }
    }

    if (defective) stats.recordsWithDefects++
    if (record.colrev_status === 'md_needs_manual_preparation') {
      stats.needsManualPreparation.push(record.ID)
    }
  }

  return stats
}
