import type { BibRecord } from '../../types/record.js'
import { MASTERDATA_FIELDS, isMasterdataField } from '../../types/record.js'
import { isDefectCode, MISSING_NOTE } from '../../types/defects.js'
import { getField } from '../../records/fields.js'
import {
  cloneProvenance,
  isSentinelNote,
  splitNote,
} from '../../records/provenance.js'
import type { QualityModel } from '../../quality/quality-model.js'
import type { CheckFailure, ConsistencyCheck } from '../types.js'

function failure(record: BibRecord, message: string): CheckFailure {
  return {
    kind: 'field-value',
    check: 'provenance',
    recordIds: [record.ID],
    message: `Record '${record.ID}' ${message}`,
  }
}

function structuralFailures(record: BibRecord): CheckFailure[] {
  const failures: CheckFailure[] = []
  const provenance = record.colrev_masterdata_provenance

  for (const field of MASTERDATA_FIELDS) {
    if (getField(record, field) === undefined) continue
    if (!(field in provenance)) {
      failures.push(failure(record, `lacks a provenance entry for '${field}'`))
    }
  }

  for (const [field, annotation] of Object.entries(provenance)) {
    // entries beyond the masterdata fields may describe data kept elsewhere
    if (isMasterdataField(field)) {
      const present = getField(record, field) !== undefined
      if (present && annotation.note === MISSING_NOTE) {
        failures.push(failure(record, `marks present field '${field}' as missing`))
      } else if (!present && !isSentinelNote(annotation.note)) {
        failures.push(failure(record, `has a provenance entry for absent field '${field}'`))
      }
    }

    for (const code of splitNote(annotation.note)) {
      if (!isSentinelNote(code) && !isDefectCode(code)) {
        failures.push(failure(record, `has unknown defect code '${code}' on '${field}'`))
      }
    }

    if (annotation.source.trim().length === 0) {
      failures.push(failure(record, `has no provenance source for '${field}'`))
    }
  }

  return failures
}

/**
 * Compares the stored notes with a fresh evaluation of a copy.
 */
function staleAnnotations(
  record: BibRecord,
  qualityModel: QualityModel
): CheckFailure[] {
  const copy: BibRecord = {
    ...record,
    colrev_origin: [...record.colrev_origin],
    colrev_masterdata_provenance: cloneProvenance(
      record.colrev_masterdata_provenance
    ),
    fields: { ...record.fields },
  }
  const expected = qualityModel.evaluate(copy).colrev_masterdata_provenance
  const stored = record.colrev_masterdata_provenance

  const failures: CheckFailure[] = []
  const fields = new Set([...Object.keys(stored), ...Object.keys(expected)])
  for (const field of Array.from(fields).sort()) {
    const storedNote = field in stored ? stored[field].note : undefined
    const expectedNote = field in expected ? expected[field].note : undefined
    if (storedNote !== expectedNote) {
      failures.push(
        failure(
          record,
          `has a stale annotation on '${field}': stored '${storedNote ?? '(none)'}', expected '${expectedNote ?? '(none)'}'`
        )
      )
    }
  }
  return failures
}

/**
 * Provenance maps are well-formed: one entry per present masterdata field,
 * sentinel notes only on absent fields, known defect codes and a source.
 */
export const provenanceCheck: ConsistencyCheck = {
  name: 'provenance',
  run({ index, config, qualityModel }) {
    const failures: CheckFailure[] = []
    for (const record of index.current) {
      const structural = structuralFailures(record)
      failures.push(...structural)
      if (config.verifyAnnotations && structural.length === 0) {
        failures.push(...staleAnnotations(record, qualityModel))
      }
    }
    return failures
  },
}
