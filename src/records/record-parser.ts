/**
 * Conversion between raw store records and typed records.
 * This is the only place where record shape and vocabulary are checked;
 * the rest of the library trusts `BibRecord`.
 * @module records/record-parser
 */

import type {
  BibRecord,
  FieldMap,
  ProvenanceMap,
  RawRecord,
} from '../types/record.js'
import { isEntryType } from '../types/entry-type.js'
import { isRecordStatus } from '../types/status.js'
import { RecordValidationError, VocabularyError } from '../utils/errors.js'
import { cloneProvenance } from './provenance.js'

const CORE_KEYS = new Set([
  'ID',
  'ENTRYTYPE',
  'colrev_status',
  'colrev_origin',
  'colrev_masterdata_provenance',
  'colrev_data_provenance',
])

/**
 * Parses a flat store record into a typed record.
 *
 * @throws {RecordValidationError} If the ID is missing or a value has the wrong shape
 * @throws {VocabularyError} If the status or entry type is unknown
 */
export function parseRecord(raw: RawRecord): BibRecord {
  const id = raw.ID
  if (typeof id !== 'string' || id.trim().length === 0) {
    throw new RecordValidationError('ID', 'ID must be a non-empty string', {
      ID: id,
    })
  }

  const entryType = raw.ENTRYTYPE
  if (!isEntryType(entryType)) {
    throw new VocabularyError('entry type', entryType, { recordId: id })
  }

  const status = raw.colrev_status
  if (!isRecordStatus(status)) {
    throw new VocabularyError('record status', status, { recordId: id })
  }

  const record: BibRecord = {
    ID: id,
    ENTRYTYPE: entryType,
    colrev_status: status,
    colrev_origin: parseOrigins(raw.colrev_origin, id),
    colrev_masterdata_provenance: parseProvenance(
      raw.colrev_masterdata_provenance,
      'colrev_masterdata_provenance',
      id
    ),
    fields: parseFields(raw, id),
  }

  if (raw.colrev_data_provenance !== undefined) {
    record.colrev_data_provenance = parseProvenance(
      raw.colrev_data_provenance,
      'colrev_data_provenance',
      id
    )
  }

  return record
}

/**
 * Parses a collection of raw records. Duplicate IDs are kept: detecting them
 * is the consistency checker's job.
 */
export function parseSnapshot(raws: readonly RawRecord[]): BibRecord[] {
  return raws.map((raw) => parseRecord(raw))
}

/**
 * Serializes a typed record back into the flat store shape.
 */
export function toRawRecord(record: BibRecord): RawRecord {
  const raw: RawRecord = {
    ID: record.ID,
    ENTRYTYPE: record.ENTRYTYPE,
    colrev_status: record.colrev_status,
    colrev_origin: [...record.colrev_origin],
    colrev_masterdata_provenance: cloneProvenance(
      record.colrev_masterdata_provenance
    ),
  }

  if (record.colrev_data_provenance) {
    raw.colrev_data_provenance = cloneProvenance(record.colrev_data_provenance)
  }

  for (const [key, value] of Object.entries(record.fields)) {
    if (value !== undefined) raw[key] = value
  }

  return raw
}

function parseOrigins(value: unknown, recordId: string): string[] {
  if (value === undefined) return []

  if (typeof value === 'string') {
    return value
      .split(';')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0)
  }

  if (!Array.isArray(value)) {
    throw new RecordValidationError(
      'colrev_origin',
      'colrev_origin must be a list or a ;-separated string',
      { recordId }
    )
  }

  const origins: string[] = []
  for (let i = 0; i < value.length; i++) {
    const origin: unknown = value[i]
    if (typeof origin !== 'string') {
      throw new RecordValidationError(
        'colrev_origin',
        `colrev_origin[${i}] must be a string`,
        { recordId, origin }
      )
    }
    origins.push(origin)
  }
  return origins
}

function parseProvenance(
  value: unknown,
  key: string,
  recordId: string
): ProvenanceMap {
  if (value === undefined) return {}

  if (!isPlainObject(value)) {
    throw new RecordValidationError(key, `${key} must be an object`, {
      recordId,
    })
  }

  const provenance: ProvenanceMap = {}
  for (const [field, entry] of Object.entries(value)) {
    if (
      !isPlainObject(entry) ||
      typeof entry.source !== 'string' ||
      typeof entry.note !== 'string'
    ) {
      throw new RecordValidationError(
        key,
        `${key}.${field} must have string 'source' and 'note'`,
        { recordId, entry }
      )
    }
    provenance[field] = { source: entry.source, note: entry.note }
  }
  return provenance
}

function parseFields(raw: RawRecord, recordId: string): FieldMap {
  const fields: FieldMap = {}
  for (const [key, value] of Object.entries(raw)) {
    if (CORE_KEYS.has(key) || value === undefined || value === null) continue

    if (typeof value === 'string') {
      fields[key] = value
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      fields[key] = String(value)
    } else {
      throw new RecordValidationError(
        key,
        `field '${key}' must be a string, number or boolean`,
        { recordId, value }
      )
    }
  }
  return fields
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
