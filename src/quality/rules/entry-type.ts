/**
 * Field requirements and inconsistencies per entry type
 * @module quality/rules/entry-type
 */

import type { FieldRule } from '../types.js'
import type { BibRecord } from '../../types/record.js'
import type { EntryType } from '../../types/entry-type.js'
import { MISSING_NOTE, NOT_MISSING_NOTE } from '../../types/defects.js'
import { getField, hasField } from '../../records/fields.js'
import { isForthcoming } from './year-format.js'

const THESIS_FIELDS = ['author', 'title', 'school', 'year']
const NON_SERIAL_FIELDS = ['volume', 'issue', 'number', 'journal', 'booktitle']

/**
 * Fields each entry type must carry.
 */
export const REQUIRED_FIELDS: Record<EntryType, readonly string[]> = {
  article: ['author', 'title', 'journal', 'year', 'volume', 'number'],
  inproceedings: ['author', 'title', 'booktitle', 'year'],
  incollection: ['author', 'title', 'booktitle', 'publisher', 'year'],
  inbook: ['author', 'title', 'chapter', 'publisher', 'year'],
  proceedings: ['booktitle', 'editor', 'year'],
  book: ['author', 'title', 'publisher', 'year'],
  phdthesis: THESIS_FIELDS,
  mastersthesis: THESIS_FIELDS,
  bachelorthesis: THESIS_FIELDS,
  thesis: THESIS_FIELDS,
  techreport: ['author', 'title', 'institution', 'year'],
  unpublished: ['author', 'title', 'year'],
  misc: ['author', 'title', 'year'],
  software: ['author', 'title', 'url'],
  online: ['author', 'title', 'url'],
  other: ['author', 'title', 'year'],
}

/**
 * Fields that contradict the entry type when present.
 */
export const INCONSISTENT_FIELDS: Record<EntryType, readonly string[]> = {
  article: ['booktitle'],
  inproceedings: ['issue', 'number', 'journal'],
  incollection: [],
  inbook: ['journal'],
  proceedings: ['journal'],
  book: ['volume', 'issue', 'number', 'journal'],
  phdthesis: NON_SERIAL_FIELDS,
  mastersthesis: NON_SERIAL_FIELDS,
  bachelorthesis: NON_SERIAL_FIELDS,
  thesis: NON_SERIAL_FIELDS,
  techreport: NON_SERIAL_FIELDS,
  unpublished: NON_SERIAL_FIELDS,
  misc: [],
  software: [],
  online: [],
  other: [],
}

// forthcoming papers have no volume or issue yet
const FORTHCOMING_EXCUSED = new Set(['volume', 'number'])

function isExcused(field: string, record: BibRecord): boolean {
  return FORTHCOMING_EXCUSED.has(field) && isForthcoming(getField(record, 'year'))
}

/**
 * Notes for required fields the record lacks: `missing`, or `not-missing`
 * where the absence is excused.
 */
export function getMissingFieldNotes(record: BibRecord): Map<string, string> {
  const notes = new Map<string, string>()
  for (const field of REQUIRED_FIELDS[record.ENTRYTYPE]) {
    if (hasField(record, field)) continue
    notes.set(field, isExcused(field, record) ? NOT_MISSING_NOTE : MISSING_NOTE)
  }
  return notes
}

export const inconsistentWithEntryTypeRule: FieldRule = {
  name: 'inconsistent-with-entrytype',
  evaluate(field, record) {
    if (!INCONSISTENT_FIELDS[record.ENTRYTYPE].includes(field)) return []
    if (isExcused(field, record)) return []
    return ['inconsistent-with-entrytype']
  },
}
