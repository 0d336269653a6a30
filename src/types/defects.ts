/**
 * Defect code vocabulary written into provenance notes.
 *
 * Notes are comma-joined and sorted alphabetically; downstream consumers
 * split them on `,`.
 * @module types/defects
 */

export const DEFECT_CODES = [
  'container-title-abbreviated',
  'erroneous-symbol-in-field',
  'erroneous-term-in-field',
  'erroneous-title-field',
  'identical-values-between-title-and-container',
  'incomplete-field',
  'inconsistent-content',
  'inconsistent-with-entrytype',
  'language-format-error',
  'mostly-all-caps',
  'name-abbreviated',
  'name-format-separators',
  'name-format-titles',
  'thesis-with-multiple-authors',
  'year-format',
] as const

export type DefectCode = (typeof DEFECT_CODES)[number]

/** Note for a field the entry type requires but the record lacks */
export const MISSING_NOTE = 'missing'

/** Note for a required field whose absence is excused (e.g. forthcoming papers) */
export const NOT_MISSING_NOTE = 'not-missing'

/** Note for a field without defects */
export const CLEAN_NOTE = ''

const DEFECT_CODE_SET: ReadonlySet<string> = new Set(DEFECT_CODES)

export function isDefectCode(value: unknown): value is DefectCode {
  return typeof value === 'string' && DEFECT_CODE_SET.has(value)
}
