/**
 * Bibliographic entry types accepted in `ENTRYTYPE`.
 * @module types/entry-type
 */

export const ENTRY_TYPES = [
  'article',
  'inproceedings',
  'incollection',
  'inbook',
  'proceedings',
  'book',
  'phdthesis',
  'mastersthesis',
  'bachelorthesis',
  'thesis',
  'techreport',
  'unpublished',
  'misc',
  'software',
  'online',
  'other',
] as const

export type EntryType = (typeof ENTRY_TYPES)[number]

/** Entry types describing a thesis written by a single author */
export const THESIS_ENTRY_TYPES: readonly EntryType[] = [
  'thesis',
  'phdthesis',
  'mastersthesis',
  'bachelorthesis',
]

const ENTRY_TYPE_SET: ReadonlySet<string> = new Set(ENTRY_TYPES)

export function isEntryType(value: unknown): value is EntryType {
  return typeof value === 'string' && ENTRY_TYPE_SET.has(value)
}
