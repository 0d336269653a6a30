import type { EntryType } from './entry-type.js'
import type { RecordStatus } from './status.js'

/**
 * Quality annotation attached to one field of a record.
 */
export interface ProvenanceAnnotation {
  /** Process that last touched the field */
  source: string
  /** Comma-joined defect codes, `missing`, `not-missing`, or empty when clean */
  note: string
}

/**
 * Per-field provenance, keyed by field name.
 */
export type ProvenanceMap = { [field: string]: ProvenanceAnnotation }

/**
 * Optional bibliographic and data fields of a record.
 */
export type FieldMap = { [field: string]: string | undefined }

/**
 * A bibliographic record tracked through the curation pipeline.
 *
 * The core keys are typed and validated when the record enters the library
 * (see `parseRecord`); everything else lives in `fields`.
 */
export interface BibRecord {
  /** Stable identifier, unique within a snapshot */
  ID: string
  /** Entry type tag (article, inproceedings, ...) */
  ENTRYTYPE: EntryType
  /** Current lifecycle status */
  colrev_status: RecordStatus
  /** Origin links in the form `<source filename>/<record id in source>` */
  colrev_origin: string[]
  /** Quality annotations for the masterdata fields */
  colrev_masterdata_provenance: ProvenanceMap
  /** Provenance of non-masterdata fields, carried through unchanged */
  colrev_data_provenance?: ProvenanceMap
  /** Bibliographic fields (author, title, ...) and data fields */
  fields: FieldMap
}

/**
 * Flat, dict-shaped record as exchanged with the record store.
 */
export type RawRecord = { [key: string]: unknown }

/**
 * Fields covered by quality annotations.
 */
export const MASTERDATA_FIELDS = [
  'author',
  'editor',
  'title',
  'journal',
  'booktitle',
  'chapter',
  'publisher',
  'school',
  'institution',
  'year',
  'volume',
  'number',
  'issue',
  'pages',
  'edition',
  'series',
  'address',
  'language',
  'url',
] as const

export type MasterdataField = (typeof MASTERDATA_FIELDS)[number]

const MASTERDATA_FIELD_SET: ReadonlySet<string> = new Set(MASTERDATA_FIELDS)

export function isMasterdataField(field: string): field is MasterdataField {
  return MASTERDATA_FIELD_SET.has(field)
}

/**
 * Kind of search that produced a source file.
 */
export const SEARCH_TYPES = [
  'DB',
  'TOC',
  'BACKWARD_SEARCH',
  'FORWARD_SEARCH',
  'PDFS',
  'OTHER',
] as const

export type SearchType = (typeof SEARCH_TYPES)[number]

const SEARCH_TYPE_SET: ReadonlySet<string> = new Set(SEARCH_TYPES)

export function isSearchType(value: unknown): value is SearchType {
  return typeof value === 'string' && SEARCH_TYPE_SET.has(value)
}

/**
 * A declared search source. Record origins point into its file.
 */
export interface SearchSource {
  /** File holding the search results, e.g. `data/search/scopus.bib` */
  filename: string
  searchType: SearchType
  sourceName: string
  /** Identifier of the source (URL, database name, ...) */
  sourceIdentifier: string
  /** IDs of the records in the source file, when known */
  recordIds?: string[]
}

/**
 * An explicit, logged change of a record identifier.
 */
export interface IdRename {
  from: string
  to: string
  reason?: string
}

/**
 * Record collections at two points in time. `prior` is empty for the first
 * snapshot of a project.
 */
export interface SnapshotPair {
  prior: readonly BibRecord[]
  current: readonly BibRecord[]
}
