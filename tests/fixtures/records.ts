import type { BibRecord, FieldMap, SearchSource } from '../../src/types/record.js'

/**
 * Bibliographic fields of a clean journal article.
 */
export const ARTICLE_FIELDS: FieldMap = {
  author: 'Srivastava, Shirish C. and Shainesh, G.',
  title:
    'Bridging the service divide through digitally enabled service innovations',
  journal: 'MIS Quarterly',
  year: '2015',
  volume: '39',
  number: '1',
  pages: '245--267',
  language: 'eng',
}

export const SCOPUS_FILE = 'data/search/scopus.bib'
export const CROSSREF_FILE = 'data/search/crossref.bib'

/**
 * Creates a record with the clean article fields. `fields` is merged into
 * the defaults; a field set to '' counts as absent.
 *
 * @example
 * ```typescript
 * const record = createRecord({ ID: 'R1', fields: { title: 'EDITORIAL' } })
 * ```
 */
export function createRecord(
  overrides: Partial<Omit<BibRecord, 'fields'>> & { fields?: FieldMap } = {}
): BibRecord {
  const { fields, ...rest } = overrides
  return {
    ID: 'Srivastava2015',
    ENTRYTYPE: 'article',
    colrev_status: 'md_processed',
    colrev_origin: [`${SCOPUS_FILE}/000001`],
    colrev_masterdata_provenance: {},
    ...rest,
    fields: { ...ARTICLE_FIELDS, ...fields },
  }
}

/**
 * Creates a record with only the given fields.
 */
export function createBareRecord(
  overrides: Partial<Omit<BibRecord, 'fields'>> & { fields?: FieldMap } = {}
): BibRecord {
  const { fields, ...rest } = overrides
  return {
    ID: 'Bare2020',
    ENTRYTYPE: 'misc',
    colrev_status: 'md_processed',
    colrev_origin: [`${SCOPUS_FILE}/000099`],
    colrev_masterdata_provenance: {},
    ...rest,
    fields: { ...fields },
  }
}

export function createSource(overrides: Partial<SearchSource> = {}): SearchSource {
  return {
    filename: SCOPUS_FILE,
    searchType: 'DB',
    sourceName: 'scopus',
    sourceIdentifier: 'https://www.scopus.com',
    ...overrides,
  }
}
