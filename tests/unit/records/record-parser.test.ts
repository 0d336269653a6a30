import { describe, it, expect } from 'vitest'
import {
  parseRecord,
  parseSnapshot,
  toRawRecord,
} from '../../../src/records/record-parser.js'
import {
  RecordValidationError,
  VocabularyError,
} from '../../../src/utils/errors.js'

const raw = {
  ID: 'Rai2015',
  ENTRYTYPE: 'article',
  colrev_status: 'md_prepared',
  colrev_origin: ['data/search/scopus.bib/000001'],
  colrev_masterdata_provenance: {
    author: { source: 'crossref', note: '' },
  },
  author: 'Rai, Arun',
  title: 'Editor comments',
  year: 2015,
}

describe('parseRecord', () => {
  it('splits core keys from bibliographic fields', () => {
    const record = parseRecord(raw)

    expect(record.ID).toBe('Rai2015')
    expect(record.ENTRYTYPE).toBe('article')
    expect(record.colrev_status).toBe('md_prepared')
    expect(record.colrev_origin).toEqual(['data/search/scopus.bib/000001'])
    expect(record.colrev_masterdata_provenance).toEqual({
      author: { source: 'crossref', note: '' },
    })
    expect(record.fields).toEqual({
      author: 'Rai, Arun',
      title: 'Editor comments',
      year: '2015',
    })
  })

  it('accepts origins as a ;-joined string', () => {
    const record = parseRecord({
      ...raw,
      colrev_origin: 'data/search/a.bib/1; data/search/b.bib/7',
    })

    expect(record.colrev_origin).toEqual([
      'data/search/a.bib/1',
      'data/search/b.bib/7',
    ])
  })

  it('defaults absent origins and provenance to empty', () => {
    const record = parseRecord({
      ID: 'X',
      ENTRYTYPE: 'misc',
      colrev_status: 'md_retrieved',
    })

    expect(record.colrev_origin).toEqual([])
    expect(record.colrev_masterdata_provenance).toEqual({})
    expect(record.colrev_data_provenance).toBeUndefined()
  })

  it('raises VocabularyError for an unknown status', () => {
    expect(() => parseRecord({ ...raw, colrev_status: 'md_done' })).toThrow(
      VocabularyError
    )
  })

  it('raises VocabularyError for an unknown entry type', () => {
    expect(() => parseRecord({ ...raw, ENTRYTYPE: 'blogpost' })).toThrow(
      "Unknown entry type: 'blogpost'"
    )
  })

  it('raises RecordValidationError for a missing ID', () => {
    expect(() => parseRecord({ ...raw, ID: '' })).toThrow(RecordValidationError)
  })

  it('rejects malformed provenance entries', () => {
    expect(() =>
      parseRecord({
        ...raw,
        colrev_masterdata_provenance: { author: { source: 'crossref' } },
      })
    ).toThrow(RecordValidationError)
  })

  it('rejects object-valued fields', () => {
    expect(() => parseRecord({ ...raw, keywords: { a: 1 } })).toThrow(
      "Record validation failed for 'keywords'"
    )
  })
})

describe('parseSnapshot', () => {
  it('keeps records with duplicate IDs', () => {
    const records = parseSnapshot([raw, raw])
    expect(records.map((record) => record.ID)).toEqual(['Rai2015', 'Rai2015'])
  })
})

describe('toRawRecord', () => {
  it('round-trips a parsed record to the flat shape', () => {
    const record = parseRecord(raw)

    expect(toRawRecord(record)).toEqual({
      ID: 'Rai2015',
      ENTRYTYPE: 'article',
      colrev_status: 'md_prepared',
      colrev_origin: ['data/search/scopus.bib/000001'],
      colrev_masterdata_provenance: {
        author: { source: 'crossref', note: '' },
      },
      author: 'Rai, Arun',
      title: 'Editor comments',
      year: '2015',
    })
  })

  it('does not share provenance objects with the record', () => {
    const record = parseRecord(raw)
    const flat = toRawRecord(record)

    expect(flat.colrev_masterdata_provenance).not.toBe(
      record.colrev_masterdata_provenance
    )
  })
})
