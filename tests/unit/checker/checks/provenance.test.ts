import { describe, it, expect } from 'vitest'
import { provenanceCheck } from '../../../../src/checker/checks/provenance.js'
import { QualityModel } from '../../../../src/quality/quality-model.js'
import { createSilentLogger } from '../../../../src/logging/logger.js'
import type { BibRecord, ProvenanceMap } from '../../../../src/types/record.js'
import { createRecord } from '../../../fixtures/records.js'
import { messagesOf, runCheck } from '../../../fixtures/checker.js'

const model = new QualityModel({ logger: createSilentLogger() })

function evaluated(provenance: ProvenanceMap = {}): BibRecord {
  const record = model.evaluate(createRecord({ ID: 'R1' }))
  record.colrev_masterdata_provenance = {
    ...record.colrev_masterdata_provenance,
    ...provenance,
  }
  return record
}

describe('provenance check', () => {
  it('passes for an evaluated record', () => {
    expect(runCheck(provenanceCheck, [], [evaluated()])).toEqual([])
  })

  it('reports every present masterdata field without an entry', () => {
    const failures = runCheck(provenanceCheck, [], [createRecord({ ID: 'R1' })])

    expect(failures).toHaveLength(8)
    expect(failures[0]).toEqual({
      kind: 'field-value',
      check: 'provenance',
      recordIds: ['R1'],
      message: "Record 'R1' lacks a provenance entry for 'author'",
    })
  })

  it.each<[ProvenanceMap, string]>([
    [
      { title: { source: 'quality-model', note: 'missing' } },
      "Record 'R1' marks present field 'title' as missing",
    ],
    [
      { booktitle: { source: 'dblp', note: '' } },
      "Record 'R1' has a provenance entry for absent field 'booktitle'",
    ],
    [
      { title: { source: 'quality-model', note: 'shouting' } },
      "Record 'R1' has unknown defect code 'shouting' on 'title'",
    ],
    [
      { title: { source: ' ', note: '' } },
      "Record 'R1' has no provenance source for 'title'",
    ],
  ])('reports a malformed entry (%#)', (provenance, message) => {
    expect(messagesOf(runCheck(provenanceCheck, [], [evaluated(provenance)]))).toEqual([
      message,
    ])
  })

  it('leaves entries outside the masterdata fields to their owners', () => {
    const record = evaluated({ colrev_id: { source: 'import', note: '' } })

    expect(runCheck(provenanceCheck, [], [record])).toEqual([])
  })

  it('accepts sentinel notes on absent fields', () => {
    const record = evaluated({
      booktitle: { source: 'quality-model', note: 'not-missing' },
    })

    expect(runCheck(provenanceCheck, [], [record])).toEqual([])
  })

  describe('with verifyAnnotations', () => {
    it('reports annotations that no longer match the fields', () => {
      const record = evaluated()
      record.fields.title = 'EDITORIAL'

      const failures = runCheck(provenanceCheck, [], [record], {}, {
        verifyAnnotations: true,
      })

      expect(messagesOf(failures)).toEqual([
        "Record 'R1' has a stale annotation on 'title': stored '', expected 'mostly-all-caps'",
      ])
      expect(record.colrev_masterdata_provenance.title.note).toBe('')
    })

    it('passes for fresh annotations', () => {
      expect(
        runCheck(provenanceCheck, [], [evaluated()], {}, { verifyAnnotations: true })
      ).toEqual([])
    })

    it('is off by default', () => {
      const record = evaluated()
      record.fields.title = 'EDITORIAL'

      expect(runCheck(provenanceCheck, [], [record])).toEqual([])
    })
  })
})
