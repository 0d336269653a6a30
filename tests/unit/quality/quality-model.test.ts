import { describe, it, expect, vi } from 'vitest'
import { QualityModel } from '../../../src/quality/quality-model.js'
import { RuleRegistry } from '../../../src/quality/rule-registry.js'
import { DEFAULT_RULES } from '../../../src/quality/rules/index.js'
import { createSilentLogger } from '../../../src/logging/logger.js'
import type { Logger } from '../../../src/logging/logger.js'
import { createRecord } from '../../fixtures/records.js'

function createSpyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

describe('QualityModel', () => {
  const model = new QualityModel({ logger: createSilentLogger() })

  it('returns the record it annotated', () => {
    const record = createRecord()
    expect(model.evaluate(record)).toBe(record)
  })

  it('tags new annotations with the provenance source', () => {
    const record = model.evaluate(createRecord())
    expect(record.colrev_masterdata_provenance.title).toEqual({
      source: 'quality-model',
      note: '',
    })
  })

  it('keeps existing source tags', () => {
    const record = createRecord({
      fields: { title: 'EDITORIAL' },
      colrev_masterdata_provenance: {
        title: { source: 'crossref', note: '' },
      },
    })
    model.evaluate(record)

    expect(record.colrev_masterdata_provenance.title).toEqual({
      source: 'crossref',
      note: 'mostly-all-caps',
    })
  })

  it('drops stale masterdata annotations and keeps others', () => {
    const record = createRecord({
      colrev_masterdata_provenance: {
        booktitle: { source: 'dblp', note: 'missing' },
        colrev_id: { source: 'import', note: '' },
      },
    })
    model.evaluate(record)

    const provenance = record.colrev_masterdata_provenance
    expect('booktitle' in provenance).toBe(false)
    expect(provenance.colrev_id).toEqual({ source: 'import', note: '' })
  })

  it('writes annotations sorted by field name', () => {
    const record = model.evaluate(createRecord())
    const fields = Object.keys(record.colrev_masterdata_provenance)
    expect(fields).toEqual([...fields].sort())
  })

  it('is idempotent', () => {
    const record = createRecord({ fields: { author: 'RAI', volume: '' } })
    model.evaluate(record)
    const first = JSON.stringify(record.colrev_masterdata_provenance)
    model.evaluate(record)

    expect(JSON.stringify(record.colrev_masterdata_provenance)).toBe(first)
  })

  it('applies the configured caps threshold', () => {
    const lenient = new QualityModel({
      config: { mostlyAllCapsThreshold: 0.9 },
      logger: createSilentLogger(),
    })
    // 8 of 9 letters uppercase
    const record = createRecord({ fields: { title: 'ABCDEFGHi' } })

    expect(model.getDefects(record).title).toEqual(['mostly-all-caps'])
    expect(lenient.getDefects(record).title).toEqual([])
  })

  describe('hasQualityDefects', () => {
    it('is false for a clean record', () => {
      expect(model.hasQualityDefects(model.evaluate(createRecord()))).toBe(false)
    })

    it('is true when a required field is missing', () => {
      const record = model.evaluate(createRecord({ fields: { volume: '' } }))
      expect(model.hasQualityDefects(record)).toBe(true)
    })

    it('ignores not-missing notes', () => {
      const record = model.evaluate(
        createRecord({ fields: { year: 'forthcoming', volume: '', number: '' } })
      )
      expect(model.hasQualityDefects(record)).toBe(false)
    })
  })

  it('logs a failing rule and carries on', () => {
    const logger = createSpyLogger()
    const registry = new RuleRegistry(DEFAULT_RULES).register({
      name: 'exploding-rule',
      fields: ['title'],
      evaluate: () => {
        throw new Error('boom')
      },
    })
    const guarded = new QualityModel({ registry, logger })

    const record = guarded.evaluate(createRecord({ fields: { title: 'EDITORIAL' } }))

    expect(record.colrev_masterdata_provenance.title.note).toBe('mostly-all-caps')
    expect(logger.warn).toHaveBeenCalledWith(
      "Rule 'exploding-rule' failed on field 'title'",
      { recordId: 'Srivastava2015', error: 'boom' }
    )
  })
})
