import { describe, it, expect, vi } from 'vitest'
import {
  BibIntegrity,
  createSilentLogger,
  formatCheckReport,
  InvalidParameterError,
  type BibRecord,
  type Logger,
} from '../../src/index.js'
import { createRecord, createSource, SCOPUS_FILE } from '../fixtures/records.js'

function snapshot(): { prior: BibRecord[]; current: BibRecord[] } {
  return {
    prior: [
      createRecord({ ID: 'R1', colrev_origin: [`${SCOPUS_FILE}/1`] }),
      createRecord({
        ID: 'R2',
        colrev_status: 'rev_prescreen_included',
        colrev_origin: [`${SCOPUS_FILE}/2`],
      }),
    ],
    current: [
      createRecord({ ID: 'R1', colrev_origin: [`${SCOPUS_FILE}/1`] }),
      createRecord({
        ID: 'R2',
        colrev_status: 'rev_prescreen_included',
        colrev_origin: [`${SCOPUS_FILE}/2`],
      }),
    ],
  }
}

describe('check workflow', () => {
  const context = { sources: [createSource()] }

  it('evaluates and passes a consistent snapshot', () => {
    const integrity = BibIntegrity.create().logger(createSilentLogger()).build()
    const pair = snapshot()

    const result = integrity.prepareAndCheck(pair, context)

    expect(result.status).toBe('pass')
    expect(formatCheckReport(result)).toBe('Everything ok.')
    expect(pair.current[0].colrev_masterdata_provenance.title).toEqual({
      source: 'quality-model',
      note: '',
    })
    expect(pair.prior[0].colrev_masterdata_provenance).toEqual({})
  })

  it('passes records whose provenance carries entries it does not manage', () => {
    const integrity = BibIntegrity.create().logger(createSilentLogger()).build()
    const pair = snapshot()
    for (const record of pair.current) {
      record.colrev_masterdata_provenance = {
        colrev_id: { source: 'import', note: '' },
      }
    }

    const result = integrity.prepareAndCheck(pair, context)

    expect(result.status).toBe('pass')
    expect(pair.current[0].colrev_masterdata_provenance.colrev_id).toEqual({
      source: 'import',
      note: '',
    })
  })

  it('reports every problem of a snapshot in one run', () => {
    const integrity = BibIntegrity.create().logger(createSilentLogger()).build()
    const pair = snapshot()
    pair.current[1].colrev_status = 'md_prepared'
    pair.current.push(
      createRecord({ ID: 'R3', colrev_origin: [`${SCOPUS_FILE}/3`] }),
      createRecord({ ID: 'R3', colrev_origin: [`${SCOPUS_FILE}/4`] })
    )

    const result = integrity.prepareAndCheck(pair, context)

    expect(formatCheckReport(result).split('\n')).toEqual([
      'Consistency check failed (2 failures):',
      "  duplicate-id: ID 'R3' is used by 2 records (similarity 1.00, likely the same work)",
      "  status-transition: Record 'R2' moved from 'rev_prescreen_included' to 'md_prepared', which is not a legal transition",
    ])
  })

  it('accepts a manual override performed through the facade', () => {
    const logger: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
    const integrity = BibIntegrity.create().logger(logger).build()
    const pair = snapshot()

    const outcome = integrity.transition(pair.current[1], {
      kind: 'manual-override',
      recordId: 'R2',
      to: 'md_prepared',
      reason: 'Prescreen decision reverted',
      authorizedBy: 'reviewer',
    })

    expect(outcome.from).toBe('rev_prescreen_included')
    expect(pair.current[1].colrev_status).toBe('md_prepared')
    expect(logger.info).toHaveBeenCalledWith('Manual status override', {
      recordId: 'R2',
      from: 'rev_prescreen_included',
      to: 'md_prepared',
      authorizedBy: 'reviewer',
    })
    expect(integrity.prepareAndCheck(pair, context).status).toBe('pass')
  })

  it('moves records along automatic transitions', () => {
    const integrity = BibIntegrity.create().logger(createSilentLogger()).build()
    const record = createRecord({ ID: 'R1', colrev_status: 'md_prepared' })

    const outcome = integrity.transition(record, {
      kind: 'automatic',
      to: 'md_processed',
      operation: 'dedupe',
    })

    expect(outcome).toEqual({
      from: 'md_prepared',
      to: 'md_processed',
      operation: 'dedupe',
    })
    expect(record.colrev_status).toBe('md_processed')
    expect(integrity.overrides.size).toBe(0)
  })

  it('rejects an override for another record', () => {
    const integrity = BibIntegrity.create().logger(createSilentLogger()).build()

    expect(() =>
      integrity.transition(createRecord({ ID: 'R1' }), {
        kind: 'manual-override',
        recordId: 'R2',
        to: 'md_prepared',
        reason: 'typo',
        authorizedBy: 'reviewer',
      })
    ).toThrow(InvalidParameterError)
  })

  it('merges persisted and new overrides when checking', () => {
    const seeded = BibIntegrity.create().logger(createSilentLogger()).build()
    const pair = snapshot()
    seeded.transition(pair.current[1], {
      kind: 'manual-override',
      recordId: 'R2',
      to: 'md_prepared',
      reason: 'Prescreen decision reverted',
      authorizedBy: 'reviewer',
    })

    const fresh = BibIntegrity.create().logger(createSilentLogger()).build()

    expect(fresh.prepareAndCheck(pair, context).status).toBe('fail')
    expect(
      fresh.prepareAndCheck(pair, { ...context, overrides: seeded.overrides.list() })
        .status
    ).toBe('pass')
  })

  it('lists changed records below the threshold', () => {
    const integrity = BibIntegrity.create().logger(createSilentLogger()).build()
    const pair = snapshot()
    pair.current[0].fields.title = 'A different paper altogether'

    const changes = integrity.validateChanges(pair)

    expect(changes.map((change) => change.current.ID)).toEqual(['R1'])
  })
})
