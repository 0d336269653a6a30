import { describe, it, expect } from 'vitest'
import { OverrideLog } from '../../../src/state/override-log.js'
import { InvalidParameterError } from '../../../src/utils/errors.js'

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

describe('OverrideLog', () => {
  it('records entries with an id and timestamp', () => {
    const log = new OverrideLog()
    const entry = log.record({
      recordId: 'Rai2015',
      from: 'rev_excluded',
      to: 'pdf_prepared',
      reason: 'screening decision revised',
      authorizedBy: 'reviewer-1',
    })

    expect(entry.id).toMatch(UUID_V4)
    expect(entry.createdAt).toBeInstanceOf(Date)
    expect(log.get(entry.id)).toEqual(entry)
    expect(log.size).toBe(1)
  })

  it('finds entries by record and transition', () => {
    const log = new OverrideLog()
    log.record({
      recordId: 'Rai2015',
      from: 'rev_excluded',
      to: 'pdf_prepared',
      reason: 'screening decision revised',
      authorizedBy: 'reviewer-1',
    })
    log.record({
      recordId: 'Sipior2019',
      from: 'md_processed',
      to: 'md_imported',
      reason: 'reset',
      authorizedBy: 'reviewer-2',
    })

    expect(log.forRecord('Rai2015')).toHaveLength(1)
    expect(log.has('Rai2015', 'rev_excluded', 'pdf_prepared')).toBe(true)
    expect(log.has('Rai2015', 'pdf_prepared', 'rev_excluded')).toBe(false)
    expect(log.find('Sipior2019', 'md_processed', 'md_imported')?.authorizedBy).toBe(
      'reviewer-2'
    )
  })

  it('requires reason and actor', () => {
    const log = new OverrideLog()
    expect(() =>
      log.record({
        recordId: 'Rai2015',
        from: 'rev_excluded',
        to: 'pdf_prepared',
        reason: 'revised',
        authorizedBy: '',
      })
    ).toThrow(InvalidParameterError)
  })

  it('rebuilds from persisted entries', () => {
    const createdAt = new Date('2024-03-01T10:00:00Z')
    const log = OverrideLog.from([
      {
        id: 'entry-1',
        recordId: 'Rai2015',
        from: 'rev_included',
        to: 'md_processed',
        reason: 'reset',
        authorizedBy: 'reviewer-1',
        createdAt,
      },
    ])

    expect(log.list()).toEqual([
      {
        id: 'entry-1',
        recordId: 'Rai2015',
        from: 'rev_included',
        to: 'md_processed',
        reason: 'reset',
        authorizedBy: 'reviewer-1',
        createdAt,
      },
    ])
  })
})
