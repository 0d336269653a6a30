import { describe, it, expect } from 'vitest'
import { computeStatusStatistics } from '../../../src/state/status-statistics.js'
import { createRecord } from '../../fixtures/records.js'

describe('computeStatusStatistics', () => {
  it('counts statuses and groups', () => {
    const stats = computeStatusStatistics([
      createRecord({ ID: 'R1', colrev_status: 'md_needs_manual_preparation' }),
      createRecord({ ID: 'R2', colrev_status: 'rev_prescreen_excluded' }),
      createRecord({ ID: 'R3', colrev_status: 'rev_excluded' }),
      createRecord({ ID: 'R4', colrev_status: 'rev_synthesized' }),
      createRecord({ ID: 'R5', colrev_status: 'rev_included' }),
    ])

    expect(stats.total).toBe(5)
    expect(stats.byStatus.rev_excluded).toBe(1)
    expect(stats.byStatus.md_imported).toBe(0)
    expect(stats.excluded).toBe(2)
    expect(stats.needsManualWork).toBe(1)
    expect(stats.completed).toBe(1)
    expect(stats.active).toBe(2)
  })

  it('lists every status for an empty collection', () => {
    const stats = computeStatusStatistics([])

    expect(Object.keys(stats.byStatus)).toHaveLength(16)
    expect(stats.active).toBe(0)
  })
})
