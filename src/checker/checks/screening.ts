import type { BibRecord } from '../../types/record.js'
import type { RecordStatus } from '../../types/status.js'
import { getField } from '../../records/fields.js'
import type { CheckFailure, ConsistencyCheck } from '../types.js'

const SCREENED_STATUSES: readonly RecordStatus[] = [
  'rev_excluded',
  'rev_included',
  'rev_synthesized',
]

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Pattern for `c1=in;c2=out` with every declared criterion, in order.
 */
export function screeningCriteriaPattern(criteria: readonly string[]): RegExp {
  const parts = criteria.map((name) => `${escapeRegExp(name)}=(in|out)`)
  return new RegExp(`^${parts.join(';')}$`)
}

function failure(record: BibRecord, message: string): CheckFailure {
  return {
    kind: 'screening-criteria',
    check: 'screening',
    recordIds: [record.ID],
    message: `Record '${record.ID}' ${message}`,
  }
}

/**
 * Screened records state a decision for each criterion: excluded records
 * fail at least one, included records none. Runs only when criteria are
 * declared.
 */
export const screeningCheck: ConsistencyCheck = {
  name: 'screening',
  run({ index, context }) {
    const criteria = context.screeningCriteria ?? []
    if (criteria.length === 0) return []

    const pattern = screeningCriteriaPattern(criteria)
    const expected = criteria.map((name) => `${name}=in|out`).join(';')
    const failures: CheckFailure[] = []

    for (const record of index.current) {
      if (!SCREENED_STATUSES.includes(record.colrev_status)) continue

      const value = getField(record, 'screening_criteria')
      if (value === undefined) {
        failures.push(failure(record, `(${record.colrev_status}) has no screening_criteria`))
        continue
      }
      if (!pattern.test(value)) {
        failures.push(
          failure(record, `has malformed screening_criteria '${value}' (expected ${expected})`)
        )
        continue
      }

      const failed = value
        .split(';')
        .filter((decision) => decision.endsWith('=out'))
        .map((decision) => decision.slice(0, -'=out'.length))

      if (record.colrev_status === 'rev_excluded' && failed.length === 0) {
        failures.push(failure(record, 'is excluded but meets every screening criterion'))
      } else if (record.colrev_status !== 'rev_excluded' && failed.length > 0) {
        failures.push(
          failure(record, `is ${record.colrev_status} but fails: ${failed.join(', ')}`)
        )
      }
    }

    return failures
  },
}
