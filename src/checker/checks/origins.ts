import { splitOrigin } from '../../records/fields.js'
import { isSuperseded } from '../snapshot-index.js'
import type { CheckFailure, ConsistencyCheck } from '../types.js'

function failure(recordIds: string[], message: string): CheckFailure {
  return { kind: 'origin', check: 'origins', recordIds, message }
}

/**
 * Origins resolve to declared sources, link each source record exactly
 * once, and survive from the prior snapshot.
 */
export const originsCheck: ConsistencyCheck = {
  name: 'origins',
  run({ index }) {
    const failures: CheckFailure[] = []

    for (const record of index.current) {
      if (record.colrev_origin.length === 0) {
        failures.push(failure([record.ID], `Record '${record.ID}' has no origin`))
      }

      for (const origin of record.colrev_origin) {
        const parts = splitOrigin(origin)
        if (parts === undefined) {
          failures.push(
            failure([record.ID], `Record '${record.ID}' has malformed origin '${origin}'`)
          )
          continue
        }

        const source = index.sourcesByFilename.get(parts.filename)
        if (source === undefined) {
          failures.push(
            failure(
              [record.ID],
              `Record '${record.ID}' links to undeclared source '${parts.filename}'`
            )
          )
        } else if (
          source.recordIds !== undefined &&
          !source.recordIds.includes(parts.recordId)
        ) {
          failures.push(
            failure(
              [record.ID],
              `Record '${record.ID}' links to missing source record '${origin}'`
            )
          )
        }
      }
    }

    for (const [origin, records] of index.currentByOrigin) {
      const holders = records.filter((record) => !isSuperseded(record))
      if (holders.length > 1) {
        const ids = holders.map((record) => record.ID)
        failures.push(
          failure(ids, `Origin '${origin}' is linked from several records: ${ids.join(', ')}`)
        )
      }
    }

    for (const source of index.sourcesByFilename.values()) {
      for (const recordId of source.recordIds ?? []) {
        const origin = `${source.filename}/${recordId}`
        if (!index.currentByOrigin.has(origin)) {
          failures.push(
            failure([], `Source record '${origin}' is not linked from any record`)
          )
        }
      }
    }

    for (const [origin, records] of index.priorByOrigin) {
      if (!index.currentByOrigin.has(origin)) {
        const ids = records.map((record) => record.ID)
        failures.push(
          failure(ids, `Origin '${origin}' of '${ids.join(', ')}' is no longer linked`)
        )
      }
    }

    return failures
  },
}
