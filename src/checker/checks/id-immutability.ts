import { statusRank } from '../../types/status.js'
import { isSuperseded } from '../snapshot-index.js'
import type { CheckFailure, ConsistencyCheck } from '../types.js'

const PROPAGATED_RANK = statusRank('md_processed')

/**
 * IDs do not change silently once records have been propagated.
 *
 * Every origin of a prior record is followed to the current record holding
 * it, which must carry the prior ID or a logged rename. Merging into a record
 * whose ID also existed before is allowed only for records that have not
 * reached `md_processed`.
 */
export const idImmutabilityCheck: ConsistencyCheck = {
  name: 'id-immutability',
  run({ index, context, scorer }) {
    const failures: CheckFailure[] = []
    const renames = context.renames ?? []
    const reported = new Set<string>()

    for (const prior of index.priorById.values()) {
      const mergeable = statusRank(prior.colrev_status) < PROPAGATED_RANK

      for (const origin of prior.colrev_origin) {
        for (const current of index.currentByOrigin.get(origin) ?? []) {
          if (current.ID === prior.ID || isSuperseded(current)) continue
          if (mergeable && index.priorById.has(current.ID)) continue

          const logged = renames.some(
            (rename) => rename.from === prior.ID && rename.to === current.ID
          )
          if (logged) continue

          const key = `${prior.ID}\u0000${current.ID}`
          if (reported.has(key)) continue
          reported.add(key)

          const score = scorer.similarity(prior, current)
          failures.push({
            kind: 'propagated-id-change',
            check: 'id-immutability',
            recordIds: [prior.ID, current.ID],
            message: `ID '${prior.ID}' changed to '${current.ID}' without a logged rename (similarity ${score.toFixed(2)})`,
          })
        }
      }
    }

    return failures
  },
}
