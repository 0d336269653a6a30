import type { CheckFailure, ConsistencyCheck } from '../types.js'

/**
 * No two current records share an ID. The message tells whether the pair
 * looks like one work (merge it) or two (rename one).
 */
export const uniqueIdsCheck: ConsistencyCheck = {
  name: 'unique-ids',
  run({ index, scorer, config }) {
    const failures: CheckFailure[] = []

    for (const [id, records] of index.currentById) {
      if (records.length < 2) continue

      const score = scorer.similarity(records[0], records[1])
      const verdict =
        score >= config.nearDuplicateThreshold
          ? 'likely the same work'
          : 'likely different works'

      failures.push({
        kind: 'duplicate-id',
        check: 'unique-ids',
        recordIds: [id],
        message: `ID '${id}' is used by ${records.length} records (similarity ${score.toFixed(2)}, ${verdict})`,
      })
    }

    return failures
  },
}
