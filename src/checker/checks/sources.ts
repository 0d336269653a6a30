import { isSearchType } from '../../types/record.js'
import type { CheckFailure, ConsistencyCheck } from '../types.js'

function failure(message: string): CheckFailure {
  return { kind: 'source-structure', check: 'sources', recordIds: [], message }
}

/**
 * Declared search sources are well-formed and each file is declared once.
 */
export const sourcesCheck: ConsistencyCheck = {
  name: 'sources',
  run({ context }) {
    const failures: CheckFailure[] = []
    const seen = new Set<string>()

    context.sources.forEach((source, position) => {
      const filename = source.filename.trim()
      if (filename.length === 0) {
        failures.push(failure(`Source #${position + 1} has no filename`))
        return
      }

      if (seen.has(filename)) {
        failures.push(failure(`Source file '${filename}' is declared more than once`))
      }
      seen.add(filename)

      if (!isSearchType(source.searchType)) {
        failures.push(
          failure(`Source '${filename}' has unknown search type '${String(source.searchType)}'`)
        )
      }
      if (source.sourceIdentifier.trim().length === 0) {
        failures.push(failure(`Source '${filename}' has no source identifier`))
      }
    })

    return failures
  },
}
