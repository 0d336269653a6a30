import type { OperationType } from '../../types/status.js'
import { StatusTransitionError } from '../../utils/errors.js'
import {
  allowedNext,
  operationFor,
} from '../../state/record-state-machine.js'
import type { CheckFailure, ConsistencyCheck } from '../types.js'

/**
 * Every record present in both snapshots kept its status, moved along an
 * edge of the state machine, or was moved by a logged manual override.
 *
 * @throws {StatusTransitionError} In strict mode, on the first illegal move
 */
export const statusTransitionsCheck: ConsistencyCheck = {
  name: 'status-transitions',
  run({ index, overrideLog, config }) {
    const failures: CheckFailure[] = []
    const operations = new Set<OperationType>()

    for (const current of index.current) {
      const prior = index.priorById.get(current.ID)
      if (prior === undefined) continue

      const from = prior.colrev_status
      const to = current.colrev_status
      if (from === to) continue

      const operation = operationFor(from, to)
      if (operation !== undefined) {
        operations.add(operation)
        continue
      }
      if (overrideLog.has(current.ID, from, to)) continue

      if (config.strict) {
        throw new StatusTransitionError(
          from,
          to,
          current.ID,
          `allowed transitions: ${allowedNext(from).join(', ') || 'none'}`
        )
      }

      failures.push({
        kind: 'status-transition',
        check: 'status-transitions',
        recordIds: [current.ID],
        message: `Record '${current.ID}' moved from '${from}' to '${to}', which is not a legal transition`,
      })
    }

    if (config.requireSingleOperation && operations.size > 1) {
      failures.push({
        kind: 'status-transition',
        check: 'status-transitions',
        recordIds: [],
        message: `Status changes span several operations: ${Array.from(operations).sort().join(', ')}`,
      })
    }

    return failures
  },
}
