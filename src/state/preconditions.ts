/**
 * Ordering constraints between operations
 * @module state/preconditions
 */

import type { BibRecord } from '../types/record.js'
import type { OperationType } from '../types/status.js'
import { isOperationType, statusRank } from '../types/status.js'
import { ProcessOrderViolationError, VocabularyError } from '../utils/errors.js'
import { TRANSITIONS, isTerminal } from './record-state-machine.js'

export interface PreconditionResult {
  operation: OperationType
  satisfied: boolean
  /** Records still waiting for an earlier operation */
  blockingRecordIds: string[]
}

/**
 * Lists the records that keep `operation` from running: those whose status
 * comes before every status the operation starts from. Records that left the
 * pipeline never block.
 *
 * @example
 * ```typescript
 * checkOperationPrecondition('dedupe', records)
 * // { operation: 'dedupe', satisfied: false, blockingRecordIds: ['Doe2020'] }
 * // when Doe2020 is still md_imported
 * ```
 */
export function checkOperationPrecondition(
  operation: string,
  records: readonly BibRecord[]
): PreconditionResult {
  if (!isOperationType(operation)) {
    throw new VocabularyError('operation', operation)
  }

  const earliest = Math.min(
    ...TRANSITIONS.filter((edge) => edge.operation === operation).map((edge) =>
      statusRank(edge.from)
    )
  )

  const blockingRecordIds = records
    .filter(
      (record) =>
        statusRank(record.colrev_status) < earliest &&
        !isTerminal(record.colrev_status)
    )
    .map((record) => record.ID)

  return {
    operation,
    satisfied: blockingRecordIds.length === 0,
    blockingRecordIds,
  }
}

/**
 * @throws {ProcessOrderViolationError} When any record blocks the operation
 */
export function assertOperationPrecondition(
  operation: string,
  records: readonly BibRecord[]
): void {
  const result = checkOperationPrecondition(operation, records)
  if (!result.satisfied) {
    throw new ProcessOrderViolationError(operation, result.blockingRecordIds)
  }
}
