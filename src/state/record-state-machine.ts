/**
 * Record lifecycle: legal statuses and transitions
 * @module state/record-state-machine
 */

import type { OperationType, RecordStatus } from '../types/status.js'
import { isOperationType, isRecordStatus } from '../types/status.js'
import {
  StatusTransitionError,
  VocabularyError,
  requireNonEmptyString,
} from '../utils/errors.js'
import { OverrideLog } from './override-log.js'
import type { OverrideEntry } from './override-log.js'

export interface TransitionEdge {
  from: RecordStatus
  to: RecordStatus
  operation: OperationType
}

function edges(
  from: RecordStatus,
  to: RecordStatus[],
  operation: OperationType
): TransitionEdge[] {
  return to.map((target) => ({ from, to: target, operation }))
}

/**
 * Every legal status change and the operation performing it. Manual states
 * are reachable in both directions from their automatic counterpart.
 */
export const TRANSITIONS: readonly TransitionEdge[] = [
  ...edges('md_retrieved', ['md_imported'], 'load'),
  ...edges('md_imported', ['md_needs_manual_preparation', 'md_prepared'], 'prep'),
  ...edges('md_needs_manual_preparation', ['md_prepared'], 'prep_man'),
  ...edges('md_prepared', ['md_needs_manual_preparation'], 'prep_man'),
  ...edges('md_prepared', ['md_needs_manual_deduplication', 'md_processed'], 'dedupe'),
  ...edges('md_needs_manual_deduplication', ['md_processed'], 'dedupe_man'),
  ...edges('md_processed', ['md_needs_manual_deduplication'], 'dedupe_man'),
  ...edges('md_processed', ['rev_prescreen_excluded', 'rev_prescreen_included'], 'prescreen'),
  ...edges('rev_prescreen_included', ['pdf_needs_manual_retrieval', 'pdf_imported'], 'pdf_get'),
  ...edges('pdf_needs_manual_retrieval', ['pdf_imported', 'pdf_not_available'], 'pdf_get_man'),
  ...edges('pdf_imported', ['pdf_needs_manual_retrieval'], 'pdf_get_man'),
  ...edges('pdf_imported', ['pdf_needs_manual_preparation', 'pdf_prepared'], 'pdf_prep'),
  ...edges('pdf_needs_manual_preparation', ['pdf_prepared'], 'pdf_prep_man'),
  ...edges('pdf_prepared', ['pdf_needs_manual_preparation'], 'pdf_prep_man'),
  ...edges('pdf_prepared', ['rev_excluded', 'rev_included'], 'screen'),
  ...edges('rev_included', ['rev_synthesized'], 'data'),
]

export const INITIAL_STATUSES: readonly RecordStatus[] = [
  'md_retrieved',
  'md_imported',
]

export const EXCLUDED_STATUSES: readonly RecordStatus[] = [
  'rev_prescreen_excluded',
  'pdf_not_available',
  'rev_excluded',
]

export const TERMINAL_STATUSES: readonly RecordStatus[] = [
  ...EXCLUDED_STATUSES,
  'rev_synthesized',
]

export const MANUAL_STATUSES: readonly RecordStatus[] = [
  'md_needs_manual_preparation',
  'md_needs_manual_deduplication',
  'pdf_needs_manual_retrieval',
  'pdf_needs_manual_preparation',
]

/**
 * Narrows an external status string, raising on values outside the vocabulary.
 */
export function requireStatus(value: string): RecordStatus {
  if (!isRecordStatus(value)) {
    throw new VocabularyError('record status', value)
  }
  return value
}

function findEdge(from: string, to: string): TransitionEdge | undefined {
  const source = requireStatus(from)
  const target = requireStatus(to)
  return TRANSITIONS.find((edge) => edge.from === source && edge.to === target)
}

export function isValidTransition(from: string, to: string): boolean {
  return findEdge(from, to) !== undefined
}

/**
 * Statuses reachable from `from` in one step, in table order.
 */
export function allowedNext(from: string): RecordStatus[] {
  const source = requireStatus(from)
  return TRANSITIONS.filter((edge) => edge.from === source).map(
    (edge) => edge.to
  )
}

/**
 * Operation that moves a record from `from` to `to`, if the edge exists.
 */
export function operationFor(
  from: string,
  to: string
): OperationType | undefined {
  return findEdge(from, to)?.operation
}

export function isTerminal(status: string): boolean {
  return TERMINAL_STATUSES.includes(requireStatus(status))
}

export function isInitial(status: string): boolean {
  return INITIAL_STATUSES.includes(requireStatus(status))
}

/**
 * Whether the record left the review on one of the rejection branches.
 */
export function isExcluded(status: string): boolean {
  return EXCLUDED_STATUSES.includes(requireStatus(status))
}

export function isManualState(status: string): boolean {
  return MANUAL_STATUSES.includes(requireStatus(status))
}

/**
 * A requested status change. Automatic requests must follow the transition
 * table; manual overrides skip it and are written to the override log.
 */
export type TransitionRequest =
  | {
      kind: 'automatic'
      to: RecordStatus
      /** When given, must be the operation owning the edge */
      operation?: OperationType
    }
  | {
      kind: 'manual-override'
      recordId: string
      to: RecordStatus
      reason: string
      authorizedBy: string
    }

export interface TransitionOutcome {
  from: RecordStatus
  to: RecordStatus
  /** Operation of the edge taken; absent for overrides off the table */
  operation?: OperationType
  override?: OverrideEntry
}

/**
 * Validates and performs a status change.
 *
 * @param overrideLog - Log receiving manual overrides. Without one the entry
 *   is still created and returned, for the caller to persist.
 * @throws {StatusTransitionError} When an automatic request is not an edge of
 *   the table or names the wrong operation
 */
export function applyTransition(
  from: string,
  request: TransitionRequest,
  overrideLog: OverrideLog = new OverrideLog()
): TransitionOutcome {
  const source = requireStatus(from)
  const target = requireStatus(request.to)

  if (request.kind === 'manual-override') {
    requireNonEmptyString(request.reason, 'reason')
    requireNonEmptyString(request.authorizedBy, 'authorizedBy')
    const override = overrideLog.record({
      recordId: request.recordId,
      from: source,
      to: target,
      reason: request.reason,
      authorizedBy: request.authorizedBy,
    })
    return {
      from: source,
      to: target,
      operation: operationFor(source, target),
      override,
    }
  }

  if (request.operation !== undefined && !isOperationType(request.operation)) {
    throw new VocabularyError('operation', request.operation)
  }

  const edge = findEdge(source, target)
  if (edge === undefined) {
    const next = allowedNext(source)
    const reason =
      next.length === 0
        ? `'${source}' is a final state`
        : `allowed transitions: ${next.join(', ')}`
    throw new StatusTransitionError(source, target, undefined, reason)
  }

  if (request.operation !== undefined && request.operation !== edge.operation) {
    throw new StatusTransitionError(
      source,
      target,
      undefined,
      `performed by '${edge.operation}', not '${request.operation}'`
    )
  }

  return { from: source, to: target, operation: edge.operation }
}
