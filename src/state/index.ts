export {
  TRANSITIONS,
  INITIAL_STATUSES,
  EXCLUDED_STATUSES,
  TERMINAL_STATUSES,
  MANUAL_STATUSES,
  requireStatus,
  isValidTransition,
  allowedNext,
  operationFor,
  isTerminal,
  isInitial,
  isExcluded,
  isManualState,
  applyTransition,
  type TransitionEdge,
  type TransitionRequest,
  type TransitionOutcome,
} from './record-state-machine.js'
export {
  OverrideLog,
  type OverrideEntry,
  type OverrideRequest,
} from './override-log.js'
export {
  checkOperationPrecondition,
  assertOperationPrecondition,
  type PreconditionResult,
} from './preconditions.js'
export {
  computeStatusStatistics,
  type StatusStatistics,
} from './status-statistics.js'
