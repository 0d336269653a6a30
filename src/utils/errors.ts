/**
 * Central error classes and validation utilities for bib-integrity
 * @module utils/errors
 */

/**
 * Base error class for all bib-integrity errors
 */
export class BibIntegrityError extends Error {
  /** Error code for programmatic error handling */
  public readonly code: string

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'BibIntegrityError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a value falls outside a fixed vocabulary
 * (status, entry type, operation). Indicates a caller bug, not data noise.
 */
export class VocabularyError extends BibIntegrityError {
  public readonly vocabulary: string
  public readonly value: unknown

  constructor(vocabulary: string, value: unknown, context?: Record<string, unknown>) {
    super(
      `Unknown ${vocabulary}: '${String(value)}'`,
      'UNKNOWN_VOCABULARY_VALUE',
      { vocabulary, value, ...context }
    )
    this.name = 'VocabularyError'
    this.vocabulary = vocabulary
    this.value = value
  }
}

/**
 * Error thrown when a raw record cannot be turned into a typed record
 */
export class RecordValidationError extends BibIntegrityError {
  public readonly field: string

  constructor(field: string, reason: string, context?: Record<string, unknown>) {
    super(
      `Record validation failed for '${field}': ${reason}`,
      'RECORD_VALIDATION_ERROR',
      { field, reason, ...context }
    )
    this.name = 'RecordValidationError'
    this.field = field
  }
}

/**
 * Error thrown for a status change that is not an edge of the record
 * state machine
 */
export class StatusTransitionError extends BibIntegrityError {
  public readonly recordId?: string
  public readonly from: string
  public readonly to: string

  constructor(
    from: string,
    to: string,
    recordId?: string,
    reason?: string
  ) {
    const subject = recordId ? ` for record '${recordId}'` : ''
    const message = reason
      ? `Invalid status transition${subject} from '${from}' to '${to}': ${reason}`
      : `Invalid status transition${subject} from '${from}' to '${to}'`

    super(message, 'INVALID_STATUS_TRANSITION', { recordId, from, to, reason })
    this.name = 'StatusTransitionError'
    this.recordId = recordId
    this.from = from
    this.to = to
  }
}

/**
 * Error thrown when an operation is started while records still wait for
 * an earlier operation
 */
export class ProcessOrderViolationError extends BibIntegrityError {
  public readonly operation: string
  public readonly blockingRecordIds: string[]

  constructor(operation: string, blockingRecordIds: string[]) {
    const preview = blockingRecordIds.slice(0, 5).join(', ')
    const more =
      blockingRecordIds.length > 5 ? ` and ${blockingRecordIds.length - 5} more` : ''
    super(
      `Operation '${operation}' cannot start: records not ready (${preview}${more})`,
      'PROCESS_ORDER_VIOLATION',
      { operation, blockingRecordIds }
    )
    this.name = 'ProcessOrderViolationError'
    this.operation = operation
    this.blockingRecordIds = blockingRecordIds
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends BibIntegrityError {
  public readonly parameterName: string
  public readonly value: unknown
  public readonly reason: string

  constructor(
    parameterName: string,
    value: unknown,
    reason: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Invalid parameter '${parameterName}': ${reason}`,
      'INVALID_PARAMETER',
      { parameterName, value, reason, ...context }
    )
    this.name = 'InvalidParameterError'
    this.parameterName = parameterName
    this.value = value
    this.reason = reason
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends BibIntegrityError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a number is positive (> 0)
 */
export function requirePositive(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value <= 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be positive (> 0)'
    )
  }
  return value
}

/**
 * Validates that a number is non-negative (>= 0)
 */
export function requireNonNegative(value: number, parameterName: string): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be non-negative (>= 0)'
    )
  }
  return value
}

/**
 * Validates that a number is within a specific range (inclusive)
 */
export function requireInRange(
  value: number,
  min: number,
  max: number,
  parameterName: string
): number {
  if (typeof value !== 'number' || isNaN(value)) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a number'
    )
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(
      parameterName,
      value,
      `must be between ${min} and ${max} (inclusive)`
    )
  }
  return value
}

/**
 * Validates that a string is non-empty
 */
export function requireNonEmptyString(value: string, parameterName: string): string {
  if (typeof value !== 'string') {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must be a string'
    )
  }
  if (value.trim().length === 0) {
    throw new InvalidParameterError(
      parameterName,
      value,
      'must not be empty'
    )
  }
  return value
}

/**
 * Check if an error is a bib-integrity error
 */
export function isBibIntegrityError(error: unknown): error is BibIntegrityError {
  return error instanceof BibIntegrityError
}
