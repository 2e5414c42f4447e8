/**
 * Central error classes and validation utilities for the reconciliation engine
 * @module utils/errors
 */

/**
 * Base error class for all reconciliation errors
 */
export class ReconcilerError extends Error {
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
    this.name = 'ReconcilerError'
    this.code = code
    this.context = context

    // Maintains proper stack trace (Node.js specific)
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a required parameter is missing
 */
export class MissingParameterError extends ReconcilerError {
  public readonly parameterName: string

  constructor(parameterName: string, context?: Record<string, unknown>) {
    super(
      `Missing required parameter: '${parameterName}'`,
      'MISSING_PARAMETER',
      { parameterName, ...context }
    )
    this.name = 'MissingParameterError'
    this.parameterName = parameterName
  }
}

/**
 * Error thrown when a parameter value is invalid
 */
export class InvalidParameterError extends ReconcilerError {
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
export class ConfigurationError extends ReconcilerError {
  public readonly field?: string

  constructor(message: string, field?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', { field, ...context })
    this.name = 'ConfigurationError'
    this.field = field
  }
}

// ==================== PRECONDITION VIOLATIONS ====================

/**
 * Base class for violations that abort processing of a record
 */
export class PreconditionError extends ReconcilerError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'PreconditionError'
  }
}

/**
 * Error thrown when a cataloging record has no vendor information
 */
export class VendorInfoMissingError extends PreconditionError {
  public readonly recordId: string | null

  constructor(recordId: string | null) {
    super(
      `Cataloging record '${recordId ?? 'unidentified'}' has no vendor information`,
      'VENDOR_INFO_MISSING',
      { recordId }
    )
    this.name = 'VendorInfoMissingError'
    this.recordId = recordId
  }
}

/**
 * Error thrown when an acquisitions or selection batch has no matchpoints
 */
export class MatchpointsMissingError extends PreconditionError {
  public readonly workflow: string

  constructor(workflow: string) {
    super(
      `Matchpoints are required for '${workflow}' batches`,
      'MATCHPOINTS_MISSING',
      { workflow }
    )
    this.name = 'MatchpointsMissingError'
    this.workflow = workflow
  }
}

/**
 * Error thrown when an acquisitions or selection batch has no template data
 */
export class TemplateMissingError extends PreconditionError {
  public readonly workflow: string

  constructor(workflow: string) {
    super(
      `Order template data is required for '${workflow}' batches`,
      'TEMPLATE_MISSING',
      { workflow }
    )
    this.name = 'TemplateMissingError'
    this.workflow = workflow
  }
}

/**
 * Error thrown when no analyzer exists for a workflow, library and collection
 */
export class UnsupportedAnalyzerError extends PreconditionError {
  constructor(workflow: string, library: string, collection: string) {
    super(
      `No analyzer for workflow '${workflow}', library '${library}', collection '${collection}'`,
      'UNSUPPORTED_ANALYZER',
      { workflow, library, collection }
    )
    this.name = 'UnsupportedAnalyzerError'
  }
}

// ==================== DATA INTEGRITY VIOLATIONS ====================

/**
 * Base class for violations that abort a whole batch
 */
export class DataIntegrityError extends ReconcilerError {
  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message, code, context)
    this.name = 'DataIntegrityError'
  }
}

/**
 * Error thrown when a rebuilt call number differs from the original
 */
export class CallNumberIntegrityError extends DataIntegrityError {
  public readonly original: string
  public readonly reconstructed: string

  constructor(original: string, reconstructed: string) {
    super(
      `Constructed call number does not match original. New call number: '${reconstructed}', Original call number: '${original}'`,
      'CALL_NUMBER_INTEGRITY',
      { original, reconstructed }
    )
    this.name = 'CallNumberIntegrityError'
    this.original = original
    this.reconstructed = reconstructed
  }
}

/**
 * Error thrown when incoming records share item barcodes
 */
export class DuplicateBarcodeError extends DataIntegrityError {
  public readonly barcodes: readonly string[]

  constructor(barcodes: readonly string[]) {
    super(
      `Duplicate barcodes found in batch: ${barcodes.join(', ')}`,
      'DUPLICATE_BARCODE',
      { barcodes }
    )
    this.name = 'DuplicateBarcodeError'
    this.barcodes = barcodes
  }
}

/**
 * Error thrown when a batch is aborted before the deduplication barrier
 */
export class BatchCancelledError extends ReconcilerError {
  public readonly completed: number
  public readonly total: number

  constructor(completed: number, total: number) {
    super(
      `Batch cancelled after ${completed} of ${total} records`,
      'BATCH_CANCELLED',
      { completed, total }
    )
    this.name = 'BatchCancelledError'
    this.completed = completed
    this.total = total
  }
}

// ==================== VALIDATION UTILITIES ====================

/**
 * Validates that a value is not null or undefined
 */
export function requireNonNull<T>(
  value: T | null | undefined,
  parameterName: string
): T {
  if (value === null || value === undefined) {
    throw new MissingParameterError(parameterName)
  }
  return value
}

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
 * Check whether a value is a plain object (not null, not array)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Check if an error belongs to the reconciliation hierarchy
 */
export function isReconcilerError(error: unknown): error is ReconcilerError {
  return error instanceof ReconcilerError
}
