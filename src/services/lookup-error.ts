/**
 * Error classes for candidate lookups against external catalog services
 * @module services/lookup-error
 */

/**
 * Categories of lookup failure
 */
export type LookupErrorType = 'timeout' | 'network' | 'server' | 'validation'

/**
 * Base error class for all lookup failures. A lookup failure is never
 * equivalent to an empty candidate list.
 */
export class LookupError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string

  /** Error type for categorization */
  public readonly type: LookupErrorType

  /** Whether a caller may retry the lookup */
  public readonly retryable: boolean

  /** Additional error context */
  public readonly context?: Record<string, unknown>

  constructor(
    message: string,
    code: string,
    type: LookupErrorType,
    retryable: boolean,
    context?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'LookupError'
    this.code = code
    this.type = type
    this.retryable = retryable
    this.context = context

    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Error thrown when a lookup times out
 */
export class LookupTimeoutError extends LookupError {
  /** Timeout duration in milliseconds */
  public readonly timeoutMs: number

  /** Source that timed out */
  public readonly sourceName: string

  constructor(
    sourceName: string,
    timeoutMs: number,
    context?: Record<string, unknown>
  ) {
    super(
      `Lookup in '${sourceName}' timed out after ${timeoutMs}ms`,
      'LOOKUP_TIMEOUT',
      'timeout',
      true,
      { sourceName, timeoutMs, ...context }
    )
    this.name = 'LookupTimeoutError'
    this.sourceName = sourceName
    this.timeoutMs = timeoutMs
  }
}

/**
 * Error thrown when the transport to a source fails
 */
export class LookupNetworkError extends LookupError {
  public readonly sourceName: string

  constructor(
    sourceName: string,
    message: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(
      `Network error in '${sourceName}': ${message}`,
      'LOOKUP_NETWORK_ERROR',
      'network',
      true,
      { sourceName, originalMessage: message, ...context }
    )
    this.name = 'LookupNetworkError'
    this.sourceName = sourceName
    this.cause = cause
  }
}

/**
 * Error thrown when a source answers with an error status
 */
export class LookupServerError extends LookupError {
  public readonly sourceName: string

  /** HTTP status code */
  public readonly statusCode: number

  constructor(
    sourceName: string,
    statusCode: number,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(
      `Server error in '${sourceName}' (HTTP ${statusCode}): ${message}`,
      'LOOKUP_SERVER_ERROR',
      'server',
      statusCode >= 500,
      { sourceName, statusCode, originalMessage: message, ...context }
    )
    this.name = 'LookupServerError'
    this.sourceName = sourceName
    this.statusCode = statusCode
  }
}

/**
 * Error thrown when a source is asked for an identifier kind it cannot search
 */
export class UnsupportedIdentifierError extends LookupError {
  public readonly sourceName: string
  public readonly kind: string

  constructor(sourceName: string, kind: string) {
    super(
      `Source '${sourceName}' cannot search by '${kind}'`,
      'UNSUPPORTED_IDENTIFIER',
      'validation',
      false,
      { sourceName, kind }
    )
    this.name = 'UnsupportedIdentifierError'
    this.sourceName = sourceName
    this.kind = kind
  }
}

/**
 * Checks if an error is a LookupError
 */
export function isLookupError(error: unknown): error is LookupError {
  return error instanceof LookupError
}
