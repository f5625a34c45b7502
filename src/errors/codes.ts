/**
 * Error Codes
 *
 * Central definition of every promwire error code with its string identifier
 * and numeric status. Metric codes describe programming or configuration
 * defects; the numeric status only matters when such an error escapes through
 * an HTTP handler.
 */

/**
 * Error code definition with string identifier and numeric status
 */
export interface ErrorCodeDef {
  /** String identifier (e.g., 'LABEL_ARITY_MISMATCH') */
  code: string
  /** Numeric status code (e.g., 500) */
  status: number
  /** Default message */
  message: string
}

export const ErrorCodes = {
  // ─────────────────────────────────────────────────────────────
  // Metric defects
  // ─────────────────────────────────────────────────────────────

  /** Wrong number (or names) of label values for a family */
  LABEL_ARITY_MISMATCH: {
    code: 'LABEL_ARITY_MISMATCH',
    status: 500,
    message: 'Label arity mismatch',
  },

  /** Accumulator applied to the wrong kind, negative counter delta, NaN observation */
  INVALID_OPERATION: {
    code: 'INVALID_OPERATION',
    status: 500,
    message: 'Invalid metric operation',
  },

  /** Two different descriptors registered under one name */
  DUPLICATE_METRIC_NAME: {
    code: 'DUPLICATE_METRIC_NAME',
    status: 500,
    message: 'Duplicate metric name',
  },

  /** Metric or label name outside the exposition token rules */
  INVALID_METRIC_NAME: {
    code: 'INVALID_METRIC_NAME',
    status: 500,
    message: 'Invalid metric name',
  },

  /** Lookup of a family that was never registered */
  UNKNOWN_METRIC: {
    code: 'UNKNOWN_METRIC',
    status: 500,
    message: 'Unknown metric',
  },

  // ─────────────────────────────────────────────────────────────
  // Service errors
  // ─────────────────────────────────────────────────────────────

  /** Request payload or configuration failed validation */
  VALIDATION_ERROR: {
    code: 'VALIDATION_ERROR',
    status: 400,
    message: 'Validation failed',
  },

  /** Resource not found */
  NOT_FOUND: {
    code: 'NOT_FOUND',
    status: 404,
    message: 'Not found',
  },

  /** Internal server error */
  INTERNAL_ERROR: {
    code: 'INTERNAL_ERROR',
    status: 500,
    message: 'Internal error',
  },

  /** Dependency (database) unavailable */
  UNAVAILABLE: {
    code: 'UNAVAILABLE',
    status: 503,
    message: 'Service unavailable',
  },
} as const satisfies Record<string, ErrorCodeDef>

export type ErrorCode = keyof typeof ErrorCodes

function isErrorCode(code: string): code is ErrorCode {
  return Object.prototype.hasOwnProperty.call(ErrorCodes, code)
}

/**
 * Get error code definition by string code
 */
export function getErrorCode(code: string): ErrorCodeDef {
  if (isErrorCode(code)) {
    return ErrorCodes[code]
  }

  return {
    code,
    status: 500,
    message: code,
  }
}

/**
 * Get numeric status for a string code
 */
export function getStatusForCode(code: string): number {
  return getErrorCode(code).status
}

/**
 * Check if status code is a client error (4xx)
 */
export function isClientError(status: number): boolean {
  return status >= 400 && status < 500
}
