import { getStatusForCode, type ErrorCode } from './codes.js'

/**
 * Error carrying a string code and an HTTP-compatible status
 */
export class PromwireError extends Error {
  /**
   * Numeric status code (HTTP-compatible)
   */
  public readonly status: number

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    /** Optional explicit status override */
    status?: number
  ) {
    super(message)
    this.name = 'PromwireError'
    this.status = status ?? getStatusForCode(code)
  }

  /**
   * Convert to plain object for serialization
   */
  toJSON(): { code: string; status: number; message: string; details?: unknown } {
    return {
      code: this.code,
      status: this.status,
      message: this.message,
      ...(this.details !== undefined && { details: this.details }),
    }
  }
}

export function isPromwireError(value: unknown): value is PromwireError {
  return value instanceof PromwireError
}
