/**
 * Zod Validation Helpers
 *
 * Turn zod issues into VALIDATION_ERROR with one field/reason pair per issue.
 */

import type { z } from 'zod'
import { Errors, type PromwireError } from '../errors/index.js'

export interface ValidationIssue {
  field: string
  reason: string
}

/**
 * Convert zod issues to field/reason pairs; the path is dot-joined, 'root'
 * when empty
 */
export function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.map(String).join('.') || 'root',
    reason: issue.message,
  }))
}

export function validationError(error: z.ZodError): PromwireError {
  return Errors.validation(toIssues(error))
}

/**
 * Parse data with a schema, throwing VALIDATION_ERROR on failure
 */
export function parseOrThrow<S extends z.ZodType>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data)
  if (!result.success) {
    throw validationError(result.error)
  }
  return result.data
}
