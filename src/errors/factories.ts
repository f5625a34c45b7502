/**
 * Error Factories
 *
 * Pre-built error helpers so every call site reports the same defect the
 * same way.
 *
 * @example
 * ```typescript
 * throw Errors.labelArity('http_requests_total', ['method', 'endpoint'], ['GET'])
 * // { code: 'LABEL_ARITY_MISMATCH', status: 500,
 * //   message: "Metric 'http_requests_total' expects 2 label values (method, endpoint), got 1" }
 * ```
 */

import { PromwireError } from './error.js'

export const Errors = {
  /**
   * Wrong number of label values for a family
   */
  labelArity(
    metric: string,
    labelNames: readonly string[],
    labelValues: readonly string[]
  ): PromwireError {
    return new PromwireError(
      'LABEL_ARITY_MISMATCH',
      `Metric '${metric}' expects ${labelNames.length} label values (${labelNames.join(', ')}), got ${labelValues.length}`,
      { metric, labelNames, labelValues }
    )
  },

  /**
   * Label record whose keys do not match the declared label names
   */
  labelNames(metric: string, expected: readonly string[], provided: readonly string[]): PromwireError {
    return new PromwireError(
      'LABEL_ARITY_MISMATCH',
      `Metric '${metric}' has labels [${expected.join(', ')}], got [${provided.join(', ')}]`,
      { metric, expected, provided }
    )
  },

  /**
   * Accumulator not valid for the metric, or value rejected by it
   */
  invalidOperation(metric: string, reason: string): PromwireError {
    return new PromwireError('INVALID_OPERATION', `Metric '${metric}': ${reason}`, {
      metric,
      reason,
    })
  },

  /**
   * A different descriptor is already registered under this name
   */
  duplicateMetric(metric: string): PromwireError {
    return new PromwireError(
      'DUPLICATE_METRIC_NAME',
      `Metric '${metric}' is already registered with a different descriptor`,
      { metric }
    )
  },

  invalidName(kind: 'metric' | 'label', name: string, reason?: string): PromwireError {
    const suffix = reason ? `: ${reason}` : ''
    return new PromwireError('INVALID_METRIC_NAME', `Invalid ${kind} name '${name}'${suffix}`, {
      kind,
      name,
    })
  },

  unknownMetric(metric: string): PromwireError {
    return new PromwireError('UNKNOWN_METRIC', `Metric '${metric}' is not registered`, { metric })
  },

  /**
   * Validation error
   * @param issues - Field-level messages, joined into the error message
   */
  validation(issues: Array<{ field: string; reason: string }>): PromwireError {
    const message = issues.map((i) => `${i.field}: ${i.reason}`).join('; ')
    return new PromwireError('VALIDATION_ERROR', message, { issues })
  },

  /**
   * Resource not found
   */
  notFound(resource: string, id?: string | number): PromwireError {
    const message = id !== undefined ? `${resource} '${id}' not found` : `${resource} not found`
    return new PromwireError('NOT_FOUND', message, { resource, id })
  },

  internal(message = 'Internal error', details?: unknown): PromwireError {
    return new PromwireError('INTERNAL_ERROR', message, details)
  },

  unavailable(service: string, reason?: string): PromwireError {
    const message = reason ? `${service} unavailable: ${reason}` : `${service} unavailable`
    return new PromwireError('UNAVAILABLE', message, { service })
  },
}
