/**
 * HTTP Request Instrumentation
 *
 * Counts requests, times them and tracks how many are in flight.
 *
 * @example
 * const httpMetrics = createHttpMetrics(registry)
 * app.use(httpMetrics.middleware())
 */

import type { HttpMiddleware } from '../http/app.js'
import type { MetricFamily, MetricRegistry } from '../metrics/index.js'

export const HTTP_METRICS = {
  REQUESTS_TOTAL: 'http_requests_total',
  REQUEST_DURATION: 'http_request_duration_seconds',
  IN_PROGRESS: 'inprogress_requests',
} as const

export const DEFAULT_HTTP_BUCKETS: readonly number[] = [0.1, 0.3, 0.5, 1, 3, 5]

const REQUEST_LABELS = ['method', 'endpoint', 'http_status'] as const

export interface HttpMetricsOptions {
  /** Latency buckets in seconds (default: DEFAULT_HTTP_BUCKETS) */
  buckets?: readonly number[]
}

export interface HttpMetrics {
  readonly requests: MetricFamily
  readonly duration: MetricFamily
  readonly inProgress: MetricFamily
  /** Middleware recording every request that passes through it */
  middleware(): HttpMiddleware
}

export function createHttpMetrics(registry: MetricRegistry, options: HttpMetricsOptions = {}): HttpMetrics {
  const requests = registry.counter(HTTP_METRICS.REQUESTS_TOTAL, {
    help: 'Total HTTP requests',
    labelNames: REQUEST_LABELS,
  })
  const duration = registry.histogram(HTTP_METRICS.REQUEST_DURATION, {
    help: 'HTTP request latency',
    labelNames: REQUEST_LABELS,
    buckets: options.buckets ?? DEFAULT_HTTP_BUCKETS,
  })
  const inProgress = registry.gauge(HTTP_METRICS.IN_PROGRESS, {
    help: 'In-progress HTTP requests',
  })

  function record(method: string, endpoint: string, status: number, start: number): void {
    const labels = { method, endpoint, http_status: status }
    requests.inc(labels)
    duration.observe((performance.now() - start) / 1000, labels)
  }

  return {
    requests,
    duration,
    inProgress,

    middleware() {
      return async (c, next) => {
        inProgress.add(1)
        const start = performance.now()
        try {
          await next()
          record(c.req.method, c.req.path, c.res?.status ?? 500, start)
        } catch (error) {
          record(c.req.method, c.req.path, 500, start)
          throw error
        } finally {
          inProgress.add(-1)
        }
      }
    },
  }
}
