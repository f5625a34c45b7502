/**
 * Metrics Endpoint
 *
 * Serves the registry in the Prometheus text format.
 *
 * @example
 * app.get('/metrics', metricsHandler(registry, {
 *   beforeRender: [() => poolMetrics.refresh()],
 * }))
 */

import type { MetricRegistry } from '../metrics/index.js'
import { createLogger } from '../utils/logger.js'
import type { HttpHandler } from './app.js'

const logger = createLogger('metrics-endpoint')

/** Runs before every scrape, e.g. to refresh gauges read from a pool */
export type BeforeRenderHook = () => void | Promise<void>

export interface MetricsHandlerOptions {
  beforeRender?: BeforeRenderHook[]
}

export function metricsHandler(registry: MetricRegistry, options: MetricsHandlerOptions = {}): HttpHandler {
  const hooks = options.beforeRender ?? []

  return async (c) => {
    for (const hook of hooks) {
      try {
        await hook()
      } catch (err) {
        logger.warn({ err }, 'Before-render hook failed')
      }
    }

    return c.text(registry.render(), 200, { 'Content-Type': registry.contentType })
  }
}
