/**
 * Health Check Endpoint
 *
 * Verifies database connectivity with a trivial query.
 *
 * @example
 * app.get('/health', healthHandler([() => repository.ping()]))
 */

import { createLogger } from '../utils/logger.js'
import type { HttpHandler } from './app.js'

const logger = createLogger('health')

/** Resolves when the dependency is reachable, rejects otherwise */
export type HealthCheckFn = () => Promise<void>

export interface HealthyResponse {
  status: 'ok'
  database: 'reachable'
}

export interface UnhealthyResponse {
  status: 'error'
  database: 'unreachable'
  detail: string
}

/**
 * 200 when every check resolves; 500 with the first failure's message
 * otherwise
 */
export function healthHandler(checks: HealthCheckFn[]): HttpHandler {
  return async (c) => {
    try {
      for (const check of checks) {
        await check()
      }
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err)
      logger.warn({ err }, 'Health check failed')
      const body: UnhealthyResponse = { status: 'error', database: 'unreachable', detail }
      return c.json(body, 500)
    }

    const body: HealthyResponse = { status: 'ok', database: 'reachable' }
    return c.json(body)
  }
}
