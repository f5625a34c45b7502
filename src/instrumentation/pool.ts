/**
 * Connection Pool Gauges
 *
 * Checked-out, idle and waiting counts, read from the pool right before a
 * scrape. A status that does not have the expected shape is logged and
 * skipped; the gauges keep their previous values.
 */

import { z } from 'zod'
import type { MetricFamily, MetricRegistry } from '../metrics/index.js'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('pool-metrics')

export const POOL_METRICS = {
  CHECKED_OUT: 'db_pool_checked_out_connections',
  IDLE: 'db_pool_idle_connections',
  WAITERS: 'db_pool_waiters',
} as const

/** Counters exposed by a pg Pool */
export const PoolStatusSchema = z
  .object({
    totalCount: z.number().int().nonnegative(),
    idleCount: z.number().int().nonnegative(),
    waitingCount: z.number().int().nonnegative(),
  })
  .refine((s) => s.idleCount <= s.totalCount, {
    message: 'idleCount exceeds totalCount',
  })

export type PoolStatus = z.infer<typeof PoolStatusSchema>

/** Point-in-time read of the pool; a pg Pool itself qualifies via () => pool */
export type PoolStatusReader = () => unknown

export interface PoolMetrics {
  readonly checkedOut: MetricFamily
  readonly idle: MetricFamily
  readonly waiters: MetricFamily
  /** Read the pool once and update the gauges. Never throws. */
  refresh(): void
}

export function createPoolMetrics(registry: MetricRegistry, readStatus: PoolStatusReader): PoolMetrics {
  const checkedOut = registry.gauge(POOL_METRICS.CHECKED_OUT, {
    help: 'Connections currently checked out of the pool',
  })
  const idle = registry.gauge(POOL_METRICS.IDLE, {
    help: 'Idle connections in the pool',
  })
  const waiters = registry.gauge(POOL_METRICS.WAITERS, {
    help: 'Callers waiting for a pooled connection',
  })

  function read(): unknown {
    try {
      return readStatus()
    } catch (err) {
      logger.warn({ err }, 'Pool status read failed')
      return undefined
    }
  }

  return {
    checkedOut,
    idle,
    waiters,

    refresh() {
      const raw = read()
      if (raw === undefined) return

      const parsed = PoolStatusSchema.safeParse(raw)
      if (!parsed.success) {
        logger.warn({ issues: parsed.error.issues }, 'Unexpected pool status, skipping update')
        return
      }

      const { totalCount, idleCount, waitingCount } = parsed.data
      checkedOut.set(totalCount - idleCount)
      idle.set(idleCount)
      waiters.set(waitingCount)
    },
  }
}
