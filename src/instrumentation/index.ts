/**
 * Instrumentation
 *
 * Request, query and pool metrics recorded into an explicit registry.
 */

export {
  createHttpMetrics,
  HTTP_METRICS,
  DEFAULT_HTTP_BUCKETS,
  type HttpMetrics,
  type HttpMetricsOptions,
} from './http.js'

export {
  createQueryMetrics,
  instrumentQueryable,
  parseOperation,
  DB_METRICS,
  DEFAULT_DB_BUCKETS,
  type Queryable,
  type QueryResultLike,
  type QueryMetrics,
  type QueryMetricsOptions,
  type QueryStart,
  type SqlOperation,
} from './db.js'

export {
  createPoolMetrics,
  PoolStatusSchema,
  POOL_METRICS,
  type PoolMetrics,
  type PoolStatus,
  type PoolStatusReader,
} from './pool.js'
