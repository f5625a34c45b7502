/**
 * Query Instrumentation
 *
 * Times SQL queries and counts them by operation. Statements other than
 * select, insert, update and delete are not recorded.
 */

import type { MetricFamily, MetricRegistry } from '../metrics/index.js'

export const DB_METRICS = {
  QUERIES_TOTAL: 'db_queries_total',
  QUERY_DURATION: 'db_query_duration_seconds',
} as const

export const DEFAULT_DB_BUCKETS: readonly number[] = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5]

export type SqlOperation = 'select' | 'insert' | 'update' | 'delete'

const OPERATIONS: ReadonlySet<string> = new Set<SqlOperation>(['select', 'insert', 'update', 'delete'])

function isSqlOperation(token: string): token is SqlOperation {
  return OPERATIONS.has(token)
}

/**
 * Operation label of a statement: its first word, lower-cased
 *
 * @example
 * parseOperation('  UPDATE users SET x=1') // 'update'
 * parseOperation('BEGIN')                  // undefined
 */
export function parseOperation(sql: string): SqlOperation | undefined {
  const [token = ''] = sql.trim().split(/\s+/, 1)
  const operation = token.toLowerCase()
  return isSqlOperation(operation) ? operation : undefined
}

/** Returned by onQueryStart, handed back to onQueryEnd */
export interface QueryStart {
  readonly operation: SqlOperation | undefined
  readonly startedAt: number
}

export interface QueryMetricsOptions {
  /** Duration buckets in seconds (default: DEFAULT_DB_BUCKETS) */
  buckets?: readonly number[]
}

export interface QueryMetrics {
  readonly queries: MetricFamily
  readonly duration: MetricFamily
  onQueryStart(sql: string): QueryStart
  onQueryEnd(start: QueryStart): void
}

export function createQueryMetrics(registry: MetricRegistry, options: QueryMetricsOptions = {}): QueryMetrics {
  const queries = registry.counter(DB_METRICS.QUERIES_TOTAL, {
    help: 'Total DB queries',
    labelNames: ['operation'],
  })
  const duration = registry.histogram(DB_METRICS.QUERY_DURATION, {
    help: 'DB query duration',
    labelNames: ['operation'],
    buckets: options.buckets ?? DEFAULT_DB_BUCKETS,
  })

  return {
    queries,
    duration,

    onQueryStart(sql) {
      return { operation: parseOperation(sql), startedAt: performance.now() }
    },

    onQueryEnd({ operation, startedAt }) {
      if (!operation) return
      const seconds = (performance.now() - startedAt) / 1000
      queries.inc({ operation })
      duration.observe(seconds, { operation })
    },
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Queryable wrapper
// ─────────────────────────────────────────────────────────────────────────────

/** Result shape shared by pg's Pool, Client and PoolClient */
export interface QueryResultLike {
  rows: unknown[]
  rowCount: number | null
}

/** Anything with a pg-style query(text, values) */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>
}

/**
 * Wrap a Queryable so every call is timed. Failed queries are recorded
 * as well; their error is rethrown unchanged.
 */
export function instrumentQueryable(target: Queryable, metrics: QueryMetrics): Queryable {
  return {
    async query(text, values) {
      const start = metrics.onQueryStart(text)
      try {
        return await target.query(text, values)
      } finally {
        metrics.onQueryEnd(start)
      }
    },
  }
}
