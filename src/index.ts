/**
 * promwire - Prometheus metrics for HTTP and SQL services
 *
 * One explicit registry, instrumentation that records into it, and an
 * endpoint that renders it.
 */

// === Metrics ===
export {
  createRegistry,
  MetricFamily,
  createDescriptor,
  sameDescriptor,
  createSeries,
  increment,
  set,
  add,
  observe,
  assign,
  snapshot,
  exportPrometheus,
  exportJson,
  formatValue,
  defaultCollectors,
  DEFAULT_HISTOGRAM_BUCKETS,
  DEFAULT_METRICS,
  PROMETHEUS_CONTENT_TYPE,
} from './metrics/index.js'
export type {
  MetricRegistry,
  RegistryOptions,
  MetricKind,
  Labels,
  LabelValues,
  MetricOptions,
  HistogramOptions,
  MetricDescriptor,
  DescriptorInput,
  LabeledSeries,
  SeriesSnapshot,
  HistogramBucket,
  CollectFn,
  JsonFamily,
  JsonSeries,
  DefaultCollector,
} from './metrics/index.js'

// === Instrumentation ===
export {
  createHttpMetrics,
  createQueryMetrics,
  createPoolMetrics,
  instrumentQueryable,
  parseOperation,
  HTTP_METRICS,
  DB_METRICS,
  POOL_METRICS,
  DEFAULT_HTTP_BUCKETS,
  DEFAULT_DB_BUCKETS,
} from './instrumentation/index.js'
export type {
  HttpMetrics,
  HttpMetricsOptions,
  QueryMetrics,
  QueryMetricsOptions,
  QueryStart,
  Queryable,
  QueryResultLike,
  SqlOperation,
  PoolMetrics,
  PoolStatus,
  PoolStatusReader,
} from './instrumentation/index.js'

// === HTTP ===
export { HttpApp, HttpContext, serve, metricsHandler, healthHandler } from './http/index.js'
export type {
  HttpHandler,
  HttpMiddleware,
  ManagedServer,
  ServeOptions,
  BeforeRenderHook,
  HealthCheckFn,
} from './http/index.js'

// === Errors ===
export { PromwireError, Errors, ErrorCodes, isPromwireError } from './errors/index.js'
export type { ErrorCode } from './errors/index.js'

// === Config ===
export { loadConfig, ConfigSchema, type Config } from './config/index.js'

// === Logging ===
export { createLogger, setLogLevel } from './utils/logger.js'
