/**
 * Metrics System Types
 *
 * Prometheus-style metrics with counters, gauges, and histograms.
 */

/** Metric kinds supported */
export type MetricKind = 'counter' | 'gauge' | 'histogram'

/** Label name → value pairs */
export type Labels = Record<string, string | number>

/** Ordered label values, same arity as the descriptor's label names */
export type LabelValues = readonly string[]

interface DescriptorBase {
  /** Metric name, `[a-zA-Z_:][a-zA-Z0-9_:]*` */
  readonly name: string
  /** Human-readable description (HELP line) */
  readonly help: string
  /** Ordered, distinct label names */
  readonly labelNames: readonly string[]
}

export interface CounterDescriptor extends DescriptorBase {
  readonly kind: 'counter'
}

export interface GaugeDescriptor extends DescriptorBase {
  readonly kind: 'gauge'
}

export interface HistogramDescriptor extends DescriptorBase {
  readonly kind: 'histogram'
  /** Strictly increasing finite upper bounds; +Inf is implicit */
  readonly buckets: readonly number[]
}

/** Static identity of a metric */
export type MetricDescriptor = CounterDescriptor | GaugeDescriptor | HistogramDescriptor

/** Descriptor input; histogram buckets default to DEFAULT_HISTOGRAM_BUCKETS */
export type DescriptorInput =
  | CounterDescriptor
  | GaugeDescriptor
  | (Omit<HistogramDescriptor, 'buckets'> & { readonly buckets?: readonly number[] })

/** Options for the typed registration helpers */
export interface MetricOptions {
  /** HELP text */
  help?: string
  /** Label names this metric supports */
  labelNames?: readonly string[]
}

export interface HistogramOptions extends MetricOptions {
  /** Bucket boundaries (default: DEFAULT_HISTOGRAM_BUCKETS) */
  buckets?: readonly number[]
}

export interface CounterState {
  readonly kind: 'counter'
  value: number
}

export interface GaugeState {
  readonly kind: 'gauge'
  value: number
}

export interface HistogramState {
  readonly kind: 'histogram'
  /** Finite upper bounds shared with the descriptor */
  readonly bounds: readonly number[]
  /** Cumulative counts, one per bound plus a final +Inf slot */
  readonly bucketCounts: number[]
  sum: number
  count: number
}

export type SeriesState = CounterState | GaugeState | HistogramState

/** One metric instance for one concrete label tuple */
export interface LabeledSeries {
  /** Owning metric name, used in error messages */
  readonly metric: string
  readonly labelValues: LabelValues
  readonly state: SeriesState
}

/** Histogram bucket with cumulative count */
export interface HistogramBucket {
  /** Upper bound, Infinity for the last bucket */
  le: number
  count: number
}

/** Point-in-time copy of a series */
export type SeriesSnapshot =
  | { kind: 'counter' | 'gauge'; labelValues: LabelValues; value: number }
  | {
      kind: 'histogram'
      labelValues: LabelValues
      buckets: HistogramBucket[]
      sum: number
      count: number
    }

/**
 * Zero-argument capability producing the current value of a dynamic family.
 * Evaluated synchronously at render time.
 */
export type CollectFn = () => number

/** Default histogram buckets (Prometheus defaults for seconds) */
export const DEFAULT_HISTOGRAM_BUCKETS: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
]

/** Exposition format content type */
export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8'

/** Default process/runtime metric names */
export const DEFAULT_METRICS = {
  PROCESS_CPU: 'process_cpu_seconds_total',
  PROCESS_RESIDENT_MEMORY: 'process_resident_memory_bytes',
  PROCESS_VIRTUAL_MEMORY: 'process_virtual_memory_bytes',
  PROCESS_OPEN_FDS: 'process_open_fds',
  PROCESS_MAX_FDS: 'process_max_fds',
  PROCESS_START_TIME: 'process_start_time_seconds',
  GC_COLLECTIONS: 'nodejs_gc_collections_total',
  GC_DURATION: 'nodejs_gc_duration_seconds_total',
} as const
