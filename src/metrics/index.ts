/**
 * Metrics System
 *
 * Prometheus-style metrics with counters, gauges, and histograms.
 */

export { createRegistry, type MetricRegistry, type RegistryOptions } from './registry.js'
export { MetricFamily } from './family.js'
export { createDescriptor, sameDescriptor } from './descriptor.js'
export { createSeries, increment, set, add, observe, assign, snapshot } from './series.js'
export { exportPrometheus, exportJson, formatValue, type JsonFamily, type JsonSeries } from './exporters.js'
export { defaultCollectors, parseMaxFds, parseVirtualMemory, type DefaultCollector } from './process.js'

export type {
  MetricKind,
  Labels,
  LabelValues,
  MetricOptions,
  HistogramOptions,
  CounterDescriptor,
  GaugeDescriptor,
  HistogramDescriptor,
  MetricDescriptor,
  DescriptorInput,
  LabeledSeries,
  SeriesState,
  SeriesSnapshot,
  HistogramBucket,
  CollectFn,
} from './types.js'

export { DEFAULT_HISTOGRAM_BUCKETS, DEFAULT_METRICS, PROMETHEUS_CONTENT_TYPE } from './types.js'
