/**
 * Metric Registry
 *
 * Owns every metric family of a process: the default process/runtime
 * families plus the ones the application registers. Constructed explicitly
 * and handed to whoever records or renders metrics.
 */

import { Errors } from '../errors/index.js'
import { createDescriptor, sameDescriptor } from './descriptor.js'
import { exportJson, exportPrometheus, type JsonFamily } from './exporters.js'
import { MetricFamily } from './family.js'
import { defaultCollectors } from './process.js'
import { PROMETHEUS_CONTENT_TYPE } from './types.js'
import type { CollectFn, DescriptorInput, HistogramOptions, MetricOptions } from './types.js'

export interface RegistryOptions {
  /** Register process/runtime families on creation (default: true) */
  defaultMetrics?: boolean
  /** Platform used to pick the default families (default: process.platform) */
  platform?: NodeJS.Platform
}

/** Metric Registry API */
export interface MetricRegistry {
  /**
   * Register a family. Registering an identical descriptor again returns the
   * existing family; a different descriptor under the same name throws
   * DUPLICATE_METRIC_NAME.
   */
  register(input: DescriptorInput, collect?: CollectFn): MetricFamily
  /** Register a counter */
  counter(name: string, opts?: MetricOptions): MetricFamily
  /** Register a gauge */
  gauge(name: string, opts?: MetricOptions): MetricFamily
  /** Register a histogram */
  histogram(name: string, opts?: HistogramOptions): MetricFamily

  getFamily(name: string): MetricFamily | undefined
  /** Like getFamily, throwing UNKNOWN_METRIC when absent */
  getFamilyOrThrow(name: string): MetricFamily
  /** Names in registration order */
  getMetricNames(): string[]
  /** Fresh traversal of the families in registration order */
  iterate(): IterableIterator<MetricFamily>

  /** Render every family in the Prometheus text format */
  render(): string
  /** Content type of render() output */
  readonly contentType: string
  /** JSON snapshot of every family */
  toJSON(): JsonFamily[]
  /** Drop every series of the non-collected families (for tests) */
  reset(): void
}

/**
 * Create a new MetricRegistry instance
 */
export function createRegistry(options: RegistryOptions = {}): MetricRegistry {
  const families = new Map<string, MetricFamily>()

  function register(input: DescriptorInput, collect?: CollectFn): MetricFamily {
    const descriptor = createDescriptor(input)
    const existing = families.get(descriptor.name)
    if (existing) {
      if (sameDescriptor(existing.descriptor, descriptor)) {
        return existing
      }
      throw Errors.duplicateMetric(descriptor.name)
    }

    const family = new MetricFamily(descriptor, collect)
    families.set(descriptor.name, family)
    return family
  }

  const registry: MetricRegistry = {
    register,

    counter(name, opts = {}) {
      return register({ kind: 'counter', name, help: opts.help ?? '', labelNames: opts.labelNames ?? [] })
    },

    gauge(name, opts = {}) {
      return register({ kind: 'gauge', name, help: opts.help ?? '', labelNames: opts.labelNames ?? [] })
    },

    histogram(name, opts = {}) {
      return register({
        kind: 'histogram',
        name,
        help: opts.help ?? '',
        labelNames: opts.labelNames ?? [],
        buckets: opts.buckets,
      })
    },

    getFamily(name) {
      return families.get(name)
    },

    getFamilyOrThrow(name) {
      const family = families.get(name)
      if (!family) {
        throw Errors.unknownMetric(name)
      }
      return family
    },

    getMetricNames() {
      return Array.from(families.keys())
    },

    iterate() {
      return families.values()
    },

    render() {
      return exportPrometheus(families.values())
    },

    contentType: PROMETHEUS_CONTENT_TYPE,

    toJSON() {
      return exportJson(families.values())
    },

    reset() {
      for (const family of families.values()) {
        if (!family.isDynamic) {
          family.reset()
        }
      }
    },
  }

  if (options.defaultMetrics ?? true) {
    for (const collector of defaultCollectors(options.platform)) {
      register(
        { kind: collector.kind, name: collector.name, help: collector.help, labelNames: [] },
        collector.collect
      )
    }
  }

  return registry
}
