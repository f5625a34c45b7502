/**
 * Metric Family
 *
 * One descriptor plus the series created for each label tuple seen so far.
 */

import { Errors } from '../errors/index.js'
import { add, assign, createSeries, increment, observe, set } from './series.js'
import type { CollectFn, LabeledSeries, Labels, LabelValues, MetricDescriptor } from './types.js'

/**
 * Map key for a label tuple. JSON keeps tuples such as ['a,b'] and ['a', 'b']
 * apart.
 */
function tupleKey(labelValues: LabelValues): string {
  return JSON.stringify(labelValues)
}

export class MetricFamily {
  private readonly seriesByKey = new Map<string, LabeledSeries>()

  constructor(
    readonly descriptor: MetricDescriptor,
    private readonly collectFn?: CollectFn
  ) {
    if (collectFn && descriptor.labelNames.length > 0) {
      throw Errors.invalidOperation(descriptor.name, 'collected metrics cannot have labels')
    }
    if (collectFn && descriptor.kind === 'histogram') {
      throw Errors.invalidOperation(descriptor.name, 'histograms cannot be collected')
    }
  }

  get name(): string {
    return this.descriptor.name
  }

  /** Backed by a collect callback evaluated at render time */
  get isDynamic(): boolean {
    return this.collectFn !== undefined
  }

  /** Number of series created so far */
  get size(): number {
    return this.seriesByKey.size
  }

  /**
   * Return the series for a label tuple, creating it on first use.
   * Equal tuples always yield the same series instance.
   */
  getOrCreateSeries(labelValues: LabelValues = []): LabeledSeries {
    const { labelNames } = this.descriptor
    if (labelValues.length !== labelNames.length) {
      throw Errors.labelArity(this.name, labelNames, labelValues)
    }

    const key = tupleKey(labelValues)
    let series = this.seriesByKey.get(key)
    if (!series) {
      series = createSeries(this.descriptor, labelValues)
      this.seriesByKey.set(key, series)
    }
    return series
  }

  /**
   * Series for a label record; keys must be exactly the declared label names
   */
  labels(labels: Labels = {}): LabeledSeries {
    const { labelNames } = this.descriptor
    const provided = Object.keys(labels)
    const matches =
      provided.length === labelNames.length && labelNames.every((name) => Object.hasOwn(labels, name))
    if (!matches) {
      throw Errors.labelNames(this.name, labelNames, provided)
    }
    return this.getOrCreateSeries(labelNames.map((name) => String(labels[name])))
  }

  inc(labels?: Labels, delta = 1): void {
    increment(this.labels(labels), delta)
  }

  set(value: number, labels?: Labels): void {
    set(this.labels(labels), value)
  }

  add(delta: number, labels?: Labels): void {
    add(this.labels(labels), delta)
  }

  observe(value: number, labels?: Labels): void {
    observe(this.labels(labels), value)
  }

  /**
   * Start a timer; the returned function observes the elapsed seconds and
   * returns them. Labels given at stop time are merged over the start labels.
   */
  startTimer(labels: Labels = {}): (endLabels?: Labels) => number {
    const start = performance.now()
    return (endLabels = {}) => {
      const seconds = (performance.now() - start) / 1000
      this.observe(seconds, { ...labels, ...endLabels })
      return seconds
    }
  }

  /**
   * Evaluate the collect callback once and store its value.
   * No-op for families without one.
   */
  refresh(): void {
    if (!this.collectFn) return
    const value = this.collectFn()
    const key = tupleKey([])
    const existing = this.seriesByKey.get(key)
    const series = existing ?? createSeries(this.descriptor, [])
    assign(series, value)
    // A collector that has never produced a valid value leaves no series
    if (!existing) this.seriesByKey.set(key, series)
  }

  /**
   * Series in creation order; each call starts a fresh traversal
   */
  series(): IterableIterator<LabeledSeries> {
    return this.seriesByKey.values()
  }

  /**
   * Drop every series (for tests)
   */
  reset(): void {
    this.seriesByKey.clear()
  }
}
