/**
 * Labeled series and the accumulator operations applied to them.
 *
 * Every operation is a synchronous state transition, so on the Node.js event
 * loop it is atomic with respect to every other operation on the same series.
 */

import { Errors } from '../errors/index.js'
import type {
  LabeledSeries,
  LabelValues,
  MetricDescriptor,
  SeriesState,
  SeriesSnapshot,
} from './types.js'

function assertNever(value: never): never {
  throw new Error(`Unhandled metric kind: ${JSON.stringify(value)}`)
}

function initialState(descriptor: MetricDescriptor): SeriesState {
  switch (descriptor.kind) {
    case 'counter':
      return { kind: 'counter', value: 0 }
    case 'gauge':
      return { kind: 'gauge', value: 0 }
    case 'histogram':
      return {
        kind: 'histogram',
        bounds: descriptor.buckets,
        bucketCounts: new Array<number>(descriptor.buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      }
    default:
      return assertNever(descriptor)
  }
}

/**
 * Create a zeroed series. Arity is checked by the owning family.
 */
export function createSeries(descriptor: MetricDescriptor, labelValues: LabelValues): LabeledSeries {
  return {
    metric: descriptor.name,
    labelValues: Object.freeze([...labelValues]),
    state: initialState(descriptor),
  }
}

/**
 * Add a non-negative delta to a counter
 */
export function increment(series: LabeledSeries, delta = 1): void {
  const { state } = series
  switch (state.kind) {
    case 'counter':
      if (Number.isNaN(delta)) {
        throw Errors.invalidOperation(series.metric, 'counter increment must be a number')
      }
      if (delta === Infinity) {
        throw Errors.invalidOperation(series.metric, 'counter increment must be finite')
      }
      if (delta < 0) {
        throw Errors.invalidOperation(series.metric, `counter cannot decrease (delta ${delta})`)
      }
      state.value += delta
      return
    case 'gauge':
    case 'histogram':
      throw Errors.invalidOperation(series.metric, `increment is not valid on a ${state.kind}`)
    default:
      assertNever(state)
  }
}

/**
 * Overwrite a gauge value
 */
export function set(series: LabeledSeries, value: number): void {
  const { state } = series
  switch (state.kind) {
    case 'gauge':
      state.value = value
      return
    case 'counter':
    case 'histogram':
      throw Errors.invalidOperation(series.metric, `set is not valid on a ${state.kind}`)
    default:
      assertNever(state)
  }
}

/**
 * Move a gauge up or down
 */
export function add(series: LabeledSeries, delta: number): void {
  const { state } = series
  switch (state.kind) {
    case 'gauge':
      state.value += delta
      return
    case 'counter':
    case 'histogram':
      throw Errors.invalidOperation(series.metric, `add is not valid on a ${state.kind}`)
    default:
      assertNever(state)
  }
}

/**
 * Record one observation in a histogram.
 *
 * Bucket counts are cumulative: every bucket whose bound is >= value is
 * incremented, and the trailing +Inf slot always is.
 */
export function observe(series: LabeledSeries, value: number): void {
  const { state } = series
  switch (state.kind) {
    case 'histogram': {
      if (Number.isNaN(value)) {
        throw Errors.invalidOperation(series.metric, 'cannot observe NaN')
      }
      state.sum += value
      state.count += 1
      const { bounds, bucketCounts } = state
      for (let i = 0; i < bounds.length; i++) {
        if (value <= bounds[i]) {
          bucketCounts[i] += 1
        }
      }
      bucketCounts[bounds.length] += 1
      return
    }
    case 'counter':
    case 'gauge':
      throw Errors.invalidOperation(series.metric, `observe is not valid on a ${state.kind}`)
    default:
      assertNever(state)
  }
}

/**
 * Write a value read from an external source (process and runtime
 * collectors). Counters mirror a source that is itself monotonic, so the value
 * replaces the current one instead of being added to it.
 */
export function assign(series: LabeledSeries, value: number): void {
  const { state } = series
  if (Number.isNaN(value)) {
    throw Errors.invalidOperation(series.metric, 'collected value is NaN')
  }
  switch (state.kind) {
    case 'counter':
      if (value < 0) {
        throw Errors.invalidOperation(series.metric, `collected counter value ${value} is negative`)
      }
      state.value = value
      return
    case 'gauge':
      state.value = value
      return
    case 'histogram':
      throw Errors.invalidOperation(series.metric, 'histograms cannot be collected')
    default:
      assertNever(state)
  }
}

/**
 * Copy the current state of a series in one synchronous read
 */
export function snapshot(series: LabeledSeries): SeriesSnapshot {
  const { state, labelValues } = series
  switch (state.kind) {
    case 'counter':
    case 'gauge':
      return { kind: state.kind, labelValues, value: state.value }
    case 'histogram':
      return {
        kind: 'histogram',
        labelValues,
        buckets: state.bucketCounts.map((count, i) => ({
          le: i < state.bounds.length ? state.bounds[i] : Infinity,
          count,
        })),
        sum: state.sum,
        count: state.count,
      }
    default:
      return assertNever(state)
  }
}
