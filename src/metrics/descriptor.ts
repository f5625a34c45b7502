/**
 * Metric descriptors: validation, defaults and identity.
 */

import { Errors } from '../errors/index.js'
import { DEFAULT_HISTOGRAM_BUCKETS } from './types.js'
import type {
  CounterDescriptor,
  DescriptorInput,
  GaugeDescriptor,
  HistogramDescriptor,
  MetricDescriptor,
} from './types.js'

const METRIC_NAME_RE = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/
const LABEL_NAME_RE = /^[a-zA-Z_][a-zA-Z0-9_]*$/

function validateLabelNames(input: DescriptorInput): void {
  const seen = new Set<string>()
  for (const label of input.labelNames) {
    if (!LABEL_NAME_RE.test(label)) {
      throw Errors.invalidName('label', label)
    }
    if (label.startsWith('__')) {
      throw Errors.invalidName('label', label, 'names starting with __ are reserved')
    }
    if (input.kind === 'histogram' && label === 'le') {
      throw Errors.invalidName('label', label, 'reserved for histogram buckets')
    }
    if (seen.has(label)) {
      throw Errors.invalidName('label', label, `duplicated in '${input.name}'`)
    }
    seen.add(label)
  }
}

function validateBuckets(name: string, buckets: readonly number[]): void {
  for (let i = 0; i < buckets.length; i++) {
    if (!Number.isFinite(buckets[i])) {
      throw Errors.invalidOperation(name, `bucket bound ${buckets[i]} is not finite`)
    }
    if (i > 0 && buckets[i] <= buckets[i - 1]) {
      throw Errors.invalidOperation(
        name,
        `bucket bounds must be strictly increasing (${buckets[i - 1]} then ${buckets[i]})`
      )
    }
  }
}

/**
 * Validate a descriptor and freeze it. Histograms without buckets get the
 * default latency buckets.
 */
export function createDescriptor(input: DescriptorInput): MetricDescriptor {
  if (!METRIC_NAME_RE.test(input.name)) {
    throw Errors.invalidName('metric', input.name)
  }
  validateLabelNames(input)

  const labelNames = Object.freeze([...input.labelNames])

  if (input.kind === 'histogram') {
    const buckets = Object.freeze([...(input.buckets ?? DEFAULT_HISTOGRAM_BUCKETS)])
    validateBuckets(input.name, buckets)
    const histogram: HistogramDescriptor = {
      kind: 'histogram',
      name: input.name,
      help: input.help,
      labelNames,
      buckets,
    }
    return Object.freeze(histogram)
  }

  const descriptor: CounterDescriptor | GaugeDescriptor = {
    kind: input.kind,
    name: input.name,
    help: input.help,
    labelNames,
  }
  return Object.freeze(descriptor)
}

function sameList<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i])
}

/**
 * Two descriptors describe the same metric
 */
export function sameDescriptor(a: MetricDescriptor, b: MetricDescriptor): boolean {
  if (a.name !== b.name || a.kind !== b.kind || a.help !== b.help) return false
  if (!sameList(a.labelNames, b.labelNames)) return false
  if (a.kind === 'histogram' && b.kind === 'histogram') {
    return sameList(a.buckets, b.buckets)
  }
  return true
}
