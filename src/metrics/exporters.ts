/**
 * Metric Exporters
 *
 * Export metrics to Prometheus text format or JSON.
 */

import { createLogger } from '../utils/logger.js'
import type { MetricFamily } from './family.js'
import { snapshot } from './series.js'
import type { HistogramBucket, MetricKind, SeriesSnapshot } from './types.js'

const logger = createLogger('exporter')

/**
 * Escape special characters in Prometheus label values
 */
function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n')
}

/**
 * Escape HELP text: backslash and line feed only
 */
function escapeHelp(help: string): string {
  return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n')
}

/**
 * Format a sample value as a float token of the exposition format
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN'
  if (value === Infinity) return '+Inf'
  if (value === -Infinity) return '-Inf'
  return String(value)
}

/**
 * Format labels for Prometheus output: {key="value",key2="value2"}.
 * Declaration order is kept; an empty list yields no braces.
 */
function formatLabels(names: readonly string[], values: readonly string[]): string {
  if (names.length === 0) return ''
  const formatted = names.map((name, i) => `${name}="${escapeLabelValue(values[i])}"`).join(',')
  return `{${formatted}}`
}

/**
 * Refresh a dynamic family, then read every series once.
 * A failing collector is logged and the family keeps its last known state.
 */
function collectFamily(family: MetricFamily): SeriesSnapshot[] {
  if (family.isDynamic) {
    try {
      family.refresh()
    } catch (error) {
      logger.warn({ metric: family.name, err: error }, 'Metric collector failed')
    }
  }
  return Array.from(family.series(), snapshot)
}

function histogramLines(
  name: string,
  labelNames: readonly string[],
  sample: { labelValues: readonly string[]; buckets: HistogramBucket[]; sum: number; count: number }
): string[] {
  const lines: string[] = []
  const bucketNames = [...labelNames, 'le']

  // Bucket values (cumulative)
  for (const bucket of sample.buckets) {
    const labelStr = formatLabels(bucketNames, [...sample.labelValues, formatValue(bucket.le)])
    lines.push(`${name}_bucket${labelStr} ${bucket.count}`)
  }

  const baseLabels = formatLabels(labelNames, sample.labelValues)
  lines.push(`${name}_sum${baseLabels} ${formatValue(sample.sum)}`)
  lines.push(`${name}_count${baseLabels} ${sample.count}`)
  return lines
}

/**
 * Export metrics to Prometheus text format (version 0.0.4)
 *
 * Format:
 * # HELP metric_name Description
 * # TYPE metric_name type
 * metric_name{label="value"} 123
 */
export function exportPrometheus(families: Iterable<MetricFamily>): string {
  const lines: string[] = []

  for (const family of families) {
    const { name, help, kind, labelNames } = family.descriptor
    const samples = collectFamily(family)

    lines.push(`# HELP ${name} ${escapeHelp(help)}`)
    lines.push(`# TYPE ${name} ${kind}`)

    for (const sample of samples) {
      if (sample.kind === 'histogram') {
        lines.push(...histogramLines(name, labelNames, sample))
      } else {
        lines.push(`${name}${formatLabels(labelNames, sample.labelValues)} ${formatValue(sample.value)}`)
      }
    }
  }

  return lines.length === 0 ? '' : `${lines.join('\n')}\n`
}

export interface JsonSeries {
  labels: Record<string, string>
  value?: number
  buckets?: Array<{ le: string; count: number }>
  sum?: number
  count?: number
}

export interface JsonFamily {
  name: string
  type: MetricKind
  help: string
  values: JsonSeries[]
}

function toRecord(names: readonly string[], values: readonly string[]): Record<string, string> {
  const labels: Record<string, string> = {}
  names.forEach((name, i) => {
    labels[name] = values[i]
  })
  return labels
}

/**
 * Export metrics as plain JSON-serializable objects
 */
export function exportJson(families: Iterable<MetricFamily>): JsonFamily[] {
  const output: JsonFamily[] = []

  for (const family of families) {
    const { name, help, kind, labelNames } = family.descriptor
    const values = collectFamily(family).map((sample): JsonSeries => {
      const labels = toRecord(labelNames, sample.labelValues)
      if (sample.kind === 'histogram') {
        return {
          labels,
          buckets: sample.buckets.map((b) => ({ le: formatValue(b.le), count: b.count })),
          sum: sample.sum,
          count: sample.count,
        }
      }
      return { labels, value: sample.value }
    })
    output.push({ name, type: kind, help, values })
  }

  return output
}
