/**
 * Process and runtime collectors
 *
 * Each default family is backed by a callback that reads the current OS or
 * runtime value when the registry renders. Nothing here runs on a timer.
 */

import { readFileSync, readdirSync } from 'node:fs'
import { PerformanceObserver } from 'node:perf_hooks'
import { DEFAULT_METRICS } from './types.js'
import type { CollectFn, MetricKind } from './types.js'

export interface DefaultCollector {
  name: string
  kind: Extract<MetricKind, 'counter' | 'gauge'>
  help: string
  collect: CollectFn
}

const PROC_STAT = '/proc/self/stat'
const PROC_FD = '/proc/self/fd'
const PROC_LIMITS = '/proc/self/limits'

const PROCESS_START_TIME = Math.round(Date.now() / 1000 - process.uptime())

/**
 * Virtual memory size in bytes from /proc/self/stat.
 * The command field may contain spaces, so fields are counted after the
 * closing parenthesis; vsize is field 23 (index 20 after the split).
 */
export function parseVirtualMemory(stat: string): number {
  const rest = stat.slice(stat.lastIndexOf(')') + 2).split(' ')
  const vsize = Number(rest[20])
  if (!Number.isFinite(vsize)) {
    throw new Error('Unexpected /proc/self/stat layout')
  }
  return vsize
}

/**
 * Soft limit of "Max open files" from /proc/self/limits
 */
export function parseMaxFds(limits: string): number {
  const line = limits.split('\n').find((l) => l.startsWith('Max open files'))
  const soft = line?.slice('Max open files'.length).trim().split(/\s+/)[0]
  if (soft === undefined) {
    throw new Error('Max open files not found in /proc/self/limits')
  }
  return soft === 'unlimited' ? Infinity : Number(soft)
}

// ─────────────────────────────────────────────────────────────────────────────
// GC statistics
// ─────────────────────────────────────────────────────────────────────────────

const gcStats = { collections: 0, seconds: 0 }
let gcObserver: PerformanceObserver | null = null

/**
 * Start counting GC runs. GC is process-wide, so one observer serves every
 * registry; repeated calls are no-ops.
 */
function ensureGcObserver(): void {
  if (gcObserver) return
  gcObserver = new PerformanceObserver((list) => {
    for (const entry of list.getEntries()) {
      gcStats.collections += 1
      gcStats.seconds += entry.duration / 1000
    }
  })
  gcObserver.observe({ entryTypes: ['gc'] })
}

/**
 * Collectors registered on every new registry (unless disabled)
 */
export function defaultCollectors(platform: NodeJS.Platform = process.platform): DefaultCollector[] {
  ensureGcObserver()

  const collectors: DefaultCollector[] = [
    {
      name: DEFAULT_METRICS.PROCESS_CPU,
      kind: 'counter',
      help: 'Total user and system CPU time spent in seconds.',
      collect: () => {
        const usage = process.cpuUsage()
        return (usage.user + usage.system) / 1e6
      },
    },
    {
      name: DEFAULT_METRICS.PROCESS_RESIDENT_MEMORY,
      kind: 'gauge',
      help: 'Resident memory size in bytes.',
      collect: () => process.memoryUsage().rss,
    },
    {
      name: DEFAULT_METRICS.PROCESS_START_TIME,
      kind: 'gauge',
      help: 'Start time of the process since unix epoch in seconds.',
      collect: () => PROCESS_START_TIME,
    },
    {
      name: DEFAULT_METRICS.GC_COLLECTIONS,
      kind: 'counter',
      help: 'Number of garbage collections run by the runtime.',
      collect: () => gcStats.collections,
    },
    {
      name: DEFAULT_METRICS.GC_DURATION,
      kind: 'counter',
      help: 'Total time spent in garbage collection in seconds.',
      collect: () => gcStats.seconds,
    },
  ]

  if (platform === 'linux') {
    collectors.push(
      {
        name: DEFAULT_METRICS.PROCESS_VIRTUAL_MEMORY,
        kind: 'gauge',
        help: 'Virtual memory size in bytes.',
        collect: () => parseVirtualMemory(readFileSync(PROC_STAT, 'utf8')),
      },
      {
        name: DEFAULT_METRICS.PROCESS_OPEN_FDS,
        kind: 'gauge',
        help: 'Number of open file descriptors.',
        collect: () => readdirSync(PROC_FD).length,
      },
      {
        name: DEFAULT_METRICS.PROCESS_MAX_FDS,
        kind: 'gauge',
        help: 'Maximum number of open file descriptors.',
        collect: () => parseMaxFds(readFileSync(PROC_LIMITS, 'utf8')),
      }
    )
  }

  return collectors
}
