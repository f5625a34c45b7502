import { describe, it, expect, vi } from 'vitest'
import { createDescriptor } from './descriptor.js'
import { MetricFamily } from './family.js'
import { snapshot } from './series.js'

function requestsFamily(): MetricFamily {
  return new MetricFamily(
    createDescriptor({
      kind: 'counter',
      name: 'http_requests_total',
      help: 'Total HTTP requests',
      labelNames: ['method', 'endpoint', 'http_status'],
    })
  )
}

describe('MetricFamily', () => {
  describe('getOrCreateSeries', () => {
    it('should return the same series for equal label tuples', () => {
      const family = requestsFamily()
      const a = family.getOrCreateSeries(['GET', '/data', '200'])
      const b = family.getOrCreateSeries(['GET', '/data', '200'])

      expect(b).toBe(a)
      expect(family.size).toBe(1)
    })

    it('should keep tuples with embedded separators apart', () => {
      const family = new MetricFamily(
        createDescriptor({ kind: 'gauge', name: 'pairs', help: '', labelNames: ['a', 'b'] })
      )
      const first = family.getOrCreateSeries(['x,y', 'z'])
      const second = family.getOrCreateSeries(['x', 'y,z'])

      expect(first).not.toBe(second)
      expect(family.size).toBe(2)
    })

    it('should reject the wrong number of label values', () => {
      const family = requestsFamily()

      expect(() => family.getOrCreateSeries(['GET', '/data'])).toThrow(
        "Metric 'http_requests_total' expects 3 label values (method, endpoint, http_status), got 2"
      )
      expect(family.size).toBe(0)
    })

    it('should copy the label values it was given', () => {
      const family = requestsFamily()
      const values = ['GET', '/data', '200']
      const series = family.getOrCreateSeries(values)
      values[0] = 'POST'

      expect(series.labelValues).toEqual(['GET', '/data', '200'])
    })
  })

  describe('labels', () => {
    it('should map a record onto the declared label order', () => {
      const family = requestsFamily()
      const series = family.labels({ http_status: 200, endpoint: '/data', method: 'GET' })

      expect(series.labelValues).toEqual(['GET', '/data', '200'])
      expect(family.getOrCreateSeries(['GET', '/data', '200'])).toBe(series)
    })

    it('should reject missing or unknown label names', () => {
      const family = requestsFamily()

      expect(() => family.labels({ method: 'GET', endpoint: '/data' })).toThrow(
        /has labels \[method, endpoint, http_status\], got \[method, endpoint\]/
      )
      expect(() => family.labels({ method: 'GET', endpoint: '/data', status: '200' })).toThrow(
        "Metric 'http_requests_total' has labels [method, endpoint, http_status], got [method, endpoint, status]"
      )
    })

    it('should not satisfy a label name from the record prototype', () => {
      const family = new MetricFamily(
        createDescriptor({
          kind: 'counter',
          name: 'jobs_total',
          help: 'Jobs processed',
          labelNames: ['queue', 'constructor'],
        })
      )

      expect(() => family.inc({ queue: 'a', extra: 'b' })).toThrow(
        "Metric 'jobs_total' has labels [queue, constructor], got [queue, extra]"
      )
      expect(family.size).toBe(0)
    })
  })

  describe('convenience accumulators', () => {
    it('should increment through labels', () => {
      const family = requestsFamily()
      const labels = { method: 'GET', endpoint: '/data', http_status: '200' }
      family.inc(labels)
      family.inc(labels)
      family.inc(labels)

      expect(snapshot(family.labels(labels))).toMatchObject({ value: 3 })
    })

    it('should set and add on unlabeled gauges', () => {
      const family = new MetricFamily(
        createDescriptor({ kind: 'gauge', name: 'inprogress_requests', help: '', labelNames: [] })
      )
      family.add(1)
      family.add(1)
      family.add(-1)
      expect(snapshot(family.labels())).toMatchObject({ value: 1 })

      family.set(7)
      expect(snapshot(family.labels())).toMatchObject({ value: 7 })
    })
  })

  describe('startTimer', () => {
    it('should observe elapsed seconds with merged labels', () => {
      const now = vi.spyOn(performance, 'now').mockReturnValueOnce(1000).mockReturnValueOnce(1250)
      try {
        const family = new MetricFamily(
          createDescriptor({
            kind: 'histogram',
            name: 'job_seconds',
            help: '',
            labelNames: ['job', 'outcome'],
            buckets: [0.1, 1],
          })
        )
        const stop = family.startTimer({ job: 'sync' })
        const seconds = stop({ outcome: 'ok' })

        expect(seconds).toBe(0.25)
        expect(snapshot(family.getOrCreateSeries(['sync', 'ok']))).toMatchObject({
          count: 1,
          sum: 0.25,
          buckets: [
            { le: 0.1, count: 0 },
            { le: 1, count: 1 },
            { le: Infinity, count: 1 },
          ],
        })
      } finally {
        now.mockRestore()
      }
    })
  })

  describe('dynamic families', () => {
    it('should call the collector once per refresh', () => {
      let reads = 0
      const family = new MetricFamily(
        createDescriptor({ kind: 'gauge', name: 'open_things', help: '', labelNames: [] }),
        () => {
          reads += 1
          return reads * 10
        }
      )

      expect(family.isDynamic).toBe(true)
      expect(family.size).toBe(0)

      family.refresh()
      family.refresh()

      expect(reads).toBe(2)
      expect(snapshot(family.labels())).toMatchObject({ value: 20 })
    })

    it('should refuse collectors on labeled families and histograms', () => {
      expect(
        () =>
          new MetricFamily(
            createDescriptor({ kind: 'gauge', name: 'g', help: '', labelNames: ['x'] }),
            () => 1
          )
      ).toThrow(/cannot have labels/)
      expect(
        () =>
          new MetricFamily(
            createDescriptor({ kind: 'histogram', name: 'h', help: '', labelNames: [] }),
            () => 1
          )
      ).toThrow(/histograms cannot be collected/)
    })

    it('should be a no-op refresh for static families', () => {
      const family = requestsFamily()
      family.refresh()
      expect(family.size).toBe(0)
    })
  })

  describe('series', () => {
    it('should iterate in creation order and restart on each call', () => {
      const family = requestsFamily()
      family.getOrCreateSeries(['GET', '/b', '200'])
      family.getOrCreateSeries(['GET', '/a', '200'])

      const first = Array.from(family.series(), (s) => s.labelValues[1])
      const second = Array.from(family.series(), (s) => s.labelValues[1])

      expect(first).toEqual(['/b', '/a'])
      expect(second).toEqual(first)
    })

    it('should drop every series on reset', () => {
      const family = requestsFamily()
      family.inc({ method: 'GET', endpoint: '/', http_status: '200' })
      family.reset()
      expect(family.size).toBe(0)
    })
  })
})
