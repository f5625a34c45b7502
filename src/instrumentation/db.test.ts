import { describe, it, expect, vi, afterEach } from 'vitest'
import { createRegistry, snapshot } from '../metrics/index.js'
import { createQueryMetrics, instrumentQueryable, parseOperation, type Queryable } from './db.js'

describe('parseOperation', () => {
  it('should take the first word, trimmed and lower-cased', () => {
    expect(parseOperation('  UPDATE users SET x=1')).toBe('update')
    expect(parseOperation('select 1')).toBe('select')
    expect(parseOperation('\n\tInsert INTO user_data VALUES ($1)')).toBe('insert')
    expect(parseOperation('DELETE FROM user_data WHERE id = $1')).toBe('delete')
  })

  it('should ignore other statements', () => {
    expect(parseOperation('BEGIN')).toBeUndefined()
    expect(parseOperation('CREATE TABLE t (id int)')).toBeUndefined()
    expect(parseOperation('WITH x AS (SELECT 1) SELECT * FROM x')).toBeUndefined()
    expect(parseOperation('')).toBeUndefined()
    expect(parseOperation('   ')).toBeUndefined()
  })

  it('should not match a prefix of a longer word', () => {
    expect(parseOperation('selection')).toBeUndefined()
  })
})

describe('createQueryMetrics', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should record counter and histogram per operation', () => {
    const registry = createRegistry({ defaultMetrics: false })
    const metrics = createQueryMetrics(registry, { buckets: [0.05, 0.5, 2] })
    const now = vi.spyOn(performance, 'now')

    for (const ms of [10, 200, 1500]) {
      now.mockReturnValueOnce(0).mockReturnValueOnce(ms)
      metrics.onQueryEnd(metrics.onQueryStart('SELECT * FROM user_data'))
    }

    expect(snapshot(metrics.queries.labels({ operation: 'select' }))).toMatchObject({ value: 3 })
    const histogram = snapshot(metrics.duration.labels({ operation: 'select' }))
    expect(histogram).toMatchObject({
      count: 3,
      buckets: [
        { le: 0.05, count: 1 },
        { le: 0.5, count: 2 },
        { le: 2, count: 3 },
        { le: Infinity, count: 3 },
      ],
    })
    expect(histogram.kind === 'histogram' ? histogram.sum : NaN).toBeCloseTo(1.71, 10)
  })

  it('should silently skip unrecognised statements', () => {
    const registry = createRegistry({ defaultMetrics: false })
    const metrics = createQueryMetrics(registry)

    metrics.onQueryEnd(metrics.onQueryStart('BEGIN'))
    metrics.onQueryEnd(metrics.onQueryStart('COMMIT'))

    expect(metrics.queries.size).toBe(0)
    expect(metrics.duration.size).toBe(0)
  })
})

describe('instrumentQueryable', () => {
  function fakeQueryable(fail = false): Queryable & { calls: Array<[string, unknown[] | undefined]> } {
    const calls: Array<[string, unknown[] | undefined]> = []
    return {
      calls,
      async query(text, values) {
        calls.push([text, values])
        if (fail) throw new Error('relation "user_data" does not exist')
        return { rows: [{ id: 1 }], rowCount: 1 }
      },
    }
  }

  it('should pass queries through and time them', async () => {
    const registry = createRegistry({ defaultMetrics: false })
    const metrics = createQueryMetrics(registry)
    const target = fakeQueryable()
    const db = instrumentQueryable(target, metrics)

    const result = await db.query('SELECT * FROM user_data WHERE id = $1', [1])

    expect(result).toEqual({ rows: [{ id: 1 }], rowCount: 1 })
    expect(target.calls).toEqual([['SELECT * FROM user_data WHERE id = $1', [1]]])
    expect(snapshot(metrics.queries.labels({ operation: 'select' }))).toMatchObject({ value: 1 })
  })

  it('should record failed queries and rethrow the error', async () => {
    const registry = createRegistry({ defaultMetrics: false })
    const metrics = createQueryMetrics(registry)
    const db = instrumentQueryable(fakeQueryable(true), metrics)

    await expect(db.query('DELETE FROM user_data WHERE id = $1', [3])).rejects.toThrow(
      'relation "user_data" does not exist'
    )
    expect(snapshot(metrics.queries.labels({ operation: 'delete' }))).toMatchObject({ value: 1 })
    expect(snapshot(metrics.duration.labels({ operation: 'delete' }))).toMatchObject({ count: 1 })
  })

  it('should count interleaved queries without losing any', async () => {
    const registry = createRegistry({ defaultMetrics: false })
    const metrics = createQueryMetrics(registry)
    const db = instrumentQueryable(fakeQueryable(), metrics)

    await Promise.all(
      Array.from({ length: 25 }, (_, i) =>
        db.query(i % 5 === 0 ? 'INSERT INTO user_data DEFAULT VALUES' : 'SELECT 1')
      )
    )

    expect(snapshot(metrics.queries.labels({ operation: 'select' }))).toMatchObject({ value: 20 })
    expect(snapshot(metrics.queries.labels({ operation: 'insert' }))).toMatchObject({ value: 5 })
  })
})
