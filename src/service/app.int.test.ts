/**
 * UserData API Integration Tests
 *
 * The full service stack over app.fetch: routes, validation, error mapping
 * and the metrics the requests and queries leave behind.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { loadConfig } from '../config/index.js'
import { createQueryMetrics, instrumentQueryable, type Queryable } from '../instrumentation/index.js'
import { createRegistry, type MetricRegistry } from '../metrics/index.js'
import { createService, type Service } from './app.js'
import { PgUserDataRepository } from './pg-repository.js'
import { MemoryUserDataRepository } from './repository.js'

const config = loadConfig({})

const request = (path: string, init?: RequestInit) => new Request(`http://localhost${path}`, init)

const post = (path: string, body: unknown, method = 'POST') =>
  request(path, {
    method,
    headers: { 'content-type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  })

const ada = { name: 'Ada', email: 'ada@example.com', message: 'hello' }

describe('UserData API', () => {
  let registry: MetricRegistry
  let service: Service

  beforeEach(() => {
    registry = createRegistry({ defaultMetrics: false })
    service = createService({ config, repository: new MemoryUserDataRepository(), registry })
  })

  it('should create items with 201', async () => {
    const res = await service.app.fetch(post('/data', ada))

    expect(res.status).toBe(201)
    expect(await res.json()).toEqual({ id: 1, ...ada })
  })

  it('should reject invalid payloads with 400', async () => {
    const res = await service.app.fetch(post('/data', { name: 'Ada', email: 'not-an-email', message: 'x' }))

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR', status: 400 } })
  })

  it('should reject malformed JSON with 400', async () => {
    const res = await service.app.fetch(post('/data', '{"name":'))

    expect(res.status).toBe(400)
    expect(await res.json()).toMatchObject({ error: { message: 'body: Invalid JSON' } })
  })

  it('should list with skip and limit', async () => {
    for (const name of ['a', 'b', 'c']) {
      await service.app.fetch(post('/data', { ...ada, name }))
    }

    const all = await service.app.fetch(request('/data'))
    const page = await service.app.fetch(request('/data?skip=1&limit=1'))

    expect(await all.json()).toHaveLength(3)
    expect(await page.json()).toEqual([{ id: 2, ...ada, name: 'b' }])
  })

  it('should reject a negative skip', async () => {
    const res = await service.app.fetch(request('/data?skip=-1'))
    expect(res.status).toBe(400)
  })

  it('should update existing items and 404 missing ones', async () => {
    await service.app.fetch(post('/data', ada))

    const updated = await service.app.fetch(post('/data/1', { ...ada, message: 'edited' }, 'PUT'))
    expect(updated.status).toBe(200)
    expect(await updated.json()).toEqual({ id: 1, ...ada, message: 'edited' })

    const missing = await service.app.fetch(post('/data/7', ada, 'PUT'))
    expect(missing.status).toBe(404)
    expect(await missing.json()).toMatchObject({ error: { code: 'NOT_FOUND', message: "Item '7' not found" } })
  })

  it('should delete items and 404 the second time', async () => {
    await service.app.fetch(post('/data', ada))

    const first = await service.app.fetch(request('/data/1', { method: 'DELETE' }))
    const second = await service.app.fetch(request('/data/1', { method: 'DELETE' }))

    expect(first.status).toBe(200)
    expect(await first.json()).toEqual({ id: 1, ...ada })
    expect(second.status).toBe(404)
  })

  it('should reject non-numeric ids with 400', async () => {
    const res = await service.app.fetch(request('/data/abc', { method: 'DELETE' }))
    expect(res.status).toBe(400)
  })

  it('should count requests whose path does not decode', async () => {
    const res = await service.app.fetch(request('/data/%E0', { method: 'DELETE' }))
    expect(res.status).toBe(404)

    const text = await (await service.app.fetch(request('/metrics'))).text()
    expect(text).toContain('http_requests_total{method="DELETE",endpoint="/data/%E0",http_status="404"} 1\n')
  })

  it('should report health', async () => {
    const res = await service.app.fetch(request('/health'))
    expect(await res.json()).toEqual({ status: 'ok', database: 'reachable' })
  })

  it('should expose request metrics on /metrics', async () => {
    for (let i = 0; i < 3; i++) {
      await service.app.fetch(request('/data'))
    }
    await service.app.fetch(post('/data/5', ada, 'PUT'))

    const res = await service.app.fetch(request('/metrics'))
    const text = await res.text()

    expect(res.headers.get('content-type')).toBe('text/plain; version=0.0.4; charset=utf-8')
    expect(text).toContain('http_requests_total{method="GET",endpoint="/data",http_status="200"} 3\n')
    expect(text).toContain('http_requests_total{method="PUT",endpoint="/data/5",http_status="404"} 1\n')
    expect(text).toContain('http_request_duration_seconds_count{method="GET",endpoint="/data",http_status="200"} 3\n')
    // The scrape itself is still in flight while rendering
    expect(text).toContain('\ninprogress_requests 1\n')
  })
})

describe('service over an instrumented database', () => {
  /** Minimal stand-in answering the statements PgUserDataRepository sends */
  function fakePg(): Queryable {
    const rows: Array<{ id: number; name: string; email: string; message: string }> = []
    return {
      async query(text, values = []) {
        if (text.startsWith('INSERT')) {
          const [name, email, message] = values.map(String)
          const item = { id: rows.length + 1, name, email, message }
          rows.push(item)
          return { rows: [item], rowCount: 1 }
        }
        if (text.startsWith('SELECT id')) {
          return { rows: [...rows], rowCount: rows.length }
        }
        if (text === 'SELECT 1') {
          return { rows: [{ '?column?': 1 }], rowCount: 1 }
        }
        throw new Error(`unexpected statement: ${text}`)
      },
    }
  }

  it('should count queries by operation and refresh pool gauges on scrape', async () => {
    const registry = createRegistry({ defaultMetrics: false })
    const queryMetrics = createQueryMetrics(registry, { buckets: config.dbBuckets })
    const repository = new PgUserDataRepository(instrumentQueryable(fakePg(), queryMetrics))
    const { app } = createService({
      config,
      repository,
      registry,
      poolStatus: () => ({ totalCount: 3, idleCount: 1, waitingCount: 0 }),
    })

    await app.fetch(post('/data', ada))
    await app.fetch(post('/data', { ...ada, name: 'Grace' }))
    await app.fetch(request('/data'))
    await app.fetch(request('/health'))

    const text = await (await app.fetch(request('/metrics'))).text()

    expect(text).toContain('db_queries_total{operation="insert"} 2\n')
    expect(text).toContain('db_queries_total{operation="select"} 2\n')
    expect(text).toContain('db_query_duration_seconds_count{operation="select"} 2\n')
    expect(text).toContain('\ndb_pool_checked_out_connections 2\n')
    expect(text).toContain('\ndb_pool_idle_connections 1\n')
    expect(text).toContain('\ndb_pool_waiters 0\n')
  })

  it('should report an unreachable database on /health', async () => {
    const registry = createRegistry({ defaultMetrics: false })
    const down: Queryable = {
      async query() {
        throw new Error('connect ECONNREFUSED 127.0.0.1:5432')
      },
    }
    const { app } = createService({ config, repository: new PgUserDataRepository(down), registry })

    const res = await app.fetch(request('/health'))

    expect(res.status).toBe(500)
    expect(await res.json()).toEqual({
      status: 'error',
      database: 'unreachable',
      detail: 'connect ECONNREFUSED 127.0.0.1:5432',
    })
  })
})
