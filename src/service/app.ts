/**
 * UserData API
 *
 * CRUD over /data plus /health and the metrics endpoint, every request
 * recorded by the HTTP instrumentation.
 */

import type { Config } from '../config/index.js'
import { Errors } from '../errors/index.js'
import { HttpApp, healthHandler, metricsHandler, type HttpContext } from '../http/index.js'
import {
  createHttpMetrics,
  createPoolMetrics,
  type HttpMetrics,
  type PoolMetrics,
  type PoolStatusReader,
} from '../instrumentation/index.js'
import type { MetricRegistry } from '../metrics/index.js'
import { parseOrThrow } from '../validation/index.js'
import type { UserDataRepository } from './repository.js'
import { ItemIdSchema, PaginationSchema, UserDataInputSchema, type UserDataInput } from './schemas.js'

export interface ServiceOptions {
  config: Pick<Config, 'metricsPath' | 'httpBuckets'>
  repository: UserDataRepository
  registry: MetricRegistry
  /** Pool counters for the db_pool_* gauges; omitted when there is no pool */
  poolStatus?: PoolStatusReader
}

export interface Service {
  app: HttpApp
  httpMetrics: HttpMetrics
  poolMetrics: PoolMetrics | undefined
}

async function readInput(c: HttpContext): Promise<UserDataInput> {
  let body: unknown
  try {
    body = await c.req.json()
  } catch {
    throw Errors.validation([{ field: 'body', reason: 'Invalid JSON' }])
  }
  return parseOrThrow(UserDataInputSchema, body)
}

function readId(c: HttpContext): number {
  return parseOrThrow(ItemIdSchema, c.req.param('id'))
}

export function createService(options: ServiceOptions): Service {
  const { config, repository, registry, poolStatus } = options

  const httpMetrics = createHttpMetrics(registry, { buckets: config.httpBuckets })
  const poolMetrics = poolStatus ? createPoolMetrics(registry, poolStatus) : undefined

  const app = new HttpApp().use(httpMetrics.middleware())

  app.post('/data', async (c) => {
    const item = await repository.create(await readInput(c))
    return c.json(item, 201)
  })

  app.get('/data', async (c) => {
    const { skip, limit } = parseOrThrow(PaginationSchema, {
      skip: c.req.query('skip'),
      limit: c.req.query('limit'),
    })
    return c.json(await repository.list(skip, limit))
  })

  app.put('/data/:id', async (c) => {
    const id = readId(c)
    const item = await repository.update(id, await readInput(c))
    if (!item) throw Errors.notFound('Item', id)
    return c.json(item)
  })

  app.delete('/data/:id', async (c) => {
    const id = readId(c)
    const item = await repository.remove(id)
    if (!item) throw Errors.notFound('Item', id)
    return c.json(item)
  })

  app.get('/health', healthHandler([() => repository.ping()]))

  app.get(
    config.metricsPath,
    metricsHandler(registry, {
      beforeRender: poolMetrics ? [() => poolMetrics.refresh()] : [],
    })
  )

  return { app, httpMetrics, poolMetrics }
}
