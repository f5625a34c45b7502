/**
 * Service entry point
 *
 * Builds the registry, the instrumented pg pool and the HTTP app from the
 * environment, then serves until SIGTERM/SIGINT.
 */

import pg from 'pg'
import { loadConfig } from '../config/index.js'
import { Errors } from '../errors/index.js'
import { serve, type ManagedServer } from '../http/index.js'
import { createQueryMetrics, instrumentQueryable } from '../instrumentation/index.js'
import { createRegistry } from '../metrics/index.js'
import { createLogger, setLogLevel } from '../utils/logger.js'
import { createService } from './app.js'
import { PgUserDataRepository } from './pg-repository.js'

const logger = createLogger('service')

export async function main(env: Record<string, string | undefined> = process.env): Promise<ManagedServer> {
  const config = loadConfig(env)
  if (!config.databaseUrl) {
    throw Errors.validation([{ field: 'DATABASE_URL', reason: 'Required' }])
  }
  setLogLevel(config.logLevel)

  const registry = createRegistry({ defaultMetrics: config.defaultMetrics })
  const queryMetrics = createQueryMetrics(registry, { buckets: config.dbBuckets })

  const pool = new pg.Pool({ connectionString: config.databaseUrl, max: config.dbPoolMax })
  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected error on idle client')
  })

  const db = instrumentQueryable({ query: (text, values) => pool.query(text, values) }, queryMetrics)
  const repository = new PgUserDataRepository(db)
  await repository.ensureSchema()

  const { app } = createService({
    config,
    repository,
    registry,
    poolStatus: () => ({
      totalCount: pool.totalCount,
      idleCount: pool.idleCount,
      waitingCount: pool.waitingCount,
    }),
  })

  const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host })

  const stop = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down')
    server
      .shutdown()
      .then(() => pool.end())
      .catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed')
        process.exitCode = 1
      })
  }
  process.once('SIGTERM', stop)
  process.once('SIGINT', stop)

  return server
}
