/**
 * Configuration
 *
 * Environment variables validated once at startup.
 *
 * @example
 * const config = loadConfig(process.env)
 * serve({ fetch: app.fetch, port: config.port, hostname: config.host })
 */

import { z } from 'zod'
import { parseOrThrow } from '../validation/index.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

/** Comma-separated, strictly increasing list of positive numbers */
const bucketList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((raw) => raw.split(',').map((part) => Number(part.trim())))
    .refine((bounds) => bounds.length > 0 && bounds.every((b) => Number.isFinite(b) && b > 0), {
      message: 'expected a comma-separated list of positive numbers',
    })
    .refine((bounds) => bounds.every((b, i) => i === 0 || b > bounds[i - 1]), {
      message: 'bucket bounds must be strictly increasing',
    })

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((raw) => (raw === undefined ? fallback : raw === 'true' || raw === '1'))

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    HOST: z.string().min(1).default('0.0.0.0'),
    DATABASE_URL: z.string().min(1).optional(),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    METRICS_PATH: z.string().startsWith('/').default('/metrics'),
    HTTP_BUCKETS: bucketList('0.1,0.3,0.5,1,3,5'),
    DB_BUCKETS: bucketList('0.005,0.01,0.025,0.05,0.1,0.25,0.5,1,2.5,5'),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    DEFAULT_METRICS: booleanFlag(true),
  })
  .transform((env) => ({
    port: env.PORT,
    host: env.HOST,
    databaseUrl: env.DATABASE_URL,
    logLevel: env.LOG_LEVEL,
    metricsPath: env.METRICS_PATH,
    httpBuckets: env.HTTP_BUCKETS,
    dbBuckets: env.DB_BUCKETS,
    dbPoolMax: env.DB_POOL_MAX,
    defaultMetrics: env.DEFAULT_METRICS,
  }))

export type Config = z.output<typeof ConfigSchema>

/**
 * Validate the environment. Throws VALIDATION_ERROR listing every issue.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  return parseOrThrow(ConfigSchema, env)
}
