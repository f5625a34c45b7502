/**
 * HTTP Module
 *
 * - HttpApp: fetch-style router
 * - serve: Node.js server helper with graceful shutdown
 * - metricsHandler / healthHandler: scrape and health endpoints
 */

export { HttpApp } from './app.js'
export type {
  HttpMethod,
  HttpHandler,
  HttpMiddleware,
  HttpErrorHandler,
  HttpNotFoundHandler,
} from './app.js'

export { HttpContext, HttpRequest } from './context.js'

export { serve } from './serve.js'
export type { FetchHandler, ServeOptions, ManagedServer } from './serve.js'

export { metricsHandler, type BeforeRenderHook, type MetricsHandlerOptions } from './metrics.js'
export { healthHandler, type HealthCheckFn, type HealthyResponse, type UnhealthyResponse } from './health.js'

export type { BodyInit, HeadersInit } from './web-types.js'
