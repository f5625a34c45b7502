/**
 * HttpApp - fetch-style HTTP Router
 *
 * - Routes: get, post, put, delete
 * - Middleware: use with next() pattern
 * - Error handling: notFound(), onError()
 * - Fetch handler: fetch() for serve() or tests
 */

import { isPromwireError } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'
import { HttpContext } from './context.js'

const logger = createLogger('http')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** HTTP methods */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

/** Handler function for routes */
export type HttpHandler = (c: HttpContext) => Response | Promise<Response>

/**
 * Middleware function with next(). After next() resolves, c.res holds the
 * response of the rest of the chain.
 */
export type HttpMiddleware = (c: HttpContext, next: () => Promise<void>) => Promise<void>

/** Error handler function */
export type HttpErrorHandler = (err: Error, c: HttpContext) => Response | Promise<Response>

/** Not found handler function */
export type HttpNotFoundHandler = (c: HttpContext) => Response | Promise<Response>

/** Route definition */
interface Route {
  method: HttpMethod
  pattern: RegExp
  paramNames: string[]
  handler: HttpHandler
  path: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Path Pattern Compilation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Compile a path pattern such as /data/:id into a regex
 */
function compilePath(path: string): { pattern: RegExp; paramNames: string[] } {
  const paramNames: string[] = []
  const pattern = path
    .replace(/[.+*?^${}()|[\]\\]/g, '\\$&')
    .replace(/:([a-zA-Z_][a-zA-Z0-9_]*)/g, (_, name: string) => {
      paramNames.push(name)
      return '([^/]+)'
    })

  return { pattern: new RegExp(`^${pattern}$`), paramNames }
}

/** Decoded path segment, or undefined for a malformed percent escape */
function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment)
  } catch (err) {
    if (err instanceof URIError) return undefined
    throw err
  }
}

/**
 * Params of a matching route. A segment that does not decode is a non-match,
 * so the request still runs the middleware chain and reaches notFound.
 */
function matchPath(pathname: string, route: Route): Record<string, string> | null {
  const match = route.pattern.exec(pathname)
  if (!match) return null

  const params: Record<string, string> = {}
  for (const [i, name] of route.paramNames.entries()) {
    const value = decodeSegment(match[i + 1])
    if (value === undefined) return null
    params[name] = value
  }
  return params
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Default error mapping: PromwireError keeps its status, anything else is a 500
 */
const defaultErrorHandler: HttpErrorHandler = (err, c) => {
  if (isPromwireError(err)) {
    return c.json({ error: err.toJSON() }, err.status)
  }
  logger.error({ err, path: c.req.path }, 'Unhandled error')
  return c.json({ error: { code: 'INTERNAL_ERROR', status: 500, message: 'Internal error' } }, 500)
}

const defaultNotFound: HttpNotFoundHandler = (c) => c.notFound()

// ─────────────────────────────────────────────────────────────────────────────
// HttpApp Class
// ─────────────────────────────────────────────────────────────────────────────

/**
 * @example
 * const app = new HttpApp()
 *
 * app.use(async (c, next) => {
 *   await next()
 *   logger.info({ status: c.res?.status }, c.req.path)
 * })
 *
 * app.get('/data/:id', (c) => c.json({ id: c.req.param('id') }))
 *
 * serve({ fetch: app.fetch, port: 8000 })
 */
export class HttpApp {
  private readonly routes: Route[] = []
  private readonly middlewares: HttpMiddleware[] = []
  private notFoundHandler: HttpNotFoundHandler = defaultNotFound
  private errorHandler: HttpErrorHandler = defaultErrorHandler

  get(path: string, handler: HttpHandler): this {
    return this.on('GET', path, handler)
  }

  post(path: string, handler: HttpHandler): this {
    return this.on('POST', path, handler)
  }

  put(path: string, handler: HttpHandler): this {
    return this.on('PUT', path, handler)
  }

  delete(path: string, handler: HttpHandler): this {
    return this.on('DELETE', path, handler)
  }

  on(method: HttpMethod, path: string, handler: HttpHandler): this {
    const { pattern, paramNames } = compilePath(path)
    this.routes.push({ method, pattern, paramNames, handler, path })
    return this
  }

  /**
   * Register middleware for every request, in registration order
   */
  use(middleware: HttpMiddleware): this {
    this.middlewares.push(middleware)
    return this
  }

  notFound(handler: HttpNotFoundHandler): this {
    this.notFoundHandler = handler
    return this
  }

  onError(handler: HttpErrorHandler): this {
    this.errorHandler = handler
    return this
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Request Handling
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Errors thrown by a route handler become a response here, inside the
   * middleware chain, so middleware observes the status the client gets.
   */
  private async runEndpoint(c: HttpContext, route: Route | null): Promise<Response> {
    try {
      return route ? await route.handler(c) : await this.notFoundHandler(c)
    } catch (err) {
      return this.errorHandler(toError(err), c)
    }
  }

  /**
   * Fetch handler
   *
   * - serve({ fetch: app.fetch })
   * - tests: app.fetch(new Request('http://localhost/data'))
   */
  fetch = async (request: Request): Promise<Response> => {
    const pathname = new URL(request.url).pathname
    const method = request.method.toUpperCase()

    let matched: Route | null = null
    let params: Record<string, string> = {}
    for (const route of this.routes) {
      if (route.method !== method) continue
      const found = matchPath(pathname, route)
      if (found) {
        matched = route
        params = found
        break
      }
    }

    const c = new HttpContext(request, params)

    let index = 0
    const next = async (): Promise<void> => {
      const middleware = this.middlewares[index++]
      if (middleware) {
        await middleware(c, next)
      } else {
        c.res = await this.runEndpoint(c, matched)
      }
    }

    try {
      await next()
    } catch (err) {
      // Thrown by a middleware
      try {
        return await this.errorHandler(toError(err), c)
      } catch (handlerError) {
        logger.error({ err: handlerError }, 'Error in error handler')
        return new Response('Internal Server Error', { status: 500 })
      }
    }

    return c.res ?? new Response('Internal Server Error', { status: 500 })
  }

  /**
   * Registered routes (for debugging/documentation)
   */
  getRoutes(): { method: HttpMethod; path: string }[] {
    return this.routes.map((r) => ({ method: r.method, path: r.path }))
  }
}
