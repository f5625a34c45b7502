/**
 * HttpContext
 *
 * Request helpers: c.req.param(), c.req.query(), c.req.json()
 * Response helpers: c.json(), c.text(), c.body()
 */

import type { BodyInit, HeadersInit } from './web-types.js'

// ─────────────────────────────────────────────────────────────────────────────
// Request
// ─────────────────────────────────────────────────────────────────────────────

/** HTTP Request wrapper */
export class HttpRequest {
  private readonly parsedUrl: URL
  private cachedText: string | undefined

  constructor(
    readonly raw: Request,
    private readonly params: Record<string, string>
  ) {
    this.parsedUrl = new URL(raw.url)
  }

  get method(): string {
    return this.raw.method
  }

  /** Request path without the query string */
  get path(): string {
    return this.parsedUrl.pathname
  }

  /** Path parameter (e.g. 'id' for /data/:id) */
  param(name: string): string | undefined {
    return this.params[name]
  }

  /** First value of a query parameter */
  query(name: string): string | undefined {
    return this.parsedUrl.searchParams.get(name) ?? undefined
  }

  header(name: string): string | undefined {
    return this.raw.headers.get(name) ?? undefined
  }

  async text(): Promise<string> {
    if (this.cachedText === undefined) {
      this.cachedText = await this.raw.text()
    }
    return this.cachedText
  }

  /**
   * Parse the body as JSON. The result is untyped; validate it before use.
   * @throws SyntaxError if the body is not valid JSON
   */
  async json(): Promise<unknown> {
    const text = await this.text()
    return JSON.parse(text)
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Context
// ─────────────────────────────────────────────────────────────────────────────

export class HttpContext {
  readonly req: HttpRequest

  /** Response produced by the handler chain */
  res: Response | undefined

  constructor(request: Request, params: Record<string, string> = {}) {
    this.req = new HttpRequest(request, params)
  }

  json(data: unknown, status = 200, headers?: HeadersInit): Response {
    const responseHeaders = new Headers(headers)
    responseHeaders.set('Content-Type', 'application/json; charset=UTF-8')
    return new Response(JSON.stringify(data), { status, headers: responseHeaders })
  }

  text(data: string, status = 200, headers?: HeadersInit): Response {
    const responseHeaders = new Headers(headers)
    if (!responseHeaders.has('Content-Type')) {
      responseHeaders.set('Content-Type', 'text/plain; charset=UTF-8')
    }
    return new Response(data, { status, headers: responseHeaders })
  }

  body(data: BodyInit | null, status = 200, headers?: HeadersInit): Response {
    return new Response(data, { status, headers })
  }

  notFound(): Response {
    return this.text('Not Found', 404)
  }
}
