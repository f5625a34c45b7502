/**
 * Node.js Serve Helper
 *
 * Runs a fetch handler on a node:http server, with graceful shutdown.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import { createLogger } from '../utils/logger.js'

const logger = createLogger('serve')

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/** Fetch handler function */
export type FetchHandler = (request: Request) => Response | Promise<Response>

export interface ServeOptions {
  /** Fetch handler (e.g., app.fetch) */
  fetch: FetchHandler
  /** @default 8000 */
  port?: number
  /** @default '0.0.0.0' */
  hostname?: string
  onListen?: (info: { port: number; hostname: string }) => void
}

/** Server with graceful shutdown */
export interface ManagedServer {
  readonly server: Server
  /** Current count of in-flight requests */
  getInFlightCount(): number
  /**
   * Stop accepting requests, wait for in-flight ones (up to timeoutMs),
   * then close the listener
   */
  shutdown(timeoutMs?: number): Promise<void>
}

// ─────────────────────────────────────────────────────────────────────────────
// Request Conversion
// ─────────────────────────────────────────────────────────────────────────────

async function nodeRequestToWebRequest(req: IncomingMessage): Promise<Request> {
  const host = req.headers.host ?? 'localhost'
  const url = `http://${host}${req.url ?? '/'}`

  let body: Buffer | undefined
  if (req.method !== 'GET' && req.method !== 'HEAD') {
    const chunks: Buffer[] = []
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)))
    }
    if (chunks.length > 0) {
      body = Buffer.concat(chunks)
    }
  }

  const headers = new Headers()
  for (const [key, value] of Object.entries(req.headers)) {
    if (value === undefined) continue
    headers.set(key, Array.isArray(value) ? value.join(', ') : value)
  }

  return new Request(url, { method: req.method, headers, body })
}

async function sendWebResponse(webResponse: Response, res: ServerResponse): Promise<void> {
  res.statusCode = webResponse.status
  webResponse.headers.forEach((value, key) => {
    res.setHeader(key, value)
  })

  if (webResponse.body) {
    const reader = webResponse.body.getReader()
    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break
        res.write(value)
      }
    } finally {
      reader.releaseLock()
    }
  }

  res.end()
}

// ─────────────────────────────────────────────────────────────────────────────
// Serve Function
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Create and start an HTTP server for the given fetch handler
 *
 * @example
 * const server = serve({ fetch: app.fetch, port: 8000 })
 * process.on('SIGTERM', () => {
 *   server.shutdown().catch((err) => logger.error({ err }, 'Shutdown failed'))
 * })
 */
export function serve(options: ServeOptions): ManagedServer {
  const { fetch, port = 8000, hostname = '0.0.0.0', onListen } = options

  let inFlightCount = 0
  let accepting = true
  const idleWaiters: (() => void)[] = []

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!accepting) {
      res.statusCode = 503
      res.setHeader('Connection', 'close')
      res.end('Service Unavailable')
      return
    }

    inFlightCount++
    try {
      const webRequest = await nodeRequestToWebRequest(req)
      const webResponse = await fetch(webRequest)
      // Draining: let the socket go once this response is written
      if (!accepting) res.setHeader('Connection', 'close')
      await sendWebResponse(webResponse, res)
    } catch (err) {
      logger.error({ err, url: req.url }, 'Request failed')
      if (!res.headersSent) {
        res.statusCode = 500
        res.end('Internal Server Error')
      } else {
        res.destroy()
      }
    } finally {
      inFlightCount--
      if (inFlightCount === 0) {
        for (const resolve of idleWaiters.splice(0)) resolve()
      }
    }
  }

  const server = createServer((req, res) => {
    void handleRequest(req, res)
  })

  server.on('error', (err) => {
    logger.error({ err }, 'Server error')
  })

  server.listen(port, hostname, () => {
    // Port 0 binds an ephemeral port; report the one actually bound
    const address = server.address()
    const boundPort = typeof address === 'object' && address !== null ? address.port : port
    logger.info({ port: boundPort, hostname }, 'Listening')
    onListen?.({ port: boundPort, hostname })
  })

  function waitForIdle(timeoutMs: number): Promise<void> {
    if (inFlightCount === 0) return Promise.resolve()
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        const i = idleWaiters.indexOf(done)
        if (i !== -1) idleWaiters.splice(i, 1)
        resolve()
      }, timeoutMs)
      const done = () => {
        clearTimeout(timer)
        resolve()
      }
      idleWaiters.push(done)
    })
  }

  return {
    server,
    getInFlightCount: () => inFlightCount,
    async shutdown(timeoutMs = 30000) {
      accepting = false
      await waitForIdle(timeoutMs)
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      })
    },
  }
}
