/**
 * HTTP binding: adapts `node:http` to the request handler.
 *
 * Each request is reduced to its `(method, path, headers)` tuple; the request
 * body, if any, is ignored. The buffered response is written in one call.
 * Anything that goes wrong with the connection itself surfaces as a
 * {@link TransportError}: it is logged and the socket is destroyed rather
 * than answered with a status code.
 *
 * @module Server
 */
import http from 'http'
import type pino from 'pino'
import type { RequestHandler } from '@/core/handler'
import { TransportError } from '@/errors'
import { createLogger } from '@/utils/logger'
import { toError } from '@/utils/toError'

/**
 * Creates an (unbound) HTTP server that serves every request through
 * `handle`.
 *
 * @param opts - `handle`: the request handler; `logger`: defaults to `server`.
 * @category Server
 */
export function createStaticServer({
  handle,
  logger,
}: {
  handle: RequestHandler
  logger?: pino.Logger
}): http.Server {
  const log = logger ?? createLogger('server')

  const fail = (socket: { destroy(error?: Error): void }, error: TransportError) => {
    log.warn({ err: error.cause ?? error }, error.message)
    socket.destroy()
  }

  const server = http.createServer((req, res) => {
    res.on('error', (e) => fail(res, new TransportError('response stream failed', toError(e))))

    void handle({
      method: req.method ?? '',
      path: req.url ?? '/',
      headers: req.headers,
    })
      .then((response) => {
        res.writeHead(response.status, response.headers)
        res.end(response.body)
      })
      .catch((e: unknown) => fail(res, new TransportError('failed to serve request', toError(e))))
  })

  server.on('clientError', (e, socket) => {
    fail(socket, new TransportError('client connection error', e))
  })

  return server
}
