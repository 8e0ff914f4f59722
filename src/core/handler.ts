/**
 * Request handler, driving one request through the pipeline:
 * method check → path resolution + gzip negotiation → pooled file load →
 * outcome translation → request log line.
 *
 * The handler only ever suspends while the worker pool runs the load job.
 * File errors are translated here and never escape; the returned promise
 * rejects only on a programming error, which the HTTP binding treats as a
 * transport failure.
 *
 * @module Request Pipeline
 */
import type pino from 'pino'
import { contentTypeFor } from '@/core/content-type'
import { loadFile } from '@/core/file-loader'
import type { WorkerPool } from '@/core/pool'
import { resolveRequestPath } from '@/core/resolve-path'
import { translateOutcome } from '@/core/translate'
import { FileNotFoundError, type FileError } from '@/errors'
import type { FileBody, HttpRequest, HttpResponse, ResponseOutcome } from '@/types'
import { createLogger } from '@/utils/logger'
import { captureException } from '@/utils/sentry'

/**
 * Everything the handler needs, constructed once at startup.
 *
 * @category Request Pipeline
 */
export interface RequestHandlerDeps {
  /** Absolute server root. */
  root: string
  pool: WorkerPool
  gzipMinSize: number
  gzipLevel: number
  /** Defaults to a logger named `http`. */
  logger?: pino.Logger
  /** Monotonic clock in nanoseconds. Defaults to `process.hrtime.bigint`. */
  now?: () => bigint
}

/** Serves one request; see {@link createRequestHandler}. */
export type RequestHandler = (req: HttpRequest) => Promise<HttpResponse>

/**
 * Whether an `Accept-Encoding` header offers gzip.
 *
 * Any comma-separated token equal to `gzip` (case-insensitive) counts;
 * `;q=` parameters are ignored.
 */
export function acceptsGzip(header: string | string[] | undefined): boolean {
  if (header === undefined) return false
  const values = Array.isArray(header) ? header : [header]
  return values.some((value) =>
    value.split(',').some((token) => token.split(';')[0].trim().toLowerCase() === 'gzip'),
  )
}

/** Drops the query string and the leading `/` from a request target. */
export function toRequestPath(target: string): string {
  const pathname = target.split('?', 1)[0]
  return pathname.startsWith('/') ? pathname.slice(1) : pathname
}

/**
 * Builds the request handler bound to a root and a worker pool.
 *
 * @category Request Pipeline
 */
export function createRequestHandler(deps: RequestHandlerDeps): RequestHandler {
  const { root, pool, gzipMinSize, gzipLevel } = deps
  const log = deps.logger ?? createLogger('http')
  const now = deps.now ?? (() => process.hrtime.bigint())

  // A failing log sink must not change the response.
  function quietly(write: () => void): void {
    try {
      write()
    } catch (e) {
      captureException(e)
    }
  }

  function toOutcome(resolved: string, file: FileBody): ResponseOutcome {
    return {
      kind: 'success',
      body: file.bytes,
      length: file.bytes.length,
      contentType: contentTypeFor(resolved),
      gzip: file.gzip,
    }
  }

  function fromError(resolved: string, error: FileError): ResponseOutcome {
    if (error instanceof FileNotFoundError) {
      return { kind: 'not_found' }
    }
    quietly(() => log.error({ err: error, path: resolved }, error.message))
    captureException(error)
    return { kind: 'internal_error', cause: error }
  }

  async function dispatch(req: HttpRequest): Promise<ResponseOutcome> {
    if (req.method !== 'GET') {
      return { kind: 'method_not_allowed' }
    }
    const resolved = await resolveRequestPath(root, toRequestPath(req.path))
    const gzip = acceptsGzip(req.headers['accept-encoding'])
    const result = await pool.submit(() => loadFile(resolved, { gzip, gzipMinSize, gzipLevel }))
    return result.match(
      (file) => toOutcome(resolved, file),
      (error) => fromError(resolved, error),
    )
  }

  function record(req: HttpRequest, status: number, elapsedNs: bigint): void {
    quietly(() =>
      log.info(
        { method: req.method, path: req.path, status, elapsedUs: Number(elapsedNs / 1000n) },
        `[${status}] ${req.method} ${req.path}`,
      ),
    )
  }

  return async (req) => {
    const start = now()
    const response = translateOutcome(await dispatch(req))
    record(req, response.status, now() - start)
    return response
  }
}
