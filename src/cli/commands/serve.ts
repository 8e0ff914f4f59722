/** @module CLI Commands */
import type { Server } from 'http'
import { resolve } from 'path'
import { createRequestHandler } from '@/core/handler'
import { createStaticServer } from '@/core/http-server'
import { createWorkerPool } from '@/core/pool'
import type { Config } from '@/types'
import { createLogger } from '@/utils/logger'
import { flushSentry } from '@/utils/sentry'

const logger = createLogger('serve')

/**
 * Starts serving `config.root` and resolves once the listener is bound.
 *
 * Builds the worker pool and request handler once, binds on `config.host`
 * (loopback by default) and, unless `handleSignals` is false, closes the
 * server on SIGINT/SIGTERM and flushes Sentry before exiting.
 *
 * @param config - Loaded shelf configuration, with CLI overrides applied.
 * @param opts - `handleSignals`: install shutdown handlers (default true).
 * @returns The listening server.
 */
export async function serveCommand(
  config: Config,
  { handleSignals = true }: { handleSignals?: boolean } = {},
): Promise<Server> {
  const root = resolve(config.root)
  const pool = createWorkerPool({ size: config.poolSize, name: 'fs-pool' })
  const handle = createRequestHandler({
    root,
    pool,
    gzipMinSize: config.gzipMinSize,
    gzipLevel: config.gzipLevel,
  })
  const server = createStaticServer({ handle })

  await new Promise<void>((resolveListen, rejectListen) => {
    server.once('error', rejectListen)
    server.listen(config.port, config.host, () => {
      server.off('error', rejectListen)
      resolveListen()
    })
  })

  const address = server.address()
  const port = typeof address === 'object' && address !== null ? address.port : config.port
  logger.info({ root, host: config.host, port, poolSize: pool.size }, `Serving ${root} at http://${config.host}:${port}`)

  if (handleSignals) {
    const shutdown = (signal: NodeJS.Signals) => {
      logger.info({ signal, pool: pool.stats() }, 'shutting down')
      server.close(() => {
        void flushSentry().finally(() => process.exit(0))
      })
    }
    process.once('SIGINT', shutdown)
    process.once('SIGTERM', shutdown)
  }

  return server
}
