/** @module CLI Commands */
import { Command } from 'commander'
import { applyCliOverrides, loadConfig, parsePort } from '@/core/config'
import { serveCommand } from '@/cli/commands'
import { logger, setLoggerConfig } from '@/utils/logger'
import { captureException, flushSentry, initSentry } from '@/utils/sentry'

const program = new Command()
program
  .name('shelf')
  .description('Serve files from a directory over HTTP')
  .version('1.0.0')
  .argument('[root]', 'Directory to serve (default: ROOT from .shelfrc, else ./public)')
  .argument('[port]', 'TCP port (default: PORT from .shelfrc, else 8080)', parsePort)
  .option('--config <path>', 'Path to .shelfrc config file (default: <cwd>/.shelfrc)')
  .option('--host <host>', 'Interface to bind (default: 127.0.0.1)')
  .action(
    async (
      root: string | undefined,
      port: number | undefined,
      opts: { config?: string; host?: string },
    ) => {
      const config = applyCliOverrides(loadConfig(opts.config), { root, port, host: opts.host })
      setLoggerConfig(config)
      initSentry(config)
      await serveCommand(config)
    },
  )

program.parseAsync(process.argv).catch(async (error: unknown) => {
  logger.fatal({ err: error }, 'unhandled CLI error')
  captureException(error)
  await flushSentry()
  process.exit(1)
})
