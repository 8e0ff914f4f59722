/**
 * Configuration schema: runtime settings for a shelf server.
 *
 * Loaded from `.shelfrc` (KEY=VALUE format) via `loadConfig` in `core/config.ts`.
 * Every key has a default so `ConfigSchema.parse({})` returns a fully-populated
 * config and shelf serves `./public` on loopback with no file at all.
 *
 * @module Configuration
 */
import { z } from 'zod'

/**
 * Runtime configuration for a shelf server.
 *
 * Configuration groups:
 * - **Listener**: `root`, `host`, `port`
 * - **Worker pool**: `poolSize`
 * - **Compression**: `gzipMinSize`, `gzipLevel`
 * - **Logging**: `logFile`, `logLevel`, `logPretty`
 * - **Error reporting**: `sentryDsn`, `sentryEnvironment`, `sentryTracesSampleRate`
 *
 * @category Configuration
 * @group Configuration
 */
export const ConfigSchema = z.object({
  /** Directory served as the root. Resolved against the working directory at startup. */
  root: z.string().min(1).default('public'),
  /** Interface the listener binds to. */
  host: z.string().min(1).default('127.0.0.1'),
  /** TCP port the listener binds to. */
  port: z.number().int().min(0).max(65535).default(8080),
  /** Number of file-loading jobs that may run at once. */
  poolSize: z.number().int().positive().default(4),
  /** Files must be strictly larger than this many bytes to be gzip-encoded. */
  gzipMinSize: z.number().int().nonnegative().default(1024),
  /** zlib compression level for gzip responses (1 = fastest). */
  gzipLevel: z.number().int().min(0).max(9).default(1),
  /** Path to a pino log file. Empty string logs to stderr only. */
  logFile: z.string().default(''),
  /** Pino log level (trace, debug, info, warn, error, fatal, silent). */
  logLevel: z.string().default('info'),
  /** Enable pretty-printed log output (for development). */
  logPretty: z.boolean().default(false),
  /** Sentry DSN for error reporting. Empty means disabled. */
  sentryDsn: z.string().default(''),
  /** Sentry environment tag (e.g. 'production', 'development'). */
  sentryEnvironment: z.string().default('development'),
  /** Sentry traces sample rate (0.0–1.0). */
  sentryTracesSampleRate: z.number().min(0).max(1).default(0.2),
})

/**
 * Validated shelf runtime configuration. Derived from {@link ConfigSchema}.
 *
 * @category Configuration
 * @group Configuration
 */
export type Config = z.infer<typeof ConfigSchema>
