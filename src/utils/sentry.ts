/**
 * Sentry integration: thin wrapper for error reporting.
 *
 * All exports are safe to call regardless of whether Sentry is initialised.
 * When no DSN is configured, {@link initSentry} is a no-op and the SDK
 * discards all events.
 *
 * @module Utilities
 */
import * as Sentry from '@sentry/node'
import type { Config } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('sentry')

/** Whether Sentry has been successfully initialised this process. */
let initialised = false

/**
 * Initialises the Sentry SDK using values from the shelf {@link Config}.
 *
 * Subsequent calls are ignored. When `config.sentryDsn` is empty the call is
 * a no-op.
 */
export function initSentry(
  config: Pick<Config, 'sentryDsn' | 'sentryEnvironment' | 'sentryTracesSampleRate'>,
): void {
  if (initialised || !config.sentryDsn) return

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.sentryEnvironment,
    tracesSampleRate: config.sentryTracesSampleRate,
    release: `shelf@${process.env.npm_package_version ?? '1.0.0'}`,
  })

  initialised = true
  logger.debug('sentry initialised')
}

/**
 * Captures an exception and sends it to Sentry.
 *
 * Accepts the same overloads as the Sentry SDK's `captureException`.
 */
export const captureException: typeof Sentry.captureException =
  Sentry.captureException.bind(Sentry)

/**
 * Flushes pending Sentry events before process exit.
 *
 * @param timeoutMs - Maximum time to wait for flush, in milliseconds.
 * @returns Resolves to `true` if all events were sent.
 */
export function flushSentry(timeoutMs = 2000): Promise<boolean> {
  return Sentry.flush(timeoutMs)
}
