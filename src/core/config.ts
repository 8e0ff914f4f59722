import { readFileSync } from 'fs'
import { err, ok, type Result } from 'neverthrow'
import { join, resolve } from 'path'
import { z } from 'zod'
import { type Config, ConfigSchema } from '@/types/index'

const KEY_MAP: Record<string, keyof Config> = {
  ROOT: 'root',
  HOST: 'host',
  PORT: 'port',
  POOL_SIZE: 'poolSize',
  GZIP_MIN_SIZE: 'gzipMinSize',
  GZIP_LEVEL: 'gzipLevel',
  LOG_FILE: 'logFile',
  LOG_LEVEL: 'logLevel',
  LOG_PRETTY: 'logPretty',
  SENTRY_DSN: 'sentryDsn',
  SENTRY_ENVIRONMENT: 'sentryEnvironment',
  SENTRY_TRACES_SAMPLE_RATE: 'sentryTracesSampleRate',
}

// Zod schema that coerces string values (all .shelfrc values are strings)
const RawConfigSchema = ConfigSchema.extend({
  port: z.coerce.number().int().min(0).max(65535).default(8080),
  poolSize: z.coerce.number().int().positive().default(4),
  gzipMinSize: z.coerce.number().int().nonnegative().default(1024),
  gzipLevel: z.coerce.number().int().min(0).max(9).default(1),
  sentryTracesSampleRate: z.coerce.number().min(0).max(1).default(0.2),
  logPretty: z
    .preprocess((v) => v === '1' || v === 'true' || v === true, z.boolean())
    .default(false),
})

/**
 * Parses a `.shelfrc` KEY=VALUE string into a validated {@link Config}.
 *
 * Only recognises keys listed in the internal KEY_MAP; unknown keys are ignored.
 *
 * @param content - Raw `.shelfrc` file contents.
 * @returns `ok(Config)` on success, `err(ZodError)` if a field fails validation.
 * @category Configuration
 */
export function parseShelfrc(content: string): Result<Config, z.ZodError> {
  const raw: Record<string, string> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) {
      continue
    }
    const eq = trimmed.indexOf('=')
    if (eq === -1) {
      continue
    }
    const key = trimmed.slice(0, eq).trim()
    const val = trimmed.slice(eq + 1).trim()
    const mapped = KEY_MAP[key]
    if (mapped) {
      raw[mapped] = val
    }
  }
  const parsed = RawConfigSchema.safeParse(raw)
  return parsed.success ? ok(parsed.data) : err(parsed.error)
}

/**
 * Loads shelf configuration from a `.shelfrc` file.
 *
 * Falls back to schema defaults if the file is missing or cannot be parsed.
 * Never throws.
 *
 * @param rcPath - Path to the `.shelfrc` file. Defaults to `<cwd>/.shelfrc`.
 * @category Configuration
 */
export function loadConfig(rcPath?: string): Config {
  const filePath = rcPath ? resolve(rcPath) : join(process.cwd(), '.shelfrc')
  try {
    const content = readFileSync(filePath, 'utf8')
    return parseShelfrc(content).match(
      (c) => c,
      () => RawConfigSchema.parse({}),
    )
  } catch {
    return RawConfigSchema.parse({})
  }
}

/**
 * Parses a TCP port argument.
 *
 * @returns The port, or `undefined` when `value` is not an integer in 0–65535.
 * @category Configuration
 */
export function parsePort(value: string): number | undefined {
  const parsed = ConfigSchema.shape.port.safeParse(Number(value.trim()))
  return value.trim() !== '' && parsed.success ? parsed.data : undefined
}

/**
 * Applies command-line overrides on top of a loaded {@link Config}.
 * Undefined overrides leave the config value in place.
 *
 * @category Configuration
 */
export function applyCliOverrides(
  config: Config,
  overrides: { root?: string; port?: number; host?: string },
): Config {
  return {
    ...config,
    root: overrides.root ?? config.root,
    port: overrides.port ?? config.port,
    host: overrides.host ?? config.host,
  }
}
