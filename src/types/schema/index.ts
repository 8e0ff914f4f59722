/**
 * Schema barrel: re-exports all schemas and their inferred types.
 *
 * This is the single entry point for importing schema types throughout the
 * codebase. All schemas live in this directory (`src/types/schema/`) and are
 * re-exported here for convenience.
 *
 * @module Configuration
 */

// ── Configuration ────────────────────────────────────────────────────────────
export { ConfigSchema, type Config } from './config-schema'

// ── Request Pipeline ─────────────────────────────────────────────────────────
export type {
  HttpRequest,
  HttpResponse,
  FileBody,
  ResponseOutcome,
} from './http-schema'
export { MimeTypeSchema, type MimeType } from './mime-schema'
