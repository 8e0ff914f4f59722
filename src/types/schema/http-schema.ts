/**
 * Request, file body and outcome types shared by the loader, the request
 * handler and the HTTP binding.
 *
 * Plain TS types rather than Zod schemas: every value here is constructed
 * by shelf itself, never parsed from untrusted input.
 *
 * @module Request Pipeline
 */
import type { IncomingHttpHeaders } from 'http'
import type { MimeType } from './mime-schema'

/**
 * The `(method, path, headers)` tuple the HTTP binding hands to the handler.
 * `path` is the raw request target; the handler strips the query string.
 */
export interface HttpRequest {
  method: string
  path: string
  headers: IncomingHttpHeaders
}

/**
 * The buffered `(status, headers, body)` tuple written back to the client.
 * Header names are lower-case.
 */
export interface HttpResponse {
  status: number
  headers: Record<string, string>
  body: Buffer
}

/**
 * Bytes read by the file loader, ready to be placed on the wire.
 *
 * `rawLength` is the uncompressed size on disk; `bytes.length` differs from it
 * only when `gzip` is true.
 */
export interface FileBody {
  bytes: Buffer
  rawLength: number
  gzip: boolean
}

/**
 * The closed set of per-request results, before translation to a wire
 * response by `translateOutcome`.
 *
 * @category Request Pipeline
 */
export type ResponseOutcome =
  | {
      kind: 'success'
      body: Buffer
      length: number
      contentType: MimeType | undefined
      gzip: boolean
    }
  | { kind: 'not_found' }
  | { kind: 'method_not_allowed' }
  | { kind: 'internal_error'; cause: Error }
