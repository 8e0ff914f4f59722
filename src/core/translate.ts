/** @module Request Pipeline */
import type { HttpResponse, ResponseOutcome } from '@/types'

const EMPTY = Buffer.alloc(0)

function empty(status: number): HttpResponse {
  return { status, headers: { 'content-length': '0' }, body: EMPTY }
}

/**
 * Converts a {@link ResponseOutcome} into the wire response.
 *
 * `content-length` is always the length of the bytes actually sent, which
 * for a gzip response is the compressed length. Failure responses carry no
 * body and never reveal their cause.
 *
 * @category Request Pipeline
 */
export function translateOutcome(outcome: ResponseOutcome): HttpResponse {
  switch (outcome.kind) {
    case 'success': {
      const headers: Record<string, string> = {
        'content-length': String(outcome.length),
      }
      if (outcome.contentType !== undefined) {
        headers['content-type'] = outcome.contentType
      }
      if (outcome.gzip) {
        headers['content-encoding'] = 'gzip'
      }
      return { status: 200, headers, body: outcome.body }
    }
    case 'not_found':
      return empty(404)
    case 'method_not_allowed':
      return empty(405)
    case 'internal_error':
      return empty(500)
    default: {
      const unreachable: never = outcome
      return unreachable
    }
  }
}
