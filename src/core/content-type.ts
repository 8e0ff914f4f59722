/** @module Request Pipeline */
import { extname } from 'path'
import { MimeTypeSchema, type MimeType } from '@/types'

const CONTENT_TYPES = new Map<string, MimeType>([
  ['jpg', 'image/jpeg'],
  ['jpeg', 'image/jpeg'],
  ['png', 'image/png'],
  ['gif', 'image/gif'],
  ['txt', 'text/plain'],
  ['md', 'text/plain'],
  ['html', 'text/html'],
  ['xml', 'application/xml'],
  ['json', 'application/json'],
  ['css', 'text/css'],
])

/**
 * Best-effort content type for `path`, from its extension alone.
 *
 * Known extensions map through a fixed table (case-insensitively). Any other
 * extension is used as-is only if it already parses as a MIME type; files
 * without an extension get no content type.
 *
 * @category Request Pipeline
 */
export function contentTypeFor(path: string): MimeType | undefined {
  const ext = extname(path).slice(1)
  if (ext === '') return undefined
  const known = CONTENT_TYPES.get(ext.toLowerCase())
  if (known) return known
  const parsed = MimeTypeSchema.safeParse(ext)
  return parsed.success ? parsed.data : undefined
}
