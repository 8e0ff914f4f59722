/**
 * MIME type grammar: `type/subtype` with RFC 6838 restricted-name tokens.
 *
 * Used by the content-type resolver to accept an unknown file extension
 * verbatim only when it already is a valid MIME type.
 *
 * @module Request Pipeline
 */
import { z } from 'zod'

const TOKEN = "[A-Za-z0-9][A-Za-z0-9!#$&^_.+-]*"

/**
 * A `type/subtype` MIME string, without parameters.
 *
 * @category Request Pipeline
 */
export const MimeTypeSchema = z
  .string()
  .regex(new RegExp(`^${TOKEN}/${TOKEN}$`), 'not a MIME type')

/** A validated MIME type. Derived from {@link MimeTypeSchema}. */
export type MimeType = z.infer<typeof MimeTypeSchema>
