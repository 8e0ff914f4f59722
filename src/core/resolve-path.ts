/**
 * Path resolution: turns a request path into a file path confined to the
 * server root.
 *
 * Canonicalization is purely lexical: segments are pushed onto a stack
 * relative to the root, so `..` can never pop above it no matter how many are
 * supplied. Nothing is percent-decoded; every other segment is an opaque
 * path component.
 *
 * @module Request Pipeline
 */
import { stat } from 'fs/promises'
import { extname, join } from 'path'
import { ResultAsync } from 'neverthrow'
import { toError } from '@/utils/toError'

/** Appended when the resolved path is a directory. */
export const INDEX_FILE = 'index.html'

/** Appended when the final component has no extension. */
export const DEFAULT_EXTENSION = '.html'

/**
 * Splits a request path into the segments that survive canonicalization.
 *
 * Empty segments (from a leading `/`, `//` or a trailing `/`) are skipped,
 * `.` is dropped and `..` pops the last kept segment, or does nothing when
 * none is left.
 */
export function requestSegments(requestPath: string): string[] {
  const kept: string[] = []
  for (const segment of requestPath.split('/')) {
    if (segment === '' || segment === '.') continue
    if (segment === '..') {
      kept.pop()
      continue
    }
    kept.push(segment)
  }
  return kept
}

/**
 * Joins the canonical segments of `requestPath` onto `root`.
 *
 * @param root - Absolute server root.
 * @param requestPath - Request path with its leading `/` already stripped.
 * @returns A path equal to `root` or beneath it.
 * @category Request Pipeline
 */
export function canonicalize(root: string, requestPath: string): string {
  return join(root, ...requestSegments(requestPath))
}

function isDirectory(path: string): Promise<boolean> {
  // A missing or unreadable entry is simply not a directory here; the loader
  // reports the real failure when it opens the file.
  return ResultAsync.fromPromise(stat(path), toError)
    .map((s) => s.isDirectory())
    .unwrapOr(false)
}

/**
 * Resolves `requestPath` to the file that should be served.
 *
 * After canonicalization, a directory (including the root itself) gains
 * `index.html`, and a final component without an extension gains `.html`.
 * The directory check is the only I/O performed.
 *
 * @param root - Absolute server root.
 * @param requestPath - Request path with its leading `/` already stripped.
 * @category Request Pipeline
 */
export async function resolveRequestPath(
  root: string,
  requestPath: string,
): Promise<string> {
  let resolved = canonicalize(root, requestPath)
  if (resolved === join(root) || (await isDirectory(resolved))) {
    resolved = join(resolved, INDEX_FILE)
  }
  if (extname(resolved) === '') {
    resolved += DEFAULT_EXTENSION
  }
  return resolved
}
