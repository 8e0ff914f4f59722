/**
 * Coerces an unknown thrown value into an {@link Error}.
 *
 * `catch` clauses and promise rejections can carry anything; the pipeline's
 * `ResultAsync.fromPromise` error mappers always want an `Error`.
 *
 * @returns `e` itself if it is already an `Error`, otherwise `new Error(String(e))`.
 */
export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e))
}

/**
 * The `code` of a Node.js system error (`'ENOENT'`, `'EISDIR'`, ...), or
 * `undefined` when `e` carries no string code.
 */
export function errorCode(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code
  }
  return undefined
}
