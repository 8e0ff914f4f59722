/**
 * File loader: reads a resolved file into memory and optionally gzips it.
 *
 * Runs inside a worker pool slot. All I/O goes through `fs/promises` and
 * `zlib`, whose blocking work happens on libuv's thread pool rather than on
 * the event loop that accepts connections.
 *
 * @module Request Pipeline
 */
import { open } from 'fs/promises'
import { promisify } from 'util'
import { gzip as gzipCallback } from 'zlib'
import { ResultAsync, okAsync } from 'neverthrow'
import { FileIoError, FileNotFoundError, type FileError } from '@/errors'
import type { FileBody } from '@/types'
import { createLogger } from '@/utils/logger'
import { errorCode, toError } from '@/utils/toError'

const logger = createLogger('loader')
const gzipAsync = promisify(gzipCallback)

/**
 * Per-call compression settings.
 *
 * `gzip` is the client's preference; compression only happens when the file
 * is also strictly larger than `gzipMinSize` bytes.
 */
export interface LoadOptions {
  gzip: boolean
  gzipMinSize: number
  gzipLevel: number
}

function toFileError(path: string, e: unknown): FileError {
  if (errorCode(e) === 'ENOENT') {
    return new FileNotFoundError(path)
  }
  const error = toError(e)
  return new FileIoError(`Failed to read ${path}: ${error.message}`, error)
}

async function readToEnd(path: string): Promise<{ bytes: Buffer; size: number }> {
  logger.debug({ path }, 'loading file')
  const handle = await open(path, 'r')
  try {
    const { size } = await handle.stat()
    const bytes = await handle.readFile()
    return { bytes, size }
  } finally {
    await handle.close()
  }
}

/**
 * Reads the file at `path` to end-of-file and gzips it when eligible.
 *
 * @returns `ok(FileBody)`; `err(FileNotFoundError)` when the file does not
 *   exist; `err(FileIoError)` for any other read or compression failure.
 * @category Request Pipeline
 */
export function loadFile(path: string, opts: LoadOptions): ResultAsync<FileBody, FileError> {
  return ResultAsync.fromPromise(readToEnd(path), (e) => toFileError(path, e)).andThen(
    ({ bytes, size }): ResultAsync<FileBody, FileError> => {
      if (!opts.gzip || size <= opts.gzipMinSize) {
        return okAsync({ bytes, rawLength: size, gzip: false })
      }
      return ResultAsync.fromPromise(
        gzipAsync(bytes, { level: opts.gzipLevel }),
        (e) => new FileIoError(`Failed to gzip ${path}`, toError(e)),
      ).map((compressed) => ({ bytes: compressed, rawLength: size, gzip: true }))
    },
  )
}
