/**
 * Domain error classes: typed failures for shelf's request pipeline.
 *
 * The file loader and worker pool return neverthrow `Result`/`ResultAsync`
 * values, so the file errors appear in `err()` rather than being thrown. The
 * request handler translates them into HTTP statuses; only
 * {@link TransportError} travels past it, to the connection layer.
 *
 * @module Errors
 */

/**
 * The requested file (or its implicit `index.html` / `.html` target) does
 * not exist. Translated to 404 and never logged as an error.
 *
 * @category Errors
 */
export class FileNotFoundError extends Error {
  constructor(public readonly path: string) {
    super(`File not found: ${path}`)
    this.name = 'FileNotFoundError'
  }
}

/**
 * Any other filesystem or compression failure. Translated to 500; the
 * message and `cause` are logged but never sent to the client.
 *
 * @category Errors
 */
export class FileIoError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'FileIoError'
  }
}

/**
 * Failures a file job can produce.
 *
 * @category Errors
 */
export type FileError = FileNotFoundError | FileIoError

/**
 * A failure of the HTTP connection itself (socket error, malformed request,
 * failed write). Never mapped to a status code: the connection is torn down.
 *
 * @category Errors
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'TransportError'
  }
}
