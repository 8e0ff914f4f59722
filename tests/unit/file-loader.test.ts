import { describe, it, expect, beforeAll, afterAll } from 'vitest'
import { join } from 'path'
import { gunzipSync } from 'zlib'
import { loadFile } from '@/core/file-loader'
import { FileIoError, FileNotFoundError } from '@/errors'
import { makeSite, textOfLength, type Site } from '@tests/fixtures/site'

const defaults = { gzip: false, gzipMinSize: 1024, gzipLevel: 1 }

describe('loadFile', () => {
  let site: Site

  beforeAll(() => {
    site = makeSite(
      {
        'small.txt': 'hello',
        'exact.txt': textOfLength(1024),
        'over.txt': textOfLength(1025),
        'big.txt': textOfLength(2000),
      },
      ['folder'],
    )
  })

  afterAll(() => site.cleanup())

  it('returns FileNotFoundError for a missing file', async () => {
    const path = join(site.root, 'nope.html')
    const result = await loadFile(path, defaults)
    expect(result.isErr()).toBe(true)
    const error = result._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(FileNotFoundError)
    expect(error.message).toBe(`File not found: ${path}`)
  })

  it('reads the whole file without compression by default', async () => {
    const result = await loadFile(join(site.root, 'big.txt'), defaults)
    const body = result._unsafeUnwrap()
    expect(body.gzip).toBe(false)
    expect(body.rawLength).toBe(2000)
    expect(body.bytes.toString('utf8')).toBe(textOfLength(2000))
  })

  it('does not gzip files at or below the threshold', async () => {
    const small = (await loadFile(join(site.root, 'small.txt'), { ...defaults, gzip: true }))._unsafeUnwrap()
    expect(small.gzip).toBe(false)
    expect(small.bytes.toString('utf8')).toBe('hello')

    const exact = (await loadFile(join(site.root, 'exact.txt'), { ...defaults, gzip: true }))._unsafeUnwrap()
    expect(exact.gzip).toBe(false)
    expect(exact.bytes.length).toBe(1024)
  })

  it('gzips files above the threshold when requested', async () => {
    const body = (await loadFile(join(site.root, 'over.txt'), { ...defaults, gzip: true }))._unsafeUnwrap()
    expect(body.gzip).toBe(true)
    expect(body.rawLength).toBe(1025)
    expect(body.bytes.length).toBeLessThan(1025)
    expect(gunzipSync(body.bytes).toString('utf8')).toBe(textOfLength(1025))
  })

  it('honours a custom threshold', async () => {
    const body = (
      await loadFile(join(site.root, 'small.txt'), { ...defaults, gzip: true, gzipMinSize: 0 })
    )._unsafeUnwrap()
    expect(body.gzip).toBe(true)
    expect(gunzipSync(body.bytes).toString('utf8')).toBe('hello')
  })

  it('reports a directory as an I/O error', async () => {
    const result = await loadFile(join(site.root, 'folder'), defaults)
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(FileIoError)
  })

  it('reports a file used as a directory as an I/O error, not a missing file', async () => {
    const result = await loadFile(join(site.root, 'small.txt', 'x.html'), defaults)
    expect(result._unsafeUnwrapErr()).toBeInstanceOf(FileIoError)
  })

  it('maps a compression failure to FileIoError', async () => {
    const path = join(site.root, 'big.txt')
    const result = await loadFile(path, { ...defaults, gzip: true, gzipLevel: 42 })
    const error = result._unsafeUnwrapErr()
    expect(error).toBeInstanceOf(FileIoError)
    expect(error.message).toBe(`Failed to gzip ${path}`)
  })
})
