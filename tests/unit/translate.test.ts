import { describe, it, expect } from 'vitest'
import { translateOutcome } from '@/core/translate'

describe('translateOutcome', () => {
  it('emits 200 with length, type and encoding headers', () => {
    const body = Buffer.from('compressed-bytes')
    const response = translateOutcome({
      kind: 'success',
      body,
      length: body.length,
      contentType: 'text/plain',
      gzip: true,
    })
    expect(response.status).toBe(200)
    expect(response.headers).toEqual({
      'content-length': '16',
      'content-type': 'text/plain',
      'content-encoding': 'gzip',
    })
    expect(response.body).toBe(body)
  })

  it('omits content-type and content-encoding when absent', () => {
    const body = Buffer.from('plain')
    const response = translateOutcome({
      kind: 'success',
      body,
      length: body.length,
      contentType: undefined,
      gzip: false,
    })
    expect(response.headers).toEqual({ 'content-length': '5' })
  })

  it.each([
    ['not_found', 404],
    ['method_not_allowed', 405],
  ] as const)('maps %s to %i with an empty body', (kind, status) => {
    const response = translateOutcome({ kind })
    expect(response.status).toBe(status)
    expect(response.headers).toEqual({ 'content-length': '0' })
    expect(response.body.length).toBe(0)
  })

  it('maps internal_error to 500 without exposing the cause', () => {
    const response = translateOutcome({
      kind: 'internal_error',
      cause: new Error('EACCES: permission denied, open /srv/public/secret'),
    })
    expect(response.status).toBe(500)
    expect(response.headers).toEqual({ 'content-length': '0' })
    expect(response.body.length).toBe(0)
  })
})
