import { describe, expect, it } from 'vitest'
import { ResultAsync, errAsync, okAsync } from 'neverthrow'
import { createWorkerPool } from '@/core/pool'

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms))

function gate(): { opened: Promise<void>; open: () => void } {
  let open = () => {}
  const opened = new Promise<void>((r) => {
    open = r
  })
  return { opened, open }
}

describe('createWorkerPool', () => {
  it('should run at most `size` jobs at once', async () => {
    const pool = createWorkerPool({ size: 4 })
    let running = 0
    let maxRunning = 0

    const job = () =>
      pool.submit(() =>
        ResultAsync.fromSafePromise(
          (async () => {
            running++
            maxRunning = Math.max(maxRunning, running)
            await sleep(20)
            running--
          })(),
        ),
      )

    await Promise.all(Array.from({ length: 10 }, job))

    expect(maxRunning).toBe(4)
  })

  it('should resolve with the job result, ok or err', async () => {
    const pool = createWorkerPool({ size: 1 })
    const ok = await pool.submit(() => okAsync(42))
    expect(ok._unsafeUnwrap()).toBe(42)
    const err = await pool.submit(() => errAsync(new Error('nope')))
    expect(err._unsafeUnwrapErr().message).toBe('nope')
  })

  it('should release the slot when a job rejects', async () => {
    const pool = createWorkerPool({ size: 1 })

    await expect(
      pool.submit(() => new ResultAsync(Promise.reject(new Error('boom')))),
    ).rejects.toThrow('boom')

    const result = await pool.submit(() => okAsync('ok'))
    expect(result._unsafeUnwrap()).toBe('ok')
    expect(pool.stats()).toEqual({ size: 1, active: 0, queued: 0 })
  })

  it('should start queued jobs in submission order', async () => {
    const pool = createWorkerPool({ size: 1 })
    const started: number[] = []

    await Promise.all(
      [1, 2, 3, 4].map((n) =>
        pool.submit(() =>
          ResultAsync.fromSafePromise(
            (async () => {
              started.push(n)
              await sleep(5)
            })(),
          ),
        ),
      ),
    )

    expect(started).toEqual([1, 2, 3, 4])
  })

  it('should let jobs complete out of submission order', async () => {
    const pool = createWorkerPool({ size: 2 })
    const finished: string[] = []

    await Promise.all([
      pool.submit(() =>
        ResultAsync.fromSafePromise(sleep(40).then(() => finished.push('slow'))),
      ),
      pool.submit(() =>
        ResultAsync.fromSafePromise(sleep(5).then(() => finished.push('fast'))),
      ),
    ])

    expect(finished).toEqual(['fast', 'slow'])
  })

  it('should report active and queued jobs', async () => {
    const pool = createWorkerPool({ size: 2, name: 'test-pool' })
    const g = gate()

    const handles = Array.from({ length: 5 }, () =>
      pool.submit(() => ResultAsync.fromSafePromise(g.opened)),
    )
    await sleep(0)

    expect(pool.name).toBe('test-pool')
    expect(pool.stats()).toEqual({ size: 2, active: 2, queued: 3 })

    g.open()
    await Promise.all(handles)

    expect(pool.stats()).toEqual({ size: 2, active: 0, queued: 0 })
  })

  it('should reject a non-positive size', () => {
    expect(() => createWorkerPool({ size: 0 })).toThrow(RangeError)
    expect(() => createWorkerPool({ size: 1.5 })).toThrow(RangeError)
  })
})
