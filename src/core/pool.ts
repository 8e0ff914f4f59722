/**
 * Worker pool dispatcher: bounds how many file jobs run at once.
 *
 * Every request that reaches the loader is submitted here. At most `size`
 * jobs execute simultaneously; the rest wait in an unbounded FIFO queue and
 * start, in submission order, as slots free up. Jobs may finish in any order.
 * A job that has started always runs to completion; there is no cancellation
 * and no timeout.
 *
 * The jobs themselves are `fs`/`zlib` work that libuv executes on its own
 * threads, so a full pool never stalls the event loop that accepts new
 * connections.
 *
 * @module Request Pipeline
 */
import { ResultAsync, type Result } from 'neverthrow'

/** Point-in-time occupancy of a {@link WorkerPool}. */
export interface PoolStats {
  size: number
  active: number
  queued: number
}

/**
 * A fixed-size pool of execution slots.
 *
 * @category Request Pipeline
 */
export interface WorkerPool {
  readonly name: string
  readonly size: number
  /**
   * Schedules `job` and returns a handle that settles exactly once, with the
   * job's own result.
   */
  submit<T, E>(job: () => ResultAsync<T, E>): ResultAsync<T, E>
  stats(): PoolStats
}

/**
 * Creates a worker pool with `size` slots.
 *
 * A freed slot is handed straight to the oldest waiting job, so a job
 * submitted later can never overtake one that is already queued.
 *
 * @param opts - `size`: number of slots; `name`: label used in logs.
 * @throws RangeError if `size` is not a positive integer.
 */
export function createWorkerPool({
  size,
  name = 'fs-pool',
}: {
  size: number
  name?: string
}): WorkerPool {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Worker pool size must be a positive integer, got ${size}`)
  }

  let active = 0
  const queue: Array<() => void> = []

  const acquire = async (): Promise<void> => {
    if (active < size) {
      active++
      return
    }
    await new Promise<void>((resolve) => queue.push(resolve))
  }

  const release = (): void => {
    const next = queue.shift()
    if (next) {
      next()
    } else {
      active--
    }
  }

  return {
    name,
    size,
    submit<T, E>(job: () => ResultAsync<T, E>): ResultAsync<T, E> {
      const run = async (): Promise<Result<T, E>> => {
        await acquire()
        try {
          return await job()
        } finally {
          release()
        }
      }
      return new ResultAsync(run())
    },
    stats: () => ({ size, active, queued: queue.length }),
  }
}
