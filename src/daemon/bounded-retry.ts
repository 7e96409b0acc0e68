export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, Math.max(0, ms))
  })

export interface BoundedRetryOptions {
  maxAttempts: number
  intervalMs: number
  // Injectable for tests; defaults to a real timer
  sleep?: Sleep
}

export interface BoundedRetryResult<T> {
  // undefined when every attempt came back empty
  value: T | undefined
  attempts: number
}

// retryBounded calls `attempt` until it yields a value or the attempt budget
// runs out, sleeping `intervalMs` between attempts (never after the last one).
// An attempt that throws aborts the loop and the error propagates.
export async function retryBounded<T>(
  attempt: (attemptNumber: number) => Promise<T | undefined>,
  opts: BoundedRetryOptions,
): Promise<BoundedRetryResult<T>> {
  if (!Number.isInteger(opts.maxAttempts) || opts.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${opts.maxAttempts}`)
  }

  const wait = opts.sleep ?? sleep

  for (let n = 1; n <= opts.maxAttempts; n++) {
    const value = await attempt(n)
    if (value !== undefined) {
      return { value, attempts: n }
    }
    if (n < opts.maxAttempts) {
      await wait(opts.intervalMs)
    }
  }

  return { value: undefined, attempts: opts.maxAttempts }
}
