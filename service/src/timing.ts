export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

/**
 * Resolves after `ms`, or early when `signal` aborts. Never rejects.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve()
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })

export type Deferred<T> = {
  promise: Promise<T>
  resolve: (value: T) => void
  reject: (error: unknown) => void
}

/**
 * A promise that settles at most once; later resolve/reject calls are ignored.
 */
export const createDeferred = <T>(): Deferred<T> => {
  let settled = false
  let resolvePromise: (value: T) => void = () => {}
  let rejectPromise: (error: unknown) => void = () => {}
  const promise = new Promise<T>((resolve, reject) => {
    resolvePromise = resolve
    rejectPromise = reject
  })

  return {
    promise,
    resolve: (value) => {
      if (settled) return
      settled = true
      resolvePromise(value)
    },
    reject: (error) => {
      if (settled) return
      settled = true
      rejectPromise(error)
    },
  }
}

export type Deadline = {
  /** Rejects with the factory's error once the deadline passes. */
  expired: Promise<never>
  signal: AbortSignal
  clear: () => void
}

export const createDeadline = (
  timeoutMs: number,
  createError: () => Error
): Deadline => {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(createError())
    }, timeoutMs)
  })

  return {
    expired,
    signal: controller.signal,
    clear: () => clearTimeout(timer),
  }
}
