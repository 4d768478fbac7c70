type RunnerOptions<T> = {
  onError?: (error: unknown, item: T) => void
  onSizeChange?: (size: number) => void
}

export type PipelineRunner<T> = {
  run: (item: T) => void
  drain: () => Promise<void>
  size: () => number
}

/**
 * Starts one detached task per item and keeps track of the ones still in
 * flight, so callers never await a task but shutdown can.
 */
export const createPipelineRunner = <T>(
  processItem: (item: T) => Promise<void>,
  options: RunnerOptions<T> = {}
): PipelineRunner<T> => {
  const inFlight = new Set<Promise<void>>()

  const notifySize = () => {
    options.onSizeChange?.(inFlight.size)
  }

  const run = (item: T) => {
    const task = processItem(item)
      .catch((error: unknown) => {
        options.onError?.(error, item)
      })
      .finally(() => {
        inFlight.delete(task)
        notifySize()
      })
    inFlight.add(task)
    notifySize()
  }

  const drain = async () => {
    while (inFlight.size > 0) {
      await Promise.all(inFlight)
    }
  }

  const size = () => inFlight.size

  return { run, drain, size }
}
