import { describe, expect, it, vi } from 'vitest'
import { createPipelineRunner } from './pipelineRunner'

const createGate = () => {
  let release: () => void = () => {}
  const opened = new Promise<void>((resolve) => {
    release = resolve
  })
  return { opened, release }
}

describe('createPipelineRunner', () => {
  it('runs items concurrently without waiting for earlier ones', async () => {
    const started: number[] = []
    const finished: number[] = []
    const gate = createGate()

    const runner = createPipelineRunner<number>(async (value) => {
      started.push(value)
      if (value === 1) {
        await gate.opened
      }
      finished.push(value)
    })

    runner.run(1)
    runner.run(2)
    await Promise.resolve()

    expect(started).toEqual([1, 2])
    expect(finished).toEqual([2])

    gate.release()
    await runner.drain()

    expect(finished).toEqual([2, 1])
  })

  it('reports errors and keeps running other items', async () => {
    const processed: number[] = []
    const onError = vi.fn()

    const runner = createPipelineRunner<number>(
      async (value) => {
        if (value === 1) {
          throw new Error('boom')
        }
        processed.push(value)
      },
      { onError }
    )

    runner.run(1)
    runner.run(2)
    await runner.drain()

    expect(onError).toHaveBeenCalledTimes(1)
    expect(onError).toHaveBeenCalledWith(new Error('boom'), 1)
    expect(processed).toEqual([2])
  })

  it('tracks the number of tasks in flight', async () => {
    const sizes: number[] = []
    const gate = createGate()
    const runner = createPipelineRunner<number>(() => gate.opened, {
      onSizeChange: (size) => sizes.push(size),
    })

    runner.run(1)
    runner.run(2)
    expect(runner.size()).toBe(2)

    gate.release()
    await runner.drain()

    expect(runner.size()).toBe(0)
    expect(sizes).toEqual([1, 2, 1, 0])
  })

  it('drains tasks started while draining', async () => {
    const processed: number[] = []
    const runner = createPipelineRunner<number>(async (value) => {
      processed.push(value)
      if (value === 1) {
        runner.run(2)
      }
    })

    runner.run(1)
    await runner.drain()

    expect(processed).toEqual([1, 2])
    expect(runner.size()).toBe(0)
  })
})
