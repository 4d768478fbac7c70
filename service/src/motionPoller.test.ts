import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { DeviceRegistryClient, MotionHistoryEvent } from './deviceRegistry'
import { createMotionPoller } from './motionPoller'
import type { MonitoredDevice, MotionSignal } from './types'

const monitored = (id: string, name: string): MonitoredDevice => ({
  device: { id, name, supportsTwoWayAudio: false },
  negotiator: { negotiate: async () => '', teardown: async () => {} },
})

const front = monitored('D1', 'Front Door')
const side = monitored('D2', 'Side Gate')

const createRegistry = (history: Record<string, MotionHistoryEvent[]>) => ({
  refresh: vi.fn<DeviceRegistryClient['refresh']>().mockResolvedValue(undefined),
  listMotionEvents: vi.fn<DeviceRegistryClient['listMotionEvents']>(async (deviceId) => {
    const events = history[deviceId]
    if (!events) throw new Error(`unknown device ${deviceId}`)
    return events
  }),
})

describe('createMotionPoller', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('refreshes, then dispatches motion events oldest first', async () => {
    const registry = createRegistry({
      D1: [
        { id: 'e3', kind: 'motion', createdAt: 300 },
        { id: 'e2', kind: 'ding', createdAt: 200 },
        { id: 'e1', kind: 'motion', createdAt: 100 },
      ],
    })
    const dispatched: Array<[string, MotionSignal]> = []
    const poller = createMotionPoller({
      registry,
      devices: [front],
      dispatch: (target, signal) => dispatched.push([target.device.name, signal]),
      historyLimit: 5,
    })

    const count = await poller.scanOnce()

    expect(count).toBe(2)
    expect(registry.refresh).toHaveBeenCalledTimes(1)
    expect(registry.listMotionEvents).toHaveBeenCalledWith('D1', 5)
    expect(dispatched).toEqual([
      ['Front Door', { deviceId: 'D1', eventId: 'e1', observedAt: 100 }],
      ['Front Door', { deviceId: 'D1', eventId: 'e3', observedAt: 300 }],
    ])
  })

  it('keeps scanning other devices when one fails', async () => {
    const registry = createRegistry({ D2: [{ id: 'x', kind: 'motion', createdAt: null }] })
    const dispatch = vi.fn()
    const poller = createMotionPoller({
      registry,
      devices: [front, side],
      dispatch,
      now: () => 1234,
    })

    const count = await poller.scanOnce()

    expect(count).toBe(1)
    expect(dispatch).toHaveBeenCalledWith(side, { deviceId: 'D2', eventId: 'x', observedAt: 1234 })
    expect(console.error).toHaveBeenCalledWith(
      '[Poller] Error checking Front Door:',
      'unknown device D1'
    )
  })

  it('scans until aborted, waiting the interval between scans', async () => {
    const registry = createRegistry({ D1: [] })
    const controller = new AbortController()
    let scans = 0
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {
      scans += 1
      if (scans === 3) controller.abort()
    })
    const poller = createMotionPoller({
      registry,
      devices: [front],
      dispatch: () => {},
      intervalMs: 10_000,
      sleep,
    })

    await poller.run(controller.signal)

    expect(registry.refresh).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledTimes(3)
    expect(sleep).toHaveBeenCalledWith(10_000, controller.signal)
  })

  it('survives a failed refresh', async () => {
    const registry = createRegistry({ D1: [] })
    registry.refresh.mockRejectedValueOnce(new Error('bridge offline'))
    const controller = new AbortController()
    let scans = 0
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {
      scans += 1
      if (scans === 2) controller.abort()
    })
    const poller = createMotionPoller({ registry, devices: [front], dispatch: () => {}, sleep })

    await poller.run(controller.signal)

    expect(registry.refresh).toHaveBeenCalledTimes(2)
    expect(console.error).toHaveBeenCalledWith('[Poller] Scan failed:', 'bridge offline')
  })
})
