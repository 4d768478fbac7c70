import type { DeviceRegistryClient } from './deviceRegistry'
import { toMotionSignals } from './deviceRegistry'
import { describeError } from './errors'
import { sleep as defaultSleep, type Sleep } from './timing'
import type { MonitoredDevice, MotionSignal } from './types'

export const DEFAULT_SCAN_INTERVAL_MS = 10_000
export const DEFAULT_HISTORY_LIMIT = 5

type MotionPollerOptions = {
  registry: Pick<DeviceRegistryClient, 'refresh' | 'listMotionEvents'>
  devices: MonitoredDevice[]
  dispatch: (target: MonitoredDevice, signal: MotionSignal) => void
  historyLimit?: number
  intervalMs?: number
  now?: () => number
  sleep?: Sleep
}

export type MotionPoller = {
  scanOnce: () => Promise<number>
  run: (signal: AbortSignal) => Promise<void>
}

/**
 * Polls each device's recent history and hands every motion event to
 * `dispatch`, oldest first. Deduplication is left to the motion tracker.
 */
export const createMotionPoller = ({
  registry,
  devices,
  dispatch,
  historyLimit = DEFAULT_HISTORY_LIMIT,
  intervalMs = DEFAULT_SCAN_INTERVAL_MS,
  now = Date.now,
  sleep = defaultSleep,
}: MotionPollerOptions): MotionPoller => {
  const scanOnce = async () => {
    await registry.refresh()

    let dispatched = 0
    for (const target of devices) {
      try {
        const history = await registry.listMotionEvents(target.device.id, historyLimit)
        const signals = toMotionSignals(target.device.id, history, now()).reverse()
        for (const signal of signals) {
          dispatch(target, signal)
          dispatched += 1
        }
      } catch (error) {
        console.error(`[Poller] Error checking ${target.device.name}:`, describeError(error))
      }
    }
    return dispatched
  }

  const run = async (signal: AbortSignal) => {
    console.log(`[Poller] Polling ${devices.length} device(s) every ${intervalMs / 1000}s`)
    while (!signal.aborted) {
      try {
        await scanOnce()
      } catch (error) {
        console.error('[Poller] Scan failed:', describeError(error))
      }
      await sleep(intervalMs, signal)
    }
    console.log('[Poller] Stopped')
  }

  return { scanOnce, run }
}
