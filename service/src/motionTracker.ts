type MotionTrackerOptions = {
  cooldownMs?: number
  maxSeenEvents?: number
  retainedSeenEvents?: number
  now?: () => number
}

type DeviceGateState = {
  lastTriggeredAt: number | null
  seenEventIds: Set<string>
}

export const DEFAULT_COOLDOWN_MS = 30_000

/**
 * Decides which motion signals start a capture. Each device keeps its own
 * cooldown and a bounded, insertion-ordered set of event ids already handled.
 *
 * `shouldTrigger` is synchronous, so its read-check-write of a device's state
 * cannot interleave with another signal for the same device.
 */
export class MotionEventTracker {
  private readonly cooldownMs: number
  private readonly maxSeenEvents: number
  private readonly retainedSeenEvents: number
  private readonly now: () => number
  private readonly devices = new Map<string, DeviceGateState>()

  constructor(options: MotionTrackerOptions = {}) {
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS
    this.maxSeenEvents = options.maxSeenEvents ?? 100
    this.retainedSeenEvents = options.retainedSeenEvents ?? 50
    this.now = options.now ?? Date.now
  }

  shouldTrigger(deviceId: string, eventId: string, nowMs: number = this.now()) {
    const state = this.stateFor(deviceId)

    if (state.seenEventIds.has(eventId)) {
      return false
    }

    if (state.lastTriggeredAt !== null) {
      const elapsed = nowMs - state.lastTriggeredAt
      if (elapsed < this.cooldownMs) {
        // The id is left unrecorded so a re-emitted signal can trigger later.
        console.debug(
          `[MotionTracker] Cooldown active for ${deviceId}, ${Math.ceil((this.cooldownMs - elapsed) / 1000)}s remaining`
        )
        return false
      }
    }

    this.remember(state, eventId)
    state.lastTriggeredAt = nowMs
    return true
  }

  seenEventCount(deviceId: string) {
    return this.devices.get(deviceId)?.seenEventIds.size ?? 0
  }

  hasSeen(deviceId: string, eventId: string) {
    return this.devices.get(deviceId)?.seenEventIds.has(eventId) ?? false
  }

  lastTriggeredAt(deviceId: string) {
    return this.devices.get(deviceId)?.lastTriggeredAt ?? null
  }

  private stateFor(deviceId: string) {
    let state = this.devices.get(deviceId)
    if (!state) {
      state = { lastTriggeredAt: null, seenEventIds: new Set() }
      this.devices.set(deviceId, state)
    }
    return state
  }

  private remember(state: DeviceGateState, eventId: string) {
    state.seenEventIds.add(eventId)
    if (state.seenEventIds.size > this.maxSeenEvents) {
      const newest = [...state.seenEventIds].slice(-this.retainedSeenEvents)
      state.seenEventIds = new Set(newest)
    }
  }
}
