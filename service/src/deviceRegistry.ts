import { z } from 'zod'
import { ApiError } from './errors'
import type { Device, DeviceNegotiator, MotionSignal } from './types'

export const DEFAULT_REGISTRY_URL = 'http://localhost:8080'

const normalizeBaseUrl = (value: string): string => value.replace(/\/+$/, '')

const deviceSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  supports_two_way_audio: z.boolean().default(false),
})

const devicesResponseSchema = z.object({ devices: z.array(deviceSchema) })

const historyEventSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  kind: z.string(),
  created_at: z.string().optional(),
})

const historyResponseSchema = z.object({ events: z.array(historyEventSchema) })

const answerResponseSchema = z.object({ sdp: z.string() })

export type MotionHistoryEvent = {
  id: string
  kind: string
  createdAt: number | null
}

type RequestOptions = {
  method?: string
  body?: unknown
}

type DeviceRegistryOptions = {
  baseUrl?: string
  token?: string
}

/**
 * HTTP client for the bridge that fronts the device vendor's cloud. Every
 * non-2xx response becomes an ApiError.
 */
export class DeviceRegistryClient {
  private readonly baseUrl: string
  private readonly token: string | undefined

  constructor(options: DeviceRegistryOptions = {}) {
    this.baseUrl = normalizeBaseUrl(options.baseUrl?.trim() || DEFAULT_REGISTRY_URL)
    this.token = options.token
  }

  async refresh(): Promise<void> {
    await this.request('/refresh', { method: 'POST' })
  }

  async listDevices(): Promise<Device[]> {
    const payload = devicesResponseSchema.parse(await this.request('/devices'))
    return payload.devices.map((device) => ({
      id: device.id,
      name: device.name,
      supportsTwoWayAudio: device.supports_two_way_audio,
    }))
  }

  async listMotionEvents(deviceId: string, limit: number): Promise<MotionHistoryEvent[]> {
    const payload = historyResponseSchema.parse(
      await this.request(`/devices/${encodeURIComponent(deviceId)}/history?limit=${limit}`)
    )
    return payload.events.map((event) => {
      const parsed = event.created_at ? Date.parse(event.created_at) : Number.NaN
      return {
        id: event.id,
        kind: event.kind,
        createdAt: Number.isNaN(parsed) ? null : parsed,
      }
    })
  }

  async negotiate(deviceId: string, offerSdp: string): Promise<string> {
    const payload = answerResponseSchema.parse(
      await this.request(`/devices/${encodeURIComponent(deviceId)}/webrtc/offer`, {
        method: 'POST',
        body: { sdp: offerSdp },
      })
    )
    return payload.sdp
  }

  async teardown(deviceId: string, sessionId: string): Promise<void> {
    await this.request(`/devices/${encodeURIComponent(deviceId)}/webrtc/close`, {
      method: 'POST',
      body: { session_id: sessionId },
    })
  }

  negotiatorFor(device: Device): DeviceNegotiator {
    return {
      negotiate: (offerSdp) => this.negotiate(device.id, offerSdp),
      teardown: (sessionId) => this.teardown(device.id, sessionId),
    }
  }

  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const method = (options.method ?? 'GET').toUpperCase()
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    }
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`
    }

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers,
      body: options.body === undefined ? undefined : JSON.stringify(options.body),
    })

    if (!response.ok) {
      throw new ApiError(response.status)
    }
    if (response.status === 204) {
      return null
    }

    const text = await response.text()
    return text ? JSON.parse(text) : null
  }
}

export const toMotionSignals = (
  deviceId: string,
  events: MotionHistoryEvent[],
  now: number
): MotionSignal[] =>
  events
    .filter((event) => event.kind === 'motion')
    .map((event) => ({ deviceId, eventId: event.id, observedAt: event.createdAt ?? now }))
