import { afterEach, describe, expect, it, vi } from 'vitest'
import { DeviceRegistryClient, toMotionSignals } from './deviceRegistry'
import { ApiError } from './errors'

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  })

const requestAt = (fetchMock: { mock: { calls: Parameters<typeof fetch>[] } }, index: number) => {
  const [input, init] = fetchMock.mock.calls[index]
  return { url: String(input), init: init ?? {} }
}

describe('DeviceRegistryClient', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('lists devices with bearer auth', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        devices: [
          { id: 42, name: 'Front Door', supports_two_way_audio: true },
          { id: 'side', name: 'Side Gate' },
        ],
      })
    )
    const client = new DeviceRegistryClient({ baseUrl: 'http://bridge.test/', token: 'test-token' })

    const devices = await client.listDevices()

    expect(devices).toEqual([
      { id: '42', name: 'Front Door', supportsTwoWayAudio: true },
      { id: 'side', name: 'Side Gate', supportsTwoWayAudio: false },
    ])
    const { url, init } = requestAt(fetchMock, 0)
    expect(url).toBe('http://bridge.test/devices')
    expect(init.method).toBe('GET')
    expect(init.headers).toEqual({
      'Content-Type': 'application/json',
      Authorization: 'Bearer test-token',
    })
  })

  it('omits the authorization header without a token', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response(null, { status: 204 }))
    const client = new DeviceRegistryClient({ baseUrl: 'http://bridge.test' })

    await client.refresh()

    const { url, init } = requestAt(fetchMock, 0)
    expect(url).toBe('http://bridge.test/refresh')
    expect(init.method).toBe('POST')
    expect(init.headers).toEqual({ 'Content-Type': 'application/json' })
  })

  it('reads motion history with the requested limit', async () => {
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      jsonResponse({
        events: [
          { id: 7, kind: 'motion', created_at: '2024-01-02T03:04:05Z' },
          { id: 8, kind: 'ding' },
        ],
      })
    )
    const client = new DeviceRegistryClient({ baseUrl: 'http://bridge.test' })

    const events = await client.listMotionEvents('D 1', 5)

    expect(requestAt(fetchMock, 0).url).toBe('http://bridge.test/devices/D%201/history?limit=5')
    expect(events).toEqual([
      { id: '7', kind: 'motion', createdAt: Date.parse('2024-01-02T03:04:05Z') },
      { id: '8', kind: 'ding', createdAt: null },
    ])
  })

  it('negotiates and tears down through the device negotiator', async () => {
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(jsonResponse({ sdp: 'answer-sdp' }))
      .mockResolvedValueOnce(new Response(null, { status: 204 }))
    const client = new DeviceRegistryClient({ baseUrl: 'http://bridge.test' })
    const negotiator = client.negotiatorFor({ id: 'D1', name: 'Front Door', supportsTwoWayAudio: true })

    expect(await negotiator.negotiate('offer-sdp')).toBe('answer-sdp')
    await negotiator.teardown('777')

    const offer = requestAt(fetchMock, 0)
    expect(offer.url).toBe('http://bridge.test/devices/D1/webrtc/offer')
    expect(offer.init.body).toBe(JSON.stringify({ sdp: 'offer-sdp' }))
    const close = requestAt(fetchMock, 1)
    expect(close.url).toBe('http://bridge.test/devices/D1/webrtc/close')
    expect(close.init.body).toBe(JSON.stringify({ session_id: '777' }))
  })

  it('throws ApiError on a non-2xx response', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ detail: 'nope' }, 403))
    const client = new DeviceRegistryClient({ baseUrl: 'http://bridge.test' })

    const failure = client.negotiate('D1', 'offer')

    await expect(failure).rejects.toBeInstanceOf(ApiError)
    await expect(failure).rejects.toMatchObject({ status: 403, message: 'Request failed: 403' })
  })

  it('rejects payloads of the wrong shape', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(jsonResponse({ devices: 'none' }))
    const client = new DeviceRegistryClient({ baseUrl: 'http://bridge.test' })

    await expect(client.listDevices()).rejects.toThrow()
  })
})

describe('toMotionSignals', () => {
  it('keeps motion events and falls back to now for unknown times', () => {
    const signals = toMotionSignals(
      'D1',
      [
        { id: '1', kind: 'motion', createdAt: 500 },
        { id: '2', kind: 'ding', createdAt: 600 },
        { id: '3', kind: 'motion', createdAt: null },
      ],
      9_000
    )

    expect(signals).toEqual([
      { deviceId: 'D1', eventId: '1', observedAt: 500 },
      { deviceId: 'D1', eventId: '3', observedAt: 9_000 },
    ])
  })
})
