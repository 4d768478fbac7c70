import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import { z } from 'zod'
import { describeError } from './errors'
import type { MonitoredDevice, MotionSignal } from './types'

export const DEFAULT_WEBHOOK_PORT = 8787
const MAX_BODY_BYTES = 64 * 1024

const motionPayloadSchema = z.object({
  device_id: z.union([z.string(), z.number()]).transform(String),
  event_id: z.union([z.string(), z.number()]).transform(String),
  kind: z.string(),
  observed_at: z.string().datetime({ offset: true }).optional(),
})

class RequestBodyTooLargeError extends Error {
  constructor(maxBodyBytes: number) {
    super(`Request body exceeded ${maxBodyBytes} bytes`)
    this.name = 'RequestBodyTooLargeError'
  }
}

const readRequestBody = (req: IncomingMessage, maxBodyBytes: number) =>
  new Promise<Buffer>((resolve, reject) => {
    let totalBytes = 0
    const chunks: Buffer[] = []

    const cleanup = () => {
      req.off('data', onData)
      req.off('end', onEnd)
      req.off('error', onError)
    }

    const onData = (chunk: Buffer | string) => {
      const chunkBuffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)
      totalBytes += chunkBuffer.length
      if (totalBytes > maxBodyBytes) {
        cleanup()
        req.resume()
        reject(new RequestBodyTooLargeError(maxBodyBytes))
        return
      }
      chunks.push(chunkBuffer)
    }

    const onEnd = () => {
      cleanup()
      resolve(Buffer.concat(chunks))
    }

    const onError = (error: Error) => {
      cleanup()
      reject(error)
    }

    req.on('data', onData)
    req.on('end', onEnd)
    req.on('error', onError)
  })

const sendJson = (res: ServerResponse, status: number, payload: unknown) => {
  res.writeHead(status, { 'Content-Type': 'application/json' })
  res.end(JSON.stringify(payload))
}

type WebhookListenerOptions = {
  devices: MonitoredDevice[]
  dispatch: (target: MonitoredDevice, signal: MotionSignal) => void
  port?: number
  host?: string
  now?: () => number
}

export type WebhookListener = {
  /** Starts listening and resolves with the bound port. */
  listen: () => Promise<number>
  close: () => Promise<void>
}

/**
 * Push-mode signal source: the device bridge posts motion events to
 * `POST /motion`. Valid payloads are acknowledged with 202 whether or not
 * they are dispatched.
 */
export const createWebhookListener = ({
  devices,
  dispatch,
  port = DEFAULT_WEBHOOK_PORT,
  host = '127.0.0.1',
  now = Date.now,
}: WebhookListenerOptions): WebhookListener => {
  const byId = new Map(devices.map((target) => [target.device.id, target]))

  const handleMotion = async (req: IncomingMessage, res: ServerResponse) => {
    let body: Buffer
    try {
      body = await readRequestBody(req, MAX_BODY_BYTES)
    } catch (error) {
      if (error instanceof RequestBodyTooLargeError) {
        sendJson(res, 413, { error: 'PAYLOAD_TOO_LARGE', message: error.message })
        return
      }
      sendJson(res, 400, { error: 'INVALID_REQUEST', message: describeError(error) })
      return
    }

    let raw: unknown
    try {
      raw = JSON.parse(body.toString('utf8'))
    } catch {
      sendJson(res, 400, { error: 'INVALID_JSON', message: 'Expected valid JSON payload.' })
      return
    }

    const parsed = motionPayloadSchema.safeParse(raw)
    if (!parsed.success) {
      sendJson(res, 400, { error: 'INVALID_PAYLOAD', message: parsed.error.issues[0]?.message })
      return
    }

    const payload = parsed.data
    const target = byId.get(payload.device_id)
    if (payload.kind !== 'motion' || !target) {
      console.debug(`[Webhook] Ignoring ${payload.kind} event for device ${payload.device_id}`)
      sendJson(res, 202, { accepted: false })
      return
    }

    console.log(`[Webhook] Motion event ${payload.event_id} on ${target.device.name}`)
    dispatch(target, {
      deviceId: target.device.id,
      eventId: payload.event_id,
      observedAt: payload.observed_at ? Date.parse(payload.observed_at) : now(),
    })
    sendJson(res, 202, { accepted: true })
  }

  const server: Server = createServer((req, res) => {
    const path = (req.url ?? '/').split('?')[0]
    if (req.method !== 'POST' || path !== '/motion') {
      sendJson(res, 404, { error: 'NOT_FOUND' })
      return
    }
    handleMotion(req, res).catch((error: unknown) => {
      console.error('[Webhook] Failed to handle request:', describeError(error))
      if (!res.headersSent) {
        sendJson(res, 500, { error: 'INTERNAL' })
      }
    })
  })

  const listen = () =>
    new Promise<number>((resolve, reject) => {
      server.once('error', reject)
      server.listen(port, host, () => {
        server.off('error', reject)
        const address = server.address()
        const boundPort = typeof address === 'object' && address !== null ? address.port : port
        console.log(`[Webhook] Listening on http://${host}:${boundPort}/motion`)
        resolve(boundPort)
      })
    })

  const close = () =>
    new Promise<void>((resolve, reject) => {
      if (!server.listening) {
        resolve()
        return
      }
      server.close((error) => (error ? reject(error) : resolve()))
    })

  return { listen, close }
}
