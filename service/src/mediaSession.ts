import { CaptureTimeoutError, NegotiationError, describeError } from './errors'
import { StillFrameGrabber, type FrameDecoder } from './frameDecoder'
import type { PeerEndpoint, PeerEndpointFactory, EndpointOptions } from './peerEndpoint'
import { readSessionOrigin } from './sdp'
import { createDeadline, sleep as defaultSleep, type Sleep } from './timing'
import type { TimedAudioSource } from './timedAudioSource'
import type {
  CaptureFailureKind,
  CaptureSession,
  Device,
  DeviceNegotiator,
  PullFrameResult,
  SessionDirection,
  SessionState,
} from './types'

export const DEFAULT_FRAME_TIMEOUT_MS = 15_000
export const DEFAULT_PLAYBACK_MARGIN_MS = 500
export const DEFAULT_NEGOTIATION_SETTLE_MS = 10_000

type MediaSessionOptions = {
  createEndpoint: PeerEndpointFactory
  decoder: FrameDecoder
  skipFrames?: number
  icePollIntervalMs?: number
  frameTimeoutMs?: number
  playbackMarginMs?: number
  negotiationSettleMs?: number
  now?: () => number
  sleep?: Sleep
}

type SessionContext = {
  device: Device
  direction: SessionDirection
  timeoutMs: number
  deadline: number
  state: SessionState
  endpoint: PeerEndpoint | null
  session: CaptureSession | null
  grabber: StillFrameGrabber | null
  pendingAnswer: Promise<string> | null
}

export type PushAudioOptions = {
  durationMs: number
  timeoutMs?: number
}

/**
 * Runs one short-lived WebRTC session per request against a device's
 * negotiation endpoint. Whatever the outcome, the remote session is torn down
 * once and the local endpoint is closed.
 */
export class MediaSessionManager {
  private readonly createEndpoint: PeerEndpointFactory
  private readonly decoder: FrameDecoder
  private readonly skipFrames: number
  private readonly icePollIntervalMs: number
  private readonly frameTimeoutMs: number
  private readonly playbackMarginMs: number
  private readonly negotiationSettleMs: number
  private readonly now: () => number
  private readonly sleep: Sleep

  constructor(options: MediaSessionOptions) {
    this.createEndpoint = options.createEndpoint
    this.decoder = options.decoder
    this.skipFrames = options.skipFrames ?? 5
    this.icePollIntervalMs = options.icePollIntervalMs ?? 100
    this.frameTimeoutMs = options.frameTimeoutMs ?? DEFAULT_FRAME_TIMEOUT_MS
    this.playbackMarginMs = options.playbackMarginMs ?? DEFAULT_PLAYBACK_MARGIN_MS
    this.negotiationSettleMs = options.negotiationSettleMs ?? DEFAULT_NEGOTIATION_SETTLE_MS
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
  }

  async pullFrame(
    device: Device,
    negotiator: DeviceNegotiator,
    options: { timeoutMs?: number } = {}
  ): Promise<PullFrameResult> {
    const timeoutMs = options.timeoutMs ?? this.frameTimeoutMs
    const context = this.createContext(device, 'pull-video', timeoutMs, timeoutMs)
    const deadline = createDeadline(timeoutMs, () => new CaptureTimeoutError(timeoutMs))

    console.log(`[MediaSession] Connecting to live stream on ${device.name}...`)

    try {
      const image = await Promise.race([
        this.captureFrame(context, negotiator, deadline.signal),
        deadline.expired,
      ])
      context.state = 'succeeded'
      console.log(`[MediaSession] Captured live frame: ${image.length} bytes`)
      return { ok: true, frame: { image, capturedAt: this.now() } }
    } catch (error) {
      const failure = classifyFailure(error)
      context.state = failure === 'timeout' ? 'timed_out' : 'failed'
      if (failure === 'timeout') {
        console.error(`[MediaSession] Timed out waiting for live stream frame from ${device.name}`)
      } else {
        console.error(`[MediaSession] Live stream capture failed on ${device.name}:`, describeError(error))
      }
      return { ok: false, failure, message: describeError(error) }
    } finally {
      deadline.clear()
      await this.closeSession(context, negotiator)
    }
  }

  async pushAudioClip(
    device: Device,
    negotiator: DeviceNegotiator,
    source: TimedAudioSource,
    options: PushAudioOptions
  ): Promise<boolean> {
    const timeoutMs = options.timeoutMs ?? this.frameTimeoutMs
    const holdMs = options.durationMs + this.playbackMarginMs
    const context = this.createContext(device, 'push-audio', timeoutMs, timeoutMs + holdMs)
    const deadline = createDeadline(timeoutMs, () => new CaptureTimeoutError(timeoutMs))

    console.log(
      `[MediaSession] Playing alert through ${device.name} speaker for ${options.durationMs / 1000}s...`
    )

    try {
      await Promise.race([
        this.connectPlayback(context, negotiator, source, deadline.signal),
        deadline.expired,
      ])
      deadline.clear()

      console.log(`[MediaSession] Streaming audio for ${options.durationMs / 1000} seconds...`)
      await this.sleep(holdMs)
      context.state = 'succeeded'
      console.log('[MediaSession] Alert audio finished')
      return true
    } catch (error) {
      context.state = error instanceof CaptureTimeoutError ? 'timed_out' : 'failed'
      console.error(`[MediaSession] Failed to play alert through ${device.name}:`, describeError(error))
      return false
    } finally {
      deadline.clear()
      await this.closeSession(context, negotiator)
    }
  }

  private createContext(
    device: Device,
    direction: SessionDirection,
    timeoutMs: number,
    budgetMs: number
  ): SessionContext {
    return {
      device,
      direction,
      timeoutMs,
      deadline: this.now() + budgetMs,
      state: 'negotiating',
      endpoint: null,
      session: null,
      grabber: null,
      pendingAnswer: null,
    }
  }

  private async captureFrame(
    context: SessionContext,
    negotiator: DeviceNegotiator,
    signal: AbortSignal
  ): Promise<Buffer> {
    const grabber = new StillFrameGrabber({ decoder: this.decoder, skipFrames: this.skipFrames })
    context.grabber = grabber

    const endpoint = this.openEndpoint(context, { direction: 'pull-video' })
    endpoint.onVideoPacket((packet) => grabber.push(packet))

    await this.negotiate(context, endpoint, negotiator, signal)
    return grabber.frame
  }

  private async connectPlayback(
    context: SessionContext,
    negotiator: DeviceNegotiator,
    source: TimedAudioSource,
    signal: AbortSignal
  ): Promise<void> {
    const endpoint = this.openEndpoint(context, { direction: 'push-audio', audioSource: source })
    await this.negotiate(context, endpoint, negotiator, signal)
    await endpoint.connected()
  }

  private openEndpoint(context: SessionContext, options: EndpointOptions) {
    const endpoint = this.createEndpoint(options)
    context.endpoint = endpoint
    return endpoint
  }

  private async negotiate(
    context: SessionContext,
    endpoint: PeerEndpoint,
    negotiator: DeviceNegotiator,
    signal: AbortSignal
  ) {
    await endpoint.createLocalOffer()
    const offerSdp = await this.waitForIceGathering(context, endpoint, signal)

    if (signal.aborted) {
      throw new CaptureTimeoutError(context.timeoutMs)
    }
    const origin = readSessionOrigin(offerSdp)
    if (!origin) {
      throw new NegotiationError('Local offer has no origin line')
    }
    context.session = {
      deviceId: context.device.id,
      sessionId: origin.sessionId,
      direction: context.direction,
      deadline: context.deadline,
    }

    let answerSdp: string
    try {
      context.pendingAnswer = negotiator.negotiate(offerSdp)
      answerSdp = await context.pendingAnswer
    } catch (error) {
      throw new NegotiationError(`Device rejected offer: ${describeError(error)}`, { cause: error })
    } finally {
      context.pendingAnswer = null
    }
    if (signal.aborted) {
      throw new CaptureTimeoutError(context.timeoutMs)
    }
    if (!answerSdp.trim()) {
      throw new NegotiationError('Device returned an empty answer')
    }

    await endpoint.applyRemoteAnswer(answerSdp)
    context.state = 'connected'
  }

  /**
   * ICE gathering has to finish before the offer is exported; the remote peer
   * does not accept trickled candidates.
   */
  private async waitForIceGathering(
    context: SessionContext,
    endpoint: PeerEndpoint,
    signal: AbortSignal
  ) {
    while (endpoint.iceGatheringState !== 'complete') {
      if (signal.aborted) {
        throw new CaptureTimeoutError(context.timeoutMs)
      }
      console.debug('[MediaSession] Waiting for ICE gathering...')
      await this.sleep(this.icePollIntervalMs, signal)
    }
    const sdp = endpoint.localSdp()
    if (!sdp) {
      throw new NegotiationError('Local description missing after ICE gathering')
    }
    return sdp
  }

  private async closeSession(context: SessionContext, negotiator: DeviceNegotiator) {
    context.grabber?.close()
    await this.awaitPendingAnswer(context)

    if (context.session) {
      try {
        await negotiator.teardown(context.session.sessionId)
      } catch (error) {
        console.warn(
          `[MediaSession] Teardown of session ${context.session.sessionId} failed:`,
          describeError(error)
        )
      }
    }

    if (context.endpoint) {
      try {
        await context.endpoint.close()
      } catch (error) {
        console.warn('[MediaSession] Failed to close local endpoint:', describeError(error))
      }
    }
    context.state = 'closed'
  }

  /**
   * A teardown sent before the device has answered can arrive ahead of the
   * session it is meant to close, so an outstanding offer gets a bounded
   * chance to settle first.
   */
  private async awaitPendingAnswer(context: SessionContext) {
    if (!context.pendingAnswer) return
    const settled = new AbortController()
    await Promise.race([
      context.pendingAnswer.then(
        () => undefined,
        () => undefined
      ),
      this.sleep(this.negotiationSettleMs, settled.signal),
    ])
    settled.abort()
  }
}

const classifyFailure = (error: unknown): CaptureFailureKind => {
  if (error instanceof CaptureTimeoutError) return 'timeout'
  if (error instanceof NegotiationError) return 'negotiation_rejected'
  return 'no_response'
}
