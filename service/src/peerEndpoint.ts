import {
  MediaStreamTrack,
  RTCPeerConnection,
  RTCRtpCodecParameters,
  RtpHeader,
  RtpPacket,
} from 'werift'
import { createOpusEncoder, type AudioEncoder } from './opusEncoder'
import type { RtpVideoPacket } from './frameDecoder'
import type { TimedAudioSource } from './timedAudioSource'

export type IceGatheringState = 'new' | 'gathering' | 'complete'

export type EndpointOptions =
  | { direction: 'pull-video' }
  | { direction: 'push-audio'; audioSource: TimedAudioSource }

/**
 * The local half of a capture session. Pull endpoints receive video (and
 * audio, which is discarded); push endpoints send one audio track and accept
 * video they never read.
 */
export interface PeerEndpoint {
  readonly iceGatheringState: IceGatheringState
  createLocalOffer(): Promise<void>
  localSdp(): string | undefined
  applyRemoteAnswer(sdp: string): Promise<void>
  onVideoPacket(listener: (packet: RtpVideoPacket) => void): void
  /** Resolves once media is flowing; rejects if the connection fails first. */
  connected(): Promise<void>
  close(): Promise<void>
}

export type PeerEndpointFactory = (options: EndpointOptions) => PeerEndpoint

const OPUS_PAYLOAD_TYPE = 111
const H264_PAYLOAD_TYPE = 96

const createCodecs = () => ({
  audio: [
    new RTCRtpCodecParameters({
      mimeType: 'audio/opus',
      clockRate: 48_000,
      channels: 2,
      payloadType: OPUS_PAYLOAD_TYPE,
    }),
  ],
  video: [
    new RTCRtpCodecParameters({
      mimeType: 'video/H264',
      clockRate: 90_000,
      payloadType: H264_PAYLOAD_TYPE,
      rtcpFeedback: [{ type: 'nack' }, { type: 'nack', parameter: 'pli' }],
      parameters: 'profile-level-id=42e01f;packetization-mode=1;level-asymmetry-allowed=1',
    }),
  ],
})

const randomSsrc = () => Math.floor(Math.random() * 0xffffffff)

export class WeriftPeerEndpoint implements PeerEndpoint {
  private readonly pc: RTCPeerConnection
  private readonly videoListeners: Array<(packet: RtpVideoPacket) => void> = []
  private readonly playback = new AbortController()
  private readonly outboundAudio: MediaStreamTrack | null = null

  constructor(
    private readonly options: EndpointOptions,
    private readonly createEncoder: () => AudioEncoder = createOpusEncoder
  ) {
    this.pc = new RTCPeerConnection({ codecs: createCodecs() })

    if (options.direction === 'pull-video') {
      this.pc.addTransceiver('video', { direction: 'recvonly' })
      this.pc.addTransceiver('audio', { direction: 'recvonly' })
    } else {
      this.outboundAudio = new MediaStreamTrack({ kind: 'audio' })
      this.pc.addTransceiver(this.outboundAudio, { direction: 'sendonly' })
      this.pc.addTransceiver('video', { direction: 'recvonly' })
    }

    this.pc.onTrack.subscribe((track) => {
      if (track.kind !== 'video') return
      track.onReceiveRtp.subscribe((rtp) => {
        const packet = { payload: rtp.payload, marker: rtp.header.marker }
        for (const listener of this.videoListeners) {
          listener(packet)
        }
      })
    })
  }

  get iceGatheringState(): IceGatheringState {
    return this.pc.iceGatheringState
  }

  async createLocalOffer() {
    const offer = await this.pc.createOffer()
    await this.pc.setLocalDescription(offer)
  }

  localSdp() {
    return this.pc.localDescription?.sdp
  }

  async applyRemoteAnswer(sdp: string) {
    await this.pc.setRemoteDescription({ type: 'answer', sdp })
  }

  onVideoPacket(listener: (packet: RtpVideoPacket) => void) {
    this.videoListeners.push(listener)
  }

  connected() {
    return new Promise<void>((resolve, reject) => {
      const settle = (state: string) => {
        if (state === 'connected') {
          subscription.unSubscribe()
          this.startPlayback()
          resolve()
        } else if (state === 'failed' || state === 'closed') {
          subscription.unSubscribe()
          reject(new Error(`Peer connection ${state}`))
        }
      }
      const subscription = this.pc.connectionStateChange.subscribe(settle)
      settle(this.pc.connectionState)
    })
  }

  async close() {
    this.playback.abort()
    await this.pc.close()
  }

  private startPlayback() {
    if (this.options.direction !== 'push-audio' || !this.outboundAudio) return
    const track = this.outboundAudio
    const source = this.options.audioSource
    pumpAudio(source, (packet) => track.writeRtp(packet), this.createEncoder(), this.playback.signal)
      .catch((error: unknown) => {
        console.error('[MediaSession] Audio playback stopped:', error)
      })
  }
}

/**
 * Encodes paced frames and writes them as RTP until `signal` aborts.
 */
export const pumpAudio = async (
  source: TimedAudioSource,
  write: (packet: RtpPacket) => void,
  encoder: AudioEncoder,
  signal: AbortSignal
) => {
  const ssrc = randomSsrc()
  let sequenceNumber = Math.floor(Math.random() * 0xffff)
  try {
    for await (const frame of source.frames(signal)) {
      if (signal.aborted) break
      const header = new RtpHeader({
        payloadType: OPUS_PAYLOAD_TYPE,
        sequenceNumber,
        timestamp: frame.pts,
        ssrc,
        marker: frame.pts === 0,
      })
      write(new RtpPacket(header, encoder.encode(frame.samples)))
      sequenceNumber = (sequenceNumber + 1) & 0xffff
    }
  } finally {
    encoder.close()
  }
}

export const createWeriftEndpoint: PeerEndpointFactory = (options) =>
  new WeriftPeerEndpoint(options)
