import { runFfmpeg, type SpawnProcess } from './ffmpeg'
import { createDeferred } from './timing'

const START_CODE = Buffer.from([0, 0, 0, 1])

const NAL_IDR = 5
const NAL_SPS = 7
const NAL_STAP_A = 24
const NAL_FU_A = 28

export type RtpVideoPacket = {
  payload: Buffer
  marker: boolean
}

export type AccessUnit = {
  /** Annex-B byte stream for one picture. */
  data: Buffer
  isKeyframe: boolean
}

/**
 * Reassembles H.264 RTP payloads (RFC 6184 single NAL, STAP-A and FU-A) into
 * Annex-B access units. An access unit ends on the RTP marker bit.
 */
export class H264Depacketizer {
  private units: Buffer[] = []
  private fragments: Buffer[] | null = null
  private keyframe = false

  push(packet: RtpVideoPacket): AccessUnit | null {
    this.consume(packet.payload)
    if (!packet.marker) return null
    return this.flush()
  }

  private consume(payload: Buffer) {
    if (payload.length === 0) return
    const type = payload[0] & 0x1f

    if (type >= 1 && type <= 23) {
      this.addNal(payload)
      return
    }

    if (type === NAL_STAP_A) {
      let offset = 1
      while (offset + 2 <= payload.length) {
        const size = payload.readUInt16BE(offset)
        offset += 2
        if (size === 0 || offset + size > payload.length) break
        this.addNal(payload.subarray(offset, offset + size))
        offset += size
      }
      return
    }

    if (type === NAL_FU_A && payload.length > 2) {
      const fuHeader = payload[1]
      const isStart = (fuHeader & 0x80) !== 0
      const isEnd = (fuHeader & 0x40) !== 0
      if (isStart) {
        const header = (payload[0] & 0xe0) | (fuHeader & 0x1f)
        this.fragments = [Buffer.from([header])]
      }
      if (!this.fragments) return
      this.fragments.push(payload.subarray(2))
      if (isEnd) {
        this.addNal(Buffer.concat(this.fragments))
        this.fragments = null
      }
    }
  }

  private addNal(nal: Buffer) {
    const type = nal[0] & 0x1f
    if (type === NAL_IDR || type === NAL_SPS) {
      this.keyframe = true
    }
    this.units.push(START_CODE, nal)
  }

  private flush(): AccessUnit | null {
    this.fragments = null
    if (this.units.length === 0) return null
    const unit = { data: Buffer.concat(this.units), isKeyframe: this.keyframe }
    this.units = []
    this.keyframe = false
    return unit
  }
}

export type FrameDecoder = {
  /** Decodes the `frameIndex`-th picture of an Annex-B stream to a JPEG. */
  decodeStill: (stream: Buffer, frameIndex: number) => Promise<Buffer>
}

export const createFfmpegFrameDecoder = (
  options: { ffmpegPath?: string; spawnProcess?: SpawnProcess; quality?: number } = {}
): FrameDecoder => ({
  decodeStill: async (stream, frameIndex) => {
    const image = await runFfmpeg(
      [
        '-f', 'h264',
        '-i', 'pipe:0',
        '-vf', `select=gte(n\\,${frameIndex})`,
        '-frames:v', '1',
        '-q:v', String(options.quality ?? 3),
        '-f', 'image2',
        '-c:v', 'mjpeg',
        'pipe:1',
      ],
      {
        input: stream,
        ffmpegPath: options.ffmpegPath,
        spawnProcess: options.spawnProcess,
      }
    )
    if (image.length === 0) {
      throw new Error('Decoder produced no image')
    }
    return image
  },
})

type StillFrameGrabberOptions = {
  decoder: FrameDecoder
  skipFrames?: number
}

/**
 * Waits for a keyframe, lets `skipFrames` pictures pass so the stream settles,
 * then decodes the next one. Resolves once; later packets are ignored.
 */
export class StillFrameGrabber {
  private readonly decoder: FrameDecoder
  private readonly skipFrames: number
  private readonly depacketizer = new H264Depacketizer()
  private readonly collected: Buffer[] = []
  private readonly result = createDeferred<Buffer>()
  private closed = false

  constructor(options: StillFrameGrabberOptions) {
    this.decoder = options.decoder
    this.skipFrames = options.skipFrames ?? 5
  }

  get frame(): Promise<Buffer> {
    return this.result.promise
  }

  get framesCollected() {
    return this.collected.length
  }

  push(packet: RtpVideoPacket) {
    if (this.closed) return
    const unit = this.depacketizer.push(packet)
    if (!unit) return
    if (this.collected.length === 0 && !unit.isKeyframe) return

    this.collected.push(unit.data)
    if (this.collected.length > this.skipFrames) {
      this.closed = true
      this.decoder
        .decodeStill(Buffer.concat(this.collected), this.skipFrames)
        .then(this.result.resolve, this.result.reject)
    }
  }

  close() {
    this.closed = true
  }
}
