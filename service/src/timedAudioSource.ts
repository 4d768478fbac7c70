import { sleep as defaultSleep, type Sleep } from './timing'

export type AudioFrame = {
  /** Mono signed 16-bit PCM, always `samplesPerFrame` long. */
  samples: Int16Array
  sampleRate: number
  /** Index of the frame's first sample since the source started. */
  pts: number
}

type TimedAudioSourceOptions = {
  sampleRate?: number
  frameDurationMs?: number
  now?: () => number
  sleep?: Sleep
}

export const AUDIO_SAMPLE_RATE = 48_000
export const AUDIO_FRAME_MS = 20

/**
 * Paces a decoded sample buffer out in real time, one 20 ms frame per call.
 * Frame N is held back until N frame durations have passed since the first
 * call. Once the buffer runs out the source keeps producing silence, so the
 * consumer decides when playback ends.
 */
export class TimedAudioSource {
  readonly sampleRate: number
  readonly samplesPerFrame: number
  private readonly samples: Int16Array
  private readonly now: () => number
  private readonly sleep: Sleep
  private position = 0
  private startedAt: number | null = null

  constructor(samples: Int16Array, options: TimedAudioSourceOptions = {}) {
    this.samples = samples
    this.sampleRate = options.sampleRate ?? AUDIO_SAMPLE_RATE
    this.samplesPerFrame = Math.round(
      (this.sampleRate * (options.frameDurationMs ?? AUDIO_FRAME_MS)) / 1000
    )
    this.now = options.now ?? (() => performance.now())
    this.sleep = options.sleep ?? defaultSleep
  }

  async next(): Promise<AudioFrame> {
    if (this.startedAt === null) {
      this.startedAt = this.now()
    }

    const elapsedMs = this.now() - this.startedAt
    const targetSamples = Math.floor((elapsedMs * this.sampleRate) / 1000)
    const samplesAhead = this.position - targetSamples
    if (samplesAhead > 0) {
      await this.sleep((samplesAhead * 1000) / this.sampleRate)
    }

    const start = this.position
    const chunk = new Int16Array(this.samplesPerFrame)
    if (start < this.samples.length) {
      chunk.set(this.samples.subarray(start, start + this.samplesPerFrame))
    }
    this.position = start + this.samplesPerFrame

    return { samples: chunk, sampleRate: this.sampleRate, pts: start }
  }

  async *frames(signal?: AbortSignal): AsyncGenerator<AudioFrame> {
    while (!signal?.aborted) {
      yield await this.next()
    }
  }
}
