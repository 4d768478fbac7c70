import OpusScript from 'opusscript'
import { AUDIO_SAMPLE_RATE } from './timedAudioSource'

export type AudioEncoder = {
  encode: (samples: Int16Array) => Buffer
  close: () => void
}

export const createOpusEncoder = (): AudioEncoder => {
  const encoder = new OpusScript(AUDIO_SAMPLE_RATE, 1, OpusScript.Application.AUDIO)
  return {
    encode: (samples) =>
      encoder.encode(
        Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength),
        samples.length
      ),
    close: () => encoder.delete(),
  }
}
