import { access } from 'node:fs/promises'
import { describeError } from './errors'
import { runFfmpeg, type SpawnProcess } from './ffmpeg'
import { AUDIO_SAMPLE_RATE } from './timedAudioSource'

export type AlertClip = {
  /** Mono 48 kHz signed 16-bit PCM. */
  samples: Int16Array
  durationMs: number
}

type LoadAlertClipOptions = {
  filePath: string
  durationSeconds: number
  ffmpegPath?: string
  spawnProcess?: SpawnProcess
}

export const pcmToSamples = (bytes: Buffer) => {
  const samples = new Int16Array(Math.floor(bytes.length / 2))
  for (let i = 0; i < samples.length; i += 1) {
    samples[i] = bytes.readInt16LE(i * 2)
  }
  return samples
}

/**
 * Decodes the alert sound once at startup, cut to `durationSeconds`. A missing
 * or undecodable file disables playback instead of failing startup.
 */
export const loadAlertClip = async ({
  filePath,
  durationSeconds,
  ffmpegPath,
  spawnProcess,
}: LoadAlertClipOptions): Promise<AlertClip | null> => {
  try {
    await access(filePath)
  } catch {
    console.warn(`[AlertClip] Audio file not found: ${filePath}. Alerts will be silent.`)
    return null
  }

  try {
    const pcm = await runFfmpeg(
      [
        '-i', filePath,
        '-t', String(durationSeconds),
        '-f', 's16le',
        '-ac', '1',
        '-ar', String(AUDIO_SAMPLE_RATE),
        'pipe:1',
      ],
      { ffmpegPath, spawnProcess }
    )
    const samples = pcmToSamples(pcm)
    console.log(`[AlertClip] Loaded ${filePath}: ${samples.length} samples`)
    return { samples, durationMs: durationSeconds * 1000 }
  } catch (error) {
    console.warn(`[AlertClip] Failed to decode ${filePath}:`, describeError(error))
    return null
  }
}
