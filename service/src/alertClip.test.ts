import { EventEmitter } from 'node:events'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import { PassThrough } from 'node:stream'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { loadAlertClip, pcmToSamples } from './alertClip'
import type { FfmpegProcess } from './ffmpeg'

const createProcess = (output: Buffer, code: number) => {
  const stdout = new PassThrough()
  const child: FfmpegProcess = Object.assign(new EventEmitter(), {
    stdin: new PassThrough(),
    stdout,
    stderr: new PassThrough(),
  })
  child.stdin.on('finish', () => {
    stdout.end(output)
  })
  child.stdout.on('end', () => child.emit('close', code))
  return child
}

describe('pcmToSamples', () => {
  it('reads little-endian signed samples and drops a trailing odd byte', () => {
    const samples = pcmToSamples(Buffer.from([0x01, 0x00, 0xff, 0xff, 0x00, 0x80, 0x07]))
    expect(Array.from(samples)).toEqual([1, -1, -32768])
  })
})

describe('loadAlertClip', () => {
  let root: string

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'alert-clip-'))
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(root, { recursive: true, force: true })
  })

  it('decodes the file to mono 48 kHz PCM cut to the configured duration', async () => {
    const filePath = path.join(root, 'alert.mp3')
    await writeFile(filePath, 'mp3')
    const spawnProcess = vi.fn().mockReturnValue(createProcess(Buffer.from([0x10, 0x00, 0x20, 0x00]), 0))

    const clip = await loadAlertClip({ filePath, durationSeconds: 3, spawnProcess })

    expect(clip?.durationMs).toBe(3000)
    expect(Array.from(clip?.samples ?? [])).toEqual([16, 32])
    expect(spawnProcess).toHaveBeenCalledWith('ffmpeg', [
      '-hide_banner', '-loglevel', 'error',
      '-i', filePath,
      '-t', '3',
      '-f', 's16le',
      '-ac', '1',
      '-ar', '48000',
      'pipe:1',
    ])
  })

  it('returns null when the file is missing', async () => {
    const spawnProcess = vi.fn()

    const clip = await loadAlertClip({
      filePath: path.join(root, 'missing.mp3'),
      durationSeconds: 3,
      spawnProcess,
    })

    expect(clip).toBeNull()
    expect(spawnProcess).not.toHaveBeenCalled()
  })

  it('returns null when ffmpeg fails', async () => {
    const filePath = path.join(root, 'alert.mp3')
    await writeFile(filePath, 'mp3')

    const clip = await loadAlertClip({
      filePath,
      durationSeconds: 3,
      spawnProcess: () => createProcess(Buffer.alloc(0), 1),
    })

    expect(clip).toBeNull()
    expect(console.warn).toHaveBeenCalledWith(
      `[AlertClip] Failed to decode ${filePath}:`,
      'ffmpeg exited with code 1'
    )
  })
})
