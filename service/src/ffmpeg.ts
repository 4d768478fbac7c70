import { spawn } from 'node:child_process'
import type { EventEmitter } from 'node:events'
import type { Readable, Writable } from 'node:stream'

export type FfmpegProcess = EventEmitter & {
  stdin: Writable
  stdout: Readable
  stderr: Readable
}

export type SpawnProcess = (command: string, args: string[]) => FfmpegProcess

export type FfmpegOptions = {
  ffmpegPath?: string
  input?: Buffer
  spawnProcess?: SpawnProcess
}

const defaultSpawn: SpawnProcess = (command, args) => spawn(command, args)

/**
 * Runs ffmpeg once, optionally feeding `input` on stdin, and resolves with
 * everything it wrote to stdout.
 */
export const runFfmpeg = (args: string[], options: FfmpegOptions = {}) =>
  new Promise<Buffer>((resolve, reject) => {
    const command = options.ffmpegPath ?? 'ffmpeg'
    const spawnProcess = options.spawnProcess ?? defaultSpawn
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    let child: FfmpegProcess
    try {
      child = spawnProcess(command, ['-hide_banner', '-loglevel', 'error', ...args])
    } catch (error) {
      reject(error)
      return
    }

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
    child.stdin.on('error', (error: Error) => {
      // ffmpeg may exit before consuming all input; its exit code decides.
      console.debug('[ffmpeg] stdin closed early:', error.message)
    })
    child.on('error', reject)
    child.on('close', (code: number | null) => {
      if (code === 0) {
        resolve(Buffer.concat(stdout))
        return
      }
      const detail = Buffer.concat(stderr).toString('utf8').trim()
      reject(new Error(`ffmpeg exited with code ${code}${detail ? `: ${detail}` : ''}`))
    })

    child.stdin.end(options.input)
  })
