import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { computeBackoffMs, createDriveUploader, type CreateDriveFile } from './driveUploader'
import type { ClassificationResult } from './types'

const analysis: ClassificationResult = {
  isSuspicious: true,
  confidence: 'high',
  isDelivery: false,
  description: 'Box taken from the step',
  reason: 'Person walked off with the package',
}

describe('computeBackoffMs', () => {
  it('doubles per attempt and caps at thirty seconds', () => {
    const noJitter = () => 0
    expect(computeBackoffMs(1, noJitter)).toBe(1000)
    expect(computeBackoffMs(2, noJitter)).toBe(2000)
    expect(computeBackoffMs(3, noJitter)).toBe(4000)
    expect(computeBackoffMs(10, noJitter)).toBe(30_000)
  })

  it('adds up to twenty percent jitter', () => {
    expect(computeBackoffMs(2, () => 1)).toBe(2400)
    expect(computeBackoffMs(2, () => 0.5)).toBe(2200)
  })
})

describe('createDriveUploader', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('uploads into the folder with the classification as the description', async () => {
    const createFile = vi
      .fn<CreateDriveFile>()
      .mockResolvedValue({ id: 'file-1', webViewLink: 'https://drive.example/file-1' })
    const uploader = createDriveUploader({ folderId: 'folder-9', createFile })
    const image = Buffer.from('jpeg')

    const id = await uploader.upload(image, 'motion_Front_20240102_030405.jpg', analysis)

    expect(id).toBe('file-1')
    expect(createFile).toHaveBeenCalledWith({
      name: 'motion_Front_20240102_030405.jpg',
      description: JSON.stringify(analysis, null, 2),
      parents: ['folder-9'],
      mimeType: 'image/jpeg',
      body: image,
    })
    expect(console.log).toHaveBeenCalledWith(
      '[DriveUploader] Uploaded to Google Drive:',
      'https://drive.example/file-1'
    )
  })

  it('retries with backoff and succeeds on a later attempt', async () => {
    const createFile = vi
      .fn<CreateDriveFile>()
      .mockRejectedValueOnce(new Error('503'))
      .mockResolvedValue({ id: 'file-2', webViewLink: null })
    const sleep = vi.fn(async () => {})
    const uploader = createDriveUploader({
      folderId: 'folder-9',
      createFile,
      sleep,
      random: () => 0,
    })

    const id = await uploader.upload(Buffer.from('jpeg'), 'a.jpg', analysis)

    expect(id).toBe('file-2')
    expect(createFile).toHaveBeenCalledTimes(2)
    expect(sleep).toHaveBeenCalledWith(1000)
  })

  it('returns null after three failed attempts', async () => {
    const createFile = vi.fn<CreateDriveFile>().mockRejectedValue(new Error('forbidden'))
    const sleep = vi.fn(async () => {})
    const uploader = createDriveUploader({
      folderId: 'folder-9',
      createFile,
      sleep,
      random: () => 0,
    })

    const id = await uploader.upload(Buffer.from('jpeg'), 'a.jpg', analysis)

    expect(id).toBeNull()
    expect(createFile).toHaveBeenCalledTimes(3)
    expect(sleep.mock.calls).toEqual([[1000], [2000]])
    expect(console.error).toHaveBeenCalledWith(
      '[DriveUploader] Google Drive upload failed:',
      'forbidden'
    )
  })
})
