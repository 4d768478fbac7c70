import { Readable } from 'node:stream'
import { google } from 'googleapis'
import { describeError } from './errors'
import { sleep as defaultSleep, type Sleep } from './timing'
import type { ClassificationResult } from './types'

const DRIVE_SCOPE = 'https://www.googleapis.com/auth/drive.file'

export type DriveFileRequest = {
  name: string
  description: string
  parents: string[]
  mimeType: string
  body: Buffer
}

export type DriveFile = {
  id: string | null
  webViewLink: string | null
}

export type CreateDriveFile = (request: DriveFileRequest) => Promise<DriveFile>

export interface ImageUploader {
  upload(image: Buffer, filename: string, metadata: ClassificationResult): Promise<string | null>
}

export const computeBackoffMs = (attempt: number, random: () => number = Math.random) => {
  const base = 1000
  const max = 30_000
  const exp = Math.min(max, base * 2 ** Math.max(0, attempt - 1))
  const jitter = exp * 0.2 * random()
  return Math.round(exp + jitter)
}

/** Drive client authenticated with a service-account key file. */
export const createDriveFileCreator = (keyFile?: string): CreateDriveFile => {
  const auth = new google.auth.GoogleAuth({ keyFile, scopes: [DRIVE_SCOPE] })
  const drive = google.drive({ version: 'v3', auth })

  return async ({ name, description, parents, mimeType, body }) => {
    const response = await drive.files.create({
      requestBody: { name, description, parents },
      media: { mimeType, body: Readable.from(body) },
      fields: 'id, webViewLink',
    })
    return {
      id: response.data.id ?? null,
      webViewLink: response.data.webViewLink ?? null,
    }
  }
}

type DriveUploaderOptions = {
  folderId: string
  createFile: CreateDriveFile
  maxAttempts?: number
  sleep?: Sleep
  random?: () => number
}

/**
 * Uploads flagged frames into one Drive folder, with the classification as the
 * file description. Returns the file id, or null once every attempt failed.
 */
export const createDriveUploader = ({
  folderId,
  createFile,
  maxAttempts = 3,
  sleep = defaultSleep,
  random = Math.random,
}: DriveUploaderOptions): ImageUploader => ({
  upload: async (image, filename, metadata) => {
    const request: DriveFileRequest = {
      name: filename,
      description: JSON.stringify(metadata, null, 2),
      parents: [folderId],
      mimeType: 'image/jpeg',
      body: image,
    }

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const file = await createFile(request)
        console.log('[DriveUploader] Uploaded to Google Drive:', file.webViewLink ?? file.id)
        return file.id
      } catch (error) {
        if (attempt >= maxAttempts) {
          console.error('[DriveUploader] Google Drive upload failed:', describeError(error))
          return null
        }
        const delayMs = computeBackoffMs(attempt, random)
        console.warn(
          `[DriveUploader] Upload attempt ${attempt} failed, retrying in ${delayMs}ms:`,
          describeError(error)
        )
        await sleep(delayMs)
      }
    }

    return null
  },
})
