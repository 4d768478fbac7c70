import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { SinkError } from './errors'
import type { ClassificationResult } from './types'

export interface LocalImageStore {
  saveLocal(image: Buffer, filename: string, metadata: ClassificationResult): Promise<string>
}

/**
 * Writes flagged frames to a directory, each with a `<filename>.json` sidecar
 * holding the classification.
 */
export const createLocalImageStore = (directory: string): LocalImageStore => ({
  saveLocal: async (image, filename, metadata) => {
    const imagePath = path.join(directory, filename)
    try {
      await mkdir(directory, { recursive: true })
      await writeFile(imagePath, image)
      await writeFile(`${imagePath}.json`, JSON.stringify(metadata, null, 2))
    } catch (error) {
      throw new SinkError('local', `Failed to save ${filename}`, { cause: error })
    }
    console.log('[LocalStore] Saved locally:', imagePath)
    return imagePath
  },
})
