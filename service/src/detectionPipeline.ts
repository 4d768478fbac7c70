import type { AlertClip } from './alertClip'
import type { Classifier } from './classifier'
import { recordDetection as defaultRecordDetection, type DetectionLogEntry } from './detectionLog'
import type { ImageUploader } from './driveUploader'
import { describeError } from './errors'
import type { LocalImageStore } from './localImageStore'
import type { MediaSessionManager } from './mediaSession'
import type { MotionEventTracker } from './motionTracker'
import type { Notifier } from './notifier'
import { TimedAudioSource } from './timedAudioSource'
import type {
  ClassificationResult,
  MonitoredDevice,
  MotionSignal,
  NotificationKind,
  PipelineOutcome,
} from './types'

export type DetectionPipelineDeps = {
  tracker: Pick<MotionEventTracker, 'shouldTrigger'>
  sessions: Pick<MediaSessionManager, 'pullFrame' | 'pushAudioClip'>
  classifier: Classifier
  localStore: LocalImageStore
  uploader?: ImageUploader | null
  notifier?: Notifier | null
  alertClip?: AlertClip | null
  frameTimeoutMs?: number
  now?: () => number
  recordDetection?: (entry: DetectionLogEntry) => void
}

export type DetectionPipeline = {
  handleSignal: (target: MonitoredDevice, signal: MotionSignal) => Promise<PipelineOutcome>
}

const pad = (value: number) => String(value).padStart(2, '0')

/** `motion_<device name>_<YYYYMMDD_HHMMSS>.jpg` in local time. */
export const buildCaptureFilename = (deviceName: string, timestamp: number) => {
  const date = new Date(timestamp)
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `motion_${deviceName.replace(/ /g, '_')}_${stamp}.jpg`
}

/**
 * Gate, capture, classify, then branch. Only the gate and the capture can stop
 * a run early; every side effect after classification is isolated from the
 * others.
 */
export const createDetectionPipeline = (deps: DetectionPipelineDeps): DetectionPipeline => {
  const now = deps.now ?? Date.now
  const record = deps.recordDetection ?? defaultRecordDetection

  const notify = async (kind: NotificationKind, description: string) => {
    if (!deps.notifier) return
    try {
      await deps.notifier.notify(kind, description)
    } catch (error) {
      console.error(`[Pipeline] ${kind} notification failed:`, describeError(error))
    }
  }

  const playAlert = async ({ device, negotiator }: MonitoredDevice) => {
    if (!deps.alertClip) {
      console.warn('[Pipeline] No alert sound configured, skipping playback')
      return
    }
    if (!device.supportsTwoWayAudio) {
      console.log(`[Pipeline] ${device.name} has no speaker, skipping playback`)
      return
    }
    const source = new TimedAudioSource(deps.alertClip.samples)
    try {
      await deps.sessions.pushAudioClip(device, negotiator, source, {
        durationMs: deps.alertClip.durationMs,
      })
    } catch (error) {
      console.error('[Pipeline] Alert playback failed:', describeError(error))
    }
  }

  const storeFlaggedFrame = async (
    image: Buffer,
    filename: string,
    analysis: ClassificationResult
  ) => {
    const [upload, save] = await Promise.allSettled([
      deps.uploader ? deps.uploader.upload(image, filename, analysis) : Promise.resolve(null),
      deps.localStore.saveLocal(image, filename, analysis),
    ])
    if (upload.status === 'rejected') {
      console.error('[Pipeline] Upload failed:', describeError(upload.reason))
    }
    if (save.status === 'rejected') {
      console.error('[Pipeline] Local save failed:', describeError(save.reason))
    }
  }

  const handleSignal = async (
    target: MonitoredDevice,
    signal: MotionSignal
  ): Promise<PipelineOutcome> => {
    const { device, negotiator } = target
    if (!deps.tracker.shouldTrigger(device.id, signal.eventId, now())) {
      return 'gated'
    }

    const startedAt = now()
    const finish = (
      outcome: PipelineOutcome,
      details: Pick<DetectionLogEntry, 'description' | 'filename'> = {}
    ) => {
      const finishedAt = now()
      record({
        deviceId: device.id,
        deviceName: device.name,
        eventId: signal.eventId,
        outcome,
        timestamp: finishedAt,
        durationMs: finishedAt - startedAt,
        ...details,
      })
      return outcome
    }

    console.log(`[Pipeline] Motion detected on ${device.name} (event ${signal.eventId})`)

    const capture = await deps.sessions.pullFrame(device, negotiator, {
      timeoutMs: deps.frameTimeoutMs,
    })
    if (!capture.ok) {
      console.error(`[Pipeline] Failed to capture image from ${device.name}: ${capture.failure}`)
      return finish('capture_failed')
    }
    const { image, capturedAt } = capture.frame

    let analysis: ClassificationResult
    try {
      analysis = await deps.classifier.classify(image)
    } catch (error) {
      console.error('[Pipeline] Image analysis failed:', describeError(error))
      return finish('classification_failed')
    }

    if (analysis.isSuspicious) {
      console.warn(`[Pipeline] SUSPICIOUS ACTIVITY DETECTED on ${device.name}`, {
        confidence: analysis.confidence,
        description: analysis.description,
        reason: analysis.reason,
      })
      await playAlert(target)

      const filename = buildCaptureFilename(device.name, capturedAt)
      await storeFlaggedFrame(image, filename, analysis)
      await notify('thief', analysis.description)
      return finish('suspicious', { description: analysis.description, filename })
    }

    if (analysis.isDelivery) {
      console.log(`[Pipeline] Package delivered at ${device.name}:`, analysis.description)
      await notify('delivered', analysis.description)
      return finish('delivery', { description: analysis.description })
    }

    console.log(`[Pipeline] No suspicious activity: ${analysis.description}`)
    return finish('clear', { description: analysis.description })
  }

  return { handleSignal }
}
