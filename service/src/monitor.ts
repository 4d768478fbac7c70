import { loadAlertClip, type AlertClip } from './alertClip'
import { createClassifier, createGeminiGenerate, type Classifier } from './classifier'
import type { MonitorConfig } from './config'
import { createDetectionPipeline } from './detectionPipeline'
import { exportDetections, getDetectionStats } from './detectionLog'
import { DeviceRegistryClient } from './deviceRegistry'
import { createDriveFileCreator, createDriveUploader, type ImageUploader } from './driveUploader'
import { describeError } from './errors'
import { createFfmpegFrameDecoder } from './frameDecoder'
import { createLocalImageStore, type LocalImageStore } from './localImageStore'
import { MediaSessionManager } from './mediaSession'
import { createMotionPoller } from './motionPoller'
import { MotionEventTracker } from './motionTracker'
import { createEmailNotifier, createSmtpSendMail, type Notifier } from './notifier'
import { createWeriftEndpoint } from './peerEndpoint'
import { createPipelineRunner } from './pipelineRunner'
import type { Device, MonitoredDevice, MotionSignal } from './types'
import { createWebhookListener } from './webhookListener'

export type MonitorServices = {
  registry: Pick<DeviceRegistryClient, 'refresh' | 'listDevices' | 'listMotionEvents' | 'negotiatorFor'>
  sessions: Pick<MediaSessionManager, 'pullFrame' | 'pushAudioClip'>
  classifier: Classifier
  uploader: ImageUploader | null
  localStore: LocalImageStore
  notifier: Notifier | null
  alertClip: AlertClip | null
}

export type RunningMonitor = {
  devices: MonitoredDevice[]
  /** Stops the signal source, then waits for in-flight pipelines. */
  stop: () => Promise<void>
}

export const selectDevices = (devices: Device[], name?: string) =>
  name ? devices.filter((device) => device.name === name) : devices

const createUploader = (config: MonitorConfig): ImageUploader | null => {
  if (!config.drive) {
    console.warn('[Monitor] GOOGLE_DRIVE_FOLDER_ID not set, flagged images are only saved locally')
    return null
  }
  return createDriveUploader({
    folderId: config.drive.folderId,
    createFile: createDriveFileCreator(config.drive.credentialsFile),
  })
}

const createNotifier = (config: MonitorConfig): Notifier | null => {
  if (!config.email) {
    console.warn('[Monitor] E-mail notifications disabled')
    return null
  }
  return createEmailNotifier({
    sender: config.email.sender,
    recipients: config.email.recipients,
    sendMail: createSmtpSendMail({
      host: config.email.host,
      port: config.email.port,
      user: config.email.sender,
      password: config.email.password,
    }),
  })
}

/** Builds every service the overrides do not supply. */
const createServices = async (
  config: MonitorConfig,
  overrides: Partial<MonitorServices>
): Promise<MonitorServices> => ({
  registry: overrides.registry ?? new DeviceRegistryClient(config.registry),
  sessions:
    overrides.sessions ??
    new MediaSessionManager({
      createEndpoint: createWeriftEndpoint,
      decoder: createFfmpegFrameDecoder({ ffmpegPath: config.ffmpegPath }),
      frameTimeoutMs: config.frameTimeoutMs,
    }),
  classifier:
    overrides.classifier ??
    createClassifier({
      model: config.gemini.model,
      generate: createGeminiGenerate(config.gemini.apiKey),
    }),
  uploader: overrides.uploader !== undefined ? overrides.uploader : createUploader(config),
  localStore: overrides.localStore ?? createLocalImageStore(config.localSaveDir),
  notifier: overrides.notifier !== undefined ? overrides.notifier : createNotifier(config),
  alertClip:
    overrides.alertClip !== undefined
      ? overrides.alertClip
      : await loadAlertClip({
          filePath: config.alertSound.filePath,
          durationSeconds: config.alertSound.durationSeconds,
          ffmpegPath: config.ffmpegPath,
        }),
})

const printDetectionSummary = (devices: MonitoredDevice[]) => {
  for (const { device } of devices) {
    const stats = getDetectionStats(device.id)
    if (stats) {
      console.log(`[Monitor] ${device.name}:`, stats.byOutcome)
    }
  }
  console.debug('[Monitor] Detection log:', exportDetections())
}

/**
 * Wires the registry, session manager, classifier and sinks into one
 * pipeline and starts the configured motion source.
 */
export const startMonitor = async (
  config: MonitorConfig,
  overrides: Partial<MonitorServices> = {}
): Promise<RunningMonitor> => {
  const services = await createServices(config, overrides)
  const { registry } = services

  await registry.refresh()
  const devices = selectDevices(await registry.listDevices(), config.deviceName)
  if (devices.length === 0) {
    throw new Error(
      config.deviceName ? `No device named "${config.deviceName}" found` : 'No devices found'
    )
  }
  const monitored = devices.map((device) => ({ device, negotiator: registry.negotiatorFor(device) }))
  console.log(`[Monitor] Found ${devices.length} device(s):`, devices.map((device) => device.name))

  const pipeline = createDetectionPipeline({
    tracker: new MotionEventTracker({ cooldownMs: config.cooldownMs }),
    sessions: services.sessions,
    classifier: services.classifier,
    uploader: services.uploader,
    localStore: services.localStore,
    notifier: services.notifier,
    alertClip: services.alertClip,
    frameTimeoutMs: config.frameTimeoutMs,
  })

  const runner = createPipelineRunner<{ target: MonitoredDevice; signal: MotionSignal }>(
    async ({ target, signal }) => {
      await pipeline.handleSignal(target, signal)
    },
    {
      onError: (error, { target }) => {
        console.error(`[Monitor] Pipeline failed for ${target.device.name}:`, describeError(error))
      },
      onSizeChange: (size) => {
        console.debug(`[Monitor] Pipelines in flight: ${size}`)
      },
    }
  )
  const dispatch = (target: MonitoredDevice, signal: MotionSignal) => runner.run({ target, signal })

  let stopSource: () => Promise<void>
  if (config.motionSource === 'push') {
    const listener = createWebhookListener({ devices: monitored, dispatch, port: config.webhookPort })
    await listener.listen()
    stopSource = listener.close
  } else {
    const controller = new AbortController()
    const poller = createMotionPoller({
      registry,
      devices: monitored,
      dispatch,
      historyLimit: config.historyLimit,
      intervalMs: config.scanIntervalMs,
    })
    const loop = poller.run(controller.signal)
    stopSource = async () => {
      controller.abort()
      await loop
    }
  }

  let stopping: Promise<void> | null = null
  const stop = () => {
    stopping ??= (async () => {
      console.log('[Monitor] Shutting down...')
      await stopSource()
      await runner.drain()
      printDetectionSummary(monitored)
    })()
    return stopping
  }

  return { devices: monitored, stop }
}
