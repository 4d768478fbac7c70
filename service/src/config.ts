import dotenv from 'dotenv'
import { z } from 'zod'
import { DEFAULT_GEMINI_MODEL } from './classifier'
import { DEFAULT_REGISTRY_URL } from './deviceRegistry'
import { ConfigError } from './errors'

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional())
const stringWithDefault = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().trim().default(fallback))
const positiveNumber = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().positive().default(fallback))
const port = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65_535).default(fallback))

const envSchema = z.object({
  DEVICE_REGISTRY_URL: stringWithDefault(DEFAULT_REGISTRY_URL),
  DEVICE_REGISTRY_TOKEN: optionalString,
  DEVICE_NAME: optionalString,
  MOTION_SOURCE: z.preprocess(blankToUndefined, z.enum(['poll', 'push']).default('poll')),
  MOTION_COOLDOWN: positiveNumber(30),
  SCAN_INTERVAL: positiveNumber(10),
  HISTORY_LIMIT: z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(5)),
  WEBHOOK_PORT: port(8787),
  FRAME_TIMEOUT: positiveNumber(15),
  GEMINI_API_KEY: optionalString,
  GEMINI_MODEL: stringWithDefault(DEFAULT_GEMINI_MODEL),
  GOOGLE_DRIVE_FOLDER_ID: optionalString,
  GOOGLE_APPLICATION_CREDENTIALS: optionalString,
  LOCAL_SAVE_DIR: stringWithDefault('./flagged_images'),
  ALERT_SOUND_FILE: stringWithDefault('./sound_effects/alert.mp3'),
  ALERT_SOUND_DURATION: positiveNumber(3),
  FFMPEG_PATH: stringWithDefault('ffmpeg'),
  SMTP_HOST: stringWithDefault('smtp.gmail.com'),
  SMTP_PORT: port(587),
  SENDER_EMAIL: optionalString,
  EMAIL_APP_PASSWORD: optionalString,
  NOTIFICATION_RECIPIENTS: optionalString,
})

export type MotionSource = 'poll' | 'push'

export type EmailConfig = {
  host: string
  port: number
  sender: string
  password: string
  recipients: string[]
}

export type MonitorConfig = {
  registry: { baseUrl: string; token?: string }
  deviceName?: string
  motionSource: MotionSource
  cooldownMs: number
  scanIntervalMs: number
  historyLimit: number
  webhookPort: number
  frameTimeoutMs: number
  gemini: { apiKey: string; model: string }
  drive: { folderId: string; credentialsFile?: string } | null
  localSaveDir: string
  alertSound: { filePath: string; durationSeconds: number }
  ffmpegPath: string
  /** Null unless a sender, password and at least one recipient are set. */
  email: EmailConfig | null
}

const parseRecipients = (value: string | undefined) =>
  (value ?? '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)

/**
 * Validates an environment into a typed config. Throws ConfigError on invalid
 * values or when the classifier key is missing.
 */
export const readConfig = (env: Record<string, string | undefined>): MonitorConfig => {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid configuration: ${details}`)
  }

  const values = parsed.data
  if (!values.GEMINI_API_KEY) {
    throw new ConfigError('GEMINI_API_KEY is required')
  }

  const recipients = parseRecipients(values.NOTIFICATION_RECIPIENTS)
  const email =
    values.SENDER_EMAIL && values.EMAIL_APP_PASSWORD && recipients.length > 0
      ? {
          host: values.SMTP_HOST,
          port: values.SMTP_PORT,
          sender: values.SENDER_EMAIL,
          password: values.EMAIL_APP_PASSWORD,
          recipients,
        }
      : null

  return {
    registry: { baseUrl: values.DEVICE_REGISTRY_URL, token: values.DEVICE_REGISTRY_TOKEN },
    deviceName: values.DEVICE_NAME,
    motionSource: values.MOTION_SOURCE,
    cooldownMs: values.MOTION_COOLDOWN * 1000,
    scanIntervalMs: values.SCAN_INTERVAL * 1000,
    historyLimit: values.HISTORY_LIMIT,
    webhookPort: values.WEBHOOK_PORT,
    frameTimeoutMs: values.FRAME_TIMEOUT * 1000,
    gemini: { apiKey: values.GEMINI_API_KEY, model: values.GEMINI_MODEL },
    drive: values.GOOGLE_DRIVE_FOLDER_ID
      ? {
          folderId: values.GOOGLE_DRIVE_FOLDER_ID,
          credentialsFile: values.GOOGLE_APPLICATION_CREDENTIALS,
        }
      : null,
    localSaveDir: values.LOCAL_SAVE_DIR,
    alertSound: {
      filePath: values.ALERT_SOUND_FILE,
      durationSeconds: values.ALERT_SOUND_DURATION,
    },
    ffmpegPath: values.FFMPEG_PATH,
    email,
  }
}

/** Loads `.env` into process.env (existing variables win), then validates. */
export const loadConfig = (envFile?: string): MonitorConfig => {
  dotenv.config({ path: envFile })
  return readConfig(process.env)
}
